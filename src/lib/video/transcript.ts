import { asString, isRecord } from "../coerce";
import { TIMEOUTS, getSerpApiKey } from "../config";
import { errorMessage } from "../errors";
import { fetchWithTimeout } from "../http";

export interface TranscriptSource {
  /** Joined caption text, or null when the video has none or the lookup fails. */
  fetchTranscript(videoId: string): Promise<string | null>;
}

/** YouTube captions through SerpApi's youtube_video_transcript engine. */
export class SerpApiTranscriptSource implements TranscriptSource {
  constructor(private readonly apiKey: string | null = getSerpApiKey()) {}

  async fetchTranscript(videoId: string): Promise<string | null> {
    if (!this.apiKey) {
      console.warn("[video] SERPAPI_KEY not configured, skipping transcript");
      return null;
    }

    const url = new URL("https://serpapi.com/search.json");
    url.searchParams.set("engine", "youtube_video_transcript");
    url.searchParams.set("v", videoId);
    url.searchParams.set("api_key", this.apiKey);

    try {
      const response = await fetchWithTimeout(url.toString(), { timeoutMs: TIMEOUTS.transcriptMs });
      if (!response.ok) {
        console.warn(`[video] SerpApi transcript error: HTTP ${response.status}`);
        return null;
      }

      const data: unknown = await response.json();
      if (!isRecord(data)) return null;
      if (data.error) {
        console.warn("[video] SerpApi returned error:", data.error);
        return null;
      }

      const segments = Array.isArray(data.transcript) ? data.transcript : [];
      const text = segments
        .map((segment) => (isRecord(segment) ? asString(segment.snippet) ?? "" : ""))
        .join(" ")
        .replace(/\s+/g, " ")
        .trim();
      return text || null;
    } catch (error) {
      console.warn(`[video] Could not get transcript for ${videoId}: ${errorMessage(error)}`);
      return null;
    }
  }
}
