import * as cheerio from "cheerio";
import { asNumber, asString, isRecord } from "../coerce";
import { BROWSER_USER_AGENT, TIMEOUTS } from "../config";
import { errorMessage } from "../errors";
import { fetchWithTimeout } from "../http";
import type { ThumbnailCandidate } from "./thumbnails";
import { detectPlatform } from "./platform";

/** Best-effort metadata; every field may be missing. */
export interface VideoMetadata {
  title?: string;
  uploader?: string;
  creator?: string;
  thumbnail?: string;
  thumbnails?: ThumbnailCandidate[];
  /** Seconds. */
  duration?: number;
  description?: string;
}

export interface VideoMetadataSource {
  /** Never throws: an unreachable or auth-walled page yields `{}`. */
  extract(url: string): Promise<VideoMetadata>;
}

const ISO_SECONDS = /^PT(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?$/;

function isoToSeconds(value: string | undefined): number | undefined {
  const match = value?.match(ISO_SECONDS);
  if (!match) return undefined;
  return Number(match[1] ?? 0) * 3600 + Number(match[2] ?? 0) * 60 + Number(match[3] ?? 0);
}

function decodeJsonString(raw: string): string | undefined {
  try {
    const decoded: unknown = JSON.parse(`"${raw}"`);
    return typeof decoded === "string" ? decoded : undefined;
  } catch {
    return undefined;
  }
}

/** oEmbed wins for title and author; the page wins for everything else. */
function mergeMetadata(page: VideoMetadata, oembed: VideoMetadata): VideoMetadata {
  return {
    title: oembed.title ?? page.title,
    uploader: oembed.uploader ?? page.uploader,
    creator: page.creator,
    thumbnail: page.thumbnail ?? oembed.thumbnail,
    thumbnails: page.thumbnails,
    duration: page.duration,
    description: page.description,
  };
}

/** Reads og:/itemprop tags from the watch page HTML. */
export function metadataFromHtml(html: string): VideoMetadata {
  const $ = cheerio.load(html);
  const meta = (selector: string) => $(selector).attr("content")?.trim() || undefined;

  const thumbnails: ThumbnailCandidate[] = [];
  $('meta[property="og:image"]').each((_, el) => {
    const url = $(el).attr("content")?.trim();
    if (url) thumbnails.push({ url });
  });
  const width = asNumber(meta('meta[property="og:image:width"]'));
  const height = asNumber(meta('meta[property="og:image:height"]'));
  if (thumbnails.length > 0 && width !== null && height !== null) {
    thumbnails[0] = { ...thumbnails[0], width, height };
  }

  // YouTube ships the full description only inside its player JSON.
  const fullDescription = html.match(/"shortDescription":"((?:[^"\\]|\\.)*)"/);

  return {
    title: meta('meta[property="og:title"]') ?? meta('meta[name="title"]'),
    uploader:
      meta('meta[name="author"]') ??
      ($('link[itemprop="name"]').attr("content")?.trim() || undefined),
    thumbnail: thumbnails[0]?.url,
    thumbnails: thumbnails.length > 0 ? thumbnails : undefined,
    duration:
      isoToSeconds(meta('meta[itemprop="duration"]')) ??
      (asNumber(meta('meta[property="video:duration"]')) ?? undefined),
    description:
      (fullDescription ? decodeJsonString(fullDescription[1]) : undefined) ??
      meta('meta[property="og:description"]') ??
      meta('meta[name="description"]'),
  };
}

async function fetchYouTubeOEmbed(url: string): Promise<VideoMetadata> {
  const endpoint = `https://www.youtube.com/oembed?url=${encodeURIComponent(url)}&format=json`;
  const response = await fetchWithTimeout(endpoint, { timeoutMs: TIMEOUTS.videoMetadataMs });
  if (!response.ok) return {};

  const data: unknown = await response.json();
  if (!isRecord(data)) return {};
  return {
    title: asString(data.title) ?? undefined,
    uploader: asString(data.author_name) ?? undefined,
    thumbnail: asString(data.thumbnail_url) ?? undefined,
  };
}

/**
 * Default metadata primitive: the public watch page plus, for YouTube, the
 * oEmbed endpoint. Pages behind a login simply come back thin.
 */
export class PageMetadataSource implements VideoMetadataSource {
  async extract(url: string): Promise<VideoMetadata> {
    let fromPage: VideoMetadata = {};
    try {
      const response = await fetchWithTimeout(url, {
        timeoutMs: TIMEOUTS.videoMetadataMs,
        headers: { "User-Agent": BROWSER_USER_AGENT, "Accept-Language": "en-US,en;q=0.9" },
      });
      if (response.ok) {
        fromPage = metadataFromHtml(await response.text());
      } else {
        console.warn(`[video] Metadata page returned HTTP ${response.status} for ${url}`);
      }
    } catch (error) {
      console.warn(`[video] Failed to get video metadata for ${url}: ${errorMessage(error)}`);
    }

    if (detectPlatform(url) !== "youtube") return fromPage;

    try {
      const oembed = await fetchYouTubeOEmbed(url);
      return mergeMetadata(fromPage, oembed);
    } catch (error) {
      console.warn(`[video] oEmbed lookup failed for ${url}: ${errorMessage(error)}`);
      return fromPage;
    }
  }
}
