import { IngestError, errorMessage, isIngestError } from "../errors";
import type { VideoExtraction, VideoPlatform } from "../types";
import { PageMetadataSource, type VideoMetadata, type VideoMetadataSource } from "./metadata";
import { detectPlatform } from "./platform";
import { selectBestThumbnail } from "./thumbnails";
import { SerpApiTranscriptSource, type TranscriptSource } from "./transcript";
import { getYouTubeVideoId } from "./youtube";

export const INSTAGRAM_AUTH_MESSAGE = `Instagram requires authentication to access most content.

To add an Instagram recipe, please:
1. Copy the recipe text from the Instagram post
2. Paste it directly into the recipe text field
3. Or save the Instagram post and try again once it is publicly accessible

Alternative: use recipe videos from YouTube or TikTok, which don't require authentication.`;

// Instagram pages without a login return a stub caption; shorter than this is treated as walled.
const MIN_INSTAGRAM_DESCRIPTION = 50;

export interface VideoExtractorDeps {
  metadata?: VideoMetadataSource;
  transcripts?: TranscriptSource;
}

function thumbnailOf(metadata: VideoMetadata): string {
  return selectBestThumbnail(metadata.thumbnails ?? [], metadata.thumbnail ?? "");
}

function section(heading: string, body: string): string {
  return `## ${heading}:\n${body}\n\n`;
}

export class VideoExtractor {
  private readonly metadata: VideoMetadataSource;
  private readonly transcripts: TranscriptSource;

  constructor(deps: VideoExtractorDeps = {}) {
    this.metadata = deps.metadata ?? new PageMetadataSource();
    this.transcripts = deps.transcripts ?? new SerpApiTranscriptSource();
  }

  async extract(url: string): Promise<VideoExtraction> {
    const platform = detectPlatform(url);
    console.log(`[video] Detected platform: ${platform} for URL: ${url}`);

    try {
      switch (platform) {
        case "youtube":
          return await this.extractYouTube(url);
        case "instagram":
          return await this.extractInstagram(url);
        case "tiktok":
          return await this.extractTikTok(url);
        default:
          return await this.extractGeneric(url, platform);
      }
    } catch (error) {
      if (isIngestError(error)) throw error;
      console.error(`[video] Failed to extract video content: ${errorMessage(error)}`);
      throw new IngestError(
        "UPSTREAM_ERROR",
        `Failed to extract video content: ${errorMessage(error)}`,
        error
      );
    }
  }

  private async extractYouTube(url: string): Promise<VideoExtraction> {
    const videoId = getYouTubeVideoId(url);
    if (!videoId) {
      throw new IngestError("VALIDATION_ERROR", `Could not extract YouTube video ID from URL: ${url}`);
    }

    const metadata = await this.metadata.extract(url);
    const transcript = await this.transcripts.fetchTranscript(videoId);
    const description = metadata.description ?? "";

    let fullText = `# ${metadata.title || "Video Recipe"}\n\n`;
    if (description) fullText += section("Description", description);
    if (transcript) fullText += section("Video Transcript", transcript);

    return {
      platform: "youtube",
      title: metadata.title ?? "",
      author: metadata.uploader ?? "",
      url,
      thumbnail: thumbnailOf(metadata),
      duration: metadata.duration ?? 0,
      description,
      transcript,
      fullText,
      recipeText: fullText,
    };
  }

  private async extractInstagram(url: string): Promise<VideoExtraction> {
    console.warn(`[video] Instagram extraction attempted for: ${url}`);
    const metadata = await this.metadata.extract(url);
    const description = metadata.description ?? "";

    if (description.length <= MIN_INSTAGRAM_DESCRIPTION) {
      throw new IngestError("PLATFORM_POLICY", INSTAGRAM_AUTH_MESSAGE);
    }

    const title = metadata.title || "Instagram Recipe";
    const author = metadata.uploader || metadata.creator || "Unknown";
    console.log(`[video] Extracted Instagram content: ${description.length} chars`);

    const fullText =
      `# ${title}\n\n` +
      `By: ${author}\n\n` +
      `Source: Instagram (${url})\n\n` +
      section("Content", description);

    return {
      platform: "instagram",
      title,
      author,
      url,
      thumbnail: thumbnailOf(metadata),
      duration: metadata.duration ?? 0,
      description,
      transcript: null,
      fullText,
      recipeText: fullText,
    };
  }

  private async extractTikTok(url: string): Promise<VideoExtraction> {
    const metadata = await this.metadata.extract(url);
    const description = metadata.description ?? "";
    const title = metadata.title || "TikTok Recipe";

    let fullText = `# ${title}\n\n`;
    fullText += `By: ${metadata.creator || metadata.uploader || "Unknown"}\n\n`;
    if (description) fullText += section("Description", description);

    return {
      platform: "tiktok",
      title,
      author: metadata.creator || metadata.uploader || "",
      url,
      thumbnail: thumbnailOf(metadata),
      duration: metadata.duration ?? 0,
      description,
      transcript: null,
      fullText,
      recipeText: fullText,
    };
  }

  private async extractGeneric(url: string, platform: VideoPlatform): Promise<VideoExtraction> {
    const metadata = await this.metadata.extract(url);
    const description = metadata.description ?? "";
    const title = metadata.title || "Video Recipe";

    let fullText = `# ${title}\n\n`;
    if (metadata.uploader) fullText += `By: ${metadata.uploader}\n\n`;
    if (description) fullText += section("Description", description);

    return {
      platform,
      title,
      author: metadata.uploader ?? "",
      url,
      thumbnail: thumbnailOf(metadata),
      duration: metadata.duration ?? 0,
      description,
      transcript: null,
      fullText,
      recipeText: fullText,
    };
  }
}
