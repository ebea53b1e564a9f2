import { IngestError, errorMessage, isIngestError } from "./errors";
import { scrapeRecipePage } from "./page-scraper";
import type { NormalizedSource, ScrapedPage, VideoExtraction } from "./types";
import { isVideoUrl } from "./video/platform";
import { VideoExtractor } from "./video/video-extractor";

export const MIN_TEXT_LENGTH = 10;

export type InputKind = "text" | "url" | "video";

export interface PageScraper {
  scrape(url: string): Promise<ScrapedPage>;
}

export interface VideoSource {
  extract(url: string): Promise<VideoExtraction>;
}

export function looksLikeUrl(input: string): boolean {
  return /^(https?:\/\/|www\.)/i.test(input.trim());
}

export function classifyInput(input: string): InputKind {
  if (!looksLikeUrl(input)) return "text";
  return isVideoUrl(input.trim()) ? "video" : "url";
}

function withScheme(url: string): string {
  return /^https?:\/\//i.test(url) ? url : `https://${url}`;
}

export const defaultPageScraper: PageScraper = { scrape: scrapeRecipePage };

/**
 * Turns raw user input into one text blob for the recipe parser, plus the
 * title and image hints the source carried.
 */
export class SourceNormalizer {
  private readonly pages: PageScraper;
  private readonly videos: VideoSource;

  constructor(deps: { pages?: PageScraper; videos?: VideoSource } = {}) {
    this.pages = deps.pages ?? defaultPageScraper;
    this.videos = deps.videos ?? new VideoExtractor();
  }

  async normalize(rawInput: string): Promise<NormalizedSource> {
    const input = rawInput.trim();
    switch (classifyInput(input)) {
      case "video":
        return this.fromVideo(withScheme(input));
      case "url":
        return this.fromPage(withScheme(input));
      case "text":
        return this.fromText(input);
    }
  }

  private fromText(text: string): NormalizedSource {
    if (text.length < MIN_TEXT_LENGTH) {
      throw new IngestError(
        "VALIDATION_ERROR",
        `Recipe text must be at least ${MIN_TEXT_LENGTH} characters long`
      );
    }
    return { kind: "text", text, titleHint: null, imageUrl: null };
  }

  private async fromPage(url: string): Promise<NormalizedSource> {
    let page: ScrapedPage;
    try {
      page = await this.pages.scrape(url);
    } catch (error) {
      const message = `Failed to fetch recipe from URL: ${errorMessage(error)}`;
      console.error(`[ingest] ${message}`);
      throw new IngestError(isIngestError(error) ? error.code : "FETCH_ERROR", message, error);
    }

    return {
      kind: "url",
      text: page.text,
      titleHint: page.structuredData?.title ?? null,
      imageUrl: page.imageUrl,
    };
  }

  private async fromVideo(url: string): Promise<NormalizedSource> {
    const video = await this.videos.extract(url);
    return {
      kind: "video",
      text: video.recipeText || video.fullText,
      titleHint: video.title || null,
      imageUrl: video.thumbnail || null,
      platform: video.platform,
    };
  }
}
