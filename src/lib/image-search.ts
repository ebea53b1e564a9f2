import * as cheerio from "cheerio";
import { asString, isRecord } from "./coerce";
import { BROWSER_USER_AGENT, TIMEOUTS, getPexelsApiKey } from "./config";
import { errorMessage } from "./errors";
import { fetchWithTimeout } from "./http";

/**
 * Recipe-name → image URL memo owned by one FoodImageSearch.
 *
 * Reads and writes are unguarded: two concurrent lookups for the same name
 * may both miss and both search. The last write wins; values for one name
 * are interchangeable.
 */
export class ImageCache {
  private readonly entries = new Map<string, string>();

  get(key: string): string | undefined {
    return this.entries.get(key);
  }

  set(key: string, url: string): void {
    this.entries.set(key, url);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}

interface RecipeSite {
  name: string;
  searchUrl: (query: string) => string;
  imageSelector: string;
}

const RECIPE_SITES: RecipeSite[] = [
  {
    name: "AllRecipes",
    searchUrl: (q) => `https://www.allrecipes.com/search?q=${encodeURIComponent(q)}`,
    imageSelector: "img.card__img",
  },
  {
    name: "FoodNetwork",
    searchUrl: (q) => `https://www.foodnetwork.com/search/${encodeURIComponent(q)}-`,
    imageSelector: "img.m-MediaBlock__a-Image",
  },
  {
    name: "Epicurious",
    searchUrl: (q) => `https://www.epicurious.com/search?q=${encodeURIComponent(q)}`,
    imageSelector: "img.photo",
  },
];

const IMAGE_EXTENSIONS = [".jpg", ".jpeg", ".png", ".webp", ".gif"];
const IMAGE_HINTS = ["image", "img", "photo", "pic"];

/** http(s) URL that carries an image extension or an image-ish path segment. */
export function isImageUrl(url: string): boolean {
  if (!/^https?:\/\//.test(url)) return false;
  const lower = url.toLowerCase();
  return IMAGE_EXTENSIONS.some((ext) => lower.includes(ext)) || IMAGE_HINTS.some((h) => lower.includes(h));
}

function absolutize(src: string, pageUrl: string): string {
  if (src.startsWith("//")) return `https:${src}`;
  if (src.startsWith("/")) return `${new URL(pageUrl).origin}${src}`;
  return src;
}

export interface ImageSearchOptions {
  cache?: ImageCache;
  pexelsApiKey?: string | null;
}

export class FoodImageSearch {
  readonly cache: ImageCache;
  private readonly pexelsApiKey: string | null;

  constructor(options: ImageSearchOptions = {}) {
    this.cache = options.cache ?? new ImageCache();
    this.pexelsApiKey = options.pexelsApiKey === undefined ? getPexelsApiKey() : options.pexelsApiKey;
  }

  async search(recipeName: string): Promise<string | null> {
    const cached = this.cache.get(recipeName);
    if (cached) {
      console.log(`[image-search] Using cached image for: ${recipeName}`);
      return cached;
    }

    const url = (await this.searchRecipeSites(recipeName)) ?? (await this.searchPexels(recipeName));
    if (url) {
      this.cache.set(recipeName, url);
      console.log(`[image-search] Found image for ${recipeName}: ${url}`);
    } else {
      console.warn(`[image-search] No image found for ${recipeName}`);
    }
    return url;
  }

  private async searchRecipeSites(query: string): Promise<string | null> {
    for (const site of RECIPE_SITES) {
      const pageUrl = site.searchUrl(query);
      try {
        const response = await fetchWithTimeout(pageUrl, {
          headers: { "User-Agent": BROWSER_USER_AGENT },
          timeoutMs: TIMEOUTS.imageSearchMs,
        });
        if (!response.ok) continue;

        const $ = cheerio.load(await response.text());
        for (const img of $(site.imageSelector).toArray()) {
          const el = $(img);
          const src = el.attr("src") || el.attr("data-src") || el.attr("data-lazy-src");
          if (!src) continue;
          const candidate = absolutize(src, pageUrl);
          if (isImageUrl(candidate)) {
            console.log(`[image-search] Found image on ${site.name}`);
            return candidate;
          }
        }
      } catch (error) {
        console.warn(`[image-search] Error searching ${site.name}: ${errorMessage(error)}`);
      }
    }
    return null;
  }

  private async searchPexels(query: string): Promise<string | null> {
    if (!this.pexelsApiKey) return null;
    const url = `https://api.pexels.com/v1/search?query=${encodeURIComponent(`${query} food`)}&per_page=5`;
    try {
      const response = await fetchWithTimeout(url, {
        headers: { Authorization: this.pexelsApiKey },
        timeoutMs: TIMEOUTS.imageSearchMs,
      });
      if (!response.ok) {
        console.warn(`[image-search] Pexels returned ${response.status}`);
        return null;
      }
      const data: unknown = await response.json();
      if (!isRecord(data) || !Array.isArray(data.photos)) return null;

      for (const photo of data.photos) {
        if (!isRecord(photo) || !isRecord(photo.src)) continue;
        const src = asString(photo.src.large2x) ?? asString(photo.src.large) ?? asString(photo.src.original);
        if (src && isImageUrl(src)) return src;
      }
    } catch (error) {
      console.warn(`[image-search] Error searching Pexels: ${errorMessage(error)}`);
    }
    return null;
  }
}
