import * as cheerio from "cheerio";
import { asString, isRecord, type JsonRecord } from "./coerce";
import { BROWSER_USER_AGENT, TIMEOUTS } from "./config";
import { formatIsoDuration } from "./duration";
import { IngestError } from "./errors";
import { fetchWithTimeout, readText } from "./http";
import type { ScrapedPage, StructuredRecipeData } from "./types";

const IMAGE_SELECTORS = [
  'img[itemprop="image"]',
  "img.recipe-image",
  "img.recipe-photo",
  '[class*="recipe"] img',
  "article img",
  "main img",
];

const TITLE_SELECTORS = ["h1.recipe-name", "h1.recipe-title", 'h1[itemprop="name"]', "h1"];

const INGREDIENT_SELECTORS = [
  '[class*="ingredient"]',
  '[itemprop="recipeIngredient"]',
  ".recipe-ingredient",
  ".ingredient-list li",
  "ul.ingredients li",
];

const INSTRUCTION_SELECTORS = [
  '[class*="instruction"]',
  '[class*="direction"]',
  '[itemprop="recipeInstructions"]',
  ".recipe-instruction",
  ".directions li",
  "ol.instructions li",
];

const NUTRITION_LABELS: ReadonlyArray<[key: string, label: string, unit: string]> = [
  ["proteinContent", "Protein", "g"],
  ["carbohydrateContent", "Carbohydrates", "g"],
  ["fatContent", "Fat", "g"],
  ["fiberContent", "Fiber", "g"],
  ["sugarContent", "Sugar", "g"],
  ["sodiumContent", "Sodium", "mg"],
];

// Fewer assembled lines than this means the DOM heuristics found nothing useful.
const MIN_HEURISTIC_LINES = 5;

function stripTags(text: string): string {
  return text.replace(/<[^>]+>/g, "").trim();
}

function elementText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** Absolute URL for a possibly relative or protocol-relative reference. */
export function resolveImageUrl(candidate: string, baseUrl: string | null): string | null {
  const trimmed = candidate.trim();
  if (!trimmed) return null;
  if (trimmed.startsWith("//")) return `https:${trimmed}`;
  if (/^https?:\/\//i.test(trimmed)) return trimmed;
  if (!baseUrl) return null;
  try {
    return new URL(trimmed, baseUrl).toString();
  } catch {
    return null;
  }
}

// ---------------------------------------------------------------------------
// Structured data
// ---------------------------------------------------------------------------

function isRecipeNode(value: unknown): value is JsonRecord {
  if (!isRecord(value)) return false;
  const type = value["@type"];
  if (Array.isArray(type)) return type.includes("Recipe");
  return type === "Recipe";
}

export function findRecipeNode(data: unknown): JsonRecord | null {
  if (Array.isArray(data)) {
    return data.find(isRecipeNode) ?? null;
  }
  if (isRecipeNode(data)) return data;
  if (isRecord(data) && Array.isArray(data["@graph"])) {
    return data["@graph"].find(isRecipeNode) ?? null;
  }
  return null;
}

function findJsonLdRecipe($: cheerio.CheerioAPI): JsonRecord | null {
  for (const script of $('script[type="application/ld+json"]').toArray()) {
    const raw = $(script).html();
    if (!raw) continue;
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      console.warn("[scraper] Skipping unparseable JSON-LD block:", error instanceof Error ? error.message : error);
      continue;
    }
    const recipe = findRecipeNode(data);
    if (recipe) return recipe;
  }
  return null;
}

function imageCandidate(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (isRecord(value)) return asString(value.url) ?? asString(value["@url"]);
  return null;
}

function structuredImage(value: unknown, baseUrl: string | null): string | null {
  const candidates = Array.isArray(value) ? value : [value];
  for (const item of candidates) {
    const candidate = imageCandidate(item);
    const resolved = candidate ? resolveImageUrl(candidate, baseUrl) : null;
    if (resolved) return resolved;
  }
  return null;
}

/** Instruction steps as plain lines; HowToSection groups are flattened in order. */
export function flattenInstructions(value: unknown): string[] {
  const items = Array.isArray(value) ? value : value === undefined || value === null ? [] : [value];
  const steps: string[] = [];
  for (const item of items) {
    if (isRecord(item)) {
      if (Array.isArray(item.itemListElement)) {
        steps.push(...flattenInstructions(item.itemListElement));
        continue;
      }
      const text = asString(item.text) ?? asString(item.name);
      if (text) steps.push(stripTags(text));
    } else if (typeof item === "string") {
      // Some sites put every step into one newline-separated string.
      for (const line of item.split("\n")) {
        const text = stripTags(line);
        if (text) steps.push(text);
      }
    }
  }
  return steps.filter(Boolean);
}

function yieldText(value: unknown): string | null {
  return asString(Array.isArray(value) ? value[0] : value);
}

function nutritionValues(value: unknown): Record<string, string> | null {
  if (!isRecord(value)) return null;
  const out: Record<string, string> = {};
  const calories = asString(value.calories);
  if (calories) out.calories = calories.replace(/[^\d]/g, "");
  for (const [key] of NUTRITION_LABELS) {
    const raw = asString(value[key]);
    if (raw) out[key] = raw.replace(/[^\d.]/g, "");
  }
  return out;
}

function buildStructuredBlob(recipe: JsonRecord, data: StructuredRecipeData): string {
  const lines: string[] = [];
  lines.push(`# ${data.title ?? "Untitled Recipe"}\n`);

  const description = asString(recipe.description);
  if (description) lines.push(`${stripTags(description)}\n`);
  if (data.servings) lines.push(`Servings: ${data.servings}\n`);

  const times: Array<[string, string]> = [
    ["prepTime", "Prep Time"],
    ["cookTime", "Cook Time"],
    ["totalTime", "Total Time"],
  ];
  for (const [key, label] of times) {
    const value = asString(recipe[key]);
    if (value) lines.push(`${label}: ${formatIsoDuration(value)}`);
  }

  lines.push("");
  lines.push("## Ingredients:\n");
  for (const ingredient of data.ingredients) {
    lines.push(`- ${ingredient}`);
  }

  lines.push("");
  lines.push("## Instructions:\n");
  data.instructions.forEach((step, index) => {
    lines.push(`${index + 1}. ${step}`);
  });

  if (data.nutrition) {
    lines.push("\n## Nutrition Information:\n");
    if (data.nutrition.calories) lines.push(`- Calories: ${data.nutrition.calories}`);
    for (const [key, label, unit] of NUTRITION_LABELS) {
      const value = data.nutrition[key];
      if (value) lines.push(`- ${label}: ${value}${unit}`);
    }
  }

  return lines.join("\n");
}

function fromStructuredData(recipe: JsonRecord, pageUrl: string, baseUrl: string | null): ScrapedPage {
  const ingredients = (Array.isArray(recipe.recipeIngredient) ? recipe.recipeIngredient : [])
    .map((item) => (isRecord(item) ? asString(item.name) : asString(item)))
    .map((item) => (item ? stripTags(item) : ""))
    .filter(Boolean);

  const structuredData: StructuredRecipeData = {
    title: asString(recipe.name),
    ingredients,
    instructions: flattenInstructions(recipe.recipeInstructions),
    servings: yieldText(recipe.recipeYield),
    nutrition: nutritionValues(recipe.nutrition),
  };

  return {
    url: asString(recipe.url) ?? pageUrl,
    text: buildStructuredBlob(recipe, structuredData),
    imageUrl: structuredImage(recipe.image, baseUrl),
    structuredData,
  };
}

// ---------------------------------------------------------------------------
// DOM heuristics
// ---------------------------------------------------------------------------

/** Matches that contain no further match of the same selector. */
function leafTexts($: cheerio.CheerioAPI, selector: string): string[] {
  return $(selector)
    .toArray()
    .filter((el) => $(el).find(selector).length === 0)
    .map((el) => elementText($(el).text()))
    .filter(Boolean);
}

function findHeadingList($: cheerio.CheerioAPI, keywords: readonly string[], allowDiv: boolean): string[] {
  for (const heading of $("h2, h3, h4").toArray()) {
    const text = $(heading).text().toLowerCase();
    if (!keywords.some((keyword) => text.includes(keyword))) continue;

    const next = $(heading).next();
    if (next.is("ul, ol")) {
      return next
        .find("li")
        .toArray()
        .map((li) => elementText($(li).text()))
        .filter(Boolean);
    }
    if (allowDiv && next.is("div")) {
      return next
        .find("p, div")
        .toArray()
        .map((el) => elementText($(el).text()))
        .filter((line) => line.length > 10);
    }
  }
  return [];
}

function findDomImage($: cheerio.CheerioAPI, baseUrl: string | null): string | null {
  for (const selector of IMAGE_SELECTORS) {
    const img = $(selector).first();
    if (img.length === 0) continue;
    const src = img.attr("src") || img.attr("data-src") || img.attr("data-lazy-src");
    if (src) {
      const resolved = resolveImageUrl(src, baseUrl);
      if (resolved) return resolved;
    }
  }
  const ogImage = $('meta[property="og:image"]').attr("content");
  return ogImage ? resolveImageUrl(ogImage, baseUrl) : null;
}

function findDomTitle($: cheerio.CheerioAPI): string | null {
  for (const selector of TITLE_SELECTORS) {
    const el = $(selector).first();
    if (el.length > 0) {
      const title = elementText(el.text());
      if (title) return title;
    }
  }
  const pageTitle = elementText($("title").first().text());
  if (!pageTitle) return null;
  return pageTitle.replace(/\s+[|\-–]\s+.*$|\s*\|.*$/, "") || null;
}

function firstSelectorMatch($: cheerio.CheerioAPI, selectors: readonly string[]): string[] {
  for (const selector of selectors) {
    const lines = leafTexts($, selector);
    if (lines.length > 0) return lines;
  }
  return [];
}

function allTextBlob($: cheerio.CheerioAPI): string {
  const lines = ["# Recipe from URL\n"];
  $("script, style, nav, header, footer").remove();

  let root = $("main").first();
  if (root.length === 0) root = $("article").first();
  if (root.length === 0) root = $("body").first();

  for (const el of root.find("p, li, h2, h3").toArray()) {
    const node = $(el);
    const text = elementText(node.text());
    if (text.length <= 10) continue;
    if (node.is("h2, h3")) {
      lines.push(`\n## ${text}\n`);
    } else if (node.is("li")) {
      lines.push(`- ${text}`);
    } else {
      lines.push(text);
    }
  }
  return lines.join("\n");
}

function fromDomHeuristics($: cheerio.CheerioAPI, pageUrl: string, baseUrl: string | null): ScrapedPage {
  const imageUrl = findDomImage($, baseUrl);
  const title = findDomTitle($);
  const lines: string[] = [];

  if (title) lines.push(`# ${title}\n`);

  let ingredients = firstSelectorMatch($, INGREDIENT_SELECTORS);
  if (ingredients.length === 0) {
    ingredients = findHeadingList($, ["ingredient"], false);
  }
  if (ingredients.length > 0) {
    lines.push("## Ingredients:\n");
    lines.push(...ingredients.map((line) => `- ${line}`));
  }

  lines.push("");

  let instructions = firstSelectorMatch($, INSTRUCTION_SELECTORS);
  if (instructions.length === 0) {
    instructions = findHeadingList($, ["instruction", "direction", "method"], true);
  }
  if (instructions.length > 0) {
    lines.push("## Instructions:\n");
    lines.push(...instructions.map((line, index) => `${index + 1}. ${line}`));
  }

  const text = lines.length < MIN_HEURISTIC_LINES ? allTextBlob($) : lines.join("\n");
  if (lines.length < MIN_HEURISTIC_LINES) {
    console.log(`[scraper] No recipe markup found on ${pageUrl}, using page text`);
  }

  return {
    url: pageUrl,
    text,
    imageUrl,
    structuredData: title
      ? { title, ingredients, instructions, servings: null, nutrition: null }
      : null,
  };
}

// ---------------------------------------------------------------------------
// Entry points
// ---------------------------------------------------------------------------

/** Structured data first, then DOM heuristics. Never throws on thin pages. */
export function extractRecipeFromHtml(html: string, pageUrl: string): ScrapedPage {
  const $ = cheerio.load(html);
  const canonical = $('link[rel="canonical"]').attr("href") ?? null;
  const baseUrl = canonical ? resolveImageUrl(canonical, pageUrl) : pageUrl;

  const recipe = findJsonLdRecipe($);
  if (recipe) {
    console.log(`[scraper] Found structured recipe data on ${pageUrl}`);
    return fromStructuredData(recipe, canonical ?? pageUrl, baseUrl);
  }
  return fromDomHeuristics($, canonical ?? pageUrl, baseUrl);
}

export async function fetchPageHtml(url: string): Promise<string> {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new IngestError("VALIDATION_ERROR", "Invalid URL format");
  }

  const target = parsed.toString();
  const response = await fetchWithTimeout(target, {
    timeoutMs: TIMEOUTS.pageFetchMs,
    headers: {
      "User-Agent": BROWSER_USER_AGENT,
      Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      "Accept-Language": "en-US,en;q=0.5",
    },
  });

  if (!response.ok) {
    throw new IngestError("FETCH_ERROR", `HTTP ${response.status} ${response.statusText}`.trim());
  }
  return readText(response, target, TIMEOUTS.pageFetchMs);
}

export async function scrapeRecipePage(url: string): Promise<ScrapedPage> {
  const html = await fetchPageHtml(url);
  return extractRecipeFromHtml(html, url);
}
