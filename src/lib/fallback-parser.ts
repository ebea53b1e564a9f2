import { IngestError } from "./errors";
import type { Ingredient, ParsedRecipe } from "./types";

/**
 * Model-free recipe segmenter. Used when no model backend answers in
 * preserve-original mode; also the minimum bar any parse must clear.
 */

const INGREDIENT_HEADERS = ["ingredient", "you need", "you'll need"];
const INSTRUCTION_HEADERS = ["instruction", "direction", "method", "step"];

const COOKING_VERBS = [
  "heat", "cook", "bake", "fry", "boil", "simmer", "stir", "mix",
  "combine", "add", "pour", "place", "put", "season", "serve",
  "chop", "dice", "slice", "cut", "prepare", "preheat", "drain",
  "melt", "whisk", "blend", "fold", "knead", "roll", "spread",
];

const VERB_PATTERN = new RegExp(`\\b(?:${COOKING_VERBS.join("|")})`, "i");

const UNIT_TOKEN_PATTERN =
  /\b(?:cups?|tbsps?|tsps?|oz|lbs?|g|kg|ml|l|tablespoons?|teaspoons?|ounces?|pounds?|grams?|kilograms?|milliliters?|liters?|pinch(?:es)?|dash(?:es)?|cloves?|pieces?)\b/i;

// Order matters: the first rule that matches the start of the remainder wins.
// Single-letter T/t are case-sensitive (tablespoon vs teaspoon).
const UNIT_RULES: readonly RegExp[] = [
  /^(tablespoons?|tbsps?\.?)(?=\s|$)/i,
  /^(T\.?)(?=\s|$)/,
  /^(teaspoons?|tsps?\.?)(?=\s|$)/i,
  /^(t\.?)(?=\s|$)/,
  /^(cups?|c\.?)(?=\s|$)/i,
  /^(ounces?|oz\.?)(?=\s|$)/i,
  /^(pounds?|lbs?\.?)(?=\s|$)/i,
  /^(kilograms?|kg\.?)(?=\s|$)/i,
  /^(grams?|g\.?)(?=\s|$)/i,
  /^(milliliters?|ml\.?)(?=\s|$)/i,
  /^(liters?|l\.?)(?=\s|$)/i,
  /^(pinch(?:es)?)(?=\s|$)/i,
  /^(dash(?:es)?)(?=\s|$)/i,
  /^(cloves?)(?=\s|$)/i,
  /^(pieces?)(?=\s|$)/i,
  /^(cans?)(?=\s|$)/i,
  /^(packages?|pkgs?\.?)(?=\s|$)/i,
  /^(bunches?)(?=\s|$)/i,
  /^(stalks?)(?=\s|$)/i,
];

const QUANTITY_PATTERN =
  /^(\d+\s+\d+\/\d+|\d+(?:\.\d+)?(?:\/\d+)?(?:\s*-\s*\d+(?:\.\d+)?(?:\/\d+)?)?)\s*/;

const BULLET_PATTERN = /^[\s\-•*·]+/;
const SERVINGS_PATTERN = /(?:serves?|servings?|yields?)[:\s]+(\d+)/i;
const DEFAULT_SERVINGS = 4;
const DEFAULT_INSTRUCTION = "Follow standard cooking procedures for the listed ingredients.";

function isHeader(line: string, keywords: readonly string[]): boolean {
  const lower = line.toLowerCase().trim();
  if (!keywords.some((keyword) => lower.includes(keyword))) return false;
  return lower.split(/\s+/).length <= 4 && !/\d/.test(lower);
}

export function looksLikeIngredient(line: string): boolean {
  const trimmed = line.trim();
  if (!trimmed) return false;
  if (/\d/.test(trimmed) || UNIT_TOKEN_PATTERN.test(trimmed)) return true;
  return trimmed.split(/\s+/).length <= 5 && !trimmed.endsWith(".");
}

export function looksLikeInstruction(line: string): boolean {
  const trimmed = line.trim();
  if (!trimmed) return false;
  return VERB_PATTERN.test(trimmed) || trimmed.endsWith(".");
}

function extractTitle(lines: string[]): string {
  for (const raw of lines) {
    const line = raw.trim();
    if (!line || BULLET_PATTERN.test(line)) continue;
    if (isHeader(line, INGREDIENT_HEADERS) || isHeader(line, INSTRUCTION_HEADERS)) continue;
    return line;
  }
  return "Untitled Recipe";
}

interface Sections {
  ingredients: string[];
  instructions: string[];
}

function splitSections(lines: string[]): Sections {
  let ingredientsStart = -1;
  let instructionsStart = -1;
  let instructionsHeader = -1;

  for (let i = 0; i < lines.length; i++) {
    if (isHeader(lines[i], INGREDIENT_HEADERS)) {
      ingredientsStart = i + 1;
    } else if (isHeader(lines[i], INSTRUCTION_HEADERS)) {
      instructionsHeader = i;
      instructionsStart = i + 1;
      break;
    }
  }

  if (ingredientsStart === -1) {
    for (let i = 1; i < lines.length; i++) {
      if (looksLikeIngredient(lines[i])) {
        ingredientsStart = i;
        break;
      }
    }
  }

  if (ingredientsStart === -1) {
    throw new IngestError(
      "EXTRACTION_EMPTY",
      "Could not identify ingredients section. Please ensure ingredients are clearly listed."
    );
  }

  if (instructionsStart === -1) {
    for (let i = lines.length - 1; i > ingredientsStart; i--) {
      if (looksLikeInstruction(lines[i])) {
        instructionsStart = i;
        while (instructionsStart > ingredientsStart && looksLikeIngredient(lines[instructionsStart - 1])) {
          instructionsStart--;
        }
        break;
      }
    }
  }

  const ingredientsEnd =
    instructionsHeader !== -1 ? instructionsHeader : instructionsStart !== -1 ? instructionsStart : lines.length;
  const nonBlank = (line: string) => line.trim().length > 0;

  return {
    ingredients: lines.slice(ingredientsStart, ingredientsEnd).filter(nonBlank),
    instructions: instructionsStart === -1 ? [] : lines.slice(instructionsStart).filter(nonBlank),
  };
}

export function parseIngredientLine(raw: string): Ingredient | null {
  let line = raw.trim().replace(BULLET_PATTERN, "").trim();
  if (!line || line.endsWith(":")) return null;

  let quantity: string | null = null;
  const quantityMatch = line.match(QUANTITY_PATTERN);
  if (quantityMatch) {
    quantity = quantityMatch[1].replace(/\s*-\s*/, "-");
    line = line.slice(quantityMatch[0].length);
  }

  let unit: string | null = null;
  for (const rule of UNIT_RULES) {
    const match = line.match(rule);
    if (match) {
      unit = match[1];
      line = line.slice(match[0].length).trim();
      break;
    }
  }

  let name = line.replace(/^of\s+/i, "").replace(/,.*$/, "").trim();

  if (quantity === null) {
    const toTaste = name.match(/^(.*?)\s+to taste$/i);
    if (toTaste) {
      name = toTaste[1].trim();
      quantity = "to taste";
    }
  }

  if (!name) return null;
  return { name, quantity, unit };
}

function parseNumericQuantity(quantity: string | null): number | null {
  if (!quantity) return null;
  const mixed = quantity.match(/^(\d+)\s+(\d+)\/(\d+)$/);
  if (mixed) {
    const denominator = Number(mixed[3]);
    return denominator ? Number(mixed[1]) + Number(mixed[2]) / denominator : null;
  }
  const fraction = quantity.match(/^(\d+)\/(\d+)$/);
  if (fraction) {
    const denominator = Number(fraction[2]);
    return denominator ? Number(fraction[1]) / denominator : null;
  }
  return /^\d+(?:\.\d+)?$/.test(quantity) ? Number(quantity) : null;
}

function formatQuantity(value: number): string {
  return Number.isInteger(value) ? String(value) : String(Number(value.toFixed(2)));
}

/** Merges entries with the same name and unit; non-numeric amounts keep the first entry. */
export function mergeDuplicateIngredients(ingredients: Ingredient[]): Ingredient[] {
  const merged = new Map<string, Ingredient>();
  for (const ingredient of ingredients) {
    const key = `${ingredient.name.toLowerCase()}|${(ingredient.unit ?? "").toLowerCase()}`;
    const existing = merged.get(key);
    if (!existing) {
      merged.set(key, { ...ingredient });
      continue;
    }
    const a = parseNumericQuantity(existing.quantity);
    const b = parseNumericQuantity(ingredient.quantity);
    if (a !== null && b !== null) {
      existing.quantity = formatQuantity(a + b);
    }
  }
  return [...merged.values()];
}

function parseIngredients(lines: string[]): Ingredient[] {
  const ingredients: Ingredient[] = [];
  for (const line of lines) {
    const ingredient = parseIngredientLine(line);
    if (ingredient) ingredients.push(ingredient);
  }
  if (ingredients.length === 0) {
    throw new IngestError(
      "EXTRACTION_EMPTY",
      "No valid ingredients found. Please check the format of your ingredients list."
    );
  }
  return mergeDuplicateIngredients(ingredients);
}

function parseInstructions(lines: string[]): string[] {
  const instructions: string[] = [];
  let pending = "";

  for (const raw of lines) {
    const line = raw
      .trim()
      .replace(/^\d+[.)]\s*/, "")
      .replace(/^step\s+\d+:?\s*/i, "");
    if (!line) continue;

    if (line.endsWith(".") || looksLikeInstruction(line)) {
      instructions.push(pending ? `${pending} ${line}` : line);
      pending = "";
    } else {
      pending = pending ? `${pending} ${line}` : line;
    }
  }
  if (pending) instructions.push(pending);

  return instructions.length > 0 ? instructions : [DEFAULT_INSTRUCTION];
}

export function extractServings(text: string): number {
  const match = text.match(SERVINGS_PATTERN);
  if (!match) return DEFAULT_SERVINGS;
  const servings = Number.parseInt(match[1], 10);
  return servings > 0 ? servings : DEFAULT_SERVINGS;
}

export function parseRecipeText(text: string): ParsedRecipe {
  const lines = text.trim().split("\n");
  const title = extractTitle(lines);
  const sections = splitSections(lines);

  if (sections.ingredients.length === 0) {
    throw new IngestError(
      "EXTRACTION_EMPTY",
      "Could not identify ingredients section. Please ensure ingredients are clearly listed."
    );
  }
  if (sections.instructions.length === 0) {
    throw new IngestError(
      "EXTRACTION_EMPTY",
      "Could not identify instructions section. Please ensure cooking steps are included."
    );
  }

  return {
    title,
    ingredients: parseIngredients(sections.ingredients),
    instructions: parseInstructions(sections.instructions),
    servings: extractServings(text),
    cuisineType: null,
    dietaryTags: [],
  };
}
