import { asNumber, asString, asStringArray, isRecord, type JsonRecord } from "./coerce";
import { IngestError, errorMessage, isIngestError } from "./errors";
import { parseRecipeText } from "./fallback-parser";
import { parseModelJson } from "./json-repair";
import type { CompletionClient } from "./llm-providers/types";
import { RECIPE_PARSER_SYSTEM_PROMPT, buildRecipePrompt } from "./prompts/recipe-prompt";
import { DIETARY_TAGS, type Ingredient, type ParsedRecipe } from "./types";

export interface ParseOptions {
  isOcrText?: boolean;
  preserveOriginal?: boolean;
}

export type ParseOutcome =
  | { ok: true; recipe: ParsedRecipe }
  | { ok: false; error: IngestError };

const DEFAULT_SERVINGS = 4;

function toIngredient(value: unknown): Ingredient | null {
  if (!isRecord(value)) return null;
  const name = asString(value.name);
  if (!name) return null;

  let quantity = asString(value.quantity);
  if (quantity && quantity.toLowerCase() === "as needed") {
    quantity = "to taste";
  }
  return { name, quantity, unit: asString(value.unit) };
}

function toDietaryTags(value: unknown): string[] {
  const tags: string[] = [];
  for (const raw of asStringArray(value)) {
    const tag = DIETARY_TAGS.find((known) => known.toLowerCase() === raw.toLowerCase());
    if (tag && !tags.includes(tag)) tags.push(tag);
  }
  return tags;
}

function toServings(value: unknown): number {
  const parsed = asNumber(value);
  return parsed !== null && parsed >= 1 ? Math.round(parsed) : DEFAULT_SERVINGS;
}

/** Maps the model's snake_case JSON onto ParsedRecipe, dropping unknown keys. */
export function toParsedRecipe(data: JsonRecord): ParsedRecipe {
  const ingredients = Array.isArray(data.ingredients)
    ? data.ingredients.map(toIngredient).filter((i): i is Ingredient => i !== null)
    : [];
  const instructions = asStringArray(data.instructions);

  if (ingredients.length === 0) {
    throw new IngestError("EXTRACTION_EMPTY", "Could not extract any ingredients from the recipe text");
  }
  if (instructions.length === 0) {
    throw new IngestError("EXTRACTION_EMPTY", "Could not extract any instructions from the recipe text");
  }

  return {
    title: asString(data.title) ?? "Untitled Recipe",
    ingredients,
    instructions,
    servings: toServings(data.servings),
    cuisineType: asString(data.cuisine_type),
    dietaryTags: toDietaryTags(data.dietary_tags),
  };
}

export class RecipeParser {
  constructor(private readonly client: CompletionClient | null) {}

  private requireClient(): CompletionClient {
    if (!this.client) {
      throw new IngestError(
        "CONFIG_ERROR",
        "A model API key is required for recipe parsing. Set GOOGLE_AI_API_KEY or OPENAI_API_KEY."
      );
    }
    return this.client;
  }

  private async parseWithModel(client: CompletionClient, text: string, options: ParseOptions): Promise<ParsedRecipe> {
    const raw = await client.complete({
      systemPrompt: RECIPE_PARSER_SYSTEM_PROMPT,
      userPrompt: buildRecipePrompt(text, {
        isOcrText: options.isOcrText ?? false,
        preserveOriginal: options.preserveOriginal ?? false,
      }),
      temperature: 0.3,
      maxTokens: 3000,
      json: true,
    });
    return toParsedRecipe(parseModelJson(raw, "recipe"));
  }

  /**
   * One model attempt, reported as a result instead of thrown. A missing
   * backend still throws: configuration errors are never degraded.
   */
  async tryParse(text: string, options: ParseOptions = {}): Promise<ParseOutcome> {
    const client = this.requireClient();
    try {
      return { ok: true, recipe: await this.parseWithModel(client, text, options) };
    } catch (error) {
      if (isIngestError(error)) return { ok: false, error };
      return {
        ok: false,
        error: new IngestError("UPSTREAM_ERROR", errorMessage(error, "Recipe parsing failed"), error),
      };
    }
  }

  /**
   * Standard mode propagates every failure. Preserve-original mode falls back
   * to the deterministic parser when the model attempt fails.
   */
  async parse(text: string, options: ParseOptions = {}): Promise<ParsedRecipe> {
    const outcome = await this.tryParse(text, options);
    if (outcome.ok) return outcome.recipe;

    if (!options.preserveOriginal) {
      throw outcome.error;
    }
    console.warn(
      `[recipe-parser] Model parse failed (${outcome.error.code}: ${outcome.error.safeMessage}), using deterministic parser`
    );
    return parseRecipeText(text);
  }
}
