import { asNumber, asString, isRecord, roundNumericLeaves, type JsonRecord } from "../coerce";
import { IngestError } from "../errors";
import { parseModelJson } from "../json-repair";
import type { CompletionClient } from "../llm-providers/types";
import { NUTRITION_SYSTEM_PROMPT, buildNutritionPrompt } from "../prompts/nutrition-prompt";
import { NUTRIENT_KEYS, type BreakdownLine, type Ingredient, type NutrientTotals, type NutritionRecord } from "../types";
import type { NutritionSource } from "./types";

function toTotals(value: JsonRecord): NutrientTotals {
  const totals: NutrientTotals = { calories: 0, protein: 0, carbs: 0, fat: 0, fiber: 0, sugar: 0, sodium: 0 };
  for (const key of NUTRIENT_KEYS) {
    totals[key] = asNumber(value[key]) ?? 0;
  }
  return totals;
}

function toBreakdown(value: unknown): BreakdownLine[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter(isRecord).map((line) => {
    const notes = asString(line.notes);
    return {
      ingredient: asString(line.ingredient) ?? "",
      calories: asNumber(line.calories) ?? 0,
      protein: asNumber(line.protein) ?? 0,
      carbs: asNumber(line.carbs) ?? 0,
      fat: asNumber(line.fat) ?? 0,
      fiber: asNumber(line.fiber) ?? 0,
      ...(notes ? { notes } : {}),
    };
  });
}

/**
 * Maps a model nutrition response. total and per_serving are required;
 * per_serving is trusted as given, not re-derived from total.
 */
export function toNutritionRecord(data: JsonRecord, requestedServings: number): NutritionRecord {
  const rounded = roundNumericLeaves(data);
  if (!isRecord(rounded) || !isRecord(rounded.total) || !isRecord(rounded.per_serving)) {
    throw new IngestError("MODEL_RESPONSE_INVALID", "Invalid nutrition data format");
  }

  const servings = asNumber(rounded.servings);
  const detailedBreakdown = toBreakdown(rounded.detailed_breakdown);
  return {
    total: toTotals(rounded.total),
    perServing: toTotals(rounded.per_serving),
    servings: servings !== null && servings > 0 ? Math.round(servings) : requestedServings,
    ...(detailedBreakdown ? { detailedBreakdown } : {}),
  };
}

export class ModelNutritionCalculator implements NutritionSource {
  readonly name = "model";

  constructor(private readonly client: CompletionClient | null) {}

  async calculate(ingredients: Ingredient[], servings: number): Promise<NutritionRecord> {
    if (!this.client) {
      throw new IngestError(
        "CONFIG_ERROR",
        "A model API key is required for nutrition calculation. Set GOOGLE_AI_API_KEY or OPENAI_API_KEY, or NUTRITION_SOURCE=static."
      );
    }

    const raw = await this.client.complete({
      systemPrompt: NUTRITION_SYSTEM_PROMPT,
      userPrompt: buildNutritionPrompt(ingredients, servings),
      temperature: 0.2,
      maxTokens: 2500,
      json: true,
    });
    console.log(`[nutrition] Raw response: ${raw.slice(0, 500)}`);

    const record = toNutritionRecord(parseModelJson(raw, "nutrition"), servings);
    console.log(
      `[nutrition] ${record.total.calories} kcal total, ${record.perServing.calories} kcal per serving`
    );
    return record;
  }
}
