import { asNumber, asString, isRecord, round1, type JsonRecord } from "../coerce";
import { IngestError } from "../errors";
import { parseModelJson } from "../json-repair";
import type { CompletionClient } from "../llm-providers/types";
import { HEALTH_SYSTEM_PROMPT, buildHealthPrompt } from "../prompts/health-prompt";
import type { HealthRecord, NutritionRecord, ParsedRecipe } from "../types";
import { formatHealthBreakdown } from "./breakdown";
import { itemText } from "./item-text";

export const DEFAULT_HEALTH_SCORE = 7;
const MIN_SCORE = 1;
const MAX_SCORE = 10;

/** Clamped into [1, 10] and rounded to one decimal; missing or non-numeric → 7. */
export function clampScore(value: unknown): number {
  const parsed = asNumber(value);
  if (parsed === null) return DEFAULT_HEALTH_SCORE;
  return round1(Math.min(MAX_SCORE, Math.max(MIN_SCORE, parsed)));
}

function pointList(value: unknown, titleKey: string, bodyKey: string): string[] {
  if (!Array.isArray(value)) return [];
  const points: string[] = [];
  for (const item of value) {
    if (isRecord(item)) {
      const title = asString(item[titleKey]);
      const body = asString(item[bodyKey]);
      if (title && body) points.push(`${title}: ${body}`);
      else if (title || body) points.push(title ?? body ?? "");
    } else {
      const text = itemText(item, [bodyKey]);
      if (text) points.push(text);
    }
  }
  return points;
}

export function toHealthRecord(data: JsonRecord): HealthRecord {
  const score = clampScore(data.score);
  const reported = asNumber(data.score);
  if (reported !== null && reported !== score) {
    console.warn(`[health] Model score ${reported} adjusted to ${score}`);
  }
  return {
    score,
    breakdown: formatHealthBreakdown(data, score),
    healthyPoints: pointList(data.healthy_aspects, "title", "description"),
    watchPoints: pointList(data.watch_points, "ingredient", "concern"),
  };
}

export class HealthAnalyzer {
  constructor(private readonly client: CompletionClient | null) {}

  async analyze(recipe: ParsedRecipe, nutrition: NutritionRecord | null): Promise<HealthRecord> {
    if (!this.client) {
      throw new IngestError(
        "CONFIG_ERROR",
        "A model API key is required for health analysis. Set GOOGLE_AI_API_KEY or OPENAI_API_KEY."
      );
    }

    const raw = await this.client.complete({
      systemPrompt: HEALTH_SYSTEM_PROMPT,
      userPrompt: buildHealthPrompt(recipe, nutrition),
      temperature: 0.3,
      maxTokens: 2500,
      json: true,
    });

    const record = toHealthRecord(parseModelJson(raw, "health analysis"));
    console.log(`[health] Score ${record.score}/10 for "${recipe.title}"`);
    return record;
  }
}
