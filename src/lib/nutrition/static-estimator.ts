import estimates from "../../data/nutrition-estimates.json";
import { round1 } from "../coerce";
import type { Ingredient, NutrientTotals, NutritionRecord } from "../types";
import { NUTRIENT_KEYS } from "../types";
import type { NutritionSource } from "./types";

interface IngredientClass {
  name: string;
  keywords: string[];
  calorieShares: { protein: number; carbs: number; fat: number };
  fiberOfCarbs: number;
  sugarOfCarbs: number;
}

const CALORIES_PER_GRAM = { protein: 4, carbs: 4, fat: 9 } as const;

const CALORIE_TABLE: ReadonlyArray<[keyword: string, calories: number]> = estimates.calories.flatMap(
  ([keyword, calories]): Array<[string, number]> =>
    typeof keyword === "string" && typeof calories === "number" ? [[keyword, calories]] : []
);

const UNIT_MULTIPLIERS = new Map<string, number>(Object.entries(estimates.unitMultipliers));
const CLASSES: readonly IngredientClass[] = estimates.classes;
const OTHER_CLASS: IngredientClass = estimates.otherShares;

function emptyTotals(): NutrientTotals {
  return { calories: 0, protein: 0, carbs: 0, fat: 0, fiber: 0, sugar: 0, sodium: 0 };
}

/** "bhindi (okra)" → "okra"; otherwise the name itself, lower-cased. */
export function lookupName(name: string): string {
  const gloss = name.match(/\(([^)]+)\)/);
  return (gloss ? gloss[1] : name).trim().toLowerCase();
}

/** Fractions, mixed numbers and ranges (midpoint). Unparseable amounts count as 1. */
export function parseQuantity(quantity: string | null): number {
  if (!quantity) return 1;
  const text = quantity.trim();

  const mixed = text.match(/^(\d+)\s+(\d+)\/(\d+)$/);
  if (mixed && Number(mixed[3])) return Number(mixed[1]) + Number(mixed[2]) / Number(mixed[3]);

  const fraction = text.match(/^(\d+(?:\.\d+)?)\/(\d+(?:\.\d+)?)$/);
  if (fraction && Number(fraction[2])) return Number(fraction[1]) / Number(fraction[2]);

  const range = text.match(/^(\d+(?:\.\d+)?)\s*-\s*(\d+(?:\.\d+)?)$/);
  if (range) return (Number(range[1]) + Number(range[2])) / 2;

  const value = Number(text);
  return Number.isFinite(value) && text !== "" ? value : 1;
}

export function estimateIngredient(ingredient: Ingredient): NutrientTotals {
  const name = lookupName(ingredient.name);
  const quantity = parseQuantity(ingredient.quantity);
  const multiplier = UNIT_MULTIPLIERS.get((ingredient.unit ?? "").toLowerCase()) ?? 1;

  const baseCalories = CALORIE_TABLE.find(([keyword]) => name.includes(keyword))?.[1] ?? estimates.defaultCalories;
  const calories = baseCalories * quantity * multiplier;

  const cls = CLASSES.find((c) => c.keywords.some((keyword) => name.includes(keyword))) ?? OTHER_CLASS;
  const carbs = (calories * cls.calorieShares.carbs) / CALORIES_PER_GRAM.carbs;
  const isSweet = estimates.sweetKeywords.some((keyword) => name.includes(keyword));

  return {
    calories,
    protein: (calories * cls.calorieShares.protein) / CALORIES_PER_GRAM.protein,
    carbs,
    fat: (calories * cls.calorieShares.fat) / CALORIES_PER_GRAM.fat,
    fiber: carbs * cls.fiberOfCarbs,
    sugar: carbs * cls.sugarOfCarbs,
    sodium: isSweet ? 0 : quantity * multiplier * estimates.sodiumPerUnit,
  };
}

/**
 * Deterministic estimate from reference tables. per-serving is derived as
 * total / servings; both are rounded to one decimal.
 */
export class StaticNutritionEstimator implements NutritionSource {
  readonly name = "static";

  async calculate(ingredients: Ingredient[], servings: number): Promise<NutritionRecord> {
    const safeServings = servings > 0 ? servings : 1;
    const total = emptyTotals();
    for (const ingredient of ingredients) {
      const estimate = estimateIngredient(ingredient);
      for (const key of NUTRIENT_KEYS) {
        total[key] += estimate[key];
      }
    }

    const roundedTotal = emptyTotals();
    const perServing = emptyTotals();
    for (const key of NUTRIENT_KEYS) {
      roundedTotal[key] = round1(total[key]);
      perServing[key] = round1(total[key] / safeServings);
    }

    return { total: roundedTotal, perServing, servings: safeServings, estimated: true };
  }
}
