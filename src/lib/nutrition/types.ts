import type { Ingredient, NutritionRecord } from "../types";

export interface NutritionSource {
  readonly name: string;
  calculate(ingredients: Ingredient[], servings: number): Promise<NutritionRecord>;
}
