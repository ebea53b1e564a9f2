import type { HealthRecord, NutritionRecord, ParsedRecipe } from "../../src/lib/types";

export const PARSED: ParsedRecipe = {
  title: "Parsed Title",
  ingredients: [
    { name: "lentils", quantity: "1", unit: "cup" },
    { name: "ghee", quantity: "1", unit: "tbsp" },
  ],
  instructions: ["Rinse the lentils.", "Simmer until soft."],
  servings: 2,
  cuisineType: "Indian",
  dietaryTags: ["Vegetarian"],
};

export const NUTRITION: NutritionRecord = {
  total: { calories: 500, protein: 24, carbs: 60, fat: 14, fiber: 16, sugar: 2, sodium: 300 },
  perServing: { calories: 250, protein: 12, carbs: 30, fat: 7, fiber: 8, sugar: 1, sodium: 150 },
  servings: 2,
};

export const HEALTH: HealthRecord = {
  score: 7.86,
  breakdown: "**Health Score: 7.86/10**\n\n",
  healthyPoints: ["Fiber: Lentils add fiber."],
  watchPoints: [],
};
