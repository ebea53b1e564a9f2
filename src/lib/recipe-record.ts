import { round1 } from "./coerce";
import type { Ingredient, IngestResult, NutritionRecord } from "./types";

/** Entity handed to the persistence layer. */
export interface RecipeRecord {
  title: string;
  rawText: string;
  ingredients: Ingredient[];
  instructions: string[];
  calories: number;
  healthRating: number;
  healthBreakdown: string;
  cuisineType: string | null;
  dietaryTags: string[];
  servings: number;
  nutritionData: NutritionRecord;
  imageUrl: string | null;
}

/** Document and metadata for the similarity index. */
export interface IndexEntry {
  document: string;
  metadata: {
    calories: number;
    health_rating: number;
    cuisine_type: string;
    dietary_tags: string;
  };
}

export function buildRecipeRecord(result: IngestResult): RecipeRecord {
  const { recipe, nutrition, health } = result;
  return {
    title: recipe.title,
    rawText: result.rawInput,
    ingredients: recipe.ingredients,
    instructions: recipe.instructions,
    calories: nutrition.perServing.calories,
    healthRating: round1(health.score),
    healthBreakdown: health.breakdown,
    cuisineType: recipe.cuisineType,
    dietaryTags: recipe.dietaryTags,
    servings: recipe.servings,
    nutritionData: nutrition,
    imageUrl: result.imageUrl,
  };
}

export function buildIndexEntry(record: RecipeRecord): IndexEntry {
  const ingredientNames = record.ingredients.map((i) => i.name).join(" ");
  const instructions = record.instructions.join(" ");
  return {
    document: `${record.title} ${ingredientNames} ${instructions}`,
    metadata: {
      calories: record.calories,
      health_rating: record.healthRating,
      cuisine_type: record.cuisineType ?? "",
      dietary_tags: JSON.stringify(record.dietaryTags),
    },
  };
}
