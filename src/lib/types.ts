export interface Ingredient {
  name: string;
  /** Free-form amount: "2", "1/2", "2-3", "to taste". Never "as needed". */
  quantity: string | null;
  unit: string | null;
}

export type CuisineType =
  | "Italian"
  | "Chinese"
  | "Indian"
  | "Mexican"
  | "Japanese"
  | "Thai"
  | "French"
  | "Mediterranean"
  | "American"
  | "Korean"
  | "Vietnamese"
  | "Greek"
  | "Spanish"
  | "Middle Eastern"
  | "African";

export const CUISINE_TYPES: readonly CuisineType[] = [
  "Italian",
  "Chinese",
  "Indian",
  "Mexican",
  "Japanese",
  "Thai",
  "French",
  "Mediterranean",
  "American",
  "Korean",
  "Vietnamese",
  "Greek",
  "Spanish",
  "Middle Eastern",
  "African",
];

export type DietaryTag =
  | "Vegetarian"
  | "Vegan"
  | "Gluten-Free"
  | "Dairy-Free"
  | "Keto"
  | "Paleo"
  | "Low-Carb"
  | "High-Protein"
  | "Nut-Free"
  | "Egg-Free"
  | "Sugar-Free"
  | "Low-Sodium"
  | "Pescatarian";

export const DIETARY_TAGS: readonly DietaryTag[] = [
  "Vegetarian",
  "Vegan",
  "Gluten-Free",
  "Dairy-Free",
  "Keto",
  "Paleo",
  "Low-Carb",
  "High-Protein",
  "Nut-Free",
  "Egg-Free",
  "Sugar-Free",
  "Low-Sodium",
  "Pescatarian",
];

export interface ParsedRecipe {
  title: string;
  ingredients: Ingredient[];
  instructions: string[];
  servings: number;
  cuisineType: string | null;
  dietaryTags: string[];
}

export interface NutrientTotals {
  calories: number;
  protein: number;
  carbs: number;
  fat: number;
  fiber: number;
  sugar: number;
  sodium: number;
}

export const NUTRIENT_KEYS: readonly (keyof NutrientTotals)[] = [
  "calories",
  "protein",
  "carbs",
  "fat",
  "fiber",
  "sugar",
  "sodium",
];

export interface BreakdownLine {
  ingredient: string;
  calories: number;
  protein: number;
  carbs: number;
  fat: number;
  fiber: number;
  notes?: string;
}

export interface NutritionRecord {
  total: NutrientTotals;
  perServing: NutrientTotals;
  servings: number;
  detailedBreakdown?: BreakdownLine[];
  /** Set when the figures come from the static reference tables. */
  estimated?: boolean;
}

export interface HealthRecord {
  score: number;
  breakdown: string;
  healthyPoints: string[];
  watchPoints: string[];
}

export interface StructuredRecipeData {
  title: string | null;
  ingredients: string[];
  instructions: string[];
  servings: string | null;
  nutrition: Record<string, string> | null;
}

export interface ScrapedPage {
  url: string;
  text: string;
  imageUrl: string | null;
  structuredData: StructuredRecipeData | null;
}

export type VideoPlatform = "youtube" | "instagram" | "tiktok" | "facebook" | "vimeo" | "other";

export interface VideoExtraction {
  platform: VideoPlatform;
  title: string;
  author: string;
  url: string;
  thumbnail: string;
  duration: number;
  description: string;
  transcript: string | null;
  fullText: string;
  recipeText: string;
}

export type SourceKind = "text" | "url" | "video" | "image";

export interface NormalizedSource {
  kind: SourceKind;
  text: string;
  titleHint: string | null;
  imageUrl: string | null;
  platform?: VideoPlatform;
}

export interface IngestOptions {
  preserveOriginal?: boolean;
  /** The text came out of an OCR pass and may carry character-confusion errors. */
  isOcrText?: boolean;
  title?: string;
  cuisineType?: string;
  dietaryTags?: string[];
}

export interface IngestResult {
  source: SourceKind;
  rawInput: string;
  recipe: ParsedRecipe;
  nutrition: NutritionRecord;
  health: HealthRecord;
  imageUrl: string | null;
}
