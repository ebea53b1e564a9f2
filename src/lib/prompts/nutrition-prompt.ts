import type { Ingredient } from "../types";

export const NUTRITION_SYSTEM_PROMPT =
  "You are a professional nutritionist with expertise in calculating accurate nutritional values for recipes.";

const REFERENCE_TABLES = `REFERENCE VALUES (per 100g or as specified):
Common Vegetables:
- Okra/Bhindi: 33 cal, 1.9g protein, 7.5g carbs, 0.2g fat, 3.2g fiber
- Onion: 40 cal, 1.1g protein, 9.3g carbs, 0.1g fat
- Tomato: 18 cal, 0.9g protein, 3.9g carbs, 0.2g fat
- Spinach: 23 cal, 2.9g protein, 3.6g carbs, 0.4g fat

Oils & Fats (per tablespoon/15ml):
- Vegetable oil: 120 cal, 0g protein, 0g carbs, 14g fat
- Ghee: 112 cal, 0g protein, 0g carbs, 12.7g fat
- Butter: 102 cal, 0.1g protein, 0g carbs, 11.5g fat

Nuts & Seeds (per ounce/28g):
- Peanuts: 161 cal, 7.3g protein, 4.6g carbs, 14g fat
- Cashews: 157 cal, 5.2g protein, 8.6g carbs, 12.4g fat
- Almonds: 164 cal, 6g protein, 6.1g carbs, 14.2g fat

Grains & Legumes (per 100g cooked):
- Rice (white): 130 cal, 2.7g protein, 28.2g carbs, 0.3g fat
- Wheat flour: 364 cal, 10.3g protein, 76.3g carbs, 1g fat
- Lentils (cooked): 116 cal, 9g protein, 20.1g carbs, 0.4g fat

REGIONAL INGREDIENT CONVERSIONS:
- Bhindi = Okra
- Hing = Asafoetida (negligible calories in typical amounts)
- Haldi = Turmeric (9 cal per tsp)
- Jeera = Cumin (8 cal per tsp)
- Dhania = Coriander (5 cal per tsp)
- Rai/Sarson = Mustard seeds (20 cal per tsp)`;

function ingredientLine(ingredient: Ingredient): string {
  return `- ${[ingredient.quantity ?? "1", ingredient.unit ?? "", ingredient.name].filter(Boolean).join(" ")}`;
}

export function buildNutritionPrompt(ingredients: Ingredient[], servings: number): string {
  return `You are a professional nutritionist. Calculate the detailed nutritional information for this recipe.

Ingredients:
${ingredients.map(ingredientLine).join("\n")}

Servings: ${servings}

Return ONLY valid JSON without any markdown formatting, code blocks, or explanations.
Provide the analysis in this EXACT JSON format:
{
  "total": { "calories": 850, "protein": 45, "carbs": 95, "fat": 35, "fiber": 18, "sugar": 12, "sodium": 1200 },
  "per_serving": { "calories": 213, "protein": 11.3, "carbs": 23.8, "fat": 8.8, "fiber": 4.5, "sugar": 3, "sodium": 300 },
  "servings": ${servings},
  "detailed_breakdown": [
    { "ingredient": "2 lbs bhindi (okra)", "calories": 60, "protein": 4, "carbs": 14, "fat": 0.4, "fiber": 6, "notes": "Rich in vitamins C, K, and folate" },
    { "ingredient": "3 tbsp oil", "calories": 360, "protein": 0, "carbs": 0, "fat": 42, "fiber": 0, "notes": "High in calories but provides essential fatty acids" }
  ]
}

CALORIE CALCULATION METHOD:
- Use USDA FoodData Central and regional food composition tables as reference
- Calculate based on: Calories = (Protein × 4) + (Carbs × 4) + (Fat × 9) + (Alcohol × 7)
- Account for cooking losses: oil absorption in frying (~10-25%), water loss in roasting (~20-30%)
- per_serving is total divided by servings
- sodium is in milligrams; every other nutrient except calories is in grams

${REFERENCE_TABLES}

COOKING METHOD ADJUSTMENTS:
- Deep frying: add 5-10% of oil weight absorbed
- Shallow frying: add 3-5% of oil used
- Air frying: add only oil directly used (minimal absorption)
- Roasting: reduce weight by 20-30% for water loss

For each ingredient in detailed_breakdown, note the calculation basis, the quantities used and any cooking adjustment.

CRITICAL: Return ONLY valid JSON, no additional text outside the JSON structure.
`;
}
