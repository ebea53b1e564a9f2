import type { NutritionRecord, ParsedRecipe } from "../types";

export const HEALTH_SYSTEM_PROMPT =
  "You are a professional nutritionist who understands the health benefits of both Western and regional cuisines.";

const RESPONSE_SHAPE = `{
  "score": 7.5,
  "summary": "Comprehensive 2-3 sentence summary of overall healthiness, nutritional balance, and suitability for common dietary goals",
  "healthy_aspects": [
    { "title": "Bhindi (Okra)", "description": "Low in calories (33 cal/100g), high in fiber (3.2g/100g), vitamin C and folate" },
    { "title": "Air Frying Method", "description": "Reduces oil absorption by 70-80% compared to deep frying" }
  ],
  "watch_points": [
    { "ingredient": "Oil (2 tbsp)", "concern": "Adds ~240 calories and 28g fat" }
  ],
  "nutritional_highlights": {
    "vitamins": ["Vitamin C: 38% DV", "Vitamin K: 45% DV", "Folate: 22% DV", "Vitamin A: 15% DV"],
    "minerals": ["Potassium: 12% DV", "Magnesium: 18% DV", "Calcium: 8% DV", "Iron: 10% DV"],
    "macros": {
      "protein_quality": "Moderate - plant proteins from nuts and legumes",
      "carb_quality": "Good - primarily complex carbs with 7.8g fiber per serving",
      "fat_quality": "Good - mix of monounsaturated and polyunsaturated fats"
    },
    "special_compounds": [
      "Curcumin from turmeric - anti-inflammatory",
      "Capsaicin from chili - boosts metabolism"
    ]
  },
  "dietary_considerations": {
    "suitable_for": ["Vegetarian", "Vegan", "Gluten-Free"],
    "may_not_suit": ["Nut Allergies", "Low-Fat Diets"],
    "modifications_for_conditions": {
      "diabetes": "Good choice - okra helps regulate blood sugar",
      "heart_disease": "Use a heart-healthy oil like olive oil",
      "weight_loss": "Reduce oil to 1 tbsp to cut 120 calories",
      "high_cholesterol": "Okra's soluble fiber helps lower LDL cholesterol"
    }
  },
  "improvement_tips": [
    "Reduce oil to 1 tablespoon to cut 120 calories while maintaining flavor",
    "Add 1 cup cooked quinoa or brown rice for complete protein"
  ],
  "meal_pairing_suggestions": [
    "Pair with whole wheat roti for a balanced meal",
    "Serve with dal (lentil curry) for complementary proteins"
  ]
}`;

function value(n: number | undefined, unit = ""): string {
  return n === undefined ? "unknown" : `${n}${unit}`;
}

export function buildHealthPrompt(recipe: ParsedRecipe, nutrition: NutritionRecord | null): string {
  const ingredients = recipe.ingredients
    .map((ing) => `- ${[ing.quantity, ing.unit, ing.name].filter(Boolean).join(" ")}`)
    .join("\n");
  const instructions = recipe.instructions.map((step, i) => `${i + 1}. ${step}`).join("\n");
  const per = nutrition?.perServing;

  return `You are a professional nutritionist analyzing a recipe. Provide a detailed health analysis.

Recipe Ingredients:
${ingredients}

Cooking Instructions:
${instructions}

Per serving nutrition:
- Calories: ${value(per?.calories)}
- Protein: ${value(per?.protein, "g")}
- Carbs: ${value(per?.carbs, "g")}
- Fat: ${value(per?.fat, "g")}
- Fiber: ${value(per?.fiber, "g")}
- Sodium: ${value(per?.sodium, "mg")}

Return ONLY valid JSON without any markdown formatting, code blocks, or explanations.
Provide a health analysis with this EXACT JSON structure:
${RESPONSE_SHAPE}

Important guidelines:
- score is a number from 1 to 10; decimals like 7.5 are allowed
- Scores: 8-10 = very healthy, 6-8 = healthy with minor concerns, 4-6 = moderate, below 4 = needs improvement
- Score should reflect vegetable content, oil usage, cooking method and nutritional balance
- Account for cooking methods (air frying > deep frying)
- Be specific about calorie counts when mentioning oil or nuts
- Recognize healthy spices and their benefits (turmeric = anti-inflammatory, hing = digestive)
- CRITICAL: improvement_tips MUST be an array of plain strings, NOT objects
- CRITICAL: meal_pairing_suggestions MUST be an array of plain strings, NOT objects
- CRITICAL: Return ONLY valid JSON, no additional text outside the JSON structure
`;
}
