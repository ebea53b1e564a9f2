/**
 * Prompt protocols for turning a text blob into the canonical recipe JSON.
 */

import { CUISINE_TYPES, DIETARY_TAGS } from "../types";

export const RECIPE_PARSER_SYSTEM_PROMPT =
  "You are a helpful recipe parser that extracts structured data from recipe text.";

const RESPONSE_SHAPE = `{
  "title": "Recipe title",
  "ingredients": [
    { "name": "ingredient name", "quantity": "2", "unit": "cups" },
    { "name": "salt", "quantity": "to taste", "unit": null }
  ],
  "instructions": [
    "Step 1 instruction",
    "Step 2 instruction"
  ],
  "servings": 4,
  "cuisine_type": "Italian",
  "dietary_tags": ["Vegetarian", "Gluten-Free"]
}`;

const QUANTITY_RULES = `Rules for ingredient quantities:
- Quantity is always a string: "2", "1/2", "2-3" or "to taste"
- Convert vague amounts to a concrete measure ("a handful" → "1/4 cup", "a splash" → "1 tablespoon")
- When no quantity is given, estimate a reasonable one for the dish
- NEVER use "as needed" as a quantity
- Combine duplicate ingredients: if oil is mentioned twice ("2 tbsp oil" and "1 tbsp oil"), return ONE "oil" entry with the quantities summed ("3", "tbsp")
- Default servings to 4 if not specified`;

const OCR_GUIDANCE = `NOTE: This text was produced by OCR and may contain character-confusion errors.
- Correct them from context: 0 ↔ O, 1 ↔ l ↔ I, 5 ↔ S, 8 ↔ B, rn ↔ m
- "l cup" means "1 cup", "O.5 tsp" means "0.5 tsp", "5alt" means "salt"
- Ignore stray symbols and broken line wraps introduced by scanning
`;

const TRANSLATIONS = [
  ['"bhindi"', '"bhindi (okra)"'],
  ['"hing"', '"hing (asafoetida)"'],
  ['"kadi patta" or "curry patta"', '"curry leaves"'],
  ['"urad dal", "udit dal" or "urad daal"', '"urad dal (split black gram)"'],
  ['"khadi mirchi", "red mirchi" or "lal mirchi"', '"red chili peppers (dried)"'],
  ['"hari mirchi" or "green mirchi"', '"green chili peppers"'],
  ['"jeera"', '"jeera (cumin seeds)"'],
  ['"haldi"', '"haldi (turmeric powder)"'],
  ['"dhania"', '"dhania (coriander)"'],
  ['"methi"', '"methi (fenugreek)"'],
  ['"garam masala"', '"garam masala (Indian spice blend)"'],
  ['"chana dal"', '"chana dal (split chickpeas)"'],
  ['"moong dal"', '"moong dal (split mung beans)"'],
] as const;

const DIETARY_RULES: Record<(typeof DIETARY_TAGS)[number], string> = {
  Vegetarian: "No meat, poultry, or fish (eggs and dairy OK)",
  Vegan: "No animal products at all (no meat, dairy, eggs, honey)",
  "Gluten-Free": "No wheat, barley, rye, or their derivatives",
  "Dairy-Free": "No milk, cheese, butter, yogurt, cream",
  Keto: "Very low carb (no grains, sugar, most fruits), high fat",
  Paleo: "No grains, legumes, dairy, refined sugar",
  "Low-Carb": "Limited bread, pasta, rice, sugar",
  "High-Protein": "Emphasizes meat, eggs, legumes, protein sources",
  "Nut-Free": "No tree nuts or peanuts",
  "Egg-Free": "No eggs or egg products",
  "Sugar-Free": "No added sugars or sweeteners",
  "Low-Sodium": "Minimal salt, no high-sodium ingredients",
  Pescatarian: "Vegetarian plus fish/seafood",
};

function standardPrompt(): string {
  const translations = TRANSLATIONS.map(([from, to]) => `  * ${from} → ${to}`).join("\n");
  const dietary = DIETARY_TAGS.map((tag) => `- ${tag}: ${DIETARY_RULES[tag]}`).join("\n");

  return `You are a recipe parser. Extract the recipe information from the following text.

The recipe might have ingredients and instructions mixed together (like "Add 2 cups flour")
or separated into sections. Handle both formats.

Return ONLY a valid JSON object with this exact structure:
${RESPONSE_SHAPE}

Rules for ingredients:
- Extract ALL ingredients mentioned, even if mixed within instructions
- Clean ingredient names (remove preparation notes like "chopped", "diced")
- Each ingredient has exactly the keys "name", "quantity" and "unit"

${QUANTITY_RULES}

Rules for regional ingredient names:
- Keep the original name first, then the English translation in parentheses
- Use lowercase for ingredient names (except proper nouns)
- If the ingredient is already in English, don't add a translation
- ALWAYS apply these translations:
${translations}

Rules for instructions:
- Rephrase instructions as clear, professional cooking steps
- Keep the same meaning but improve grammar and flow
- Use standard cooking terminology
- Do not number the steps; one step per array entry
- Example: "Add and mix 1 tbsp oil with Bhindi" → "Toss the okra with 1 tablespoon of oil until well coated"

Rules for cuisine_type:
- Choose ONE from: ${CUISINE_TYPES.join(", ")}
- Base it on ingredients, cooking methods and the dish name
- If uncertain or fusion, choose the most dominant influence

Rules for dietary_tags:
- Decide from what the ingredients contain, not just from missing keywords
- Include ALL tags that apply; several usually do
${dietary}
- Example: a salad with just vegetables → ["Vegetarian", "Vegan", "Gluten-Free", "Dairy-Free", "Nut-Free", "Egg-Free", "Low-Carb"]
- Example: grilled chicken with vegetables → ["Gluten-Free", "Dairy-Free", "Low-Carb", "High-Protein"]

Return ONLY valid JSON. No markdown, code blocks, explanations, or extra text.
`;
}

function preservePrompt(): string {
  return `You are a recipe parser. Extract the recipe from the following text WITHOUT rewording it.

Return ONLY a valid JSON object with this exact structure:
${RESPONSE_SHAPE}

Rules for instructions:
- Copy each instruction EXACTLY as written; do not rephrase, summarize, merge or split steps
- Remove only leading step numbers ("1.", "Step 2:") and bullet characters
- Keep the original order

Rules for ingredients:
- Keep ingredient names as written, minus bullet characters
- Each ingredient has exactly the keys "name", "quantity" and "unit"

${QUANTITY_RULES}

Rules for title, cuisine_type and dietary_tags:
- Use the title as written in the text; if there is none, write a short descriptive one
- cuisine_type is ONE of: ${CUISINE_TYPES.join(", ")}
- dietary_tags are any of: ${DIETARY_TAGS.join(", ")}

Return ONLY valid JSON. No markdown, code blocks, explanations, or extra text.
`;
}

export interface RecipePromptOptions {
  isOcrText: boolean;
  preserveOriginal: boolean;
}

export function buildRecipePrompt(text: string, options: RecipePromptOptions): string {
  const protocol = options.preserveOriginal ? preservePrompt() : standardPrompt();
  const ocr = options.isOcrText ? `\n${OCR_GUIDANCE}` : "";
  return `${protocol}${ocr}\nRecipe text:\n${text}`;
}
