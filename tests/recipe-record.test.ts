import { describe, expect, it } from "vitest";
import { buildIndexEntry, buildRecipeRecord } from "../src/lib/recipe-record";
import type { IngestResult } from "../src/lib/types";
import { HEALTH, NUTRITION, PARSED } from "./helpers/fixtures";

const RESULT: IngestResult = {
  source: "text",
  rawInput: "Dal\n1 cup lentils\n1 tbsp ghee\nRinse the lentils. Simmer until soft.",
  recipe: PARSED,
  nutrition: NUTRITION,
  health: HEALTH,
  imageUrl: null,
};

describe("buildRecipeRecord", () => {
  it("takes per-serving calories and a one-decimal rating", () => {
    const record = buildRecipeRecord(RESULT);

    expect(record).toEqual({
      title: "Parsed Title",
      rawText: RESULT.rawInput,
      ingredients: PARSED.ingredients,
      instructions: PARSED.instructions,
      calories: 250,
      healthRating: 7.9,
      healthBreakdown: HEALTH.breakdown,
      cuisineType: "Indian",
      dietaryTags: ["Vegetarian"],
      servings: 2,
      nutritionData: NUTRITION,
      imageUrl: null,
    });
  });
});

describe("buildIndexEntry", () => {
  it("joins title, ingredient names and steps", () => {
    const entry = buildIndexEntry(buildRecipeRecord(RESULT));

    expect(entry.document).toBe("Parsed Title lentils ghee Rinse the lentils. Simmer until soft.");
    expect(entry.metadata).toEqual({
      calories: 250,
      health_rating: 7.9,
      cuisine_type: "Indian",
      dietary_tags: '["Vegetarian"]',
    });
  });

  it("writes an empty cuisine when none was detected", () => {
    const entry = buildIndexEntry(buildRecipeRecord({ ...RESULT, recipe: { ...PARSED, cuisineType: null, dietaryTags: [] } }));
    expect(entry.metadata.cuisine_type).toBe("");
    expect(entry.metadata.dietary_tags).toBe("[]");
  });
});
