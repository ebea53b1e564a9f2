import { describe, expect, it, vi } from "vitest";
import { RecipeParser, toParsedRecipe } from "../src/lib/recipe-parser";
import { fakeClient, replying, thrown } from "./helpers/fake-client";

const RECIPE_TEXT = `Simple Pancakes
Ingredients:
- 1 cup flour
- 2 eggs
- 1/2 cup milk
Instructions:
1. Whisk the eggs and milk together.
2. Add the flour and stir until smooth.`;

const MODEL_RESPONSE = JSON.stringify({
  title: "Bhindi Fry",
  ingredients: [
    { name: "okra", quantity: "500", unit: "g" },
    { name: "salt", quantity: "as needed", unit: null },
    { quantity: "1" },
  ],
  instructions: ["Wash the okra.", "Fry until crisp."],
  servings: "3.4",
  cuisine_type: "Indian",
  dietary_tags: ["vegan", "Gluten-Free", "Spicy"],
});

describe("toParsedRecipe", () => {
  it("maps and cleans the model payload", () => {
    expect(toParsedRecipe(JSON.parse(MODEL_RESPONSE))).toEqual({
      title: "Bhindi Fry",
      ingredients: [
        { name: "okra", quantity: "500", unit: "g" },
        { name: "salt", quantity: "to taste", unit: null },
      ],
      instructions: ["Wash the okra.", "Fry until crisp."],
      servings: 3,
      cuisineType: "Indian",
      dietaryTags: ["Vegan", "Gluten-Free"],
    });
  });

  it("defaults the title and servings", () => {
    const recipe = toParsedRecipe({
      ingredients: [{ name: "rice" }],
      instructions: ["Boil."],
      servings: 0,
    });
    expect(recipe.title).toBe("Untitled Recipe");
    expect(recipe.servings).toBe(4);
  });

  it("rejects a payload without ingredients", () => {
    expect(thrown(() => toParsedRecipe({ ingredients: [], instructions: ["Boil."] }))).toMatchObject({
      code: "EXTRACTION_EMPTY",
      safeMessage: "Could not extract any ingredients from the recipe text",
    });
  });
});

describe("RecipeParser", () => {
  it("needs a model backend", async () => {
    await expect(new RecipeParser(null).parse(RECIPE_TEXT)).rejects.toMatchObject({ code: "CONFIG_ERROR" });
  });

  it("keeps configuration errors fatal in preserve mode", async () => {
    await expect(
      new RecipeParser(null).parse(RECIPE_TEXT, { preserveOriginal: true })
    ).rejects.toMatchObject({ code: "CONFIG_ERROR" });
  });

  it("sends the recipe text with JSON mode on", async () => {
    const client = replying(MODEL_RESPONSE);
    const recipe = await new RecipeParser(client).parse(RECIPE_TEXT);

    expect(recipe.title).toBe("Bhindi Fry");
    const request = client.complete.mock.calls[0][0];
    expect(request.temperature).toBe(0.3);
    expect(request.maxTokens).toBe(3000);
    expect(request.json).toBe(true);
    expect(request.userPrompt.endsWith(`Recipe text:\n${RECIPE_TEXT}`)).toBe(true);
    expect(request.userPrompt).toContain('return ONE "oil" entry with the quantities summed');
  });

  it("adds OCR guidance only for OCR text", async () => {
    const client = replying(MODEL_RESPONSE);
    const parser = new RecipeParser(client);

    await parser.parse(RECIPE_TEXT, { isOcrText: true });
    await parser.parse(RECIPE_TEXT);

    expect(client.complete.mock.calls[0][0].userPrompt).toContain(
      "NOTE: This text was produced by OCR and may contain character-confusion errors."
    );
    expect(client.complete.mock.calls[1][0].userPrompt).not.toContain("produced by OCR");
  });

  it("propagates a malformed response in standard mode", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    await expect(new RecipeParser(replying("not json at all")).parse(RECIPE_TEXT)).rejects.toMatchObject({
      code: "MODEL_RESPONSE_INVALID",
    });
  });

  it("wraps transport failures as upstream errors", async () => {
    const client = fakeClient({ complete: () => Promise.reject(new Error("socket hang up")) });
    const outcome = await new RecipeParser(client).tryParse(RECIPE_TEXT);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.code).toBe("UPSTREAM_ERROR");
      expect(outcome.error.safeMessage).toBe("socket hang up");
    }
  });

  it("falls back to the deterministic parser in preserve mode", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const client = fakeClient({ complete: () => Promise.reject(new Error("quota exceeded")) });

    const recipe = await new RecipeParser(client).parse(RECIPE_TEXT, { preserveOriginal: true });

    expect(recipe.title).toBe("Simple Pancakes");
    expect(recipe.ingredients.map((i) => i.name)).toEqual(["flour", "eggs", "milk"]);
    expect(recipe.instructions).toEqual([
      "Whisk the eggs and milk together.",
      "Add the flour and stir until smooth.",
    ]);
  });
});
