import { afterEach, describe, expect, it, vi } from "vitest";
import { getModelSettings, getNutritionSourceName, getProviderName } from "../src/lib/config";
import { fetchWithTimeout } from "../src/lib/http";
import { toProviderError } from "../src/lib/llm-providers/errors";
import { thrown } from "./helpers/fake-client";

afterEach(() => {
  vi.unstubAllEnvs();
  vi.unstubAllGlobals();
});

describe("config", () => {
  it("defaults to gemini with the Google key", () => {
    vi.stubEnv("LLM_PROVIDER", "");
    vi.stubEnv("GOOGLE_AI_API_KEY", "test-key");
    vi.stubEnv("GEMINI_MODEL", "");
    vi.stubEnv("GEMINI_VISION_MODEL", "");
    vi.stubEnv("MODEL_TIMEOUT_MS", "");

    expect(getModelSettings()).toEqual({
      provider: "gemini",
      apiKey: "test-key",
      model: "gemini-2.5-flash",
      visionModel: "gemini-2.5-flash",
      timeoutMs: 30_000,
    });
  });

  it("reads the OpenAI settings", () => {
    vi.stubEnv("LLM_PROVIDER", " OpenAI ");
    vi.stubEnv("OPENAI_API_KEY", "");
    vi.stubEnv("OPENAI_MODEL", "gpt-4o");
    vi.stubEnv("OPENAI_VISION_MODEL", "");
    vi.stubEnv("MODEL_TIMEOUT_MS", "5000");

    expect(getModelSettings()).toEqual({
      provider: "openai",
      apiKey: null,
      model: "gpt-4o",
      visionModel: "gpt-4o",
      timeoutMs: 5000,
    });
  });

  it("rejects an unknown provider", () => {
    vi.stubEnv("LLM_PROVIDER", "claude");

    expect(thrown(() => getProviderName())).toMatchObject({
      code: "CONFIG_ERROR",
      safeMessage: 'Invalid LLM_PROVIDER="claude". Must be one of: gemini, openai',
    });
  });

  it("validates the nutrition source", () => {
    vi.stubEnv("NUTRITION_SOURCE", "STATIC");
    expect(getNutritionSourceName()).toBe("static");

    vi.stubEnv("NUTRITION_SOURCE", "usda");
    expect(thrown(() => getNutritionSourceName())).toMatchObject({ code: "CONFIG_ERROR" });
  });
});

describe("fetchWithTimeout", () => {
  it("maps an expired deadline to TIMEOUT", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" });
      })
    );

    await expect(fetchWithTimeout("https://example.com/recipe", { timeoutMs: 10_000 })).rejects.toMatchObject({
      code: "TIMEOUT",
      safeMessage: "Request to example.com timed out after 10s",
    });
  });

  it("maps other transport failures to FETCH_ERROR", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      })
    );

    await expect(fetchWithTimeout("https://example.com/recipe", { timeoutMs: 1000 })).rejects.toMatchObject({
      code: "FETCH_ERROR",
      safeMessage: "fetch failed",
    });
  });
});

describe("toProviderError", () => {
  it("classifies timeouts and other failures", () => {
    expect(toProviderError("gemini", new Error("Request timed out"), 30_000)).toMatchObject({
      code: "TIMEOUT",
      safeMessage: "The gemini model did not respond within 30s",
    });
    expect(toProviderError("openai", new Error("429 Too Many Requests"), 30_000)).toMatchObject({
      code: "UPSTREAM_ERROR",
      safeMessage: "The openai model request failed: 429 Too Many Requests",
    });
  });
});
