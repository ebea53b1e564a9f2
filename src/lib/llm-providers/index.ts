import { getModelSettings } from "../config";
import { createGeminiClient } from "./gemini";
import { createOpenAIClient } from "./openai";
import type { CompletionClient } from "./types";

/**
 * Builds the configured completion client, or null when the selected
 * provider has no API key. Callers that need a model turn null into a
 * CONFIG_ERROR; an unknown LLM_PROVIDER throws one right here.
 */
export function getCompletionClient(): CompletionClient | null {
  const settings = getModelSettings();
  const { apiKey } = settings;
  if (!apiKey) {
    console.warn(`[llm] No API key configured for provider "${settings.provider}"`);
    return null;
  }

  switch (settings.provider) {
    case "gemini":
      return createGeminiClient({ ...settings, apiKey });
    case "openai":
      return createOpenAIClient({ ...settings, apiKey });
  }
}
