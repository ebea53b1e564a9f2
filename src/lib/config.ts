import { IngestError } from "./errors";

export const VALID_PROVIDERS = ["gemini", "openai"] as const;
export type ProviderName = (typeof VALID_PROVIDERS)[number];

export const NUTRITION_SOURCES = ["model", "static"] as const;
export type NutritionSourceName = (typeof NUTRITION_SOURCES)[number];

export const TIMEOUTS = {
  pageFetchMs: 10_000,
  videoMetadataMs: 10_000,
  transcriptMs: 15_000,
  imageSearchMs: 5_000,
  modelMs: 30_000,
} as const;

export const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36";

function isProviderName(value: string): value is ProviderName {
  return VALID_PROVIDERS.some((p) => p === value);
}

function isNutritionSourceName(value: string): value is NutritionSourceName {
  return NUTRITION_SOURCES.some((s) => s === value);
}

export function getProviderName(): ProviderName {
  const raw = process.env.LLM_PROVIDER?.toLowerCase().trim() || "gemini";
  if (isProviderName(raw)) {
    return raw;
  }
  throw new IngestError(
    "CONFIG_ERROR",
    `Invalid LLM_PROVIDER="${raw}". Must be one of: ${VALID_PROVIDERS.join(", ")}`
  );
}

export interface ModelSettings {
  provider: ProviderName;
  apiKey: string | null;
  model: string;
  visionModel: string;
  timeoutMs: number;
}

function parseTimeout(raw: string | undefined): number {
  const parsed = raw ? Number.parseInt(raw, 10) : NaN;
  return Number.isFinite(parsed) && parsed > 0 ? parsed : TIMEOUTS.modelMs;
}

export function getModelSettings(): ModelSettings {
  const provider = getProviderName();
  const timeoutMs = parseTimeout(process.env.MODEL_TIMEOUT_MS);

  if (provider === "gemini") {
    const model = process.env.GEMINI_MODEL || "gemini-2.5-flash";
    return {
      provider,
      apiKey: process.env.GOOGLE_AI_API_KEY || process.env.GEMINI_API_KEY || null,
      model,
      visionModel: process.env.GEMINI_VISION_MODEL || model,
      timeoutMs,
    };
  }

  const model = process.env.OPENAI_MODEL || "gpt-4o-mini";
  return {
    provider,
    apiKey: process.env.OPENAI_API_KEY || null,
    model,
    visionModel: process.env.OPENAI_VISION_MODEL || model,
    timeoutMs,
  };
}

export function getNutritionSourceName(): NutritionSourceName {
  const raw = process.env.NUTRITION_SOURCE?.toLowerCase().trim() || "model";
  if (isNutritionSourceName(raw)) {
    return raw;
  }
  throw new IngestError(
    "CONFIG_ERROR",
    `Invalid NUTRITION_SOURCE="${raw}". Must be one of: ${NUTRITION_SOURCES.join(", ")}`
  );
}

export function getSerpApiKey(): string | null {
  return process.env.SERPAPI_KEY || null;
}

export function getPexelsApiKey(): string | null {
  return process.env.PEXELS_API_KEY || null;
}
