import { IngestError, errorMessage } from "../errors";
import type { CompletionClient } from "../llm-providers/types";
import { buildEnhanceUserPrompt, enhanceSystemPrompt } from "../prompts/ocr-prompt";
import type { OcrEngine } from "./engine";
import { SharpPreprocessor, type ImageInfo, type ImagePreprocessor, type VariantName } from "./preprocess";

export const MIN_IMAGE_SIDE = 200;
export const MAX_IMAGE_SIDE = 4000;
export const MAX_IMAGE_BYTES = 10 * 1024 * 1024;

export interface OcrResult {
  text: string;
  variant: VariantName;
  enhanced: boolean;
}

export interface OcrServiceDeps {
  engine: OcrEngine;
  client: CompletionClient | null;
  preprocessor?: ImagePreprocessor;
}

/** Section-labelling cleanup used when model enhancement is unavailable. */
export function basicTextCleanup(text: string): string {
  const lines = text
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);

  const out: string[] = [];
  let section: "ingredients" | "instructions" | null = null;

  for (const line of lines) {
    const lower = line.toLowerCase();
    if (["ingredient", "material", "item"].some((k) => lower.includes(k))) {
      section = "ingredients";
      out.push("\nIngredients:");
    } else if (["instruction", "direction", "method", "step"].some((k) => lower.includes(k))) {
      section = "instructions";
      out.push("\nInstructions:");
    } else if (["serve", "serving", "yield", "make"].some((k) => lower.includes(k))) {
      out.push(`\n${line}`);
      section = null;
    } else if (section === "ingredients" && !line.endsWith(":")) {
      out.push(`- ${line}`);
    } else if (section === "instructions" && !line.endsWith(":")) {
      out.push(/^[\d•\-*]/.test(line) ? line : `- ${line}`);
    } else {
      out.push(line);
    }
  }
  return out.join("\n");
}

export class OcrService {
  private readonly engine: OcrEngine;
  private readonly client: CompletionClient | null;
  private readonly preprocessor: ImagePreprocessor;

  constructor(deps: OcrServiceDeps) {
    this.engine = deps.engine;
    this.client = deps.client;
    this.preprocessor = deps.preprocessor ?? new SharpPreprocessor();
  }

  async validate(image: Buffer): Promise<ImageInfo> {
    if (image.length > MAX_IMAGE_BYTES) {
      throw new IngestError("VALIDATION_ERROR", "Image file is too large. Maximum file size is 10MB.");
    }

    let info: ImageInfo;
    try {
      info = await this.preprocessor.inspect(image);
    } catch (error) {
      throw new IngestError("VALIDATION_ERROR", `Invalid image file: ${errorMessage(error)}`, error);
    }

    if (info.width < MIN_IMAGE_SIDE || info.height < MIN_IMAGE_SIDE) {
      throw new IngestError(
        "VALIDATION_ERROR",
        `Image is too small. Minimum size is ${MIN_IMAGE_SIDE}x${MIN_IMAGE_SIDE} pixels.`
      );
    }
    if (info.width > MAX_IMAGE_SIDE || info.height > MAX_IMAGE_SIDE) {
      throw new IngestError(
        "VALIDATION_ERROR",
        `Image is too large. Maximum size is ${MAX_IMAGE_SIDE}x${MAX_IMAGE_SIDE} pixels.`
      );
    }
    return info;
  }

  /**
   * Runs OCR over every preprocessing variant and keeps the one with the most
   * characters (first wins ties). A variant whose OCR call fails counts as
   * empty; if all of them fail, the last failure is rethrown.
   */
  private async bestVariantText(image: Buffer): Promise<{ text: string; variant: VariantName }> {
    const variants = await this.preprocessor.variants(image);
    let best: { text: string; variant: VariantName } | null = null;
    let lastError: unknown = null;
    let failures = 0;

    for (const variant of variants) {
      let text: string;
      try {
        text = (await this.engine.recognize({ data: variant.data, mimeType: variant.mimeType })).trim();
      } catch (error) {
        failures++;
        lastError = error;
        console.warn(`[ocr] ${variant.name} variant failed: ${errorMessage(error)}`);
        continue;
      }
      console.log(`[ocr] ${variant.name} variant produced ${text.length} chars`);
      if (!best || text.length > best.text.length) {
        best = { text, variant: variant.name };
      }
    }

    if (failures === variants.length && lastError !== null) {
      throw lastError;
    }
    return best ?? { text: "", variant: "grayscale" };
  }

  private async enhance(rawText: string, image: Buffer, info: ImageInfo, preserveOriginal: boolean): Promise<string | null> {
    if (!this.client) {
      console.warn("[ocr] No model configured for enhancement, using basic cleanup");
      return null;
    }
    try {
      const enhanced = await this.client.completeWithImage(
        {
          systemPrompt: enhanceSystemPrompt(preserveOriginal),
          userPrompt: buildEnhanceUserPrompt(rawText),
          temperature: 0.2,
          maxTokens: 2000,
        },
        { data: image, mimeType: info.mimeType }
      );
      return enhanced.trim() || null;
    } catch (error) {
      console.warn(`[ocr] Enhancement failed, using basic cleanup: ${errorMessage(error)}`);
      return null;
    }
  }

  async extractText(image: Buffer, options: { preserveOriginal?: boolean } = {}): Promise<OcrResult> {
    const info = await this.validate(image);
    const { text, variant } = await this.bestVariantText(image);

    if (!text) {
      throw new IngestError("EXTRACTION_EMPTY", "Could not extract any text from the image");
    }

    const enhanced = await this.enhance(text, image, info, options.preserveOriginal ?? false);
    return enhanced
      ? { text: enhanced, variant, enhanced: true }
      : { text: basicTextCleanup(text), variant, enhanced: false };
  }
}
