import { IngestError } from "../errors";
import type { CompletionClient, InlineImage } from "../llm-providers/types";
import { OCR_TRANSCRIBE_SYSTEM_PROMPT, OCR_TRANSCRIBE_USER_PROMPT } from "../prompts/ocr-prompt";

/** image → raw text. Called once per preprocessing variant. */
export interface OcrEngine {
  recognize(image: InlineImage): Promise<string>;
}

/** Raw transcription through the configured vision model. */
export class VisionOcrEngine implements OcrEngine {
  constructor(private readonly client: CompletionClient | null) {}

  async recognize(image: InlineImage): Promise<string> {
    if (!this.client) {
      throw new IngestError(
        "CONFIG_ERROR",
        "A model API key is required to read text from images. Set GOOGLE_AI_API_KEY or OPENAI_API_KEY."
      );
    }
    return this.client.completeWithImage(
      {
        systemPrompt: OCR_TRANSCRIBE_SYSTEM_PROMPT,
        userPrompt: OCR_TRANSCRIBE_USER_PROMPT,
        temperature: 0,
        maxTokens: 2000,
      },
      image
    );
  }
}
