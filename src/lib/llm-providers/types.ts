/**
 * Text-completion contract shared by every model backend.
 */

export interface CompletionRequest {
  systemPrompt: string;
  userPrompt: string;
  temperature: number;
  maxTokens: number;
  /** Ask the backend for a JSON-only response where it supports that. */
  json?: boolean;
}

export interface InlineImage {
  data: Buffer;
  mimeType: string;
}

export interface CompletionClient {
  readonly provider: string;
  complete(request: CompletionRequest): Promise<string>;
  /** Vision variant: one inline image alongside the text prompt. */
  completeWithImage(request: CompletionRequest, image: InlineImage): Promise<string>;
}
