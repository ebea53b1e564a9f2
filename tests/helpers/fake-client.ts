import { vi } from "vitest";
import type { CompletionRequest, InlineImage } from "../../src/lib/llm-providers/types";

export interface FakeHandlers {
  complete?: (request: CompletionRequest) => Promise<string>;
  completeWithImage?: (request: CompletionRequest, image: InlineImage) => Promise<string>;
}

/** In-process CompletionClient whose calls are recorded by vi.fn. */
export function fakeClient(handlers: FakeHandlers = {}) {
  return {
    provider: "fake",
    complete: vi.fn(async (request: CompletionRequest) =>
      handlers.complete ? handlers.complete(request) : "{}"
    ),
    completeWithImage: vi.fn(async (request: CompletionRequest, image: InlineImage) =>
      handlers.completeWithImage ? handlers.completeWithImage(request, image) : ""
    ),
  };
}

export function replying(text: string) {
  return fakeClient({ complete: async () => text });
}

/** The value a synchronous call threw. */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected the call to throw");
}
