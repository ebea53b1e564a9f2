import { IngestError } from "../errors";

export function toProviderError(provider: string, error: unknown, timeoutMs: number): IngestError {
  if (error instanceof IngestError) return error;

  const message = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : "";
  if (name === "AbortError" || name === "TimeoutError" || /time(?:d)?\s*out|aborted/i.test(message)) {
    return new IngestError(
      "TIMEOUT",
      `The ${provider} model did not respond within ${timeoutMs / 1000}s`,
      error
    );
  }
  return new IngestError("UPSTREAM_ERROR", `The ${provider} model request failed: ${message}`, error);
}
