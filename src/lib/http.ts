import { IngestError, errorMessage } from "./errors";

export interface FetchOptions {
  headers?: Record<string, string>;
  timeoutMs: number;
  method?: "GET" | "HEAD" | "POST";
  body?: string;
}

function isTimeout(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}

/**
 * fetch() with a hard deadline. Expiry becomes a TIMEOUT error and any other
 * transport failure a FETCH_ERROR; HTTP status handling is left to the caller.
 */
export async function fetchWithTimeout(url: string, options: FetchOptions): Promise<Response> {
  try {
    return await fetch(url, {
      method: options.method ?? "GET",
      headers: options.headers,
      body: options.body,
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    throw toFetchError(error, url, options.timeoutMs);
  }
}

function toFetchError(error: unknown, url: string, timeoutMs: number): IngestError {
  if (isTimeout(error)) {
    return new IngestError(
      "TIMEOUT",
      `Request to ${new URL(url).host} timed out after ${timeoutMs / 1000}s`,
      error
    );
  }
  return new IngestError("FETCH_ERROR", errorMessage(error, "Network request failed"), error);
}

// The fetch deadline keeps running while the body streams in.
export async function readText(response: Response, url: string, timeoutMs: number): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    throw toFetchError(error, url, timeoutMs);
  }
}
