/**
 * Typed ingestion errors.
 *
 * Every failure the pipeline surfaces to its caller is an IngestError whose
 * safeMessage is user-facing. Lower layers throw these; the route layer maps
 * the code to an HTTP status and never rewrites the message.
 */

export type IngestErrorCode =
  | "CONFIG_ERROR"
  | "VALIDATION_ERROR"
  | "FETCH_ERROR"
  | "TIMEOUT"
  | "UPSTREAM_ERROR"
  | "EXTRACTION_EMPTY"
  | "MODEL_RESPONSE_INVALID"
  | "PLATFORM_POLICY";

export class IngestError extends Error {
  public readonly code: IngestErrorCode;
  public readonly safeMessage: string;
  public readonly details?: Record<string, unknown>;

  constructor(code: IngestErrorCode, safeMessage: string, causeOrDetails?: unknown) {
    super(safeMessage);
    this.name = "IngestError";
    this.code = code;
    this.safeMessage = safeMessage;

    if (causeOrDetails instanceof Error) {
      this.cause = causeOrDetails;
    } else if (
      causeOrDetails &&
      typeof causeOrDetails === "object" &&
      !Array.isArray(causeOrDetails)
    ) {
      this.details = { ...causeOrDetails };
    } else if (causeOrDetails !== undefined) {
      this.cause = new Error(String(causeOrDetails));
    }
  }

  toJSON(): { code: IngestErrorCode; message: string } {
    return { code: this.code, message: this.safeMessage };
  }
}

const HTTP_STATUS: Record<IngestErrorCode, number> = {
  CONFIG_ERROR: 500,
  VALIDATION_ERROR: 400,
  FETCH_ERROR: 400,
  TIMEOUT: 504,
  UPSTREAM_ERROR: 502,
  EXTRACTION_EMPTY: 422,
  MODEL_RESPONSE_INVALID: 502,
  PLATFORM_POLICY: 422,
};

export function httpStatusFor(code: IngestErrorCode): number {
  return HTTP_STATUS[code];
}

export function isIngestError(error: unknown): error is IngestError {
  return error instanceof IngestError;
}

export function errorMessage(error: unknown, fallback = "Unknown error"): string {
  if (error instanceof IngestError) return error.safeMessage;
  if (error instanceof Error) return error.message || fallback;
  return fallback;
}
