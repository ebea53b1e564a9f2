import { IngestError } from "./errors";
import { isRecord, type JsonRecord } from "./coerce";

/**
 * Repair cascade for JSON a model was asked to return.
 *
 * Normalization (always applied, in order):
 *   1. strip a leading/trailing ``` fence
 *   2. take the first "{" through the last "}"
 *   3. drop trailing commas before } and ]
 * Parse attempts (first success wins):
 *   strict  - JSON.parse as is
 *   lenient - literal "\n" escapes and // comments removed, then JSON.parse
 */

export type RepairStepName = "strict" | "lenient";

export type RepairOutcome =
  | { ok: true; value: unknown; step: RepairStepName }
  | { ok: false; error: string; step: RepairStepName };

interface RepairStep {
  name: RepairStepName;
  transform: (text: string) => string;
}

export function stripCodeFence(text: string): string {
  let cleaned = text.trim();
  if (cleaned.startsWith("```")) {
    const lines = cleaned.split("\n");
    cleaned = lines.slice(1).join("\n");
  }
  if (cleaned.endsWith("```")) {
    cleaned = cleaned.slice(0, -3);
  }
  return cleaned.trim();
}

export function extractJsonObject(text: string): string | null {
  const match = text.match(/\{[\s\S]*\}/);
  return match ? match[0] : null;
}

export function removeTrailingCommas(text: string): string {
  return text.replace(/,\s*}/g, "}").replace(/,\s*]/g, "]");
}

function stripEscapesAndComments(text: string): string {
  return text
    .replace(/\\n/g, " ")
    // a "//" right after ":" is a URL scheme, not a comment
    .replace(/(^|[^:])\/\/[^\n]*/g, "$1");
}

const REPAIR_STEPS: readonly RepairStep[] = [
  { name: "strict", transform: (text) => text },
  { name: "lenient", transform: stripEscapesAndComments },
];

export function normalizeModelJson(raw: string): string {
  const unfenced = stripCodeFence(raw);
  const candidate = extractJsonObject(unfenced) ?? unfenced;
  return removeTrailingCommas(candidate);
}

function attempt(step: RepairStep, text: string): RepairOutcome {
  try {
    return { ok: true, value: JSON.parse(step.transform(text)), step: step.name };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, error: message, step: step.name };
  }
}

export function repairJson(raw: string): RepairOutcome {
  const normalized = normalizeModelJson(raw);
  let last: RepairOutcome = { ok: false, error: "No repair step ran", step: "strict" };
  for (const step of REPAIR_STEPS) {
    last = attempt(step, normalized);
    if (last.ok) return last;
  }
  return last;
}

/**
 * Runs the repair cascade and insists on a JSON object. Exhaustion is a
 * MODEL_RESPONSE_INVALID error; the raw snippet is logged for diagnosis.
 */
export function parseModelJson(raw: string, context: string): JsonRecord {
  const outcome = repairJson(raw);
  if (!outcome.ok) {
    console.error(`[json-repair] ${context}: ${outcome.error}. Raw response:`, raw.slice(0, 500));
    throw new IngestError(
      "MODEL_RESPONSE_INVALID",
      `Failed to parse ${context} response from the model`,
      { parseError: outcome.error }
    );
  }
  if (!isRecord(outcome.value)) {
    console.error(`[json-repair] ${context}: expected a JSON object. Raw response:`, raw.slice(0, 500));
    throw new IngestError(
      "MODEL_RESPONSE_INVALID",
      `The model returned an unexpected ${context} format`
    );
  }
  return outcome.value;
}
