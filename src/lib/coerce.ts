// Narrowing helpers for untyped JSON coming back from models and pages.

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asString(value: unknown): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed ? trimmed : null;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

export function asNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string") {
    const match = value.replace(/,/g, "").match(/-?\d+(?:\.\d+)?/);
    if (match) {
      const parsed = Number.parseFloat(match[0]);
      return Number.isFinite(parsed) ? parsed : null;
    }
  }
  return null;
}

export function asStringArray(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  const out: string[] = [];
  for (const item of value) {
    const text = asString(item);
    if (text) out.push(text);
  }
  return out;
}

export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/** Rounds every numeric leaf of a JSON value to one decimal place. */
export function roundNumericLeaves(value: unknown): unknown {
  if (typeof value === "number") {
    return Number.isFinite(value) ? round1(value) : value;
  }
  if (Array.isArray(value)) {
    return value.map(roundNumericLeaves);
  }
  if (isRecord(value)) {
    const out: JsonRecord = {};
    for (const [key, child] of Object.entries(value)) {
      out[key] = roundNumericLeaves(child);
    }
    return out;
  }
  return value;
}
