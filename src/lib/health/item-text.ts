import { isRecord, type JsonRecord } from "../coerce";

/**
 * A list entry from a model response. Models are told to send plain strings
 * but also send objects, or strings that only look like objects
 * (`"{'tip': 'Use less oil'}"`).
 */
export type ListItem =
  | { kind: "text"; text: string }
  | { kind: "object"; value: JsonRecord }
  | { kind: "dict-string"; raw: string };

export function classifyItem(item: unknown): ListItem {
  if (typeof item === "string") {
    const trimmed = item.trim();
    return trimmed.startsWith("{") && trimmed.endsWith("}")
      ? { kind: "dict-string", raw: trimmed }
      : { kind: "text", text: item };
  }
  if (isRecord(item)) return { kind: "object", value: item };
  if (item === null || item === undefined) return { kind: "text", text: "" };
  return { kind: "text", text: String(item) };
}

function scalarText(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  return typeof value === "object" ? JSON.stringify(value) : String(value);
}

function fromObject(value: JsonRecord, keys: readonly string[]): string {
  for (const key of keys) {
    if (key in value) return scalarText(value[key]);
  }
  const first = Object.values(value)[0];
  return scalarText(first);
}

function tryParseRecord(text: string): JsonRecord | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// A quoted value closed by the same quote that opened it, escapes allowed.
const QUOTED_VALUE = String.raw`\s*:\s*(['"])((?:\\.|(?!\1)[^\\])*)\1`;
const ANY_KEY = String.raw`['"]?\w+['"]?`;

function unescapeQuoted(text: string): string {
  return text.replace(/\\(.)/g, (_, char: string) => (char === "n" ? "\n" : char));
}

function fromDictString(raw: string, keys: readonly string[]): string {
  const parsed = tryParseRecord(raw);
  if (parsed) return fromObject(parsed, keys);

  for (const key of keys) {
    const match = raw.match(new RegExp(`['"]${escapeRegExp(key)}['"]${QUOTED_VALUE}`));
    if (match) return unescapeQuoted(match[2]);
  }

  const first = raw.match(new RegExp(`${ANY_KEY}${QUOTED_VALUE}`));
  if (first) return unescapeQuoted(first[2]);

  return raw
    .replace(/^\{['"]?\w+['"]?:\s*['"]?/, "")
    .replace(/['"]?\}$/, "")
    .replace(/^['"]+|['"]+$/g, "")
    .trim();
}

/** Human-readable text of a list entry in any of its three shapes. Never throws. */
export function itemText(item: unknown, keys: readonly string[]): string {
  const classified = classifyItem(item);
  switch (classified.kind) {
    case "text":
      return classified.text.trim();
    case "object":
      return fromObject(classified.value, keys).trim();
    case "dict-string":
      return fromDictString(classified.raw, keys).trim();
  }
}
