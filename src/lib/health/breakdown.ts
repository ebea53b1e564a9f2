import { asString, asStringArray, isRecord, type JsonRecord } from "../coerce";
import { itemText } from "./item-text";

const TOP_VITAMINS = 4;
const TOP_MINERALS = 4;
const TOP_COMPOUNDS = 3;
const TOP_CONDITIONS = 4;
const TOP_TIPS = 5;
const TOP_PAIRINGS = 3;

const TIP_KEYS = ["tip", "description"] as const;
const PAIRING_KEYS = ["suggestion", "pairing", "description"] as const;

function record(value: unknown): JsonRecord {
  return isRecord(value) ? value : {};
}

function list(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function bullet(text: string): string {
  return `• ${text}\n`;
}

function titleCase(key: string): string {
  return key
    .split(/[_\s]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
}

function highlightsSection(data: JsonRecord): string {
  const highlights = record(data.nutritional_highlights);
  if (Object.keys(highlights).length === 0) return "";

  let out = "### 🏆 Nutritional Highlights\n\n";

  const vitamins = asStringArray(highlights.vitamins).slice(0, TOP_VITAMINS);
  const minerals = asStringArray(highlights.minerals).slice(0, TOP_MINERALS);
  if (vitamins.length > 0 || minerals.length > 0) {
    out += "**Key Vitamins & Minerals:**\n";
    out += [...vitamins, ...minerals].map(bullet).join("");
    out += "\n";
  }

  const macros = record(highlights.macros);
  const macroLines: Array<[string, string | null]> = [
    ["Protein", asString(macros.protein_quality)],
    ["Carbs", asString(macros.carb_quality)],
    ["Fats", asString(macros.fat_quality)],
  ];
  if (macroLines.some(([, text]) => text)) {
    out += "**Macronutrient Analysis:**\n";
    for (const [label, text] of macroLines) {
      if (text) out += bullet(`**${label}**: ${text}`);
    }
    out += "\n";
  }

  const compounds = asStringArray(highlights.special_compounds).slice(0, TOP_COMPOUNDS);
  if (compounds.length > 0) {
    out += "**Beneficial Compounds:**\n";
    out += compounds.map(bullet).join("");
    out += "\n";
  }

  return out;
}

function pairSection(heading: string, items: unknown[], titleKey: string, bodyKey: string): string {
  if (items.length === 0) return "";
  let out = `### ${heading}\n\n`;
  for (const item of items) {
    if (isRecord(item)) {
      out += bullet(`**${asString(item[titleKey]) ?? ""}**: ${asString(item[bodyKey]) ?? ""}`);
    } else {
      const text = itemText(item, [bodyKey]);
      if (text) out += bullet(text);
    }
  }
  return `${out}\n`;
}

function dietarySection(data: JsonRecord): string {
  const dietary = record(data.dietary_considerations);
  if (Object.keys(dietary).length === 0) return "";

  let out = "### 🍽️ Dietary Considerations\n\n";
  const suitable = asStringArray(dietary.suitable_for);
  if (suitable.length > 0) {
    out += `**Suitable for:** ${suitable.join(", ")}\n\n`;
  }

  const conditions = Object.entries(record(dietary.modifications_for_conditions)).slice(0, TOP_CONDITIONS);
  if (conditions.length > 0) {
    out += "**Health Condition Recommendations:**\n";
    for (const [condition, advice] of conditions) {
      out += bullet(`**${titleCase(condition)}**: ${itemText(advice, [])}`);
    }
    out += "\n";
  }
  return out;
}

function textListSection(heading: string, items: unknown[], limit: number, keys: readonly string[]): string {
  if (items.length === 0) return "";
  let out = `### ${heading}\n\n`;
  for (const item of items.slice(0, limit)) {
    const text = itemText(item, keys);
    if (text) out += bullet(text);
  }
  return `${out}\n`;
}

/**
 * Renders the analysis as one Markdown narrative. Section order is fixed:
 * score, overview, highlights, healthy aspects, watch points, dietary
 * considerations, tips, pairings.
 */
export function formatHealthBreakdown(data: JsonRecord, score: number): string {
  let out = `**Health Score: ${score}/10**\n\n`;

  const summary = asString(data.summary);
  if (summary) out += `📊 **Overview**: ${summary}\n\n`;

  out += highlightsSection(data);
  out += pairSection("✅ What Makes It Healthy", list(data.healthy_aspects), "title", "description");
  out += pairSection("⚠️ What to Watch Out For", list(data.watch_points), "ingredient", "concern");
  out += dietarySection(data);
  out += textListSection("💡 Tips to Make It Healthier", list(data.improvement_tips), TOP_TIPS, TIP_KEYS);
  out += textListSection("🥘 Suggested Pairings", list(data.meal_pairing_suggestions), TOP_PAIRINGS, PAIRING_KEYS);

  return out;
}
