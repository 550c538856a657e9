import { INGREDIENT_SYNONYMS } from "../config/skincareVocabulary.js";
import { normalizeToken, textLength } from "../utils/normalize.js";

const BRACKET_RE = /\s*\([^)]*\)/g;
const FOOTNOTE_RE = /\s*\*.*/g;
const PERCENT_RE = /\s*\d+%/g;
const QUANTITY_RE = /\s*\d+\.?\d*\s*(ml|g|oz)/gi;

/**
 * Canonical display name for a raw ingredient token: "Aqua (Water)*" -> "Aqua",
 * "Vitamin C 5%" -> "Ascorbic Acid". Synonyms match by substring, so
 * "glycolic acid peel" also collapses to "Glycolic Acid".
 */
export function normalizeIngredientName(raw: string): string {
  const stripped = stripDecorations(String(raw ?? ""));
  const lowered = normalizeToken(stripped);
  const synonym = INGREDIENT_SYNONYMS.find(([match]) => lowered.includes(match));
  if (synonym) {
    return synonym[1];
  }

  return stripped.trim();
}

/** Lower-cased grouping key; empty when the token carries too little text to group on. */
export function canonicalIngredientKey(raw: string): string {
  const name = normalizeIngredientName(raw);
  return textLength(name) > 2 ? name.toLowerCase() : "";
}

// Repeats until stable: removing a quantity can expose a percentage.
function stripDecorations(value: string): string {
  let current = value;
  for (;;) {
    const next = current
      .replace(BRACKET_RE, "")
      .replace(FOOTNOTE_RE, "")
      .replace(PERCENT_RE, "")
      .replace(QUANTITY_RE, "");
    if (next === current) {
      return current;
    }
    current = next;
  }
}
