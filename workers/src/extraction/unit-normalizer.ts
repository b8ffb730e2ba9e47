/**
 * Unit/Value Normalizer
 *
 * Canonical unit spellings through the unit lexicon, numeric coercion of
 * the result and reference cells. Raw cells are never modified; the
 * normalized values go to the *Norm fields.
 */

import type { BodyRow } from "./types.js";
import { UNKNOWN } from "./types.js";
import { NUMERIC_RE } from "./patterns.js";
import { lookupUnit, resolveUnit } from "./reference/unit-lexicon.js";

const QUALITATIVE_WORDS = new Set([
  "neg",
  "pos",
  "negative",
  "positive",
  "normal",
  "high",
  "low",
  "양성",
  "음성",
]);

/**
 * A unit cell that actually holds a value ("neg pos/n", "12.5 H mg/dL").
 */
function isValueUnitMixture(text: string): boolean {
  if (!/\s/.test(text)) return false;
  const first = text.split(/\s+/)[0].toLowerCase();
  return QUALITATIVE_WORDS.has(first) || NUMERIC_RE.test(first);
}

/**
 * Canonical spelling of a unit, or the trimmed input when the lexicon does
 * not know it. Null for blank and UNKNOWN cells.
 */
export function normalizeUnit(raw: string | null | undefined): string | null {
  if (raw === null || raw === undefined) return null;
  const text = raw.trim();
  if (!text || text === UNKNOWN) return null;
  // "10 ^3/µL" is a unit split by OCR, not a value in the unit column
  const known = lookupUnit(text);
  if (known) return known;
  if (isValueUnitMixture(text)) return text;
  return resolveUnit(text) ?? text;
}

/**
 * Parses "12.5", "4,5H", "-2" or "1·2" into a number; null otherwise.
 */
export function normalizeNumeric(raw: string | null | undefined): number | null {
  if (raw === null || raw === undefined) return null;
  const text = raw
    .trim()
    .replace(/[,·]/g, ".")
    .replace(/[HhLlNn]$/, "");
  if (!/^[+-]?\d+(?:\.\d+)?$/.test(text)) return null;
  return Number(text);
}

export function normalizeRowValues(row: BodyRow): BodyRow {
  return {
    ...row,
    resultNorm: normalizeNumeric(row.result),
    minNorm: normalizeNumeric(row.min),
    maxNorm: normalizeNumeric(row.max),
    unitCanonical: normalizeUnit(row.unit),
  };
}
