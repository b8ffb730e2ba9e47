/**
 * Cell-level patterns shared by header resolution and the table filler.
 */

import { resolveUnit } from "./reference/unit-lexicon.js";

/** Plain number with an optional H/L/N flag ("12.3", "4,5H", "-2") */
export const NUMERIC_RE = /^[+-]?\d+(?:[.,·]\d+)?[HhLlNn]?$/;

/** Strict "min - max" range ("6.54-12.2", "10 ~ 100") */
export const RANGE_RE =
  /^\s*([+-]?\d+(?:[.,]\d+)?)\s*[-–~]\s*([+-]?\d+(?:[.,]\d+)?)\s*$/;

export const DATE_LIKE_RE = /\d{2,4}[-./]\d{1,2}[-./]\d{1,2}/;

const UNIT_SHAPE_RE =
  /^(?:%|‰|g\/dl|mg\/dl|u\/l|iu\/l|mmol\/l|meq\/l|fl|pg|ng\/ml|[km]\/[µμu]?l|10\^?\d+\/(?:l|ul|µl|μl))$/i;

export function isNumericCell(text: string): boolean {
  return NUMERIC_RE.test(text.trim());
}

export function isRangeCell(text: string): boolean {
  return RANGE_RE.test(text);
}

export function isDateLike(text: string): boolean {
  return DATE_LIKE_RE.test(text) || /^\d{6,}$/.test(text.trim());
}

export function isUnitLike(text: string): boolean {
  const t = text.trim();
  if (!t || isNumericCell(t)) return false;
  if (resolveUnit(t)) return true;
  if (UNIT_SHAPE_RE.test(t)) return true;
  return t.includes("%") && t.length <= 4;
}

export function median(values: number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1
    ? (sorted[mid] ?? 0)
    : ((sorted[mid - 1] ?? 0) + (sorted[mid] ?? 0)) / 2;
}

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}
