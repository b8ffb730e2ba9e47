/**
 * Token Assembler
 *
 * Groups raw OCR tokens into text lines by vertical position and cleans up
 * tokens inside each line.
 *
 * Input:
 * - OcrToken[] for one document (one shared coordinate system)
 *
 * Output:
 * - Line[] ordered top to bottom, tokens ordered left to right
 */

import type { Line, OcrToken, Token } from "./types.js";
import { median } from "./patterns.js";

export interface AssembleOptions {
  /** Tokens below this OCR confidence are discarded */
  minTokenConfidence: number;
  /** Fraction of the median token height used as the line band */
  lineHeightFactor?: number;
}

const DEFAULT_LINE_TOLERANCE = 16;
const DEFAULT_LINE_HEIGHT_FACTOR = 0.7;

const COMPARATOR = "(?:[<>]=?|[≤≥≈~])?";
const NUMBER = "[-+]?(?:\\d+(?:[.,]\\d+)?|\\.\\d+)";
const UNIT = "[A-Za-zµμ%‰/][\\w%‰/µμ^]*";

const SPACED_VALUE_UNIT_RE = new RegExp(`^(${COMPARATOR}${NUMBER})\\s+(\\S.*)$`);
const GLUED_VALUE_UNIT_RE = new RegExp(`^(${COMPARATOR}${NUMBER})(${UNIT})$`);
const FLAGGED_VALUE_RE = /^\s*([-+]?\d+(?:\.\d+)?)([HLN])\s*$/i;
const STATUS_WORD_RE = /^(?:normal|low|high)$/i;

const MAX_UNIT_TAIL = 12;

export function toToken(ocr: OcrToken): Token {
  const { top, bottom, left, right } = ocr.bbox;
  return {
    text: ocr.text.trim(),
    confidence: ocr.confidence,
    bbox: { top, bottom, left, right },
    xCenter: (left + right) / 2,
    yCenter: (top + bottom) / 2,
    height: Math.max(0, bottom - top),
    origin: "ocr",
  };
}

/**
 * Vertical tolerance for line grouping: a fraction of the median token height.
 */
export function lineTolerance(
  tokens: Token[],
  factor = DEFAULT_LINE_HEIGHT_FACTOR,
): number {
  const heights = tokens.map((t) => t.height).filter((h) => h > 0);
  if (heights.length === 0) return DEFAULT_LINE_TOLERANCE;
  return Math.round(median(heights) * factor);
}

/**
 * Sequential scan by y-center. A line keeps the center of its first token as
 * seed; a token farther than `tolerance` from the seed starts a new line.
 */
export function assignLines(tokens: Token[], tolerance: number): Line[] {
  const sorted = [...tokens].sort(
    (a, b) => a.yCenter - b.yCenter || a.bbox.left - b.bbox.left,
  );

  const groups: Token[][] = [];
  let current: Token[] = [];
  let seed = 0;

  for (const token of sorted) {
    if (current.length > 0 && Math.abs(token.yCenter - seed) <= tolerance) {
      current.push(token);
      continue;
    }
    if (current.length > 0) groups.push(current);
    current = [token];
    seed = token.yCenter;
  }
  if (current.length > 0) groups.push(current);

  return groups.map((group, index) => ({
    index,
    tokens: [...group].sort((a, b) => a.bbox.left - b.bbox.left),
  }));
}

function lineGaps(tokens: Token[]): number[] {
  const gaps: number[] = [];
  for (let i = 0; i + 1 < tokens.length; i++) {
    const gap = tokens[i + 1].bbox.left - tokens[i].bbox.right;
    if (gap >= 0) gaps.push(gap);
  }
  return gaps;
}

/**
 * Joins a name split by OCR before its parenthesized part:
 * "POTASSIUM" + "(K+)" → "POTASSIUM(K+)".
 */
export function mergeNameFragment(tokens: Token[]): Token[] {
  if (tokens.length < 2) return tokens;
  const [first, second, ...rest] = tokens;
  if (!second.text.startsWith("(") || first.text.startsWith("(")) {
    return tokens;
  }

  const threshold = Math.max(14, median(lineGaps(tokens)) * 1.6);
  if (second.bbox.left - first.bbox.right > threshold) return tokens;

  const bbox = {
    top: Math.min(first.bbox.top, second.bbox.top),
    bottom: Math.max(first.bbox.bottom, second.bbox.bottom),
    left: first.bbox.left,
    right: second.bbox.right,
  };
  const merged: Token = {
    text: `${first.text.trimEnd()}${second.text.trim()}`,
    confidence: Math.min(first.confidence, second.confidence),
    bbox,
    xCenter: (bbox.left + bbox.right) / 2,
    yCenter: (bbox.top + bbox.bottom) / 2,
    height: bbox.bottom - bbox.top,
    origin: "merged_name",
  };
  return [merged, ...rest];
}

function acceptsUnitTail(tail: string): boolean {
  if (tail.length > MAX_UNIT_TAIL) return false;
  if (/[-–~]/.test(tail)) return false;
  if (/^[HLN]$/i.test(tail)) return false;
  return /[A-Za-zµμ%‰]/.test(tail);
}

function splitAt(token: Token, valueText: string, unitText: string): Token[] {
  const { left, right } = token.bbox;
  const fraction = valueText.length / Math.max(1, token.text.length);
  const splitX = left + (right - left) * fraction;

  const value: Token = {
    ...token,
    text: valueText,
    bbox: { ...token.bbox, right: splitX },
    xCenter: (left + splitX) / 2,
    origin: "split_value",
  };
  const unit: Token = {
    ...token,
    text: unitText,
    bbox: { ...token.bbox, left: splitX },
    xCenter: (splitX + right) / 2,
    origin: "split_unit_candidate",
  };
  return [value, unit];
}

/**
 * Splits a fused "value unit" token ("12.5 mg/dL", "7.5K/µL") into a numeric
 * token and a unit token. Returns null when the token is not such a pair.
 */
export function splitValueUnit(token: Token): Token[] | null {
  const text = token.text;

  const spaced = SPACED_VALUE_UNIT_RE.exec(text);
  if (spaced) {
    const [, value, tail] = spaced;
    const unit = tail.trim();
    return acceptsUnitTail(unit) ? splitAt(token, value, unit) : null;
  }

  const glued = GLUED_VALUE_UNIT_RE.exec(text);
  if (glued) {
    const [, value, unit] = glued;
    return acceptsUnitTail(unit) ? splitAt(token, value, unit) : null;
  }

  return null;
}

/**
 * Annotates "12.3H"-style tokens with their numeric value and flag.
 * Tokens produced by the value/unit split are left untouched.
 */
export function annotateFlag(token: Token): Token {
  if (token.origin === "split_value" || token.origin === "split_unit_candidate") {
    return token;
  }
  const match = FLAGGED_VALUE_RE.exec(token.text);
  if (!match) return token;
  const [, num, flag] = match;
  const valueFlag = flag.toUpperCase();
  if (valueFlag !== "H" && valueFlag !== "L" && valueFlag !== "N") return token;
  const flagged: Token = { ...token, valueNum: parseFloat(num), valueFlag };
  return flagged;
}

export function isStatusWord(text: string): boolean {
  return STATUS_WORD_RE.test(text.trim());
}

function cleanLineTokens(tokens: Token[]): Token[] {
  const merged = mergeNameFragment(tokens);
  // the leading token is the row's test code and is never split
  const split = merged.flatMap((token, i) =>
    i === 0 ? [token] : (splitValueUnit(token) ?? [token]),
  );
  return split.map(annotateFlag).filter((token) => !isStatusWord(token.text));
}

/**
 * Builds the document's lines from raw OCR tokens.
 */
export function assembleLines(
  ocrTokens: OcrToken[],
  options: AssembleOptions,
): Line[] {
  const tokens = ocrTokens
    .map(toToken)
    .filter(
      (t) => t.text.length > 0 && t.confidence >= options.minTokenConfidence,
    );
  if (tokens.length === 0) return [];

  const tolerance = lineTolerance(tokens, options.lineHeightFactor);

  return assignLines(tokens, tolerance)
    .map((line) => cleanLineTokens(line.tokens))
    .filter((lineTokens) => lineTokens.length > 0)
    .map((lineTokens, index) => ({ index, tokens: lineTokens }));
}
