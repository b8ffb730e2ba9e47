/**
 * Body Locator
 *
 * Splits the document into a header region (above) and the table body
 * (below) at the first line whose leading token is a known test code.
 */

import type { Line } from "./types.js";
import { resolveCode } from "./reference/code-dictionary.js";

export interface BodyLocation {
  /** Index of the first body line; fixed for the rest of the pipeline */
  bodyStartIndex: number;
  /** Lines strictly above the body */
  headerLines: Line[];
  /** Retained body lines, leading token rewritten to the canonical code */
  bodyLines: Line[];
  /** Indices of lines below the body start whose leading token did not resolve */
  prunedLineIndices: number[];
}

function leadingCode(line: Line): string | null {
  const first = line.tokens[0];
  return first ? resolveCode(first.text) : null;
}

function withCanonicalCode(line: Line, code: string): Line {
  const [first, ...rest] = line.tokens;
  return { index: line.index, tokens: [{ ...first, text: code }, ...rest] };
}

/**
 * Returns null when no line starts with a known test code ("no table found").
 */
export function locateBody(lines: Line[]): BodyLocation | null {
  const start = lines.findIndex((line) => leadingCode(line) !== null);
  if (start < 0) return null;

  const bodyLines: Line[] = [];
  const prunedLineIndices: number[] = [];

  for (const line of lines.slice(start)) {
    const code = leadingCode(line);
    if (code) {
      bodyLines.push(withCanonicalCode(line, code));
    } else {
      prunedLineIndices.push(line.index);
    }
  }

  return {
    bodyStartIndex: lines[start].index,
    headerLines: lines.slice(0, start),
    bodyLines,
    prunedLineIndices,
  };
}
