/**
 * Table Filler
 *
 * Reconciles each body line against the resolved header: tokens go to the
 * nearest column, cells that do not fit their role are discarded, and an
 * empty result or unit is recovered from the leftover tokens of the line.
 */

import type { BodyRow, HeaderSpec, Line, Role, Token } from "./types.js";
import { UNKNOWN } from "./types.js";
import { isNumericCell, isRangeCell, isUnitLike } from "./patterns.js";
import { assignCells, cellText } from "./header/columns.js";

const DEFAULT_RESULT_CONFIDENCE = 0.5;

const ROLE_CHECKS: Record<Exclude<Role, "name">, (text: string) => boolean> = {
  result: isNumericCell,
  unit: isUnitLike,
  reference: isRangeCell,
  min: isNumericCell,
  max: isNumericCell,
};

/** Roles recovered geometrically when their own cell is empty or invalid */
const REPAIRED_ROLES = ["result", "unit"] as const;

/**
 * Column-ordered cell texts up to the last populated column, followed by
 * the overflow tokens (which keep every column in place).
 */
function rowCells(
  cells: Token[][],
  overflow: Token[],
  code: string,
  nameColumn: number,
): string[] {
  const texts = cells.map((tokens, i) => (i === nameColumn ? code : cellText(tokens)));
  if (overflow.length > 0) return [...texts, ...overflow.map((t) => t.text)];
  let end = texts.length;
  while (end > 0 && texts[end - 1] === "") end--;
  return texts.slice(0, end);
}

function closestMatching(
  tokens: Token[],
  center: number,
  test: (text: string) => boolean,
): Token | null {
  let best: Token | null = null;
  for (const token of tokens) {
    if (!test(token.text)) continue;
    if (!best || Math.abs(token.xCenter - center) < Math.abs(best.xCenter - center)) {
      best = token;
    }
  }
  return best;
}

/**
 * Builds the draft row of one body line.
 */
export function fillRow(line: Line, header: HeaderSpec): BodyRow {
  const nameColumn = Math.max(0, header.columns.indexOf("name"));
  const { cells, overflow } = assignCells(line, header.centers, nameColumn);
  const code = line.tokens[0]?.text ?? UNKNOWN;

  const srcTokens: Partial<Record<Role, Token[]>> = {};
  const used = new Set<Token>();
  if (line.tokens[0]) {
    srcTokens.name = [line.tokens[0]];
    used.add(line.tokens[0]);
  }

  header.columns.forEach((role, index) => {
    if (role === null || role === "name") return;
    const tokens = cells[index];
    if (tokens.length === 0 || !ROLE_CHECKS[role](cellText(tokens))) return;
    srcTokens[role] = tokens;
    tokens.forEach((t) => used.add(t));
  });

  for (const role of REPAIRED_ROLES) {
    const index = header.columns.indexOf(role);
    if (index < 0 || srcTokens[role]) continue;
    const leftovers = line.tokens.filter((t) => !used.has(t));
    const token = closestMatching(leftovers, header.centers[index], ROLE_CHECKS[role]);
    if (token) {
      srcTokens[role] = [token];
      used.add(token);
    }
  }

  const text = (role: Role) => {
    const tokens = srcTokens[role];
    return tokens ? cellText(tokens) : UNKNOWN;
  };
  const resultTokens = srcTokens.result;
  const hasMinMax = header.columns.includes("min");

  const row: BodyRow = {
    code,
    cells: rowCells(cells, overflow, code, nameColumn),
    name: code,
    result: text("result"),
    unit: text("unit"),
    reference: text("reference"),
    srcLine: line.index,
    srcTokens,
    resultConfidence: resultTokens
      ? Math.min(...resultTokens.map((t) => t.confidence))
      : DEFAULT_RESULT_CONFIDENCE,
  };
  if (hasMinMax) {
    row.min = text("min");
    row.max = text("max");
  }
  return row;
}

export function fillRows(bodyLines: Line[], header: HeaderSpec): BodyRow[] {
  return bodyLines.map((line) => fillRow(line, header));
}
