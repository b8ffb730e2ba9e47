/**
 * OCR header tier: reads the column roles from a header line printed above
 * the table body ("Test  Result  Unit  Reference").
 */

import type {
  HeaderSpec,
  Line,
  ResolutionFailure,
  Result,
  Role,
} from "../types.js";
import { err, ok } from "../types.js";
import {
  isNumericCell,
  isRangeCell,
  isUnitLike,
  mean,
} from "../patterns.js";
import { assignCells, cellText, findColumnViolation } from "./columns.js";
import type { HeaderContext, HeaderStrategy } from "./strategy.js";

type HeaderWord = Role | "date";

const HEADER_SYNONYMS: Record<HeaderWord, string[]> = {
  name: ["name", "test", "parameter", "item", "analyte", "검사항목", "항목", "항목명", "검사명"],
  result: ["result", "value", "결과", "결과값", "측정값", "수치"],
  unit: ["unit", "단위"],
  reference: ["reference", "ref", "range", "ref. range", "ref.range", "참고치", "참고범위", "정상범위", "기준치"],
  min: ["min", "lo", "lower", "최소", "하한"],
  max: ["max", "hi", "upper", "최대", "상한"],
  date: ["date", "검사일", "검사일자"],
};

/** Two-token headers that must be read as one column */
const PAIRED_HEADERS: Record<string, HeaderWord> = {
  "test name": "name",
  "item name": "name",
  "ref. range": "reference",
  "ref range": "reference",
  "reference range": "reference",
  "reference interval": "reference",
  "normal range": "reference",
};

const MATCH_ORDER: HeaderWord[] = ["name", "result", "unit", "reference", "min", "max", "date"];

const MIN_HEADER_HITS = 3;

interface HeaderCell {
  word: HeaderWord | null;
  center: number;
}

function normalizeHeaderText(text: string): string {
  return text.toLowerCase().replace(/[:：]/g, "").replace(/\s+/g, " ").trim();
}

/**
 * Maps one header token to its role keyword: exact synonym, or a synonym of
 * three or more characters contained in the token.
 */
export function matchHeaderWord(text: string): HeaderWord | null {
  const norm = normalizeHeaderText(text);
  if (!norm) return null;
  for (const word of MATCH_ORDER) {
    for (const synonym of HEADER_SYNONYMS[word]) {
      if (norm === synonym) return word;
      if (synonym.length >= 3 && norm.includes(synonym)) return word;
    }
  }
  return null;
}

function readHeaderCells(line: Line): HeaderCell[] {
  const cells: HeaderCell[] = [];
  const { tokens } = line;
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    const next = tokens[i + 1];
    if (next) {
      const paired = PAIRED_HEADERS[normalizeHeaderText(`${token.text} ${next.text}`)];
      if (paired) {
        cells.push({ word: paired, center: (token.xCenter + next.xCenter) / 2 });
        i++;
        continue;
      }
    }
    cells.push({ word: matchHeaderWord(token.text), center: token.xCenter });
  }
  return cells;
}

function distinctHits(cells: HeaderCell[]): number {
  return new Set(cells.map((c) => c.word).filter((w) => w !== null)).size;
}

/**
 * Scans the header region bottom-up for the line with the most distinct
 * role keywords (at least three).
 */
export function findHeaderLine(
  headerLines: Line[],
): { line: Line; cells: HeaderCell[] } | null {
  let best: { line: Line; cells: HeaderCell[]; hits: number } | null = null;
  for (const line of [...headerLines].reverse()) {
    const cells = readHeaderCells(line);
    const hits = distinctHits(cells);
    if (hits >= MIN_HEADER_HITS && (!best || hits > best.hits)) {
      best = { line, cells, hits };
    }
  }
  return best ? { line: best.line, cells: best.cells } : null;
}

function toRoles(cells: HeaderCell[]): Array<Role | null> {
  const hasResult = cells.some((c) => c.word === "result");
  let promoted = false;
  return cells.map(({ word }) => {
    if (word !== "date") return word;
    // a lone date column holds the results of that sampling day
    if (!hasResult && !promoted) {
      promoted = true;
      return "result";
    }
    return null;
  });
}

/**
 * Agreement between the header roles and the body cell types: numeric
 * results, unit-like units, range-like references (or numeric min/max).
 */
export function alignmentScore(header: HeaderSpec, lines: Line[]): number {
  if (lines.length === 0) return 0;
  const col = (role: Role) => header.columns.indexOf(role);
  const nameColumn = Math.max(0, col("name"));
  const assigned = lines.map((line) =>
    assignCells(line, header.centers, nameColumn).cells,
  );

  const ratio = (role: Role, test: (text: string) => boolean) => {
    const index = col(role);
    const hits = assigned.filter((cells) => test(cellText(cells[index]))).length;
    return hits / assigned.length;
  };

  const components: number[] = [];
  if (col("result") >= 0) components.push(ratio("result", isNumericCell));
  if (col("unit") >= 0) components.push(ratio("unit", isUnitLike));
  if (col("reference") >= 0) {
    components.push(ratio("reference", isRangeCell));
  } else if (col("min") >= 0 && col("max") >= 0) {
    components.push((ratio("min", isNumericCell) + ratio("max", isNumericCell)) / 2);
  }
  return mean(components);
}

export class OcrHeaderStrategy implements HeaderStrategy {
  readonly source = "ocr" as const;

  constructor(
    private readonly alignmentThreshold = 0.65,
    private readonly previewRows = 20,
  ) {}

  async resolve({
    headerLines,
    bodyLines,
  }: HeaderContext): Promise<Result<HeaderSpec, ResolutionFailure>> {
    const found = findHeaderLine(headerLines);
    if (!found) return err({ source: this.source, reason: "no_header_line" });

    const columns = toRoles(found.cells);
    const violation = findColumnViolation(columns, {
      required: ["name", "result", "unit"],
      requireRange: true,
    });
    if (violation) return err({ source: this.source, reason: violation });

    const header: HeaderSpec = {
      columns,
      centers: found.cells.map((c) => c.center),
      source: this.source,
      valid: true,
      headerLineIndex: found.line.index,
    };

    const score = alignmentScore(header, bodyLines.slice(0, this.previewRows));
    if (score < this.alignmentThreshold) {
      return err({ source: this.source, reason: `alignment:${score.toFixed(2)}` });
    }
    return ok(header);
  }
}
