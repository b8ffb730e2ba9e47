/**
 * Row Normalizer
 *
 * Brings every row to the header's column count K: longer rows lose their
 * tail, shorter rows are left alone or padded depending on the policy.
 */

import type { BodyRow, HeaderSpec } from "./types.js";
import { UNKNOWN } from "./types.js";

export const SHORT_ROW_POLICIES = ["leave", "pad_unknown"] as const;

export type ShortRowPolicy = (typeof SHORT_ROW_POLICIES)[number];

export interface RowNormalization {
  rows: BodyRow[];
  columnCount: number;
  truncatedRows: number;
  shortRows: number;
  paddedRows: number;
}

export function normalizeRows(
  rows: BodyRow[],
  header: HeaderSpec | null,
  policy: ShortRowPolicy = "leave",
): RowNormalization {
  const columnCount = header?.columns.length ?? rows[0]?.cells.length ?? 0;
  let truncatedRows = 0;
  let shortRows = 0;
  let paddedRows = 0;

  const normalized = rows.map((row): BodyRow => {
    const length = row.cells.length;

    if (length > columnCount) {
      truncatedRows++;
      return {
        ...row,
        cells: row.cells.slice(0, columnCount),
        droppedExtra: row.cells.slice(columnCount),
        rowFix: "truncate_tail",
      };
    }

    if (length < columnCount) {
      if (policy === "pad_unknown") {
        paddedRows++;
        return {
          ...row,
          cells: [
            ...row.cells,
            ...Array.from({ length: columnCount - length }, () => UNKNOWN),
          ],
          rowFix: "pad_unknown",
        };
      }
      shortRows++;
    }

    return row;
  });

  return { rows: normalized, columnCount, truncatedRows, shortRows, paddedRows };
}
