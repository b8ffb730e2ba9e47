/**
 * Final Filter & Assembler
 *
 * Drops rows without a usable value, below the confidence threshold, or
 * superseded by a later row of the same code and unit, and turns the
 * survivors into TestRecords. A code printed once as % and once as an
 * absolute count keeps both rows.
 */

import type {
  BodyRow,
  QaSummary,
  RejectionReason,
  TestRecord,
} from "./types.js";
import { UNKNOWN } from "./types.js";
import { isCanonicalUnit } from "./reference/unit-lexicon.js";

export interface FilterOutcome {
  tests: TestRecord[];
  removed: QaSummary["removed"];
  rejected: QaSummary["rejected"];
}

function emptyRemoved(): Record<RejectionReason, number> {
  return { unknown_value: 0, low_confidence: 0, duplicated_code_kept_last: 0 };
}

function toTestRecord(row: BodyRow, value: number): TestRecord {
  const unit = row.unitCanonical ?? (row.unit === UNKNOWN ? "" : row.unit);
  return {
    code: row.code,
    value,
    unit,
    reference_min: row.minNorm ?? null,
    reference_max: row.maxNorm ?? null,
    value_confidence: row.resultConfidence,
  };
}

export function filterRows(
  rows: BodyRow[],
  confidenceThreshold: number,
): FilterOutcome {
  const removed = emptyRemoved();
  const rejected: QaSummary["rejected"] = [];
  const reject = (row: BodyRow, reason: RejectionReason) => {
    removed[reason]++;
    rejected.push({ code: row.code, reason, line: row.srcLine });
  };

  const kept: Array<{ row: BodyRow; record: TestRecord }> = [];
  for (const row of rows) {
    const value = row.resultNorm;
    if (value === null || value === undefined) {
      reject(row, "unknown_value");
    } else if (row.resultConfidence < confidenceThreshold) {
      reject(row, "low_confidence");
    } else {
      kept.push({ row, record: toTestRecord(row, value) });
    }
  }

  const dedupKey = (record: TestRecord) => `${record.code}\u0000${record.unit.trim()}`;
  const lastIndexByKey = new Map<string, number>();
  kept.forEach(({ record }, i) => lastIndexByKey.set(dedupKey(record), i));

  const tests: TestRecord[] = [];
  kept.forEach(({ row, record }, i) => {
    if (lastIndexByKey.get(dedupKey(record)) !== i) {
      reject(row, "duplicated_code_kept_last");
    } else {
      tests.push(record);
    }
  });

  return { tests, removed, rejected };
}

function ratio(count: number, total: number): number {
  return total === 0 ? 0 : Math.round((count / total) * 1000) / 1000;
}

export function rowCoverage(rows: BodyRow[]): Pick<
  QaSummary,
  "unitCanonicalCoverage" | "resultNormCoverage"
> {
  const canonicalUnits = rows.filter(
    (row) => row.unitCanonical != null && isCanonicalUnit(row.unitCanonical),
  ).length;
  const numericResults = rows.filter(
    (row) => row.resultNorm !== null && row.resultNorm !== undefined,
  ).length;
  return {
    unitCanonicalCoverage: ratio(canonicalUnits, rows.length),
    resultNormCoverage: ratio(numericResults, rows.length),
  };
}

export { emptyRemoved };
