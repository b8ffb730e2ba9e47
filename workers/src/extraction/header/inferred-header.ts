/**
 * Inferred header tier: clusters body token x-centers into columns and
 * scores each column by the share of cells that look like a unit, a range
 * or a number.
 */

import type {
  HeaderSpec,
  ResolutionFailure,
  Result,
  Role,
} from "../types.js";
import { err, ok } from "../types.js";
import {
  isDateLike,
  isNumericCell,
  isRangeCell,
  isUnitLike,
} from "../patterns.js";
import {
  assignCells,
  cellText,
  clusterColumns,
  findColumnViolation,
} from "./columns.js";
import type { HeaderContext, HeaderStrategy } from "./strategy.js";

export interface InferenceThresholds {
  unit: number;
  reference: number;
  result: number;
  /** Added to every threshold when fewer sample lines are available */
  shortTableBonus: number;
  minRowsForInference: number;
  /** Score bonus for a result column directly left of the unit column */
  resultLeftOfUnitBonus: number;
  /** Minimum numeric share for the unit-neighbour result fallback */
  fallbackResultMinRatio: number;
  sampleRows: number;
}

export const DEFAULT_INFERENCE_THRESHOLDS: InferenceThresholds = {
  unit: 0.7,
  reference: 0.5,
  result: 0.6,
  shortTableBonus: 0.05,
  minRowsForInference: 8,
  resultLeftOfUnitBonus: 0.05,
  fallbackResultMinRatio: 0.45,
  sampleRows: 20,
};

export interface ColumnProfile {
  index: number;
  center: number;
  unit: number;
  range: number;
  numeric: number;
  date: number;
}

function bestBy(
  profiles: ColumnProfile[],
  score: (p: ColumnProfile) => number,
  preferRight = false,
): { profile: ColumnProfile; score: number } | null {
  let best: { profile: ColumnProfile; score: number } | null = null;
  for (const profile of profiles) {
    const s = score(profile);
    if (!best || s > best.score || (preferRight && s === best.score)) {
      best = { profile, score: s };
    }
  }
  return best;
}

export class InferredHeaderStrategy implements HeaderStrategy {
  readonly source = "inferred" as const;

  constructor(
    private readonly thresholds: InferenceThresholds = DEFAULT_INFERENCE_THRESHOLDS,
  ) {}

  /**
   * Per-column share of unit-like, range-like, numeric and date-like cells.
   * Column 0 holds the test codes and is not profiled.
   */
  profileColumns(context: HeaderContext): ColumnProfile[] {
    const sample = context.bodyLines.slice(0, this.thresholds.sampleRows);
    const centers = clusterColumns(sample).map((band) => band.center);
    if (sample.length === 0) return [];

    const texts = sample.map((line) =>
      assignCells(line, centers).cells.map(cellText),
    );
    const share = (index: number, test: (text: string) => boolean) =>
      texts.filter((row) => test(row[index] ?? "")).length / texts.length;

    return centers.map((center, index) => ({
      index,
      center,
      unit: share(index, isUnitLike),
      range: share(index, isRangeCell),
      numeric: share(index, isNumericCell),
      date: share(index, isDateLike),
    }));
  }

  async resolve(
    context: HeaderContext,
  ): Promise<Result<HeaderSpec, ResolutionFailure>> {
    const fail = (reason: string) => err({ source: this.source, reason });
    const t = this.thresholds;

    const profiles = this.profileColumns(context);
    if (profiles.length < 2) return fail("too_few_columns");

    const sampled = Math.min(context.bodyLines.length, t.sampleRows);
    const bonus = sampled < t.minRowsForInference ? t.shortTableBonus : 0;
    const candidates = profiles.slice(1);

    const unit = bestBy(candidates, (p) => p.unit, true);
    if (!unit || unit.score < t.unit + bonus) return fail("no_unit_column");
    const unitIndex = unit.profile.index;

    const reference = bestBy(
      candidates.filter((p) => p.index !== unitIndex),
      (p) => p.range,
    );
    const referenceIndex =
      reference && reference.score >= t.reference + bonus
        ? reference.profile.index
        : -1;

    const remaining = candidates.filter(
      (p) => p.index !== unitIndex && p.index !== referenceIndex,
    );
    const result = bestBy(
      remaining,
      (p) =>
        p.numeric +
        (p.index === unitIndex - 1 ? t.resultLeftOfUnitBonus : 0) -
        0.5 * p.date,
    );

    let resultIndex =
      result && result.score >= t.result + bonus ? result.profile.index : -1;

    if (resultIndex < 0) {
      // fall back to the unit column's direct neighbours
      const neighbours = remaining.filter(
        (p) => Math.abs(p.index - unitIndex) === 1,
      );
      const fallback = bestBy(neighbours, (p) => p.numeric);
      if (fallback && fallback.score >= t.fallbackResultMinRatio) {
        resultIndex = fallback.profile.index;
      }
    }
    if (resultIndex < 0) return fail("no_result_column");

    const columns: Array<Role | null> = profiles.map(() => null);
    columns[0] = "name";
    columns[unitIndex] = "unit";
    columns[resultIndex] = "result";
    if (referenceIndex >= 0) columns[referenceIndex] = "reference";

    const violation = findColumnViolation(columns, {
      required: ["name", "result", "unit"],
    });
    if (violation) return fail(violation);

    return ok({
      columns,
      centers: profiles.map((p) => p.center),
      source: this.source,
      valid: true,
    });
  }
}
