import type { BodyRow } from "./types.js";
import { UNKNOWN } from "./types.js";
import { RANGE_RE } from "./patterns.js";

/**
 * Fills min/max from the reference cell. Rows whose header already has
 * min and max columns keep them as they are.
 */
export function splitReference(row: BodyRow): BodyRow {
  if (row.min !== undefined && row.max !== undefined) {
    return { ...row, refOrigin: "header_min_max" };
  }

  if (row.reference === UNKNOWN) {
    return { ...row, min: UNKNOWN, max: UNKNOWN, refOrigin: "ref_unknown" };
  }

  const match = RANGE_RE.exec(row.reference);
  if (!match) {
    return { ...row, min: UNKNOWN, max: UNKNOWN, refOrigin: "ref_unparsed" };
  }

  const [, min, max] = match;
  return { ...row, min, max, refOrigin: "ref_split" };
}
