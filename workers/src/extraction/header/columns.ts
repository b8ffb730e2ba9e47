/**
 * Column geometry: 1-D clustering of token x-centers into column bands and
 * assignment of a line's tokens to known column centers.
 */

import type { Line, Role, Token } from "../types.js";
import { mean, median } from "../patterns.js";

export interface ColumnBand {
  center: number;
  min: number;
  max: number;
  count: number;
}

export interface CellAssignment {
  /** Tokens per column, same length as the centers */
  cells: Token[][];
  /** Tokens to the right of the last column */
  overflow: Token[];
}

const MIN_BAND_GAP = 24;

/**
 * Clusters every token x-center of the given lines into column bands.
 * A gap wider than max(24, half the median token width) opens a new band.
 */
export function clusterColumns(lines: Line[]): ColumnBand[] {
  const tokens = lines.flatMap((line) => line.tokens);
  if (tokens.length === 0) return [];

  const widths = tokens.map((t) => t.bbox.right - t.bbox.left);
  const gapThreshold = Math.max(MIN_BAND_GAP, 0.5 * median(widths));
  const xs = tokens.map((t) => t.xCenter).sort((a, b) => a - b);

  const bands: number[][] = [[xs[0]]];
  for (let i = 1; i < xs.length; i++) {
    const x = xs[i];
    if (x - xs[i - 1] > gapThreshold) {
      bands.push([x]);
    } else {
      bands[bands.length - 1].push(x);
    }
  }

  return bands.map((band) => ({
    center: mean(band),
    min: band[0],
    max: band[band.length - 1],
    count: band.length,
  }));
}

function nearestColumn(centers: number[], x: number): number {
  let best = 0;
  for (let i = 1; i < centers.length; i++) {
    if (Math.abs(centers[i] - x) < Math.abs(centers[best] - x)) best = i;
  }
  return best;
}

/**
 * Assigns each token of a line to its nearest column center. The leading
 * token (the test code) always goes to `nameColumn`. Tokens beyond the last
 * center by more than one average column spacing overflow.
 */
export function assignCells(
  line: Line,
  centers: number[],
  nameColumn = 0,
): CellAssignment {
  const cells: Token[][] = centers.map(() => []);
  if (centers.length === 0) return { cells, overflow: [...line.tokens] };

  const first = centers[0];
  const last = centers[centers.length - 1];
  const spacing =
    centers.length > 1 ? (last - first) / (centers.length - 1) : Infinity;
  const overflow: Token[] = [];

  line.tokens.forEach((token, i) => {
    if (i === 0) {
      cells[nameColumn].push(token);
    } else if (token.xCenter > last + spacing) {
      overflow.push(token);
    } else {
      cells[nearestColumn(centers, token.xCenter)].push(token);
    }
  });

  return { cells, overflow };
}

export function cellText(tokens: Token[]): string {
  return tokens.map((t) => t.text).join(" ");
}

export interface ColumnRequirements {
  required: Role[];
  /** Either a reference column or both min and max */
  requireRange?: boolean;
}

/**
 * Checks role uniqueness, the reference vs (min, max) exclusivity and the
 * required roles. Returns the first violation, or null.
 */
export function findColumnViolation(
  columns: Array<Role | null>,
  { required, requireRange = false }: ColumnRequirements,
): string | null {
  const seen = new Set<Role>();
  for (const role of columns) {
    if (role === null) continue;
    if (seen.has(role)) return `duplicate_role:${role}`;
    seen.add(role);
  }

  if (seen.has("reference") && (seen.has("min") || seen.has("max"))) {
    return "reference_conflicts_min_max";
  }
  if (seen.has("min") !== seen.has("max")) return "incomplete_min_max";

  for (const role of required) {
    if (!seen.has(role)) return `missing_role:${role}`;
  }
  if (requireRange && !seen.has("reference") && !seen.has("min")) {
    return "missing_range";
  }
  return null;
}
