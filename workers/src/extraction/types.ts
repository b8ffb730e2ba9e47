/**
 * Lab Table Extraction Types
 *
 * Shared contracts between the pipeline stages, from raw OCR tokens
 * to the final ExtractionResult.
 */

// ============================================================================
// OCR Input
// ============================================================================

export interface BBox {
  top: number;
  bottom: number;
  left: number;
  right: number;
}

/** One OCR-recognized text span, as delivered by the OCR collaborator */
export interface OcrToken {
  text: string;
  /** Recognition confidence 0-1 */
  confidence: number;
  bbox: BBox;
}

// ============================================================================
// Assembled Lines
// ============================================================================

export type TokenOrigin =
  | "ocr"
  | "split_value"
  | "split_unit_candidate"
  | "merged_name";

export type ValueFlag = "H" | "L" | "N";

export interface Token {
  text: string;
  confidence: number;
  bbox: BBox;
  xCenter: number;
  yCenter: number;
  height: number;
  origin: TokenOrigin;
  /** Set on bare numeric tokens carrying an H/L/N flag (e.g. "12.3H") */
  valueNum?: number;
  valueFlag?: ValueFlag;
}

export interface Line {
  index: number;
  /** Sorted left to right */
  tokens: Token[];
}

// ============================================================================
// Header Resolution
// ============================================================================

export const ROLES = [
  "name",
  "unit",
  "result",
  "reference",
  "min",
  "max",
] as const;

export type Role = (typeof ROLES)[number];

export type HeaderSource = "ocr" | "inferred" | "llm";

export interface HeaderSpec {
  /** Role per column, null for columns carrying no role (flags, notes) */
  columns: Array<Role | null>;
  /** x-center per column, same length as columns */
  centers: number[];
  source: HeaderSource;
  valid: boolean;
  /** Line index of the OCR header line, when source is "ocr" */
  headerLineIndex?: number;
}

export interface ResolutionFailure {
  source: HeaderSource;
  reason: string;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

// ============================================================================
// Body Rows
// ============================================================================

export const UNKNOWN = "UNKNOWN";

export type RowFix = "truncate_tail" | "pad_unknown";

export type RefOrigin =
  | "header_min_max"
  | "ref_unknown"
  | "ref_split"
  | "ref_unparsed";

export interface BodyRow {
  /** Canonical test code from the body locator */
  code: string;
  /** Column-ordered cell texts, followed by any overflow cells */
  cells: string[];
  name: string;
  result: string;
  unit: string;
  reference: string;
  min?: string;
  max?: string;
  srcLine: number;
  srcTokens: Partial<Record<Role, Token[]>>;
  /** Confidence of the token(s) supplying the result cell */
  resultConfidence: number;
  rowFix?: RowFix;
  droppedExtra?: string[];
  refOrigin?: RefOrigin;
  resultNorm?: number | null;
  minNorm?: number | null;
  maxNorm?: number | null;
  unitCanonical?: string | null;
}

// ============================================================================
// Output
// ============================================================================

export interface TestRecord {
  code: string;
  value: number;
  unit: string;
  reference_min: number | null;
  reference_max: number | null;
  value_confidence: number;
}

export interface DocumentMetadata {
  hospital_name?: string;
  client_name?: string;
  patient_name?: string;
  inspection_date?: string;
}

export type RejectionReason =
  | "unknown_value"
  | "low_confidence"
  | "duplicated_code_kept_last";

export type ExtractionStatus = "ok" | "no_tokens" | "no_body" | "no_header";

export interface HeaderAttempt {
  source: HeaderSource;
  ok: boolean;
  reason?: string;
}

export interface QaSummary {
  status: ExtractionStatus;
  lines: number;
  bodyStartIndex: number | null;
  bodyLines: number;
  prunedBodyLines: number;
  rows: number;
  truncatedRows: number;
  shortRows: number;
  paddedRows: number;
  /** Fraction of rows whose unit resolved against the lexicon */
  unitCanonicalCoverage: number;
  /** Fraction of rows with a numeric result */
  resultNormCoverage: number;
  removed: Record<RejectionReason, number>;
  rejected: Array<{ code: string; reason: RejectionReason; line: number }>;
  headerAttempts: HeaderAttempt[];
}

export interface ExtractionResult {
  metadata: DocumentMetadata;
  tests: TestRecord[];
  header: { source: HeaderSource; columns: Array<Role | null> } | null;
  qa: QaSummary;
}
