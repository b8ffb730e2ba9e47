/**
 * Lab Table Extraction Pipeline
 *
 * Turns the OCR tokens of one lab report into an ExtractionResult.
 *
 * Stages (fixed order):
 * 1. Token Assembler: tokens → lines
 * 2. Body Locator: first line starting with a known test code
 * 3. Header Resolver: OCR header line → geometric inference → LLM
 * 4. Metadata Extractor: hospital / client / patient / date above the body
 * 5. Table Filler → 6. Row Normalizer → 7. Reference Splitter
 * 8. Unit/Value Normalizer → 9. Final Filter & Assembler
 *
 * Structural failures (no tokens, no body, no header) come back as a
 * result with empty tests and the matching qa.status; they never throw.
 */

import type {
  ExtractionResult,
  ExtractionStatus,
  OcrToken,
  QaSummary,
} from "./types.js";
import { resolveExtractionConfig, type ExtractionConfig } from "./config.js";
import type { ExtractionOptions } from "./schemas.js";
import { assembleLines } from "./token-assembler.js";
import { locateBody } from "./body-locator.js";
import {
  InferredHeaderStrategy,
  LlmHeaderStrategy,
  OcrHeaderStrategy,
  resolveHeader,
  type HeaderStrategy,
} from "./header/index.js";
import type { HeaderChatClient } from "./header/llm-header.js";
import { extractMetadata } from "./metadata-extractor.js";
import { fillRows } from "./table-filler.js";
import { normalizeRows } from "./row-normalizer.js";
import { splitReference } from "./reference-splitter.js";
import { normalizeRowValues } from "./unit-normalizer.js";
import { emptyRemoved, filterRows, rowCoverage } from "./final-filter.js";

export interface PipelineOptions extends ExtractionOptions {
  /** Client for the LLM header tier; the tier fails as unavailable without one */
  llm?: HeaderChatClient | null;
  /** Cancels the LLM header tier */
  signal?: AbortSignal;
  /** Log stage boundaries */
  verbose?: boolean;
}

function emptyQa(status: ExtractionStatus, lines: number): QaSummary {
  return {
    status,
    lines,
    bodyStartIndex: null,
    bodyLines: 0,
    prunedBodyLines: 0,
    rows: 0,
    truncatedRows: 0,
    shortRows: 0,
    paddedRows: 0,
    unitCanonicalCoverage: 0,
    resultNormCoverage: 0,
    removed: emptyRemoved(),
    rejected: [],
    headerAttempts: [],
  };
}

export function buildHeaderStrategies(
  config: ExtractionConfig,
  llm: HeaderChatClient | null,
): HeaderStrategy[] {
  const strategies: HeaderStrategy[] = [
    new OcrHeaderStrategy(config.alignmentThreshold),
    new InferredHeaderStrategy(),
  ];
  if (config.llmFallback) {
    strategies.push(new LlmHeaderStrategy(llm, config.llmTimeoutMs));
  }
  return strategies;
}

export async function extractLabReport(
  tokens: OcrToken[],
  options: PipelineOptions = {},
): Promise<ExtractionResult> {
  const { llm = null, signal, verbose = false, ...overrides } = options;
  const config = resolveExtractionConfig(overrides);
  const log = (message: string) => {
    if (verbose) console.log(`[Pipeline] ${message}`);
  };

  // 1. Lines
  const lines = assembleLines(tokens, {
    minTokenConfidence: config.minTokenConfidence,
    lineHeightFactor: config.lineHeightFactor,
  });
  log(`${tokens.length} tokens → ${lines.length} lines`);
  if (lines.length === 0) {
    return { metadata: {}, tests: [], header: null, qa: emptyQa("no_tokens", 0) };
  }

  // 2. Body
  const location = locateBody(lines);
  if (!location) {
    log("No test code found, no table body");
    return {
      metadata: {},
      tests: [],
      header: null,
      qa: emptyQa("no_body", lines.length),
    };
  }
  log(
    `Body starts at line ${location.bodyStartIndex} (${location.bodyLines.length} lines, ${location.prunedLineIndices.length} pruned)`,
  );

  // 3. Header, 4. Metadata
  const { header, attempts } = await resolveHeader(
    { headerLines: location.headerLines, bodyLines: location.bodyLines, signal },
    buildHeaderStrategies(config, llm),
    verbose,
  );
  const metadata = extractMetadata(location.headerLines);

  const qa: QaSummary = {
    ...emptyQa("ok", lines.length),
    bodyStartIndex: location.bodyStartIndex,
    bodyLines: location.bodyLines.length,
    prunedBodyLines: location.prunedLineIndices.length,
    headerAttempts: attempts,
  };

  if (!header) {
    log("No header tier succeeded");
    return { metadata, tests: [], header: null, qa: { ...qa, status: "no_header" } };
  }

  // 5-8. Rows
  const drafts = fillRows(location.bodyLines, header);
  const normalized = normalizeRows(drafts, header, config.shortRowPolicy);
  const rows = normalized.rows.map(splitReference).map(normalizeRowValues);
  log(`${rows.length} rows filled (K=${normalized.columnCount})`);

  // 9. Filter
  const { tests, removed, rejected } = filterRows(rows, config.confidenceThreshold);
  log(`${tests.length} tests kept, ${rejected.length} rejected`);

  return {
    metadata,
    tests,
    header: { source: header.source, columns: header.columns },
    qa: {
      ...qa,
      rows: rows.length,
      truncatedRows: normalized.truncatedRows,
      shortRows: normalized.shortRows,
      paddedRows: normalized.paddedRows,
      ...rowCoverage(rows),
      removed,
      rejected,
    },
  };
}
