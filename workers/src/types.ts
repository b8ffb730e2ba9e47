/**
 * Message Types for Worker Communication
 *
 * Defines the contracts between the HTTP surface, the queue and the
 * extraction worker.
 */

import type { ExtractionOptions } from "./extraction/schemas.js";
import type { OcrToken } from "./extraction/types.js";

// ============================================================================
// Queue → Worker Input
// ============================================================================

export interface LabExtractJobData {
  documentId: string;
  /** OCR tokens of the whole document, one shared coordinate system */
  tokens: OcrToken[];
  /** Per-document overrides of the extraction settings */
  options?: ExtractionOptions;
  /** Source of the job (api, upload, batch) */
  source?: JobSource;
}

// ============================================================================
// Job Priority
// ============================================================================

export type JobSource = "api" | "upload" | "batch";

export const JOB_PRIORITY: Record<JobSource, number> = {
  api: 1, // Highest - caller is waiting
  upload: 5,
  batch: 10, // Lowest - bulk re-extraction
};
