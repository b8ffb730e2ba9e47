/**
 * Lab Extract Worker
 *
 * Runs the extraction pipeline for one queued document. Documents are
 * processed in parallel up to the worker concurrency; a single document is
 * always processed sequentially.
 *
 * Input:
 * - OCR tokens of the document, optional extraction overrides
 *
 * Output:
 * - ExtractionResult (metadata, tests, header, qa)
 */

import { Worker, Job } from "bullmq";
import { connection, LAB_EXTRACT_QUEUE } from "../queues.js";
import { LLMClient } from "../llm/index.js";
import type { LabExtractJobData } from "../types.js";
import type { ExtractionResult } from "../extraction/types.js";
import { extractLabReport } from "../extraction/pipeline.js";

/**
 * The LLM header tier is optional: a missing API key disables it instead of
 * failing the job.
 */
function createHeaderClient(documentId: string): LLMClient | null {
  try {
    return new LLMClient();
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : String(error);
    console.warn(
      `[LabExtract] LLM header tier unavailable for ${documentId}: ${errorMsg}`,
    );
    return null;
  }
}

/**
 * Lab extract job processor
 */
async function processLabExtractJob(
  job: Job<LabExtractJobData, ExtractionResult>,
): Promise<ExtractionResult> {
  const { documentId, tokens, options } = job.data;

  console.log(
    `[LabExtract] Extracting document ${documentId} (${tokens.length} tokens)`,
  );

  try {
    const result = await extractLabReport(tokens, {
      ...options,
      llm: createHeaderClient(documentId),
    });

    console.log(
      `[LabExtract] Document ${documentId}: ${result.qa.status}, ${result.tests.length} tests, header ${result.header?.source ?? "none"}`,
    );
    return result;
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : String(error);
    console.error(
      `[LabExtract] Extraction failed for ${documentId}:`,
      errorMsg,
    );
    throw error;
  }
}

export const labExtractWorker = new Worker<LabExtractJobData, ExtractionResult>(
  LAB_EXTRACT_QUEUE,
  processLabExtractJob,
  {
    connection,
    concurrency: parseInt(process.env.LAB_EXTRACT_CONCURRENCY || "4", 10),
  },
);

labExtractWorker.on("completed", (job) => {
  console.log(`[LabExtract] Job ${job.id} completed`);
});

labExtractWorker.on("failed", (job, error) => {
  console.error(`[LabExtract] Job ${job?.id} failed:`, error.message);
});

export { processLabExtractJob };
