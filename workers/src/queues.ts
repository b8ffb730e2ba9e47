/**
 * Core BullMQ connection and the lab extraction queue.
 */

import { Queue } from "bullmq";
import { Redis } from "ioredis";
import type { LabExtractJobData } from "./types.js";
import { JOB_PRIORITY } from "./types.js";
import type { ExtractionResult } from "./extraction/types.js";

export const LAB_EXTRACT_QUEUE = "lab-extract";

// Redis connection (shared by the queue and the worker)
export const connection = new Redis(
  process.env.REDIS_URL || "redis://localhost:6379",
  {
    maxRetriesPerRequest: null, // Required for BullMQ
    enableReadyCheck: false,
  },
);

connection.on("error", (err: Error) => {
  console.error("[Redis] Connection error:", err.message);
});

connection.on("connect", () => {
  console.log("[Redis] Connected");
});

export const labExtractQueue = new Queue<LabExtractJobData, ExtractionResult>(
  LAB_EXTRACT_QUEUE,
  {
    connection,
    defaultJobOptions: {
      attempts: 2,
      backoff: {
        type: "exponential",
        delay: 3000,
      },
      removeOnComplete: {
        age: 24 * 60 * 60, // Keep completed jobs for 24 hours
        count: 1000,
      },
      removeOnFail: {
        age: 7 * 24 * 60 * 60, // Keep failed jobs for 7 days
      },
    },
  },
);

export interface QueueDocumentParams extends LabExtractJobData {
  priority?: number;
}

/**
 * Queues one document's OCR tokens for extraction.
 * The job id is derived from the document id, so re-queueing a document
 * is a no-op while its job is still kept: waiting, active, completed
 * within the last 24 hours or failed within the last 7 days.
 */
export async function queueDocumentForExtraction(
  params: QueueDocumentParams,
): Promise<string> {
  const { documentId, tokens, options, source = "api", priority } = params;

  const job = await labExtractQueue.add(
    "extract",
    { documentId, tokens, options, source },
    {
      jobId: `${documentId}-lab-extract`,
      priority: priority ?? JOB_PRIORITY[source],
    },
  );

  console.log(
    `[Queues] Queued document ${documentId} (${tokens.length} tokens, source ${source})`,
  );

  return job.id ?? `${documentId}-lab-extract`;
}

// Graceful shutdown
export async function closeQueues(): Promise<void> {
  await labExtractQueue.close();
  await connection.quit();
  console.log("[Queues] Closed");
}
