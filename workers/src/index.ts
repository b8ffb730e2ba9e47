/**
 * Worker Entry Point
 *
 * HTTP server for health checks and extraction requests.
 * Starts the lab extract worker.
 */

import "dotenv/config";
import { createApp } from "./server.js";
import { labExtractWorker } from "./workers/lab-extract.js";
import { closeQueues, queueDocumentForExtraction } from "./queues.js";
import { LLMClient } from "./llm/index.js";
import { getDefaultConfig } from "./llm/types.js";
import { getDefaultExtractionConfig } from "./extraction/config.js";

const PORT = process.env.PORT || 8080;
const WORKER_VERSION = process.env.WORKER_VERSION || "local-dev";

function createHeaderClient(): LLMClient | null {
  try {
    return new LLMClient();
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : String(error);
    console.warn(`[Server] LLM header tier disabled: ${errorMsg}`);
    return null;
  }
}

const app = createApp({
  version: WORKER_VERSION,
  llm: createHeaderClient(),
  queueDocument: queueDocumentForExtraction,
});

// ============================================================================
// Server Startup
// ============================================================================

const server = app.listen(PORT, () => {
  console.log(`[Server] Worker listening on port ${PORT}`);
  console.log(`[Server] Version: ${WORKER_VERSION}`);
  console.log(`[Server] Redis: ${process.env.REDIS_URL || "redis://localhost:6379"}`);

  const llmConfig = getDefaultConfig();
  const extractionConfig = getDefaultExtractionConfig();

  console.log(`[Server] text.provider: ${llmConfig.text.provider}`);
  console.log(`[Server] text.model: ${llmConfig.text.model}`);
  console.log(`[Server] text.endpoint: ${llmConfig.text.endpoint}`);
  console.log(`[Server] cache.enabled: ${llmConfig.cache.enabled}`);
  console.log(`[Server] cache.dir: ${llmConfig.cache.dir}`);
  console.log(`[Server] cache.maxAgeMs: ${llmConfig.cache.maxAgeMs}`);
  console.log(
    `[Server] extraction: ${JSON.stringify(extractionConfig)}`,
  );

  console.log("[Server] Lab extract worker started");
});

// ============================================================================
// Graceful Shutdown
// ============================================================================

async function shutdown(signal: string): Promise<void> {
  console.log(`[Server] Received ${signal}, shutting down gracefully...`);

  // Stop accepting new connections
  server.close();

  await labExtractWorker.close();

  // Close queues and Redis connection
  await closeQueues();

  console.log("[Server] Shutdown complete");
  process.exit(0);
}

function requestShutdown(signal: string): void {
  shutdown(signal).catch((error: unknown) => {
    console.error("[Server] Shutdown failed:", error);
    process.exit(1);
  });
}

process.on("SIGTERM", () => requestShutdown("SIGTERM"));
process.on("SIGINT", () => requestShutdown("SIGINT"));

// Handle uncaught errors
process.on("uncaughtException", (error) => {
  console.error("[Server] Uncaught exception:", error);
  requestShutdown("uncaughtException");
});

process.on("unhandledRejection", (reason, promise) => {
  console.error("[Server] Unhandled rejection at:", promise, "reason:", reason);
});
