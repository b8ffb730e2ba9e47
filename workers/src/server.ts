/**
 * HTTP surface: health check, synchronous extraction and queueing.
 */

import express, { type Express, type Request, type Response } from "express";
import type { z } from "zod";
import { extractRequestSchema, queueRequestSchema } from "./extraction/schemas.js";
import { extractLabReport } from "./extraction/pipeline.js";
import type { HeaderChatClient } from "./extraction/header/llm-header.js";
import type { QueueDocumentParams } from "./queues.js";

export interface ServerDeps {
  version: string;
  /** Client for the LLM header tier, null when unavailable */
  llm: HeaderChatClient | null;
  queueDocument: (params: QueueDocumentParams) => Promise<string>;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(
    (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
  );
}

export function createApp(deps: ServerDeps): Express {
  const app = express();
  app.use(express.json({ limit: "10mb" }));

  // ==========================================================================
  // Health & Status Endpoints
  // ==========================================================================

  /**
   * Health check endpoint
   *
   * Returns worker version and status for monitoring and retry logic.
   */
  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      version: deps.version,
      status: "healthy",
      timestamp: new Date().toISOString(),
    });
  });

  // ==========================================================================
  // Extraction Endpoints
  // ==========================================================================

  /**
   * Extract one document synchronously
   */
  app.post("/extract", async (req: Request, res: Response) => {
    const parsed = extractRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: "Invalid extraction request",
        issues: formatIssues(parsed.error),
      });
      return;
    }

    const { documentId = "inline", tokens, options } = parsed.data;
    try {
      const result = await extractLabReport(tokens, {
        ...options,
        llm: deps.llm,
      });
      console.log(
        `[Server] Extracted ${documentId}: ${result.qa.status}, ${result.tests.length} tests`,
      );
      res.json(result);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      console.error(`[Server] Extraction failed for ${documentId}:`, errorMessage);
      res.status(500).json({
        error: "Extraction failed",
        message: errorMessage,
      });
    }
  });

  /**
   * Queue a document for asynchronous extraction
   */
  app.post("/queue", async (req: Request, res: Response) => {
    const parsed = queueRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: "Invalid queue request",
        issues: formatIssues(parsed.error),
      });
      return;
    }

    try {
      const jobId = await deps.queueDocument(parsed.data);
      res.json({
        success: true,
        jobId,
        documentId: parsed.data.documentId,
      });
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      console.error("[Queue] Failed to queue document:", errorMessage);
      res.status(500).json({
        error: "Failed to queue document",
        message: errorMessage,
      });
    }
  });

  return app;
}
