/**
 * Header Resolver
 *
 * Runs the header tiers in order (OCR header line, geometric inference,
 * LLM) and keeps the first success. Every attempt is recorded for QA.
 */

import type { HeaderAttempt, HeaderSpec } from "../types.js";
import type { HeaderContext, HeaderStrategy } from "./strategy.js";

export interface HeaderResolution {
  header: HeaderSpec | null;
  attempts: HeaderAttempt[];
}

export async function resolveHeader(
  context: HeaderContext,
  strategies: HeaderStrategy[],
  verbose = false,
): Promise<HeaderResolution> {
  const attempts: HeaderAttempt[] = [];

  for (const strategy of strategies) {
    const result = await strategy.resolve(context);
    if (result.ok) {
      attempts.push({ source: strategy.source, ok: true });
      if (verbose) {
        console.log(
          `[HeaderResolver] ${strategy.source} header: ${result.value.columns
            .map((role) => role ?? "-")
            .join(" | ")}`,
        );
      }
      return { header: result.value, attempts };
    }

    attempts.push({
      source: strategy.source,
      ok: false,
      reason: result.error.reason,
    });
    if (verbose) {
      console.log(
        `[HeaderResolver] ${strategy.source} tier failed: ${result.error.reason}`,
      );
    }
  }

  return { header: null, attempts };
}

export type { HeaderContext, HeaderStrategy } from "./strategy.js";
export { OcrHeaderStrategy } from "./ocr-header.js";
export { InferredHeaderStrategy } from "./inferred-header.js";
export { LlmHeaderStrategy } from "./llm-header.js";
