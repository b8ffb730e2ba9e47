/**
 * Extraction settings, read from the environment and overridable per
 * request.
 */

import { z } from "zod";
import { SHORT_ROW_POLICIES } from "./row-normalizer.js";

export const DEFAULT_LLM_TIMEOUT_MS = 15_000;

export const extractionConfigSchema = z.object({
  /** OCR tokens below this confidence are discarded before line assembly */
  minTokenConfidence: z.number().min(0).max(1),
  /** Rows whose result confidence is below this are rejected */
  confidenceThreshold: z.number().min(0).max(1),
  shortRowPolicy: z.enum(SHORT_ROW_POLICIES),
  llmTimeoutMs: z.number().int().positive(),
  /** Enables the LLM header tier */
  llmFallback: z.boolean(),
  /** Fraction of the median token height used as the line band */
  lineHeightFactor: z.number().positive(),
  /** Minimum header/body type agreement for the OCR header tier */
  alignmentThreshold: z.number().min(0).max(1),
});

export type ExtractionConfig = z.infer<typeof extractionConfigSchema>;

function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  return Number(raw);
}

/**
 * Get default configuration from environment
 */
export function getDefaultExtractionConfig(): ExtractionConfig {
  return extractionConfigSchema.parse({
    minTokenConfidence: envNumber("LAB_MIN_TOKEN_CONFIDENCE", 0.5),
    confidenceThreshold: envNumber("LAB_CONFIDENCE_THRESHOLD", 0.94),
    shortRowPolicy: process.env.LAB_SHORT_ROW_POLICY || "leave",
    llmTimeoutMs: envNumber("LAB_LLM_TIMEOUT_MS", DEFAULT_LLM_TIMEOUT_MS),
    llmFallback: process.env.LAB_LLM_FALLBACK !== "false",
    lineHeightFactor: 0.7,
    alignmentThreshold: 0.65,
  });
}

export function resolveExtractionConfig(
  overrides: Partial<ExtractionConfig> = {},
): ExtractionConfig {
  return extractionConfigSchema.parse({
    ...getDefaultExtractionConfig(),
    ...overrides,
  });
}
