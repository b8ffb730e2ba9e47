import { z } from "zod";
import { extractionConfigSchema } from "./config.js";

export const bboxSchema = z
  .object({
    top: z.number(),
    bottom: z.number(),
    left: z.number(),
    right: z.number(),
  })
  .refine((b) => b.bottom >= b.top && b.right >= b.left, {
    message: "bbox must have bottom >= top and right >= left",
  });

export const ocrTokenSchema = z.object({
  text: z.string(),
  confidence: z.number().min(0).max(1),
  bbox: bboxSchema,
});

export const extractionOptionsSchema = extractionConfigSchema.partial();

export type ExtractionOptions = z.infer<typeof extractionOptionsSchema>;

/** POST /extract */
export const extractRequestSchema = z.object({
  documentId: z.string().min(1).optional(),
  tokens: z.array(ocrTokenSchema),
  options: extractionOptionsSchema.optional(),
});

export type ExtractRequest = z.infer<typeof extractRequestSchema>;

/** POST /queue */
export const queueRequestSchema = z.object({
  documentId: z.string().min(1),
  tokens: z.array(ocrTokenSchema),
  options: extractionOptionsSchema.optional(),
  source: z.enum(["api", "upload", "batch"]).optional(),
  priority: z.number().int().min(1).optional(),
});

export type QueueRequest = z.infer<typeof queueRequestSchema>;
