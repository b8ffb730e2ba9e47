import { z } from "zod";
import { ROLES } from "../../extraction/types.js";

/**
 * Column roles returned by the model, keyed by zero-based column index.
 * Columns carrying no role (flags, notes) map to null.
 */
export const headerInferenceSchema = z
  .record(
    z.string().regex(/^\d+$/).describe("Zero-based column index"),
    z.enum(ROLES).nullable(),
  )
  .describe("Role of each column of the lab table");

export type HeaderInference = z.infer<typeof headerInferenceSchema>;
