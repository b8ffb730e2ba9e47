/**
 * Local Extraction Utility
 * Runs the extraction pipeline on a JSON file of OCR tokens and prints the
 * ExtractionResult, without going through Redis or the HTTP server.
 *
 * The file holds either a token array or an object with a `tokens` field.
 */
import "dotenv/config";
import fs from "node:fs/promises";
import { z } from "zod";
import { ocrTokenSchema } from "../workers/src/extraction/schemas.js";
import { extractLabReport } from "../workers/src/extraction/pipeline.js";
import { LLMClient } from "../workers/src/llm/index.js";

const fileSchema = z.union([
  z.array(ocrTokenSchema),
  z.object({ tokens: z.array(ocrTokenSchema) }).transform((f) => f.tokens),
]);

async function main() {
  const args = process.argv.slice(2);
  if (args.length < 1) {
    console.log(
      "Usage: npx tsx scripts/extract-file.ts <tokens.json> [--no-llm] [--quiet]",
    );
    process.exit(1);
  }

  const filePath = args[0];
  const useLlm = !args.includes("--no-llm");
  const verbose = !args.includes("--quiet");

  const parsed = fileSchema.safeParse(
    JSON.parse(await fs.readFile(filePath, "utf-8")),
  );
  if (!parsed.success) {
    console.error(`Invalid token file ${filePath}:`);
    for (const issue of parsed.error.issues) {
      console.error(`  ${issue.path.join(".")}: ${issue.message}`);
    }
    process.exit(1);
  }

  let llm: LLMClient | null = null;
  if (useLlm) {
    try {
      llm = new LLMClient();
    } catch (error) {
      console.warn(
        `LLM header tier disabled: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  const result = await extractLabReport(parsed.data, {
    llm,
    llmFallback: useLlm,
    verbose,
  });
  console.log(JSON.stringify(result, null, 2));
}

main().catch((error: unknown) => {
  console.error("Extraction failed:", error);
  process.exit(1);
});
