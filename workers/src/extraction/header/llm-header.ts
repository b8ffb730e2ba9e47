/**
 * LLM header tier: asks the text model to label the columns of a few
 * representative body rows. Single attempt, bounded by a timeout and
 * cancelled with the caller's signal.
 */

import type { LLMClient } from "../../llm/index.js";
import {
  HEADER_INFERENCE_SYSTEM_PROMPT,
  buildHeaderInferencePrompt,
} from "../../llm/prompts/header-inference.js";
import {
  headerInferenceSchema,
  type HeaderInference,
} from "../../llm/schemas/header-inference.js";
import { withTimeout } from "../../utils/timeout.js";
import type {
  HeaderSpec,
  Line,
  ResolutionFailure,
  Result,
  Role,
} from "../types.js";
import { err, ok } from "../types.js";
import { mean } from "../patterns.js";
import { findColumnViolation } from "./columns.js";
import { DEFAULT_LLM_TIMEOUT_MS } from "../config.js";
import type { HeaderContext, HeaderStrategy } from "./strategy.js";

/** The only part of the LLM client this tier needs */
export type HeaderChatClient = Pick<LLMClient, "chat">;

/**
 * Picks up to `limit` body lines having the most common token count,
 * one per test code.
 */
export function selectSampleLines(lines: Line[], limit = 3): Line[] {
  const candidates = lines.filter((line) => line.tokens.length >= 2);
  const counts = new Map<number, number>();
  for (const line of candidates) {
    const n = line.tokens.length;
    counts.set(n, (counts.get(n) ?? 0) + 1);
  }

  let mode = 0;
  let modeCount = 0;
  for (const [length, count] of counts) {
    if (count > modeCount || (count === modeCount && length > mode)) {
      mode = length;
      modeCount = count;
    }
  }

  const seen = new Set<string>();
  const sample: Line[] = [];
  for (const line of candidates) {
    if (line.tokens.length !== mode) continue;
    const code = line.tokens[0].text;
    if (seen.has(code)) continue;
    seen.add(code);
    sample.push(line);
    if (sample.length >= limit) break;
  }
  return sample;
}

/**
 * Parses the model answer, tolerating a fenced code block around the JSON.
 * Returns null when the content is not a valid role mapping.
 */
export function parseColumnRoles(content: string): HeaderInference | null {
  const text = content
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/, "");

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }
  const parsed = headerInferenceSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export class LlmHeaderStrategy implements HeaderStrategy {
  readonly source = "llm" as const;

  constructor(
    private readonly client: HeaderChatClient | null,
    private readonly timeoutMs = DEFAULT_LLM_TIMEOUT_MS,
    private readonly sampleSize = 3,
  ) {}

  async resolve(
    context: HeaderContext,
  ): Promise<Result<HeaderSpec, ResolutionFailure>> {
    const fail = (reason: string) => err({ source: this.source, reason });

    const client = this.client;
    if (!client) return fail("llm_unavailable");

    const sample = selectSampleLines(context.bodyLines, this.sampleSize);
    if (sample.length === 0) return fail("no_sample_rows");

    const rows = sample.map((line) => line.tokens.map((t) => t.text));
    const columnCount = rows[0].length;

    let content: string;
    try {
      const response = await withTimeout(
        (signal) =>
          client.chat(
            HEADER_INFERENCE_SYSTEM_PROMPT,
            buildHeaderInferencePrompt(rows),
            {
              cachePrefix: "header-inference",
              responseFormat: { type: "json_object" },
              signal,
            },
          ),
        this.timeoutMs,
        context.signal,
      );
      content = response.content;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[HeaderResolver] LLM header inference failed: ${message}`);
      return fail(`llm_error:${message}`);
    }

    const roles = parseColumnRoles(content);
    if (!roles) return fail("malformed_response");

    const columns: Array<Role | null> = Array.from(
      { length: columnCount },
      () => null,
    );
    for (const [key, role] of Object.entries(roles)) {
      const index = Number(key);
      if (index >= columnCount) return fail(`column_out_of_range:${index}`);
      columns[index] = role;
    }

    const violation = findColumnViolation(columns, {
      required: ["name", "result", "unit"],
    });
    if (violation) return fail(violation);

    const centers = columns.map((_, index) =>
      mean(sample.map((line) => line.tokens[index].xCenter)),
    );

    return ok({ columns, centers, source: this.source, valid: true });
  }
}
