/**
 * Local filesystem cache for LLM chat responses.
 * Keeps repeated extractions of the same document deterministic and avoids
 * paying twice for the same header inference.
 * Layout: <dir>/<prefix>/<model id>/<request hash>.json
 */

import { createHash } from "crypto";
import { mkdir, readFile, writeFile } from "fs/promises";
import { join, dirname } from "path";
import type { ChatResponse } from "./types.js";

export interface CacheRequest {
  systemPrompt: string;
  userPrompt: string;
}

interface CacheEntry {
  storedAt: string;
  response: ChatResponse;
}

/**
 * SHA-256 of the input, truncated to 16 hex characters.
 */
function hash(input: string): string {
  return createHash("sha256").update(input).digest("hex").slice(0, 16);
}

function modelId(model: string): string {
  return model.replace(/[^a-zA-Z0-9.-]/g, "_");
}

function requestHash(request: CacheRequest): string {
  return hash(`${hash(request.systemPrompt)}:${request.userPrompt}`);
}

function isCacheEntry(value: unknown): value is CacheEntry {
  if (typeof value !== "object" || value === null) return false;
  if (!("response" in value) || !("storedAt" in value)) return false;
  const { response } = value;
  return (
    typeof response === "object" &&
    response !== null &&
    "content" in response &&
    typeof response.content === "string"
  );
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error && "code" in error && error.code === "ENOENT"
  );
}

export class LLMCache {
  constructor(
    private cacheDir: string,
    /** Entries older than this are ignored; 0 keeps entries forever */
    private maxAgeMs = 0,
  ) {}

  pathFor(request: CacheRequest, model: string, prefix = "default"): string {
    return join(
      this.cacheDir,
      prefix,
      modelId(model),
      `${requestHash(request)}.json`,
    );
  }

  async get(
    request: CacheRequest,
    model: string,
    prefix = "default",
  ): Promise<ChatResponse | null> {
    const cachePath = this.pathFor(request, model, prefix);

    let raw: string;
    try {
      raw = await readFile(cachePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }

    let entry: unknown;
    try {
      entry = JSON.parse(raw);
    } catch {
      console.warn(`[LLMCache] Ignoring unreadable cache file ${cachePath}`);
      return null;
    }
    if (!isCacheEntry(entry)) return null;

    if (this.maxAgeMs > 0) {
      const age = Date.now() - Date.parse(entry.storedAt);
      if (!(age <= this.maxAgeMs)) return null;
    }

    return { ...entry.response, cached: true };
  }

  async set(
    request: CacheRequest,
    model: string,
    response: ChatResponse,
    prefix = "default",
  ): Promise<void> {
    const cachePath = this.pathFor(request, model, prefix);
    const entry: CacheEntry = {
      storedAt: new Date().toISOString(),
      response: { ...response, cached: undefined },
    };

    await mkdir(dirname(cachePath), { recursive: true });
    await writeFile(cachePath, JSON.stringify(entry, null, 2), "utf-8");

    console.log(`[LLMCache] Cached response to ${cachePath}`);
  }
}

export { hash, requestHash };
