/**
 * Static test-code dictionary.
 * Loaded once from data/codes.json into frozen lookup tables and used by the
 * body locator to recognize the leading code token of every table row.
 */

import { z } from "zod";
import codeData from "./data/codes.json" with { type: "json" };

const referenceTestSchema = z.object({
  code: z.string().min(1),
  name: z.string().nullable(),
  unit: z.string().nullable(),
});

export type ReferenceTest = z.infer<typeof referenceTestSchema>;

export const REFERENCE_TESTS: readonly ReferenceTest[] = Object.freeze(
  z.array(referenceTestSchema).parse(codeData),
);

const SYMBOL_HINTS = ["+", "-", "%", "/", "_", "."] as const;

function upperKey(text: string): string {
  return text.replace(/\s+/g, "").toUpperCase();
}

function alnumKey(text: string): string {
  return upperKey(text).replace(/[^A-Z0-9]/g, "");
}

function isAllUpper(code: string): boolean {
  return code === code.toUpperCase();
}

function buildIndexes(tests: readonly ReferenceTest[]): {
  upper: ReadonlyMap<string, string>;
  alnum: ReadonlyMap<string, ReadonlySet<string>>;
} {
  const upper = new Map<string, string>();
  for (const { code } of tests) {
    const key = upperKey(code);
    const existing = upper.get(key);
    // "GLU" beats "Glu"
    if (!existing || (!isAllUpper(existing) && isAllUpper(code))) {
      upper.set(key, code);
    }
  }

  const alnum = new Map<string, Set<string>>();
  for (const [key, canonical] of upper) {
    const akey = key.replace(/[^A-Z0-9]/g, "");
    if (!akey) continue;
    const bucket = alnum.get(akey) ?? new Set<string>();
    bucket.add(canonical);
    alnum.set(akey, bucket);
  }

  return { upper, alnum };
}

const INDEXES = buildIndexes(REFERENCE_TESTS);

function filterBySymbols(text: string, candidates: ReadonlySet<string>) {
  const hints = SYMBOL_HINTS.filter((symbol) => text.includes(symbol));
  return [...candidates].filter((candidate) =>
    SYMBOL_HINTS.every(
      (symbol) => hints.includes(symbol) === candidate.includes(symbol),
    ),
  );
}

function lookup(text: string): string | null {
  const exact = INDEXES.upper.get(upperKey(text));
  if (exact) return exact;

  const candidates = INDEXES.alnum.get(alnumKey(text));
  if (!candidates || candidates.size === 0) return null;
  if (candidates.size === 1) return [...candidates][0] ?? null;

  const filtered = filterBySymbols(text, candidates);
  return filtered.length === 1 ? (filtered[0] ?? null) : null;
}

/**
 * Resolves text against the dictionary without any OCR-confusion fallback.
 */
export function resolveCodeStrict(text: string): string | null {
  const raw = text.trim();
  if (!raw) return null;

  const t = raw.replace("(%)", "%").replace("(#)", "#");

  // absolute counts ("NEU#") resolve to their base code
  if (t.endsWith("#") && t.length > 1) {
    const base = lookup(t.slice(0, -1));
    if (base) return base;
  }

  return lookup(t);
}

function fallbackVariants(text: string): string[] {
  const t = text.trim();
  const variants: string[] = [];

  const withoutSuffix = t.replace(/-A$/i, "");
  if (withoutSuffix !== t) variants.push(withoutSuffix);

  const parenAt = t.indexOf("(");
  if (parenAt > 0) {
    variants.push(t.slice(0, parenAt).trim());
    const inner = t.slice(parenAt + 1).replace(/\).*$/, "").trim();
    if (inner) variants.push(inner);
  }

  const withoutPercent = t.replace(/%$/, "");
  if (withoutPercent !== t) variants.push(withoutPercent);

  const withoutDashes = t.replace(/-+$/, "");
  if (withoutDashes !== t) variants.push(withoutDashes);

  return variants.filter((v) => v.length > 0);
}

/**
 * Resolves a token to its canonical test code.
 *
 * Tries the text as-is, then a few cleaned-up variants (suffixes, text in or
 * before parentheses), and only then the 0→O OCR confusion ("p02" → "pO2").
 */
export function resolveCode(text: string): string | null {
  const direct = resolveCodeStrict(text);
  if (direct) return direct;

  for (const variant of fallbackVariants(text)) {
    const resolved = resolveCodeStrict(variant);
    if (resolved) return resolved;
  }

  if (text.includes("0")) {
    return resolveCodeStrict(text.replace(/0/g, "O"));
  }

  return null;
}
