/**
 * Unit lexicon.
 * Canonical units come from the code dictionary plus a few common extras;
 * curated spelling variants (micro sign, liter case, exponent and prefix
 * forms) all point at one canonical spelling, e.g. "10^3/uL" → "K/µL".
 */

import { REFERENCE_TESTS } from "./code-dictionary.js";

const EXTRA_UNITS = ["IU/L", "g/L", "mg/L", "mOsm/kg", "mmol/L"];

const MICRO_TAILS = ["µL", "μL", "uL", "UL", "ul"];

const PREFIX_HEADS: Record<string, string[]> = {
  "K/µL": ["K/", "k/", "K", "10^3/", "10³/", "x10^3/", "X10^3/", "×10^3/", "10*3/"],
  "M/µL": ["M/", "m/", "M", "10^6/", "10⁶/", "x10^6/", "X10^6/", "×10^6/", "10*6/"],
};

const PER_LITER_ALIASES: Record<string, string[]> = {
  "K/µL": ["10^9/L", "x10^9/L", "10⁹/L"],
  "M/µL": ["10^12/L", "x10^12/L", "10¹²/L"],
};

function foldUnit(raw: string): string {
  return raw
    .trim()
    .replace(/μ/g, "µ")
    .replace(/ℓ/g, "L")
    .replace(/\s*\/\s*/g, "/")
    .replace(/\s*\^\s*/g, "^")
    .replace(/\s+/g, "")
    .replace(/(^|[/^KkMm])u(?=[lL])/g, "$1µ");
}

/**
 * Lookup key for a unit spelling: micro sign and liter variants folded,
 * spaces around "/" and "^" removed, upper-cased.
 */
export function unitKey(raw: string): string {
  return foldUnit(raw).toUpperCase();
}

/**
 * Letters and digits only, case kept: "mL" and "M/µL" must stay apart.
 */
function alnumKey(raw: string): string {
  return foldUnit(raw).replace(/[^A-Za-z0-9]/g, "");
}

function curatedVariants(canonical: string): string[] {
  const variants: string[] = [];

  for (const head of PREFIX_HEADS[canonical] ?? []) {
    for (const tail of MICRO_TAILS) variants.push(`${head}${tail}`);
  }
  variants.push(...(PER_LITER_ALIASES[canonical] ?? []));

  if (canonical.includes("µ")) {
    variants.push(canonical.replace(/µ/g, "u"), canonical.replace(/µ/g, "mc"));
  }

  return variants;
}

interface UnitLexicon {
  canonical: ReadonlySet<string>;
  exact: ReadonlyMap<string, string>;
  alnum: ReadonlyMap<string, ReadonlySet<string>>;
}

function buildUnitLexicon(): UnitLexicon {
  const canonical = new Set<string>();
  for (const test of REFERENCE_TESTS) {
    if (test.unit && test.unit.trim()) canonical.add(test.unit.trim());
  }
  for (const unit of EXTRA_UNITS) canonical.add(unit);

  const exact = new Map<string, string>();
  const alnum = new Map<string, Set<string>>();

  const register = (spelling: string, target: string) => {
    const key = unitKey(spelling);
    if (!exact.has(key)) exact.set(key, target);
  };

  // canonical spellings first so a variant never shadows one
  for (const unit of canonical) {
    register(unit, unit);
    const akey = alnumKey(unit);
    if (akey.length < 2) continue;
    const bucket = alnum.get(akey) ?? new Set<string>();
    bucket.add(unit);
    alnum.set(akey, bucket);
  }
  for (const unit of canonical) {
    for (const variant of curatedVariants(unit)) register(variant, unit);
  }

  return { canonical, exact, alnum };
}

const LEXICON = buildUnitLexicon();

export function isCanonicalUnit(unit: string): boolean {
  return LEXICON.canonical.has(unit);
}

/**
 * Canonical form of a known spelling, ignoring case and spacing only.
 */
export function lookupUnit(raw: string): string | null {
  if (!raw || !raw.trim()) return null;
  return LEXICON.exact.get(unitKey(raw)) ?? null;
}

/**
 * Resolves a unit spelling to its canonical form, or null when the spelling
 * is unknown or ambiguous. Beyond {@link lookupUnit}, punctuation-only
 * differences are forgiven when exactly one canonical unit matches.
 */
export function resolveUnit(raw: string): string | null {
  if (!raw || !raw.trim()) return null;

  const exact = lookupUnit(raw);
  if (exact) return exact;

  const akey = alnumKey(raw);
  if (akey.length < 2) return null;
  const candidates = LEXICON.alnum.get(akey);
  if (candidates && candidates.size === 1) {
    return [...candidates][0] ?? null;
  }
  return null;
}
