import { describe, it, expect } from "vitest";
import { normalizeNumeric, normalizeRowValues, normalizeUnit } from "./unit-normalizer.js";
import type { BodyRow } from "./types.js";

describe("unit normalizer", () => {
  describe("normalizeUnit", () => {
    it("should map exponent spellings to the canonical unit", () => {
      expect(normalizeUnit("10^3/µL")).toBe("K/µL");
      expect(normalizeUnit(" mg/dl ")).toBe("mg/dL");
    });

    it("should keep value and unit mixtures unchanged", () => {
      expect(normalizeUnit("neg pos/n")).toBe("neg pos/n");
      expect(normalizeUnit("12.5 H mg/dL")).toBe("12.5 H mg/dL");
      expect(normalizeUnit("양성 mg/dL")).toBe("양성 mg/dL");
      expect(normalizeUnit("음성 U/L")).toBe("음성 U/L");
    });

    it("should rejoin a unit split into fragments", () => {
      expect(normalizeUnit("10 ^3/µL")).toBe("K/µL");
      expect(normalizeUnit("10 ^6/uL")).toBe("M/µL");
    });

    it("should keep millilitres as they are", () => {
      expect(normalizeUnit("mL")).toBe("mL");
    });

    it("should keep unknown spellings as they are", () => {
      expect(normalizeUnit("furlongs")).toBe("furlongs");
    });

    it("should return null for blank and unknown cells", () => {
      expect(normalizeUnit("UNKNOWN")).toBeNull();
      expect(normalizeUnit("  ")).toBeNull();
      expect(normalizeUnit(undefined)).toBeNull();
    });

    it("should be idempotent", () => {
      const once = normalizeUnit("10^3/uL");
      expect(once).toBe("K/µL");
      expect(normalizeUnit(once)).toBe(once);
    });
  });

  describe("normalizeNumeric", () => {
    it("should parse plain, comma, middle-dot and flagged numbers", () => {
      expect(normalizeNumeric("12.5")).toBe(12.5);
      expect(normalizeNumeric("4,5H")).toBe(4.5);
      expect(normalizeNumeric("1·2")).toBe(1.2);
      expect(normalizeNumeric("-2")).toBe(-2);
    });

    it("should reject anything else", () => {
      expect(normalizeNumeric("UNKNOWN")).toBeNull();
      expect(normalizeNumeric("<5")).toBeNull();
      expect(normalizeNumeric("12.5 H")).toBeNull();
      expect(normalizeNumeric(undefined)).toBeNull();
    });
  });

  it("should normalize a row without touching its raw cells", () => {
    const row: BodyRow = {
      code: "WBC",
      cells: ["WBC", "12.5H", "10^3/uL", "6-17"],
      name: "WBC",
      result: "12.5H",
      unit: "10^3/uL",
      reference: "6-17",
      min: "6",
      max: "17",
      srcLine: 0,
      srcTokens: {},
      resultConfidence: 0.99,
    };

    const normalized = normalizeRowValues(row);

    expect(normalized).toMatchObject({
      result: "12.5H",
      unit: "10^3/uL",
      resultNorm: 12.5,
      minNorm: 6,
      maxNorm: 17,
      unitCanonical: "K/µL",
    });
  });
});
