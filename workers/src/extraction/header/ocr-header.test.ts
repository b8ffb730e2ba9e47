import { describe, it, expect } from "vitest";
import {
  OcrHeaderStrategy,
  alignmentScore,
  findHeaderLine,
  matchHeaderWord,
} from "./ocr-header.js";
import type { HeaderSpec } from "../types.js";
import { lineOf } from "../../test/fixtures/tokens.js";

const bodyLines = [
  lineOf(5, [["WBC", 10], ["12.5", 200], ["K/µL", 300], ["6-17", 400]]),
  lineOf(6, [["ALT", 10], ["45", 200], ["U/L", 300], ["10-100", 400]]),
];

describe("OCR header tier", () => {
  describe("matchHeaderWord", () => {
    it("should match synonyms exactly or by containment", () => {
      expect(matchHeaderWord("Test")).toBe("name");
      expect(matchHeaderWord("Result:")).toBe("result");
      expect(matchHeaderWord("Units")).toBe("unit");
      expect(matchHeaderWord("Ref.")).toBe("reference");
      expect(matchHeaderWord("Lower")).toBe("min");
      expect(matchHeaderWord("단위")).toBe("unit");
      expect(matchHeaderWord("Date")).toBe("date");
    });

    it("should not match unrelated words", () => {
      expect(matchHeaderWord("Hospital")).toBeNull();
      expect(matchHeaderWord("")).toBeNull();
    });
  });

  describe("findHeaderLine", () => {
    it("should pick the line with the most distinct role words", () => {
      const found = findHeaderLine([
        lineOf(0, [["Test", 10], ["Result", 200], ["Unit", 300]]),
        lineOf(1, [["Test", 10], ["Result", 200], ["Unit", 300], ["Reference", 400]]),
        lineOf(2, [["Happy", 10], ["Hospital", 80]]),
      ]);
      expect(found?.line.index).toBe(1);
    });

    it("should prefer the lowest line on a tie", () => {
      const found = findHeaderLine([
        lineOf(0, [["Test", 10], ["Result", 200], ["Unit", 300]]),
        lineOf(1, [["Item", 10], ["Value", 200], ["Unit", 300]]),
      ]);
      expect(found?.line.index).toBe(1);
    });

    it("should ignore lines with fewer than three role words", () => {
      expect(findHeaderLine([lineOf(0, [["Test", 10], ["Result", 200]])])).toBeNull();
    });
  });

  describe("alignmentScore", () => {
    it("should average numeric min/max agreement", () => {
      const header: HeaderSpec = {
        columns: ["name", "result", "unit", "min", "max"],
        centers: [25, 215, 320, 420, 520],
        source: "ocr",
        valid: true,
      };
      const lines = [
        lineOf(0, [["WBC", 10], ["12.5", 200], ["K/µL", 300], ["6", 415], ["17", 510]]),
        lineOf(1, [["ALT", 10], ["45", 200], ["U/L", 300], ["10", 415]]),
      ];

      // result 1, unit 1, min/max (1 + 0.5) / 2
      expect(alignmentScore(header, lines)).toBeCloseTo(2.75 / 3, 6);
    });

    it("should be zero without body lines", () => {
      const header: HeaderSpec = {
        columns: ["name", "result"],
        centers: [25, 215],
        source: "ocr",
        valid: true,
      };
      expect(alignmentScore(header, [])).toBe(0);
    });
  });

  describe("resolve", () => {
    const strategy = new OcrHeaderStrategy();

    it("should read the printed header above the body", async () => {
      const result = await strategy.resolve({
        headerLines: [
          lineOf(4, [["Test", 10], ["Result", 200], ["Unit", 300], ["Reference", 400]]),
        ],
        bodyLines,
      });

      expect(result).toEqual({
        ok: true,
        value: {
          columns: ["name", "result", "unit", "reference"],
          centers: [30, 230, 320, 445],
          source: "ocr",
          valid: true,
          headerLineIndex: 4,
        },
      });
    });

    it("should read two-word headers as one column", async () => {
      const result = await strategy.resolve({
        headerLines: [
          lineOf(4, [
            ["Test", 10],
            ["Name", 60],
            ["Result", 200],
            ["Unit", 300],
            ["Ref.", 400],
            ["Range", 450],
          ]),
        ],
        bodyLines,
      });

      expect(result.ok && result.value.columns).toEqual([
        "name",
        "result",
        "unit",
        "reference",
      ]);
      expect(result.ok && result.value.centers).toEqual([55, 230, 320, 447.5]);
    });

    it("should read a lone date column as the result column", async () => {
      const result = await strategy.resolve({
        headerLines: [
          lineOf(4, [["Test", 10], ["Date", 200], ["Unit", 300], ["Reference", 400]]),
        ],
        bodyLines,
      });
      expect(result.ok && result.value.columns).toEqual([
        "name",
        "result",
        "unit",
        "reference",
      ]);
    });

    it("should fail without a header line", async () => {
      const result = await strategy.resolve({
        headerLines: [lineOf(0, [["Happy", 10], ["Hospital", 80]])],
        bodyLines,
      });
      expect(result).toEqual({
        ok: false,
        error: { source: "ocr", reason: "no_header_line" },
      });
    });

    it("should fail when the header has no range column", async () => {
      const result = await strategy.resolve({
        headerLines: [lineOf(4, [["Test", 10], ["Result", 200], ["Unit", 300]])],
        bodyLines,
      });
      expect(result.ok ? null : result.error.reason).toBe("missing_range");
    });

    it("should fail on a repeated role", async () => {
      const result = await strategy.resolve({
        headerLines: [
          lineOf(4, [
            ["Test", 10],
            ["Result", 150],
            ["Value", 250],
            ["Unit", 350],
            ["Reference", 450],
          ]),
        ],
        bodyLines,
      });
      expect(result.ok ? null : result.error.reason).toBe("duplicate_role:result");
    });

    it("should fail when the body does not match the header", async () => {
      const result = await strategy.resolve({
        headerLines: [
          lineOf(4, [["Test", 10], ["Result", 200], ["Unit", 300], ["Reference", 400]]),
        ],
        bodyLines: [
          lineOf(5, [["WBC", 10], ["abc", 200], ["xyz", 300], ["foo", 400]]),
        ],
      });
      expect(result.ok ? null : result.error.reason).toBe("alignment:0.00");
    });
  });
});
