import { describe, it, expect } from "vitest";
import { fillRow, fillRows } from "./table-filler.js";
import { toToken } from "./token-assembler.js";
import type { HeaderSpec } from "./types.js";
import { line, lineOf } from "../test/fixtures/tokens.js";

const header: HeaderSpec = {
  columns: ["name", "result", "unit", "reference"],
  centers: [25, 215, 320, 428],
  source: "inferred",
  valid: true,
};

const minMaxHeader: HeaderSpec = {
  columns: ["name", "result", "unit", "min", "max"],
  centers: [25, 215, 320, 420, 520],
  source: "ocr",
  valid: true,
};

describe("table filler", () => {
  it("should place each token in its column", () => {
    const row = fillRow(
      lineOf(3, [["WBC", 10], ["12.5", 200], ["K/µL", 300], ["6-17", 400]]),
      header,
    );

    expect(row).toMatchObject({
      code: "WBC",
      name: "WBC",
      cells: ["WBC", "12.5", "K/µL", "6-17"],
      result: "12.5",
      unit: "K/µL",
      reference: "6-17",
      srcLine: 3,
      resultConfidence: 0.99,
    });
    expect(row.srcTokens.result?.map((t) => t.text)).toEqual(["12.5"]);
    expect("min" in row).toBe(false);
  });

  it("should recover the result from a cell holding a stray flag", () => {
    const row = fillRow(
      lineOf(0, [["WBC", 10], ["12.5", 150], ["H", 220], ["K/µL", 300]]),
      header,
    );

    expect(row.cells).toEqual(["WBC", "12.5 H", "K/µL"]);
    expect(row.result).toBe("12.5");
    expect(row.unit).toBe("K/µL");
    expect(row.reference).toBe("UNKNOWN");
  });

  it("should recover a unit printed in the reference column", () => {
    const row = fillRow(
      lineOf(0, [["WBC", 10], ["12.5", 200], ["6-17", 300], ["K/µL", 400]]),
      header,
    );

    expect(row.unit).toBe("K/µL");
    expect(row.reference).toBe("UNKNOWN");
    expect(row.cells).toEqual(["WBC", "12.5", "6-17", "K/µL"]);
  });

  it("should mark a missing result as unknown with the default confidence", () => {
    const row = fillRow(
      lineOf(0, [["RBC", 10], ["M/µL", 300], ["5.5-8.5", 400]]),
      header,
    );

    expect(row.result).toBe("UNKNOWN");
    expect(row.resultConfidence).toBe(0.5);
    expect(row.cells).toEqual(["RBC", "", "M/µL", "5.5-8.5"]);
  });

  it("should take the result confidence from its token", () => {
    const tokens = line(0, [["ALT", 10], ["45", 200], ["U/L", 300]], 0.8).map(toToken);
    expect(fillRow({ index: 0, tokens }, header).resultConfidence).toBe(0.8);
  });

  it("should keep overflow tokens after every column", () => {
    const row = fillRow(
      lineOf(0, [["WBC", 10], ["12.5", 200], ["K/µL", 300], ["note", 700]]),
      header,
    );
    expect(row.cells).toEqual(["WBC", "12.5", "K/µL", "", "note"]);
  });

  it("should fill min and max columns", () => {
    const row = fillRow(
      lineOf(0, [["ALT", 10], ["45", 200], ["U/L", 300], ["10", 415], ["100", 505]]),
      minMaxHeader,
    );

    expect(row).toMatchObject({
      min: "10",
      max: "100",
      reference: "UNKNOWN",
      cells: ["ALT", "45", "U/L", "10", "100"],
    });
  });

  it("should mark a missing max as unknown", () => {
    const row = fillRow(
      lineOf(0, [["ALT", 10], ["45", 200], ["U/L", 300], ["10", 415]]),
      minMaxHeader,
    );
    expect(row.min).toBe("10");
    expect(row.max).toBe("UNKNOWN");
  });

  it("should fill one row per body line", () => {
    const rows = fillRows(
      [
        lineOf(0, [["WBC", 10], ["12.5", 200]]),
        lineOf(1, [["ALT", 10], ["45", 200]]),
      ],
      header,
    );
    expect(rows.map((r) => [r.code, r.result, r.srcLine])).toEqual([
      ["WBC", "12.5", 0],
      ["ALT", "45", 1],
    ]);
  });
});
