import { describe, it, expect } from "vitest";
import { locateBody } from "./body-locator.js";
import { lineOf } from "../test/fixtures/tokens.js";

describe("locateBody", () => {
  it("should start the body at the first line led by a known code", () => {
    const lines = [
      lineOf(0, [["Owner:", 10], ["Jane", 80]]),
      lineOf(1, [["wbc", 10], ["12.5", 200]]),
      lineOf(2, [["Page", 10], ["1", 60]]),
      lineOf(3, [["alt", 10], ["45", 200]]),
    ];

    const location = locateBody(lines);

    expect(location?.bodyStartIndex).toBe(1);
    expect(location?.headerLines.map((l) => l.index)).toEqual([0]);
    expect(
      location?.bodyLines.map((l) => l.tokens.map((t) => t.text)),
    ).toEqual([
      ["WBC", "12.5"],
      ["ALT", "45"],
    ]);
    expect(location?.bodyLines.map((l) => l.index)).toEqual([1, 3]);
    expect(location?.prunedLineIndices).toEqual([2]);
  });

  it("should resolve codes through their cleaned-up variants", () => {
    const location = locateBody([lineOf(0, [["WBC-A", 10], ["9.1", 200]])]);
    expect(location?.bodyLines[0].tokens[0].text).toBe("WBC-A");

    const fromParen = locateBody([lineOf(0, [["Potassium(K+)", 10], ["4.5", 200]])]);
    expect(fromParen?.bodyLines[0].tokens[0].text).toBe("K+");
  });

  it("should return null when no line starts with a code", () => {
    expect(
      locateBody([
        lineOf(0, [["Happy", 10], ["Hospital", 80]]),
        lineOf(1, [["Page", 10], ["1", 60]]),
      ]),
    ).toBeNull();
  });

  it("should return null for no lines", () => {
    expect(locateBody([])).toBeNull();
  });
});
