import type { Line, OcrToken } from "../../extraction/types.js";
import { toToken } from "../../extraction/token-assembler.js";

export const TOKEN_HEIGHT = 20;
export const CHAR_WIDTH = 10;

/**
 * OCR token at (left, top); width is 10px per character unless given.
 */
export function tok(
  text: string,
  left: number,
  top: number,
  opts: { confidence?: number; width?: number; height?: number } = {},
): OcrToken {
  const width = opts.width ?? text.length * CHAR_WIDTH;
  const height = opts.height ?? TOKEN_HEIGHT;
  return {
    text,
    confidence: opts.confidence ?? 0.99,
    bbox: { top, bottom: top + height, left, right: left + width },
  };
}

/**
 * One printed line: [text, left] pairs sharing the same top.
 */
export function line(
  top: number,
  cells: Array<[string, number]>,
  confidence = 0.99,
): OcrToken[] {
  return cells.map(([text, left]) => tok(text, left, top, { confidence }));
}

/**
 * Body row laid out on the usual report columns: code, result, unit, reference.
 */
export function labRow(
  top: number,
  code: string,
  result: string,
  unit: string,
  reference: string,
): OcrToken[] {
  const cells: Array<[string, number]> = [[code, 10]];
  if (result) cells.push([result, 200]);
  if (unit) cells.push([unit, 300]);
  if (reference) cells.push([reference, 400]);
  return line(top, cells);
}

/**
 * A complete report: clinic letterhead, owner and patient block, collection
 * date, printed table header, five body rows and a page footer.
 */
export function sampleReport(): OcrToken[] {
  return [
    ...line(10, [["Happy", 10], ["Animal", 70], ["Hospital", 140]]),
    ...line(50, [["Owner:", 10], ["Jane", 80], ["Doe", 130]]),
    ...line(90, [["Patient:", 10], ["Coco", 100], ["Sex:", 300], ["M", 350]]),
    ...line(130, [["Collection", 10], ["Date:", 120], ["2024.03.15", 180]]),
    ...line(170, [["Test", 10], ["Result", 200], ["Unit", 300], ["Reference", 400]]),
    ...labRow(210, "WBC", "12.5", "10^3/µL", "6.0-17.0"),
    ...labRow(250, "RBC", "", "M/µL", "5.5-8.5"),
    ...labRow(290, "ALT", "45", "U/L", "10-100"),
    ...labRow(330, "ALT", "52", "U/L", "10-100"),
    ...labRow(370, "GLU", "98", "mg/dL", "74-143"),
    ...line(450, [["Page", 10], ["1", 60], ["of", 80], ["1", 110]]),
  ];
}

/**
 * Body rows only, no printed header.
 */
export function headerlessReport(): OcrToken[] {
  return [
    ...labRow(10, "WBC", "12.5", "K/µL", "6-17"),
    ...labRow(50, "RBC", "7.2", "M/µL", "5.5-8.5"),
    ...labRow(90, "ALT", "45", "U/L", "10-100"),
    ...labRow(130, "GLU", "98", "mg/dL", "74-143"),
    ...labRow(170, "HGB", "15.1", "g/dL", "12-18"),
  ];
}

/**
 * Assembled line built straight from [text, left] pairs, bypassing the
 * token assembler.
 */
export function lineOf(
  index: number,
  cells: Array<[string, number]>,
  top = index * 40,
): Line {
  return { index, tokens: line(top, cells).map(toToken) };
}
