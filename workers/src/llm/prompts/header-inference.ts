/**
 * Prompt for the last-resort header tier: the model labels the columns of a
 * few sample body rows when neither the printed header nor the geometry
 * gave a usable column mapping.
 */
import { headerInferenceSchema } from "../schemas/header-inference.js";
import { zodToTs } from "../schemas/utils.js";

export const HEADER_INFERENCE_SYSTEM_PROMPT = `
You label the columns of a veterinary laboratory result table.

You receive a few sample rows of the table body. Each row is an array of
cell strings, one per column, in left-to-right order. The first cell of
every row is a test code (e.g. WBC, ALT, GLU).

Assign one role to each column index:
- name: the column holding the test codes (always column 0)
- result: the measured value, numeric, possibly followed by H, L or N
- unit: the measurement unit (mg/dL, U/L, K/µL, %)
- reference: the normal range written as "low-high" in a single cell
- min / max: the normal range when it is printed as two separate columns
- null: any other column (flags, comments, previous results)

RULES:
1. Use either "reference" or the pair "min" and "max", never both.
2. A role may be assigned to at most one column.
3. "name", "result" and "unit" are mandatory.
4. Answer with a single JSON object and nothing else.

OUTPUT FORMAT:
${zodToTs(headerInferenceSchema, "ColumnRoles")}
Example: {"0": "name", "1": "result", "2": "unit", "3": "reference"}
`;

/**
 * Builds the user message for the given sample rows.
 */
export function buildHeaderInferencePrompt(rows: string[][]): string {
  const columnCount = Math.max(0, ...rows.map((row) => row.length));
  return [
    `The table has ${columnCount} columns (indices 0 to ${columnCount - 1}).`,
    "Sample rows:",
    ...rows.map((row) => JSON.stringify(row)),
  ].join("\n");
}
