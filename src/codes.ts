import { parseCode } from "./parsing";

/**
 * Label used for any code missing from a lookup table, blank cells included.
 *
 * The source forms use 9 for "ignored", so unknown and missing codes share its
 * label and land in the same chart slice.
 */
export const FALLBACK_LABEL = "Ignored";

export type CodeTable = {
  readonly labels: ReadonlyMap<number, string>;
  readonly fallback: string;
};

function codeTable(
  entries: ReadonlyArray<readonly [number, string]>,
  fallback = FALLBACK_LABEL
): CodeTable {
  return { labels: new Map(entries), fallback };
}

export const ALCOHOL_USE_CODES = codeTable([
  [1, "Yes"],
  [2, "No"],
  [3, "Not applicable"],
  [8, "Not applicable"],
  [9, "Ignored"],
]);

export const MARITAL_STATUS_CODES = codeTable([
  [1, "Single"],
  [2, "Married/Union"],
  [3, "Widowed"],
  [4, "Separated"],
  [8, "N/A"],
  [9, "Ignored"],
]);

export const PERPETRATOR_SEX_CODES = codeTable([
  [1, "Male"],
  [2, "Female"],
  [3, "Both"],
  [9, "Ignored"],
]);

/**
 * Decodes a cell through a lookup table.
 *
 * Never returns `null`: blank, non-numeric and unlisted codes all map to the
 * table's fallback label.
 */
export function decodeCode(table: CodeTable, value: unknown): string {
  const code = parseCode(value);
  if (code === null) return table.fallback;
  return table.labels.get(code) ?? table.fallback;
}
