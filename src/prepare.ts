import {
  ALCOHOL_USE_CODES,
  MARITAL_STATUS_CODES,
  PERPETRATOR_SEX_CODES,
  decodeCode,
  type CodeTable,
} from "./codes";
import { ageBracket, asString, computeAge, parseDate } from "./parsing";
import type {
  EnrichedRecord,
  EnrichedTable,
  NotificationRecord,
  RawTable,
} from "./types";

/**
 * Source column names used by the pipeline and the dashboard.
 */
export const COLUMNS = {
  sex: "CS_SEXO",
  notificationDate: "DT_NOTIFIC",
  birthDate: "DT_NASC",
  occurrenceDate: "DT_OCOR",
  maritalStatus: "SIT_CONJUG",
  perpetratorSex: "AUTOR_SEXO",
  alcoholUse: "AUTOR_ALCO",
  physicalViolence: "VIOL_FISIC",
} as const;

/**
 * Returns `true` when the sex cell holds one of the encodings of "female":
 * the number 2, the string "2" or the letter "F" (any case, trimmed).
 */
export function isFemale(value: unknown): boolean {
  if (typeof value === "number") return value === 2;
  const s = asString(value).trim().toUpperCase();
  return s === "2" || s === "F";
}

/**
 * Population filter.
 *
 * Keeps female rows only. When the sheet has no sex column every row passes
 * through unchanged.
 */
export function filterFemale(table: RawTable): NotificationRecord[] {
  if (!table.columns.includes(COLUMNS.sex)) return [...table.rows];
  return table.rows.filter((row) => isFemale(row[COLUMNS.sex]));
}

function dateColumn(
  present: ReadonlySet<string>,
  row: NotificationRecord,
  column: string
): Date | null {
  return present.has(column) ? parseDate(row[column]) : null;
}

function decodedColumn(
  present: ReadonlySet<string>,
  row: NotificationRecord,
  column: string,
  table: CodeTable
): string | null {
  return present.has(column) ? decodeCode(table, row[column]) : null;
}

/**
 * Derives every field for one (already filtered) row.
 *
 * Total over conforming input: bad dates become `null`, unknown codes become
 * the fallback label, and the row is always returned.
 */
export function enrichRecord(
  row: NotificationRecord,
  present: ReadonlySet<string>
): EnrichedRecord {
  const notificationDate = dateColumn(present, row, COLUMNS.notificationDate);
  const birthDate = dateColumn(present, row, COLUMNS.birthDate);
  const occurrenceDate = dateColumn(present, row, COLUMNS.occurrenceDate);
  const age = computeAge(birthDate, notificationDate);

  return {
    raw: row,
    notificationDate,
    birthDate,
    occurrenceDate,
    year: notificationDate ? notificationDate.getUTCFullYear() : null,
    age,
    ageBracket: ageBracket(age),
    alcoholUse: decodedColumn(present, row, COLUMNS.alcoholUse, ALCOHOL_USE_CODES),
    maritalStatus: decodedColumn(
      present,
      row,
      COLUMNS.maritalStatus,
      MARITAL_STATUS_CODES
    ),
    perpetratorSex: decodedColumn(
      present,
      row,
      COLUMNS.perpetratorSex,
      PERPETRATOR_SEX_CODES
    ),
  };
}

/**
 * Runs the preparation pipeline over a raw sheet.
 *
 * Steps, in order:
 * 1) population filter (female rows)
 * 2) date normalization of DT_NOTIFIC / DT_NASC / DT_OCOR
 * 3) notification year
 * 4) age and age bracket
 * 5) code decoding (alcohol use, marital status, perpetrator sex)
 *
 * The returned table and its records are frozen.
 */
export function prepareTable(table: RawTable): EnrichedTable {
  const present = new Set(table.columns);
  const records = filterFemale(table).map((row) =>
    Object.freeze(enrichRecord(row, present))
  );

  return Object.freeze({
    columns: Object.freeze([...table.columns]),
    records: Object.freeze(records),
  });
}

export function hasColumn(table: EnrichedTable, column: string): boolean {
  return table.columns.includes(column);
}
