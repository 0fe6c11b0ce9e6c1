import * as XLSX from "xlsx";
import type { AgeBracket } from "./types";

const MS_PER_DAY = 86_400_000;
const DAYS_PER_YEAR = 365.25;

/**
 * Stringifies unknown values safely.
 *
 * Normalizes `null`/`undefined` into an empty string so callers can `.trim()`.
 */
export function asString(value: unknown): string {
  if (value === null || value === undefined) return "";
  return String(value);
}

/**
 * Parses a small integer code from a cell.
 *
 * - Accepts finite integer numbers
 * - Accepts integer strings with surrounding whitespace ("1", " 9 ")
 *
 * Anything else (blank cells, "1.5", "N/A") returns `null`.
 */
export function parseCode(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value !== "string") return null;

  const s = value.trim();
  if (!/^-?\d+$/.test(s)) return null;
  return Number.parseInt(s, 10);
}

function utcDate(year: number, monthIndex: number, day: number): Date | null {
  const date = new Date(Date.UTC(year, monthIndex, day));
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Parses a date cell into a UTC-midnight `Date`.
 *
 * Accepted formats:
 * - `Date` objects (local calendar day)
 * - spreadsheet serial numbers (how the loader reads date cells)
 * - ISO strings: "2021-03-10", "2021-03-10T00:00:00"
 * - day-first strings: "10/03/2021"
 * - anything else the `Date` constructor understands
 *
 * Returns `null` for blank or unparseable values. The time of day is dropped so
 * day differences are whole numbers.
 */
export function parseDate(value: unknown): Date | null {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return null;
    return utcDate(value.getFullYear(), value.getMonth(), value.getDate());
  }

  if (typeof value === "number") {
    if (!Number.isFinite(value)) return null;
    const parsed = XLSX.SSF.parse_date_code(value);
    if (!parsed) return null;
    return utcDate(parsed.y, parsed.m - 1, parsed.d);
  }

  const text = asString(value).trim();
  if (!text) return null;

  const isoMatch = text.match(/^(\d{4})-(\d{2})-(\d{2})/);
  if (isoMatch) {
    const [, y, m, d] = isoMatch;
    return utcDate(Number(y), Number(m) - 1, Number(d));
  }

  const slashMatch = text.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
  if (slashMatch) {
    const [, d, m, y] = slashMatch;
    return utcDate(Number(y), Number(m) - 1, Number(d));
  }

  const fallback = new Date(text);
  if (Number.isNaN(fallback.getTime())) return null;
  return utcDate(
    fallback.getFullYear(),
    fallback.getMonth(),
    fallback.getDate()
  );
}

/**
 * Whole days from `from` to `to`; negative when `to` is earlier.
 */
export function daysBetween(from: Date, to: Date): number {
  return Math.floor((to.getTime() - from.getTime()) / MS_PER_DAY);
}

/**
 * Age in completed years at the notification date.
 *
 * `floor(days / 365.25)`; `null` when either date is missing.
 */
export function computeAge(
  birthDate: Date | null,
  notificationDate: Date | null
): number | null {
  if (!birthDate || !notificationDate) return null;
  return Math.floor(daysBetween(birthDate, notificationDate) / DAYS_PER_YEAR);
}

export const AGE_BRACKETS: readonly AgeBracket[] = [
  "Child (0-9)",
  "Adolescent (10-19)",
  "Young adult (20-24)",
  "Adult (25-59)",
  "Elderly (60+)",
];

// Inclusive upper bound of each bracket, same order as AGE_BRACKETS.
const BRACKET_UPPER_BOUNDS = [9, 19, 24, 59, 120] as const;

/**
 * Maps an age to its bracket.
 *
 * Boundaries are right-closed: 9 is a child, 10 an adolescent, 59 an adult and
 * 60 elderly. Ages outside `[0, 120]` and `null` have no bracket.
 */
export function ageBracket(age: number | null): AgeBracket | null {
  if (age === null || !Number.isFinite(age)) return null;
  if (age < 0 || age > 120) return null;

  for (let i = 0; i < BRACKET_UPPER_BOUNDS.length; i += 1) {
    if (age <= BRACKET_UPPER_BOUNDS[i]) return AGE_BRACKETS[i];
  }
  return null;
}
