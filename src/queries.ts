import { parseCode } from "./parsing";
import type { CountEntry, EnrichedRecord, EnrichedTable } from "./types";

/** Indicator value meaning "present / yes". */
export const PRESENT_CODE = 1;

export function isPresent(value: unknown): boolean {
  return parseCode(value) === PRESENT_CODE;
}

/**
 * Distinct notification years present in the table, ascending.
 */
export function availableYears(table: EnrichedTable): number[] {
  const years = new Set<number>();
  for (const r of table.records) {
    if (r.year !== null) years.add(r.year);
  }
  return Array.from(years).sort((a, b) => a - b);
}

/**
 * Read-only sub-view of the records notified in one of `years`.
 *
 * Records without a notification year never match.
 */
export function filterByYears(
  table: EnrichedTable,
  years: readonly number[]
): EnrichedRecord[] {
  const wanted = new Set(years);
  return table.records.filter((r) => r.year !== null && wanted.has(r.year));
}

/**
 * Number of records whose indicator `field` holds the present code.
 */
export function countWhere(
  records: readonly EnrichedRecord[],
  field: string
): number {
  let n = 0;
  for (const r of records) {
    if (isPresent(r.raw[field])) n += 1;
  }
  return n;
}

export type GroupOrder =
  | { by: "label"; labels: readonly string[] }
  | { by: "count" };

/**
 * Counts records per distinct value returned by `select`.
 *
 * `null` values are not counted.
 *
 * Orderings:
 * - `{ by: "label", labels }`: exactly the given labels in that order, zero
 *   counts included (values outside `labels` are dropped)
 * - `{ by: "count" }`: descending count; ties keep first-seen order
 */
export function groupCount(
  records: readonly EnrichedRecord[],
  select: (r: EnrichedRecord) => string | null,
  order: GroupOrder
): CountEntry[] {
  const counts = new Map<string, number>();
  for (const r of records) {
    const label = select(r);
    if (label === null) continue;
    counts.set(label, (counts.get(label) ?? 0) + 1);
  }

  if (order.by === "label") {
    return order.labels.map((label) => ({
      label,
      count: counts.get(label) ?? 0,
    }));
  }

  return Array.from(counts, ([label, count]) => ({ label, count })).sort(
    (a, b) => b.count - a.count
  );
}

/**
 * Title-cases each run of letters: "FORCA_CORPORAL" -> "Forca_Corporal".
 */
export function titleCase(text: string): string {
  return text
    .toLowerCase()
    .replace(/\p{L}+/gu, (word) => word.charAt(0).toUpperCase() + word.slice(1));
}

/**
 * Columns of an indicator family (sharing `prefix`), in sheet order.
 */
export function familyColumns(
  columns: readonly string[],
  prefix: string,
  exclude: readonly string[] = []
): string[] {
  return columns.filter((c) => c.startsWith(prefix) && !exclude.includes(c));
}

export type IndicatorGroupOptions = {
  /** Family prefix stripped from each column to build its label. */
  prefix?: string;
  /** Keep at most this many entries. */
  topN?: number;
};

/**
 * One count per indicator column.
 *
 * - label: column name without `prefix`, title-cased
 * - zero-count columns are dropped
 * - ordered by descending count (ties keep column order)
 * - truncated to `topN` when given
 */
export function indicatorGroupCounts(
  records: readonly EnrichedRecord[],
  columns: readonly string[],
  opts: IndicatorGroupOptions = {}
): CountEntry[] {
  const prefix = opts.prefix ?? "";
  const entries: CountEntry[] = [];

  for (const column of columns) {
    const count = countWhere(records, column);
    if (count === 0) continue;
    const bare = prefix && column.startsWith(prefix)
      ? column.slice(prefix.length)
      : column;
    entries.push({ label: titleCase(bare), count });
  }

  entries.sort((a, b) => b.count - a.count);

  if (opts.topN === undefined) return entries;
  return entries.slice(0, Math.max(opts.topN, 0));
}

/**
 * `part` as a percentage of `total`, rounded to one decimal place.
 *
 * Returns 0 for an empty subset instead of dividing by zero.
 */
export function percentageOf(part: number, total: number): number {
  if (total <= 0) return 0;
  return Math.round((part / total) * 1000) / 10;
}

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

/**
 * Label with the highest count; the first one wins ties.
 *
 * Returns `null` when there is nothing to rank (no entries or all zero).
 */
export function topLabel(entries: readonly CountEntry[]): string | null {
  let best: CountEntry | null = null;
  for (const e of entries) {
    if (e.count > 0 && (best === null || e.count > best.count)) best = e;
  }
  return best ? best.label : null;
}
