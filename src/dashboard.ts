import { COLUMNS, hasColumn } from "./prepare";
import { AGE_BRACKETS } from "./parsing";
import {
  availableYears,
  countWhere,
  familyColumns,
  filterByYears,
  formatPercent,
  groupCount,
  indicatorGroupCounts,
  percentageOf,
  topLabel,
} from "./queries";
import type {
  Chart,
  CountEntry,
  DashboardView,
  EnrichedRecord,
  EnrichedTable,
  Metric,
} from "./types";

export const DASHBOARD_TITLE = "Violence Monitoring Dashboard";
export const SOURCE_NOTE =
  "Source: hospital notifications (SINAN) | Scope: women and girls";
export const FOOTER_NOTE =
  "Dashboard for monitoring violence against women and girls in indigenous territories.";

/**
 * Violence-type indicator columns and their chart labels.
 */
export const VIOLENCE_TYPES: ReadonlyArray<readonly [string, string]> = [
  ["VIOL_FISIC", "Physical"],
  ["VIOL_PSICO", "Psychological"],
  ["VIOL_SEXU", "Sexual"],
  ["VIOL_TORT", "Torture"],
  ["VIOL_FINAN", "Financial"],
  ["VIOL_NEGLI", "Neglect"],
];

export const MEANS_FAMILY = { prefix: "AG_", exclude: ["AG_OUTROS"], topN: 5 };
export const RELATIONSHIP_FAMILY = {
  prefix: "REL_",
  exclude: ["REL_TRAB"],
  topN: 7,
};

const ALCOHOL_COLORS: Record<string, string> = {
  Yes: "#FF4B4B",
  No: "#87CEEB",
  Ignored: "#D3D3D3",
};

function buildMetrics(
  table: EnrichedTable,
  subset: readonly EnrichedRecord[],
  brackets: CountEntry[]
): Metric[] {
  const total = subset.length;

  const physical = hasColumn(table, COLUMNS.physicalViolence)
    ? countWhere(subset, COLUMNS.physicalViolence)
    : null;

  const alcohol = hasColumn(table, COLUMNS.alcoholUse)
    ? formatPercent(percentageOf(countWhere(subset, COLUMNS.alcoholUse), total))
    : null;

  return [
    { id: "totalCases", label: "Total notified cases", value: total },
    {
      id: "physicalViolence",
      label: "Cases with physical violence",
      value: physical,
    },
    {
      id: "alcoholSuspicion",
      label: "Suspected alcohol use (perpetrator)",
      value: alcohol,
      help: "Share of cases where the perpetrator was suspected of using alcohol",
    },
    {
      id: "topAgeBracket",
      label: "Most affected age group",
      value: topLabel(brackets),
    },
  ];
}

function violenceTypeCounts(
  table: EnrichedTable,
  subset: readonly EnrichedRecord[]
): CountEntry[] | null {
  const present = VIOLENCE_TYPES.filter(([column]) => hasColumn(table, column));
  if (present.length === 0) return null;

  // Ascending so the largest bar ends up on top of the horizontal chart.
  return present
    .map(([column, label]) => ({ label, count: countWhere(subset, column) }))
    .sort((a, b) => a.count - b.count);
}

/**
 * Builds every chart whose source columns exist, in page order.
 */
function buildCharts(
  table: EnrichedTable,
  subset: readonly EnrichedRecord[],
  selectedYears: readonly number[],
  brackets: CountEntry[]
): Chart[] {
  const charts: Chart[] = [];

  if (hasColumn(table, COLUMNS.notificationDate)) {
    const byYear = new Map<number, number>();
    for (const r of subset) {
      if (r.year !== null) byYear.set(r.year, (byYear.get(r.year) ?? 0) + 1);
    }
    charts.push({
      id: "notificationsByYear",
      kind: "bar",
      section: "overview",
      title: "Notifications per year",
      categoryLabel: "Year",
      data: [...selectedYears]
        .sort((a, b) => a - b)
        .map((y) => ({ label: String(y), count: byYear.get(y) ?? 0 })),
      color: "#8B5CF6",
    });
  }

  if (
    hasColumn(table, COLUMNS.notificationDate) &&
    hasColumn(table, COLUMNS.birthDate)
  ) {
    charts.push({
      id: "ageBrackets",
      kind: "bar",
      section: "victim",
      title: "Distribution by age group",
      categoryLabel: "Age group",
      data: brackets,
      color: "#FF6B6B",
    });
  }

  if (hasColumn(table, COLUMNS.maritalStatus)) {
    charts.push({
      id: "maritalStatus",
      kind: "donut",
      section: "victim",
      title: "Marital status",
      categoryLabel: "Status",
      data: groupCount(subset, (r) => r.maritalStatus, { by: "count" }),
    });
  }

  const violence = violenceTypeCounts(table, subset);
  if (violence) {
    charts.push({
      id: "violenceTypes",
      kind: "horizontalBar",
      section: "violence",
      title: "Types of violence (multiple choice)",
      categoryLabel: "Type",
      data: violence,
      color: "#DC2626",
    });
  }

  const meansColumns = familyColumns(
    table.columns,
    MEANS_FAMILY.prefix,
    MEANS_FAMILY.exclude
  );
  if (meansColumns.length > 0) {
    charts.push({
      id: "meansUsed",
      kind: "bar",
      section: "violence",
      title: `Most used means (top ${MEANS_FAMILY.topN})`,
      categoryLabel: "Means",
      data: indicatorGroupCounts(subset, meansColumns, {
        prefix: MEANS_FAMILY.prefix,
        topN: MEANS_FAMILY.topN,
      }),
      color: "#FFA07A",
    });
  }

  const relationshipColumns = familyColumns(
    table.columns,
    RELATIONSHIP_FAMILY.prefix,
    RELATIONSHIP_FAMILY.exclude
  );
  if (relationshipColumns.length > 0) {
    charts.push({
      id: "relationship",
      kind: "bar",
      section: "perpetrator",
      title: "Relationship to the victim",
      categoryLabel: "Relationship",
      data: indicatorGroupCounts(subset, relationshipColumns, {
        prefix: RELATIONSHIP_FAMILY.prefix,
        topN: RELATIONSHIP_FAMILY.topN,
      }),
      color: "#4682B4",
    });
  }

  if (hasColumn(table, COLUMNS.alcoholUse)) {
    charts.push({
      id: "alcoholUse",
      kind: "pie",
      section: "perpetrator",
      title: "Suspected alcohol use",
      categoryLabel: "Alcohol use",
      data: groupCount(subset, (r) => r.alcoholUse, { by: "count" }),
      colorMap: ALCOHOL_COLORS,
    });
  }

  if (hasColumn(table, COLUMNS.perpetratorSex)) {
    charts.push({
      id: "perpetratorSex",
      kind: "donut",
      section: "perpetrator",
      title: "Perpetrator sex",
      categoryLabel: "Sex",
      data: groupCount(subset, (r) => r.perpetratorSex, { by: "count" }),
    });
  }

  return charts;
}

/**
 * Computes the full dashboard for a year selection.
 *
 * `selectedYears === null` selects every available year. Years that are not
 * in the table are dropped from the selection.
 */
export function buildDashboard(
  table: EnrichedTable,
  selectedYears: readonly number[] | null = null
): DashboardView {
  const years = availableYears(table);
  const selected =
    selectedYears === null
      ? years
      : years.filter((y) => selectedYears.includes(y));

  const subset = filterByYears(table, selected);
  const brackets = groupCount(subset, (r) => r.ageBracket, {
    by: "label",
    labels: AGE_BRACKETS,
  });

  return {
    title: DASHBOARD_TITLE,
    sourceNote: SOURCE_NOTE,
    footerNote: FOOTER_NOTE,
    availableYears: years,
    selectedYears: selected,
    totalRows: table.records.length,
    metrics: buildMetrics(table, subset, brackets),
    charts: buildCharts(table, subset, selected, brackets),
  };
}

/**
 * Parses a `years` query value ("2020,2022").
 *
 * `undefined` means no selection was made (all years); an empty string is an
 * explicit empty selection. Entries that are not whole numbers are ignored.
 */
export function parseYearsParam(value: unknown): number[] | null {
  if (value === undefined || value === null) return null;
  const parts = Array.isArray(value) ? value.map(String) : [String(value)];

  const years: number[] = [];
  for (const part of parts.flatMap((p) => p.split(","))) {
    const s = part.trim();
    if (!/^\d{4}$/.test(s)) continue;
    years.push(Number.parseInt(s, 10));
  }
  return years;
}
