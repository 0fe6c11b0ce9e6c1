/**
 * One row of the source sheet.
 *
 * The surveillance schema is wide and varies between exports, so rows are
 * modeled as arbitrary objects and the fields we need are parsed on demand.
 */
export type NotificationRecord = Record<string, unknown>;

/**
 * The sheet as read from disk: header columns plus rows.
 *
 * `columns` is kept separately so column presence is known even when the sheet
 * has no data rows.
 */
export type RawTable = {
  columns: string[];
  rows: NotificationRecord[];
};

export type AgeBracket =
  | "Child (0-9)"
  | "Adolescent (10-19)"
  | "Young adult (20-24)"
  | "Adult (25-59)"
  | "Elderly (60+)";

/**
 * A source row plus every field derived during preparation.
 *
 * Decoded labels are `null` only when the source column is absent; a present
 * column always decodes to a label.
 */
export type EnrichedRecord = {
  raw: NotificationRecord;
  notificationDate: Date | null;
  birthDate: Date | null;
  occurrenceDate: Date | null;
  year: number | null;
  age: number | null;
  ageBracket: AgeBracket | null;
  alcoholUse: string | null;
  maritalStatus: string | null;
  perpetratorSex: string | null;
};

export type EnrichedTable = {
  readonly columns: readonly string[];
  readonly records: readonly EnrichedRecord[];
};

export type DatasetSource = {
  path: string;
  sheetName: string;
  rowsRead: number;
  loadedAt: string;
};

export type LoadResult =
  | { status: "ready"; table: EnrichedTable; source: DatasetSource }
  | { status: "unavailable"; cause: string };

export type CountEntry = {
  label: string;
  count: number;
};

export type MetricId =
  | "totalCases"
  | "physicalViolence"
  | "alcoholSuspicion"
  | "topAgeBracket";

/**
 * `value: null` means the metric cannot be computed for this dataset (a
 * missing column or an empty subset) and is shown as a placeholder.
 */
export type Metric = {
  id: MetricId;
  label: string;
  value: number | string | null;
  help?: string;
};

export type ChartId =
  | "notificationsByYear"
  | "ageBrackets"
  | "maritalStatus"
  | "violenceTypes"
  | "meansUsed"
  | "relationship"
  | "alcoholUse"
  | "perpetratorSex";

export type ChartKind = "bar" | "horizontalBar" | "pie" | "donut";

export type ChartSection = "victim" | "violence" | "perpetrator" | "overview";

export type Chart = {
  id: ChartId;
  kind: ChartKind;
  section: ChartSection;
  title: string;
  categoryLabel: string;
  data: CountEntry[];
  color?: string;
  colorMap?: Record<string, string>;
};

export type DashboardView = {
  title: string;
  sourceNote: string;
  footerNote: string;
  availableYears: number[];
  selectedYears: number[];
  totalRows: number;
  metrics: Metric[];
  charts: Chart[];
};
