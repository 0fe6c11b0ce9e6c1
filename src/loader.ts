/**
 * Spreadsheet loading with a process-wide memoized result.
 * Reads .xlsx/.xls/.csv through SheetJS.
 */
import * as fs from "node:fs";
import * as XLSX from "xlsx";
import { prepareTable } from "./prepare";
import { asString } from "./parsing";
import type { LoadResult, NotificationRecord, RawTable } from "./types";

export type WorkbookReader = (path: string) => XLSX.WorkBook;

export type Logger = Pick<Console, "log" | "warn">;

type DatasetLoaderOptions = {
  sheetName?: string;
  readImpl?: WorkbookReader;
  logger?: Logger;
  now?: () => Date;
};

// Date cells stay serial numbers so day parsing never depends on the host timezone.
function readWorkbook(path: string): XLSX.WorkBook {
  const fileBuffer = fs.readFileSync(path);
  return XLSX.read(fileBuffer, { type: "buffer" });
}

function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return asString(err) || "unknown error";
}

/**
 * Extracts the header row and data rows of a sheet.
 *
 * Blank cells become `null` so every row carries every header column.
 */
export function sheetToRawTable(sheet: XLSX.WorkSheet): RawTable {
  const header = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    blankrows: false,
  })[0];

  const columns = (header ?? [])
    .map((h) => asString(h).trim())
    .filter((h) => h !== "");

  const rows = XLSX.utils.sheet_to_json<NotificationRecord>(sheet, {
    defval: null,
    blankrows: false,
  });

  return { columns, rows };
}

export class DatasetLoader {
  private readonly sheetName: string | undefined;
  private readonly readImpl: WorkbookReader;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly cache = new Map<string, LoadResult>();

  constructor({
    sheetName,
    readImpl = readWorkbook,
    logger = console,
    now = () => new Date(),
  }: DatasetLoaderOptions = {}) {
    this.sheetName = sheetName;
    this.readImpl = readImpl;
    this.logger = logger;
    this.now = now;
  }

  /**
   * Reads and prepares the dataset at `path`, without caching.
   *
   * Never throws: a missing, unreadable or empty workbook yields
   * `{ status: "unavailable", cause }`.
   */
  load(path: string): LoadResult {
    let workbook: XLSX.WorkBook;
    try {
      workbook = this.readImpl(path);
    } catch (err) {
      return this.unavailable(
        `Failed to read data file ${path}: ${describeError(err)}`
      );
    }

    const sheetName =
      this.sheetName && workbook.Sheets[this.sheetName]
        ? this.sheetName
        : workbook.SheetNames[0];
    const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
    if (!sheetName || !sheet) {
      return this.unavailable(`Data file ${path} contains no sheets.`);
    }

    let raw: RawTable;
    try {
      raw = sheetToRawTable(sheet);
    } catch (err) {
      return this.unavailable(
        `Failed to parse sheet "${sheetName}" in ${path}: ${describeError(err)}`
      );
    }

    const table = prepareTable(raw);
    this.logger.log(
      `Loaded ${raw.rows.length} rows from ${path} (sheet "${sheetName}"), ${table.records.length} after population filter.`
    );

    return {
      status: "ready",
      table,
      source: {
        path,
        sheetName,
        rowsRead: raw.rows.length,
        loadedAt: this.now().toISOString(),
      },
    };
  }

  /**
   * Memoized `load(path)`.
   *
   * The first call per path does the work; every later call returns the same
   * outcome, unavailable included, until the process restarts.
   */
  get(path: string): LoadResult {
    const cached = this.cache.get(path);
    if (cached) return cached;

    const result = this.load(path);
    this.cache.set(path, result);
    return result;
  }

  private unavailable(cause: string): LoadResult {
    this.logger.warn(`Dataset unavailable: ${cause}`);
    return { status: "unavailable", cause };
  }
}

let defaultLoader: DatasetLoader | null = null;

/**
 * Process-wide dataset access used by the server and the CLI.
 *
 * The loader is created lazily on first use; `sheetName` only applies to that
 * first call.
 */
export function getDataset(path: string, sheetName?: string): LoadResult {
  if (!defaultLoader) defaultLoader = new DatasetLoader({ sheetName });
  return defaultLoader.get(path);
}
