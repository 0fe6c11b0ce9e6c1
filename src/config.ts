import path from "node:path";

export const DEFAULT_DATA_PATH = "data/violence-notifications.xlsx";
export const DEFAULT_PORT = 3000;

/**
 * Reads a flag value from argv.
 *
 * Supports both styles:
 * - `--data file.xlsx`
 * - `--data=file.xlsx`
 *
 * Returns `null` if the flag is not present or has no value.
 */
export function getArgValue(
  flag: string,
  argv: readonly string[] = process.argv
): string | null {
  const idx = argv.findIndex((a) => a === flag || a.startsWith(`${flag}=`));
  if (idx === -1) return null;
  const a = argv[idx];
  if (a.includes("=")) return a.split("=").slice(1).join("=");
  const next = argv[idx + 1];
  return next && !next.startsWith("--") ? next : null;
}

function envValue(env: Record<string, string | undefined>, name: string): string | null {
  const v = env[name];
  return v && v.trim() ? v.trim() : null;
}

export type AppConfig = {
  dataPath: string;
  sheetName: string | undefined;
  port: number;
  dev: boolean;
};

/**
 * Resolves configuration: argv flag, then environment, then default.
 *
 * The data path is resolved against the working directory so the memoized
 * load is keyed by one absolute path.
 */
export function loadConfig(
  argv: readonly string[] = process.argv,
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const dataPath =
    getArgValue("--data", argv) ??
    envValue(env, "VIOLENCE_DATA_PATH") ??
    DEFAULT_DATA_PATH;

  const sheetName =
    getArgValue("--sheet", argv) ?? envValue(env, "VIOLENCE_DATA_SHEET");

  const port = Number.parseInt(envValue(env, "PORT") ?? "", 10);

  return {
    dataPath: path.resolve(dataPath),
    sheetName: sheetName ?? undefined,
    port: Number.isFinite(port) && port > 0 ? port : DEFAULT_PORT,
    dev: env.NODE_ENV !== "production",
  };
}
