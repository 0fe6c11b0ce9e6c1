/**
 * Barrel exports.
 *
 * Re-exports the data modules so consumers can import from `src`.
 * The CLI and server entrypoints are not included since they run on import.
 */
export * from "./codes";
export * from "./config";
export * from "./dashboard";
export * from "./loader";
export * from "./parsing";
export * from "./prepare";
export * from "./queries";
export * from "./types";
