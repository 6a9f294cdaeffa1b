/**
 * Report configuration: read from the environment in one place.
 * Swap values without touching domain/ or the exporter.
 */

import path from "node:path";

export interface ReportConfig {
  /** Directory receiving generated files when the command line names none. */
  readonly outputDir: string;
  /** Prefix of every generated file name. */
  readonly filePrefix: string;
  readonly delimiter: string;
  /** Inputs larger than this are rejected before parsing. */
  readonly maxBytes: number;
}

export const DEFAULT_MAX_BYTES = 256 * 1024 * 1024;

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

export const consoleLogger: Logger = {
  info: (message) => console.info(message),
  warn: (message) => console.warn(message),
  error: (message, err) => {
    if (err === undefined) console.error(message);
    else console.error(message, err);
  },
};

function positiveInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || !/^\d+$/.test(raw.trim())) return fallback;
  const n = Number(raw.trim());
  return Number.isSafeInteger(n) && n > 0 ? n : fallback;
}

function nonEmpty(raw: string | undefined, fallback: string): string {
  return raw !== undefined && raw !== "" ? raw : fallback;
}

/** Invalid or missing values fall back to defaults. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ReportConfig {
  const delimiter = env.VCD_CSV_DELIMITER;
  return {
    outputDir: path.resolve(nonEmpty(env.VCD_OUTPUT_DIR, "./results")),
    filePrefix: nonEmpty(env.VCD_FILE_PREFIX, "vcd"),
    // A delimiter must be one character and cannot be a quote or line break.
    delimiter: delimiter !== undefined && delimiter.length === 1 && !/["\r\n]/.test(delimiter) ? delimiter : ",",
    maxBytes: positiveInt(env.VCD_MAX_BYTES, DEFAULT_MAX_BYTES),
  };
}
