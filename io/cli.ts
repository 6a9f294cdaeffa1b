/**
 * Command-line flow: parse one VCD file, export its report.
 * Injected env and logger for testability. No process.exit here.
 */

import path from "node:path";
import { exportReport } from "./csvExport.js";
import { consoleLogger, loadConfig, type Logger } from "./config.js";
import { loadVcdFile } from "./vcdFile.js";

export const USAGE = "Usage: vcd-report <file.vcd> [outputDir]";

export interface CliDeps {
  readonly env?: NodeJS.ProcessEnv;
  readonly logger?: Logger;
}

/** Returns the process exit code: 0 on success, 1 on bad usage or a fatal parse error. */
export async function runCli(args: readonly string[], deps: CliDeps = {}): Promise<number> {
  const logger = deps.logger ?? consoleLogger;
  const config = loadConfig(deps.env ?? process.env);
  const [input, outArg, ...extra] = args;

  if (input === undefined || extra.length > 0) {
    logger.error(USAGE);
    return 1;
  }

  const file = path.resolve(input);
  const outDir = outArg !== undefined ? path.resolve(outArg) : config.outputDir;
  logger.info(`Parsing ${file}`);

  const result = await loadVcdFile(file, { maxBytes: config.maxBytes });
  if (!result.ok) {
    logger.error(`Failed to parse VCD: ${result.error.message}`, result.error.metadata);
    return 1;
  }

  const { document, diagnostics } = result;
  logger.info(`Parsed ${document.signals().length} signals, max time ${document.maxTime}, ${diagnostics.length} diagnostics`);

  const summary = await exportReport(
    document,
    diagnostics,
    outDir,
    { prefix: config.filePrefix, delimiter: config.delimiter, source: file },
    { logger }
  );
  logger.info(`Generated ${summary.files.length} files in ${outDir}`);
  return 0;
}
