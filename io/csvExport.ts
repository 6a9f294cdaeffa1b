/**
 * Report export: writes CSV and JSON artifacts for one parsed document.
 * Each file is written to a temp name then renamed into place.
 */

import { promises as fs } from "node:fs";
import path from "node:path";
import { countDiagnostics, describeDiagnostic, type Diagnostic, type DiagnosticKind } from "../domain/diagnostics.js";
import type { VcdDocument } from "../domain/document.js";
import { signalSeries, signalSummary, summaryToDelimited, tableToDelimited } from "../domain/reports.js";
import { formatTimescale } from "../domain/timescale.js";
import { consoleLogger, type Logger } from "./config.js";
import { safeFileStem } from "./safeId.js";

export interface ExportOptions {
  readonly prefix: string;
  readonly delimiter: string;
  /** Recorded in the JSON summary. */
  readonly source?: string;
}

export interface ExportDeps {
  readonly logger?: Logger;
}

export interface ExportSummary {
  readonly source?: string;
  readonly signalsFound: number;
  readonly maxTime: number;
  readonly timescale: string;
  /** Absolute paths of every file written, summary JSON last. */
  readonly files: readonly string[];
  readonly diagnostics: Partial<Record<DiagnosticKind, number>>;
}

async function writeFileAtomic(file: string, contents: string): Promise<void> {
  const tmp = `${file}.tmp`;
  try {
    await fs.writeFile(tmp, contents, "utf8");
    await fs.rename(tmp, file);
  } catch (err: unknown) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}

/** Distinct file stems per signal path; a numeric suffix resolves collisions. */
function assignStems(paths: readonly string[]): string[] {
  const used = new Set<string>();
  return paths.map((p) => {
    const base = safeFileStem(p);
    let stem = base;
    for (let n = 2; used.has(stem); n++) stem = `${base}_${n}`;
    used.add(stem);
    return stem;
  });
}

export async function exportReport(
  doc: VcdDocument,
  diagnostics: readonly Diagnostic[],
  outDir: string,
  options: ExportOptions,
  deps: ExportDeps = {}
): Promise<ExportSummary> {
  const logger = deps.logger ?? consoleLogger;
  const { prefix, delimiter } = options;
  const timescale = formatTimescale(doc.timescale);
  const timeHeader = `Time (${timescale})`;
  const files: string[] = [];

  for (const d of diagnostics) logger.warn(describeDiagnostic(d));

  await fs.mkdir(outDir, { recursive: true });

  async function emit(name: string, contents: string): Promise<void> {
    const file = path.join(outDir, name);
    await writeFileAtomic(file, contents);
    files.push(file);
    logger.info(`Generated ${file}`);
  }

  const signals = doc.signals();
  const timing = doc.project(signals.map((s) => s.id));
  await emit(`${prefix}_timing_data.csv`, tableToDelimited(timing, { delimiter, timeHeader }));
  await emit(`${prefix}_signal_summary.csv`, summaryToDelimited(signalSummary(doc), delimiter));

  const stems = assignStems(signals.map((s) => s.path));
  for (const [i, s] of signals.entries()) {
    const series = signalSeries(doc, s.id);
    await emit(`${prefix}_${stems[i] ?? safeFileStem(s.id)}_data.csv`, tableToDelimited(series, { delimiter, timeHeader }));
  }

  const summaryFile = path.join(outDir, `${prefix}_analysis_summary.json`);
  const summary: ExportSummary = {
    ...(options.source !== undefined && { source: options.source }),
    signalsFound: signals.length,
    maxTime: doc.maxTime,
    timescale,
    files: [...files, summaryFile],
    diagnostics: countDiagnostics(diagnostics),
  };
  await writeFileAtomic(summaryFile, `${JSON.stringify(summary, null, 2)}\n`);
  logger.info(`Analysis summary saved: ${summaryFile}`);
  return summary;
}
