/**
 * Reports: pure functions over tables and documents.
 * Delimited text, per-signal series, summary statistics.
 */

import type { VcdDocument } from "./document.js";
import type { Table, TableRow } from "./projector.js";
import { lastChange } from "./query.js";
import type { Signal } from "./symbolTable.js";
import { unknownValue } from "./values.js";

// --- Delimited text ---

export interface DelimitedOptions {
  readonly delimiter?: string;
  /** Header of the time column. Default `Time`. */
  readonly timeHeader?: string;
  /** Header of each signal column. Default: the signal path. */
  readonly columnLabel?: (signal: Signal) => string;
}

/** RFC 4180 quoting: cells holding the delimiter, quotes or line breaks are quoted. */
export function quoteCell(cell: string, delimiter: string): string {
  if (cell.includes(delimiter) || /["\r\n]/.test(cell)) {
    return `"${cell.replace(/"/g, '""')}"`;
  }
  return cell;
}

function joinRow(cells: readonly string[], delimiter: string): string {
  return cells.map((c) => quoteCell(c, delimiter)).join(delimiter);
}

/** Header line then one line per row; every line ends with `\n`. */
export function tableToDelimited(table: Table, options: DelimitedOptions = {}): string {
  const delimiter = options.delimiter ?? ",";
  const label = options.columnLabel ?? ((s: Signal) => s.path);
  const lines = [joinRow([options.timeHeader ?? "Time", ...table.columns.map(label)], delimiter)];
  for (const row of table.rows) {
    lines.push(joinRow([String(row.time), ...row.values], delimiter));
  }
  return lines.map((l) => `${l}\n`).join("");
}

// --- Per-signal series ---

/** Raw change list of one signal as a one-column table (duplicate times kept). */
export function signalSeries(doc: VcdDocument, id: string): Table {
  const signal = doc.requireSignal(id);
  const rows: TableRow[] = doc.changes(id).map((c) => ({ time: c.time, values: [c.value] }));
  return { columns: [signal], rows };
}

// --- Summary statistics ---

export type Activity = "Static" | "Low" | "Medium" | "High";

/** Activity level from a change count: 0 Static, 1 Low, 2 Medium, more High. */
export function activityOf(changeCount: number): Activity {
  if (changeCount === 0) return "Static";
  if (changeCount === 1) return "Low";
  if (changeCount === 2) return "Medium";
  return "High";
}

export interface SignalSummaryRow {
  readonly id: string;
  readonly path: string;
  readonly width: number;
  readonly changeCount: number;
  /** Last recorded value, or the unknown value when the signal never changed. */
  readonly finalValue: string;
  readonly activity: Activity;
}

export function signalSummary(doc: VcdDocument): SignalSummaryRow[] {
  return doc.signals().map((s) => {
    const changes = doc.changes(s.id);
    const changeCount = changes.length;
    return {
      id: s.id,
      path: s.path,
      width: s.width,
      changeCount,
      finalValue: lastChange(changes)?.value ?? unknownValue(s.width),
      activity: activityOf(changeCount),
    };
  });
}

/** Summary rows as delimited text, with a header line. */
export function summaryToDelimited(rows: readonly SignalSummaryRow[], delimiter = ","): string {
  const lines = [joinRow(["Signal Name", "Width (bits)", "Total Changes", "Final Value", "Activity"], delimiter)];
  for (const r of rows) {
    lines.push(joinRow([r.path, String(r.width), String(r.changeCount), r.finalValue, r.activity], delimiter));
  }
  return lines.map((l) => `${l}\n`).join("");
}

/** Value-altering transitions per signal path. Defaults to every signal. */
export function transitionCounts(doc: VcdDocument, ids?: readonly string[]): Map<string, number> {
  const selected = ids === undefined ? doc.signals() : ids.map((id) => doc.requireSignal(id));
  const counts = new Map<string, number>();
  for (const s of selected) {
    counts.set(s.path, doc.transitions(s.id).length);
  }
  return counts;
}

export interface EdgeCounts {
  readonly rising: number;
  readonly falling: number;
}

/** Rising (0→1) and falling (1→0) edges of a signal's least significant bit. */
export function countEdges(doc: VcdDocument, id: string): EdgeCounts {
  let rising = 0;
  let falling = 0;
  for (const t of doc.transitions(id)) {
    const from = t.from.charAt(t.from.length - 1);
    const to = t.to.charAt(t.to.length - 1);
    if (from === "0" && to === "1") rising++;
    else if (from === "1" && to === "0") falling++;
  }
  return { rising, falling };
}
