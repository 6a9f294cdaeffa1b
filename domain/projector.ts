/**
 * Tabular projection: samples several signals on one time grid.
 * Output is rectangular: every row has a value for every column.
 */

import { asLogTime, type ChangeLog, type LogTime, type Value } from "./core.js";
import { ValidationError } from "./errors.js";
import type { Signal } from "./symbolTable.js";
import { changeTimes, valueAtTime } from "./query.js";
import { mergeSortedUnique, sortedUnique } from "./utils.js";
import { requireGridTime } from "./validation.js";

/** Union of every distinct change time across the requested signals. */
export interface AllChangeTimesGrid {
  readonly kind: "allChangeTimes";
}

/** Caller-supplied times; sorted and de-duplicated before use. */
export interface ExplicitGrid {
  readonly kind: "explicit";
  readonly times: readonly number[];
}

/** start, start + step, ... up to and including end. */
export interface UniformGrid {
  readonly kind: "uniform";
  readonly start: number;
  readonly end: number;
  readonly step: number;
}

export type TimeGrid = AllChangeTimesGrid | ExplicitGrid | UniformGrid;

export const ALL_CHANGE_TIMES: AllChangeTimesGrid = { kind: "allChangeTimes" };

export interface TableRow {
  readonly time: LogTime;
  /** One value per column, in column order. */
  readonly values: readonly Value[];
}

export interface Table {
  readonly columns: readonly Signal[];
  /** Strictly ascending by time. */
  readonly rows: readonly TableRow[];
}

/** Signal plus its change log: what the projector needs per column. */
export interface ProjectionSource {
  readonly signal: Signal;
  readonly log: ChangeLog;
}

/** Upper bound on rows a uniform grid may expand to. */
export const MAX_UNIFORM_ROWS = 1_000_000;

function uniformTimes(grid: UniformGrid): LogTime[] {
  const start = requireGridTime(grid.start, "uniform grid start");
  const end = requireGridTime(grid.end, "uniform grid end");
  if (!Number.isSafeInteger(grid.step) || grid.step <= 0) {
    throw new ValidationError("uniform grid step must be a positive integer", { step: grid.step });
  }
  if (end < start) {
    throw new ValidationError("uniform grid end precedes start", { start, end });
  }
  const count = Math.floor((end - start) / grid.step) + 1;
  if (count > MAX_UNIFORM_ROWS) {
    throw new ValidationError("uniform grid too large", { count, max: MAX_UNIFORM_ROWS });
  }
  const out: LogTime[] = [];
  for (let i = 0; i < count; i++) out.push(asLogTime(start + i * grid.step));
  return out;
}

/** Resolves a grid into strictly ascending times. */
export function resolveGrid(grid: TimeGrid, sources: readonly ProjectionSource[]): LogTime[] {
  switch (grid.kind) {
    case "allChangeTimes":
      return mergeSortedUnique(sources.map((s) => changeTimes(s.log)));
    case "explicit":
      return sortedUnique(grid.times.map((t) => requireGridTime(t, "explicit grid")));
    case "uniform":
      return uniformTimes(grid);
  }
}

/** Samples every source at every grid time. */
export function projectSources(sources: readonly ProjectionSource[], grid: TimeGrid): Table {
  const times = resolveGrid(grid, sources);
  const rows: TableRow[] = times.map((time) => ({
    time,
    values: sources.map((s) => valueAtTime(s.log, s.signal.width, time)),
  }));
  return { columns: sources.map((s) => s.signal), rows };
}
