/**
 * Point-in-time queries over a single sparse change log.
 * Pure functions; no document state.
 */

import type { ChangeEvent, ChangeLog, LogTime, Value } from "./core.js";
import { unknownValue } from "./values.js";

/**
 * Index of the last change with `time <= t`, or -1 when `t` precedes every change.
 * Binary search; among equal times the last appended wins.
 */
export function lastIndexAtOrBefore(log: ChangeLog, t: number): number {
  let lo = 0;
  let hi = log.length;
  // Invariant: log[0..lo) has time <= t, log[hi..) has time > t.
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const entry = log[mid];
    if (entry !== undefined && entry.time <= t) lo = mid + 1;
    else hi = mid;
  }
  return lo - 1;
}

/** Value in effect at `t`: latest change at or before `t`, else width-replicated 'x'. */
export function valueAtTime(log: ChangeLog, width: number, t: number): Value {
  const entry = log[lastIndexAtOrBefore(log, t)];
  return entry === undefined ? unknownValue(width) : entry.value;
}

/** A change that altered the held value. */
export interface Transition {
  readonly time: LogTime;
  readonly from: Value;
  readonly to: Value;
}

export interface TransitionRange {
  /** Inclusive lower bound. */
  readonly from?: number;
  /** Inclusive upper bound. */
  readonly to?: number;
}

/**
 * Changes whose value differs from the value held just before them.
 * Repeated identical values are skipped; several changes at one time each count.
 */
export function transitionsOf(log: ChangeLog, width: number, range: TransitionRange = {}): Transition[] {
  const lower = range.from ?? Number.NEGATIVE_INFINITY;
  const upper = range.to ?? Number.POSITIVE_INFINITY;
  const out: Transition[] = [];
  let held = unknownValue(width);
  for (const e of log) {
    if (e.value !== held && e.time >= lower && e.time <= upper) {
      out.push({ time: e.time, from: held, to: e.value });
    }
    held = e.value;
  }
  return out;
}

/** Distinct change times of one log, ascending. */
export function changeTimes(log: ChangeLog): LogTime[] {
  const out: LogTime[] = [];
  let last: number | undefined;
  for (const e of log) {
    if (e.time !== last) {
      out.push(e.time);
      last = e.time;
    }
  }
  return out;
}

/** Last recorded change, if any. */
export function lastChange(log: ChangeLog): ChangeEvent | undefined {
  return log[log.length - 1];
}
