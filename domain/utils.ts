/**
 * Time-list helpers: pure, no document state.
 */

import type { LogTime } from "./core.js";

/** Compare two log times. Returns < 0 if a < b, 0 if equal, > 0 if a > b. */
export function compareLogTimes(a: LogTime, b: LogTime): number {
  return a - b;
}

/** Sorted ascending, duplicates removed. Does not mutate the input. */
export function sortedUnique(times: readonly LogTime[]): LogTime[] {
  const sorted = [...times].sort(compareLogTimes);
  return sorted.filter((t, i) => i === 0 || t !== sorted[i - 1]);
}

/** Union of several ascending lists, ascending with duplicates removed. */
export function mergeSortedUnique(lists: readonly (readonly LogTime[])[]): LogTime[] {
  return sortedUnique(lists.flat());
}
