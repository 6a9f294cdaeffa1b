/**
 * Timescale: one scale factor per document, applied to every timestamp.
 */

export type TimeUnit = "s" | "ms" | "us" | "ns" | "ps" | "fs";
export type TimeMagnitude = 1 | 10 | 100;

export interface Timescale {
  readonly magnitude: TimeMagnitude;
  readonly unit: TimeUnit;
}

/** Used when the header carries no `$timescale`. */
export const DEFAULT_TIMESCALE: Timescale = { magnitude: 1, unit: "ns" };

const UNIT_SECONDS: Record<TimeUnit, number> = {
  s: 1,
  ms: 1e-3,
  us: 1e-6,
  ns: 1e-9,
  ps: 1e-12,
  fs: 1e-15,
};

/** Exponent of ten per unit; keeps conversions between units exact. */
const UNIT_EXPONENT: Record<TimeUnit, number> = {
  s: 0,
  ms: -3,
  us: -6,
  ns: -9,
  ps: -12,
  fs: -15,
};

function isTimeUnit(text: string): text is TimeUnit {
  return Object.prototype.hasOwnProperty.call(UNIT_SECONDS, text);
}

function isMagnitude(n: number): n is TimeMagnitude {
  return n === 1 || n === 10 || n === 100;
}

/**
 * Parses the body of a `$timescale` section: `1ns`, `10 ps`, `100us`.
 * Returns null when the text is not a valid timescale.
 */
export function parseTimescale(text: string): Timescale | null {
  const m = /^\s*(\d+)\s*([a-z]+)\s*$/i.exec(text);
  if (!m) return null;
  const magnitude = Number(m[1]);
  const unit = (m[2] ?? "").toLowerCase();
  if (!isMagnitude(magnitude) || !isTimeUnit(unit)) return null;
  return { magnitude, unit };
}

export function formatTimescale(ts: Timescale): string {
  return `${ts.magnitude}${ts.unit}`;
}

/** Seconds represented by `ticks` log time units. */
export function ticksToSeconds(ticks: number, ts: Timescale): number {
  return ticks * ts.magnitude * UNIT_SECONDS[ts.unit];
}

/** Converts `ticks` log time units into the given unit. */
export function ticksToUnit(ticks: number, ts: Timescale, unit: TimeUnit): number {
  const exp = UNIT_EXPONENT[ts.unit] - UNIT_EXPONENT[unit];
  const scaled = ticks * ts.magnitude;
  return exp >= 0 ? scaled * 10 ** exp : scaled / 10 ** -exp;
}
