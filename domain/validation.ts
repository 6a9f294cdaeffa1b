/**
 * Validation helpers: assertions plus checks on log times and value digits.
 */

import { asLogTime, type LogTime, type LogicDigit } from "./core.js";
import { ValidationError } from "./errors.js";

/** Throws if condition is falsy. TypeScript narrows after a successful call. */
export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new Error(message);
  }
}

/** Call in unreachable branches (e.g. exhaustive switch). Always throws. */
export function neverReached(value: never, message = "Unreachable"): never {
  throw new Error(`${message}: ${JSON.stringify(value)}`);
}

const DIGITS = new Set<string>(["0", "1", "x", "z"]);

export function isLogicDigit(ch: string): ch is LogicDigit {
  return DIGITS.has(ch);
}

/** True iff every character is one of 0, 1, x, z (case-insensitive). */
export function isBitString(text: string): boolean {
  if (text.length === 0) return false;
  for (const ch of text.toLowerCase()) {
    if (!DIGITS.has(ch)) return false;
  }
  return true;
}

/** Parses the digits of a `#<n>` marker. Null when not a non-negative safe integer. */
export function parseTimeDigits(text: string): LogTime | null {
  if (!/^\d+$/.test(text)) return null;
  const n = Number(text);
  return Number.isSafeInteger(n) ? asLogTime(n) : null;
}

/** Query-side time check. Any finite number is accepted; fractions are not rounded. */
export function requireQueryTime(t: number, context: string): LogTime {
  if (typeof t !== "number" || !Number.isFinite(t)) {
    throw new ValidationError(`${context}: time must be a finite number`, { time: t });
  }
  return asLogTime(t);
}

/** Grid-side time check: non-negative integer. */
export function requireGridTime(t: number, context: string): LogTime {
  if (!Number.isSafeInteger(t) || t < 0) {
    throw new ValidationError(`${context}: time must be a non-negative integer`, { time: t });
  }
  return asLogTime(t);
}
