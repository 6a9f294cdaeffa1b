/**
 * Value encoding policy and display helpers.
 *
 * Vectors shorter than the declared width are left-padded with '0',
 * whatever their leading digit. Longer values are kept as written.
 */

import type { Value } from "./core.js";
import { invariant } from "./validation.js";

/** Value of a signal before its first recorded change. */
export function unknownValue(width: number): Value {
  invariant(Number.isSafeInteger(width) && width >= 1, `invalid signal width ${width}`);
  return "x".repeat(width);
}

export interface EncodedValue {
  readonly value: Value;
  /** True when the written value had more digits than the declared width. */
  readonly overflow: boolean;
}

/** Applies the padding policy to lower-cased digits written for a signal of `width` bits. */
export function encodeValue(digits: string, width: number): EncodedValue {
  if (digits.length > width) return { value: digits, overflow: true };
  return { value: digits.padStart(width, "0"), overflow: false };
}

/** True iff the value holds only 0 and 1 digits. */
export function isKnownValue(value: Value): boolean {
  return /^[01]+$/.test(value);
}

/** Numeric value of a fully known vector; null when it contains x or z. */
export function valueToBigInt(value: Value): bigint | null {
  if (!isKnownValue(value)) return null;
  return BigInt(`0b${value}`);
}

export type Radix = "bin" | "hex" | "dec";

/**
 * Formats a value for display. Values containing x or z are returned unchanged.
 * Hex is zero-padded to the nibble count of the value.
 */
export function formatValue(value: Value, radix: Radix): string {
  const n = valueToBigInt(value);
  if (n === null) return value;
  switch (radix) {
    case "bin":
      return value;
    case "dec":
      return n.toString(10);
    case "hex":
      return `0x${n.toString(16).toUpperCase().padStart(Math.ceil(value.length / 4), "0")}`;
  }
}
