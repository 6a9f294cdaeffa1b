/**
 * Domain core: structural primitives only.
 * No parsing, no I/O.
 */

// --- Branded scalars ---

export type Brand<T, B extends string> = T & { readonly __brand: B };

/** Identifier token of a declared signal, exactly as written in the log. */
export type SignalId = Brand<string, "SignalId">;

/** Point in simulated time, in log time units (non-negative integer). */
export type LogTime = Brand<number, "LogTime">;

// --- Constructors (no validation; see validation.ts) ---

export const asSignalId = (id: string) => id as SignalId;
export const asLogTime = (t: number) => t as LogTime;

/** The four logic levels a digit may carry. */
export type LogicDigit = "0" | "1" | "x" | "z";

/** Encoded signal value: one digit for scalars, a digit string for vectors. */
export type Value = string;

/** One recorded transition of a signal. */
export interface ChangeEvent {
  readonly time: LogTime;
  readonly value: Value;
}

/** Ordered change history of one signal. Times non-decreasing. */
export type ChangeLog = readonly ChangeEvent[];
