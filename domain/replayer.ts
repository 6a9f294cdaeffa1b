/**
 * Change-log replayer: walks time markers and value changes in file order.
 * One time cursor, starting at 0. Appends (cursor, value) per signal.
 */

import { asLogTime, type ChangeEvent, type LogTime, type SignalId } from "./core.js";
import type { Diagnostic } from "./diagnostics.js";
import type { Signal } from "./symbolTable.js";
import type { ChangeToken, TimeMarker } from "./tokens.js";
import { encodeValue } from "./values.js";

/** Resolves an identifier token to its declared signal. */
export type SignalLookup = (id: string) => Signal | undefined;

export class ChangeLogReplayer {
  private readonly logs = new Map<SignalId, ChangeEvent[]>();
  private readonly lookup: SignalLookup;
  private readonly diagnostics: Diagnostic[];
  private cursor: LogTime = asLogTime(0);
  private maxSeen: LogTime = asLogTime(0);

  constructor(lookup: SignalLookup, diagnostics: Diagnostic[]) {
    this.lookup = lookup;
    this.diagnostics = diagnostics;
  }

  get currentTime(): LogTime {
    return this.cursor;
  }

  get maxTime(): LogTime {
    return this.maxSeen;
  }

  apply(token: TimeMarker | ChangeToken): void {
    if (token.type === "TimeMarker") {
      this.advance(token);
      return;
    }

    const signal = this.lookup(token.id);
    if (!signal) {
      this.diagnostics.push({ kind: "UnknownSignalReference", line: token.line, id: token.id });
      return;
    }

    const digits = token.type === "ScalarChange" ? token.value : token.bits;
    const { value, overflow } = encodeValue(digits, signal.width);
    if (overflow) {
      this.diagnostics.push({
        kind: "WidthMismatch",
        line: token.line,
        id: token.id,
        declaredWidth: signal.width,
        valueWidth: digits.length,
      });
    }

    let log = this.logs.get(signal.id);
    if (!log) {
      log = [];
      this.logs.set(signal.id, log);
    }
    log.push({ time: this.cursor, value });
  }

  private advance(marker: TimeMarker): void {
    if (marker.value < this.cursor) {
      this.diagnostics.push({
        kind: "TimeOrderingViolation",
        line: marker.line,
        previous: this.cursor,
        requested: marker.value,
      });
      return;
    }
    this.cursor = marker.value;
    if (this.cursor > this.maxSeen) this.maxSeen = this.cursor;
  }

  /** Hands over the completed logs. Signals with no changes get an empty log. */
  finish(signals: readonly Signal[]): Map<SignalId, readonly ChangeEvent[]> {
    const out = new Map<SignalId, readonly ChangeEvent[]>();
    for (const s of signals) {
      out.set(s.id, this.logs.get(s.id) ?? []);
    }
    return out;
  }
}
