/**
 * Classified tokens: one per command or keyword section of a log.
 * Immutable. No interpretation beyond syntax.
 */

import type { LogTime } from "./core.js";

/** Base token. `line` is the 1-based line where the construct starts. */
export interface TokenBase {
  readonly type: string;
  readonly line: number;
}

/** Keyword sections carrying free text: `$timescale`, `$date`, `$version`, `$comment`. */
export type HeaderKey = "timescale" | "date" | "version" | "comment";

export interface Header extends TokenBase {
  readonly type: "Header";
  readonly key: HeaderKey;
  readonly text: string;
}

export interface ScopeEnter extends TokenBase {
  readonly type: "ScopeEnter";
  readonly kind: string;
  readonly name: string;
}

export interface ScopeExit extends TokenBase {
  readonly type: "ScopeExit";
}

export interface VarDecl extends TokenBase {
  readonly type: "VarDecl";
  readonly kind: string;
  readonly width: number;
  readonly id: string;
  readonly name: string;
  /** Bit-range suffix as written, e.g. `[7:0]`. */
  readonly range?: string;
}

export interface EndDefinitions extends TokenBase {
  readonly type: "EndDefinitions";
}

export type DumpKind = "dumpvars" | "dumpall" | "dumpon" | "dumpoff";

export interface DumpBegin extends TokenBase {
  readonly type: "DumpBegin";
  readonly kind: DumpKind;
}

export interface DumpEnd extends TokenBase {
  readonly type: "DumpEnd";
}

export interface TimeMarker extends TokenBase {
  readonly type: "TimeMarker";
  readonly value: LogTime;
}

export interface ScalarChange extends TokenBase {
  readonly type: "ScalarChange";
  /** Lower-cased digit. */
  readonly value: string;
  readonly id: string;
}

export interface VectorChange extends TokenBase {
  readonly type: "VectorChange";
  /** Lower-cased digits, as written (no padding). */
  readonly bits: string;
  readonly id: string;
}

export interface MalformedLine extends TokenBase {
  readonly type: "MalformedLine";
  readonly text: string;
  readonly reason: string;
}

export type DeclarationToken = ScopeEnter | ScopeExit | VarDecl | EndDefinitions;

export type ChangeToken = ScalarChange | VectorChange;

export type Token =
  | Header
  | ScopeEnter
  | ScopeExit
  | VarDecl
  | EndDefinitions
  | DumpBegin
  | DumpEnd
  | TimeMarker
  | ScalarChange
  | VectorChange
  | MalformedLine;
