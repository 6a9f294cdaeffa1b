/**
 * Parse diagnostics: recoverable anomalies, recorded as data in file order.
 * A diagnostic never aborts a parse.
 */

import type { LogTime } from "./core.js";

export interface DiagnosticBase {
  readonly kind: string;
  /** 1-based line of the offending construct. */
  readonly line: number;
}

export interface MalformedLineDiagnostic extends DiagnosticBase {
  readonly kind: "MalformedLine";
  readonly text: string;
  readonly reason: string;
}

export interface DuplicateIdentifier extends DiagnosticBase {
  readonly kind: "DuplicateIdentifier";
  readonly id: string;
  /** Path of the declaration that was kept. */
  readonly keptPath: string;
  /** Path of the declaration that was ignored. */
  readonly ignoredPath: string;
}

export interface DuplicateName extends DiagnosticBase {
  readonly kind: "DuplicateName";
  readonly path: string;
  readonly keptId: string;
  readonly ignoredId: string;
}

export interface UnbalancedScope extends DiagnosticBase {
  readonly kind: "UnbalancedScope";
  /** Scope stack when the imbalance was found. */
  readonly openScopes: readonly string[];
}

export interface DeclarationAfterFreeze extends DiagnosticBase {
  readonly kind: "DeclarationAfterFreeze";
  readonly token: string;
}

export interface EventBeforeDefinitions extends DiagnosticBase {
  readonly kind: "EventBeforeDefinitions";
  readonly token: string;
}

export interface TimeOrderingViolation extends DiagnosticBase {
  readonly kind: "TimeOrderingViolation";
  readonly previous: LogTime;
  readonly requested: LogTime;
}

export interface UnknownSignalReference extends DiagnosticBase {
  readonly kind: "UnknownSignalReference";
  readonly id: string;
}

export interface WidthMismatch extends DiagnosticBase {
  readonly kind: "WidthMismatch";
  readonly id: string;
  readonly declaredWidth: number;
  readonly valueWidth: number;
}

export type Diagnostic =
  | MalformedLineDiagnostic
  | DuplicateIdentifier
  | DuplicateName
  | UnbalancedScope
  | DeclarationAfterFreeze
  | EventBeforeDefinitions
  | TimeOrderingViolation
  | UnknownSignalReference
  | WidthMismatch;

export type DiagnosticKind = Diagnostic["kind"];

/** One-line human description, prefixed with the line number. */
export function describeDiagnostic(d: Diagnostic): string {
  const at = `line ${d.line}`;
  switch (d.kind) {
    case "MalformedLine":
      return `${at}: malformed line (${d.reason}): ${d.text}`;
    case "DuplicateIdentifier":
      return `${at}: identifier "${d.id}" already declared as ${d.keptPath}; ignoring ${d.ignoredPath}`;
    case "DuplicateName":
      return `${at}: ${d.path} already declared with identifier "${d.keptId}"; ignoring "${d.ignoredId}"`;
    case "UnbalancedScope":
      return d.openScopes.length === 0
        ? `${at}: $upscope without an open scope`
        : `${at}: scopes left open: ${d.openScopes.join(".")}`;
    case "DeclarationAfterFreeze":
      return `${at}: ${d.token} after $enddefinitions ignored`;
    case "EventBeforeDefinitions":
      return `${at}: ${d.token} before $enddefinitions ignored`;
    case "TimeOrderingViolation":
      return `${at}: time #${d.requested} is before #${d.previous}; keeping #${d.previous}`;
    case "UnknownSignalReference":
      return `${at}: change for undeclared identifier "${d.id}" discarded`;
    case "WidthMismatch":
      return `${at}: value for "${d.id}" has ${d.valueWidth} digits, declared width ${d.declaredWidth}`;
  }
}

/** Count of diagnostics per kind. Kinds with no entries are omitted. */
export function countDiagnostics(diagnostics: readonly Diagnostic[]): Partial<Record<DiagnosticKind, number>> {
  const counts: Partial<Record<DiagnosticKind, number>> = {};
  for (const d of diagnostics) {
    counts[d.kind] = (counts[d.kind] ?? 0) + 1;
  }
  return counts;
}
