/**
 * Symbol table: declared signals keyed by identifier token.
 * Scope path is flattened once, at declaration time.
 * Frozen at `$enddefinitions`; later declarations are reported, not applied.
 */

import { asSignalId, type SignalId } from "./core.js";
import type { Diagnostic } from "./diagnostics.js";
import type { DeclarationToken } from "./tokens.js";

/** A declared signal. Immutable. */
export interface Signal {
  readonly id: SignalId;
  /** Leaf name as declared. */
  readonly name: string;
  /** Bit-range suffix as declared, e.g. `[7:0]`. */
  readonly range?: string;
  /** Variable kind: wire, reg, integer, ... */
  readonly kind: string;
  readonly width: number;
  /** Enclosing scope names, outermost first. */
  readonly scope: readonly string[];
  /** Scope names and leaf name, dot-joined. */
  readonly path: string;
}

/** Uniqueness key for (scope path, leaf name, range). */
function nameKey(path: string, range: string | undefined): string {
  return range === undefined ? path : `${path}${range}`;
}

export class SymbolTableBuilder {
  private readonly byId = new Map<SignalId, Signal>();
  private readonly idByName = new Map<string, SignalId>();
  private readonly scopeStack: string[] = [];
  private readonly diagnostics: Diagnostic[];
  private frozen = false;

  /** Diagnostics are appended to the given list, shared with the rest of the parse. */
  constructor(diagnostics: Diagnostic[]) {
    this.diagnostics = diagnostics;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  apply(token: DeclarationToken): void {
    if (this.frozen) {
      this.diagnostics.push({ kind: "DeclarationAfterFreeze", line: token.line, token: token.type });
      return;
    }

    switch (token.type) {
      case "ScopeEnter":
        this.scopeStack.push(token.name);
        return;
      case "ScopeExit":
        if (this.scopeStack.length === 0) {
          this.diagnostics.push({ kind: "UnbalancedScope", line: token.line, openScopes: [] });
          return;
        }
        this.scopeStack.pop();
        return;
      case "EndDefinitions":
        if (this.scopeStack.length > 0) {
          this.diagnostics.push({ kind: "UnbalancedScope", line: token.line, openScopes: [...this.scopeStack] });
        }
        this.frozen = true;
        return;
      case "VarDecl": {
        const id = asSignalId(token.id);
        const scope = [...this.scopeStack];
        const path = [...scope, token.name].join(".");

        const existing = this.byId.get(id);
        if (existing) {
          this.diagnostics.push({
            kind: "DuplicateIdentifier",
            line: token.line,
            id: token.id,
            keptPath: existing.path,
            ignoredPath: path,
          });
          return;
        }

        const key = nameKey(path, token.range);
        const owner = this.idByName.get(key);
        if (owner !== undefined) {
          this.diagnostics.push({ kind: "DuplicateName", line: token.line, path: key, keptId: owner, ignoredId: token.id });
          return;
        }

        const signal: Signal = {
          id,
          name: token.name,
          ...(token.range !== undefined && { range: token.range }),
          kind: token.kind,
          width: token.width,
          scope,
          path,
        };
        this.byId.set(id, signal);
        this.idByName.set(key, id);
        return;
      }
    }
  }

  lookup(id: string): Signal | undefined {
    return this.byId.get(asSignalId(id));
  }

  /** Signals in declaration order. */
  signals(): Signal[] {
    return [...this.byId.values()];
  }
}
