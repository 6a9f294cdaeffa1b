/**
 * Document aggregate and the single-pass parse that builds it.
 *
 * A parse yields either a document with its diagnostics, or a fatal error.
 * Recoverable anomalies never throw; they are collected in file order.
 */

import type { ChangeEvent, ChangeLog, LogTime, SignalId, Value } from "./core.js";
import { asSignalId } from "./core.js";
import type { Diagnostic } from "./diagnostics.js";
import { EmptyOrMissingInput, MissingEndDefinitions, UnboundSignal, type FatalParseError } from "./errors.js";
import { LineClassifier, splitLines } from "./lexer.js";
import { ALL_CHANGE_TIMES, projectSources, type Table, type TimeGrid } from "./projector.js";
import { transitionsOf, valueAtTime, type Transition, type TransitionRange } from "./query.js";
import { ChangeLogReplayer } from "./replayer.js";
import { SymbolTableBuilder, type Signal } from "./symbolTable.js";
import { DEFAULT_TIMESCALE, formatTimescale, parseTimescale, type Timescale } from "./timescale.js";
import type { Header, Token } from "./tokens.js";
import { neverReached, requireQueryTime } from "./validation.js";

/** Free-text header sections other than the timescale. */
export interface HeaderInfo {
  readonly date?: string;
  readonly version?: string;
  readonly comments: readonly string[];
}

export interface DocumentParts {
  readonly timescale: Timescale;
  readonly header: HeaderInfo;
  readonly signals: readonly Signal[];
  readonly logs: ReadonlyMap<SignalId, ChangeLog>;
  readonly maxTime: LogTime;
}

/** Plain-data view of a document: everything a parse produced, nothing derived. */
export interface DocumentData {
  readonly timescale: string;
  readonly header: HeaderInfo;
  readonly maxTime: number;
  readonly signals: readonly (Signal & { readonly changes: readonly ChangeEvent[] })[];
}

/** Immutable result of one parse. All queries are read-only. */
export class VcdDocument {
  readonly timescale: Timescale;
  readonly header: HeaderInfo;
  readonly maxTime: LogTime;
  private readonly ordered: readonly Signal[];
  private readonly byId: ReadonlyMap<SignalId, Signal>;
  private readonly logs: ReadonlyMap<SignalId, ChangeLog>;

  constructor(parts: DocumentParts) {
    this.timescale = parts.timescale;
    this.header = parts.header;
    this.maxTime = parts.maxTime;
    this.ordered = parts.signals;
    this.byId = new Map(parts.signals.map((s) => [s.id, s]));
    this.logs = parts.logs;
  }

  /** Declared signals, in declaration order. */
  signals(): Signal[] {
    return [...this.ordered];
  }

  signal(id: string): Signal | undefined {
    return this.byId.get(asSignalId(id));
  }

  /** Throws UnboundSignal when the identifier was never declared. */
  requireSignal(id: string): Signal {
    const signal = this.signal(id);
    if (!signal) {
      throw new UnboundSignal(`No signal declared with identifier "${id}"`, { id });
    }
    return signal;
  }

  /**
   * Signals matching a hierarchical name. Exact path matches win; otherwise
   * a case-insensitive match on trailing path segments (`dut.sclk` matches `tb.dut.sclk`).
   */
  findSignals(query: string): Signal[] {
    const exact = this.ordered.filter((s) => s.path === query);
    if (exact.length > 0) return exact;
    const q = query.toLowerCase();
    return this.ordered.filter((s) => {
      const p = s.path.toLowerCase();
      return p === q || p.endsWith(`.${q}`);
    });
  }

  private logOf(signal: Signal): ChangeLog {
    return this.logs.get(signal.id) ?? [];
  }

  /** Value in effect at `t`. Before the first change: 'x' per bit. */
  valueAt(id: string, t: number): Value {
    const signal = this.requireSignal(id);
    const time = requireQueryTime(t, "valueAt");
    return valueAtTime(this.logOf(signal), signal.width, time);
  }

  /** `valueAt` for several times, in the order given. */
  sample(id: string, times: readonly number[]): Value[] {
    const signal = this.requireSignal(id);
    const log = this.logOf(signal);
    return times.map((t) => valueAtTime(log, signal.width, requireQueryTime(t, "sample")));
  }

  /** Copy of the recorded change log, in file order. */
  changes(id: string): ChangeEvent[] {
    return this.logOf(this.requireSignal(id)).slice();
  }

  transitions(id: string, range: TransitionRange = {}): Transition[] {
    const signal = this.requireSignal(id);
    return transitionsOf(this.logOf(signal), signal.width, range);
  }

  /** Time-aligned table of the given signals. Defaults to all change times. */
  project(ids: readonly string[], grid: TimeGrid = ALL_CHANGE_TIMES): Table {
    const sources = ids.map((id) => {
      const signal = this.requireSignal(id);
      return { signal, log: this.logOf(signal) };
    });
    return projectSources(sources, grid);
  }

  toJSON(): DocumentData {
    return {
      timescale: formatTimescale(this.timescale),
      header: this.header,
      maxTime: this.maxTime,
      signals: this.ordered.map((s) => ({ ...s, changes: this.logOf(s).slice() })),
    };
  }
}

// --- Parse ---

export type ParseResult =
  | { readonly ok: true; readonly document: VcdDocument; readonly diagnostics: readonly Diagnostic[] }
  | { readonly ok: false; readonly error: FatalParseError; readonly diagnostics: readonly Diagnostic[] };

/** Incremental builder: feed lines in order, then call finish() once. */
export class DocumentBuilder {
  private readonly diagnostics: Diagnostic[] = [];
  private readonly classifier = new LineClassifier();
  private readonly symbols = new SymbolTableBuilder(this.diagnostics);
  private readonly replayer = new ChangeLogReplayer((id) => this.symbols.lookup(id), this.diagnostics);
  private timescale: Timescale | null = null;
  private date: string | undefined;
  private version: string | undefined;
  private readonly comments: string[] = [];
  private inDump = false;
  private sawContent = false;
  private lineCount = 0;

  pushLine(line: string): void {
    this.lineCount += 1;
    if (line.trim() !== "") this.sawContent = true;
    for (const token of this.classifier.push(line)) this.accept(token);
  }

  finish(): ParseResult {
    for (const token of this.classifier.finish()) this.accept(token);
    const diagnostics = this.diagnostics.slice();

    if (!this.sawContent) {
      return { ok: false, error: new EmptyOrMissingInput("Input is empty", { lines: this.lineCount }), diagnostics };
    }
    if (!this.symbols.isFrozen) {
      return {
        ok: false,
        error: new MissingEndDefinitions("Input ended before $enddefinitions", { lines: this.lineCount }),
        diagnostics,
      };
    }

    const signals = this.symbols.signals();
    const document = new VcdDocument({
      timescale: this.timescale ?? DEFAULT_TIMESCALE,
      header: {
        ...(this.date !== undefined && { date: this.date }),
        ...(this.version !== undefined && { version: this.version }),
        comments: this.comments.slice(),
      },
      signals,
      logs: this.replayer.finish(signals),
      maxTime: this.replayer.maxTime,
    });
    return { ok: true, document, diagnostics };
  }

  private accept(token: Token): void {
    switch (token.type) {
      case "Header":
        this.acceptHeader(token);
        return;
      case "ScopeEnter":
      case "ScopeExit":
      case "VarDecl":
      case "EndDefinitions":
        this.symbols.apply(token);
        return;
      case "DumpBegin":
        if (!this.symbols.isFrozen) {
          this.diagnostics.push({ kind: "EventBeforeDefinitions", line: token.line, token: `$${token.kind}` });
          return;
        }
        this.inDump = true;
        return;
      case "DumpEnd":
        if (!this.inDump) {
          this.diagnostics.push({ kind: "MalformedLine", line: token.line, text: "$end", reason: "$end without open section" });
          return;
        }
        this.inDump = false;
        return;
      case "TimeMarker":
      case "ScalarChange":
      case "VectorChange":
        if (!this.symbols.isFrozen) {
          this.diagnostics.push({ kind: "EventBeforeDefinitions", line: token.line, token: token.type });
          return;
        }
        this.replayer.apply(token);
        return;
      case "MalformedLine":
        this.diagnostics.push({ kind: "MalformedLine", line: token.line, text: token.text, reason: token.reason });
        return;
      default:
        neverReached(token, "Unhandled token");
    }
  }

  private acceptHeader(token: Header): void {
    if (token.key === "comment") {
      this.comments.push(token.text);
      return;
    }
    if (this.symbols.isFrozen) {
      this.diagnostics.push({ kind: "DeclarationAfterFreeze", line: token.line, token: `$${token.key}` });
      return;
    }
    switch (token.key) {
      case "timescale": {
        const text = `$timescale ${token.text} $end`;
        if (this.timescale !== null) {
          this.diagnostics.push({ kind: "MalformedLine", line: token.line, text, reason: "duplicate $timescale ignored" });
          return;
        }
        const parsed = parseTimescale(token.text);
        if (parsed === null) {
          this.diagnostics.push({ kind: "MalformedLine", line: token.line, text, reason: "invalid timescale" });
          return;
        }
        this.timescale = parsed;
        return;
      }
      case "date":
        this.date = token.text;
        return;
      case "version":
        this.version = token.text;
        return;
    }
  }
}

/** Parses any sequence of lines. */
export function parseVcdLines(lines: Iterable<string>): ParseResult {
  const builder = new DocumentBuilder();
  for (const line of lines) builder.pushLine(line);
  return builder.finish();
}

/** Parses lines arriving asynchronously (e.g. from a file stream). */
export async function parseVcdStream(lines: AsyncIterable<string>): Promise<ParseResult> {
  const builder = new DocumentBuilder();
  for await (const line of lines) builder.pushLine(line);
  return builder.finish();
}

/** Parses a whole document held in memory. */
export function parseVcd(text: string): ParseResult {
  return parseVcdLines(splitLines(text));
}

/** Returns the document, or throws the fatal error. */
export function unwrapParse(result: ParseResult): VcdDocument {
  if (!result.ok) throw result.error;
  return result.document;
}
