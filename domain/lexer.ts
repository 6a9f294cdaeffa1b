/**
 * Line classifier: turns physical lines into tokens.
 * Commands are separated by whitespace, not newlines: one line may carry
 * several commands, and a keyword section may span several lines until `$end`.
 * Never throws: anything unrecognized becomes a MalformedLine token.
 */

import type { DumpKind, HeaderKey, Token } from "./tokens.js";
import { isBitString, parseTimeDigits } from "./validation.js";

const HEADER_KEYS: ReadonlySet<string> = new Set<HeaderKey>(["timescale", "date", "version", "comment"]);
const DUMP_KINDS: ReadonlySet<string> = new Set<DumpKind>(["dumpvars", "dumpall", "dumpon", "dumpoff"]);
const SECTION_KEYWORDS: ReadonlySet<string> = new Set([...HEADER_KEYS, "scope", "upscope", "var", "enddefinitions"]);

const SCALAR_DIGITS = "01xXzZ";

interface PendingSection {
  readonly keyword: string;
  readonly line: number;
  readonly parts: string[];
}

function words(text: string): string[] {
  const trimmed = text.trim();
  return trimmed === "" ? [] : trimmed.split(/\s+/);
}

function isDumpKind(keyword: string): keyword is DumpKind {
  return DUMP_KINDS.has(keyword);
}

function isHeaderKey(keyword: string): keyword is HeaderKey {
  return HEADER_KEYS.has(keyword);
}

/** Builds the token for a completed `$keyword ... $end` section. */
function sectionToken(keyword: string, body: string, line: number, raw: string): Token {
  if (isHeaderKey(keyword)) {
    return { type: "Header", key: keyword, text: words(body).join(" "), line };
  }
  const w = words(body);
  switch (keyword) {
    case "scope": {
      const [kind, name] = w;
      if (kind === undefined || name === undefined || w.length !== 2) {
        return { type: "MalformedLine", line, text: raw, reason: "$scope expects a kind and a name" };
      }
      return { type: "ScopeEnter", kind, name, line };
    }
    case "upscope":
      return { type: "ScopeExit", line };
    case "enddefinitions":
      return { type: "EndDefinitions", line };
    case "var": {
      const [kind, widthText, id, name, ...rest] = w;
      if (kind === undefined || widthText === undefined || id === undefined || name === undefined) {
        return { type: "MalformedLine", line, text: raw, reason: "$var expects kind, width, id and name" };
      }
      const width = /^\d+$/.test(widthText) ? Number(widthText) : 0;
      if (!Number.isSafeInteger(width) || width < 1) {
        return { type: "MalformedLine", line, text: raw, reason: `invalid width "${widthText}"` };
      }
      const range = rest.join("");
      return { type: "VarDecl", kind, width, id, name, ...(range !== "" && { range }), line };
    }
    default:
      return { type: "MalformedLine", line, text: raw, reason: `unsupported section $${keyword}` };
  }
}

/** Result of classifying the words starting at one index of a line. */
interface Step {
  readonly token: Token;
  /** Words consumed, at least one. */
  readonly used: number;
}

/** Classifies one time marker or value change starting at `w[i]`. */
function classifyChange(w: readonly string[], i: number, line: number): Step {
  const word = w[i] ?? "";
  const next = w[i + 1];
  const first = word.charAt(0);

  if (first === "#") {
    const value = parseTimeDigits(word.slice(1));
    if (value === null) {
      return { token: { type: "MalformedLine", line, text: word, reason: "invalid time marker" }, used: 1 };
    }
    return { token: { type: "TimeMarker", value, line }, used: 1 };
  }

  if (first === "b" || first === "B") {
    const bits = word.slice(1);
    if (next === undefined) {
      return { token: { type: "MalformedLine", line, text: word, reason: "vector change expects b<bits> <id>" }, used: 1 };
    }
    if (!isBitString(bits)) {
      const text = `${word} ${next}`;
      return { token: { type: "MalformedLine", line, text, reason: "vector change expects b<bits> <id>" }, used: 2 };
    }
    return { token: { type: "VectorChange", bits: bits.toLowerCase(), id: next, line }, used: 2 };
  }

  if (first === "r" || first === "R") {
    const text = next === undefined ? word : `${word} ${next}`;
    const used = next === undefined ? 1 : 2;
    return { token: { type: "MalformedLine", line, text, reason: "real value changes are not supported" }, used };
  }

  if (first !== "" && SCALAR_DIGITS.includes(first)) {
    const id = word.slice(1);
    if (id === "") {
      return { token: { type: "MalformedLine", line, text: word, reason: "scalar change expects <digit><id>" }, used: 1 };
    }
    return { token: { type: "ScalarChange", value: first.toLowerCase(), id, line }, used: 1 };
  }

  // Nothing to resynchronise on: the rest of the line is reported as one entry.
  const text = w.slice(i).join(" ");
  return { token: { type: "MalformedLine", line, text, reason: "unrecognized line" }, used: w.length - i };
}

/** Stateful classifier. Feed lines in order, then call finish(). */
export class LineClassifier {
  private pending: PendingSection | null = null;
  private lineNo = 0;

  /** Classifies the next physical line. Returns zero or more tokens. */
  push(rawLine: string): Token[] {
    this.lineNo += 1;
    const line = this.lineNo;
    const w = words(rawLine);
    const tokens: Token[] = [];

    let i = 0;
    while (i < w.length) {
      const word = w[i] ?? "";

      if (this.pending !== null) {
        i += 1;
        if (word !== "$end") {
          this.pending.parts.push(word);
          continue;
        }
        const section = this.pending;
        this.pending = null;
        const body = section.parts.join(" ");
        const raw = body === "" ? `$${section.keyword} $end` : `$${section.keyword} ${body} $end`;
        tokens.push(sectionToken(section.keyword, body, section.line, raw));
        continue;
      }

      if (word.startsWith("$") && word.length > 1) {
        i += 1;
        const keyword = word.slice(1);
        if (keyword === "end") tokens.push({ type: "DumpEnd", line });
        else if (isDumpKind(keyword)) tokens.push({ type: "DumpBegin", kind: keyword, line });
        else this.pending = { keyword, line, parts: [] };
        continue;
      }

      const step = classifyChange(w, i, line);
      tokens.push(step.token);
      i += step.used;
    }
    return tokens;
  }

  /** Flushes an unterminated section, if any. */
  finish(): Token[] {
    if (this.pending === null) return [];
    const section = this.pending;
    this.pending = null;
    const text = `$${section.keyword} ${section.parts.join(" ")}`.trim();
    const known = SECTION_KEYWORDS.has(section.keyword);
    const reason = known ? `unterminated $${section.keyword} section` : `unsupported section $${section.keyword}`;
    return [{ type: "MalformedLine", line: section.line, text, reason }];
  }
}

/** Splits a whole document into physical lines. */
export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/** Lazily classifies a sequence of lines. */
export function* lexLines(lines: Iterable<string>): Generator<Token, void, undefined> {
  const classifier = new LineClassifier();
  for (const raw of lines) {
    yield* classifier.push(raw);
  }
  yield* classifier.finish();
}

/** Lazily classifies a whole document. */
export function lex(text: string): Generator<Token, void, undefined> {
  return lexLines(splitLines(text));
}
