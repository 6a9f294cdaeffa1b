/**
 * Public surface of the reconstruction library.
 */

export type { ChangeEvent, ChangeLog, LogTime, SignalId, Value } from "./core.js";
export { asLogTime, asSignalId } from "./core.js";
export type { Diagnostic, DiagnosticKind } from "./diagnostics.js";
export { countDiagnostics, describeDiagnostic } from "./diagnostics.js";
export {
  DomainError,
  EmptyOrMissingInput,
  FatalParseError,
  MissingEndDefinitions,
  UnboundSignal,
  ValidationError,
} from "./errors.js";
export type { DocumentData, HeaderInfo, ParseResult } from "./document.js";
export { DocumentBuilder, VcdDocument, parseVcd, parseVcdLines, parseVcdStream, unwrapParse } from "./document.js";
export { lex, lexLines, LineClassifier } from "./lexer.js";
export type { Token } from "./tokens.js";
export type { Table, TableRow, TimeGrid } from "./projector.js";
export { ALL_CHANGE_TIMES } from "./projector.js";
export type { Transition, TransitionRange } from "./query.js";
export type { Signal } from "./symbolTable.js";
export type { Timescale, TimeUnit } from "./timescale.js";
export { formatTimescale, ticksToSeconds, ticksToUnit } from "./timescale.js";
export type { Radix } from "./values.js";
export { formatValue, unknownValue } from "./values.js";
export type { Activity, DelimitedOptions, EdgeCounts, SignalSummaryRow } from "./reports.js";
export {
  countEdges,
  signalSeries,
  signalSummary,
  summaryToDelimited,
  tableToDelimited,
  transitionCounts,
} from "./reports.js";
