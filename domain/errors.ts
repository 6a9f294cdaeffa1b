/**
 * Domain error model: base and concrete error types.
 * Thrown only for fatal conditions; recoverable anomalies are diagnostics.
 */

/** Optional metadata attached to domain errors. */
export type ErrorMetadata = Record<string, unknown>;

/** Base for all domain errors. Preserves prototype chain for instanceof. */
export class DomainError extends Error {
  readonly metadata: ErrorMetadata | undefined;

  constructor(message: string, metadata?: ErrorMetadata) {
    super(message);
    this.name = this.constructor.name;
    this.metadata = metadata;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Thrown when a query argument fails validation. */
export class ValidationError extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** Thrown when a query names a signal the document never declared. */
export class UnboundSignal extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** Base for errors that prevent a document from being built. */
export class FatalParseError extends DomainError {}

/** No usable input: empty text, missing or unreadable file. */
export class EmptyOrMissingInput extends FatalParseError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** Input ended before `$enddefinitions` was seen. */
export class MissingEndDefinitions extends FatalParseError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}
