/**
 * Domain error model — base and concrete error types.
 * Framework-independent. No parsing logic.
 */

import type { LineNumber } from "./core.js";
import type { HeaderType } from "./snapshotLine.js";

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

/** Thrown when a value or input fails validation. */
export class ValidationError extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** Text could not be decomposed into snapshot lines. */
export class ParseError extends DomainError {
  readonly line: LineNumber;
  readonly expected: string;

  constructor(message: string, line: LineNumber, expected: string, metadata?: ErrorMetadata) {
    super(message, { ...metadata, line, expected });
    this.line = line;
    this.expected = expected;
  }
}

/** A header prefix matched but its payload did not. */
export class MalformedHeaderError extends ParseError {
  readonly header: HeaderType;

  constructor(header: HeaderType, line: LineNumber, expected: string) {
    super(`Malformed ${header} header at line ${line}: expected ${expected}`, line, expected, { header });
    this.header = header;
  }
}

/** Annotations fence opened and never closed. `line` is the opening fence. */
export class UnterminatedAnnotationsError extends ParseError {
  constructor(line: LineNumber) {
    super(`Unterminated annotations block opened at line ${line}`, line, "closing ```");
  }
}
