import { EntityKind } from '../enums/entity-kind.enum';

/**
 * Extraction Errors
 *
 * One class per failure category of a processed document. Entity-level
 * errors (ExtractorFailureError, ExtractorTimeoutError) are absorbed into
 * outcomes by the orchestrator; the others are reported per aggregate.
 */

/**
 * An extractor threw, or returned data that does not match its schema
 */
export class ExtractorFailureError extends Error {
  readonly kind: EntityKind;

  constructor(kind: EntityKind, message: string) {
    super(message);
    this.name = 'ExtractorFailureError';
    this.kind = kind;
    Object.setPrototypeOf(this, ExtractorFailureError.prototype);
  }
}

export class ExtractorTimeoutError extends Error {
  readonly kind: EntityKind;
  readonly timeoutMs: number;

  constructor(kind: EntityKind, timeoutMs: number) {
    super(`Extractor '${kind}' timed out after ${timeoutMs}ms`);
    this.name = 'ExtractorTimeoutError';
    this.kind = kind;
    this.timeoutMs = timeoutMs;
    Object.setPrototypeOf(this, ExtractorTimeoutError.prototype);
  }
}

/**
 * A mandatory hospital section is missing or malformed.
 * `kinds` names the entity kinds responsible.
 */
export class AssemblyFailureError extends Error {
  readonly kinds: EntityKind[];

  constructor(kinds: EntityKind[], message: string) {
    super(message);
    this.name = 'AssemblyFailureError';
    this.kinds = kinds;
    Object.setPrototypeOf(this, AssemblyFailureError.prototype);
  }
}

export class PersistenceFailureError extends Error {
  readonly originalError?: unknown;

  constructor(message: string, originalError?: unknown) {
    super(message);
    this.name = 'PersistenceFailureError';
    this.originalError = originalError;
    Object.setPrototypeOf(this, PersistenceFailureError.prototype);
  }
}

/**
 * The caller aborted the whole document. Nothing is persisted.
 */
export class ExtractionCancelledError extends Error {
  readonly hospitalizationId: string;

  constructor(hospitalizationId: string) {
    super(`Extraction cancelled for hospitalization ${hospitalizationId}`);
    this.name = 'ExtractionCancelledError';
    this.hospitalizationId = hospitalizationId;
    Object.setPrototypeOf(this, ExtractionCancelledError.prototype);
  }
}
