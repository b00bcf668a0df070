/**
 * Domain error model: base and concrete error types.
 * Every failure here is an expected, recoverable outcome for the caller.
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

/** Thrown when a value or input fails validation. */
export class ValidationError extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** Thrown when an invariant is violated. */
export class InvariantViolation extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** Thrown when a field combination denotes no valid date under a calendar. */
export class FieldsInvalidError extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** Thrown when no matching occurrence exists. */
export class NotFoundError extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** Thrown when a conversion crosses physical dimensions. */
export class DimensionMismatchError extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}
