/**
 * Domain validation: assertions and invariants.
 */

import { InvariantViolation, ValidationError } from "./errors.js";

/** Throws ValidationError if condition is falsy. TypeScript narrows after a successful call. */
export function assert(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new ValidationError(message);
  }
}

/** Same as assert, for invariants that must always hold. */
export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new InvariantViolation(message);
  }
}

/** Call in unreachable branches (e.g. exhaustive switch). Always throws. */
export function neverReached(value: never, message = "Unreachable"): never {
  throw new InvariantViolation(message, { value });
}

/** Throws ValidationError unless value is a finite number. */
export function assertFinite(value: number, what: string): void {
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${what} must be a finite number`, { value });
  }
}
