/**
 * Instants: absolute points in time, independent of calendar and zone.
 * Seconds since the Unix epoch, with sub-second precision.
 */

import type { Duration, Instant, Ordering } from "./core.js";
import { asDuration, asInstant, orderingOf } from "./core.js";
import { ValidationError } from "./errors.js";
import { assertFinite } from "./validation.js";

/** Seconds between the Unix epoch and 2001-01-01T00:00:00Z. */
export const REFERENCE_DATE_OFFSET = 978_307_200;

/** Source of the current time. Inject a fixed one in tests. */
export interface Clock {
  now(): Instant;
}

/**
 * Wall clock. Falls back to the monotonic performance timer anchored at
 * process start if Date.now() ever yields a non-finite value.
 */
export const systemClock: Clock = {
  now(): Instant {
    const ms = Date.now();
    if (Number.isFinite(ms)) return asInstant(ms / 1000);
    return asInstant((performance.timeOrigin + performance.now()) / 1000);
  },
};

/** Clock pinned to a single instant. */
export function fixedClock(instant: Instant): Clock {
  return { now: () => instant };
}

export function now(clock: Clock = systemClock): Instant {
  return clock.now();
}

export function fromEpochOffset(seconds: number): Instant {
  assertFinite(seconds, "Epoch offset");
  return asInstant(seconds);
}

export function fromReferenceDateOffset(seconds: number): Instant {
  assertFinite(seconds, "Reference date offset");
  return asInstant(seconds + REFERENCE_DATE_OFFSET);
}

export function timeIntervalSinceReferenceDate(instant: Instant): number {
  return instant - REFERENCE_DATE_OFFSET;
}

/** Add a duration to an instant. */
export function addDuration(instant: Instant, d: Duration): Instant {
  return asInstant(instant + d);
}

/** a - b as a Duration. */
export function difference(a: Instant, b: Instant): Duration {
  return asDuration(a - b);
}

/** Seconds from other to instant (negative when instant is earlier). */
export function timeIntervalSince(instant: Instant, other: Instant): Duration {
  return difference(instant, other);
}

/** Negative for instants in the past. */
export function timeIntervalSinceNow(instant: Instant, clock: Clock = systemClock): Duration {
  return difference(instant, clock.now());
}

/** Total order, exact equality only. */
export function compareInstants(a: Instant, b: Instant): Ordering {
  return orderingOf(a - b);
}

export function isBefore(a: Instant, b: Instant): boolean {
  return a < b;
}

export function isAfter(a: Instant, b: Instant): boolean {
  return a > b;
}

/** Drops the sub-second part (towards the past). */
export function truncateToSecond(instant: Instant): Instant {
  return asInstant(Math.floor(instant));
}

// --- Bridges ---

export function toDate(instant: Instant): Date {
  return new Date(instant * 1000);
}

export function fromDate(date: Date): Instant {
  const ms = date.getTime();
  if (Number.isNaN(ms)) throw new ValidationError("Invalid Date");
  return asInstant(ms / 1000);
}

/** UTC ISO 8601 with millisecond precision, e.g. "2024-01-31T12:00:00.000Z". */
export function toISOString(instant: Instant): string {
  return toDate(instant).toISOString();
}

export function fromISOString(text: string): Instant {
  const ms = Date.parse(text);
  if (Number.isNaN(ms)) {
    throw new ValidationError(`Not an ISO 8601 timestamp: ${text}`, { text });
  }
  return asInstant(ms / 1000);
}
