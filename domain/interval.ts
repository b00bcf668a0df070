/**
 * Intervals: non-negative spans anchored at a start instant.
 *
 * Containment is closed at both ends: start <= t <= end. A zero-length
 * interval contains exactly its start.
 */

import type { Duration, Instant, Ordering } from "./core.js";
import { asDuration, asInstant, orderingOf } from "./core.js";
import { ValidationError } from "./errors.js";

export interface Interval {
  readonly start: Instant;
  readonly duration: Duration;
}

export function createInterval(start: Instant, duration: Duration): Interval {
  if (!Number.isFinite(start) || !Number.isFinite(duration)) {
    throw new ValidationError("Interval start and duration must be finite", { start, duration });
  }
  if (duration < 0) {
    throw new ValidationError("Interval duration must be >= 0", { start, duration });
  }
  return { start, duration };
}

/** Interval from start to end; end must not precede start. */
export function intervalBetween(start: Instant, end: Instant): Interval {
  return createInterval(start, asDuration(end - start));
}

export function intervalEnd(interval: Interval): Instant {
  return asInstant(interval.start + interval.duration);
}

export function intervalContains(interval: Interval, instant: Instant): boolean {
  return instant >= interval.start && instant <= intervalEnd(interval);
}

/** True when the intervals share at least one instant (touching ends count). */
export function intervalsIntersect(a: Interval, b: Interval): boolean {
  return a.start <= intervalEnd(b) && b.start <= intervalEnd(a);
}

/** Shared part of two intervals, or null when they are disjoint. */
export function intervalIntersection(a: Interval, b: Interval): Interval | null {
  if (!intervalsIntersect(a, b)) return null;
  const start = Math.max(a.start, b.start);
  const end = Math.min(intervalEnd(a), intervalEnd(b));
  return createInterval(asInstant(start), asDuration(end - start));
}

/** Orders by start, then by duration. */
export function compareIntervals(a: Interval, b: Interval): Ordering {
  if (a.start !== b.start) return orderingOf(a.start - b.start);
  return orderingOf(a.duration - b.duration);
}

export function intervalsEqual(a: Interval, b: Interval): boolean {
  return a.start === b.start && a.duration === b.duration;
}
