/**
 * Durations: signed spans of elapsed seconds.
 * A Duration never means "one calendar day"; use calendar arithmetic for that.
 */

import type { Duration, Ordering } from "./core.js";
import { asDuration, orderingOf } from "./core.js";
import { assertFinite } from "./validation.js";

export const SECONDS_PER_MINUTE = 60;
export const SECONDS_PER_HOUR = 3_600;
export const SECONDS_PER_DAY = 86_400;

export const seconds = (n: number): Duration => asDuration(n);
export const minutes = (n: number): Duration => asDuration(n * SECONDS_PER_MINUTE);
export const hours = (n: number): Duration => asDuration(n * SECONDS_PER_HOUR);
/** Exactly 86400 elapsed seconds. */
export const days = (n: number): Duration => asDuration(n * SECONDS_PER_DAY);

export function addDurations(a: Duration, b: Duration): Duration {
  return asDuration(a + b);
}

export function subtractDurations(a: Duration, b: Duration): Duration {
  return asDuration(a - b);
}

export function negateDuration(d: Duration): Duration {
  return asDuration(-d);
}

export function scaleDuration(d: Duration, factor: number): Duration {
  assertFinite(factor, "Scale factor");
  return asDuration(d * factor);
}

export function compareDurations(a: Duration, b: Duration): Ordering {
  return orderingOf(a - b);
}

/** Span expressed in clock units. */
export interface DurationParts {
  readonly hours: number;
  readonly minutes: number;
  readonly seconds: number;
}

export function durationFromParts(parts: Partial<DurationParts>): Duration {
  const total =
    (parts.hours ?? 0) * SECONDS_PER_HOUR +
    (parts.minutes ?? 0) * SECONDS_PER_MINUTE +
    (parts.seconds ?? 0);
  assertFinite(total, "Duration");
  return asDuration(total);
}

/** Splits |d| into hours, minutes and seconds; every part carries the sign of d. */
export function durationParts(d: Duration): DurationParts {
  const sign = d < 0 ? -1 : 1;
  const abs = Math.abs(d);
  const h = Math.floor(abs / SECONDS_PER_HOUR);
  const m = Math.floor((abs - h * SECONDS_PER_HOUR) / SECONDS_PER_MINUTE);
  const s = abs - h * SECONDS_PER_HOUR - m * SECONDS_PER_MINUTE;
  // Avoid -0 in the output.
  return { hours: h === 0 ? 0 : sign * h, minutes: m === 0 ? 0 : sign * m, seconds: s === 0 ? 0 : sign * s };
}
