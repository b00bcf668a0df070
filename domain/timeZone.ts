/**
 * Time zones via the platform Intl database (IANA names, no fetching).
 *
 * "Wall seconds" are seconds since 1970-01-01T00:00:00 on the local wall clock,
 * i.e. instant + UTC offset. Offsets are whole seconds (historical LMT offsets
 * have second precision), so the fractional part of an instant passes through.
 */

import { ValidationError } from "./errors.js";
import { daysFromCivil } from "./gregorian.js";

/** How a wall-clock time maps back onto the time line. */
export type WallClockResolution =
  | { readonly kind: "unique"; readonly instant: number }
  /** Wall time occurs twice (clocks set back). */
  | { readonly kind: "repeated"; readonly earlier: number; readonly later: number }
  /** Wall time does not exist (clocks set forward); nextValid is the transition instant. */
  | {
      readonly kind: "skipped";
      readonly nextValid: number;
      readonly offsetBefore: number;
      readonly offsetAfter: number;
    };

// No zone transitions before 1800; clamping also keeps ICU off its Julian range.
const EARLIEST_QUERY = -5_364_662_400; // 1800-01-01T00:00:00Z
const LATEST_QUERY = 8_640_000_000_000; // Intl limit

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatters.get(timeZone);
  if (fmt === undefined) {
    fmt = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      era: "short",
      year: "numeric",
      month: "numeric",
      day: "numeric",
      hour: "numeric",
      minute: "numeric",
      second: "numeric",
    });
    formatters.set(timeZone, fmt);
  }
  return fmt;
}

/** Canonical IANA name; throws ValidationError for unknown zones. */
export function canonicalTimeZone(timeZone: string): string {
  try {
    return new Intl.DateTimeFormat("en-US", { timeZone }).resolvedOptions().timeZone;
  } catch (err: unknown) {
    if (err instanceof RangeError) {
      throw new ValidationError(`Unknown time zone: ${timeZone}`, { timeZone });
    }
    throw err;
  }
}

/** UTC offset in seconds at the given epoch second. */
export function offsetAt(epochSeconds: number, timeZone: string): number {
  const t = Math.min(Math.max(Math.floor(epochSeconds), EARLIEST_QUERY), LATEST_QUERY);
  const parts = formatterFor(timeZone).formatToParts(t * 1000);
  const get = (type: Intl.DateTimeFormatPartTypes) => Number(parts.find((p) => p.type === type)?.value ?? "0");
  const era = parts.find((p) => p.type === "era")?.value;
  const yearOfEra = get("year");
  const year = era === "BC" ? 1 - yearOfEra : yearOfEra;
  const hour = get("hour");
  const wall =
    daysFromCivil(year, get("month"), get("day")) * 86_400 +
    (hour === 24 ? 0 : hour) * 3_600 +
    get("minute") * 60 +
    get("second");
  return wall - t;
}

/** Wall seconds (with the instant's fraction) for an instant. */
export function wallClockAt(instant: number, timeZone: string): number {
  return instant + offsetAt(instant, timeZone);
}

/** Maps integer wall seconds back onto the time line. */
export function resolveWallClock(wall: number, timeZone: string): WallClockResolution {
  const candidates = new Set([
    offsetAt(wall - 86_400, timeZone),
    offsetAt(wall, timeZone),
    offsetAt(wall + 86_400, timeZone),
  ]);
  const valid: number[] = [];
  for (const offset of candidates) {
    const t = wall - offset;
    if (offsetAt(t, timeZone) === offset) valid.push(t);
  }
  valid.sort((a, b) => a - b);

  const [first] = valid;
  const last = valid[valid.length - 1];
  if (first !== undefined && last !== undefined) {
    return first === last ? { kind: "unique", instant: first } : { kind: "repeated", earlier: first, later: last };
  }

  const offsets = [...candidates];
  const before = Math.min(...offsets);
  const after = Math.max(...offsets);
  const nextValid = findTransition(wall - after, wall - before, timeZone);
  return { kind: "skipped", nextValid, offsetBefore: before, offsetAfter: after };
}

/** First second in (lo, hi] whose offset differs from the offset at lo. */
function findTransition(lo: number, hi: number, timeZone: string): number {
  const initial = offsetAt(lo, timeZone);
  let low = lo;
  let high = hi;
  while (high - low > 1) {
    const mid = Math.floor((low + high) / 2);
    if (offsetAt(mid, timeZone) === initial) low = mid;
    else high = mid;
  }
  return high;
}
