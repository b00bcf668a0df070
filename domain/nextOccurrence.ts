/**
 * Search for the next instant whose calendar fields match a partial field set.
 *
 * Matching rules:
 * - every set field must match;
 * - unset date fields and unset time fields larger than the largest set time
 *   field are free;
 * - unset time fields below the smallest set field take their lowest value
 *   ({ hour: 10 } matches 10:00:00.000 only).
 *
 * The result is always strictly after the given instant. A set nanosecond that
 * the matching instant cannot hold (instants are doubles of seconds) is a
 * NotFoundError rather than a silently different answer.
 */

import type { Instant } from "./core.js";
import { asInstant } from "./core.js";
import type { Calendar } from "./calendar.js";
import { NotFoundError, ValidationError } from "./errors.js";
import type { CalendarField, CalendarFields } from "./fields.js";
import { civilFromDays, daysFromCivil, firstWeekStart, toProlepticYear } from "./gregorian.js";
import { offsetAt, resolveWallClock } from "./timeZone.js";
import { neverReached } from "./validation.js";
import { fieldValue, isWithinBounds, wallDateTimeAt, wallSeconds, type WallDateTime } from "./wallClock.js";

/**
 * strict: fail with NotFoundError when the earliest match is a wall time that
 *   clocks skip.
 * nextValidTime: answer the first instant after such a gap instead.
 */
export type MatchingPolicy = "strict" | "nextValidTime";

/** Days searched before giving up (one full Gregorian cycle). */
export const SEARCH_WINDOW_DAYS = 146_097;

const TIME_FIELDS = ["hour", "minute", "second", "nanosecond"] as const;
const TIME_RANGES: Readonly<Record<"hour" | "minute" | "second", number>> = { hour: 24, minute: 60, second: 60 };

const DATE_FIELDS: readonly CalendarField[] = [
  "era",
  "year",
  "month",
  "day",
  "weekday",
  "weekdayOrdinal",
  "quarter",
  "weekOfMonth",
  "weekOfYear",
  "yearForWeekOfYear",
];

function range(n: number): number[] {
  return Array.from({ length: n }, (_, i) => i);
}

/** Candidate values for hour, minute and second in ascending order. */
function timeCandidates(matching: CalendarFields): { hours: number[]; minutes: number[]; seconds: number[] } {
  const smallestSet = TIME_FIELDS.reduce((acc, name, index) => (matching.has(name) ? index : acc), -1);
  const pick = (name: "hour" | "minute" | "second", index: number): number[] => {
    const value = matching.get(name);
    if (value !== undefined) return [value];
    return index < smallestSet ? range(TIME_RANGES[name]) : [0];
  };
  return { hours: pick("hour", 0), minutes: pick("minute", 1), seconds: pick("second", 2) };
}

/** First and last epoch day worth searching. */
function searchBounds(after: Instant, matching: CalendarFields, calendar: Calendar): [number, number] {
  const startDay = wallDateTimeAt(after, calendar.timeZone).epochDay - 1;
  let first = startDay;
  let last = startDay + SEARCH_WINDOW_DAYS;

  const year = matching.get("year");
  if (year !== undefined) {
    const proleptic = toProlepticYear(matching.get("era") ?? 1, year);
    first = Math.max(first, daysFromCivil(proleptic, 1, 1));
    last = Math.min(last, daysFromCivil(proleptic + 1, 1, 1) - 1);
  }
  const weekYear = matching.get("yearForWeekOfYear");
  if (weekYear !== undefined) {
    first = Math.max(first, firstWeekStart(weekYear, calendar.weekRules));
    last = Math.min(last, firstWeekStart(weekYear + 1, calendar.weekRules) - 1);
  }
  return [first, last];
}

export function nextOccurrence(
  after: Instant,
  matching: CalendarFields,
  policy: MatchingPolicy,
  calendar: Calendar
): Instant {
  if (matching.isEmpty) {
    throw new ValidationError("Matching fields must not be empty");
  }
  const record = matching.toRecord();
  for (const name of matching.setFields()) {
    const value = record[name];
    if (value !== undefined && !isWithinBounds(name, value)) {
      throw new NotFoundError(`No date has ${name} = ${value}`, { field: name, value });
    }
  }

  const dateFields = DATE_FIELDS.filter((name) => matching.has(name));
  const dayMatches = (epochDay: number): boolean => {
    const { year, month, day } = civilFromDays(epochDay);
    const w: WallDateTime = { year, month, day, hour: 0, minute: 0, second: 0, nanosecond: 0, epochDay };
    return dateFields.every((name) => fieldValue(name, w, calendar.weekRules) === record[name]);
  };

  const { hours, minutes, seconds } = timeCandidates(matching);
  const fraction = (record.nanosecond ?? 0) / 1e9;
  const lowestWall = earliestWallAfter(after, calendar.timeZone);
  const [first, last] = searchBounds(after, matching, calendar);

  for (let epochDay = first; epochDay <= last; epochDay++) {
    if (wallSeconds(epochDay + 1) <= lowestWall || !dayMatches(epochDay)) continue;
    for (const hour of hours) {
      for (const minute of minutes) {
        for (const second of seconds) {
          const wall = wallSeconds(epochDay, hour, minute, second);
          if (wall < lowestWall) continue;
          const found = placeCandidate(wall, fraction, after, policy, calendar);
          if (found === undefined) continue;
          requireNanosecond(found, record.nanosecond, calendar);
          return found.instant;
        }
      }
    }
  }

  throw new NotFoundError("No matching date found", {
    matching: record,
    after,
    searchedDays: Math.max(0, last - first + 1),
  });
}

/**
 * Integer wall seconds below which no candidate can land after `after`.
 *
 * A candidate's instant is wall + fraction - offset, so with the smallest offset
 * in force around `after` every wall below after + offset resolves to an
 * earlier instant, and a gap there ends no later than `after`.
 */
function earliestWallAfter(after: Instant, timeZone: string): number {
  const lowest = Math.min(offsetAt(after - 86_400, timeZone), offsetAt(after, timeZone), offsetAt(after + 86_400, timeZone));
  return Math.floor(after + lowest);
}

interface Placement {
  readonly instant: Instant;
  /** Transition instant standing in for a skipped wall time. */
  readonly shifted: boolean;
}

function requireNanosecond(found: Placement, nanosecond: number | undefined, calendar: Calendar): void {
  if (nanosecond === undefined || found.shifted) return;
  const actual = calendar.component("nanosecond", found.instant);
  if (actual !== nanosecond) {
    throw new NotFoundError(`nanosecond = ${nanosecond} cannot be represented at the matching instant`, {
      nanosecond,
      actual,
      instant: found.instant,
    });
  }
}

/** Earliest placement of one wall-time candidate strictly after `after`, if any. */
function placeCandidate(
  wall: number,
  fraction: number,
  after: Instant,
  policy: MatchingPolicy,
  calendar: Calendar
): Placement | undefined {
  const resolution = resolveWallClock(wall, calendar.timeZone);
  switch (resolution.kind) {
    case "unique": {
      const t = resolution.instant + fraction;
      return t > after ? { instant: asInstant(t), shifted: false } : undefined;
    }
    case "repeated": {
      const t = [resolution.earlier + fraction, resolution.later + fraction].find((c) => c > after);
      return t === undefined ? undefined : { instant: asInstant(t), shifted: false };
    }
    case "skipped": {
      if (resolution.nextValid <= after) return undefined;
      if (policy === "strict") {
        throw new NotFoundError("Earliest match falls in a skipped wall time", {
          wall,
          timeZone: calendar.timeZone,
          nextValid: resolution.nextValid,
        });
      }
      return { instant: asInstant(resolution.nextValid), shifted: true };
    }
    default:
      return neverReached(resolution);
  }
}
