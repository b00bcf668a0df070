/**
 * Wall-clock date-times in a zone, and the calendar fields derived from them.
 */

import { SECONDS_PER_DAY } from "./duration.js";
import type { CalendarField } from "./fields.js";
import {
  civilFromDays,
  fromProlepticYear,
  quarterOf,
  weekdayFromDays,
  weekdayOrdinalOf,
  weekOfMonth,
  weekOfYear,
  type WeekNumbering,
} from "./gregorian.js";
import { resolveWallClock, wallClockAt } from "./timeZone.js";
import { neverReached } from "./validation.js";

/** Local date and time; year is proleptic (0 = 1 BCE). */
export interface WallDateTime {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly nanosecond: number;
  /** Days since 1970-01-01 on the wall calendar. */
  readonly epochDay: number;
}

export function wallDateTimeAt(instant: number, timeZone: string): WallDateTime {
  const wall = wallClockAt(instant, timeZone);
  const whole = Math.floor(wall);
  const epochDay = Math.floor(whole / SECONDS_PER_DAY);
  const secondOfDay = whole - epochDay * SECONDS_PER_DAY;
  const { year, month, day } = civilFromDays(epochDay);
  return {
    year,
    month,
    day,
    hour: Math.floor(secondOfDay / 3_600),
    minute: Math.floor((secondOfDay % 3_600) / 60),
    second: secondOfDay % 60,
    nanosecond: Math.min(Math.round((wall - whole) * 1e9), 999_999_999),
    epochDay,
  };
}

/** Integer wall seconds for an epoch day and a time of day. */
export function wallSeconds(epochDay: number, hour = 0, minute = 0, second = 0): number {
  return epochDay * SECONDS_PER_DAY + hour * 3_600 + minute * 60 + second;
}

/** How to place a wall time that clocks skipped. */
export type SkippedTimePolicy =
  /** No instant: placeWallTime returns undefined. */
  | "reject"
  /** Same reading on the pre-transition offset, i.e. later by the gap length. */
  | "shift"
  /** The transition instant itself. */
  | "nextValid";

export interface PlacementOptions {
  readonly skipped: SkippedTimePolicy;
  /** Offset to keep when the wall time repeats; defaults to the earlier instant. */
  readonly preferOffset?: number;
}

/** Integer wall seconds to an epoch second, or undefined when rejected. */
export function placeWallTime(wall: number, timeZone: string, options: PlacementOptions): number | undefined {
  const resolution = resolveWallClock(wall, timeZone);
  switch (resolution.kind) {
    case "unique":
      return resolution.instant;
    case "repeated":
      if (options.preferOffset !== undefined && wall - resolution.later === options.preferOffset) {
        return resolution.later;
      }
      return resolution.earlier;
    case "skipped":
      if (options.skipped === "reject") return undefined;
      if (options.skipped === "nextValid") return resolution.nextValid;
      return wall - resolution.offsetBefore;
    default:
      return neverReached(resolution);
  }
}

/** Value of one calendar field at a wall date-time. */
export function fieldValue(name: CalendarField, w: WallDateTime, rules: WeekNumbering): number {
  switch (name) {
    case "era":
      return fromProlepticYear(w.year).era;
    case "year":
      return fromProlepticYear(w.year).yearOfEra;
    case "month":
      return w.month;
    case "day":
      return w.day;
    case "hour":
      return w.hour;
    case "minute":
      return w.minute;
    case "second":
      return w.second;
    case "nanosecond":
      return w.nanosecond;
    case "weekday":
      return weekdayFromDays(w.epochDay);
    case "weekdayOrdinal":
      return weekdayOrdinalOf(w.day);
    case "quarter":
      return quarterOf(w.month);
    case "weekOfMonth":
      return weekOfMonth(w, rules);
    case "weekOfYear":
      return weekOfYear(w.epochDay, rules).weekOfYear;
    case "yearForWeekOfYear":
      return weekOfYear(w.epochDay, rules).yearForWeekOfYear;
    default:
      return neverReached(name);
  }
}

/** Inclusive bounds a field can take under the Gregorian calendar. */
export const FIELD_BOUNDS: Readonly<Record<CalendarField, readonly [number, number]>> = {
  era: [0, 1],
  year: [1, Number.MAX_SAFE_INTEGER],
  month: [1, 12],
  day: [1, 31],
  hour: [0, 23],
  minute: [0, 59],
  second: [0, 59],
  nanosecond: [0, 999_999_999],
  weekday: [1, 7],
  weekdayOrdinal: [1, 5],
  quarter: [1, 4],
  weekOfMonth: [0, 6],
  weekOfYear: [1, 53],
  yearForWeekOfYear: [Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER],
};

export function isWithinBounds(name: CalendarField, value: number): boolean {
  const [min, max] = FIELD_BOUNDS[name];
  return value >= min && value <= max;
}
