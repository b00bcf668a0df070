/**
 * Calendar-aware arithmetic.
 *
 * Date units (year, quarter, month, week, day) move the wall-clock date and
 * keep the time of day. A day of month past the end of the target month is
 * CLAMPED to its last day: Jan 31 + 1 month = Feb 28 (Feb 29 in leap years),
 * never a rollover into March. A shifted wall time that clocks skip moves
 * later by the gap length; a repeated one keeps the original offset when it can.
 *
 * Time units (hour, minute, second, nanosecond) add exact elapsed time.
 */

import type { Instant } from "./core.js";
import { asInstant } from "./core.js";
import type { Calendar } from "./calendar.js";
import { ValidationError } from "./errors.js";
import { daysFromCivil, daysInMonth, MONTHS_IN_YEAR } from "./gregorian.js";
import { invariant, neverReached } from "./validation.js";
import { placeWallTime, wallDateTimeAt, wallSeconds, type WallDateTime } from "./wallClock.js";

export type AddableUnit =
  | "year"
  | "quarter"
  | "month"
  | "weekOfYear"
  | "day"
  | "hour"
  | "minute"
  | "second"
  | "nanosecond";

/** Largest first: the order addComponents applies them in. */
export const ADDABLE_UNITS: readonly AddableUnit[] = [
  "year",
  "quarter",
  "month",
  "weekOfYear",
  "day",
  "hour",
  "minute",
  "second",
  "nanosecond",
];

export interface CalendarComponent {
  readonly unit: AddableUnit;
  readonly count: number;
}

export type ComponentCounts = Partial<Record<AddableUnit, number>>;

export function addComponent(component: CalendarComponent, instant: Instant, calendar: Calendar): Instant {
  const { unit, count } = component;
  if (!Number.isInteger(count)) {
    throw new ValidationError(`Count for ${unit} must be an integer`, { unit, count });
  }
  if (count === 0) return instant;
  switch (unit) {
    case "year":
      return shiftMonths(instant, count * MONTHS_IN_YEAR, calendar);
    case "quarter":
      return shiftMonths(instant, count * 3, calendar);
    case "month":
      return shiftMonths(instant, count, calendar);
    case "weekOfYear":
      return shiftDays(instant, count * 7, calendar);
    case "day":
      return shiftDays(instant, count, calendar);
    case "hour":
      return asInstant(instant + count * 3_600);
    case "minute":
      return asInstant(instant + count * 60);
    case "second":
      return asInstant(instant + count);
    case "nanosecond":
      return asInstant(instant + count / 1e9);
    default:
      return neverReached(unit);
  }
}

/** Applies several components, largest unit first. */
export function addComponents(counts: ComponentCounts, instant: Instant, calendar: Calendar): Instant {
  let result = instant;
  for (const unit of ADDABLE_UNITS) {
    const count = counts[unit];
    if (count !== undefined) result = addComponent({ unit, count }, result, calendar);
  }
  return result;
}

function shiftMonths(instant: Instant, months: number, calendar: Calendar): Instant {
  return moveWallDate(instant, calendar, (w) => {
    const total = w.year * MONTHS_IN_YEAR + (w.month - 1) + months;
    const year = Math.floor(total / MONTHS_IN_YEAR);
    const month = total - year * MONTHS_IN_YEAR + 1;
    return daysFromCivil(year, month, Math.min(w.day, daysInMonth(year, month)));
  });
}

function shiftDays(instant: Instant, n: number, calendar: Calendar): Instant {
  return moveWallDate(instant, calendar, (w) => w.epochDay + n);
}

/** Re-places the wall time of instant on another epoch day. */
function moveWallDate(instant: Instant, calendar: Calendar, targetDay: (w: WallDateTime) => number): Instant {
  const whole = Math.floor(instant);
  const w = wallDateTimeAt(whole, calendar.timeZone);
  const offset = wallSeconds(w.epochDay, w.hour, w.minute, w.second) - whole;
  const wall = wallSeconds(targetDay(w), w.hour, w.minute, w.second);
  const placed = placeWallTime(wall, calendar.timeZone, { skipped: "shift", preferOffset: offset });
  invariant(placed !== undefined, "shift placement always yields an instant");
  return asInstant(placed + (instant - whole));
}
