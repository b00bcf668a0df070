/**
 * Calendar: converts between instants and calendar fields in one time zone,
 * with regional week rules.
 *
 * - Identifiers: "gregorian" (proleptic) and "iso8601" (Gregorian dates, ISO weeks)
 * - Day-level arithmetic moves the wall-clock date, never a flat 86400 seconds
 * - Weekend days come from the week rules, not from a fixed Sat/Sun pair
 */

import type { Instant, Ordering } from "./core.js";
import { asInstant, compareTuples, orderingOf } from "./core.js";
import { FieldsInvalidError, ValidationError } from "./errors.js";
import { CALENDAR_FIELDS, CalendarFields, type CalendarField, type FieldValidator } from "./fields.js";
import {
  dayOfWeekdayOrdinal,
  daysFromCivil,
  daysFromWeekDate,
  daysInMonth,
  daysIntoWeek,
  fromProlepticYear,
  toProlepticYear,
  weekdayFromDays,
  weekOfYear,
  weeksInYear,
} from "./gregorian.js";
import { systemClock, type Clock } from "./instant.js";
import { intervalBetween, type Interval } from "./interval.js";
import { canonicalTimeZone } from "./timeZone.js";
import { invariant, neverReached } from "./validation.js";
import {
  fieldValue,
  isWithinBounds,
  placeWallTime,
  wallDateTimeAt,
  wallSeconds,
  type WallDateTime,
} from "./wallClock.js";
import {
  ISO_WEEK_NUMBERING,
  tableWeekRulesProvider,
  validateWeekRules,
  type WeekRules,
  type WeekRulesProvider,
} from "./weekRules.js";
import {
  addComponent,
  addComponents,
  type CalendarComponent,
  type ComponentCounts,
} from "./calendarArithmetic.js";
import { nextOccurrence, type MatchingPolicy } from "./nextOccurrence.js";

export type CalendarIdentifier = "gregorian" | "iso8601";

const IDENTIFIERS: readonly CalendarIdentifier[] = ["gregorian", "iso8601"];

/** Precision at which two instants are compared. */
export type Granularity =
  | "era"
  | "year"
  | "quarter"
  | "month"
  | "weekOfYear"
  | "day"
  | "hour"
  | "minute"
  | "second"
  | "nanosecond";

/** Units whose whole span intervalOf can return. */
export type PeriodUnit = "year" | "month" | "weekOfYear" | "day";

/** Year used when a field set leaves it unset: the first year of the current era. */
export const EPOCH_YEAR = 1;

/** Fields that follow from the date and are checked rather than used to build it. */
const DERIVED_FIELDS: readonly CalendarField[] = [
  "weekday",
  "weekdayOrdinal",
  "quarter",
  "weekOfMonth",
  "weekOfYear",
  "yearForWeekOfYear",
];

export interface CalendarOptions {
  readonly identifier?: string;
  /** IANA name. Default "UTC". */
  readonly timeZone?: string;
  /** BCP 47 tag. Default "en-US". */
  readonly locale?: string;
  /** Overrides for the locale's rules. */
  readonly weekRules?: Partial<WeekRules>;
  readonly clock?: Clock;
}

type FieldResolution =
  | { readonly ok: true; readonly instant: Instant }
  | { readonly ok: false; readonly reason: string; readonly detail?: Record<string, unknown> };

function isCalendarIdentifier(value: string): value is CalendarIdentifier {
  return IDENTIFIERS.some((id) => id === value);
}

function canonicalLocale(locale: string): string {
  try {
    return Intl.getCanonicalLocales(locale)[0] ?? locale;
  } catch (err: unknown) {
    if (err instanceof RangeError) throw new ValidationError(`Invalid locale: ${locale}`, { locale });
    throw err;
  }
}

/** Builds a calendar; week rules come from the provider unless overridden. */
export function createCalendar(
  options: CalendarOptions = {},
  provider: WeekRulesProvider = tableWeekRulesProvider
): Calendar {
  const identifier = options.identifier ?? "gregorian";
  if (!isCalendarIdentifier(identifier)) {
    throw new ValidationError(`Unsupported calendar: ${identifier}`, { identifier, supported: IDENTIFIERS });
  }
  const timeZone = canonicalTimeZone(options.timeZone ?? "UTC");
  const locale = canonicalLocale(options.locale ?? "en-US");
  const weekRules: WeekRules = {
    ...provider.weekRulesFor(locale),
    ...(identifier === "iso8601" ? ISO_WEEK_NUMBERING : {}),
    ...options.weekRules,
  };
  validateWeekRules(weekRules);
  return new Calendar(identifier, timeZone, locale, weekRules, options.clock ?? systemClock);
}

/** Gregorian calendar in a zone with en-US week rules. */
export function gregorianCalendar(timeZone = "UTC"): Calendar {
  return createCalendar({ identifier: "gregorian", timeZone });
}

export class Calendar implements FieldValidator {
  readonly identifier: CalendarIdentifier;
  readonly timeZone: string;
  readonly locale: string;
  readonly weekRules: WeekRules;
  readonly clock: Clock;

  constructor(identifier: CalendarIdentifier, timeZone: string, locale: string, weekRules: WeekRules, clock: Clock) {
    this.identifier = identifier;
    this.timeZone = timeZone;
    this.locale = locale;
    this.weekRules = weekRules;
    this.clock = clock;
  }

  // --- Fields <-> instants ---

  /** Local date and time of an instant in this calendar's zone. */
  wallDateTime(instant: Instant): WallDateTime {
    return wallDateTimeAt(instant, this.timeZone);
  }

  /**
   * Instant denoted by a field set. Unset fields default to era 1, year 1,
   * January 1st, 00:00:00. Throws FieldsInvalidError when no such instant exists.
   *
   * Without month and day, weekOfYear counts from yearForWeekOfYear, or from
   * year when that is unset. Without day, weekday and weekdayOrdinal pick the
   * n-th such weekday of the month.
   */
  dateFromFields(fields: CalendarFields): Instant {
    const result = this.resolveFields(fields);
    if (!result.ok) {
      throw new FieldsInvalidError(result.reason, {
        fields: fields.toRecord(),
        timeZone: this.timeZone,
        ...result.detail,
      });
    }
    return result.instant;
  }

  isValidDate(fields: CalendarFields): boolean {
    return this.resolveFields(fields).ok;
  }

  fieldsFromInstant(instant: Instant, requested: Iterable<CalendarField> = CALENDAR_FIELDS): CalendarFields {
    const w = this.wallDateTime(instant);
    const fields = new CalendarFields();
    for (const name of requested) fields.set(name, fieldValue(name, w, this.weekRules));
    return fields;
  }

  /** Single field of an instant. */
  component(name: CalendarField, instant: Instant): number {
    return fieldValue(name, this.wallDateTime(instant), this.weekRules);
  }

  private resolveFields(fields: CalendarFields): FieldResolution {
    const record = fields.toRecord();
    for (const name of fields.setFields()) {
      const value = record[name];
      if (value !== undefined && !isWithinBounds(name, value)) {
        return { ok: false, reason: `${name} is out of range`, detail: { field: name, value } };
      }
    }

    const { era, year, month, day, hour, minute, second, nanosecond, weekday } = record;
    const { weekOfYear: week, yearForWeekOfYear: weekYear, weekdayOrdinal: ordinal } = record;
    const weekYearOf = weekYear ?? (year === undefined ? undefined : toProlepticYear(era ?? 1, year));
    const fromWeekDate = week !== undefined && weekYearOf !== undefined && month === undefined && day === undefined;

    let epochDay: number;
    if (week !== undefined && weekYearOf !== undefined && fromWeekDate) {
      if (week > weeksInYear(weekYearOf, this.weekRules)) {
        return { ok: false, reason: "weekOfYear is out of range for the year", detail: { weekOfYear: week } };
      }
      epochDay = daysFromWeekDate(weekYearOf, week, weekday ?? this.weekRules.firstWeekday, this.weekRules);
    } else {
      const y = toProlepticYear(era ?? 1, year ?? EPOCH_YEAR);
      const m = month ?? 1;
      let d = day ?? 1;
      if (day === undefined && weekday !== undefined && ordinal !== undefined) {
        d = dayOfWeekdayOrdinal(y, m, weekday, ordinal);
        if (d > daysInMonth(y, m)) {
          return {
            ok: false,
            reason: "weekdayOrdinal is out of range for the month",
            detail: { year: y, month: m, weekday, weekdayOrdinal: ordinal },
          };
        }
      }
      if (d > daysInMonth(y, m)) {
        return { ok: false, reason: "day is out of range for the month", detail: { year: y, month: m, day: d } };
      }
      epochDay = daysFromCivil(y, m, d);
    }

    const wall = wallSeconds(epochDay, hour ?? 0, minute ?? 0, second ?? 0);
    const placed = placeWallTime(wall, this.timeZone, { skipped: "reject" });
    if (placed === undefined) {
      return { ok: false, reason: "wall time is skipped by a time zone transition" };
    }

    const w = this.wallDateTime(asInstant(placed));
    // year only names the week-numbering year when yearForWeekOfYear is unset
    const checked =
      fromWeekDate && weekYear !== undefined ? [...DERIVED_FIELDS, "era" as const, "year" as const] : DERIVED_FIELDS;
    for (const name of checked) {
      const expected = record[name];
      if (expected === undefined) continue;
      const actual = fieldValue(name, w, this.weekRules);
      if (actual !== expected) {
        return { ok: false, reason: `${name} disagrees with the date`, detail: { field: name, expected, actual } };
      }
    }
    return { ok: true, instant: asInstant(placed + (nanosecond ?? 0) / 1e9) };
  }

  // --- Comparison ---

  /** Compares after truncating both instants to the granularity. */
  compare(a: Instant, b: Instant, granularity: Granularity): Ordering {
    if (granularity === "nanosecond") return orderingOf(a - b);
    if (granularity === "second") return orderingOf(Math.floor(a) - Math.floor(b));
    return compareTuples(this.truncated(a, granularity), this.truncated(b, granularity));
  }

  private truncated(instant: Instant, granularity: Exclude<Granularity, "second" | "nanosecond">): number[] {
    const w = this.wallDateTime(instant);
    switch (granularity) {
      case "era":
        return [fromProlepticYear(w.year).era];
      case "year":
        return [w.year];
      case "quarter":
        return [w.year, Math.floor((w.month - 1) / 3)];
      case "month":
        return [w.year, w.month];
      case "weekOfYear": {
        const week = weekOfYear(w.epochDay, this.weekRules);
        return [week.yearForWeekOfYear, week.weekOfYear];
      }
      case "day":
        return [w.epochDay];
      case "hour":
        return [w.epochDay, w.hour];
      case "minute":
        return [w.epochDay, w.hour, w.minute];
      default:
        return neverReached(granularity);
    }
  }

  // --- Days and periods ---

  /** First instant of the calendar day containing instant (later than midnight if midnight was skipped). */
  startOfDay(instant: Instant): Instant {
    return this.startOfEpochDay(this.wallDateTime(instant).epochDay);
  }

  private startOfEpochDay(epochDay: number): Instant {
    const placed = placeWallTime(wallSeconds(epochDay), this.timeZone, { skipped: "nextValid" });
    invariant(placed !== undefined, "nextValid placement always yields an instant");
    return asInstant(placed);
  }

  /** Whole period containing instant, from its first instant up to the first instant of the next. */
  intervalOf(unit: PeriodUnit, instant: Instant): Interval {
    const w = this.wallDateTime(instant);
    let first: number;
    let next: number;
    switch (unit) {
      case "day":
        first = w.epochDay;
        next = first + 1;
        break;
      case "weekOfYear":
        first = w.epochDay - daysIntoWeek(weekdayFromDays(w.epochDay), this.weekRules);
        next = first + 7;
        break;
      case "month": {
        first = daysFromCivil(w.year, w.month, 1);
        next = first + daysInMonth(w.year, w.month);
        break;
      }
      case "year":
        first = daysFromCivil(w.year, 1, 1);
        next = daysFromCivil(w.year + 1, 1, 1);
        break;
      default:
        return neverReached(unit);
    }
    return intervalBetween(this.startOfEpochDay(first), this.startOfEpochDay(next));
  }

  /** Same wall time on the previous calendar day. */
  previousDay(instant: Instant): Instant {
    return addComponent({ unit: "day", count: -1 }, instant, this);
  }

  /** Same wall time on the next calendar day. */
  nextDay(instant: Instant): Instant {
    return addComponent({ unit: "day", count: 1 }, instant, this);
  }

  // --- Arithmetic and search ---

  add(component: CalendarComponent, to: Instant): Instant {
    return addComponent(component, to, this);
  }

  addComponents(counts: ComponentCounts, to: Instant): Instant {
    return addComponents(counts, to, this);
  }

  nextOccurrence(after: Instant, matching: CalendarFields, policy: MatchingPolicy = "strict"): Instant {
    return nextOccurrence(after, matching, policy, this);
  }

  // --- Predicates ---

  isInSameDay(a: Instant, b: Instant): boolean {
    return this.compare(a, b, "day") === "same";
  }

  isToday(instant: Instant, reference: Instant = this.clock.now()): boolean {
    return this.isInSameDay(instant, reference);
  }

  isTomorrow(instant: Instant, reference: Instant = this.clock.now()): boolean {
    return this.isInSameDay(instant, this.nextDay(this.startOfDay(reference)));
  }

  isYesterday(instant: Instant, reference: Instant = this.clock.now()): boolean {
    return this.isInSameDay(instant, this.previousDay(this.startOfDay(reference)));
  }

  isWeekend(instant: Instant): boolean {
    return this.weekRules.weekendDays.includes(this.component("weekday", instant));
  }
}
