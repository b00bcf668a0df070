/**
 * Proleptic Gregorian arithmetic over epoch days (days since 1970-01-01).
 * Deterministic, no Date objects (Date.UTC maps years 0-99 onto 1900-1999).
 *
 * Weekdays are 1=Sun..7=Sat throughout the library.
 */

/** Week numbering rules (locale-derived). */
export interface WeekNumbering {
  /** 1=Sun..7=Sat. */
  readonly firstWeekday: number;
  /** 1..7 days of the new year the first week must contain. */
  readonly minimumDaysInFirstWeek: number;
}

export interface CivilDate {
  readonly year: number; // proleptic: 0 = 1 BCE
  readonly month: number; // 1..12
  readonly day: number; // 1..31
}

export const MONTHS_IN_YEAR = 12;

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  switch (month) {
    case 2:
      return isLeapYear(year) ? 29 : 28;
    case 4:
    case 6:
    case 9:
    case 11:
      return 30;
    default:
      return 31;
  }
}

export function daysInYear(year: number): number {
  return isLeapYear(year) ? 366 : 365;
}

/** Epoch day of a civil date. Month and day must already be in range. */
export function daysFromCivil(year: number, month: number, day: number): number {
  const y = month <= 2 ? year - 1 : year;
  const era = Math.floor(y / 400);
  const yoe = y - era * 400;
  const doy = Math.floor((153 * (month + (month > 2 ? -3 : 9)) + 2) / 5) + day - 1;
  const doe = yoe * 365 + Math.floor(yoe / 4) - Math.floor(yoe / 100) + doy;
  return era * 146_097 + doe - 719_468;
}

export function civilFromDays(epochDay: number): CivilDate {
  const z = epochDay + 719_468;
  const era = Math.floor(z / 146_097);
  const doe = z - era * 146_097;
  const yoe = Math.floor((doe - Math.floor(doe / 1_460) + Math.floor(doe / 36_524) - Math.floor(doe / 146_096)) / 365);
  const doy = doe - (365 * yoe + Math.floor(yoe / 4) - Math.floor(yoe / 100));
  const mp = Math.floor((5 * doy + 2) / 153);
  const day = doy - Math.floor((153 * mp + 2) / 5) + 1;
  const month = mp < 10 ? mp + 3 : mp - 9;
  return { year: yoe + era * 400 + (month <= 2 ? 1 : 0), month, day };
}

/** 1=Sun..7=Sat. 1970-01-01 was a Thursday. */
export function weekdayFromDays(epochDay: number): number {
  return (((epochDay + 4) % 7) + 7) % 7 + 1;
}

export function dayOfYear(date: CivilDate): number {
  return daysFromCivil(date.year, date.month, date.day) - daysFromCivil(date.year, 1, 1) + 1;
}

export function quarterOf(month: number): number {
  return Math.floor((month - 1) / 3) + 1;
}

/** 2 for the second Tuesday of a month, etc. */
export function weekdayOrdinalOf(day: number): number {
  return Math.floor((day - 1) / 7) + 1;
}

/** Day of the month of the n-th given weekday; may exceed the month's length. */
export function dayOfWeekdayOrdinal(year: number, month: number, weekday: number, ordinal: number): number {
  const first = weekdayFromDays(daysFromCivil(year, month, 1));
  return 1 + ((weekday - first + 7) % 7) + (ordinal - 1) * 7;
}

// --- Eras ---

/** Era 0 = BCE, era 1 = CE. Year within era starts at 1. */
export function toProlepticYear(era: number, yearOfEra: number): number {
  return era === 0 ? 1 - yearOfEra : yearOfEra;
}

export function fromProlepticYear(year: number): { era: number; yearOfEra: number } {
  return year <= 0 ? { era: 0, yearOfEra: 1 - year } : { era: 1, yearOfEra: year };
}

// --- Week numbering ---

/** Days since the start of the week containing a weekday. */
export function daysIntoWeek(weekday: number, rules: WeekNumbering): number {
  return (weekday - rules.firstWeekday + 7) % 7;
}

/** Epoch day on which week 1 of a week-numbering year begins. */
export function firstWeekStart(year: number, rules: WeekNumbering): number {
  const jan1 = daysFromCivil(year, 1, 1);
  const k = daysIntoWeek(weekdayFromDays(jan1), rules);
  return 7 - k >= rules.minimumDaysInFirstWeek ? jan1 - k : jan1 - k + 7;
}

export function weekOfYear(epochDay: number, rules: WeekNumbering): { weekOfYear: number; yearForWeekOfYear: number } {
  const { year } = civilFromDays(epochDay);
  for (const candidate of [year + 1, year, year - 1]) {
    const start = firstWeekStart(candidate, rules);
    if (epochDay >= start) {
      return { weekOfYear: Math.floor((epochDay - start) / 7) + 1, yearForWeekOfYear: candidate };
    }
  }
  // firstWeekStart(year - 1) is always before any day of year.
  return { weekOfYear: 1, yearForWeekOfYear: year - 1 };
}

export function weeksInYear(yearForWeekOfYear: number, rules: WeekNumbering): number {
  return (firstWeekStart(yearForWeekOfYear + 1, rules) - firstWeekStart(yearForWeekOfYear, rules)) / 7;
}

/** Week within the month; 0 when the month's first days belong to the previous month's last week. */
export function weekOfMonth(date: CivilDate, rules: WeekNumbering): number {
  const first = daysFromCivil(date.year, date.month, 1);
  const k = daysIntoWeek(weekdayFromDays(first), rules);
  const base = 7 - k >= rules.minimumDaysInFirstWeek ? 1 : 0;
  return Math.floor((date.day - 1 + k) / 7) + base;
}

/** Epoch day of a week date. Week and weekday must already be in range. */
export function daysFromWeekDate(
  yearForWeekOfYear: number,
  week: number,
  weekday: number,
  rules: WeekNumbering
): number {
  return firstWeekStart(yearForWeekOfYear, rules) + (week - 1) * 7 + daysIntoWeek(weekday, rules);
}
