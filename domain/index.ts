/**
 * Public surface of the calendar and units library.
 */

export * from "./core.js";
export * from "./errors.js";
export { assert, assertFinite, invariant } from "./validation.js";

export * from "./instant.js";
export * from "./duration.js";
export * from "./interval.js";

export {
  civilFromDays,
  daysFromCivil,
  daysInMonth,
  daysInYear,
  isLeapYear,
  weekdayFromDays,
  type CivilDate,
  type WeekNumbering,
} from "./gregorian.js";
export { canonicalTimeZone, offsetAt, resolveWallClock, type WallClockResolution } from "./timeZone.js";
export type { WallDateTime } from "./wallClock.js";
export {
  createTableWeekRulesProvider,
  ISO_WEEK_NUMBERING,
  loadWeekRulesTable,
  tableWeekRulesProvider,
  type WeekRules,
  type WeekRulesProvider,
} from "./weekRules.js";

export * from "./fields.js";
export * from "./calendar.js";
export { ADDABLE_UNITS, type AddableUnit, type CalendarComponent, type ComponentCounts } from "./calendarArithmetic.js";
export { SEARCH_WINDOW_DAYS, type MatchingPolicy } from "./nextOccurrence.js";

export {
  baseUnit,
  belongsTo,
  DIMENSIONS,
  findUnit,
  requireUnit,
  unit,
  UNIT_NAMES,
  unitsOf,
  type Dimension,
  type Unit,
  type UnitName,
} from "./units.js";
export * from "./quantity.js";
