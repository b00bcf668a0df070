/**
 * Week rules: first weekday, first-week threshold and weekend days.
 * These are regional facts; the table in data/weekRules.json stands in for
 * the locale database and can be swapped through WeekRulesProvider.
 */

import { readFileSync } from "node:fs";
import { InvariantViolation, ValidationError } from "./errors.js";
import type { WeekNumbering } from "./gregorian.js";

export interface WeekRules extends WeekNumbering {
  /** 1=Sun..7=Sat. */
  readonly weekendDays: readonly number[];
}

/** Locale database collaborator. */
export interface WeekRulesProvider {
  weekRulesFor(locale: string): WeekRules;
}

/** ISO 8601 weeks: start on Monday, week 1 holds the first Thursday. */
export const ISO_WEEK_NUMBERING: WeekNumbering = { firstWeekday: 2, minimumDaysInFirstWeek: 4 };

const DAY_TOKENS = ["sun", "mon", "tue", "wed", "thu", "fri", "sat"] as const;

function dayFromToken(token: string): number {
  const index = DAY_TOKENS.findIndex((t) => t === token);
  if (index < 0) throw new InvariantViolation(`Unknown weekday token: ${token}`);
  return index + 1;
}

/** "fri-sat" => [6, 7]; "sat-sun" => [7, 1]; "fri" => [6]. */
export function parseDayRange(range: string): number[] {
  const [from, to = from] = range.split("-");
  const start = dayFromToken(from);
  const end = dayFromToken(to);
  const days: number[] = [start];
  for (let d = start; d !== end; ) {
    d = (d % 7) + 1;
    days.push(d);
  }
  return days;
}

export function validateWeekRules(rules: WeekRules): void {
  const isDay = (d: number) => Number.isInteger(d) && d >= 1 && d <= 7;
  if (!isDay(rules.firstWeekday)) {
    throw new ValidationError("firstWeekday must be 1..7", { firstWeekday: rules.firstWeekday });
  }
  if (!isDay(rules.minimumDaysInFirstWeek)) {
    throw new ValidationError("minimumDaysInFirstWeek must be 1..7", {
      minimumDaysInFirstWeek: rules.minimumDaysInFirstWeek,
    });
  }
  if (!rules.weekendDays.every(isDay)) {
    throw new ValidationError("weekendDays must be 1..7", { weekendDays: rules.weekendDays });
  }
}

/** Region subtag of a locale, inferring the likely one ("ar" => "EG"). */
export function regionOf(locale: string): string | undefined {
  try {
    return new Intl.Locale(locale).maximize().region;
  } catch (err: unknown) {
    if (err instanceof RangeError) throw new ValidationError(`Invalid locale: ${locale}`, { locale });
    throw err;
  }
}

// --- Table provider ---

/** Parsed form of data/weekRules.json. */
export interface WeekRulesTable {
  readonly firstWeekday: ReadonlyMap<string, number>;
  readonly minimumDays: ReadonlyMap<string, number>;
  readonly weekend: ReadonlyMap<string, readonly number[]>;
  readonly defaults: WeekRules;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringList(value: unknown, where: string): string[] {
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    throw new InvariantViolation(`Week rules table: ${where} must be a list of region codes`);
  }
  return value;
}

function recordOf(value: unknown, where: string): Record<string, unknown> {
  if (!isRecord(value)) throw new InvariantViolation(`Week rules table: ${where} must be an object`);
  return value;
}

export function parseWeekRulesTable(raw: unknown): WeekRulesTable {
  const root = recordOf(raw, "root");
  const defaults = recordOf(root.defaults, "defaults");
  const { firstWeekday: defaultFirst, minimumDaysInFirstWeek: defaultMin, weekend: defaultWeekend } = defaults;
  if (typeof defaultFirst !== "string" || typeof defaultMin !== "number" || typeof defaultWeekend !== "string") {
    throw new InvariantViolation("Week rules table: malformed defaults");
  }

  const firstWeekday = new Map<string, number>();
  for (const [token, regions] of Object.entries(recordOf(root.firstWeekday, "firstWeekday"))) {
    const day = dayFromToken(token);
    for (const region of stringList(regions, `firstWeekday.${token}`)) firstWeekday.set(region, day);
  }

  const minimumDays = new Map<string, number>();
  for (const region of stringList(root.minimumDaysInFirstWeek4, "minimumDaysInFirstWeek4")) {
    minimumDays.set(region, 4);
  }

  const weekend = new Map<string, readonly number[]>();
  for (const [range, regions] of Object.entries(recordOf(root.weekend, "weekend"))) {
    const days = parseDayRange(range);
    for (const region of stringList(regions, `weekend.${range}`)) weekend.set(region, days);
  }

  return {
    firstWeekday,
    minimumDays,
    weekend,
    defaults: {
      firstWeekday: dayFromToken(defaultFirst),
      minimumDaysInFirstWeek: defaultMin,
      weekendDays: parseDayRange(defaultWeekend),
    },
  };
}

export function loadWeekRulesTable(file: URL = new URL("./data/weekRules.json", import.meta.url)): WeekRulesTable {
  const raw: unknown = JSON.parse(readFileSync(file, "utf8"));
  return parseWeekRulesTable(raw);
}

export function createTableWeekRulesProvider(table: WeekRulesTable): WeekRulesProvider {
  return {
    weekRulesFor(locale: string): WeekRules {
      const region = regionOf(locale);
      if (region === undefined) return table.defaults;
      return {
        firstWeekday: table.firstWeekday.get(region) ?? table.defaults.firstWeekday,
        minimumDaysInFirstWeek: table.minimumDays.get(region) ?? table.defaults.minimumDaysInFirstWeek,
        weekendDays: table.weekend.get(region) ?? table.defaults.weekendDays,
      };
    },
  };
}

let bundledTable: WeekRulesTable | undefined;

/** Provider over the bundled table, loaded on first use. */
export const tableWeekRulesProvider: WeekRulesProvider = {
  weekRulesFor(locale: string): WeekRules {
    bundledTable ??= loadWeekRulesTable();
    return createTableWeekRulesProvider(bundledTable).weekRulesFor(locale);
  },
};
