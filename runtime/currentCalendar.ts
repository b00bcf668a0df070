/**
 * Process-wide "current" calendar, read from the environment on every call.
 * Never cached: the user's settings (TZ, locale) can change while the process runs.
 *
 *   CALENDAR_IDENTIFIER  gregorian | iso8601        (default gregorian)
 *   CALENDAR_TIME_ZONE   IANA name                  (fallback TZ, then platform)
 *   CALENDAR_LOCALE      BCP 47 tag                 (fallback platform)
 */

import { createCalendar, type Calendar } from "../domain/calendar.js";
import { ValidationError } from "../domain/errors.js";
import { systemClock, type Clock } from "../domain/instant.js";
import { canonicalTimeZone } from "../domain/timeZone.js";
import { tableWeekRulesProvider, type WeekRulesProvider } from "../domain/weekRules.js";

export type Env = Readonly<Record<string, string | undefined>>;

export type Logger = Pick<Console, "warn">;

export interface CalendarSettings {
  readonly identifier: string;
  readonly timeZone: string;
  readonly locale: string;
}

export interface CurrentCalendarOptions {
  readonly env?: Env;
  readonly logger?: Logger;
  readonly provider?: WeekRulesProvider;
  readonly clock?: Clock;
}

const SUPPORTED_IDENTIFIERS = ["gregorian", "iso8601"];

function platformDefaults(): { timeZone: string; locale: string } {
  const { timeZone, locale } = new Intl.DateTimeFormat().resolvedOptions();
  return { timeZone, locale };
}

function usableTimeZone(value: string): boolean {
  try {
    canonicalTimeZone(value);
    return true;
  } catch (err: unknown) {
    if (err instanceof ValidationError) return false;
    throw err;
  }
}

function usableLocale(value: string): boolean {
  try {
    Intl.getCanonicalLocales(value);
    return true;
  } catch (err: unknown) {
    if (err instanceof RangeError) return false;
    throw err;
  }
}

/** First usable candidate; logs every present but unusable one. */
function pick(
  candidates: ReadonlyArray<readonly [string, string | undefined]>,
  usable: (value: string) => boolean,
  fallback: string,
  logger: Logger
): string {
  for (const [source, value] of candidates) {
    if (value === undefined || value === "") continue;
    if (usable(value)) return value;
    logger.warn(`Ignoring ${source}=${value}: not usable, falling back`);
  }
  return fallback;
}

/** Snapshot of the current settings. */
export function readCalendarSettings(env: Env = process.env, logger: Logger = console): CalendarSettings {
  const platform = platformDefaults();
  return {
    identifier: pick(
      [["CALENDAR_IDENTIFIER", env.CALENDAR_IDENTIFIER]],
      (v) => SUPPORTED_IDENTIFIERS.includes(v),
      "gregorian",
      logger
    ),
    timeZone: pick(
      [
        ["CALENDAR_TIME_ZONE", env.CALENDAR_TIME_ZONE],
        ["TZ", env.TZ],
      ],
      usableTimeZone,
      platform.timeZone,
      logger
    ),
    locale: pick([["CALENDAR_LOCALE", env.CALENDAR_LOCALE]], usableLocale, platform.locale, logger),
  };
}

/** Calendar for the current settings; call again rather than holding on to it. */
export function currentCalendar(options: CurrentCalendarOptions = {}): Calendar {
  const settings = readCalendarSettings(options.env, options.logger);
  return createCalendar(
    { ...settings, clock: options.clock ?? systemClock },
    options.provider ?? tableWeekRulesProvider
  );
}
