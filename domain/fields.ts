/**
 * Calendar fields: a sparse, mutable set of named date/time units.
 * Carries no calendar and checks no ranges; validity is calendar-relative.
 */

import { ValidationError } from "./errors.js";

export const CALENDAR_FIELDS = [
  "era",
  "year",
  "month",
  "day",
  "hour",
  "minute",
  "second",
  "nanosecond",
  "weekday",
  "weekdayOrdinal",
  "quarter",
  "weekOfMonth",
  "weekOfYear",
  "yearForWeekOfYear",
] as const;

export type CalendarField = (typeof CALENDAR_FIELDS)[number];

export type CalendarFieldRecord = Partial<Record<CalendarField, number>>;

/** Anything that can judge a field set. */
export interface FieldValidator {
  isValidDate(fields: CalendarFields): boolean;
}

export class CalendarFields {
  private readonly values = new Map<CalendarField, number>();

  static of(init: CalendarFieldRecord = {}): CalendarFields {
    const fields = new CalendarFields();
    for (const name of CALENDAR_FIELDS) {
      const value = init[name];
      if (value !== undefined) fields.set(name, value);
    }
    return fields;
  }

  get(name: CalendarField): number | undefined {
    return this.values.get(name);
  }

  /** Sets or (with undefined) clears a field. */
  set(name: CalendarField, value: number | undefined): this {
    if (value === undefined) {
      this.values.delete(name);
      return this;
    }
    if (!Number.isInteger(value)) {
      throw new ValidationError(`Field ${name} must be an integer`, { field: name, value });
    }
    this.values.set(name, value);
    return this;
  }

  has(name: CalendarField): boolean {
    return this.values.has(name);
  }

  clear(name: CalendarField): this {
    this.values.delete(name);
    return this;
  }

  get isEmpty(): boolean {
    return this.values.size === 0;
  }

  /** Set field names in canonical order. */
  setFields(): CalendarField[] {
    return CALENDAR_FIELDS.filter((name) => this.values.has(name));
  }

  toRecord(): CalendarFieldRecord {
    const record: CalendarFieldRecord = {};
    for (const name of this.setFields()) record[name] = this.values.get(name);
    return record;
  }

  clone(): CalendarFields {
    return CalendarFields.of(this.toRecord());
  }

  isValid(under: FieldValidator): boolean {
    return under.isValidDate(this);
  }
}
