import { describe, expect, it } from "vitest";
import { asDuration, asInstant } from "./core.js";
import { ValidationError } from "./errors.js";
import {
  REFERENCE_DATE_OFFSET,
  addDuration,
  compareInstants,
  difference,
  fixedClock,
  fromDate,
  fromEpochOffset,
  fromISOString,
  fromReferenceDateOffset,
  isAfter,
  isBefore,
  now,
  systemClock,
  timeIntervalSince,
  timeIntervalSinceNow,
  timeIntervalSinceReferenceDate,
  toDate,
  toISOString,
  truncateToSecond,
} from "./instant.js";

describe("construction", () => {
  it("epoch offset is taken as is", () => {
    expect(fromEpochOffset(1_706_702_400)).toBe(1_706_702_400);
  });

  it("reference date is 2001-01-01T00:00:00Z", () => {
    expect(toISOString(fromReferenceDateOffset(0))).toBe("2001-01-01T00:00:00.000Z");
    expect(timeIntervalSinceReferenceDate(asInstant(REFERENCE_DATE_OFFSET + 60))).toBe(60);
  });

  it("rejects non-finite offsets", () => {
    expect(() => fromEpochOffset(Number.NaN)).toThrow(ValidationError);
    expect(() => fromReferenceDateOffset(Number.POSITIVE_INFINITY)).toThrow(ValidationError);
  });
});

describe("clocks", () => {
  it("fixed clock always answers the same instant", () => {
    const clock = fixedClock(asInstant(42));
    expect(now(clock)).toBe(42);
    expect(clock.now()).toBe(42);
  });

  it("system clock tracks Date.now", () => {
    const before = Date.now() / 1000;
    const t = systemClock.now();
    const after = Date.now() / 1000;
    expect(t).toBeGreaterThanOrEqual(before);
    expect(t).toBeLessThanOrEqual(after);
  });

  it("timeIntervalSinceNow is negative for the past", () => {
    const clock = fixedClock(asInstant(100));
    expect(timeIntervalSinceNow(asInstant(40), clock)).toBe(-60);
    expect(timeIntervalSinceNow(asInstant(160), clock)).toBe(60);
  });
});

describe("arithmetic", () => {
  it("adds durations and measures differences", () => {
    const t = asInstant(1_000);
    expect(addDuration(t, asDuration(-250.5))).toBe(749.5);
    expect(difference(asInstant(1_500), t)).toBe(500);
    expect(timeIntervalSince(t, asInstant(1_500))).toBe(-500);
  });

  it("truncates towards the past", () => {
    expect(truncateToSecond(asInstant(1.75))).toBe(1);
    expect(truncateToSecond(asInstant(-1.5))).toBe(-2);
  });
});

describe("comparison", () => {
  it("is a total order", () => {
    const a = asInstant(10.25);
    const b = asInstant(10.5);
    expect(compareInstants(a, b)).toBe("before");
    expect(compareInstants(b, a)).toBe("after");
    expect(compareInstants(a, asInstant(10.25))).toBe("same");
    expect(isBefore(a, b)).toBe(true);
    expect(isAfter(a, b)).toBe(false);
  });

  it("is antisymmetric over a spread of instants", () => {
    const samples = [-86_400.5, -1, 0, 0.25, 1, 978_307_200, 1_706_702_400.5].map(asInstant);
    const flip = { before: "after", after: "before", same: "same" } as const;
    for (const a of samples) {
      for (const b of samples) {
        expect(compareInstants(b, a)).toBe(flip[compareInstants(a, b)]);
      }
    }
  });
});

describe("Date and ISO bridges", () => {
  it("formats and parses UTC ISO strings", () => {
    expect(toISOString(asInstant(0))).toBe("1970-01-01T00:00:00.000Z");
    expect(fromISOString("2024-01-31T12:00:00Z")).toBe(1_706_702_400);
    expect(fromISOString("2024-01-31T12:00:00.500Z")).toBe(1_706_702_400.5);
  });

  it("rejects text that is not a timestamp", () => {
    expect(() => fromISOString("next tuesday")).toThrow(ValidationError);
  });

  it("round-trips through Date", () => {
    expect(fromDate(toDate(asInstant(1_706_702_400.25)))).toBe(1_706_702_400.25);
    expect(() => fromDate(new Date(Number.NaN))).toThrow(ValidationError);
  });
});
