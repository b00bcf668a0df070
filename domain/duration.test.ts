import { describe, expect, it } from "vitest";
import { ValidationError } from "./errors.js";
import {
  addDurations,
  compareDurations,
  days,
  durationFromParts,
  durationParts,
  hours,
  minutes,
  negateDuration,
  scaleDuration,
  seconds,
  subtractDurations,
} from "./duration.js";

describe("constructors", () => {
  it("express everything in seconds", () => {
    expect(seconds(1.5)).toBe(1.5);
    expect(minutes(2)).toBe(120);
    expect(hours(2)).toBe(7_200);
    expect(days(1)).toBe(86_400); // elapsed, not a calendar day
  });
});

describe("arithmetic", () => {
  it("adds, subtracts, negates and scales", () => {
    expect(addDurations(hours(1), minutes(30))).toBe(5_400);
    expect(subtractDurations(minutes(1), seconds(90))).toBe(-30);
    expect(negateDuration(seconds(5))).toBe(-5);
    expect(scaleDuration(minutes(1), 0.5)).toBe(30);
  });

  it("rejects a non-finite scale factor", () => {
    expect(() => scaleDuration(seconds(1), Number.NaN)).toThrow(ValidationError);
  });

  it("compares", () => {
    expect(compareDurations(minutes(1), seconds(60))).toBe("same");
    expect(compareDurations(seconds(-1), seconds(0))).toBe("before");
  });
});

describe("parts", () => {
  it("builds from hours, minutes and seconds", () => {
    expect(durationFromParts({ hours: 1, minutes: 30 })).toBe(5_400);
    expect(durationFromParts({ seconds: -5 })).toBe(-5);
  });

  it("splits a duration, every part carrying the sign", () => {
    expect(durationParts(seconds(3_725))).toEqual({ hours: 1, minutes: 2, seconds: 5 });
    expect(durationParts(seconds(-3_725))).toEqual({ hours: -1, minutes: -2, seconds: -5 });
    expect(durationParts(seconds(-60))).toEqual({ hours: 0, minutes: -1, seconds: 0 });
    expect(durationParts(seconds(90.5))).toEqual({ hours: 0, minutes: 1, seconds: 30.5 });
  });
});
