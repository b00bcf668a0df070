import { describe, expect, it } from "vitest";
import { isWithinBounds, placeWallTime, wallDateTimeAt, wallSeconds } from "./wallClock.js";

const NY = "America/New_York";
const SPRING_GAP_WALL = 1_710_037_800; // 2024-03-10 02:30
const AUTUMN_REPEAT_WALL = 1_730_597_400; // 2024-11-03 01:30

describe("wallDateTimeAt", () => {
  it("splits an instant into local fields", () => {
    expect(wallDateTimeAt(1_706_702_400.5, "UTC")).toEqual({
      year: 2024,
      month: 1,
      day: 31,
      hour: 12,
      minute: 0,
      second: 0,
      nanosecond: 500_000_000,
      epochDay: 19_753,
    });
  });

  it("applies the zone offset", () => {
    const w = wallDateTimeAt(1_706_702_400, NY);
    expect([w.day, w.hour]).toEqual([31, 7]);
  });
});

describe("wallSeconds", () => {
  it("combines epoch day and time of day", () => {
    expect(wallSeconds(19_792, 2, 30)).toBe(SPRING_GAP_WALL);
    expect(wallSeconds(1)).toBe(86_400);
  });
});

describe("placeWallTime", () => {
  it("rejects, shifts or advances a skipped time", () => {
    expect(placeWallTime(SPRING_GAP_WALL, NY, { skipped: "reject" })).toBeUndefined();
    expect(placeWallTime(SPRING_GAP_WALL, NY, { skipped: "shift" })).toBe(1_710_055_800); // 03:30 EDT
    expect(placeWallTime(SPRING_GAP_WALL, NY, { skipped: "nextValid" })).toBe(1_710_054_000); // 03:00 EDT
  });

  it("picks the earlier repeat unless the preferred offset names the later", () => {
    expect(placeWallTime(AUTUMN_REPEAT_WALL, NY, { skipped: "reject" })).toBe(1_730_611_800);
    expect(placeWallTime(AUTUMN_REPEAT_WALL, NY, { skipped: "reject", preferOffset: -14_400 })).toBe(1_730_611_800);
    expect(placeWallTime(AUTUMN_REPEAT_WALL, NY, { skipped: "reject", preferOffset: -18_000 })).toBe(1_730_615_400);
  });
});

describe("isWithinBounds", () => {
  it("checks field ranges", () => {
    expect(isWithinBounds("month", 12)).toBe(true);
    expect(isWithinBounds("month", 13)).toBe(false);
    expect(isWithinBounds("weekOfMonth", 0)).toBe(true);
    expect(isWithinBounds("hour", 24)).toBe(false);
  });
});
