import { describe, expect, it } from "vitest";
import { ValidationError } from "./errors.js";
import { canonicalTimeZone, offsetAt, resolveWallClock, wallClockAt } from "./timeZone.js";

// 2024-03-10 02:30 and 2024-11-03 01:30 as New York wall seconds.
const SPRING_GAP_WALL = 1_710_037_800;
const AUTUMN_REPEAT_WALL = 1_730_597_400;

describe("canonicalTimeZone", () => {
  it("accepts IANA names", () => {
    expect(canonicalTimeZone("America/New_York")).toBe("America/New_York");
    expect(canonicalTimeZone("UTC")).toBe("UTC");
  });

  it("rejects unknown zones", () => {
    expect(() => canonicalTimeZone("Mars/Olympus_Mons")).toThrow(ValidationError);
  });
});

describe("offsetAt", () => {
  it("reads standard and daylight offsets", () => {
    expect(offsetAt(1_705_320_000, "America/New_York")).toBe(-18_000); // 2024-01-15T12:00Z
    expect(offsetAt(1_721_044_800, "America/New_York")).toBe(-14_400); // 2024-07-15T12:00Z
    expect(offsetAt(1_705_320_000, "Asia/Kolkata")).toBe(19_800);
    expect(offsetAt(0, "UTC")).toBe(0);
  });

  it("switches at the transition instant", () => {
    const transition = 1_710_054_000; // 2024-03-10T07:00Z
    expect(offsetAt(transition - 1, "America/New_York")).toBe(-18_000);
    expect(offsetAt(transition, "America/New_York")).toBe(-14_400);
  });

  it("keeps the fraction of an instant on the wall clock", () => {
    expect(wallClockAt(1_705_320_000.25, "Asia/Kolkata")).toBe(1_705_339_800.25);
  });
});

describe("resolveWallClock", () => {
  it("is unique outside transitions", () => {
    expect(resolveWallClock(1_705_320_000, "UTC")).toEqual({ kind: "unique", instant: 1_705_320_000 });
    expect(resolveWallClock(1_705_320_000, "America/New_York")).toEqual({
      kind: "unique",
      instant: 1_705_338_000,
    });
  });

  it("reports skipped wall times with the transition instant", () => {
    expect(resolveWallClock(SPRING_GAP_WALL, "America/New_York")).toEqual({
      kind: "skipped",
      nextValid: 1_710_054_000,
      offsetBefore: -18_000,
      offsetAfter: -14_400,
    });
  });

  it("reports repeated wall times earlier first", () => {
    expect(resolveWallClock(AUTUMN_REPEAT_WALL, "America/New_York")).toEqual({
      kind: "repeated",
      earlier: 1_730_611_800,
      later: 1_730_615_400,
    });
  });
});
