import { describe, expect, expectTypeOf, it } from "vitest";
import { DimensionMismatchError, ValidationError } from "./errors.js";
import { hours } from "./duration.js";
import { convertUnchecked, durationFromQuantity, Quantity, quantity, quantityFromDuration } from "./quantity.js";
import { requireUnit, unit, type Unit, type UnitName } from "./units.js";

const cm = unit("length", "centimeters");
const inches = unit("length", "inches");
const feet = unit("length", "feet");
const meters = unit("length", "meters");
const km = unit("length", "kilometers");

describe("types", () => {
  it("carries the dimension in the type", () => {
    expectTypeOf(quantity(1, meters)).toEqualTypeOf<Quantity<"length">>();
    expectTypeOf(quantity(1, meters).dimension).toEqualTypeOf<"length">();
    expectTypeOf<Quantity<"mass">>().not.toMatchTypeOf<Quantity<"length">>();
    expectTypeOf<Unit<"mass">>().not.toMatchTypeOf<Unit<"length">>();
    expectTypeOf<"grams">().not.toMatchTypeOf<UnitName<"length">>();
    expectTypeOf<"grams">().toMatchTypeOf<UnitName<"mass">>();
  });
});

describe("conversion", () => {
  it("converting through intermediate units agrees with a direct conversion", () => {
    const viaInches = quantity(120, cm).convert(inches).convert(feet);
    const direct = quantity(120, cm).convert(feet);
    expect(viaInches.unit).toBe(feet);
    expect(viaInches.approximatelyEquals(direct)).toBe(true);
    expect(direct.value).toBeCloseTo(3.937007874, 9);
  });

  it("returns the same quantity for the same unit", () => {
    const q = quantity(3, meters);
    expect(q.convert(meters)).toBe(q);
  });

  it("handles affine temperature scales", () => {
    const boiling = quantity(100, unit("temperature", "celsius"));
    expect(boiling.convert(unit("temperature", "fahrenheit")).value).toBeCloseTo(212, 9);
    expect(boiling.convert(unit("temperature", "kelvin")).value).toBeCloseTo(373.15, 9);
  });

  it("fails across dimensions for units known only at run time", () => {
    const grams = requireUnit("g");
    expect(() => convertUnchecked(quantity(1, meters), grams)).toThrow(DimensionMismatchError);
    expect(convertUnchecked(quantity(1, meters), requireUnit("cm")).value).toBe(100);
  });
});

describe("units looked up at run time", () => {
  const metre = quantity(1, requireUnit("m"));
  const kilogram = quantity(1, requireUnit("kg"));

  it("still refuse to mix dimensions", () => {
    expect(() => metre.convert(requireUnit("kg"))).toThrow(DimensionMismatchError);
    expect(() => metre.add(kilogram)).toThrow(DimensionMismatchError);
    expect(() => metre.subtract(kilogram)).toThrow(DimensionMismatchError);
    expect(() => metre.compare(kilogram)).toThrow(DimensionMismatchError);
    expect(() => metre.equals(kilogram)).toThrow(DimensionMismatchError);
    expect(() => metre.approximatelyEquals(kilogram)).toThrow(DimensionMismatchError);
  });

  it("work within one dimension", () => {
    expect(metre.add(quantity(50, requireUnit("cm"))).value).toBe(1.5);
    expect(metre.compare(quantity(100, requireUnit("cm")))).toBe("same");
  });
});

describe("arithmetic", () => {
  it("keeps a shared unit", () => {
    const sum = quantity(2, meters).add(quantity(3, meters));
    expect(sum.value).toBe(5);
    expect(sum.unit).toBe(meters);
    expect(quantity(2, meters).subtract(quantity(3, meters)).value).toBe(-1);
  });

  it("answers in the base unit for mixed units", () => {
    const sum = quantity(1, km).add(quantity(500, meters));
    expect(sum.value).toBe(1_500);
    expect(sum.unit).toBe(meters);
    expect(quantity(1, km).subtract(quantity(250, meters)).toString()).toBe("750 m");
  });

  it("scales and negates", () => {
    expect(quantity(2, km).scale(1.5).value).toBe(3);
    expect(quantity(2, km).negate().value).toBe(-2);
  });

  it("rejects non-finite values", () => {
    expect(() => quantity(Number.NaN, meters)).toThrow(ValidationError);
    expect(() => quantity(1, meters).scale(Number.POSITIVE_INFINITY)).toThrow(ValidationError);
  });
});

describe("comparison", () => {
  it("compares on base values", () => {
    expect(quantity(1, km).compare(quantity(999, meters))).toBe("after");
    expect(quantity(1, km).equals(quantity(1_000, meters))).toBe(true);
    expect(quantity(1, km).equals(quantity(1_000.001, meters))).toBe(false);
    expect(quantity(1, km).approximatelyEquals(quantity(1_000.000_000_1, meters))).toBe(true);
  });
});

describe("duration bridge", () => {
  it("moves between quantities and durations", () => {
    expect(durationFromQuantity(quantity(2, unit("duration", "minutes")))).toBe(120);
    expect(quantityFromDuration(hours(1)).convert(unit("duration", "hours")).value).toBe(1);
  });
});
