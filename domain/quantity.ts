/**
 * Quantities: a value tagged with a unit of one dimension.
 *
 * Quantity<"length"> and Quantity<"mass"> do not mix: passing a unit or a
 * quantity of another dimension is a type error. convertUnchecked covers units
 * that arrive as strings and fails at run time instead.
 *
 * Units looked up by string are typed Unit<Dimension>, which the compiler cannot
 * separate, so every method that takes a second unit or quantity also checks
 * the dimension at run time and throws DimensionMismatchError.
 *
 * add/subtract keep the unit when both operands share it and otherwise answer
 * in the dimension's base unit.
 */

import type { Duration, Ordering } from "./core.js";
import { asDuration, orderingOf } from "./core.js";
import { DimensionMismatchError } from "./errors.js";
import { baseUnit, fromBaseValue, sameUnit, toBaseValue, unit, type Dimension, type Unit } from "./units.js";
import { assertFinite } from "./validation.js";

export class Quantity<D extends Dimension> {
  readonly value: number;
  readonly unit: Unit<D>;

  constructor(value: number, unit: Unit<D>) {
    assertFinite(value, "Quantity value");
    this.value = value;
    this.unit = unit;
  }

  get dimension(): D {
    return this.unit.dimension;
  }

  /** Value expressed in the dimension's base unit. */
  get baseValue(): number {
    return toBaseValue(this.unit, this.value);
  }

  convert(to: Unit<D>): Quantity<D> {
    this.requireDimensionOf(to, "convert");
    if (sameUnit(this.unit, to)) return this;
    return new Quantity(fromBaseValue(to, this.baseValue), to);
  }

  add(other: Quantity<D>): Quantity<D> {
    this.requireDimensionOf(other.unit, "add");
    if (sameUnit(this.unit, other.unit)) return new Quantity(this.value + other.value, this.unit);
    return new Quantity(this.baseValue + other.baseValue, baseUnit(this.dimension));
  }

  subtract(other: Quantity<D>): Quantity<D> {
    this.requireDimensionOf(other.unit, "subtract");
    if (sameUnit(this.unit, other.unit)) return new Quantity(this.value - other.value, this.unit);
    return new Quantity(this.baseValue - other.baseValue, baseUnit(this.dimension));
  }

  scale(factor: number): Quantity<D> {
    return new Quantity(this.value * factor, this.unit);
  }

  negate(): Quantity<D> {
    return new Quantity(-this.value, this.unit);
  }

  compare(other: Quantity<D>): Ordering {
    this.requireDimensionOf(other.unit, "compare");
    return orderingOf(this.baseValue - other.baseValue);
  }

  /** Exact equality after normalising to the base unit. */
  equals(other: Quantity<D>): boolean {
    this.requireDimensionOf(other.unit, "compare");
    return this.baseValue === other.baseValue;
  }

  /** Equality within a relative tolerance. */
  approximatelyEquals(other: Quantity<D>, tolerance = 1e-9): boolean {
    this.requireDimensionOf(other.unit, "compare");
    const a = this.baseValue;
    const b = other.baseValue;
    return Math.abs(a - b) <= tolerance * Math.max(1, Math.abs(a), Math.abs(b));
  }

  private requireDimensionOf(other: Unit, operation: string): void {
    if (other.dimension !== this.unit.dimension) {
      throw new DimensionMismatchError(`Cannot ${operation} ${this.unit.dimension} and ${other.dimension}`, {
        from: this.unit.name,
        to: other.name,
      });
    }
  }

  toString(): string {
    return `${this.value} ${this.unit.symbol}`;
  }
}

export function quantity<D extends Dimension>(value: number, of: Unit<D>): Quantity<D> {
  return new Quantity(value, of);
}

/** Conversion for units only known at run time. */
export function convertUnchecked(q: Quantity<Dimension>, to: Unit): Quantity<Dimension> {
  return q.convert(to);
}

// --- Bridge to Duration ---

export function durationFromQuantity(q: Quantity<"duration">): Duration {
  return asDuration(q.convert(unit("duration", "seconds")).value);
}

export function quantityFromDuration(d: Duration): Quantity<"duration"> {
  return new Quantity(d, unit("duration", "seconds"));
}
