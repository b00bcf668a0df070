/**
 * Units and dimensions.
 *
 * Unit names are declared here per dimension so they type-check; conversion
 * factors live in data/units.json and are validated against these names on
 * load. The first name of each dimension is its base unit.
 *
 * toBase(v) = v * coefficient + constant. Only temperature has a non-zero constant.
 */

import { readFileSync } from "node:fs";
import { InvariantViolation, ValidationError } from "./errors.js";

export const UNIT_NAMES = {
  length: [
    "meters",
    "kilometers",
    "centimeters",
    "millimeters",
    "micrometers",
    "nanometers",
    "inches",
    "feet",
    "yards",
    "miles",
    "nauticalMiles",
    "lightyears",
  ],
  area: [
    "squareMeters",
    "squareKilometers",
    "squareCentimeters",
    "squareMillimeters",
    "squareInches",
    "squareFeet",
    "squareYards",
    "squareMiles",
    "acres",
    "hectares",
  ],
  volume: [
    "liters",
    "milliliters",
    "cubicMeters",
    "cubicCentimeters",
    "cubicInches",
    "cubicFeet",
    "gallons",
    "quarts",
    "pints",
    "cups",
    "fluidOunces",
    "tablespoons",
    "teaspoons",
  ],
  mass: ["kilograms", "grams", "milligrams", "metricTons", "ounces", "pounds", "stones", "shortTons"],
  speed: ["metersPerSecond", "kilometersPerHour", "milesPerHour", "knots"],
  energy: ["joules", "kilojoules", "calories", "kilocalories", "kilowattHours"],
  power: ["watts", "milliwatts", "kilowatts", "megawatts", "horsepower"],
  angle: ["degrees", "radians", "arcMinutes", "arcSeconds", "revolutions", "gradians"],
  duration: ["seconds", "milliseconds", "microseconds", "nanoseconds", "minutes", "hours"],
  temperature: ["kelvin", "celsius", "fahrenheit"],
} as const;

export type Dimension = keyof typeof UNIT_NAMES;

export type UnitName<D extends Dimension> = (typeof UNIT_NAMES)[D][number];

export const DIMENSIONS: readonly Dimension[] = [
  "length",
  "area",
  "volume",
  "mass",
  "speed",
  "energy",
  "power",
  "angle",
  "duration",
  "temperature",
];

export interface Unit<D extends Dimension = Dimension> {
  readonly dimension: D;
  readonly name: UnitName<D>;
  readonly symbol: string;
  readonly coefficient: number;
  readonly constant: number;
}

export function toBaseValue(unit: Unit, value: number): number {
  return value * unit.coefficient + unit.constant;
}

export function fromBaseValue(unit: Unit, base: number): number {
  return (base - unit.constant) / unit.coefficient;
}

export function belongsTo<D extends Dimension>(unit: Unit, dimension: D): unit is Unit<D> {
  return unit.dimension === dimension;
}

export function sameUnit(a: Unit, b: Unit): boolean {
  return a.dimension === b.dimension && a.name === b.name;
}

// --- Registry ---

export interface UnitRegistry {
  readonly byKey: ReadonlyMap<string, Unit>;
  readonly bySymbol: ReadonlyMap<string, Unit>;
  readonly bases: ReadonlyMap<Dimension, Unit>;
}

const keyOf = (dimension: Dimension, name: string) => `${dimension}:${name}`;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Validates the raw table against UNIT_NAMES. */
export function parseUnitTable(raw: unknown): UnitRegistry {
  if (!isRecord(raw)) throw new InvariantViolation("Unit table must be an object");
  const byKey = new Map<string, Unit>();
  const bySymbol = new Map<string, Unit>();
  const bases = new Map<Dimension, Unit>();

  for (const dimension of DIMENSIONS) {
    const entries = raw[dimension];
    if (!isRecord(entries)) throw new InvariantViolation(`Unit table has no ${dimension} section`);
    const declared: readonly string[] = UNIT_NAMES[dimension];
    const extra = Object.keys(entries).filter((name) => !declared.includes(name));
    if (extra.length > 0) {
      throw new InvariantViolation(`Undeclared ${dimension} units in table`, { units: extra });
    }

    const names: readonly UnitName<Dimension>[] = UNIT_NAMES[dimension];
    names.forEach((name, index) => {
      const entry = entries[name];
      if (!isRecord(entry)) throw new InvariantViolation(`Unit table has no entry for ${dimension}.${name}`);
      const { symbol, coefficient, constant = 0 } = entry;
      if (typeof symbol !== "string" || typeof coefficient !== "number" || typeof constant !== "number") {
        throw new InvariantViolation(`Malformed unit entry ${dimension}.${name}`);
      }
      if (!(coefficient > 0) || !Number.isFinite(constant)) {
        throw new InvariantViolation(`Unit ${dimension}.${name} needs a positive coefficient`);
      }
      if (index === 0 && (coefficient !== 1 || constant !== 0)) {
        throw new InvariantViolation(`Base unit ${dimension}.${name} must have coefficient 1 and constant 0`);
      }
      if (bySymbol.has(symbol)) {
        throw new InvariantViolation(`Duplicate unit symbol ${symbol}`, { dimension, name });
      }
      const entryUnit: Unit = { dimension, name, symbol, coefficient, constant };
      byKey.set(keyOf(dimension, name), entryUnit);
      bySymbol.set(symbol, entryUnit);
      if (index === 0) bases.set(dimension, entryUnit);
    });
  }
  return { byKey, bySymbol, bases };
}

export function loadUnitRegistry(file: URL = new URL("./data/units.json", import.meta.url)): UnitRegistry {
  const raw: unknown = JSON.parse(readFileSync(file, "utf8"));
  return parseUnitTable(raw);
}

let bundled: UnitRegistry | undefined;

function registry(): UnitRegistry {
  bundled ??= loadUnitRegistry();
  return bundled;
}

export function unit<D extends Dimension>(dimension: D, name: UnitName<D>): Unit<D> {
  const found = registry().byKey.get(keyOf(dimension, name));
  if (found === undefined || !belongsTo(found, dimension)) {
    throw new InvariantViolation(`Unit ${dimension}.${name} missing from registry`);
  }
  return found;
}

export function baseUnit<D extends Dimension>(dimension: D): Unit<D> {
  const found = registry().bases.get(dimension);
  if (found === undefined || !belongsTo(found, dimension)) {
    throw new InvariantViolation(`No base unit for ${dimension}`);
  }
  return found;
}

export function unitsOf<D extends Dimension>(dimension: D): Unit<D>[] {
  return [...registry().byKey.values()].filter((u): u is Unit<D> => belongsTo(u, dimension));
}

/** Looks a unit up by symbol ("cm") or by name ("centimeters"). */
export function findUnit(nameOrSymbol: string): Unit | undefined {
  const bySymbol = registry().bySymbol.get(nameOrSymbol);
  if (bySymbol !== undefined) return bySymbol;
  return [...registry().byKey.values()].find((u) => u.name === nameOrSymbol);
}

/** Like findUnit, but throws ValidationError for unknown units. */
export function requireUnit(nameOrSymbol: string): Unit {
  const found = findUnit(nameOrSymbol);
  if (found === undefined) throw new ValidationError(`Unknown unit: ${nameOrSymbol}`, { unit: nameOrSymbol });
  return found;
}
