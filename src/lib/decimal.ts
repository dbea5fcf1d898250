import Decimal from "decimal.js";

/**
 * Decimal context for every quantity the ledger does arithmetic on (kcal, grams,
 * kilograms, percentages). Halves round away from zero.
 */
export const Dec = Decimal.clone({ precision: 40, rounding: Decimal.ROUND_HALF_UP });

export type DecimalValue = Decimal.Value;

export function dec(value: DecimalValue): Decimal {
  return new Dec(value);
}

export function roundTo(value: DecimalValue, places: number): Decimal {
  return dec(value).toDecimalPlaces(places, Decimal.ROUND_HALF_UP);
}

/** Nearest integer. */
export function round0(value: DecimalValue): Decimal {
  return roundTo(value, 0);
}

/** One decimal place. */
export function round1(value: DecimalValue): Decimal {
  return roundTo(value, 1);
}

export function sumOf(values: DecimalValue[]): Decimal {
  return values.reduce<Decimal>((acc, v) => acc.plus(dec(v)), dec(0));
}

export function atLeastZero(value: DecimalValue): Decimal {
  const d = dec(value);
  return d.isNegative() ? dec(0) : d;
}

export function toNumber(value: DecimalValue): number {
  return dec(value).toNumber();
}

export function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

export { Decimal };
