import { Decimal } from 'decimal.js';
import type { DecimalInput } from '../models/ledger';

/**
 * Decimal constructor used for every amount, quantity and rate in the ledger.
 * Intermediate results keep full precision; rounding happens only in {@link roundMoney}.
 */
export const Money = Decimal.clone({ precision: 40, rounding: Decimal.ROUND_HALF_UP });

const MONEY_PLACES = 2;

export const ZERO = new Money(0);

export function toDecimal(value: DecimalInput): Decimal {
  const decimal = new Money(value);
  if (!decimal.isFinite()) {
    throw new RangeError(`Not a finite amount: ${String(value)}`);
  }
  return decimal;
}

export function sumDecimals(values: Iterable<Decimal>): Decimal {
  let total = ZERO;
  for (const value of values) {
    total = total.plus(value);
  }
  return total;
}

/** Round half-up to cents. Display and export only. */
export function roundMoney(value: Decimal): Decimal {
  return value.toDecimalPlaces(MONEY_PLACES, Decimal.ROUND_HALF_UP);
}

export function formatMoney(value: Decimal): string {
  return roundMoney(value).toFixed(MONEY_PLACES);
}

/** Rate as a whole-or-fractional percentage, e.g. 0.075 -> "7.5". */
export function formatRate(rate: Decimal): string {
  return rate.times(100).toDecimalPlaces(4).toFixed();
}
