import { Decimal } from 'decimal.js';

/**
 * Decimal constructor for every balance and amount in the ledger.
 *
 * 100 significant digits keeps sums of input-scale amounts exact, and the
 * exponent limits make `toString` always print plain notation.
 */
export const Money = Decimal.clone({
  precision: 100,
  rounding: Decimal.ROUND_HALF_EVEN,
  toExpNeg: -9e15,
  toExpPos: 9e15,
});

export type Money = Decimal;

export const ZERO: Money = new Money(0);

/**
 * Parse a decimal string (or integer) into Money
 */
export function toMoney(value: string | number | Decimal): Money {
  return new Money(value);
}

/**
 * Render an amount in plain notation at its natural scale: trailing
 * fractional zeros are dropped, so an input of `1.50` prints as `1.5`.
 * The value is exact either way. Negative zero prints as "0".
 */
export function formatMoney(value: Money): string {
  return value.isZero() ? '0' : value.toFixed();
}
