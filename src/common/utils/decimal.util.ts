import Decimal from 'decimal.js';

// Ledger amounts are replayed with exact decimal arithmetic.
Decimal.set({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,
  toExpNeg: -9e15,
});

export const ZERO = new Decimal(0);

/**
 * Converts any number-like value to Decimal.
 * Numbers go through their shortest string form so 161.72 stays 161.72.
 */
export function toDecimal(value: number | string | Decimal): Decimal {
  return new Decimal(value);
}

/**
 * Converts Decimal back to a JavaScript number for JSON output.
 * Rounds to 8 decimal places.
 */
export function toNumber(value: Decimal): number {
  return value.toDecimalPlaces(8).toNumber();
}

export function sum(values: Iterable<Decimal>): Decimal {
  let total = ZERO;
  for (const value of values) {
    total = total.plus(value);
  }
  return total;
}

/**
 * Safe division with zero check.
 */
export function divide(a: Decimal, b: Decimal): Decimal {
  if (b.isZero()) {
    throw new Error('Division by zero');
  }
  return a.dividedBy(b);
}

/** part / whole × 100, or 0 when the whole is zero */
export function percentOf(part: Decimal, whole: Decimal): Decimal {
  return whole.isZero() ? ZERO : part.dividedBy(whole).times(100);
}
