import { Decimal } from 'decimal.js';

export { Decimal };

export const ZERO = new Decimal(0);
export const HUNDRED = new Decimal(100);

/**
 * Safely converts input to Decimal.
 */
export function toDecimal(value: Decimal.Value): Decimal {
  if (value instanceof Decimal) return value;
  return new Decimal(value);
}

/**
 * Helpers for the driver formulas; all return Decimal.
 */
export const FinMath = {
  // Percent expressed 0-100 → fraction
  fromPercent: (pct: Decimal.Value) => new Decimal(pct).dividedBy(HUNDRED),

  clampMin: (value: Decimal.Value, min: Decimal.Value) => Decimal.max(value, min),
};
