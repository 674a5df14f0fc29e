/**
 * Decimal arithmetic for weights and indicator values
 *
 * A dedicated decimal.js constructor so engine precision never depends on the
 * global Decimal configuration of a host application.
 */
import Decimal from 'decimal.js';

export const Dec = Decimal.clone({
  precision: 28,
  rounding: Decimal.ROUND_HALF_EVEN,
});

export const ZERO = new Dec(0);
export const ONE = new Dec(1);

/**
 * Convert a collaborator-supplied value into an engine decimal.
 * Binary floats go through their shortest string form.
 */
export function toDecimal(value: Decimal.Value): Decimal {
  return new Dec(typeof value === 'number' ? value.toString() : value);
}

export function sumDecimals(values: Iterable<Decimal>): Decimal {
  let total: Decimal = ZERO;
  for (const value of values) {
    total = total.plus(value);
  }
  return total;
}

export { Decimal };
