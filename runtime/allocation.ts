/**
 * Allocation conversion
 *
 * Normalization policy:
 *   1. sum duplicate symbols
 *   2. reject negative weights and a zero total
 *   3. divide by the total and round each weight half-even to `precision` places
 *   4. drop symbols whose rounded weight is zero
 *   5. add the remainder (1 - sum) to the largest weight, ties going to the
 *      alphabetically first symbol
 * The result sums to exactly one.
 */
import { DSLValue, SerializedAllocation, StrategyAllocation } from '../spec/types';
import { InvalidAllocation } from '../spec/errors';
import { Decimal, ONE, ZERO, sumDecimals, toDecimal } from '../lib/decimal';
import { typeName } from './values';

export const DEFAULT_PRECISION = 6;
export const DEFAULT_TOLERANCE = '0.000001';
export const DEFAULT_FALLBACK_SYMBOL = 'CASH';

export interface AllocationMeta {
  correlationId: string;
  asOf: Date;
}

export interface AllocationOptions {
  /** Decimal places kept per weight */
  precision?: number;
  /** Allowed distance of the weight sum from one */
  tolerance?: Decimal.Value;
}

function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function rawWeights(value: DSLValue): Array<[string, Decimal]> {
  switch (value.kind) {
    case 'fragment':
      return Array.from(value.fragment.weights);
    case 'symbol':
      return [[value.name, ONE]];
    case 'list':
      if (value.items.length === 1) {
        return rawWeights(value.items[0]);
      }
      throw new InvalidAllocation(
        `Cannot allocate to a list of ${value.items.length} values`,
        typeName(value)
      );
    case 'number':
      throw new InvalidAllocation('Cannot allocate to a scalar', typeName(value));
    case 'bool':
    case 'map':
    case 'nil':
      throw new InvalidAllocation(
        `Cannot convert a ${typeName(value)} into an allocation`,
        typeName(value)
      );
  }
}

/**
 * Apply the normalization policy to raw weights; returns symbols in
 * ascending order.
 */
export function normalizeWeights(
  entries: Iterable<[string, Decimal]>,
  precision: number = DEFAULT_PRECISION
): Map<string, Decimal> {
  const collapsed = new Map<string, Decimal>();
  for (const [symbol, weight] of entries) {
    if (weight.isNegative() && !weight.isZero()) {
      throw new InvalidAllocation(`Negative weight for ${symbol}: ${weight.toString()}`);
    }
    const current = collapsed.get(symbol);
    collapsed.set(symbol, current ? current.plus(weight) : weight);
  }

  const total = sumDecimals(collapsed.values());
  if (total.isZero()) {
    throw new InvalidAllocation('Allocation total weight is zero');
  }

  const quantized = new Map<string, Decimal>();
  for (const symbol of Array.from(collapsed.keys()).sort(byName)) {
    const weight = collapsed.get(symbol) ?? ZERO;
    const share = weight.dividedBy(total).toDecimalPlaces(precision, Decimal.ROUND_HALF_EVEN);
    if (!share.isZero()) {
      quantized.set(symbol, share);
    }
  }

  let largest: string | undefined;
  for (const [symbol, weight] of quantized) {
    const best = largest === undefined ? undefined : quantized.get(largest);
    // Symbols iterate in ascending order, so only a strictly larger weight wins
    if (best === undefined || weight.greaterThan(best)) {
      largest = symbol;
    }
  }
  if (largest === undefined) {
    throw new InvalidAllocation(`Every weight rounds to zero at ${precision} decimal places`);
  }

  const remainder = ONE.minus(sumDecimals(quantized.values()));
  quantized.set(largest, (quantized.get(largest) ?? ZERO).plus(remainder));

  return quantized;
}

export function validateAllocation(
  allocation: StrategyAllocation,
  tolerance: Decimal.Value = DEFAULT_TOLERANCE
): void {
  for (const [symbol, weight] of allocation.weights) {
    if (weight.isNegative() && !weight.isZero()) {
      throw new InvalidAllocation(`Negative weight for ${symbol}: ${weight.toString()}`);
    }
  }
  const sum = sumDecimals(allocation.weights.values());
  if (sum.minus(ONE).abs().greaterThan(toDecimal(tolerance))) {
    throw new InvalidAllocation(`Allocation weights sum to ${sum.toString()}, expected 1`);
  }
}

export function toAllocation(
  value: DSLValue,
  meta: AllocationMeta,
  options: AllocationOptions = {}
): StrategyAllocation {
  const weights = normalizeWeights(rawWeights(value), options.precision ?? DEFAULT_PRECISION);
  const allocation: StrategyAllocation = Object.freeze({
    weights,
    correlationId: meta.correlationId,
    asOf: meta.asOf,
    isFallback: false,
  });
  validateAllocation(allocation, options.tolerance);
  return allocation;
}

/**
 * 100% to the fallback symbol
 */
export function createFallbackAllocation(
  meta: AllocationMeta,
  fallbackSymbol: string = DEFAULT_FALLBACK_SYMBOL
): StrategyAllocation {
  return Object.freeze({
    weights: new Map([[fallbackSymbol, ONE]]),
    correlationId: meta.correlationId,
    asOf: meta.asOf,
    isFallback: true,
  });
}

export function serializeAllocation(allocation: StrategyAllocation): SerializedAllocation {
  const weights: Record<string, string> = {};
  for (const [symbol, weight] of allocation.weights) {
    weights[symbol] = weight.toString();
  }
  return {
    weights,
    asOf: allocation.asOf.toISOString(),
    isFallback: allocation.isFallback,
  };
}
