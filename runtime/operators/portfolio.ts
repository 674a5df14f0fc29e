/**
 * Portfolio composition operators
 *
 * asset, weight-equal, weight-specified, weight-inverse-volatility, group, merge.
 * Duplicate symbols are always summed, never overwritten.
 */
import { DSLValue, FragmentProvenance } from '../../spec/types';
import { BudgetExceededError, EvaluationError } from '../../spec/errors';
import { Decimal, ONE, ZERO, sumDecimals } from '../../lib/decimal';
import {
  addWeight,
  expectNumber,
  expectSymbol,
  fragmentValue,
  symbolValue,
  typeName,
  unwrapSingleton,
} from '../values';
import { EagerOperator, OperatorCall } from './registry';

type Weights = Map<string, Decimal>;

function provenanceOf(call: OperatorCall): FragmentProvenance {
  return { operator: call.name, position: call.node.position };
}

/**
 * Expand nested lists (vectors) into a flat sequence of values
 */
export function flattenValues(values: readonly DSLValue[]): DSLValue[] {
  const flat: DSLValue[] = [];
  for (const value of values) {
    if (value.kind === 'list') {
      flat.push(...flattenValues(value.items));
    } else {
      flat.push(value);
    }
  }
  return flat;
}

/**
 * Symbols referenced by a portfolio value, first occurrence order
 */
export function collectSymbols(values: readonly DSLValue[], operator: string): string[] {
  const seen = new Set<string>();
  for (const value of flattenValues(values)) {
    switch (value.kind) {
      case 'symbol':
        seen.add(value.name);
        break;
      case 'fragment':
        for (const symbol of value.fragment.weights.keys()) seen.add(symbol);
        break;
      case 'nil':
        break;
      case 'number':
      case 'bool':
      case 'map':
        throw new EvaluationError(`${operator} expects assets, got ${typeName(value)}`);
    }
  }
  return Array.from(seen);
}

/**
 * Weights of one child scaled to sum to one; null when the child holds no
 * weight at all.
 */
function normalizeChild(value: DSLValue, operator: string): Weights | null {
  switch (value.kind) {
    case 'symbol':
      return new Map([[value.name, ONE]]);
    case 'fragment': {
      const total = sumDecimals(value.fragment.weights.values());
      if (total.isZero()) return null;
      const weights: Weights = new Map();
      for (const [symbol, weight] of value.fragment.weights) {
        weights.set(symbol, weight.dividedBy(total));
      }
      return weights;
    }
    case 'list':
      return equalWeights(flattenValues(value.items), operator);
    case 'nil':
      return null;
    case 'number':
    case 'bool':
    case 'map':
      throw new EvaluationError(`${operator} cannot weight a ${typeName(value)}`);
  }
}

function equalWeights(children: readonly DSLValue[], operator: string): Weights | null {
  const parts: Weights[] = [];
  for (const child of children) {
    const normalized = normalizeChild(child, operator);
    if (normalized) parts.push(normalized);
  }
  if (parts.length === 0) return null;

  const share = ONE.dividedBy(parts.length);
  const weights: Weights = new Map();
  for (const part of parts) {
    for (const [symbol, weight] of part) {
      addWeight(weights, symbol, weight.times(share));
    }
  }
  return weights;
}

// ============================================================================
// Operators
// ============================================================================

const assetOperator: EagerOperator = {
  name: 'asset',
  category: 'portfolio',
  form: 'eager',
  arity: { min: 1, max: 2 },
  description: '(asset "SYM" description?) a single ticker',
  apply(args) {
    return symbolValue(expectSymbol(args[0], 'asset ticker'));
  },
};

/**
 * Every child gets the same share; list items count as separate children.
 */
const weightEqualOperator: EagerOperator = {
  name: 'weight-equal',
  category: 'portfolio',
  form: 'eager',
  arity: { min: 1 },
  description: '(weight-equal children...) equal share per child',
  apply(args, call) {
    const weights = equalWeights(flattenValues(args), call.name);
    if (!weights) {
      throw new EvaluationError('weight-equal has no assets to weight');
    }
    return fragmentValue(weights, provenanceOf(call));
  },
};

const weightSpecifiedOperator: EagerOperator = {
  name: 'weight-specified',
  category: 'portfolio',
  form: 'eager',
  arity: { min: 2 },
  description: '(weight-specified w1 a1 w2 a2 ...) explicit weights',
  apply(args, call) {
    if (args.length % 2 !== 0) {
      throw new EvaluationError('weight-specified expects weight/asset pairs');
    }

    const weights: Weights = new Map();
    for (let i = 0; i < args.length; i += 2) {
      const weight = expectNumber(args[i], 'weight-specified weight');
      if (weight.isNegative() && !weight.isZero()) {
        throw new EvaluationError(`weight-specified weight must be non-negative, got ${weight.toString()}`);
      }
      const part = normalizeChild(args[i + 1], call.name);
      if (!part || weight.isZero()) continue;
      for (const [symbol, share] of part) {
        addWeight(weights, symbol, share.times(weight));
      }
    }

    return fragmentValue(weights, provenanceOf(call));
  },
};

/**
 * Weights each symbol by 1 / stdev-return over the window.
 */
const weightInverseVolatilityOperator: EagerOperator = {
  name: 'weight-inverse-volatility',
  category: 'portfolio',
  form: 'eager',
  arity: { min: 2 },
  description: '(weight-inverse-volatility window assets...) inverse volatility weights',
  apply(args, call) {
    const window = expectNumber(args[0], 'weight-inverse-volatility window');
    if (!window.isInteger() || window.lessThan(1)) {
      throw new EvaluationError(`weight-inverse-volatility window must be a positive integer, got ${window.toString()}`);
    }

    const weights: Weights = new Map();
    for (const symbol of collectSymbols(args.slice(1), call.name)) {
      let volatility: Decimal;
      try {
        volatility = call.context.getIndicator(symbol, 'stdev-return', { window: window.toNumber() });
      } catch (error) {
        if (error instanceof BudgetExceededError || !(error instanceof EvaluationError)) throw error;
        call.note(`skipped ${symbol}: ${error.message}`);
        call.context.logger.warn('Volatility unavailable, asset skipped', {
          symbol,
          correlationId: call.context.correlationId,
          reason: error.message,
        });
        continue;
      }
      if (volatility.lessThanOrEqualTo(ZERO)) {
        call.note(`skipped ${symbol}: non-positive volatility ${volatility.toString()}`);
        continue;
      }
      addWeight(weights, symbol, ONE.dividedBy(volatility));
    }

    if (weights.size === 0) {
      throw new EvaluationError('weight-inverse-volatility found no asset with a usable volatility');
    }
    return fragmentValue(weights, provenanceOf(call));
  },
};

/**
 * Organising container: the last body value passes through untouched.
 */
const groupOperator: EagerOperator = {
  name: 'group',
  category: 'portfolio',
  form: 'eager',
  arity: { min: 2 },
  description: '(group name body...) names a sub-portfolio, returns the last body value',
  apply(args) {
    const last = args[args.length - 1];
    return unwrapSingleton(last);
  },
};

/**
 * Fragments are summed as they are, bare symbols count 1.
 */
const mergeOperator: EagerOperator = {
  name: 'merge',
  category: 'portfolio',
  form: 'eager',
  arity: { min: 1 },
  description: '(merge portfolios...) sums fragment weights without rescaling',
  apply(args, call) {
    const weights: Weights = new Map();

    for (const value of flattenValues(args)) {
      switch (value.kind) {
        case 'symbol':
          addWeight(weights, value.name, ONE);
          break;
        case 'fragment':
          for (const [symbol, weight] of value.fragment.weights) {
            addWeight(weights, symbol, weight);
          }
          break;
        case 'nil':
          break;
        case 'number':
        case 'bool':
        case 'map':
          throw new EvaluationError(`merge cannot combine a ${typeName(value)}`);
      }
    }

    if (weights.size === 0) {
      throw new EvaluationError('merge has no assets to combine');
    }
    return fragmentValue(weights, provenanceOf(call));
  },
};

export const PORTFOLIO_OPERATORS: EagerOperator[] = [
  assetOperator,
  weightEqualOperator,
  weightSpecifiedOperator,
  weightInverseVolatilityOperator,
  groupOperator,
  mergeOperator,
];
