/**
 * DSL runtime values
 */
import { DSLValue, FragmentProvenance, PortfolioFragment } from '../spec/types';
import { EvaluationError } from '../spec/errors';
import { Decimal } from '../lib/decimal';

// ============================================================================
// Constructors
// ============================================================================

export const NIL: DSLValue = { kind: 'nil' };

export function numberValue(value: Decimal): DSLValue {
  return { kind: 'number', value };
}

export function boolValue(value: boolean): DSLValue {
  return { kind: 'bool', value };
}

export function symbolValue(name: string): DSLValue {
  return { kind: 'symbol', name };
}

export function listValue(items: readonly DSLValue[]): DSLValue {
  return { kind: 'list', items: Object.freeze([...items]) };
}

export function mapValue(entries: ReadonlyMap<string, DSLValue>): DSLValue {
  return { kind: 'map', entries };
}

export function makeFragment(
  weights: ReadonlyMap<string, Decimal>,
  provenance: FragmentProvenance
): PortfolioFragment {
  return Object.freeze({ weights: new Map(weights), provenance: Object.freeze({ ...provenance }) });
}

export function fragmentValue(
  weights: ReadonlyMap<string, Decimal>,
  provenance: FragmentProvenance
): DSLValue {
  return { kind: 'fragment', fragment: makeFragment(weights, provenance) };
}

/**
 * Add weight to a symbol, summing with what is already there.
 */
export function addWeight(weights: Map<string, Decimal>, symbol: string, weight: Decimal): void {
  const current = weights.get(symbol);
  weights.set(symbol, current ? current.plus(weight) : weight);
}

/**
 * [[x]] -> x; lists of any other length are returned as they are.
 */
export function unwrapSingleton(value: DSLValue): DSLValue {
  let current = value;
  while (current.kind === 'list' && current.items.length === 1) {
    current = current.items[0];
  }
  return current;
}

// ============================================================================
// Inspection
// ============================================================================

export function typeName(value: DSLValue): string {
  return value.kind;
}

/**
 * Compact, deterministic rendering used in traces and error messages.
 */
export function renderValue(value: DSLValue): string {
  switch (value.kind) {
    case 'number':
      return value.value.toString();
    case 'bool':
      return value.value ? 'true' : 'false';
    case 'symbol':
      return value.name;
    case 'nil':
      return 'nil';
    case 'list':
      return `[${value.items.map(renderValue).join(' ')}]`;
    case 'map':
      return `{${Array.from(value.entries, ([k, v]) => `:${k} ${renderValue(v)}`).join(' ')}}`;
    case 'fragment':
      return `{${Array.from(value.fragment.weights, ([s, w]) => `${s} ${w.toString()}`).join(', ')}}`;
  }
}

export function expectNumber(value: DSLValue, what: string): Decimal {
  if (value.kind !== 'number') {
    throw new EvaluationError(`${what} must be a number, got ${typeName(value)}`);
  }
  return value.value;
}

export function expectSymbol(value: DSLValue, what: string): string {
  if (value.kind !== 'symbol') {
    throw new EvaluationError(`${what} must be a symbol, got ${typeName(value)}`);
  }
  return value.name;
}
