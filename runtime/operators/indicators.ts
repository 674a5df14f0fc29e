/**
 * Indicator access operators
 *
 * (rsi "SPY" {:window 10}) looks the value up through the evaluation
 * context, which memoizes per (symbol, indicator, params, asOf).
 */
import { DSLValue, IndicatorParamValue, IndicatorParams } from '../../spec/types';
import { EvaluationError } from '../../spec/errors';
import { DEFAULT_INDICATOR_WINDOWS } from '../../features/registry';
import { expectSymbol, numberValue, typeName } from '../values';
import { EagerOperator, OperatorCall } from './registry';

export const CURRENT_PRICE = 'current-price';

export function isIndicatorOperator(name: string): boolean {
  return name in DEFAULT_INDICATOR_WINDOWS || name === CURRENT_PRICE;
}

function toParamValue(key: string, value: DSLValue): IndicatorParamValue {
  switch (value.kind) {
    case 'number':
      return value.value.toNumber();
    case 'symbol':
      return value.name.startsWith(':') ? value.name.slice(1) : value.name;
    case 'bool':
      return value.value;
    case 'nil':
    case 'list':
    case 'map':
    case 'fragment':
      throw new EvaluationError(`Indicator parameter ${key} cannot be a ${typeName(value)}`);
  }
}

/**
 * Build indicator params from an optional {:key value} map, filling in the
 * default window.
 */
export function indicatorParams(
  indicator: string,
  raw: DSLValue | undefined,
  defaultWindow: number
): IndicatorParams {
  const params: Record<string, IndicatorParamValue> = {};

  if (raw !== undefined && raw.kind !== 'nil') {
    if (raw.kind !== 'map') {
      throw new EvaluationError(`${indicator} parameters must be a map, got ${typeName(raw)}`);
    }
    for (const [key, value] of raw.entries) {
      params[key] = toParamValue(key, value);
    }
  }

  const window = params.window ?? defaultWindow;
  if (typeof window !== 'number' || !Number.isInteger(window) || window < 1) {
    throw new EvaluationError(`${indicator} window must be a positive integer, got ${String(window)}`);
  }
  params.window = window;

  return params;
}

function indicatorOperator(name: string, defaultWindow: number): EagerOperator {
  return {
    name,
    category: 'indicator',
    form: 'eager',
    arity: { min: 1, max: 2 },
    description: `(${name} "SYM" {:window n}) with default window ${defaultWindow}`,
    apply(args: readonly DSLValue[], call: OperatorCall): DSLValue {
      const symbol = expectSymbol(args[0], `${name} symbol`);
      const params = indicatorParams(name, args[1], defaultWindow);
      return numberValue(call.context.getIndicator(symbol, name, params));
    },
  };
}

const currentPriceOperator: EagerOperator = {
  name: CURRENT_PRICE,
  category: 'indicator',
  form: 'eager',
  arity: { min: 1, max: 1 },
  description: '(current-price "SYM") latest price as of the evaluation time',
  apply(args: readonly DSLValue[], call: OperatorCall): DSLValue {
    const symbol = expectSymbol(args[0], `${CURRENT_PRICE} symbol`);
    return numberValue(call.context.getLatestPrice(symbol));
  },
};

export const INDICATOR_OPERATORS: EagerOperator[] = [
  ...Object.entries(DEFAULT_INDICATOR_WINDOWS).map(([name, window]) =>
    indicatorOperator(name, window)
  ),
  currentPriceOperator,
];
