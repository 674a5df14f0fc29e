/**
 * Numeric comparison operators: > < >= <= =
 */
import { DSLValue } from '../../spec/types';
import { Decimal } from '../../lib/decimal';
import { boolValue, expectNumber } from '../values';
import { EagerOperator } from './registry';

function comparison(name: string, test: (left: Decimal, right: Decimal) => boolean): EagerOperator {
  return {
    name,
    category: 'comparison',
    form: 'eager',
    arity: { min: 2, max: 2 },
    description: `True when the first number ${name} the second`,
    apply(args: readonly DSLValue[]): DSLValue {
      const left = expectNumber(args[0], `Left operand of ${name}`);
      const right = expectNumber(args[1], `Right operand of ${name}`);
      return boolValue(test(left, right));
    },
  };
}

export const COMPARISON_OPERATORS: EagerOperator[] = [
  comparison('>', (a, b) => a.greaterThan(b)),
  comparison('<', (a, b) => a.lessThan(b)),
  comparison('>=', (a, b) => a.greaterThanOrEqualTo(b)),
  comparison('<=', (a, b) => a.lessThanOrEqualTo(b)),
  comparison('=', (a, b) => a.equals(b)),
];
