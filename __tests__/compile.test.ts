/**
 * Compiler and static operator check tests
 */
import { StrategyCompiler, strategyName } from '../compiler/compile';
import { checkOperators, extractCalls } from '../compiler/typecheck';
import { parse } from '../compiler/parser';
import { createStandardRegistry } from '../runtime/operators';
import { EvaluationError, ParseError, UnknownOperatorError } from '../spec/errors';
import { captureError } from './helpers/fakes';

describe('StrategyCompiler', () => {
  const registry = createStandardRegistry();
  const compiler = new StrategyCompiler(registry);

  test('collects name, operators and symbols', () => {
    const compiled = compiler.compile(`
      (defsymphony "Rotation" {:rebalance-frequency :daily}
        (if (> (rsi "SPY" {:window 10}) 70)
          [(asset "BIL")]
          [(weight-equal [(asset "SPY") (asset "QQQ")])]))
    `);

    expect(compiled.name).toBe('Rotation');
    expect(compiled.operators).toEqual(['>', 'asset', 'defsymphony', 'if', 'rsi', 'weight-equal']);
    expect(compiled.symbols).toEqual(['BIL', 'QQQ', 'SPY']);
  });

  test('rejects unknown operators with the position of the operator symbol', () => {
    const error = captureError(() => compiler.compile('(weight-equal\n  (bogus-op 1 2))'));

    expect(error).toBeInstanceOf(UnknownOperatorError);
    expect(error).toMatchObject({
      message: 'Unknown operator: bogus-op',
      position: { line: 2, column: 4, offset: 17 },
    });
  });

  test('rejects wrong argument counts', () => {
    expect(() => compiler.compile('(> 1)')).toThrow(EvaluationError);
    expect(() => compiler.compile('(> 1)')).toThrow('> expects exactly 2 argument(s), got 1');
    expect(() => compiler.compile('(if true)')).toThrow('if expects 2 to 3 argument(s), got 1');
    expect(() => compiler.compile('(weight-equal)')).toThrow('weight-equal expects at least 1 argument(s), got 0');
  });

  test('propagates parse errors', () => {
    expect(() => compiler.compile('(asset "SPY"')).toThrow(ParseError);
  });

  test('strategyName is undefined without defsymphony', () => {
    expect(strategyName(parse('(asset "SPY")'))).toBeUndefined();
  });
});

describe('checkOperators', () => {
  const registry = createStandardRegistry();

  test('lists every unknown operator once', () => {
    const error = checkOperators(parse('(foo (bar 1) (foo 2))'), registry);

    expect(error).toMatchObject({
      kind: 'unknown-operator',
      message: 'Unknown operators: foo, bar',
      operators: ['foo', 'bar'],
    });
  });

  test('returns null for a valid tree', () => {
    expect(checkOperators(parse('(weight-equal [(asset "A") (asset "B")])'), registry)).toBeNull();
  });

  test('extractCalls ignores vectors and map literals', () => {
    const calls = extractCalls(parse('[(asset "A") {:k (asset "B")}]'));

    expect(calls.map((call) => call.name)).toEqual(['asset', 'asset']);
  });
});
