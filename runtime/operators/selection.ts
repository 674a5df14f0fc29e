/**
 * Selection operators: filter, select-top, select-bottom
 *
 *   (filter (rsi {:window 10}) (select-top 2) [(asset "A") (asset "B") (asset "C")])
 *
 * Each candidate is scored by the condition with the candidate's symbol
 * injected, then sorted. Ties always resolve by ascending symbol name.
 *
 * A vector holding groups or other fragments is filtered portfolio by
 * portfolio instead:
 *
 *   (filter (cumulative-return {:window 10}) (select-top 1)
 *     [(group "G1" [(weight-equal [(asset "A") (asset "B")])]) (group "G2" [(asset "C")])])
 *
 * Each portfolio scores the weight-averaged metric of its holdings and the
 * selected portfolios are kept whole, equally weighted against each other.
 */
import { ASTNode, DSLValue } from '../../spec/types';
import { BudgetExceededError, EvaluationError } from '../../spec/errors';
import { callName, list, stringAtom } from '../../compiler/ast';
import { Decimal, ONE, ZERO } from '../../lib/decimal';
import { addWeight, expectNumber, fragmentValue, unwrapSingleton } from '../values';
import { isIndicatorOperator } from './indicators';
import { collectSymbols } from './portfolio';
import { EagerOperator, OperatorCall, SpecialOperator } from './registry';

type Direction = 'top' | 'bottom';

interface ScoredSymbol {
  symbol: string;
  score: Decimal;
}

type Holdings = ReadonlyMap<string, Decimal>;

// Higher drawdown is worse, so portfolios rank on its negation
const INVERTED_PORTFOLIO_METRICS = new Set(['max-drawdown']);

const SELECTORS: Record<string, Direction> = {
  'select-top': 'top',
  'select-bottom': 'bottom',
};

/**
 * (rsi {:window 10}) -> (rsi "SYM" {:window 10}). Forms that are not
 * indicator calls, or already name a symbol, are returned unchanged.
 */
export function injectSymbol(condition: ASTNode, symbol: string): ASTNode {
  const name = callName(condition);
  if (name === null || !isIndicatorOperator(name) || condition.kind !== 'list') {
    return condition;
  }

  const [head, ...rest] = condition.children;
  const first = rest[0];
  if (first && first.kind === 'atom' && first.literal.type === 'string') {
    return condition;
  }

  return list([head, stringAtom(symbol, head.position), ...rest], 'plain', condition.position);
}

/**
 * Deterministic order: by score (descending for top, ascending for bottom),
 * then by symbol ascending
 */
export function rankCandidates(scored: readonly ScoredSymbol[], direction: Direction): ScoredSymbol[] {
  return [...scored].sort((a, b) => {
    const byScore = direction === 'top' ? b.score.comparedTo(a.score) : a.score.comparedTo(b.score);
    if (byScore !== 0) return byScore;
    return a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0;
  });
}

function selectionCount(value: DSLValue, selector: string): number {
  const count = expectNumber(value, `${selector} count`);
  if (!count.isInteger() || (count.isNegative() && !count.isZero())) {
    throw new EvaluationError(`${selector} count must be a non-negative integer, got ${count.toString()}`);
  }
  return count.toNumber();
}

function skipCandidate(call: OperatorCall, symbol: string, error: unknown): void {
  if (error instanceof BudgetExceededError || !(error instanceof EvaluationError)) throw error;
  call.note(`skipped ${symbol}: ${error.message}`);
  call.context.logger.warn('Filter condition failed, candidate skipped', {
    symbol,
    correlationId: call.context.correlationId,
    reason: error.message,
  });
}

function scoreCandidates(call: OperatorCall, condition: ASTNode, candidates: string[]): ScoredSymbol[] {
  const scored: ScoredSymbol[] = [];

  for (const symbol of candidates) {
    try {
      const value = call.evaluate(injectSymbol(condition, symbol));
      scored.push({ symbol, score: expectNumber(value, 'filter condition') });
    } catch (error) {
      skipCandidate(call, symbol, error);
    }
  }

  return scored;
}

// ============================================================================
// Portfolio mode
// ============================================================================

/**
 * Holdings of each item when the value is a vector of portfolios: single
 * element lists are unwrapped and bare symbols count as one-asset
 * portfolios. Null unless at least one item is a fragment and every item
 * is a fragment or a symbol.
 */
export function portfolioCandidates(value: DSLValue): Holdings[] | null {
  if (value.kind !== 'list' || value.items.length === 0) return null;

  const portfolios: Holdings[] = [];
  let hasFragment = false;
  for (const item of value.items) {
    const unwrapped = unwrapSingleton(item);
    if (unwrapped.kind === 'fragment') {
      hasFragment = true;
      portfolios.push(unwrapped.fragment.weights);
    } else if (unwrapped.kind === 'symbol') {
      portfolios.push(new Map([[unwrapped.name, ONE]]));
    } else {
      return null;
    }
  }
  return hasFragment ? portfolios : null;
}

function scorePortfolio(call: OperatorCall, condition: ASTNode, holdings: Holdings): Decimal | null {
  const name = callName(condition);
  const invert = name !== null && INVERTED_PORTFOLIO_METRICS.has(name);

  let weighted = ZERO;
  let total = ZERO;
  for (const [symbol, weight] of holdings) {
    try {
      const score = expectNumber(call.evaluate(injectSymbol(condition, symbol)), 'filter condition');
      weighted = weighted.plus(weight.times(invert ? score.negated() : score));
      total = total.plus(weight);
    } catch (error) {
      skipCandidate(call, symbol, error);
    }
  }
  return total.greaterThan(ZERO) ? weighted.dividedBy(total) : null;
}

function firstSymbol(holdings: Holdings): string {
  return Array.from(holdings.keys()).sort()[0] ?? '';
}

function selectPortfolios(
  call: OperatorCall,
  condition: ASTNode,
  portfolios: readonly Holdings[],
  direction: Direction,
  count: number | undefined
): Map<string, Decimal> {
  const scored: Array<{ holdings: Holdings; score: Decimal; key: string }> = [];
  for (const holdings of portfolios) {
    const score = scorePortfolio(call, condition, holdings);
    if (score !== null) {
      scored.push({ holdings, score, key: firstSymbol(holdings) });
    }
  }

  scored.sort((a, b) => {
    const byScore = direction === 'top' ? b.score.comparedTo(a.score) : a.score.comparedTo(b.score);
    if (byScore !== 0) return byScore;
    return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
  });
  const chosen = count === undefined ? scored : scored.slice(0, count);

  const weights = new Map<string, Decimal>();
  if (chosen.length === 0) return weights;
  const share = ONE.dividedBy(chosen.length);
  for (const { holdings } of chosen) {
    for (const [symbol, weight] of holdings) {
      addWeight(weights, symbol, weight.times(share));
    }
  }
  return weights;
}

// ============================================================================
// Operators
// ============================================================================

const filterOperator: SpecialOperator = {
  name: 'filter',
  category: 'selection',
  form: 'special',
  arity: { min: 2, max: 3 },
  description: '(filter condition selector? portfolio) ranks and selects candidates',
  apply(call: OperatorCall): DSLValue {
    const condition = call.args[0];
    const portfolioNode = call.args[call.args.length - 1];

    let direction: Direction = 'top';
    let count: number | undefined;
    if (call.args.length === 3) {
      const selectorNode = call.args[1];
      const selector = callName(selectorNode);
      const selected = selector === null ? undefined : SELECTORS[selector];
      if (selector === null || selected === undefined) {
        throw new EvaluationError('filter selector must be (select-top n) or (select-bottom n)', {
          position: selectorNode.position,
        });
      }
      direction = selected;
      count = selectionCount(call.evaluate(selectorNode), selector);
    }

    const portfolio = call.evaluate(portfolioNode);
    const portfolios = portfolioCandidates(portfolio);
    if (portfolios) {
      return fragmentValue(selectPortfolios(call, condition, portfolios, direction, count), {
        operator: call.name,
        position: call.node.position,
      });
    }

    const candidates = collectSymbols([portfolio], call.name);
    const ranked = rankCandidates(scoreCandidates(call, condition, candidates), direction);
    const chosen = count === undefined ? ranked : ranked.slice(0, count);

    const weights = new Map<string, Decimal>();
    if (chosen.length > 0) {
      const share = ONE.dividedBy(chosen.length);
      for (const { symbol } of chosen) {
        weights.set(symbol, share);
      }
    }

    return fragmentValue(weights, { operator: call.name, position: call.node.position });
  },
};

function selectorOperator(name: string): EagerOperator {
  return {
    name,
    category: 'selection',
    form: 'eager',
    arity: { min: 1, max: 1 },
    description: `(${name} n) selection size for filter`,
    apply(args: readonly DSLValue[]): DSLValue {
      selectionCount(args[0], name);
      return args[0];
    },
  };
}

export const SELECTION_OPERATORS: Array<EagerOperator | SpecialOperator> = [
  filterOperator,
  selectorOperator('select-top'),
  selectorOperator('select-bottom'),
];
