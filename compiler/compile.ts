/**
 * Compiler: source → checked AST
 * Orchestrates parsing, static operator checks and metadata extraction
 */
import { ASTNode } from '../spec/types';
import { EvaluationError, UnknownOperatorError } from '../spec/errors';
import { OperatorRegistry } from '../runtime/operators/registry';
import { callName } from './ast';
import { ParseOptions, parse } from './parser';
import { checkOperators, extractCalls } from './typecheck';

export interface CompiledStrategy {
  /** defsymphony name, when the strategy declares one */
  name?: string;
  ast: ASTNode;
  /** Distinct operators used, sorted */
  operators: string[];
  /** Distinct string literals naming tickers, sorted */
  symbols: string[];
}

/**
 * Name from (defsymphony "name" ...), if present
 */
export function strategyName(ast: ASTNode): string | undefined {
  if (callName(ast) !== 'defsymphony' || ast.kind !== 'list') return undefined;
  const nameNode = ast.children[1];
  if (nameNode && nameNode.kind === 'atom' && nameNode.literal.type === 'string') {
    return nameNode.literal.value;
  }
  return undefined;
}

// Operators whose first argument is a ticker
const TICKER_OPERATORS = new Set(['asset']);

function collectTickers(ast: ASTNode, isIndicator: (name: string) => boolean): string[] {
  const tickers = new Set<string>();
  for (const call of extractCalls(ast)) {
    if (!TICKER_OPERATORS.has(call.name) && !isIndicator(call.name)) continue;
    if (call.node.kind !== 'list') continue;
    const first = call.node.children[1];
    if (first && first.kind === 'atom' && first.literal.type === 'string') {
      tickers.add(first.literal.value);
    }
  }
  return Array.from(tickers).sort();
}

// ============================================================================
// Compiler
// ============================================================================

export class StrategyCompiler {
  constructor(
    private registry: OperatorRegistry,
    private parseOptions: ParseOptions = {}
  ) {}

  /**
   * Parse and check a strategy. Throws ParseError, UnknownOperatorError or
   * EvaluationError (arity).
   */
  compile(source: string): CompiledStrategy {
    const ast = parse(source, this.parseOptions);
    return this.check(ast);
  }

  check(ast: ASTNode): CompiledStrategy {
    const error = checkOperators(ast, this.registry);
    if (error) {
      if (error.kind === 'unknown-operator') {
        throw new UnknownOperatorError(error.operators?.[0] ?? 'unknown', error.position);
      }
      throw new EvaluationError(error.message, {
        position: error.position,
        operator: error.operators?.[0],
      });
    }

    const operators = Array.from(new Set(extractCalls(ast).map((call) => call.name))).sort();
    const isIndicator = (name: string) => this.registry.get(name)?.category === 'indicator';

    return {
      name: strategyName(ast),
      ast,
      operators,
      symbols: collectTickers(ast, isIndicator),
    };
  }
}
