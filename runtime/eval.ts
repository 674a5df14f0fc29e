/**
 * Tree-walking evaluator
 * Turns an AST into a DSL value, dispatching calls through the operator registry
 */
import { ASTNode, AtomLiteral, DSLValue, ListNode, TraceNodeKind } from '../spec/types';
import {
  BudgetExceededError,
  EvaluationError,
  describeError,
  isStrategyEngineError,
} from '../spec/errors';
import { formatNode, isKeyword } from '../compiler/ast';
import { EvaluationContext } from './context';
import { TraceBuilder } from './trace';
import {
  NIL,
  addWeight,
  boolValue,
  fragmentValue,
  listValue,
  mapValue,
  numberValue,
  renderValue,
  symbolValue,
  typeName,
} from './values';
import { Decimal } from '../lib/decimal';
import { OperatorCall, OperatorRegistry, acceptsArgCount, formatArity } from './operators/registry';

export const DEFAULT_MAX_NODE_VISITS = 100_000;
export const DEFAULT_MAX_EVAL_DEPTH = 512;

/** Key used when a map literal key evaluates to nil */
export const NIL_KEY_SENTINEL = 'unknown';

export interface EvaluateOptions {
  registry: OperatorRegistry;
  maxNodeVisits?: number;
  maxDepth?: number;
}

interface StepState {
  operator?: string;
  inputs: string[];
  notes: string[];
  branch?: 'then' | 'else';
}

// ============================================================================
// Entry Point
// ============================================================================

export function evaluate(
  node: ASTNode,
  ctx: EvaluationContext,
  trace: TraceBuilder,
  options: EvaluateOptions
): DSLValue {
  return new Evaluation(ctx, trace, options).visit(node, 0);
}

function literalValue(literal: AtomLiteral): DSLValue {
  switch (literal.type) {
    case 'number':
      return numberValue(literal.value);
    case 'string':
      return symbolValue(literal.value);
    case 'boolean':
      return boolValue(literal.value);
    case 'nil':
      return NIL;
  }
}

function traceKind(node: ASTNode): TraceNodeKind {
  if (node.kind !== 'list') return node.kind;
  return node.subtype === 'plain' ? 'list' : node.subtype;
}

// ============================================================================
// Evaluation (one per top-level call)
// ============================================================================

class Evaluation {
  private visits = 0;
  private readonly registry: OperatorRegistry;
  private readonly maxNodeVisits: number;
  private readonly maxDepth: number;

  constructor(
    private readonly ctx: EvaluationContext,
    private readonly trace: TraceBuilder,
    options: EvaluateOptions
  ) {
    this.registry = options.registry;
    this.maxNodeVisits = options.maxNodeVisits ?? DEFAULT_MAX_NODE_VISITS;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_EVAL_DEPTH;
  }

  /**
   * Evaluate one node and append exactly one trace entry for it
   */
  visit(node: ASTNode, depth: number): DSLValue {
    const step: StepState = { inputs: [], notes: [] };

    try {
      this.checkBudget(node, depth);
      const result = this.dispatch(node, depth, step);
      this.trace.record({
        depth,
        nodeKind: traceKind(node),
        node: formatNode(node),
        position: node.position,
        operator: step.operator,
        inputs: step.inputs,
        result: renderValue(result),
        status: 'ok',
        branch: step.branch,
        notes: step.notes.length > 0 ? step.notes : undefined,
      });
      return result;
    } catch (error) {
      const failure = this.toEvaluationFailure(error, node, step.operator);
      this.trace.record({
        depth,
        nodeKind: traceKind(node),
        node: formatNode(node),
        position: node.position,
        operator: step.operator,
        inputs: step.inputs,
        status: 'error',
        error: describeError(failure),
        branch: step.branch,
        notes: step.notes.length > 0 ? step.notes : undefined,
      });
      throw failure;
    }
  }

  private checkBudget(node: ASTNode, depth: number): void {
    this.visits++;
    if (this.visits > this.maxNodeVisits) {
      throw new BudgetExceededError(`Node visit budget of ${this.maxNodeVisits} exceeded`, {
        position: node.position,
      });
    }
    if (depth > this.maxDepth) {
      throw new BudgetExceededError(`Maximum evaluation depth of ${this.maxDepth} exceeded`, {
        position: node.position,
      });
    }
  }

  /**
   * Engine errors keep their identity (gaining a position if they lack one);
   * anything else is wrapped with the original as cause.
   */
  private toEvaluationFailure(error: unknown, node: ASTNode, operator?: string): Error {
    if (error instanceof EvaluationError) {
      return error.attachPosition(node.position, operator);
    }
    if (isStrategyEngineError(error)) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new EvaluationError(message, { position: node.position, operator, cause: error });
  }

  private dispatch(node: ASTNode, depth: number, step: StepState): DSLValue {
    switch (node.kind) {
      case 'atom':
        return literalValue(node.literal);
      case 'symbol':
        return symbolValue(node.name);
      case 'list':
        return this.dispatchList(node, depth, step);
    }
  }

  private dispatchList(node: ListNode, depth: number, step: StepState): DSLValue {
    if (node.subtype === 'map-literal') {
      return this.evaluateMap(node, depth, step);
    }

    const head = node.children[0];
    if (node.subtype === 'plain' && head && head.kind === 'symbol') {
      return this.apply(node, head.name, depth, step);
    }

    const items = node.children.map((child) => this.visit(child, depth + 1));
    step.inputs = items.map(renderValue);
    return listValue(items);
  }

  private apply(node: ListNode, name: string, depth: number, step: StepState): DSLValue {
    const operator = this.registry.resolve(name, node.children[0]);
    step.operator = name;

    const args = node.children.slice(1);
    if (!acceptsArgCount(operator.arity, args.length)) {
      throw new EvaluationError(
        `${name} expects ${formatArity(operator.arity)} argument(s), got ${args.length}`,
        { position: node.position, operator: name }
      );
    }

    const call: OperatorCall = {
      name,
      node,
      args,
      context: this.ctx,
      evaluate: (child) => this.visit(child, depth + 1),
      note: (message) => {
        step.notes.push(message);
      },
      setBranch: (branch) => {
        step.branch = branch;
      },
      setInputs: (inputs) => {
        step.inputs = inputs;
      },
    };

    switch (operator.form) {
      case 'eager': {
        const values = args.map((arg) => call.evaluate(arg));
        step.inputs = values.map(renderValue);
        return operator.apply(values, call);
      }
      case 'special':
        step.inputs = args.map((arg) => formatNode(arg, 60));
        return operator.apply(call);
    }
  }

  // ==========================================================================
  // Map literals
  // ==========================================================================

  private evaluateMap(node: ListNode, depth: number, step: StepState): DSLValue {
    const { children } = node;
    if (children.length % 2 !== 0) {
      throw new EvaluationError('unpaired map key', {
        position: children[children.length - 1].position ?? node.position,
      });
    }

    const pairs: Array<[string, DSLValue]> = [];
    for (let i = 0; i < children.length; i += 2) {
      const keyNode = children[i];
      const key = this.visit(keyNode, depth + 1);
      const value = this.visit(children[i + 1], depth + 1);
      pairs.push([this.coerceKey(key, keyNode, step), value]);
    }
    step.inputs = pairs.map(([key, value]) => `${key}=${renderValue(value)}`);

    const keywordKeys = children.every((child, index) => index % 2 === 1 || isKeyword(child));
    const numericValues = pairs.every(([, value]) => value.kind === 'number');

    if (keywordKeys || !numericValues) {
      return mapValue(new Map(pairs));
    }

    const weights = new Map<string, Decimal>();
    for (const [symbol, value] of pairs) {
      if (value.kind !== 'number') continue;
      if (value.value.isNegative() && !value.value.isZero()) {
        throw new EvaluationError(`Negative weight for ${symbol}: ${value.value.toString()}`, {
          position: node.position,
        });
      }
      addWeight(weights, symbol, value.value);
    }
    return fragmentValue(weights, { operator: 'map-literal', position: node.position });
  }

  private coerceKey(key: DSLValue, keyNode: ASTNode, step: StepState): string {
    switch (key.kind) {
      case 'symbol':
        return key.name.startsWith(':') && key.name.length > 1 ? key.name.slice(1) : key.name;
      case 'number':
        return key.value.toString();
      case 'bool':
        return key.value ? 'true' : 'false';
      case 'nil': {
        const where = keyNode.position
          ? ` at line ${keyNode.position.line}, column ${keyNode.position.column}`
          : '';
        step.notes.push(`nil map key${where} mapped to "${NIL_KEY_SENTINEL}"`);
        this.ctx.logger.debug('Map literal nil key mapped to sentinel', {
          correlationId: this.ctx.correlationId,
          sentinel: NIL_KEY_SENTINEL,
          position: keyNode.position,
        });
        return NIL_KEY_SENTINEL;
      }
      case 'list':
      case 'map':
      case 'fragment':
        throw new EvaluationError(`Map key must be a symbol, string or number, got ${typeName(key)}`, {
          position: keyNode.position,
        });
    }
  }
}
