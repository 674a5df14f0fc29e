/**
 * Operator registry
 *
 * Name-keyed dispatch table, frozen once built. Every operator belongs to a
 * finite category; the evaluator matches on `form` to decide who evaluates
 * the arguments.
 */
import { ASTNode, DSLValue, ListNode } from '../../spec/types';
import { UnknownOperatorError } from '../../spec/errors';
import { EvaluationContext } from '../context';

export type OperatorCategory =
  | 'comparison'
  | 'control-flow'
  | 'indicator'
  | 'portfolio'
  | 'selection';

export interface Arity {
  min: number;
  /** Unbounded when omitted */
  max?: number;
}

/**
 * Handle an operator receives for the list being applied
 */
export interface OperatorCall {
  readonly name: string;
  readonly node: ListNode;
  /** Unevaluated argument nodes (children after the head) */
  readonly args: readonly ASTNode[];
  readonly context: EvaluationContext;
  /** Evaluate a node one level below this call, recording its trace entries */
  evaluate(node: ASTNode): DSLValue;
  /** Add a low-severity note to this call's trace entry */
  note(message: string): void;
  /** Record which branch a control-flow operator took */
  setBranch(branch: 'then' | 'else'): void;
  /** Override the inputs shown on this call's trace entry */
  setInputs(inputs: string[]): void;
}

interface OperatorBase {
  name: string;
  category: OperatorCategory;
  arity: Arity;
  description: string;
}

/** Receives its arguments evaluated left to right */
export interface EagerOperator extends OperatorBase {
  form: 'eager';
  apply(args: readonly DSLValue[], call: OperatorCall): DSLValue;
}

/** Controls the evaluation of its own arguments */
export interface SpecialOperator extends OperatorBase {
  form: 'special';
  apply(call: OperatorCall): DSLValue;
}

export type OperatorDefinition = EagerOperator | SpecialOperator;

export function formatArity(arity: Arity): string {
  if (arity.max === undefined) return `at least ${arity.min}`;
  if (arity.max === arity.min) return `exactly ${arity.min}`;
  return `${arity.min} to ${arity.max}`;
}

export function acceptsArgCount(arity: Arity, count: number): boolean {
  return count >= arity.min && (arity.max === undefined || count <= arity.max);
}

export class OperatorRegistry {
  private readonly operators: ReadonlyMap<string, OperatorDefinition>;

  constructor(definitions: Iterable<OperatorDefinition>) {
    const operators = new Map<string, OperatorDefinition>();
    for (const definition of definitions) {
      if (operators.has(definition.name)) {
        throw new Error(`Operator registered twice: ${definition.name}`);
      }
      operators.set(definition.name, Object.freeze({ ...definition }));
    }
    this.operators = operators;
    Object.freeze(this);
  }

  has(name: string): boolean {
    return this.operators.has(name);
  }

  get(name: string): OperatorDefinition | undefined {
    return this.operators.get(name);
  }

  resolve(name: string, node?: ASTNode): OperatorDefinition {
    const definition = this.operators.get(name);
    if (!definition) {
      throw new UnknownOperatorError(name, node?.position);
    }
    return definition;
  }

  names(): string[] {
    return Array.from(this.operators.keys()).sort();
  }

  byCategory(category: OperatorCategory): OperatorDefinition[] {
    return Array.from(this.operators.values()).filter((op) => op.category === category);
  }

  /**
   * New registry with extra operators added (existing names cannot be replaced)
   */
  extend(definitions: Iterable<OperatorDefinition>): OperatorRegistry {
    return new OperatorRegistry([...this.operators.values(), ...definitions]);
  }
}
