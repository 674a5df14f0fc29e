/**
 * Error taxonomy
 *
 * ParseError         - malformed source text
 * EvaluationError    - unknown operator, arity, type mismatch, missing data
 *   BudgetExceededError - node-visit or depth limit hit
 * InvalidAllocation  - result cannot become a sum-to-one allocation
 * StrategySourceError - strategy file missing or outside the strategies directory
 */
import { SourcePosition } from './types';

export type EngineErrorCode =
  | 'PARSE_ERROR'
  | 'EVALUATION_ERROR'
  | 'UNKNOWN_OPERATOR'
  | 'BUDGET_EXCEEDED'
  | 'INVALID_ALLOCATION'
  | 'SOURCE_UNAVAILABLE';

export abstract class StrategyEngineError extends Error {
  abstract readonly code: EngineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Position of the offending source, when known */
  abstract get position(): SourcePosition | undefined;
}

export class ParseError extends StrategyEngineError {
  readonly code = 'PARSE_ERROR' as const;
  readonly line: number;
  readonly column: number;
  private readonly offset: number;

  constructor(message: string, position: SourcePosition) {
    super(`${message} (line ${position.line}, column ${position.column})`);
    this.line = position.line;
    this.column = position.column;
    this.offset = position.offset;
  }

  get position(): SourcePosition {
    return { line: this.line, column: this.column, offset: this.offset };
  }
}

export class EvaluationError extends StrategyEngineError {
  readonly code: EngineErrorCode = 'EVALUATION_ERROR';
  private nodePosition?: SourcePosition;
  operator?: string;

  constructor(
    message: string,
    options?: { position?: SourcePosition; operator?: string; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.nodePosition = options?.position;
    this.operator = options?.operator;
  }

  get position(): SourcePosition | undefined {
    return this.nodePosition;
  }

  /**
   * Record where the error happened. The innermost position wins: callers
   * further up the tree never overwrite it.
   */
  attachPosition(position: SourcePosition | undefined, operator?: string): this {
    if (this.nodePosition === undefined && position !== undefined) {
      this.nodePosition = position;
    }
    if (this.operator === undefined && operator !== undefined) {
      this.operator = operator;
    }
    return this;
  }
}

export class UnknownOperatorError extends EvaluationError {
  readonly code = 'UNKNOWN_OPERATOR' as const;
  readonly operatorName: string;

  constructor(name: string, position?: SourcePosition) {
    super(`Unknown operator: ${name}`, { position, operator: name });
    this.operatorName = name;
  }
}

/**
 * Node-visit or depth budget exhausted. Never recovered from inside an
 * evaluation.
 */
export class BudgetExceededError extends EvaluationError {
  readonly code = 'BUDGET_EXCEEDED' as const;
}

export class InvalidAllocation extends StrategyEngineError {
  readonly code = 'INVALID_ALLOCATION' as const;
  /** Kind of the DSL value that could not be converted, if relevant */
  readonly valueType?: string;

  constructor(message: string, valueType?: string) {
    super(message);
    this.valueType = valueType;
  }

  get position(): undefined {
    return undefined;
  }
}

export class StrategySourceError extends StrategyEngineError {
  readonly code = 'SOURCE_UNAVAILABLE' as const;
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.path = path;
  }

  get position(): undefined {
    return undefined;
  }
}

export function isStrategyEngineError(error: unknown): error is StrategyEngineError {
  return error instanceof StrategyEngineError;
}

export function describeError(error: unknown): { type: string; message: string; position?: SourcePosition } {
  if (error instanceof StrategyEngineError) {
    return { type: error.name, message: error.message, position: error.position };
  }
  if (error instanceof Error) {
    return { type: error.name, message: error.message };
  }
  return { type: 'UnknownError', message: String(error) };
}
