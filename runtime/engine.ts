/**
 * Strategy Engine
 * Facade over parse → evaluate → convert → publish, with idempotency and
 * fail-safe fallback allocation
 */
import * as fs from 'fs';
import * as path from 'path';
import {
  ASTNode,
  DSLValue,
  EngineEvent,
  EventPublisher,
  IndicatorService,
  MarketDataPort,
  StrategyAllocation,
  TraceEntry,
  TraceError,
} from '../spec/types';
import { StrategySourceError, describeError } from '../spec/errors';
import { EngineConfig, EngineConfigSchema, StrategyRequestSchema, formatIssues } from '../spec/schema';
import { parse } from '../compiler/parser';
import { strategyName } from '../compiler/compile';
import { Logger, LoggerFactory } from '../logging/logger';
import { ContextStats, EvaluationContext } from './context';
import { evaluate as evaluateAst } from './eval';
import { TraceBuilder, withFailureEntry } from './trace';
import { createFallbackAllocation, toAllocation } from './allocation';
import { ProcessedRequestCache } from './idempotency';
import { allocationProducedEvent, strategyEvaluatedEvent } from './events';
import { OperatorRegistry } from './operators/registry';
import { createStandardRegistry } from './operators';

export type StrategyInput = string | ASTNode;

export interface EvaluationMeta {
  correlationId: string;
  /** Idempotency key; defaults to correlationId */
  requestId?: string;
  /** Defaults to requestId */
  causationId?: string;
  /** Defaults to the engine clock */
  asOf?: Date;
  /** Label used in events and logs; defaults to the defsymphony name */
  strategy?: string;
}

interface ComputeBase {
  correlationId: string;
  asOf: Date;
  strategy?: string;
  trace: TraceEntry[];
}

export interface ComputeSuccess extends ComputeBase {
  ok: true;
  value: DSLValue;
  allocation: StrategyAllocation;
  stats: ContextStats;
}

export interface ComputeFailure extends ComputeBase {
  ok: false;
  error: Error;
}

export type ComputeResult = ComputeSuccess | ComputeFailure;

export type EngineResult =
  | {
      status: 'evaluated';
      correlationId: string;
      allocation: StrategyAllocation;
      trace: TraceEntry[];
      strategy?: string;
    }
  | {
      status: 'fallback';
      correlationId: string;
      allocation: StrategyAllocation;
      trace: TraceEntry[];
      error: TraceError;
      strategy?: string;
    }
  | { status: 'duplicate'; correlationId: string; requestId: string }
  | { status: 'rejected'; reason: string };

export interface StrategyEngineOptions {
  indicators: IndicatorService;
  marketData: MarketDataPort;
  publisher: EventPublisher;
  registry?: OperatorRegistry;
  config?: Partial<EngineConfig>;
  processed?: ProcessedRequestCache;
  clock?: () => Date;
  logger?: Logger;
}

// Inline source starts with a form or a comment; anything else is a path
function isInlineSource(value: string): boolean {
  const trimmed = value.trimStart();
  return trimmed.startsWith('(') || trimmed.startsWith(';');
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// ============================================================================
// Strategy Engine
// ============================================================================

export class StrategyEngine {
  readonly config: EngineConfig;
  readonly registry: OperatorRegistry;
  private readonly indicators: IndicatorService;
  private readonly marketData: MarketDataPort;
  private readonly publisher: EventPublisher;
  private readonly processed: ProcessedRequestCache;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(options: StrategyEngineOptions) {
    this.config = EngineConfigSchema.parse(options.config ?? {});
    this.registry = options.registry ?? createStandardRegistry();
    this.indicators = options.indicators;
    this.marketData = options.marketData;
    this.publisher = options.publisher;
    this.clock = options.clock ?? (() => new Date());
    this.processed =
      options.processed ??
      new ProcessedRequestCache({
        capacity: this.config.idempotencyCapacity,
        ttlMs: this.config.idempotencyTtlMs,
        clock: this.clock,
      });
    this.logger = options.logger ?? LoggerFactory.getLogger('engine');
  }

  /**
   * Parse (unless given an AST), evaluate and convert. Never throws and
   * publishes nothing.
   */
  compute(input: StrategyInput, meta: EvaluationMeta): ComputeResult {
    return this.run(() => input, meta);
  }

  /**
   * Evaluate once per request id and publish StrategyEvaluated followed by
   * PortfolioAllocationProduced. Failures publish the fallback allocation.
   */
  evaluate(input: StrategyInput, meta: EvaluationMeta): EngineResult {
    return this.process(() => input, meta);
  }

  /**
   * Validate a wire request, resolve its strategy source and evaluate it.
   */
  handleRequest(raw: unknown): EngineResult {
    const parsed = StrategyRequestSchema.safeParse(raw);
    if (!parsed.success) {
      const reason = formatIssues(parsed.error);
      this.logger.error('Rejected invalid strategy request', undefined, { reason });
      return { status: 'rejected', reason };
    }

    const request = parsed.data;
    return this.process(() => this.loadSource(request.source), {
      correlationId: request.correlationId,
      requestId: request.requestId,
      causationId: request.causationId,
      asOf: request.asOf,
    });
  }

  /**
   * Inline s-expression text is returned as is; anything else is read as a
   * file under the strategies directory.
   */
  loadSource(sourceOrPath: string): string {
    if (isInlineSource(sourceOrPath)) {
      return sourceOrPath;
    }

    const root = path.resolve(this.config.strategiesDir);
    const filePath = path.resolve(root, sourceOrPath);
    if (filePath !== root && !filePath.startsWith(root + path.sep)) {
      throw new StrategySourceError(`Strategy path escapes the strategies directory: ${sourceOrPath}`, filePath);
    }

    try {
      return fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      throw new StrategySourceError(`Cannot read strategy file: ${sourceOrPath}`, filePath, { cause: error });
    }
  }

  /**
   * Mark a request id as processed; false when it already was.
   */
  claimRequest(requestId: string): boolean {
    return this.processed.checkAndMark(requestId);
  }

  /**
   * Publish, logging rather than throwing on publisher failure.
   */
  publish(event: EngineEvent): void {
    try {
      this.publisher.publish(event);
    } catch (error) {
      this.logger.error('Event publisher failed', error, {
        eventType: event.eventType,
        correlationId: event.correlationId,
      });
    }
  }

  now(): Date {
    return this.clock();
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private process(load: () => StrategyInput, meta: EvaluationMeta): EngineResult {
    const requestId = meta.requestId ?? meta.correlationId;
    if (!this.claimRequest(requestId)) {
      this.logger.debug('Duplicate request ignored', {
        requestId,
        correlationId: meta.correlationId,
      });
      return { status: 'duplicate', correlationId: meta.correlationId, requestId };
    }

    const eventMeta = {
      correlationId: meta.correlationId,
      causationId: meta.causationId ?? requestId,
      timestamp: this.clock(),
    };
    const result = this.run(load, { ...meta, causationId: eventMeta.causationId }, this.publisher);

    if (result.ok) {
      this.publish(
        strategyEvaluatedEvent(eventMeta, { strategy: result.strategy, success: true, trace: result.trace })
      );
      this.publish(allocationProducedEvent(eventMeta, result.allocation));
      this.logger.info('Strategy evaluated', {
        correlationId: result.correlationId,
        strategy: result.strategy,
        symbols: Array.from(result.allocation.weights.keys()),
        traceEntries: result.trace.length,
      });
      return {
        status: 'evaluated',
        correlationId: result.correlationId,
        allocation: result.allocation,
        trace: result.trace,
        strategy: result.strategy,
      };
    }

    const error = describeError(result.error);
    const trace = withFailureEntry(result.trace, error, this.clock());
    const allocation = createFallbackAllocation(
      { correlationId: result.correlationId, asOf: result.asOf },
      this.config.fallbackSymbol
    );

    this.publish(strategyEvaluatedEvent(eventMeta, { strategy: result.strategy, success: false, trace }));
    this.publish(allocationProducedEvent(eventMeta, allocation));
    this.logger.warn(`Strategy evaluation failed, falling back to ${this.config.fallbackSymbol}`, {
      correlationId: result.correlationId,
      strategy: result.strategy,
      errorType: error.type,
      reason: error.message,
      position: error.position,
    });

    return {
      status: 'fallback',
      correlationId: result.correlationId,
      allocation,
      trace,
      error,
      strategy: result.strategy,
    };
  }

  private run(
    load: () => StrategyInput,
    meta: EvaluationMeta,
    publisher?: EventPublisher
  ): ComputeResult {
    const asOf = meta.asOf ?? this.clock();
    const trace = new TraceBuilder(this.clock);
    let strategy = meta.strategy;

    try {
      const input = load();
      const ast = typeof input === 'string' ? parse(input, { maxDepth: this.config.maxParseDepth }) : input;
      strategy = strategy ?? strategyName(ast);

      const context = new EvaluationContext({
        indicators: this.indicators,
        marketData: this.marketData,
        publisher,
        correlationId: meta.correlationId,
        causationId: meta.causationId ?? meta.requestId ?? meta.correlationId,
        asOf,
        clock: this.clock,
        logger: this.logger,
      });

      const value = evaluateAst(ast, context, trace, {
        registry: this.registry,
        maxNodeVisits: this.config.maxNodeVisits,
        maxDepth: this.config.maxEvalDepth,
      });

      const allocation = toAllocation(
        value,
        { correlationId: meta.correlationId, asOf },
        { precision: this.config.precision, tolerance: this.config.tolerance }
      );

      return {
        ok: true,
        correlationId: meta.correlationId,
        asOf,
        strategy,
        trace: trace.toArray(),
        value,
        allocation,
        stats: { ...context.stats },
      };
    } catch (error) {
      return {
        ok: false,
        correlationId: meta.correlationId,
        asOf,
        strategy,
        trace: trace.toArray(),
        error: toError(error),
      };
    }
  }
}
