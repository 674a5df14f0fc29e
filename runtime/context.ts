/**
 * Per-evaluation context
 *
 * Holds the collaborator handles for one top-level evaluation plus a memo
 * cache that lives exactly as long as the evaluation does.
 */
import {
  EngineEvent,
  EventPublisher,
  IndicatorParams,
  IndicatorService,
  MarketDataPort,
} from '../spec/types';
import { EvaluationError } from '../spec/errors';
import { Decimal } from '../lib/decimal';
import { Logger, LoggerFactory } from '../logging/logger';
import { EventMeta } from './events';

export interface EvaluationContextOptions {
  indicators: IndicatorService;
  marketData: MarketDataPort;
  publisher?: EventPublisher;
  correlationId: string;
  /** Defaults to correlationId */
  causationId?: string;
  asOf: Date;
  clock?: () => Date;
  logger?: Logger;
}

export interface ContextStats {
  indicatorRequests: number;
  /** Requests that reached the IndicatorService */
  indicatorComputations: number;
  priceRequests: number;
  priceLookups: number;
}

function memoKey(symbol: string, indicator: string, params: IndicatorParams, asOf: Date): string {
  const sortedParams = Object.keys(params)
    .sort()
    .map((key) => [key, params[key]]);
  return JSON.stringify([symbol, indicator, sortedParams, asOf.toISOString()]);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class EvaluationContext {
  readonly correlationId: string;
  readonly causationId: string;
  readonly asOf: Date;
  readonly logger: Logger;
  readonly stats: ContextStats = {
    indicatorRequests: 0,
    indicatorComputations: 0,
    priceRequests: 0,
    priceLookups: 0,
  };

  private readonly indicators: IndicatorService;
  private readonly marketData: MarketDataPort;
  private readonly publisher?: EventPublisher;
  private readonly clock: () => Date;
  private readonly indicatorMemo = new Map<string, Decimal>();
  private readonly priceMemo = new Map<string, Decimal>();

  constructor(options: EvaluationContextOptions) {
    this.indicators = options.indicators;
    this.marketData = options.marketData;
    this.publisher = options.publisher;
    this.correlationId = options.correlationId;
    this.causationId = options.causationId ?? options.correlationId;
    this.asOf = options.asOf;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? LoggerFactory.getLogger('evaluator');
  }

  now(): Date {
    return this.clock();
  }

  eventMeta(): EventMeta {
    return {
      correlationId: this.correlationId,
      causationId: this.causationId,
      timestamp: this.clock(),
    };
  }

  /**
   * Memoized IndicatorService lookup keyed by (symbol, indicator, params, asOf)
   */
  getIndicator(symbol: string, indicator: string, params: IndicatorParams): Decimal {
    this.stats.indicatorRequests++;
    const key = memoKey(symbol, indicator, params, this.asOf);
    const cached = this.indicatorMemo.get(key);
    if (cached) return cached;

    this.stats.indicatorComputations++;
    let value: Decimal;
    try {
      value = this.indicators.get(symbol, indicator, params, this.asOf);
    } catch (error) {
      throw new EvaluationError(
        `Missing indicator data for ${indicator}(${symbol}): ${errorMessage(error)}`,
        { operator: indicator, cause: error }
      );
    }
    if (!value.isFinite()) {
      throw new EvaluationError(`Indicator ${indicator}(${symbol}) is not a finite number`, {
        operator: indicator,
      });
    }

    this.indicatorMemo.set(key, value);
    return value;
  }

  /**
   * Memoized latest price lookup as of the evaluation timestamp
   */
  getLatestPrice(symbol: string): Decimal {
    this.stats.priceRequests++;
    const cached = this.priceMemo.get(symbol);
    if (cached) return cached;

    this.stats.priceLookups++;
    let price: Decimal | null;
    try {
      price = this.marketData.getLatestPrice(symbol, this.asOf);
    } catch (error) {
      throw new EvaluationError(`Market data lookup failed for ${symbol}: ${errorMessage(error)}`, {
        operator: 'current-price',
        cause: error,
      });
    }
    if (price === null) {
      throw new EvaluationError(`No price available for ${symbol}`, { operator: 'current-price' });
    }

    this.priceMemo.set(symbol, price);
    return price;
  }

  /**
   * Publish without letting a publisher failure interrupt evaluation
   */
  publish(event: EngineEvent): void {
    if (!this.publisher) return;
    try {
      this.publisher.publish(event);
    } catch (error) {
      this.logger.error('Event publisher failed', error, {
        eventType: event.eventType,
        correlationId: this.correlationId,
      });
    }
  }
}
