/**
 * Multi-strategy evaluation
 *
 * Evaluates each strategy of a manifest on its own, scales the resulting
 * allocations by the manifest weights and consolidates them into a single
 * allocation. Files that fail are skipped; if all fail, the fallback
 * allocation is produced.
 */
import * as fs from 'fs';
import * as path from 'path';
import { StrategyAllocation, TraceError } from '../spec/types';
import { StrategyManifest } from '../spec/schema';
import { StrategySourceError, describeError } from '../spec/errors';
import { Decimal, ONE, ZERO, sumDecimals, toDecimal } from '../lib/decimal';
import { Logger, LoggerFactory } from '../logging/logger';
import { StrategyEngine } from './engine';
import { createFallbackAllocation, toAllocation } from './allocation';
import { allocationProducedEvent, strategyEvaluatedEvent } from './events';
import { withFailureEntry } from './trace';
import { addWeight, fragmentValue } from './values';

export interface StrategyOutcome {
  file: string;
  strategy?: string;
  /** Normalized manifest weight */
  weight: Decimal;
  ok: boolean;
  error?: TraceError;
}

export interface MultiStrategyMeta {
  correlationId: string;
  requestId?: string;
  causationId?: string;
  asOf?: Date;
}

export type MultiStrategyResult =
  | {
      status: 'evaluated' | 'fallback';
      correlationId: string;
      allocation: StrategyAllocation;
      strategies: StrategyOutcome[];
    }
  | { status: 'duplicate'; correlationId: string; requestId: string };

/**
 * Manifest weights scaled to sum to one; all-zero weights become equal
 */
export function normalizeManifestWeights(weights: readonly number[]): Decimal[] {
  const values = weights.map((w) => toDecimal(w));
  const total = sumDecimals(values);
  if (total.isZero()) {
    return values.map(() => ONE.dividedBy(values.length));
  }
  return values.map((w) => w.dividedBy(total));
}

export class MultiStrategyEvaluator {
  private readonly logger: Logger;

  constructor(
    private readonly engine: StrategyEngine,
    logger?: Logger
  ) {
    this.logger = logger ?? LoggerFactory.getLogger('multi-strategy');
  }

  evaluate(manifest: StrategyManifest, meta: MultiStrategyMeta): MultiStrategyResult {
    const requestId = meta.requestId ?? meta.correlationId;
    if (!this.engine.claimRequest(requestId)) {
      this.logger.debug('Duplicate request ignored', { requestId, correlationId: meta.correlationId });
      return { status: 'duplicate', correlationId: meta.correlationId, requestId };
    }

    const asOf = meta.asOf ?? this.engine.now();
    const eventMeta = {
      correlationId: meta.correlationId,
      causationId: meta.causationId ?? requestId,
      timestamp: this.engine.now(),
    };
    const weights = normalizeManifestWeights(manifest.strategies.map((entry) => entry.weight));

    const consolidated = new Map<string, Decimal>();
    const outcomes: StrategyOutcome[] = [];

    manifest.strategies.forEach((entry, index) => {
      const weight = weights[index];
      const label = entry.name ?? path.basename(entry.file);

      let source: string;
      try {
        source = fs.readFileSync(entry.file, 'utf-8');
      } catch (error) {
        const failure = describeError(
          new StrategySourceError(`Cannot read strategy file: ${entry.file}`, entry.file, { cause: error })
        );
        this.logger.logStrategy('warn', 'Strategy file skipped', label, { reason: failure.message });
        this.engine.publish(
          strategyEvaluatedEvent(eventMeta, {
            strategy: label,
            success: false,
            trace: withFailureEntry([], failure, this.engine.now()),
          })
        );
        outcomes.push({ file: entry.file, strategy: label, weight, ok: false, error: failure });
        return;
      }

      const result = this.engine.compute(source, {
        correlationId: meta.correlationId,
        causationId: eventMeta.causationId,
        asOf,
        strategy: entry.name,
      });
      const strategy = result.strategy ?? label;

      if (!result.ok) {
        const failure = describeError(result.error);
        this.logger.logStrategy('warn', 'Strategy failed and was skipped', strategy, {
          errorType: failure.type,
          reason: failure.message,
        });
        this.engine.publish(
          strategyEvaluatedEvent(eventMeta, {
            strategy,
            success: false,
            trace: withFailureEntry(result.trace, failure, this.engine.now()),
          })
        );
        outcomes.push({ file: entry.file, strategy, weight, ok: false, error: failure });
        return;
      }

      this.engine.publish(strategyEvaluatedEvent(eventMeta, { strategy, success: true, trace: result.trace }));
      for (const [symbol, share] of result.allocation.weights) {
        addWeight(consolidated, symbol, share.times(weight));
      }
      outcomes.push({ file: entry.file, strategy, weight, ok: true });
    });

    const allocationMeta = { correlationId: meta.correlationId, asOf };
    const succeeded = outcomes.some((outcome) => outcome.ok);
    let allocation: StrategyAllocation;
    if (succeeded && sumDecimals(consolidated.values()).greaterThan(ZERO)) {
      allocation = toAllocation(
        fragmentValue(consolidated, { operator: 'manifest' }),
        allocationMeta,
        { precision: this.engine.config.precision, tolerance: this.engine.config.tolerance }
      );
    } else {
      allocation = createFallbackAllocation(allocationMeta, this.engine.config.fallbackSymbol);
      this.logger.warn(`Every strategy failed, falling back to ${this.engine.config.fallbackSymbol}`, {
        correlationId: meta.correlationId,
      });
    }

    this.engine.publish(allocationProducedEvent(eventMeta, allocation));

    return {
      status: allocation.isFallback ? 'fallback' : 'evaluated',
      correlationId: meta.correlationId,
      allocation,
      strategies: outcomes,
    };
  }
}
