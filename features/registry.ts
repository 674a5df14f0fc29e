/**
 * Indicator registry and factory
 */
import {
  computeCumulativeReturn,
  computeEMA,
  computeMaxDrawdown,
  computeMovingAverageReturn,
  computeRSI,
  computeSMA,
  computeStdevPrice,
  computeStdevReturn,
} from './indicators';

export interface IndicatorDefinition {
  name: string;
  defaultWindow: number;
  /** Closes needed for a window */
  requiredBars(window: number): number;
  compute(closes: number[], window: number): number;
}

// ============================================================================
// Default windows
// ============================================================================

export const DEFAULT_INDICATOR_WINDOWS: Readonly<Record<string, number>> = Object.freeze({
  rsi: 14,
  'moving-average-price': 200,
  'moving-average-return': 21,
  'cumulative-return': 60,
  'exponential-moving-average-price': 12,
  'stdev-return': 6,
  'stdev-price': 6,
  'max-drawdown': 60,
});

// ============================================================================
// Indicator Registry
// ============================================================================

export class IndicatorRegistry {
  private indicators: Map<string, IndicatorDefinition> = new Map();

  register(definition: IndicatorDefinition): void {
    this.indicators.set(definition.name, definition);
  }

  get(name: string): IndicatorDefinition | null {
    return this.indicators.get(name) || null;
  }

  has(name: string): boolean {
    return this.indicators.has(name);
  }

  names(): string[] {
    return Array.from(this.indicators.keys()).sort();
  }
}

// ============================================================================
// Standard Registry
// ============================================================================

function windowOf(name: string): number {
  const window = DEFAULT_INDICATOR_WINDOWS[name];
  if (window === undefined) {
    throw new Error(`No default window for indicator ${name}`);
  }
  return window;
}

export function createStandardIndicatorRegistry(): IndicatorRegistry {
  const registry = new IndicatorRegistry();

  // RSI needs one extra close for the first change
  registry.register({
    name: 'rsi',
    defaultWindow: windowOf('rsi'),
    requiredBars: (w) => w + 1,
    compute: computeRSI,
  });

  registry.register({
    name: 'moving-average-price',
    defaultWindow: windowOf('moving-average-price'),
    requiredBars: (w) => w,
    compute: computeSMA,
  });

  registry.register({
    name: 'exponential-moving-average-price',
    defaultWindow: windowOf('exponential-moving-average-price'),
    requiredBars: (w) => w,
    compute: computeEMA,
  });

  // Return-based measures
  registry.register({
    name: 'moving-average-return',
    defaultWindow: windowOf('moving-average-return'),
    requiredBars: (w) => w + 1,
    compute: computeMovingAverageReturn,
  });

  registry.register({
    name: 'cumulative-return',
    defaultWindow: windowOf('cumulative-return'),
    requiredBars: (w) => w + 1,
    compute: computeCumulativeReturn,
  });

  registry.register({
    name: 'stdev-return',
    defaultWindow: windowOf('stdev-return'),
    requiredBars: (w) => w + 1,
    compute: computeStdevReturn,
  });

  registry.register({
    name: 'stdev-price',
    defaultWindow: windowOf('stdev-price'),
    requiredBars: (w) => w,
    compute: computeStdevPrice,
  });

  registry.register({
    name: 'max-drawdown',
    defaultWindow: windowOf('max-drawdown'),
    requiredBars: (w) => w,
    compute: computeMaxDrawdown,
  });

  return registry;
}
