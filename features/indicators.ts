/**
 * Technical indicator implementations over close-price series
 *
 * Uses the technicalindicators library for RSI, SMA, EMA and standard
 * deviation; return and drawdown measures are computed directly.
 * Every function takes closes oldest first and returns the value at the
 * most recent close. Returns and drawdowns are percentages.
 *
 * @see https://github.com/anandanand84/technicalindicators
 */
import { Bar } from '../spec/types';
import { EMA as EMALib, SMA as SMALib, RSI as RSILib, SD as SDLib } from 'technicalindicators';

export class InsufficientDataError extends Error {
  constructor(
    readonly required: number,
    readonly available: number
  ) {
    super(`Insufficient data: need ${required} values, have ${available}`);
    this.name = 'InsufficientDataError';
  }
}

// ============================================================================
// Helper Functions for Data Extraction
// ============================================================================

/**
 * Extract values from bars array for a specific field
 * Validates each value so NaN/Infinity never reach an indicator
 */
export function extractField(
  bars: readonly Bar[],
  field: 'open' | 'high' | 'low' | 'close' | 'volume'
): number[] {
  return bars.map((b, index) => {
    const value = b[field];
    if (!Number.isFinite(value)) {
      throw new Error(
        `Invalid ${field} value at bar index ${index}: ${value} ` +
        `(timestamp: ${b.timestamp})`
      );
    }
    return value;
  });
}

function requireValues(values: number[], required: number): void {
  if (values.length < required) {
    throw new InsufficientDataError(required, values.length);
  }
}

function lastOf(result: number[], label: string): number {
  const value = result[result.length - 1];
  if (value === undefined || !Number.isFinite(value)) {
    throw new Error(`${label} produced no value`);
  }
  return value;
}

/**
 * Period-over-period percentage returns; one shorter than the input
 */
export function percentReturns(values: number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < values.length; i++) {
    if (values[i - 1] === 0) {
      throw new Error(`Cannot compute return from a zero price at index ${i - 1}`);
    }
    returns.push((values[i] / values[i - 1] - 1) * 100);
  }
  return returns;
}

// ============================================================================
// Library-backed indicators
// ============================================================================

// RSI with Wilder smoothing
export function computeRSI(values: number[], period: number = 14): number {
  requireValues(values, period + 1);
  return lastOf(RSILib.calculate({ period, values }), 'RSI');
}

export function computeSMA(values: number[], period: number): number {
  requireValues(values, period);
  return lastOf(SMALib.calculate({ period, values }), 'SMA');
}

export function computeEMA(values: number[], period: number): number {
  requireValues(values, period);
  return lastOf(EMALib.calculate({ period, values }), 'EMA');
}

/**
 * Population standard deviation of the last `period` closes
 */
/**
 * Sample standard deviation (n - 1 denominator) of the last `period` values.
 * The library computes the population figure, rescaled here.
 */
function sampleStdev(values: number[], period: number): number {
  if (period < 2) {
    throw new Error(`Sample standard deviation needs a period of at least 2, got ${period}`);
  }
  const population = lastOf(SDLib.calculate({ period, values }), 'SD');
  return population * Math.sqrt(period / (period - 1));
}

export function computeStdevPrice(values: number[], period: number): number {
  requireValues(values, period);
  return sampleStdev(values, period);
}

export function computeStdevReturn(values: number[], period: number): number {
  requireValues(values, period + 1);
  return sampleStdev(percentReturns(values), period);
}

// ============================================================================
// Return & drawdown measures
// ============================================================================

export function computeMovingAverageReturn(values: number[], period: number): number {
  requireValues(values, period + 1);
  const recent = percentReturns(values.slice(-(period + 1)));
  return recent.reduce((a, b) => a + b, 0) / recent.length;
}

/**
 * Return over the last `period` closes: (now / then - 1) * 100
 */
export function computeCumulativeReturn(values: number[], period: number): number {
  requireValues(values, period + 1);
  const past = values[values.length - 1 - period];
  if (past === 0) {
    throw new Error('Cannot compute cumulative return from a zero price');
  }
  return (values[values.length - 1] / past - 1) * 100;
}

/**
 * Largest peak-to-trough decline within the last `period` closes, as a
 * positive percentage
 */
export function computeMaxDrawdown(values: number[], period: number): number {
  requireValues(values, period);
  let peak = -Infinity;
  let worst = 0;
  for (const value of values.slice(-period)) {
    peak = Math.max(peak, value);
    if (peak > 0) {
      worst = Math.max(worst, (peak - value) / peak);
    }
  }
  return worst * 100;
}
