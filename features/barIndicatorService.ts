/**
 * Reference IndicatorService computed from market-data bars
 */
import { IndicatorParams, IndicatorService, MarketDataPort } from '../spec/types';
import { Decimal, toDecimal } from '../lib/decimal';
import { extractField } from './indicators';
import { IndicatorRegistry, createStandardIndicatorRegistry } from './registry';

export class BarIndicatorService implements IndicatorService {
  constructor(
    private marketData: MarketDataPort,
    private registry: IndicatorRegistry = createStandardIndicatorRegistry()
  ) {}

  get(symbol: string, indicator: string, params: IndicatorParams, asOf: Date): Decimal {
    const definition = this.registry.get(indicator);
    if (!definition) {
      throw new Error(`Unsupported indicator: ${indicator}`);
    }

    const window = params.window ?? definition.defaultWindow;
    if (typeof window !== 'number' || !Number.isInteger(window) || window < 1) {
      throw new Error(`Invalid window for ${indicator}: ${String(window)}`);
    }

    const bars = this.marketData.getBars(symbol, asOf);
    const required = definition.requiredBars(window);
    if (bars.length < required) {
      throw new Error(
        `Insufficient data for ${indicator}(${symbol}, window ${window}): ` +
        `need ${required} bars, have ${bars.length}`
      );
    }

    const closes = extractField(bars, 'close');
    return toDecimal(definition.compute(closes, window));
  }
}
