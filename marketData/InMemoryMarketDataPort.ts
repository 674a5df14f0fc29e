/**
 * In-memory market data snapshot
 * Serves bars from a fixed snapshot, never looking past the as-of time
 */
import * as fs from 'fs';
import { Bar, MarketDataPort } from '../spec/types';
import { MarketSnapshot, formatIssues, MarketSnapshotSchema } from '../spec/schema';
import { Decimal, toDecimal } from '../lib/decimal';

export class InMemoryMarketDataPort implements MarketDataPort {
  private bars: Map<string, Bar[]> = new Map();

  constructor(barsBySymbol: Record<string, readonly Bar[]> = {}) {
    for (const [symbol, bars] of Object.entries(barsBySymbol)) {
      this.setBars(symbol, bars);
    }
  }

  static fromSnapshot(snapshot: MarketSnapshot): InMemoryMarketDataPort {
    return new InMemoryMarketDataPort(snapshot.bars);
  }

  /**
   * Load a JSON snapshot: { "asOf"?: ISO, "bars": { "SPY": [Bar, ...] } }
   */
  static loadSnapshot(filePath: string): MarketSnapshot {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    const result = MarketSnapshotSchema.safeParse(raw);
    if (!result.success) {
      throw new Error(`Invalid market snapshot ${filePath}: ${formatIssues(result.error)}`);
    }
    return result.data;
  }

  setBars(symbol: string, bars: readonly Bar[]): void {
    this.bars.set(symbol, [...bars].sort((a, b) => a.timestamp - b.timestamp));
  }

  symbols(): string[] {
    return Array.from(this.bars.keys()).sort();
  }

  getBars(symbol: string, asOf: Date): readonly Bar[] {
    const cutoff = asOf.getTime();
    return (this.bars.get(symbol) ?? []).filter((bar) => bar.timestamp <= cutoff);
  }

  getLatestPrice(symbol: string, asOf: Date): Decimal | null {
    const bars = this.getBars(symbol, asOf);
    const last = bars[bars.length - 1];
    return last ? toDecimal(last.close) : null;
  }

  /**
   * Timestamp of the most recent bar across all symbols
   */
  latestTimestamp(): Date | null {
    let latest: number | null = null;
    for (const bars of this.bars.values()) {
      const last = bars[bars.length - 1];
      if (last && (latest === null || last.timestamp > latest)) {
        latest = last.timestamp;
      }
    }
    return latest === null ? null : new Date(latest);
  }
}
