/**
 * Multi-strategy consolidation tests
 */
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { StrategyEngine } from '../runtime/engine';
import { InMemoryEventPublisher } from '../runtime/events';
import { MultiStrategyEvaluator, MultiStrategyResult, normalizeManifestWeights } from '../runtime/multiStrategy';
import { serializeAllocation } from '../runtime/allocation';
import { parseStrategyManifest } from '../config/manifest';
import { FakeIndicatorService, FakeMarketData, fixedClock, memoryLogger } from './helpers/fakes';

const FILES: Record<string, string> = {
  'balanced.clj': '(defsymphony "Balanced" {} (weight-equal "SPY" "TLT"))',
  'spy-only.clj': '(defsymphony "SPY Only" {} (asset "SPY"))',
  'broken.clj': '(defsymphony "Broken" {} (bogus-op "SPY"))',
};

describe('MultiStrategyEvaluator', () => {
  let dir: string;
  let publisher: InMemoryEventPublisher;
  let evaluator: MultiStrategyEvaluator;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'manifest-'));
    for (const [file, source] of Object.entries(FILES)) {
      fs.writeFileSync(path.join(dir, file), source);
    }
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    publisher = new InMemoryEventPublisher();
    const engine = new StrategyEngine({
      indicators: new FakeIndicatorService(),
      marketData: new FakeMarketData(),
      publisher,
      clock: fixedClock,
      logger: memoryLogger('engine').logger,
    });
    evaluator = new MultiStrategyEvaluator(engine, memoryLogger('multi-strategy').logger);
  });

  function manifest(yaml: string) {
    return parseStrategyManifest(yaml, dir);
  }

  function weightsOf(result: MultiStrategyResult): Record<string, string> {
    if (result.status === 'duplicate') throw new Error('unexpected duplicate');
    return serializeAllocation(result.allocation).weights;
  }

  test('scales each allocation by its manifest weight', () => {
    const result = evaluator.evaluate(
      manifest(`
strategies:
  - file: balanced.clj
    weight: 3
  - file: spy-only.clj
    weight: 1
`),
      { correlationId: 'corr-1' }
    );

    expect(result.status).toBe('evaluated');
    expect(weightsOf(result)).toEqual({ SPY: '0.625', TLT: '0.375' });
    expect(publisher.events.map((event) => event.eventType)).toEqual([
      'StrategyEvaluated',
      'StrategyEvaluated',
      'PortfolioAllocationProduced',
    ]);
    expect(publisher.ofType('StrategyEvaluated').map((event) => event.strategy)).toEqual(['Balanced', 'SPY Only']);
  });

  test('skips failing strategies and renormalizes the rest', () => {
    const result = evaluator.evaluate(
      manifest(`
strategies:
  - file: balanced.clj
  - file: broken.clj
  - file: missing.clj
    name: ghost
`),
      { correlationId: 'corr-2' }
    );

    if (result.status !== 'evaluated') throw new Error(`unexpected status ${result.status}`);
    expect(weightsOf(result)).toEqual({ SPY: '0.5', TLT: '0.5' });
    expect(result.strategies.map((outcome) => [outcome.strategy, outcome.ok, outcome.error?.type])).toEqual([
      ['Balanced', true, undefined],
      ['Broken', false, 'UnknownOperatorError'],
      ['ghost', false, 'StrategySourceError'],
    ]);
    expect(publisher.ofType('StrategyEvaluated').map((event) => event.success)).toEqual([true, false, false]);
  });

  test('falls back when every strategy fails', () => {
    const result = evaluator.evaluate(manifest('strategies:\n  - file: broken.clj\n'), {
      correlationId: 'corr-3',
    });

    expect(result.status).toBe('fallback');
    expect(weightsOf(result)).toEqual({ CASH: '1' });
    expect(publisher.ofType('PortfolioAllocationProduced')[0].allocation.isFallback).toBe(true);
  });

  test('ignores a repeated request id', () => {
    const plan = manifest('strategies:\n  - file: spy-only.clj\n');
    evaluator.evaluate(plan, { correlationId: 'corr-4', requestId: 'evt-4' });
    const repeat = evaluator.evaluate(plan, { correlationId: 'corr-4', requestId: 'evt-4' });

    expect(repeat).toEqual({ status: 'duplicate', correlationId: 'corr-4', requestId: 'evt-4' });
    expect(publisher.ofType('PortfolioAllocationProduced')).toHaveLength(1);
  });
});

describe('normalizeManifestWeights', () => {
  test('scales weights to sum to one', () => {
    expect(normalizeManifestWeights([1, 3]).map((w) => w.toString())).toEqual(['0.25', '0.75']);
  });

  test('treats all-zero weights as equal', () => {
    expect(normalizeManifestWeights([0, 0]).map((w) => w.toString())).toEqual(['0.5', '0.5']);
  });
});
