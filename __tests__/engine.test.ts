/**
 * Strategy engine tests: publishing, idempotency, fallback, request handling
 */
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { EngineResult, StrategyEngine, StrategyEngineOptions } from '../runtime/engine';
import { InMemoryEventPublisher } from '../runtime/events';
import { serializeAllocation } from '../runtime/allocation';
import { EngineEvent, EventPublisher } from '../spec/types';
import { FIXED_NOW, FakeIndicatorService, FakeMarketData, fixedClock, memoryLogger } from './helpers/fakes';

const SIMPLE = '(defsymphony "Balanced" {:rebalance-frequency :daily} (weight-equal "SPY" "TLT"))';
const NEEDS_RSI = `(defsymphony "Rsi Switch" {}
  (if (> (rsi "SPY" {:window 10}) 70) [(asset "BIL")] [(asset "SPY")]))`;

function createEngine(overrides: Partial<StrategyEngineOptions> = {}): {
  engine: StrategyEngine;
  publisher: InMemoryEventPublisher;
  indicators: FakeIndicatorService;
} {
  const publisher = new InMemoryEventPublisher();
  const indicators = new FakeIndicatorService({ 'SPY:rsi:10': 55 });
  const engine = new StrategyEngine({
    indicators,
    marketData: new FakeMarketData(),
    publisher,
    clock: fixedClock,
    logger: memoryLogger('engine').logger,
    ...overrides,
  });
  return { engine, publisher, indicators };
}

function weightsOf(result: EngineResult): Record<string, string> {
  if (result.status !== 'evaluated' && result.status !== 'fallback') {
    throw new Error(`no allocation for status ${result.status}`);
  }
  return serializeAllocation(result.allocation).weights;
}

describe('StrategyEngine.evaluate', () => {
  test('publishes StrategyEvaluated then PortfolioAllocationProduced', () => {
    const { engine, publisher } = createEngine();
    const result = engine.evaluate(SIMPLE, { correlationId: 'corr-1' });

    expect(result.status).toBe('evaluated');
    expect(weightsOf(result)).toEqual({ SPY: '0.5', TLT: '0.5' });
    expect(publisher.events.map((event) => event.eventType)).toEqual([
      'StrategyEvaluated',
      'PortfolioAllocationProduced',
    ]);
    expect(publisher.ofType('StrategyEvaluated')[0]).toMatchObject({
      correlationId: 'corr-1',
      causationId: 'corr-1',
      strategy: 'Balanced',
      success: true,
      timestamp: '2024-03-01T21:00:00.000Z',
    });
    expect(publisher.ofType('PortfolioAllocationProduced')[0].allocation).toEqual({
      weights: { SPY: '0.5', TLT: '0.5' },
      asOf: '2024-03-01T21:00:00.000Z',
      isFallback: false,
    });
  });

  test('publishes the decision of every if it evaluates', () => {
    const { engine, publisher } = createEngine();
    engine.evaluate(NEEDS_RSI, { correlationId: 'corr-1', requestId: 'evt-9' });

    expect(publisher.events.map((event) => event.eventType)).toEqual([
      'DecisionEvaluated',
      'StrategyEvaluated',
      'PortfolioAllocationProduced',
    ]);
    expect(publisher.ofType('DecisionEvaluated')[0]).toMatchObject({
      causationId: 'evt-9',
      conditionResult: false,
      branch: 'else',
    });
  });

  test('processes a request id only once', () => {
    const { engine, publisher } = createEngine();
    const first = engine.evaluate(SIMPLE, { correlationId: 'corr-1', requestId: 'evt-1' });
    const second = engine.evaluate(SIMPLE, { correlationId: 'corr-1', requestId: 'evt-1' });

    expect(first.status).toBe('evaluated');
    expect(second).toEqual({ status: 'duplicate', correlationId: 'corr-1', requestId: 'evt-1' });
    expect(publisher.ofType('PortfolioAllocationProduced')).toHaveLength(1);
  });

  test('falls back to CASH when evaluation fails', () => {
    const { engine, publisher } = createEngine({ indicators: new FakeIndicatorService() });
    const result = engine.evaluate(NEEDS_RSI, { correlationId: 'corr-2' });

    if (result.status !== 'fallback') throw new Error(`unexpected status ${result.status}`);
    expect(weightsOf(result)).toEqual({ CASH: '1' });
    expect(result.allocation.isFallback).toBe(true);
    expect(result.strategy).toBe('Rsi Switch');
    expect(result.error).toEqual({
      type: 'EvaluationError',
      message: 'Missing indicator data for rsi(SPY): no rsi for SPY',
      position: { line: 2, column: 10, offset: 38 },
    });

    const last = result.trace[result.trace.length - 1];
    expect(last).toMatchObject({ nodeKind: 'engine', node: 'strategy', status: 'error', step: result.trace.length - 1 });

    const [evaluated, produced] = publisher.events;
    expect(evaluated).toMatchObject({ eventType: 'StrategyEvaluated', success: false });
    expect(produced).toMatchObject({
      eventType: 'PortfolioAllocationProduced',
      allocation: { weights: { CASH: '1' }, isFallback: true },
    });
  });

  test('uses the configured fallback symbol', () => {
    const { engine } = createEngine({ config: { fallbackSymbol: 'BIL' } });

    expect(weightsOf(engine.evaluate('(weight-equal', { correlationId: 'corr-3' }))).toEqual({ BIL: '1' });
  });

  test('reports parse errors with their position', () => {
    const { engine } = createEngine();
    const result = engine.evaluate('(weight-equal "SPY"]', { correlationId: 'corr-4' });

    if (result.status !== 'fallback') throw new Error(`unexpected status ${result.status}`);
    expect(result.error.type).toBe('ParseError');
    expect(result.error.position).toEqual({ line: 1, column: 20, offset: 19 });
    expect(result.trace).toHaveLength(1);
  });

  test('falls back when the result is not an allocation', () => {
    const { engine } = createEngine();
    const result = engine.evaluate('(> 2 1)', { correlationId: 'corr-5' });

    if (result.status !== 'fallback') throw new Error(`unexpected status ${result.status}`);
    expect(result.error).toEqual({ type: 'InvalidAllocation', message: 'Cannot convert a bool into an allocation' });
  });

  test('enforces the configured node budget', () => {
    const { engine } = createEngine({ config: { maxNodeVisits: 2 } });
    const result = engine.evaluate('(weight-equal "A" "B" "C")', { correlationId: 'corr-6' });

    if (result.status !== 'fallback') throw new Error(`unexpected status ${result.status}`);
    expect(result.error.type).toBe('BudgetExceededError');
  });

  test('keeps going when the publisher throws', () => {
    const failing: EventPublisher = {
      publish(event: EngineEvent): void {
        throw new Error(`broker down for ${event.eventType}`);
      },
    };
    const { engine } = createEngine({ publisher: failing });

    expect(engine.evaluate(SIMPLE, { correlationId: 'corr-7' }).status).toBe('evaluated');
  });

  test('is deterministic for identical inputs', () => {
    const first = createEngine().engine.evaluate(NEEDS_RSI, { correlationId: 'corr-8' });
    const second = createEngine().engine.evaluate(NEEDS_RSI, { correlationId: 'corr-8' });

    expect(second).toEqual(first);
  });
});

describe('StrategyEngine.compute', () => {
  test('returns value, trace and stats without publishing', () => {
    const { engine, publisher } = createEngine();
    const result = engine.compute(NEEDS_RSI, { correlationId: 'corr-1', asOf: FIXED_NOW });

    if (!result.ok) throw result.error;
    expect(serializeAllocation(result.allocation).weights).toEqual({ SPY: '1' });
    expect(result.stats).toEqual({ indicatorRequests: 1, indicatorComputations: 1, priceRequests: 0, priceLookups: 0 });
    expect(publisher.events).toHaveLength(0);
  });

  test('does not claim the request id', () => {
    const { engine } = createEngine();
    engine.compute(SIMPLE, { correlationId: 'corr-1' });

    expect(engine.evaluate(SIMPLE, { correlationId: 'corr-1' }).status).toBe('evaluated');
  });
});

describe('StrategyEngine.handleRequest', () => {
  let strategiesDir: string;

  beforeAll(() => {
    strategiesDir = fs.mkdtempSync(path.join(os.tmpdir(), 'strategies-'));
    fs.writeFileSync(path.join(strategiesDir, 'balanced.clj'), SIMPLE);
  });

  afterAll(() => {
    fs.rmSync(strategiesDir, { recursive: true, force: true });
  });

  test('evaluates inline source and uses event_id for idempotency and causation', () => {
    const { engine, publisher } = createEngine();
    const request = {
      correlation_id: 'corr-1',
      event_id: 'evt-1',
      strategy_source_or_path: SIMPLE,
      as_of: '2024-02-01T00:00:00Z',
    };

    const result = engine.handleRequest(request);
    expect(result.status).toBe('evaluated');
    expect(engine.handleRequest(request).status).toBe('duplicate');
    expect(publisher.ofType('PortfolioAllocationProduced')).toEqual([
      expect.objectContaining({
        causationId: 'evt-1',
        allocation: { weights: { SPY: '0.5', TLT: '0.5' }, asOf: '2024-02-01T00:00:00.000Z', isFallback: false },
      }),
    ]);
  });

  test('loads strategy files from the strategies directory', () => {
    const { engine } = createEngine({ config: { strategiesDir } });
    const result = engine.handleRequest({ correlation_id: 'corr-2', strategy_source_or_path: 'balanced.clj' });

    expect(weightsOf(result)).toEqual({ SPY: '0.5', TLT: '0.5' });
  });

  test('falls back when the file is missing or outside the directory', () => {
    const { engine } = createEngine({ config: { strategiesDir } });
    const missing = engine.handleRequest({ correlation_id: 'corr-3', strategy_source_or_path: 'missing.clj' });
    const escaping = engine.handleRequest({ correlation_id: 'corr-4', strategy_source_or_path: '../secret.clj' });

    if (missing.status !== 'fallback' || escaping.status !== 'fallback') {
      throw new Error('expected fallbacks');
    }
    expect(missing.error).toEqual({ type: 'StrategySourceError', message: 'Cannot read strategy file: missing.clj' });
    expect(escaping.error.message).toBe('Strategy path escapes the strategies directory: ../secret.clj');
  });

  test('rejects malformed requests without publishing', () => {
    const { engine, publisher } = createEngine();
    const result = engine.handleRequest({ strategy_source_or_path: SIMPLE });

    expect(result).toEqual({ status: 'rejected', reason: 'correlation_id: Required' });
    expect(publisher.events).toHaveLength(0);
  });
});
