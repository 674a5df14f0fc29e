import { ProcessedRequestCache } from '../runtime/idempotency';

describe('ProcessedRequestCache', () => {
  let now: number;
  const clock = () => new Date(now);

  beforeEach(() => {
    now = Date.UTC(2024, 2, 1);
  });

  test('marks an id once', () => {
    const cache = new ProcessedRequestCache({ clock });

    expect(cache.checkAndMark('req-1')).toBe(true);
    expect(cache.checkAndMark('req-1')).toBe(false);
    expect(cache.has('req-1')).toBe(true);
    expect(cache.size).toBe(1);
  });

  test('forgets ids after the time-to-live', () => {
    const cache = new ProcessedRequestCache({ ttlMs: 1000, clock });
    cache.checkAndMark('req-1');

    now += 999;
    expect(cache.checkAndMark('req-1')).toBe(false);

    now += 1;
    expect(cache.has('req-1')).toBe(false);
    expect(cache.checkAndMark('req-1')).toBe(true);
  });

  test('evicts the oldest id beyond capacity', () => {
    const cache = new ProcessedRequestCache({ capacity: 2, clock });
    cache.checkAndMark('a');
    cache.checkAndMark('b');
    cache.checkAndMark('c');

    expect(cache.size).toBe(2);
    expect(cache.has('a')).toBe(false);
    expect(cache.has('b')).toBe(true);
    expect(cache.has('c')).toBe(true);
  });

  test('release allows an id to be processed again', () => {
    const cache = new ProcessedRequestCache({ clock });
    cache.checkAndMark('req-1');
    cache.release('req-1');

    expect(cache.checkAndMark('req-1')).toBe(true);
  });
});
