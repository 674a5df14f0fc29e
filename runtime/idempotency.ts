/**
 * Processed-request tracking
 *
 * Bounded set of request ids with a time-to-live. Oldest ids are evicted
 * once capacity is reached. Check-and-mark runs to completion on the event
 * loop, so no two callers can both see an id as new.
 */

export const DEFAULT_IDEMPOTENCY_CAPACITY = 10_000;
export const DEFAULT_IDEMPOTENCY_TTL_MS = 24 * 60 * 60 * 1000;

export interface ProcessedRequestCacheOptions {
  capacity?: number;
  ttlMs?: number;
  clock?: () => Date;
}

export class ProcessedRequestCache {
  private seen: Map<string, number> = new Map(); // requestId -> expiresAt (ms)
  private readonly capacity: number;
  private readonly ttlMs: number;
  private readonly clock: () => Date;

  constructor(options: ProcessedRequestCacheOptions = {}) {
    this.capacity = Math.max(1, options.capacity ?? DEFAULT_IDEMPOTENCY_CAPACITY);
    this.ttlMs = Math.max(0, options.ttlMs ?? DEFAULT_IDEMPOTENCY_TTL_MS);
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Record the id. Returns false when it was already recorded and has not
   * expired.
   */
  checkAndMark(requestId: string): boolean {
    const now = this.clock().getTime();
    this.evictExpired(now);

    if (this.seen.has(requestId)) {
      return false;
    }

    while (this.seen.size >= this.capacity) {
      const oldest = this.seen.keys().next();
      if (oldest.done) break;
      this.seen.delete(oldest.value);
    }

    this.seen.set(requestId, now + this.ttlMs);
    return true;
  }

  has(requestId: string): boolean {
    const expiresAt = this.seen.get(requestId);
    return expiresAt !== undefined && expiresAt > this.clock().getTime();
  }

  /**
   * Forget an id, e.g. when the work it guarded could not be started
   */
  release(requestId: string): void {
    this.seen.delete(requestId);
  }

  get size(): number {
    return this.seen.size;
  }

  clear(): void {
    this.seen.clear();
  }

  // Insertion order equals expiry order because the TTL is fixed
  private evictExpired(now: number): void {
    for (const [id, expiresAt] of this.seen) {
      if (expiresAt > now) break;
      this.seen.delete(id);
    }
  }
}
