/**
 * In-memory Winston transport
 * Keeps the most recent log records in a bounded buffer (tests, diagnostics)
 */

import Transport from 'winston-transport';

const RESERVED_KEYS = new Set(['level', 'message', 'component', 'timestamp']);

export interface MemoryLogRecord {
  level: string;
  message: string;
  component?: string;
  meta: Record<string, unknown>;
}

export interface MemoryTransportOptions extends Transport.TransportStreamOptions {
  /** Oldest records are dropped beyond this size */
  capacity?: number;
}

export class MemoryTransport extends Transport {
  private records: MemoryLogRecord[] = [];
  private capacity: number;

  constructor(opts: MemoryTransportOptions = {}) {
    super(opts);
    this.capacity = opts.capacity ?? 1000;
  }

  log(info: Record<string, unknown>, callback: () => void): void {
    setImmediate(() => {
      this.emit('logged', info);
    });

    const { level, message, component } = info;
    // String keys only: winston keeps its own state under symbol keys
    const meta: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(info)) {
      if (!RESERVED_KEYS.has(key)) {
        meta[key] = value;
      }
    }

    this.records.push({
      level: String(level),
      message: typeof message === 'string' ? message : String(message),
      component: typeof component === 'string' ? component : undefined,
      meta,
    });
    if (this.records.length > this.capacity) {
      this.records.splice(0, this.records.length - this.capacity);
    }

    callback();
  }

  getRecords(level?: string): MemoryLogRecord[] {
    return level ? this.records.filter((r) => r.level === level) : [...this.records];
  }

  clear(): void {
    this.records = [];
  }
}
