/**
 * Evaluation trace
 *
 * Append-only audit log. Entries are appended when a step completes, so a
 * parent's entry follows those of its children (post-order).
 */
import { TraceEntry, TraceError } from '../spec/types';

export type TraceEntryInput = Omit<TraceEntry, 'step' | 'timestamp'>;

export class TraceBuilder {
  private entries: TraceEntry[] = [];

  constructor(private readonly clock: () => Date = () => new Date()) {}

  record(input: TraceEntryInput): TraceEntry {
    const entry: TraceEntry = {
      ...input,
      step: this.entries.length,
      timestamp: this.clock().toISOString(),
    };
    this.entries.push(entry);
    return entry;
  }

  get length(): number {
    return this.entries.length;
  }

  /**
   * Entries recorded from index `from` onwards
   */
  since(from: number): readonly TraceEntry[] {
    return this.entries.slice(from);
  }

  toArray(): TraceEntry[] {
    return this.entries.map((entry) => ({ ...entry }));
  }
}

/**
 * Copy of `entries` with a final engine-level failure entry
 */
export function withFailureEntry(
  entries: readonly TraceEntry[],
  error: TraceError,
  timestamp: Date,
  node: string = 'strategy'
): TraceEntry[] {
  return [
    ...entries,
    {
      step: entries.length,
      depth: 0,
      nodeKind: 'engine',
      node,
      position: error.position,
      inputs: [],
      status: 'error',
      error,
      timestamp: timestamp.toISOString(),
    },
  ];
}
