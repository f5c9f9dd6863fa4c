export const DEFAULT_LOG_CAPACITY = 100;

export type LogListener = (lines: readonly string[]) => void;

export interface LogSink {
  append(line: string): void;
}

/**
 * Fixed-capacity, insertion-ordered list of log lines. Once full, each append
 * evicts the oldest line.
 */
export class BoundedLogBuffer implements LogSink {
  readonly capacity: number;
  private lines: readonly string[] = Object.freeze([]);
  private listeners = new Set<LogListener>();

  constructor(capacity: number = DEFAULT_LOG_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Log capacity must be a positive integer (got ${capacity})`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.lines.length;
  }

  append(line: string): void {
    const next = [...this.lines, line];
    if (next.length > this.capacity) {
      next.splice(0, next.length - this.capacity);
    }
    this.lines = Object.freeze(next);
    const snapshot = this.lines;
    this.listeners.forEach((listener) => {
      try {
        listener(snapshot);
      } catch (err) {
        console.error("Log buffer listener failed", err);
      }
    });
  }

  snapshot(): readonly string[] {
    return this.lines;
  }

  onChange(listener: LogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
