import type { LogSink } from "./log-buffer";

export type StreamState = "closed" | "connecting" | "open" | "errored";

export type StreamEvent = "activate" | "opened" | "failed" | "retry" | "deactivate";

export type StreamSnapshot = {
  state: StreamState;
  error: string | null;
  reconnectAttempts: number;
  lastMessageAt: number | null;
};

export type StreamListener = (snapshot: StreamSnapshot) => void;

export interface StreamHandlers {
  onOpen(): void;
  onMessage(data: string): void;
  onError(reason?: string): void;
}

export interface StreamSubscription {
  close(): void;
}

/**
 * Opens one server-push subscription. The returned handle must stop all
 * handler callbacks once closed.
 */
export type StreamConnector = (url: string, handlers: StreamHandlers) => StreamSubscription;

export interface ReconnectingEventStreamOptions {
  url: string;
  sink: LogSink;
  connector?: StreamConnector;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Treat the stream as dropped after this long without a message. 0 disables the check. */
  idleTimeoutMs?: number;
  now?: () => number;
}

export const LOG_STREAM_PATH = "/api/logs";

const RETRY_BASE_MS = 1000;
const RETRY_MAX_MS = 30000;

export const INITIAL_STREAM_SNAPSHOT: StreamSnapshot = {
  state: "closed",
  error: null,
  reconnectAttempts: 0,
  lastMessageAt: null,
};

export function transitionStream(state: StreamState, event: StreamEvent): StreamState {
  switch (event) {
    case "deactivate":
      return "closed";
    case "activate":
      return state === "closed" ? "connecting" : state;
    case "opened":
      return state === "connecting" ? "open" : state;
    case "failed":
      return state === "connecting" || state === "open" ? "errored" : state;
    case "retry":
      return state === "errored" ? "connecting" : state;
  }
}

export function retryDelay(attempt: number, baseMs = RETRY_BASE_MS, maxMs = RETRY_MAX_MS): number {
  return Math.min(baseMs * 2 ** Math.max(0, attempt - 1), maxMs);
}

export class ReconnectingEventStream {
  private readonly url: string;
  private readonly sink: LogSink;
  private readonly connector: StreamConnector;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly idleTimeoutMs: number;
  private readonly now: () => number;

  private state: StreamState = "closed";
  private subscription: StreamSubscription | null = null;
  private generation = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private idleTimer: ReturnType<typeof setTimeout> | null = null;
  private reconnectAttempts = 0;
  private lastError: string | null = null;
  private lastMessageAt: number | null = null;
  private listeners = new Set<StreamListener>();

  constructor(options: ReconnectingEventStreamOptions) {
    if (!options.url) {
      throw new Error("url is required for ReconnectingEventStream");
    }
    this.url = options.url;
    this.sink = options.sink;
    this.connector = options.connector ?? eventSourceConnector();
    this.baseDelayMs = options.baseDelayMs ?? RETRY_BASE_MS;
    this.maxDelayMs = options.maxDelayMs ?? RETRY_MAX_MS;
    this.idleTimeoutMs = Math.max(0, options.idleTimeoutMs ?? 0);
    this.now = options.now ?? Date.now;
  }

  activate(): void {
    if (this.state !== "closed") {
      return;
    }
    this.dispatch("activate");
    this.open();
  }

  deactivate(): void {
    this.clearReconnectTimer();
    this.clearIdleTimer();
    this.release();
    this.reconnectAttempts = 0;
    this.lastError = null;
    if (this.state !== "closed") {
      this.dispatch("deactivate");
    }
  }

  getState(): StreamState {
    return this.state;
  }

  getSnapshot(): StreamSnapshot {
    return {
      state: this.state,
      error: this.lastError,
      reconnectAttempts: this.reconnectAttempts,
      lastMessageAt: this.lastMessageAt,
    };
  }

  onState(listener: StreamListener): () => void {
    this.listeners.add(listener);
    listener(this.getSnapshot());
    return () => {
      this.listeners.delete(listener);
    };
  }

  private open(): void {
    const generation = ++this.generation;
    const handlers: StreamHandlers = {
      onOpen: () => {
        if (generation !== this.generation) {
          return;
        }
        this.reconnectAttempts = 0;
        this.lastError = null;
        this.dispatch("opened");
        this.armIdleTimer();
      },
      onMessage: (data) => {
        if (generation !== this.generation) {
          return;
        }
        this.lastMessageAt = this.now();
        this.armIdleTimer();
        this.sink.append(data);
        this.emit();
      },
      onError: (reason) => {
        if (generation !== this.generation) {
          return;
        }
        this.fail(reason ?? "Log stream error");
      },
    };

    let subscription: StreamSubscription;
    try {
      subscription = this.connector(this.url, handlers);
    } catch (err) {
      if (generation === this.generation) {
        this.fail(err instanceof Error ? err.message : "Failed to open log stream");
      }
      return;
    }

    if (generation !== this.generation) {
      // Failed or deactivated while the connector was still running.
      subscription.close();
      return;
    }
    this.subscription = subscription;
  }

  private fail(reason: string): void {
    this.clearIdleTimer();
    this.release();
    this.lastError = reason;
    this.reconnectAttempts += 1;
    console.warn("Log stream disconnected", reason);
    this.dispatch("failed");
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer || this.state !== "errored") {
      return;
    }
    const delay = retryDelay(this.reconnectAttempts, this.baseDelayMs, this.maxDelayMs);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.state !== "errored") {
        return;
      }
      this.dispatch("retry");
      this.open();
    }, delay);
  }

  private release(): void {
    this.generation += 1;
    const subscription = this.subscription;
    this.subscription = null;
    if (subscription) {
      subscription.close();
    }
  }

  private armIdleTimer(): void {
    this.clearIdleTimer();
    if (this.idleTimeoutMs <= 0) {
      return;
    }
    const generation = this.generation;
    this.idleTimer = setTimeout(() => {
      this.idleTimer = null;
      if (generation !== this.generation) {
        return;
      }
      this.fail(`No log data for ${this.idleTimeoutMs} ms`);
    }, this.idleTimeoutMs);
  }

  private clearIdleTimer(): void {
    if (!this.idleTimer) {
      return;
    }
    clearTimeout(this.idleTimer);
    this.idleTimer = null;
  }

  private clearReconnectTimer(): void {
    if (!this.reconnectTimer) {
      return;
    }
    clearTimeout(this.reconnectTimer);
    this.reconnectTimer = null;
  }

  private dispatch(event: StreamEvent): void {
    this.state = transitionStream(this.state, event);
    this.emit();
  }

  private emit(): void {
    const snapshot = this.getSnapshot();
    this.listeners.forEach((listener) => {
      try {
        listener(snapshot);
      } catch (err) {
        console.error("Log stream state listener failed", err);
      }
    });
  }
}

export function eventSourceConnector(options: { withCredentials?: boolean } = {}): StreamConnector {
  return (url, handlers) => {
    if (typeof EventSource === "undefined") {
      throw new Error("EventSource is not available in the current environment");
    }
    const source = new EventSource(url, { withCredentials: options.withCredentials ?? false });

    const handleOpen = () => handlers.onOpen();
    const handleMessage = (event: MessageEvent) => {
      handlers.onMessage(typeof event.data === "string" ? event.data : String(event.data));
    };
    const handleError = () => {
      handlers.onError(source.readyState === EventSource.CLOSED ? "Log stream closed" : "Log stream error");
    };

    source.addEventListener("open", handleOpen);
    source.addEventListener("message", handleMessage);
    source.addEventListener("error", handleError);

    return {
      close() {
        source.removeEventListener("open", handleOpen);
        source.removeEventListener("message", handleMessage);
        source.removeEventListener("error", handleError);
        source.close();
      },
    };
  };
}
