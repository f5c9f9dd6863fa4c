import type { ControlTransport } from "./rest";
import { TimeoutError } from "./rest";
import type { DashboardStore } from "./store";

export type ActionOutcome = "committed" | "rolled-back" | "superseded";

export interface OptimisticActionControllerOptions {
  /** Rejects the confirming request after this long. 0 disables the timeout. */
  timeoutMs?: number;
}

type InFlight = {
  token: number;
  abort: AbortController;
};

const DEFAULT_TIMEOUT_MS = 10000;

/**
 * Writes a control's new value to the store immediately, then confirms it
 * with the backend. Only the latest submission per control may commit or roll
 * back; results of earlier ones are dropped without aborting their requests.
 */
export class OptimisticActionController {
  private readonly timeoutMs: number;
  private sequence = 0;
  private inFlight = new Map<string, InFlight>();

  constructor(
    private readonly store: DashboardStore,
    private readonly transport: ControlTransport,
    options: OptimisticActionControllerOptions = {}
  ) {
    this.timeoutMs = Math.max(0, options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
  }

  async submit(name: string, value: string): Promise<ActionOutcome> {
    const token = ++this.sequence;
    const abort = new AbortController();
    this.inFlight.set(name, { token, abort });
    this.store.getState().applyControlEvent(name, { type: "submitted", value, token });

    let failure: string | null = null;
    try {
      await withTimeout(this.transport.updateControl({ name, value }, abort.signal), this.timeoutMs, abort);
    } catch (err) {
      failure = err instanceof Error ? err.message : "Control update failed";
    }

    const current = this.inFlight.get(name);
    if (!current || current.token !== token) {
      return "superseded";
    }
    this.inFlight.delete(name);

    if (failure === null) {
      this.store.getState().applyControlEvent(name, { type: "accepted", token });
      return "committed";
    }
    console.warn(`Control update for ${name} rejected`, failure);
    this.store.getState().applyControlEvent(name, { type: "rejected", token, error: failure });
    return "rolled-back";
  }

  hasPending(name: string): boolean {
    return this.inFlight.has(name);
  }

  /** Aborts every outstanding request and reverts its control to the confirmed value. */
  dispose(): void {
    const entries = [...this.inFlight.entries()];
    this.inFlight.clear();
    for (const [name, { token, abort }] of entries) {
      abort.abort();
      this.store.getState().applyControlEvent(name, { type: "rejected", token, error: "Request cancelled" });
    }
  }
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number, abort: AbortController): Promise<T> {
  if (timeoutMs <= 0) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      abort.abort();
      reject(new TimeoutError(timeoutMs));
    }, timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
