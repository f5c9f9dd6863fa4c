export interface SystemStatus {
  running: boolean;
  pid: number | null;
}

export type SystemAction = "start" | "stop";

export interface ControlUpdate {
  name: string;
  value: string;
}

/** Raw `/api/settings` document; read it through `controlValuesFromSettings`. */
export type SettingsDocument = Record<string, unknown>;

export interface ControlTransport {
  updateControl(update: ControlUpdate, signal?: AbortSignal): Promise<void>;
}

export interface RestClient extends ControlTransport {
  getStatus(signal?: AbortSignal): Promise<SystemStatus>;
  getSettings(signal?: AbortSignal): Promise<SettingsDocument>;
  controlSystem(action: SystemAction, signal?: AbortSignal): Promise<void>;
}

export interface RestClientOptions {
  /** Empty string means same origin. */
  baseUrl?: string;
  defaultHeaders?: Record<string, string>;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
}

export class RequestError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = "RequestError";
    this.status = status;
  }
}

export class TimeoutError extends RequestError {
  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs} ms`);
    this.name = "TimeoutError";
  }
}

export function createRestClient(options: string | RestClientOptions = {}): RestClient {
  const resolved = typeof options === "string"
    ? { baseUrl: options }
    : options;
  const baseUrl = normalizedBaseUrl(resolved.baseUrl ?? "");
  const fetchImpl = resolved.fetchImpl ?? globalFetch();
  const defaultHeaders = resolved.defaultHeaders ?? {};
  const timeoutMs = resolved.timeoutMs;

  return {
    async getStatus(signal) {
      const body = await request(fetchImpl, baseUrl, "/api/system/status", {
        method: "GET",
        headers: defaultHeaders,
        signal,
        timeoutMs
      });
      return parseStatus(body);
    },
    async getSettings(signal) {
      const body = await request(fetchImpl, baseUrl, "/api/settings", {
        method: "GET",
        headers: defaultHeaders,
        signal,
        timeoutMs
      });
      if (!isRecord(body)) {
        throw new RequestError("Settings response was not an object");
      }
      return body;
    },
    async updateControl(update, signal) {
      await request(fetchImpl, baseUrl, "/api/control", {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          ...defaultHeaders
        },
        body: JSON.stringify({ name: update.name, value: update.value }),
        signal,
        timeoutMs
      });
    },
    async controlSystem(action, signal) {
      await request(fetchImpl, baseUrl, "/api/system/control", {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          ...defaultHeaders
        },
        body: JSON.stringify({ action }),
        signal,
        timeoutMs
      });
    }
  };
}

export function parseStatus(value: unknown): SystemStatus {
  const running = isRecord(value) ? value["running"] : undefined;
  if (!isRecord(value) || typeof running !== "boolean") {
    throw new RequestError("Status response is missing a running flag");
  }
  const pid = value["pid"];
  return {
    running,
    pid: typeof pid === "number" && Number.isInteger(pid) ? pid : null
  };
}

interface RequestOptions {
  method: string;
  headers?: Record<string, string>;
  body?: string | null;
  signal?: AbortSignal;
  timeoutMs?: number;
}

async function request(
  fetchImpl: typeof fetch,
  baseUrl: string,
  path: string,
  options: RequestOptions
): Promise<unknown> {
  const url = buildUrl(baseUrl, path);
  const deadline = linkDeadline(options.signal, options.timeoutMs);

  try {
    const response = await fetchImpl(url, {
      method: options.method,
      headers: options.headers,
      body: options.body ?? null,
      signal: deadline.signal
    });

    if (!response.ok) {
      throw new RequestError(await problemMessage(response, path), response.status);
    }

    if (response.status === 204) {
      return undefined;
    }

    // The deadline stays armed until the body has been read.
    const text = await response.text();
    return parseBody(text, path, response.status);
  } catch (err) {
    if (deadline.timedOut() && options.timeoutMs !== undefined) {
      throw new TimeoutError(options.timeoutMs);
    }
    throw err;
  } finally {
    deadline.dispose();
  }
}

function parseBody(text: string, path: string, status: number): unknown {
  if (!text) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    throw new RequestError(`Invalid JSON in response for ${path}`, status);
  }
}

async function problemMessage(response: Response, path: string): Promise<string> {
  const fallback = `Request failed (${response.status} ${response.statusText}) for ${path}`;
  try {
    const problem: unknown = await response.json();
    if (isRecord(problem)) {
      const error = problem["error"];
      if (typeof error === "string" && error) {
        return error;
      }
      const detail = problem["detail"];
      if (typeof detail === "string" && detail) {
        return detail;
      }
    }
  } catch {
    // body was not JSON; keep the status line
  }
  return fallback;
}

function linkDeadline(parent: AbortSignal | undefined, timeoutMs: number | undefined) {
  const controller = new AbortController();
  let timedOut = false;
  const forward = () => controller.abort();

  if (parent) {
    if (parent.aborted) {
      controller.abort();
    } else {
      parent.addEventListener("abort", forward, { once: true });
    }
  }

  const timer =
    timeoutMs !== undefined && timeoutMs > 0
      ? setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, timeoutMs)
      : null;

  return {
    signal: controller.signal,
    timedOut: () => timedOut,
    dispose() {
      if (timer) {
        clearTimeout(timer);
      }
      parent?.removeEventListener("abort", forward);
    }
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizedBaseUrl(baseUrl: string): string {
  const trimmed = baseUrl.trim();
  return trimmed.endsWith("/") ? trimmed.slice(0, -1) : trimmed;
}

function buildUrl(base: string, path: string): string {
  if (path.startsWith("http://") || path.startsWith("https://")) {
    return path;
  }
  return `${base}${path.startsWith("/") ? path : `/${path}`}`;
}

function globalFetch(): typeof fetch {
  if (typeof fetch === "function") {
    return fetch.bind(globalThis);
  }
  throw new Error("fetch is not available in the current environment");
}
