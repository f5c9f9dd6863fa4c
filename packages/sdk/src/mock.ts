import { findControl, validateControlValue, writePath, type GrowthPhase } from "./controls";
import type { StreamConnector, StreamHandlers } from "./event-stream";
import { RequestError, type RestClient, type SettingsDocument, type SystemStatus } from "./rest";

export interface MockBackendOptions {
  intervalMs?: number;
  /** Heartbeat period of the log stream; it keeps beating while the service is stopped. */
  heartbeatMs?: number;
  latencyMs?: number;
  /** Probability in [0, 1] that a control update is rejected. */
  failureRate?: number;
  random?: () => number;
}

export interface MockBackend extends RestClient {
  connector: StreamConnector;
  subscriberCount(): number;
  /** Fails every open log subscription, as a dropped connection would. */
  dropStreams(reason?: string): void;
  shutdown(): void;
}

interface Subscriber {
  handlers: StreamHandlers;
  close(): void;
}

const INITIAL_PHASE: GrowthPhase = "growing";

export const HEARTBEAT_LINE = "\u2665";

export function createMockBackend(options: MockBackendOptions = {}): MockBackend {
  const intervalMs = options.intervalMs ?? 2000;
  const heartbeatMs = options.heartbeatMs ?? 5000;
  const latencyMs = Math.max(0, options.latencyMs ?? 300);
  const failureRate = clamp(options.failureRate ?? 0, 0, 1);
  const random = options.random ?? Math.random;

  const settings: SettingsDocument = {
    environment: {
      current_phase: INITIAL_PHASE,
      phases: {
        colonisation: { temp_setpoint: 27.0, co2_setpoint: 1000, rh_setpoint: 85.0 },
        growing: { temp_setpoint: 22.0, co2_setpoint: 550, rh_setpoint: 85.0 },
        cake: { temp_setpoint: 20.0, co2_setpoint: 500, rh_setpoint: 90.0 }
      }
    },
    humidifier: {
      burst_interval: 60,
      rh_hysteresis: 0.5,
      pid: { Kp: 0.2, Ki: 0.01, Kd: 0.05 }
    }
  };

  const status: SystemStatus = { running: true, pid: 4242 };
  const climate = { co2: 800, temperature: 24, humidity: 85 };
  const subscribers = new Set<Subscriber>();

  const broadcast = (message: string) => {
    const line = formatLine(message);
    subscribers.forEach((subscriber) => subscriber.handlers.onMessage(line));
  };

  const measure = (): string => {
    climate.co2 = randomWalk(random, climate.co2, 400, 2000, 40);
    climate.temperature = randomWalk(random, climate.temperature, 18, 30, 0.3);
    climate.humidity = randomWalk(random, climate.humidity, 60, 99, 1.5);
    return formatLine(
      `Measurements - CO2: ${Math.round(climate.co2)} ppm, Temp: ${climate.temperature.toFixed(1)} C, RH: ${climate.humidity.toFixed(1)} %`
    );
  };

  const connector: StreamConnector = (_url, handlers) => {
    let closed = false;
    const openTimer = setTimeout(() => {
      if (closed) {
        return;
      }
      handlers.onOpen();
      handlers.onMessage("Connected to log stream");
    }, 0);
    const tick = setInterval(() => {
      if (!closed && status.running) {
        handlers.onMessage(measure());
      }
    }, intervalMs);
    const heartbeat = setInterval(() => {
      if (!closed) {
        handlers.onMessage(HEARTBEAT_LINE);
      }
    }, heartbeatMs);

    const subscriber: Subscriber = {
      handlers,
      close() {
        closed = true;
        clearTimeout(openTimer);
        clearInterval(tick);
        clearInterval(heartbeat);
        subscribers.delete(subscriber);
      }
    };
    subscribers.add(subscriber);
    return { close: () => subscriber.close() };
  };

  return {
    connector,
    async getStatus(signal) {
      await delay(latencyMs, signal);
      return { ...status };
    },
    async getSettings(signal) {
      await delay(latencyMs, signal);
      return structuredClone(settings);
    },
    async updateControl(update, signal) {
      await delay(latencyMs, signal);
      const control = findControl(update.name);
      const problem = validateControlValue(update.name, update.value);
      if (!control || problem) {
        throw new RequestError(problem ?? `Unknown control "${update.name}"`, 400);
      }
      if (random() < failureRate) {
        throw new RequestError("Controller did not acknowledge the update", 503);
      }
      writePath(settings, control.path, control.kind === "number" ? Number(update.value) : update.value);
      broadcast(`Setting ${update.name} changed to ${update.value}`);
    },
    async controlSystem(action, signal) {
      await delay(latencyMs, signal);
      status.running = action === "start";
      status.pid = status.running ? 1000 + Math.floor(random() * 9000) : null;
      broadcast(`Main service ${status.running ? "started" : "stopped"}`);
    },
    subscriberCount() {
      return subscribers.size;
    },
    dropStreams(reason = "Connection reset") {
      [...subscribers].forEach((subscriber) => subscriber.handlers.onError(reason));
    },
    shutdown() {
      [...subscribers].forEach((subscriber) => subscriber.close());
    }
  };
}

function formatLine(message: string): string {
  const timestamp = new Date().toISOString().replace("T", " ").slice(0, 19);
  return `${timestamp} - shroombox - INFO - ${message}`;
}

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RequestError("Request aborted"));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new RequestError("Request aborted"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

function randomWalk(random: () => number, value: number, min: number, max: number, step: number): number {
  const delta = (random() - 0.5) * 2 * step;
  return clamp(value + delta, min, max);
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
