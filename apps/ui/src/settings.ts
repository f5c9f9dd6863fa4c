import { DEFAULT_LOG_CAPACITY } from "@shroombox/sdk";

export type RuntimeMode = "demo" | "live";

export type DashboardSettings = {
  mode: RuntimeMode;
  apiBaseUrl: string; // e.g. http://shroombox.local:5000, empty for same origin
  logCapacity: number;
  requestTimeoutMs: number;
  statusPollMs: number;
  /** 0 turns the idle watchdog off. */
  streamIdleTimeoutMs: number;
};

export type SettingsEnv = {
  VITE_SHROOMBOX_MODE?: string;
  VITE_SHROOMBOX_API_BASE?: string;
  VITE_SHROOMBOX_LOG_CAPACITY?: string;
  VITE_SHROOMBOX_REQUEST_TIMEOUT_MS?: string;
  VITE_SHROOMBOX_STATUS_POLL_MS?: string;
  VITE_SHROOMBOX_STREAM_IDLE_MS?: string;
};

export const DEFAULT_SETTINGS: DashboardSettings = {
  mode: "live",
  apiBaseUrl: "",
  logCapacity: DEFAULT_LOG_CAPACITY,
  requestTimeoutMs: 10000,
  statusPollMs: 5000,
  streamIdleTimeoutMs: 15000,
};

/** Settings live for the page session only; they come from the build environment. */
export function getSettings(): DashboardSettings {
  return normalizeSettings(import.meta.env);
}

export function normalizeSettings(env: SettingsEnv): DashboardSettings {
  const mode: RuntimeMode = env.VITE_SHROOMBOX_MODE?.trim().toLowerCase() === "demo" ? "demo" : "live";
  const rawBase = typeof env.VITE_SHROOMBOX_API_BASE === "string" ? env.VITE_SHROOMBOX_API_BASE.trim() : "";
  const apiBaseUrl = rawBase.endsWith("/") ? rawBase.slice(0, -1) : rawBase;
  return {
    mode,
    apiBaseUrl,
    logCapacity: readInteger(env.VITE_SHROOMBOX_LOG_CAPACITY, DEFAULT_SETTINGS.logCapacity, 1),
    requestTimeoutMs: readInteger(env.VITE_SHROOMBOX_REQUEST_TIMEOUT_MS, DEFAULT_SETTINGS.requestTimeoutMs, 0),
    statusPollMs: readInteger(env.VITE_SHROOMBOX_STATUS_POLL_MS, DEFAULT_SETTINGS.statusPollMs, 250),
    streamIdleTimeoutMs: readInteger(env.VITE_SHROOMBOX_STREAM_IDLE_MS, DEFAULT_SETTINGS.streamIdleTimeoutMs, 0),
  };
}

function readInteger(raw: string | undefined, fallback: number, min: number): number {
  if (typeof raw !== "string" || !raw.trim()) {
    return fallback;
  }
  const parsed = Number(raw.trim());
  return Number.isInteger(parsed) && parsed >= min ? parsed : fallback;
}
