import { act, render } from "@testing-library/react";
import type { ReactElement } from "react";
import { vi } from "vitest";
import type { RestClient, SettingsDocument, StreamConnector, StreamHandlers } from "@shroombox/sdk";

import { DEFAULT_SETTINGS, type DashboardSettings } from "./settings";
import { createDashboard, type Dashboard } from "./state/dashboard";
import { DashboardProvider } from "./state/DashboardContext";

export const SAMPLE_SETTINGS: SettingsDocument = {
  environment: {
    current_phase: "growing",
    phases: {
      colonisation: { temp_setpoint: 27, rh_setpoint: 85, co2_setpoint: 1000 },
      growing: { temp_setpoint: 22, rh_setpoint: 85, co2_setpoint: 550 },
      cake: { temp_setpoint: 20, rh_setpoint: 90, co2_setpoint: 500 },
    },
  },
  humidifier: { burst_interval: 60, rh_hysteresis: 0.5, pid: { Kp: 0.2, Ki: 0.01, Kd: 0.05 } },
};

type FakeSubscription = {
  handlers: StreamHandlers;
  closed: boolean;
};

export function createFakeBackend() {
  const subscriptions: FakeSubscription[] = [];
  const connector: StreamConnector = (_url, handlers) => {
    const subscription: FakeSubscription = { handlers, closed: false };
    subscriptions.push(subscription);
    return {
      close: () => {
        subscription.closed = true;
      },
    };
  };

  const api = {
    getStatus: vi.fn<RestClient["getStatus"]>().mockResolvedValue({ running: true, pid: 4242 }),
    getSettings: vi.fn<RestClient["getSettings"]>().mockResolvedValue(SAMPLE_SETTINGS),
    updateControl: vi.fn<RestClient["updateControl"]>().mockResolvedValue(undefined),
    controlSystem: vi.fn<RestClient["controlSystem"]>().mockResolvedValue(undefined),
  } satisfies RestClient;

  const live = () => subscriptions.filter((subscription) => !subscription.closed);
  const current = (): StreamHandlers => {
    const subscription = live()[0];
    if (!subscription) {
      throw new Error("log stream is not subscribed");
    }
    return subscription.handlers;
  };

  return {
    api,
    connector,
    subscriptions,
    live,
    open: () => act(() => current().onOpen()),
    emit: (...lines: string[]) => act(() => lines.forEach((line) => current().onMessage(line))),
    fail: (reason?: string) => act(() => current().onError(reason)),
  };
}

export type FakeBackend = ReturnType<typeof createFakeBackend>;

type RenderDashboardOptions = {
  backend?: FakeBackend;
  settings?: Partial<DashboardSettings>;
  /** Confirmed control values written before the first render. */
  seed?: Record<string, string>;
};

const mounted: Dashboard[] = [];

export function renderDashboard(ui: ReactElement, options: RenderDashboardOptions = {}) {
  const backend = options.backend ?? createFakeBackend();
  const dashboard = createDashboard(
    { ...DEFAULT_SETTINGS, streamIdleTimeoutMs: 0, ...options.settings },
    { api: backend.api, connector: backend.connector }
  );
  if (options.seed) {
    dashboard.store.getState().syncControls(options.seed);
  }
  mounted.push(dashboard);
  const view = render(<DashboardProvider dashboard={dashboard}>{ui}</DashboardProvider>);
  return { ...view, dashboard, backend };
}

export function disposeDashboards(): void {
  mounted.splice(0).forEach((dashboard) => dashboard.dispose());
}

export function deferred<T>() {
  const handles: Array<{ resolve: (value: T) => void; reject: (reason: unknown) => void }> = [];
  const promise = new Promise<T>((resolve, reject) => {
    handles.push({ resolve, reject });
  });
  return {
    promise,
    resolve: (value: T) => handles.forEach((handle) => handle.resolve(value)),
    reject: (reason: unknown) => handles.forEach((handle) => handle.reject(reason)),
  };
}
