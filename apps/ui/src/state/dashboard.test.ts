import { selectControl, type StreamConnector } from "@shroombox/sdk";
import { afterEach, expect, vi } from "vitest";

import { DEFAULT_SETTINGS } from "../settings";
import { createDashboard } from "./dashboard";

describe("createDashboard", () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllGlobals();
  });

  it("runs against the simulated chamber in demo mode", () => {
    vi.useFakeTimers();
    const dashboard = createDashboard({ ...DEFAULT_SETTINGS, mode: "demo", streamIdleTimeoutMs: 0 });

    dashboard.stream.activate();
    expect(dashboard.store.getState().connection.state).toBe("connecting");

    vi.advanceTimersByTime(0);
    expect(dashboard.store.getState().connection.state).toBe("open");
    expect(dashboard.store.getState().logs).toEqual(["Connected to log stream"]);

    dashboard.dispose();
    expect(dashboard.store.getState().connection.state).toBe("closed");
  });

  it("talks to the configured backend in live mode", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      new Response(JSON.stringify({ running: false, pid: null }), { status: 200 })
    );
    vi.stubGlobal("fetch", fetchMock);
    const urls: string[] = [];
    const connector: StreamConnector = (url) => {
      urls.push(url);
      return { close: () => undefined };
    };

    const dashboard = createDashboard(
      { ...DEFAULT_SETTINGS, apiBaseUrl: "http://pi.local:5000", streamIdleTimeoutMs: 0 },
      { connector }
    );
    dashboard.stream.activate();

    expect(urls).toEqual(["http://pi.local:5000/api/logs"]);
    await expect(dashboard.api.getStatus()).resolves.toEqual({ running: false, pid: null });
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://pi.local:5000/api/system/status");
    dashboard.dispose();
  });

  it("rolls back outstanding control updates when disposed", () => {
    const connector: StreamConnector = () => ({ close: () => undefined });
    const dashboard = createDashboard(DEFAULT_SETTINGS, {
      connector,
      api: {
        getStatus: () => Promise.resolve({ running: true, pid: 1 }),
        getSettings: () => Promise.resolve({}),
        updateControl: (_update, signal) =>
          new Promise<void>((_resolve, reject) => {
            signal?.addEventListener("abort", () => reject(new Error("aborted")));
          }),
        controlSystem: () => Promise.resolve(),
      },
    });
    dashboard.store.getState().syncControls({ phase: "growing" });

    void dashboard.controller.submit("phase", "cake");
    dashboard.dispose();

    expect(selectControl("phase")(dashboard.store.getState())).toEqual({
      confirmed: "growing",
      pending: null,
      error: "Request cancelled",
    });
  });
});
