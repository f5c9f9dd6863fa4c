import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ReconnectingEventStream, type StreamHandlers } from "../src/event-stream";
import { BoundedLogBuffer } from "../src/log-buffer";
import { HEARTBEAT_LINE, createMockBackend } from "../src/mock";
import { RequestError } from "../src/rest";

function recordingHandlers() {
  const events: string[] = [];
  const handlers: StreamHandlers = {
    onOpen: () => events.push("open"),
    onMessage: (data) => events.push(data),
    onError: (reason) => events.push(`error: ${reason ?? "unknown"}`)
  };
  return { events, handlers };
}

describe("mock backend", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-01-01T00:00:00.000Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("streams a greeting and then periodic measurements", () => {
    const backend = createMockBackend({ intervalMs: 1000, random: () => 0.5 });
    const { events, handlers } = recordingHandlers();

    const subscription = backend.connector("/api/logs", handlers);
    expect(backend.subscriberCount()).toBe(1);
    expect(events).toEqual([]);

    vi.advanceTimersByTime(0);
    expect(events).toEqual(["open", "Connected to log stream"]);

    vi.advanceTimersByTime(1000);
    expect(events[2]).toBe(
      "2024-01-01 00:00:01 - shroombox - INFO - Measurements - CO2: 800 ppm, Temp: 24.0 C, RH: 85.0 %"
    );

    subscription.close();
    vi.advanceTimersByTime(5000);
    expect(events).toHaveLength(3);
    expect(backend.subscriberCount()).toBe(0);
  });

  it("applies a valid control update and announces it on the log stream", async () => {
    const backend = createMockBackend({ random: () => 0.5 });
    const { events, handlers } = recordingHandlers();
    backend.connector("/api/logs", handlers);

    const update = backend.updateControl({ name: "phase", value: "cake" });
    await vi.advanceTimersByTimeAsync(300);
    await update;

    expect(events).toContain("2024-01-01 00:00:00 - shroombox - INFO - Setting phase changed to cake");

    const settingsRead = backend.getSettings();
    await vi.advanceTimersByTimeAsync(300);
    const settings = await settingsRead;
    expect(settings["environment"]).toMatchObject({ current_phase: "cake" });
    backend.shutdown();
  });

  it("stores numeric controls as numbers", async () => {
    const backend = createMockBackend({ latencyMs: 0 });

    const update = backend.updateControl({ name: "humidifier.burst_interval", value: "45" });
    await vi.advanceTimersByTimeAsync(0);
    await update;

    const settingsRead = backend.getSettings();
    await vi.advanceTimersByTimeAsync(0);
    await expect(settingsRead).resolves.toMatchObject({
      humidifier: { burst_interval: 45, rh_hysteresis: 0.5, pid: { Kp: 0.2, Ki: 0.01, Kd: 0.05 } }
    });
  });

  it("writes a phase setpoint into the phase table", async () => {
    const backend = createMockBackend({ latencyMs: 0 });

    const update = backend.updateControl({ name: "environment.phases.cake.co2_setpoint", value: "650" });
    await vi.advanceTimersByTimeAsync(0);
    await update;

    const settingsRead = backend.getSettings();
    await vi.advanceTimersByTimeAsync(0);
    await expect(settingsRead).resolves.toMatchObject({
      environment: { phases: { cake: { temp_setpoint: 20, co2_setpoint: 650, rh_setpoint: 90 } } }
    });
  });

  it("rejects invalid values and simulated controller failures", async () => {
    const invalid = createMockBackend({ latencyMs: 0 });
    const flaky = createMockBackend({ latencyMs: 0, failureRate: 1, random: () => 0.5 });

    const rejected = invalid.updateControl({ name: "phase", value: "fruiting" }).catch((err: unknown) => err);
    const dropped = flaky.updateControl({ name: "phase", value: "cake" }).catch((err: unknown) => err);
    await vi.advanceTimersByTimeAsync(0);

    await expect(rejected).resolves.toMatchObject({ message: '"fruiting" is not a valid growth phase', status: 400 });
    await expect(dropped).resolves.toMatchObject({ message: "Controller did not acknowledge the update", status: 503 });
    await expect(rejected).resolves.toBeInstanceOf(RequestError);
  });

  it("stops and restarts the main service", async () => {
    const backend = createMockBackend({ intervalMs: 1000, latencyMs: 0, random: () => 0.5 });
    const { events, handlers } = recordingHandlers();
    backend.connector("/api/logs", handlers);
    vi.advanceTimersByTime(0);

    const stop = backend.controlSystem("stop");
    await vi.advanceTimersByTimeAsync(0);
    await stop;
    const statusRead = backend.getStatus();
    await vi.advanceTimersByTimeAsync(0);
    await expect(statusRead).resolves.toEqual({ running: false, pid: null });

    vi.advanceTimersByTime(3000);
    expect(events).toEqual(["open", "Connected to log stream", "2024-01-01 00:00:00 - shroombox - INFO - Main service stopped"]);

    const start = backend.controlSystem("start");
    await vi.advanceTimersByTimeAsync(0);
    await start;
    const restarted = backend.getStatus();
    await vi.advanceTimersByTimeAsync(0);
    await expect(restarted).resolves.toEqual({ running: true, pid: 5500 });
    backend.shutdown();
  });

  it("keeps the log stream alive with heartbeats while the service is stopped", async () => {
    const backend = createMockBackend({ latencyMs: 0, random: () => 0.5 });
    const buffer = new BoundedLogBuffer();
    const stream = new ReconnectingEventStream({
      url: "/api/logs",
      sink: buffer,
      connector: backend.connector,
      idleTimeoutMs: 15000
    });
    let failures = 0;
    stream.onState((snapshot) => {
      if (snapshot.state === "errored") {
        failures += 1;
      }
    });
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    stream.activate();
    await vi.advanceTimersByTimeAsync(0);
    const stop = backend.controlSystem("stop");
    await vi.advanceTimersByTimeAsync(0);
    await stop;

    await vi.advanceTimersByTimeAsync(60000);

    expect(failures).toBe(0);
    expect(stream.getState()).toBe("open");
    expect(buffer.snapshot().filter((line) => line === HEARTBEAT_LINE)).toHaveLength(12);
    expect(warn).not.toHaveBeenCalled();

    stream.deactivate();
    backend.shutdown();
    warn.mockRestore();
  });

  it("drops every open stream on request", () => {
    const backend = createMockBackend();
    const first = recordingHandlers();
    const second = recordingHandlers();
    backend.connector("/api/logs", first.handlers);
    backend.connector("/api/logs", second.handlers);

    backend.dropStreams();

    expect(first.events).toEqual(["error: Connection reset"]);
    expect(second.events).toEqual(["error: Connection reset"]);
    backend.shutdown();
    expect(backend.subscriberCount()).toBe(0);
  });

  it("honours an aborted signal", async () => {
    const backend = createMockBackend();
    const controller = new AbortController();

    const pending = backend.getStatus(controller.signal);
    controller.abort();

    await expect(pending).rejects.toThrow("Request aborted");
  });

  it("hands out copies of the settings document", async () => {
    const backend = createMockBackend({ latencyMs: 0 });

    const firstRead = backend.getSettings();
    await vi.advanceTimersByTimeAsync(0);
    const first = await firstRead;
    first["humidifier"] = null;

    const secondRead = backend.getSettings();
    await vi.advanceTimersByTimeAsync(0);
    await expect(secondRead).resolves.toHaveProperty("humidifier.burst_interval", 60);
  });
});
