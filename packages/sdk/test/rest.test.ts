import { afterEach, describe, expect, it, vi } from "vitest";

import { RequestError, TimeoutError, createRestClient, parseStatus } from "../src/rest";

function jsonResponse(body: unknown, status = 200, statusText = "OK"): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { "Content-Type": "application/json" }
  });
}

function noContent(): Response {
  return new Response(null, { status: 204, statusText: "No Content" });
}

function stallingResponse(status: number, signal: AbortSignal | null | undefined): Response {
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      signal?.addEventListener("abort", () => controller.error(new Error("aborted")));
    }
  });
  return new Response(body, { status });
}

describe("rest client", () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllGlobals();
  });

  it("reads the system status from the API", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValueOnce(jsonResponse({ running: true, pid: 4242 }));
    const client = createRestClient({ baseUrl: "http://shroombox.local/", fetchImpl: fetchMock });

    await expect(client.getStatus()).resolves.toEqual({ running: true, pid: 4242 });
    expect(fetchMock).toHaveBeenCalledWith(
      "http://shroombox.local/api/system/status",
      expect.objectContaining({ method: "GET", body: null })
    );
  });

  it("posts a control update as name and value", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValueOnce(noContent());
    const client = createRestClient({
      baseUrl: "http://shroombox.local",
      defaultHeaders: { Authorization: "Bearer test-token" },
      fetchImpl: fetchMock
    });

    await client.updateControl({ name: "phase", value: "cake" });

    expect(fetchMock).toHaveBeenCalledWith(
      "http://shroombox.local/api/control",
      expect.objectContaining({
        method: "POST",
        headers: { "Content-Type": "application/json", Authorization: "Bearer test-token" },
        body: JSON.stringify({ name: "phase", value: "cake" })
      })
    );
  });

  it("starts and stops the main service", async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(jsonResponse({ success: true }))
      .mockResolvedValueOnce(jsonResponse({ success: true }));
    const client = createRestClient({ fetchImpl: fetchMock });

    await client.controlSystem("stop");
    await client.controlSystem("start");

    expect(fetchMock).toHaveBeenNthCalledWith(
      1,
      "/api/system/control",
      expect.objectContaining({ method: "POST", body: JSON.stringify({ action: "stop" }) })
    );
    expect(fetchMock).toHaveBeenNthCalledWith(
      2,
      "/api/system/control",
      expect.objectContaining({ body: JSON.stringify({ action: "start" }) })
    );
  });

  it("accepts a bare base URL string and falls back to the global fetch", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValueOnce(jsonResponse({ environment: {} }));
    vi.stubGlobal("fetch", fetchMock);
    const client = createRestClient("http://pi.local:5000/");

    await expect(client.getSettings()).resolves.toEqual({ environment: {} });
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://pi.local:5000/api/settings");
  });

  it("uses the error message from the response body", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValueOnce(jsonResponse({ error: "Invalid phase" }, 400, "Bad Request"));
    const client = createRestClient({ fetchImpl: fetchMock });

    const failure = client.updateControl({ name: "phase", value: "fruiting" });

    await expect(failure).rejects.toBeInstanceOf(RequestError);
    await expect(failure).rejects.toMatchObject({ message: "Invalid phase", status: 400 });
  });

  it("falls back to a detail field and then to the status line", async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(jsonResponse({ detail: "Settings file is locked" }, 409, "Conflict"))
      .mockResolvedValueOnce(new Response("oops", { status: 500, statusText: "Internal Server Error" }));
    const client = createRestClient({ fetchImpl: fetchMock });

    await expect(client.getSettings()).rejects.toThrow("Settings file is locked");
    await expect(client.updateControl({ name: "phase", value: "cake" })).rejects.toThrow(
      "Request failed (500 Internal Server Error) for /api/control"
    );
  });

  it("rejects malformed payloads", async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(new Response("not json", { status: 200 }))
      .mockResolvedValueOnce(jsonResponse(["colonisation"]))
      .mockResolvedValueOnce(jsonResponse({ pid: 12 }));
    const client = createRestClient({ fetchImpl: fetchMock });

    await expect(client.getSettings()).rejects.toThrow("Invalid JSON in response for /api/settings");
    await expect(client.getSettings()).rejects.toThrow("Settings response was not an object");
    await expect(client.getStatus()).rejects.toThrow("Status response is missing a running flag");
  });

  it("raises a timeout error when the server does not answer in time", async () => {
    vi.useFakeTimers();
    const fetchMock = vi.fn<typeof fetch>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        })
    );
    const client = createRestClient({ fetchImpl: fetchMock, timeoutMs: 100 });

    const settled = client.getStatus().catch((err: unknown) => err);
    await vi.advanceTimersByTimeAsync(100);
    const err = await settled;

    expect(err).toBeInstanceOf(TimeoutError);
    expect(err).toMatchObject({ message: "Request timed out after 100 ms", status: null });
  });

  it("keeps the timeout running while the response body arrives", async () => {
    vi.useFakeTimers();
    const fetchMock = vi.fn<typeof fetch>((_input, init) => Promise.resolve(stallingResponse(200, init?.signal)));
    const client = createRestClient({ fetchImpl: fetchMock, timeoutMs: 100 });

    const settled = client.getSettings().catch((err: unknown) => err);
    await vi.advanceTimersByTimeAsync(100);
    const err = await settled;

    expect(err).toBeInstanceOf(TimeoutError);
    expect(err).toMatchObject({ message: "Request timed out after 100 ms" });
  });

  it("times out while reading an error body", async () => {
    vi.useFakeTimers();
    const fetchMock = vi.fn<typeof fetch>((_input, init) => Promise.resolve(stallingResponse(500, init?.signal)));
    const client = createRestClient({ fetchImpl: fetchMock, timeoutMs: 100 });

    const settled = client.updateControl({ name: "phase", value: "cake" }).catch((err: unknown) => err);
    await vi.advanceTimersByTimeAsync(100);

    await expect(settled).resolves.toBeInstanceOf(TimeoutError);
  });

  it("passes a caller abort through unchanged", async () => {
    const fetchMock = vi.fn<typeof fetch>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        })
    );
    const client = createRestClient({ fetchImpl: fetchMock, timeoutMs: 100 });
    const controller = new AbortController();

    const pending = client.getSettings(controller.signal);
    controller.abort();

    await expect(pending).rejects.toThrow("aborted");
    await expect(pending).rejects.not.toBeInstanceOf(TimeoutError);
  });
});

describe("parseStatus", () => {
  it("drops a pid that is not an integer", () => {
    expect(parseStatus({ running: false, pid: "none" })).toEqual({ running: false, pid: null });
    expect(parseStatus({ running: true, pid: 12.5 })).toEqual({ running: true, pid: null });
    expect(parseStatus({ running: true })).toEqual({ running: true, pid: null });
  });
});
