import {
  BoundedLogBuffer,
  LOG_STREAM_PATH,
  OptimisticActionController,
  ReconnectingEventStream,
  createDashboardStore,
  createMockBackend,
  createRestClient,
  eventSourceConnector,
  type DashboardStore,
  type RestClient,
  type StreamConnector,
} from "@shroombox/sdk";

import type { DashboardSettings } from "../settings";

export type Dashboard = {
  settings: DashboardSettings;
  buffer: BoundedLogBuffer;
  store: DashboardStore;
  api: RestClient;
  stream: ReconnectingEventStream;
  controller: OptimisticActionController;
  dispose: () => void;
};

export type DashboardOverrides = {
  api?: RestClient;
  connector?: StreamConnector;
};

type Backend = {
  api: RestClient;
  connector: StreamConnector;
  shutdown: () => void;
};

function resolveBackend(settings: DashboardSettings, overrides: DashboardOverrides): Backend {
  if (overrides.api && overrides.connector) {
    return { api: overrides.api, connector: overrides.connector, shutdown: () => undefined };
  }
  if (settings.mode === "demo") {
    const mock = createMockBackend();
    return {
      api: overrides.api ?? mock,
      connector: overrides.connector ?? mock.connector,
      shutdown: mock.shutdown,
    };
  }
  return {
    api: overrides.api ?? createRestClient({ baseUrl: settings.apiBaseUrl, timeoutMs: settings.requestTimeoutMs }),
    connector: overrides.connector ?? eventSourceConnector(),
    shutdown: () => undefined,
  };
}

/**
 * Builds the sync layer for one page session. The stream's state is
 * mirrored into the store for as long as the dashboard lives.
 */
export function createDashboard(settings: DashboardSettings, overrides: DashboardOverrides = {}): Dashboard {
  const buffer = new BoundedLogBuffer(settings.logCapacity);
  const store = createDashboardStore(buffer);
  const backend = resolveBackend(settings, overrides);

  const stream = new ReconnectingEventStream({
    url: `${settings.apiBaseUrl}${LOG_STREAM_PATH}`,
    sink: buffer,
    connector: backend.connector,
    idleTimeoutMs: settings.streamIdleTimeoutMs,
  });
  const stopMirroring = stream.onState((snapshot) => store.getState().setConnection(snapshot));
  const controller = new OptimisticActionController(store, backend.api, {
    timeoutMs: settings.requestTimeoutMs,
  });

  return {
    settings,
    buffer,
    store,
    api: backend.api,
    stream,
    controller,
    dispose() {
      stream.deactivate();
      stopMirroring();
      controller.dispose();
      backend.shutdown();
    },
  };
}
