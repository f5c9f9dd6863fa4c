import { createStore, type StoreApi } from "zustand/vanilla";

import { EMPTY_CONTROL, reduceControl, type ControlEvent, type ControlValue } from "./control-state";
import { INITIAL_STREAM_SNAPSHOT, type StreamSnapshot } from "./event-stream";
import type { BoundedLogBuffer } from "./log-buffer";
import type { SystemStatus } from "./rest";

export type DashboardState = {
  status: SystemStatus | null;
  statusError: string | null;
  logs: readonly string[];
  connection: StreamSnapshot;
  controls: Record<string, ControlValue>;
  setStatus: (status: SystemStatus) => void;
  setStatusError: (message: string | null) => void;
  setConnection: (snapshot: StreamSnapshot) => void;
  applyControlEvent: (name: string, event: ControlEvent) => void;
  syncControls: (values: Record<string, string>) => void;
};

export type DashboardStore = StoreApi<DashboardState>;

/**
 * Single source of truth for rendering. `logs` mirrors the buffer and is only
 * written through it; every other field has exactly one writer action.
 */
export function createDashboardStore(buffer: BoundedLogBuffer): DashboardStore {
  const store = createStore<DashboardState>()((set) => ({
    status: null,
    statusError: null,
    logs: buffer.snapshot(),
    connection: INITIAL_STREAM_SNAPSHOT,
    controls: {},
    setStatus: (status) =>
      set((state) => {
        if (state.status && state.status.running === status.running && state.status.pid === status.pid && !state.statusError) {
          return state;
        }
        return { status, statusError: null };
      }),
    setStatusError: (message) => set({ statusError: message }),
    setConnection: (snapshot) => set({ connection: snapshot }),
    applyControlEvent: (name, event) =>
      set((state) => {
        const current = state.controls[name] ?? EMPTY_CONTROL;
        const next = reduceControl(current, event);
        if (next === current) {
          return state;
        }
        return { controls: { ...state.controls, [name]: next } };
      }),
    syncControls: (values) =>
      set((state) => {
        let changed = false;
        const controls = { ...state.controls };
        for (const [name, value] of Object.entries(values)) {
          const current = controls[name] ?? EMPTY_CONTROL;
          const next = reduceControl(current, { type: "synced", value });
          if (next !== current) {
            controls[name] = next;
            changed = true;
          }
        }
        return changed ? { controls } : state;
      }),
  }));

  buffer.onChange((lines) => store.setState({ logs: lines }));
  return store;
}

export const selectStatus = (state: DashboardState) => state.status;
export const selectStatusError = (state: DashboardState) => state.statusError;
export const selectLogs = (state: DashboardState) => state.logs;
export const selectConnection = (state: DashboardState) => state.connection;
export const selectControl = (name: string) => (state: DashboardState) =>
  state.controls[name] ?? EMPTY_CONTROL;
