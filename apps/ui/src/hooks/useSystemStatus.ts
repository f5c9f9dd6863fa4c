import { useCallback, useEffect, useState } from "react";
import { useStore } from "zustand";
import { selectStatus, selectStatusError, type SystemAction } from "@shroombox/sdk";

import { useDashboard } from "../state/DashboardContext";

export function useSystemStatus() {
  const { api, store, settings } = useDashboard();
  const status = useStore(store, selectStatus);
  const error = useStore(store, selectStatusError);
  const [busy, setBusy] = useState(false);
  const [actionError, setActionError] = useState<string | null>(null);

  const refresh = useCallback(
    async (signal?: AbortSignal) => {
      try {
        const next = await api.getStatus(signal);
        store.getState().setStatus(next);
      } catch (err) {
        if (signal?.aborted) {
          return;
        }
        console.warn("Failed to load system status", err);
        store.getState().setStatusError(err instanceof Error ? err.message : "Failed to load system status");
      }
    },
    [api, store]
  );

  useEffect(() => {
    const controller = new AbortController();
    void refresh(controller.signal);
    const timer = setInterval(() => {
      void refresh(controller.signal);
    }, settings.statusPollMs);
    return () => {
      controller.abort();
      clearInterval(timer);
    };
  }, [refresh, settings.statusPollMs]);

  const control = useCallback(
    async (action: SystemAction) => {
      setBusy(true);
      setActionError(null);
      try {
        await api.controlSystem(action);
        await refresh();
      } catch (err) {
        console.warn(`Failed to ${action} the main service`, err);
        setActionError(err instanceof Error ? err.message : `Failed to ${action} the main service`);
      } finally {
        setBusy(false);
      }
    },
    [api, refresh]
  );

  return {
    status,
    error,
    busy,
    actionError,
    start: () => control("start"),
    stop: () => control("stop"),
    refresh: () => refresh(),
  };
}
