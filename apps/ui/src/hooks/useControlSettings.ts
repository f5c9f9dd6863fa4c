import { useCallback, useEffect, useState } from "react";
import { controlValuesFromSettings } from "@shroombox/sdk";

import { useDashboard } from "../state/DashboardContext";

type ControlSettingsState = {
  loading: boolean;
  error: string | null;
};

/** Seeds every control's confirmed value from the backend's settings document. */
export function useControlSettings() {
  const { api, store } = useDashboard();
  const [{ loading, error }, setState] = useState<ControlSettingsState>({ loading: true, error: null });

  const load = useCallback(
    async (signal?: AbortSignal) => {
      setState({ loading: true, error: null });
      try {
        const settings = await api.getSettings(signal);
        store.getState().syncControls(controlValuesFromSettings(settings));
        setState({ loading: false, error: null });
      } catch (err) {
        if (signal?.aborted) {
          return;
        }
        console.warn("Failed to load settings", err);
        setState({ loading: false, error: err instanceof Error ? err.message : "Failed to load settings" });
      }
    },
    [api, store]
  );

  useEffect(() => {
    const controller = new AbortController();
    void load(controller.signal);
    return () => controller.abort();
  }, [load]);

  return {
    loading,
    error,
    reload: () => load(),
  };
}
