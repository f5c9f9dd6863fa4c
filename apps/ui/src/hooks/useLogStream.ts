import { useEffect } from "react";
import { useStore } from "zustand";
import { selectConnection, selectLogs } from "@shroombox/sdk";

import { useDashboard } from "../state/DashboardContext";

/** Keeps the log stream open while the calling component is mounted. */
export function useLogStream() {
  const { stream, store, settings } = useDashboard();

  useEffect(() => {
    stream.activate();
    return () => stream.deactivate();
  }, [stream]);

  const logs = useStore(store, selectLogs);
  const connection = useStore(store, selectConnection);

  return { logs, connection, capacity: settings.logCapacity };
}
