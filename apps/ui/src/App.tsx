import { ArrowPathIcon } from "@heroicons/react/24/outline";
import { useStore } from "zustand";
import { selectConnection, selectStatus, selectStatusError } from "@shroombox/sdk";

import { ConnectionBadges } from "./components/ConnectionBadges";
import { ControlPanel } from "./components/ControlPanel";
import { HumidifierSettings } from "./components/HumidifierSettings";
import { LogViewer } from "./components/LogViewer";
import { PageShell } from "./components/PageShell";
import { PhaseSelector } from "./components/PhaseSelector";
import { PhaseSettings } from "./components/PhaseSettings";
import { PidSettings } from "./components/PidSettings";
import { useControlSettings } from "./hooks/useControlSettings";
import { useDashboard } from "./state/DashboardContext";

function LoadingState({ message = "Loading controller settings..." }: { message?: string }) {
  return (
    <div className="flex items-center gap-3 rounded-xl border border-emerald-700/50 bg-[rgba(8,33,23,0.78)] px-4 py-3 text-emerald-100 shadow-inner shadow-emerald-950/40">
      <span className="inline-flex h-3 w-3 animate-ping rounded-full bg-emerald-400/90" />
      {message}
    </div>
  );
}

function ErrorState({ message, onRetry }: { message: string; onRetry: () => void }) {
  return (
    <div
      role="alert"
      className="rounded-2xl border border-rose-500/40 bg-[rgba(45,12,18,0.85)] p-6 text-rose-100 shadow-[0_20px_50px_rgba(30,10,16,0.4)]"
    >
      <h2 className="text-lg font-semibold text-rose-100">Unable to load controller settings</h2>
      <p className="mt-2 text-sm text-rose-200/80">{message}</p>
      <button
        type="button"
        onClick={onRetry}
        className="mt-4 inline-flex items-center gap-2 rounded-lg border border-rose-500/30 bg-rose-500/80 px-4 py-2 text-sm font-semibold text-rose-50 transition hover:border-rose-400/50 hover:bg-rose-400"
      >
        <ArrowPathIcon className="h-4 w-4" aria-hidden="true" />
        Try again
      </button>
    </div>
  );
}

export default function App() {
  const { store, settings } = useDashboard();
  const connection = useStore(store, selectConnection);
  const status = useStore(store, selectStatus);
  const statusError = useStore(store, selectStatusError);
  const { loading, error, reload } = useControlSettings();

  return (
    <PageShell
      title="Shroombox"
      subtitle={settings.mode === "demo" ? "Demo mode • simulated chamber" : "Environmental control"}
      actions={<ConnectionBadges connection={connection} status={status} statusError={statusError} />}
    >
      <div className="space-y-6">
        {loading ? <LoadingState /> : null}
        {error ? <ErrorState message={error} onRetry={() => void reload()} /> : null}
        <div className="grid gap-6 lg:grid-cols-2">
          <ControlPanel />
          <PhaseSelector />
          <PhaseSettings />
          <HumidifierSettings />
          <PidSettings />
          <LogViewer />
        </div>
      </div>
    </PageShell>
  );
}
