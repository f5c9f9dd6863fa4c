import { PlayIcon, StopIcon } from "@heroicons/react/24/solid";
import classNames from "classnames";

import { useSystemStatus } from "../hooks/useSystemStatus";
import { CollapsibleTile } from "./CollapsibleTile";

export function ControlPanel() {
  const { status, error, busy, actionError, start, stop } = useSystemStatus();
  const running = status?.running ?? false;

  const stateLabel = status ? (running ? "Running" : "Stopped") : error ? "Unreachable" : "Checking…";

  return (
    <CollapsibleTile
      id="control-panel"
      title="Control Panel"
      subtitle="Main climate service"
      bodyClassName="mt-4 space-y-4"
    >
      <div className="flex flex-wrap items-center justify-between gap-4">
        <div>
          <span
            className={classNames(
              "inline-flex items-center gap-2 rounded-full border px-3 py-1 text-sm font-medium",
              status && running
                ? "border-emerald-500/30 bg-emerald-500/10 text-emerald-300"
                : "border-rose-500/30 bg-rose-500/10 text-rose-300"
            )}
            data-testid="service-state"
          >
            <span className="inline-block h-2 w-2 rounded-full bg-current" />
            {stateLabel}
          </span>
          {status && status.pid !== null ? (
            <p className="mt-2 text-xs text-emerald-200/70">PID {status.pid}</p>
          ) : null}
        </div>
        <div className="flex gap-2">
          <button
            type="button"
            onClick={() => void start()}
            disabled={busy || running}
            className="inline-flex items-center gap-1 rounded-lg bg-emerald-600 px-3 py-1.5 text-sm font-medium text-white transition hover:bg-emerald-500 disabled:cursor-not-allowed disabled:opacity-50"
          >
            <PlayIcon className="h-4 w-4" aria-hidden="true" />
            Start
          </button>
          <button
            type="button"
            onClick={() => void stop()}
            disabled={busy || !running}
            className="inline-flex items-center gap-1 rounded-lg bg-rose-600 px-3 py-1.5 text-sm font-medium text-white transition hover:bg-rose-500 disabled:cursor-not-allowed disabled:opacity-50"
          >
            <StopIcon className="h-4 w-4" aria-hidden="true" />
            Stop
          </button>
        </div>
      </div>
      {error ? (
        <p className="text-sm text-rose-300" role="alert">
          {error}
        </p>
      ) : null}
      {actionError ? (
        <p className="text-sm text-rose-300" role="alert">
          {actionError}
        </p>
      ) : null}
    </CollapsibleTile>
  );
}
