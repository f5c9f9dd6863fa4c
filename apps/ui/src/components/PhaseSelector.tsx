import classNames from "classnames";
import { PHASE_CONTROL, findControl } from "@shroombox/sdk";

import { useControl } from "../hooks/useControl";
import { CollapsibleTile } from "./CollapsibleTile";

const phaseControl = findControl(PHASE_CONTROL);
const PHASE_OPTIONS = phaseControl?.kind === "select" ? phaseControl.options : [];

export function PhaseSelector() {
  const { value, confirmed, pending, error, submit } = useControl(PHASE_CONTROL);
  const current = PHASE_OPTIONS.find((option) => option.value === value);

  return (
    <CollapsibleTile
      id="current-phase"
      title="Current Phase"
      subtitle={current ? current.label : "Not loaded"}
    >
      <div className="flex flex-wrap gap-2" role="group" aria-label="Growth phase">
        {PHASE_OPTIONS.map((option) => {
          const selected = option.value === value;
          return (
            <button
              key={option.value}
              type="button"
              aria-pressed={selected}
              onClick={() => void submit(option.value)}
              className={classNames(
                "rounded-lg border px-3 py-1.5 text-sm font-medium transition",
                selected
                  ? "border-emerald-400 bg-emerald-500/20 text-emerald-50"
                  : "border-emerald-800/60 text-emerald-200/80 hover:border-emerald-500/60"
              )}
            >
              {option.label}
            </button>
          );
        })}
      </div>
      {pending ? (
        <p className="mt-3 text-xs text-amber-300" role="status">
          Saving… (confirmed: {confirmed ?? "none"})
        </p>
      ) : null}
      {error ? (
        <p className="mt-3 text-sm text-rose-300" role="alert">
          {error}
        </p>
      ) : null}
    </CollapsibleTile>
  );
}
