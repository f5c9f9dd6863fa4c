import { PHASE_CONTROL, findControl, isGrowthPhase, phaseSetpointControls } from "@shroombox/sdk";

import { useControl } from "../hooks/useControl";
import { CollapsibleTile } from "./CollapsibleTile";
import { NumericControlField } from "./NumericControlField";

const phaseControl = findControl(PHASE_CONTROL);
const PHASE_OPTIONS = phaseControl?.kind === "select" ? phaseControl.options : [];

/** Setpoints of the phase currently shown by the phase selector, pending selection included. */
export function PhaseSettings() {
  const { value } = useControl(PHASE_CONTROL);
  const phase = isGrowthPhase(value) ? value : null;
  const label = PHASE_OPTIONS.find((option) => option.value === phase)?.label;

  return (
    <CollapsibleTile
      id="phase-settings"
      title="Phase Settings"
      subtitle={label ? `${label} setpoints` : "No phase selected"}
      bodyClassName="mt-4 grid gap-4 sm:grid-cols-3"
    >
      {phase ? (
        phaseSetpointControls(phase).map((name) => <NumericControlField key={name} name={name} />)
      ) : (
        <p className="text-sm text-emerald-200/70">Select a growth phase to edit its setpoints.</p>
      )}
    </CollapsibleTile>
  );
}
