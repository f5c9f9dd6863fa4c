import { PID_CONTROLS } from "@shroombox/sdk";

import { CollapsibleTile } from "./CollapsibleTile";
import { NumericControlField } from "./NumericControlField";

export function PidSettings() {
  return (
    <CollapsibleTile
      id="pid-settings"
      title="PID Settings"
      subtitle="Humidifier loop gains"
      bodyClassName="mt-4 grid gap-4 sm:grid-cols-3"
    >
      {PID_CONTROLS.map((name) => (
        <NumericControlField key={name} name={name} />
      ))}
    </CollapsibleTile>
  );
}
