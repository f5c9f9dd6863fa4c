import { HUMIDIFIER_CONTROLS } from "@shroombox/sdk";

import { CollapsibleTile } from "./CollapsibleTile";
import { NumericControlField } from "./NumericControlField";

export function HumidifierSettings() {
  return (
    <CollapsibleTile
      id="humidifier-settings"
      title="Humidifier Settings"
      subtitle="Burst timing and humidity band"
      bodyClassName="mt-4 grid gap-4 sm:grid-cols-2"
    >
      {HUMIDIFIER_CONTROLS.map((name) => (
        <NumericControlField key={name} name={name} />
      ))}
    </CollapsibleTile>
  );
}
