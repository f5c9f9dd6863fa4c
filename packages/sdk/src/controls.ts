import { isRecord, type SettingsDocument } from "./rest";

export const GROWTH_PHASES = ["colonisation", "growing", "cake"] as const;

export type GrowthPhase = (typeof GROWTH_PHASES)[number];

export type ControlOption = {
  value: string;
  label: string;
};

export type ControlDefinition =
  | {
      kind: "select";
      name: string;
      label: string;
      path: readonly string[];
      options: readonly ControlOption[];
    }
  | {
      kind: "number";
      name: string;
      label: string;
      path: readonly string[];
      unit?: string;
      min?: number;
      max?: number;
      step?: number;
      integer?: boolean;
    };

export const PHASE_CONTROL = "phase";

export type PhaseSetpoint = "temp_setpoint" | "rh_setpoint" | "co2_setpoint";

const PHASE_SETPOINTS: readonly PhaseSetpoint[] = ["temp_setpoint", "rh_setpoint", "co2_setpoint"];

export function phaseSetpointControl(phase: GrowthPhase, setpoint: PhaseSetpoint): string {
  return `environment.phases.${phase}.${setpoint}`;
}

/** Setpoint control names of one growth phase, in display order. */
export function phaseSetpointControls(phase: GrowthPhase): string[] {
  return PHASE_SETPOINTS.map((setpoint) => phaseSetpointControl(phase, setpoint));
}

function phaseSetpointDefinitions(phase: GrowthPhase): ControlDefinition[] {
  const path = (setpoint: PhaseSetpoint) => ["environment", "phases", phase, setpoint];
  return [
    {
      kind: "number",
      name: phaseSetpointControl(phase, "temp_setpoint"),
      label: "Temperature",
      path: path("temp_setpoint"),
      unit: "°C",
      step: 0.1,
    },
    {
      kind: "number",
      name: phaseSetpointControl(phase, "rh_setpoint"),
      label: "Humidity",
      path: path("rh_setpoint"),
      unit: "%",
      min: 0,
      max: 100,
      step: 0.1,
    },
    {
      kind: "number",
      name: phaseSetpointControl(phase, "co2_setpoint"),
      label: "CO2",
      path: path("co2_setpoint"),
      unit: "ppm",
      min: 0,
      step: 10,
      integer: true,
    },
  ];
}

export const CONTROLS: readonly ControlDefinition[] = [
  {
    kind: "select",
    name: PHASE_CONTROL,
    label: "Growth phase",
    path: ["environment", "current_phase"],
    options: [
      { value: "colonisation", label: "Colonisation" },
      { value: "growing", label: "Growing" },
      { value: "cake", label: "Cake" },
    ],
  },
  {
    kind: "number",
    name: "humidifier.burst_interval",
    label: "Burst interval",
    path: ["humidifier", "burst_interval"],
    unit: "s",
    min: 1,
    step: 1,
  },
  {
    kind: "number",
    name: "humidifier.rh_hysteresis",
    label: "RH hysteresis",
    path: ["humidifier", "rh_hysteresis"],
    unit: "%",
    min: 0,
    step: 0.1,
  },
  { kind: "number", name: "humidifier.pid.Kp", label: "Kp", path: ["humidifier", "pid", "Kp"], step: 0.01 },
  { kind: "number", name: "humidifier.pid.Ki", label: "Ki", path: ["humidifier", "pid", "Ki"], step: 0.001 },
  { kind: "number", name: "humidifier.pid.Kd", label: "Kd", path: ["humidifier", "pid", "Kd"], step: 0.01 },
  ...GROWTH_PHASES.flatMap(phaseSetpointDefinitions),
];

export function isGrowthPhase(value: unknown): value is GrowthPhase {
  return GROWTH_PHASES.some((phase) => phase === value);
}

export const HUMIDIFIER_CONTROLS = ["humidifier.burst_interval", "humidifier.rh_hysteresis"] as const;
export const PID_CONTROLS = ["humidifier.pid.Kp", "humidifier.pid.Ki", "humidifier.pid.Kd"] as const;

export function findControl(name: string): ControlDefinition | undefined {
  return CONTROLS.find((control) => control.name === name);
}

export function controlValuesFromSettings(settings: SettingsDocument): Record<string, string> {
  const values: Record<string, string> = {};
  for (const control of CONTROLS) {
    const raw = readPath(settings, control.path);
    if (typeof raw === "string" && raw.trim()) {
      values[control.name] = raw.trim();
    } else if (typeof raw === "number" && Number.isFinite(raw)) {
      values[control.name] = String(raw);
    }
  }
  return values;
}

export function validateControlValue(name: string, value: string): string | null {
  const control = findControl(name);
  if (!control) {
    return `Unknown control "${name}"`;
  }
  if (control.kind === "select") {
    return control.options.some((option) => option.value === value)
      ? null
      : `"${value}" is not a valid ${control.label.toLowerCase()}`;
  }
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (!trimmed || !Number.isFinite(parsed)) {
    return `${control.label} must be a number`;
  }
  if (control.min !== undefined && parsed < control.min) {
    return `${control.label} must be at least ${control.min}`;
  }
  if (control.max !== undefined && parsed > control.max) {
    return `${control.label} must be at most ${control.max}`;
  }
  if (control.integer && !Number.isInteger(parsed)) {
    return `${control.label} must be a whole number`;
  }
  return null;
}

function readPath(source: unknown, path: readonly string[]): unknown {
  let cursor: unknown = source;
  for (const key of path) {
    if (!isRecord(cursor)) {
      return undefined;
    }
    cursor = cursor[key];
  }
  return cursor;
}

export function writePath(target: Record<string, unknown>, path: readonly string[], value: unknown): void {
  let cursor = target;
  path.forEach((key, index) => {
    if (index === path.length - 1) {
      cursor[key] = value;
      return;
    }
    const next = cursor[key];
    if (isRecord(next)) {
      cursor = next;
    } else {
      const created: Record<string, unknown> = {};
      cursor[key] = created;
      cursor = created;
    }
  });
}
