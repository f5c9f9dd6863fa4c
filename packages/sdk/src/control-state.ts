export type PendingControl = {
  value: string;
  token: number;
};

export type ControlValue = {
  confirmed: string | null;
  pending: PendingControl | null;
  error: string | null;
};

export type ControlEvent =
  | { type: "submitted"; value: string; token: number }
  | { type: "accepted"; token: number }
  | { type: "rejected"; token: number; error: string }
  | { type: "synced"; value: string };

export const EMPTY_CONTROL: ControlValue = Object.freeze({
  confirmed: null,
  pending: null,
  error: null,
});

/**
 * Reconciles one control. `accepted` and `rejected` only apply when their
 * token still matches the pending submission; anything else is a superseded
 * result and leaves the control untouched.
 */
export function reduceControl(control: ControlValue, event: ControlEvent): ControlValue {
  switch (event.type) {
    case "submitted":
      return {
        confirmed: control.confirmed,
        pending: { value: event.value, token: event.token },
        error: null,
      };
    case "accepted":
      if (!control.pending || control.pending.token !== event.token) {
        return control;
      }
      return { confirmed: control.pending.value, pending: null, error: null };
    case "rejected":
      if (!control.pending || control.pending.token !== event.token) {
        return control;
      }
      return { confirmed: control.confirmed, pending: null, error: event.error };
    case "synced":
      if (control.confirmed === event.value) {
        return control;
      }
      return { ...control, confirmed: event.value };
  }
}

export function displayValue(control: ControlValue): string | null {
  return control.pending ? control.pending.value : control.confirmed;
}

export function isPending(control: ControlValue): boolean {
  return control.pending !== null;
}
