import { useCallback, useMemo, useState } from "react";
import { useStore } from "zustand";
import {
  displayValue,
  isPending,
  selectControl,
  validateControlValue,
  type ActionOutcome,
} from "@shroombox/sdk";

import { useDashboard } from "../state/DashboardContext";

export type UseControlResult = {
  value: string | null;
  confirmed: string | null;
  pending: boolean;
  error: string | null;
  /** Resolves to null when the value never left the browser because it was invalid. */
  submit: (value: string) => Promise<ActionOutcome | null>;
};

export function useControl(name: string): UseControlResult {
  const { store, controller } = useDashboard();
  const selector = useMemo(() => selectControl(name), [name]);
  const control = useStore(store, selector);
  const [validationError, setValidationError] = useState<string | null>(null);

  const submit = useCallback(
    async (value: string) => {
      const problem = validateControlValue(name, value);
      if (problem) {
        setValidationError(problem);
        return null;
      }
      setValidationError(null);
      return controller.submit(name, value.trim());
    },
    [controller, name]
  );

  return {
    value: displayValue(control),
    confirmed: control.confirmed,
    pending: isPending(control),
    error: validationError ?? control.error,
    submit,
  };
}
