import { useState, type FormEvent } from "react";
import { findControl } from "@shroombox/sdk";

import { useControl } from "../hooks/useControl";

type NumericControlFieldProps = {
  name: string;
};

export function NumericControlField({ name }: NumericControlFieldProps) {
  const definition = findControl(name);
  const { value, pending, error, submit } = useControl(name);
  const [draft, setDraft] = useState<string | null>(null);

  if (!definition || definition.kind !== "number") {
    return null;
  }

  const inputId = `control-${name.replace(/\./g, "-")}`;

  const handleSubmit = async (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    if (draft === null) {
      return;
    }
    const outcome = await submit(draft);
    if (outcome !== null) {
      setDraft(null);
    }
  };

  return (
    <form className="space-y-1" noValidate onSubmit={(event) => void handleSubmit(event)}>
      <label htmlFor={inputId} className="block text-xs font-medium text-emerald-200/80">
        {definition.label}
        {definition.unit ? ` (${definition.unit})` : ""}
      </label>
      <div className="flex gap-2">
        <input
          id={inputId}
          type="number"
          inputMode="decimal"
          step={definition.step ?? "any"}
          min={definition.min}
          max={definition.max}
          value={draft ?? value ?? ""}
          onChange={(event) => setDraft(event.target.value)}
          aria-invalid={error ? true : undefined}
          className="w-full rounded-lg border border-emerald-800/60 bg-emerald-950/60 px-3 py-1.5 text-sm text-emerald-50 focus:border-emerald-400 focus:outline-none"
        />
        <button
          type="submit"
          disabled={draft === null}
          className="rounded-lg bg-emerald-600 px-3 py-1.5 text-sm font-medium text-white transition hover:bg-emerald-500 disabled:cursor-not-allowed disabled:opacity-50"
        >
          Set
        </button>
      </div>
      {pending ? <p className="text-xs text-amber-300">Saving…</p> : null}
      {error ? (
        <p className="text-xs text-rose-300" role="alert">
          {error}
        </p>
      ) : null}
    </form>
  );
}
