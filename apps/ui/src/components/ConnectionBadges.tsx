import type { StreamSnapshot, SystemStatus } from "@shroombox/sdk";

type Props = {
  connection: StreamSnapshot;
  status: SystemStatus | null;
  statusError: string | null;
};

type BadgeTone = "ok" | "pending" | "offline" | "idle";

const TONES: Record<BadgeTone, string> = {
  ok: "bg-emerald-500/10 text-emerald-300 border-emerald-600/50",
  pending: "bg-amber-500/10 text-amber-300 border-amber-600/50",
  offline: "bg-rose-500/10 text-rose-300 border-rose-600/50",
  idle: "bg-slate-800 text-slate-300 border-slate-700",
};

export function ConnectionBadges({ connection, status, statusError }: Props) {
  const streamTone: BadgeTone =
    connection.state === "open"
      ? "ok"
      : connection.state === "connecting"
      ? "pending"
      : connection.state === "errored"
      ? "offline"
      : "idle";

  const streamTitle =
    connection.state === "errored"
      ? `${connection.error ?? "Disconnected"} • retry ${connection.reconnectAttempts}`
      : connection.state === "open"
      ? "Streaming"
      : connection.state === "connecting"
      ? "Connecting"
      : "Closed";

  const serviceTone: BadgeTone = statusError ? "offline" : status ? (status.running ? "ok" : "idle") : "pending";
  const serviceTitle = statusError
    ? statusError
    : status
    ? status.running
      ? `Running${status.pid !== null ? ` • pid ${status.pid}` : ""}`
      : "Stopped"
    : "Checking";

  return (
    <div className="flex items-center gap-2 text-xs">
      <Badge label="Logs" tone={streamTone} title={streamTitle} state={connection.state} />
      <Badge label="Service" tone={serviceTone} title={serviceTitle} />
    </div>
  );
}

function Badge({ label, tone, title, state }: { label: string; tone: BadgeTone; title: string; state?: string }) {
  return (
    <span
      className={`inline-flex items-center gap-1 rounded-full border px-2 py-1 ${TONES[tone]}`}
      title={title}
      data-state={state}
      aria-label={`${label}: ${title}`}
    >
      <span className="inline-block h-1.5 w-1.5 rounded-full bg-current" />
      {label}
    </span>
  );
}
