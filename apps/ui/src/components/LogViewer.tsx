import { useEffect, useRef } from "react";

import { useLogStream } from "../hooks/useLogStream";
import { CollapsibleTile } from "./CollapsibleTile";

const STATE_LABELS = {
  closed: "Closed",
  connecting: "Connecting…",
  open: "Live",
  errored: "Reconnecting…",
} as const;

export function LogViewer() {
  const { logs, connection, capacity } = useLogStream();
  const listRef = useRef<HTMLOListElement | null>(null);

  // Follow the tail.
  useEffect(() => {
    const list = listRef.current;
    if (list) {
      list.scrollTop = list.scrollHeight;
    }
  }, [logs]);

  return (
    <CollapsibleTile
      id="system-logs"
      title="System Logs"
      subtitle={`${logs.length} / ${capacity} lines`}
      className="lg:col-span-2"
      actions={
        <span className="text-xs text-emerald-200/70" role="status">
          {STATE_LABELS[connection.state]}
        </span>
      }
    >
      {logs.length === 0 ? (
        <p className="text-sm text-emerald-200/60">Waiting for log lines…</p>
      ) : (
        <ol
          ref={listRef}
          aria-label="Log lines"
          className="max-h-96 overflow-y-auto rounded-lg border border-emerald-900/60 bg-black/40 p-3 font-mono text-xs leading-relaxed text-emerald-100"
        >
          {logs.map((line, index) => (
            // Lines carry no identity beyond their position.
            <li key={index} className="whitespace-pre-wrap break-words">
              {line}
            </li>
          ))}
        </ol>
      )}
      {connection.state === "errored" && connection.error ? (
        <p className="mt-3 text-xs text-rose-300" role="alert">
          {connection.error} (attempt {connection.reconnectAttempts})
        </p>
      ) : null}
    </CollapsibleTile>
  );
}
