/**
 * packages/core/src/debug/trace.ts — Structured runtime trace hooks.
 *
 * Why: The core stays platform-free, so it cannot open log files. It emits
 * small structured records to a TraceSink supplied by the host; the Node
 * package provides an NDJSON file sink enabled by environment variables.
 */

export type TraceScope = "app" | "frame" | "input" | "commands" | "dialog";

export type TraceRecord = Readonly<{
  scope: TraceScope;
  event: string;
  data?: Readonly<Record<string, unknown>>;
}>;

export type TraceSink = (record: TraceRecord) => void;

export const NOOP_TRACE: TraceSink = () => {};

/** Sink that keeps records in memory; used by tests and debugging tools. */
export function createMemoryTrace(): Readonly<{
  sink: TraceSink;
  records: () => readonly TraceRecord[];
  events: (scope?: TraceScope) => readonly string[];
}> {
  const records: TraceRecord[] = [];
  return Object.freeze({
    sink: (record: TraceRecord) => {
      records.push(record);
    },
    records: () => records.slice(),
    events: (scope?: TraceScope) =>
      records
        .filter((r) => scope === undefined || r.scope === scope)
        .map((r) => `${r.scope}.${r.event}`),
  });
}
