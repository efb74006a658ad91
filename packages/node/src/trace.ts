/**
 * packages/node/src/trace.ts — NDJSON trace sink.
 *
 * Enable with:
 *   TVCORE_TRACE=1
 *
 * Optional:
 *   TVCORE_TRACE_LOG=/tmp/tvcore-trace.ndjson
 *
 * Defaults:
 * - When TVCORE_TRACE=1 and TVCORE_TRACE_LOG is unset, records are written to
 *   <tmpdir>/tvcore-trace.ndjson so they never mix with terminal output.
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { performance } from "node:perf_hooks";
import { NOOP_TRACE, type TraceRecord, type TraceSink, describeThrown, warnDev } from "@tvcore/core";

export type TraceEnv = Readonly<Record<string, string | undefined>>;

export const DEFAULT_TRACE_FILE = "tvcore-trace.ndjson";

function readEnv(env: TraceEnv, name: string): string | null {
  const raw = env[name];
  if (typeof raw !== "string") return null;
  const value = raw.trim();
  return value.length > 0 ? value : null;
}

function envFlag(env: TraceEnv, name: string, fallback = false): boolean {
  const value = readEnv(env, name);
  if (value === null) return fallback;
  const norm = value.toLowerCase();
  return norm === "1" || norm === "true" || norm === "yes" || norm === "on";
}

/**
 * Append each record as one JSON line with wall-clock and monotonic
 * timestamps. The first failed write disables the sink and warns once.
 */
export function createFileTraceSink(path: string): TraceSink {
  let enabled = true;
  try {
    mkdirSync(dirname(path), { recursive: true });
  } catch (err: unknown) {
    warnDev(`[tvcore] trace disabled: cannot create ${dirname(path)}: ${describeThrown(err)}`);
    enabled = false;
  }

  return (record: TraceRecord) => {
    if (!enabled) return;
    const line = JSON.stringify({
      ts: new Date().toISOString(),
      tMs: Math.round(performance.now() * 1000) / 1000,
      pid: process.pid,
      ...record,
    });
    try {
      appendFileSync(path, `${line}\n`);
    } catch (err: unknown) {
      enabled = false;
      warnDev(`[tvcore] trace disabled: cannot write ${path}: ${describeThrown(err)}`);
    }
  };
}

/** Path the env-configured trace writes to, or null when tracing is off. */
export function traceFileFromEnv(env: TraceEnv = process.env): string | null {
  if (!envFlag(env, "TVCORE_TRACE")) return null;
  return readEnv(env, "TVCORE_TRACE_LOG") ?? join(tmpdir(), DEFAULT_TRACE_FILE);
}

export function traceSinkFromEnv(env: TraceEnv = process.env): TraceSink {
  const path = traceFileFromEnv(env);
  return path === null ? NOOP_TRACE : createFileTraceSink(path);
}
