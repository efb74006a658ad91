/**
 * packages/core/src/errors.ts — Runtime error type and diagnostic helpers.
 *
 * Why: Every failure the runtime surfaces to callers is a TvError carrying a
 * stable code, so hosts can branch on `err.code` instead of message text.
 * Idle conditions (poll timeouts, clipped writes, unknown escape sequences)
 * are not errors and never reach this module.
 */

/**
 * Stable error codes.
 *
 * - TV_IO_ERROR: terminal setup, teardown, or flush output failed
 * - TV_INVALID_STATE: an operation was called in a lifecycle state that forbids it
 * - TV_INVALID_PROPS: configuration or arguments failed validation
 * - TV_REENTRANT_CALL: a run loop or modal loop was entered while already running
 */
export type TvErrorCode =
  | "TV_IO_ERROR"
  | "TV_INVALID_STATE"
  | "TV_INVALID_PROPS"
  | "TV_REENTRANT_CALL";

export class TvError extends Error {
  override readonly name = "TvError";
  readonly code: TvErrorCode;

  constructor(code: TvErrorCode, message?: string, options?: Readonly<{ cause?: unknown }>) {
    super(message ?? code, options?.cause === undefined ? undefined : { cause: options.cause });
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TvError);
    }
  }
}

export function isTvError(v: unknown, code?: TvErrorCode): v is TvError {
  if (!(v instanceof TvError)) return false;
  return code === undefined || v.code === code;
}

/** Render an unknown thrown value as a single diagnostic line. */
export function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  return String(v);
}

export function warnDev(message: string): void {
  const c = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  c?.warn?.(message);
}
