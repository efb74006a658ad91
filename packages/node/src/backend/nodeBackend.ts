/**
 * packages/node/src/backend/nodeBackend.ts — Terminal backend over Node streams.
 *
 * Why: The core only sees the TerminalBackend contract. This module owns the
 * terminal modes (raw input, alternate screen, hidden cursor, mouse
 * reporting) and turns stream events into polled inputs:
 *
 *   - stdin "data"     -> data input
 *   - stdout "resize"  -> resize input
 *   - stream "error"   -> TV_IO_ERROR on the next poll() or write()
 *
 * Terminal modes are restored by stop(), by suspend(), and by a process
 * "exit" hook installed while the backend is started.
 */

import { type BackendInput, type TerminalBackend, type TerminalSize, TvError, ansi } from "@tvcore/core";
import terminalSize from "terminal-size";

export type NodeInputStream = NodeJS.ReadableStream &
  Readonly<{
    isTTY?: boolean;
    isRaw?: boolean;
    setRawMode?: (mode: boolean) => unknown;
  }>;

export type NodeOutputStream = NodeJS.WritableStream &
  Readonly<{
    columns?: number;
    rows?: number;
  }>;

export type NodeBackendConfig = Readonly<{
  stdin?: NodeInputStream | undefined;
  stdout?: NodeOutputStream | undefined;
  /** Enable SGR mouse reporting. Default true. */
  mouse?: boolean | undefined;
  /** Draw on the alternate screen. Default true. */
  altScreen?: boolean | undefined;
}>;

export type NodeBackend = TerminalBackend &
  Readonly<{
    isStarted: () => boolean;
    isSuspended: () => boolean;
  }>;

const FALLBACK_SIZE: TerminalSize = Object.freeze({ cols: 80, rows: 24 });

type PollWaiter = Readonly<{
  resolve: (input: BackendInput | null) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}>;

function toPositiveIntOr(v: unknown, fallback: number): number {
  if (typeof v !== "number" || !Number.isInteger(v) || v <= 0) return fallback;
  return v;
}

function fallbackSize(): TerminalSize {
  try {
    const size = terminalSize();
    return {
      cols: toPositiveIntOr(size.columns, FALLBACK_SIZE.cols),
      rows: toPositiveIntOr(size.rows, FALLBACK_SIZE.rows),
    };
  } catch {
    return FALLBACK_SIZE;
  }
}

/** Size reported by the output stream, then by the controlling terminal, then 80x24. */
export function readTerminalSize(stdout: NodeOutputStream): TerminalSize {
  const cols = toPositiveIntOr(stdout.columns, 0);
  const rows = toPositiveIntOr(stdout.rows, 0);
  if (cols > 0 && rows > 0) return { cols, rows };
  const fallback = fallbackSize();
  return { cols: cols > 0 ? cols : fallback.cols, rows: rows > 0 ? rows : fallback.rows };
}

function ioError(detail: string, cause: unknown): TvError {
  return new TvError("TV_IO_ERROR", detail, { cause });
}

class NodeTerminalBackend implements NodeBackend {
  private readonly stdin: NodeInputStream;
  private readonly stdout: NodeOutputStream;
  private readonly mouse: boolean;
  private readonly altScreen: boolean;

  private queue: BackendInput[] = [];
  private waiters: PollWaiter[] = [];
  private streamError: TvError | null = null;
  private started = false;
  private suspended = false;
  private rawModeSet = false;

  constructor(config: NodeBackendConfig) {
    this.stdin = config.stdin ?? process.stdin;
    this.stdout = config.stdout ?? process.stdout;
    this.mouse = config.mouse ?? true;
    this.altScreen = config.altScreen ?? true;
  }

  isStarted(): boolean {
    return this.started;
  }

  isSuspended(): boolean {
    return this.suspended;
  }

  async start(): Promise<void> {
    if (this.started) {
      throw new TvError("TV_INVALID_STATE", "NodeBackend.start: already started");
    }
    this.streamError = null;
    this.stdin.setEncoding("utf8");
    this.stdin.on("data", this.onData);
    this.stdin.on("error", this.onError);
    this.stdout.on("resize", this.onResize);
    this.stdout.on("error", this.onError);
    process.on("exit", this.onExit);
    this.started = true;
    this.suspended = false;
    try {
      this.enterModes();
    } catch (err: unknown) {
      await this.stop();
      throw err;
    }
  }

  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;
    process.off("exit", this.onExit);
    this.stdin.off("data", this.onData);
    this.stdin.off("error", this.onError);
    this.stdout.off("resize", this.onResize);
    this.stdout.off("error", this.onError);

    for (const w of this.waiters) {
      clearTimeout(w.timer);
      w.resolve(null);
    }
    this.waiters = [];
    this.queue = [];

    if (!this.suspended) this.leaveModes();
    this.suspended = false;
  }

  async suspend(): Promise<void> {
    if (!this.started || this.suspended) return;
    this.leaveModes();
    this.suspended = true;
  }

  async resume(): Promise<void> {
    if (!this.started || !this.suspended) return;
    this.suspended = false;
    this.enterModes();
  }

  size(): TerminalSize {
    return readTerminalSize(this.stdout);
  }

  write(chunk: string): void {
    if (this.streamError !== null) throw this.streamError;
    try {
      this.stdout.write(chunk);
    } catch (err: unknown) {
      throw ioError("NodeBackend.write: output stream rejected the frame", err);
    }
  }

  poll(timeoutMs: number): Promise<BackendInput | null> {
    const next = this.queue.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.streamError !== null) return Promise.reject(this.streamError);
    if (!this.started) return Promise.resolve(null);

    return new Promise<BackendInput | null>((resolve, reject) => {
      const waiter: PollWaiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          resolve(null);
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  /* ========== Terminal modes ========== */

  private enterModes(): void {
    const { stdin } = this;
    if (stdin.isTTY === true && typeof stdin.setRawMode === "function" && stdin.isRaw !== true) {
      try {
        stdin.setRawMode(true);
      } catch (err: unknown) {
        throw ioError("NodeBackend: failed to enable raw mode", err);
      }
      this.rawModeSet = true;
    }
    stdin.resume();

    let seq = "";
    if (this.altScreen) seq += ansi.ENTER_ALT_SCREEN;
    seq += ansi.HIDE_CURSOR;
    if (this.mouse) seq += ansi.ENABLE_MOUSE;
    seq += ansi.CLEAR_SCREEN;
    this.write(seq);
  }

  // Reverse order of enterModes(). Also runs from the exit hook, so it must
  // stay synchronous.
  private leaveModes(): void {
    let seq = "";
    if (this.mouse) seq += ansi.DISABLE_MOUSE;
    seq += ansi.RESET_ATTRS + ansi.SHOW_CURSOR;
    if (this.altScreen) seq += ansi.LEAVE_ALT_SCREEN;
    if (this.streamError === null) this.stdout.write(seq);

    this.stdin.pause();
    if (this.rawModeSet && typeof this.stdin.setRawMode === "function") {
      this.stdin.setRawMode(false);
    }
    this.rawModeSet = false;
  }

  /* ========== Stream events ========== */

  private enqueue(input: BackendInput): void {
    const w = this.waiters.shift();
    if (w !== undefined) {
      clearTimeout(w.timer);
      w.resolve(input);
      return;
    }
    this.queue.push(input);
  }

  private readonly onData = (chunk: string | Buffer): void => {
    const data = typeof chunk === "string" ? chunk : chunk.toString("utf8");
    if (data.length > 0) this.enqueue({ kind: "data", data });
  };

  private readonly onResize = (): void => {
    const { cols, rows } = this.size();
    this.enqueue({ kind: "resize", cols, rows });
  };

  private readonly onError = (err: Error): void => {
    if (this.streamError !== null) return;
    this.streamError = ioError(`NodeBackend: stream error: ${err.message}`, err);
    for (const w of this.waiters) {
      clearTimeout(w.timer);
      w.reject(this.streamError);
    }
    this.waiters = [];
  };

  private readonly onExit = (): void => {
    if (this.started && !this.suspended) this.leaveModes();
  };
}

export function createNodeBackend(config: NodeBackendConfig = {}): NodeBackend {
  return new NodeTerminalBackend(config);
}
