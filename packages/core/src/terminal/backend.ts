/**
 * Terminal backend contract between the runtime and a host platform.
 *
 * The core never touches streams, TTY modes, or timers directly: it draws into
 * a Renderer whose sink is `write()`, and it waits for input only through
 * `poll()`. `@tvcore/node` implements this for a real TTY;
 * `@tvcore/core/testing` ships a scripted implementation.
 */

export type TerminalSize = Readonly<{ cols: number; rows: number }>;

/**
 * One unit of raw input.
 *
 * - data: bytes from the terminal, decoded as UTF-8 text (may hold several keys
 *   or a partial escape sequence)
 * - resize: the terminal changed size
 */
export type BackendInput =
  | Readonly<{ kind: "data"; data: string }>
  | Readonly<{ kind: "resize"; cols: number; rows: number }>;

export interface TerminalBackend {
  /**
   * Enter raw mode and the alternate screen, hide the cursor, enable mouse
   * reporting. Rejects with a TvError("TV_IO_ERROR") if the terminal cannot
   * be configured.
   */
  start(): Promise<void>;

  /**
   * Undo everything `start()` did, in reverse order. Idempotent.
   */
  stop(): Promise<void>;

  /**
   * Leave raw and alternate-screen mode temporarily (e.g. to run a shell)
   * without releasing input listeners.
   */
  suspend(): Promise<void>;

  /**
   * Re-enter the modes left by `suspend()`. The screen contents are lost; the
   * caller repaints everything.
   */
  resume(): Promise<void>;

  size(): TerminalSize;

  /**
   * Write one rendered frame. Synchronous so the renderer knows the frame is
   * out before it commits its previous-buffer. Throws on I/O failure.
   */
  write(chunk: string): void;

  /**
   * Wait up to `timeoutMs` for input. Resolves with `null` on timeout, which
   * is also the signal the input decoder uses to resolve a lone ESC.
   */
  poll(timeoutMs: number): Promise<BackendInput | null>;
}
