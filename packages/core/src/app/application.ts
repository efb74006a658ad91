/**
 * packages/core/src/app/application.ts — Top-level run loop.
 *
 * Why: The application owns the renderer, the input decoder and the desktop,
 * plus an optional menu bar and status line (any View). Each iteration:
 *
 *   1. broadcast CM_COMMAND_SET_CHANGED if the command set is dirty
 *   2. draw desktop, menu bar, status line; place the cursor; flush
 *   3. wait one poll interval for input and decode it
 *   4. dispatch: menu bar -> desktop -> status line, stopping once consumed
 *   5. apply application rules: CM_QUIT and quit keys stop the loop, other
 *      unclaimed commands go to `onCommand`
 *
 * The backend is stopped on every exit path, so the terminal is restored even
 * when a view or command handler throws.
 *
 * @example
 * ```ts
 * const app = new Application({ backend, onCommand: async (cmd, app) => {
 *   if (cmd === CM_ABOUT) await aboutDialog().execute(app);
 * } });
 * app.desktop.add(new Window(rect(2, 1, 40, 12), "Notes"));
 * await app.run();
 * ```
 */

import { CM_COMMAND_SET_CHANGED, CM_QUIT, type CommandId } from "../commands/commands.js";
import { type CommandSet, defaultCommandSet } from "../commands/commandSet.js";
import { NOOP_TRACE, type TraceRecord, type TraceSink } from "../debug/trace.js";
import { TvError } from "../errors.js";
import {
  type EventSlot,
  type TvEvent,
  broadcastEvent,
  commandEvent,
  slotOf,
} from "../events/event.js";
import { type Rect, rect } from "../geometry/rect.js";
import { type InputDecoder, createInputDecoder } from "../input/decoder.js";
import type { TerminalBackend } from "../terminal/backend.js";
import { Renderer } from "../terminal/renderer.js";
import { Desktop } from "../views/desktop.js";
import type { ModalHost } from "../views/dialog.js";
import type { View } from "../views/view.js";
import { type AppConfig, type ResolvedAppConfig, resolveAppConfig } from "./config.js";

export type CommandHandler = (command: CommandId, app: Application) => void | Promise<void>;

export type ApplicationOptions = Readonly<{
  backend: TerminalBackend;
  config?: AppConfig | undefined;
  /** Defaults to the process-wide set. */
  commandSet?: CommandSet | undefined;
  menuBar?: View | undefined;
  statusLine?: View | undefined;
  /** Receives commands no view consumed (other than CM_QUIT). */
  onCommand?: CommandHandler | undefined;
  trace?: TraceSink | undefined;
}>;

function desktopBounds(cols: number, rows: number, cfg: ResolvedAppConfig): Rect {
  const top = cfg.reserveMenuRow ? 1 : 0;
  const bottom = cfg.reserveStatusRow ? rows - 1 : rows;
  return rect(0, top, cols, Math.max(top, bottom));
}

export class Application implements ModalHost {
  readonly renderer: Renderer;
  readonly desktop: Desktop;
  readonly commands: CommandSet;

  private readonly backend: TerminalBackend;
  private readonly config: ResolvedAppConfig;
  private readonly decoder: InputDecoder;
  private readonly traceSink: TraceSink;
  private readonly onCommand: CommandHandler | null;
  private readonly pending: TvEvent[] = [];
  private menuBar: View | null;
  private statusLine: View | null;
  private running = false;
  private activeBounds: Rect | null = null;

  constructor(opts: ApplicationOptions) {
    this.backend = opts.backend;
    this.config = resolveAppConfig(opts.config);
    this.commands = opts.commandSet ?? defaultCommandSet();
    this.traceSink = opts.trace ?? NOOP_TRACE;
    this.onCommand = opts.onCommand ?? null;
    this.decoder = createInputDecoder();

    const { cols, rows } = this.backend.size();
    this.renderer = new Renderer(cols, rows, this.backend);
    this.desktop = new Desktop(desktopBounds(cols, rows, this.config));
    this.menuBar = opts.menuBar ?? null;
    this.statusLine = opts.statusLine ?? null;
  }

  /* ========== Lifecycle ========== */

  isRunning(): boolean {
    return this.running;
  }

  /** Stop the loop after the current iteration. */
  quit(): void {
    this.running = false;
  }

  async run(): Promise<void> {
    if (this.running) {
      throw new TvError("TV_REENTRANT_CALL", "Application.run: already running");
    }
    this.running = true;
    try {
      await this.backend.start();
      this.renderer.invalidate();
      this.trace({ scope: "app", event: "start", data: { cols: this.renderer.cols, rows: this.renderer.rows } });
      while (this.running) {
        await this.tick();
      }
    } finally {
      this.running = false;
      this.decoder.reset();
      this.pending.length = 0;
      await this.backend.stop();
      this.trace({ scope: "app", event: "stop" });
    }
  }

  /** Leave raw/alternate-screen mode, e.g. before handing the terminal to a child process. */
  async suspend(): Promise<void> {
    await this.backend.suspend();
    this.trace({ scope: "app", event: "suspend" });
  }

  /** Re-enter raw/alternate-screen mode; the next frame repaints every cell. */
  async resume(): Promise<void> {
    await this.backend.resume();
    this.renderer.invalidate();
    this.trace({ scope: "app", event: "resume" });
  }

  /* ========== Views ========== */

  setMenuBar(view: View | null): void {
    this.menuBar = view;
  }

  setStatusLine(view: View | null): void {
    this.statusLine = view;
  }

  /** Shadow bounds of the topmost desktop window as of the last frame. */
  activeViewBounds(): Rect | null {
    return this.activeBounds;
  }

  /* ========== Loop ========== */

  /** One draw/poll/dispatch iteration. Exposed for hosts that drive the loop themselves. */
  async tick(): Promise<void> {
    this.deliverCommandSetChanges();
    this.activeBounds = this.desktop.topmost()?.shadowBounds() ?? null;
    this.drawBackground();
    this.desktop.updateCursor(this.renderer);
    this.flushFrame();

    const ev = await this.nextEvent();
    if (ev !== null) await this.dispatch(ev);
  }

  /** Route one event through the tree and apply application rules. */
  async dispatch(ev: TvEvent): Promise<void> {
    const slot = slotOf(ev);
    this.route(slot);

    const out = slot.event;
    if (out.kind === "keyboard" && this.config.quitKeys.includes(out.code)) {
      slot.event = commandEvent(CM_QUIT);
    }
    if (slot.event.kind !== "command") return;

    const command = slot.event.command;
    if (command === CM_QUIT) {
      this.running = false;
      return;
    }
    if (this.onCommand === null) return;
    // The handler may run a dialog, which would swallow the pending mouse-up.
    this.desktop.releaseCapture();
    await this.onCommand(command, this);
  }

  // A command produced by the menu bar still passes through the desktop on
  // its way out, so the focused window can claim it.
  private route(slot: EventSlot): void {
    for (const target of [this.menuBar, this.desktop, this.statusLine]) {
      if (target === null) continue;
      target.handleEvent(slot);
      if (slot.event.kind === "nothing") return;
    }
  }

  /* ========== ModalHost ========== */

  drawBackground(): void {
    this.desktop.draw(this.renderer);
    this.menuBar?.draw(this.renderer);
    this.statusLine?.draw(this.renderer);
  }

  flushFrame(): void {
    const stats = this.renderer.flush();
    if (stats.runs > 0) this.trace({ scope: "frame", event: "flush", data: stats });
  }

  async nextEvent(): Promise<TvEvent | null> {
    const queued = this.pending.shift();
    if (queued !== undefined) return queued;

    const input = await this.backend.poll(this.config.pollTimeoutMs);
    if (input === null) {
      this.pending.push(...this.decoder.timeout());
    } else if (input.kind === "resize") {
      this.resize(input.cols, input.rows);
    } else {
      this.pending.push(...this.decoder.feed(input.data));
    }
    return this.pending.shift() ?? null;
  }

  deliverCommandSetChanges(extra?: View): void {
    if (!this.commands.isDirty()) return;
    this.commands.clearDirty();
    const ev = broadcastEvent(CM_COMMAND_SET_CHANGED);
    for (const target of [this.menuBar, this.desktop, this.statusLine, extra ?? null]) {
      target?.handleEvent(slotOf(ev));
    }
    this.trace({ scope: "commands", event: "broadcast", data: { disabled: this.commands.disabled() } });
  }

  trace(record: TraceRecord): void {
    this.traceSink(record);
  }

  private resize(cols: number, rows: number): void {
    this.renderer.resize(cols, rows);
    this.desktop.setBounds(desktopBounds(cols, rows, this.config));
    this.menuBar?.setBounds(rect(0, 0, cols, 1));
    this.statusLine?.setBounds(rect(0, rows - 1, cols, rows));
    this.trace({ scope: "app", event: "resize", data: { cols, rows } });
  }
}
