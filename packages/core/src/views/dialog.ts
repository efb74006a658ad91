/**
 * packages/core/src/views/dialog.ts — Modal window with its own event loop.
 *
 * Why: A dialog blocks the rest of the application until the user picks an
 * outcome. `execute()` runs a nested loop against the host application: it
 * redraws the application behind the dialog, draws the dialog on top, and
 * feeds every input event to the dialog's subtree only. The loop ends at the
 * first command the dialog produces; that command id is the result.
 *
 * Double ESC always ends the modal loop with CM_CANCEL, before any child
 * sees it. Enter, once the window's children had their turn, becomes the
 * default button's command, or is swallowed when the default button is
 * disabled or missing.
 *
 * CM_CLOSE (close control) is reported as CM_CANCEL.
 */

import { CM_CANCEL, CM_CLOSE, type CommandId } from "../commands/commands.js";
import type { TraceRecord } from "../debug/trace.js";
import { TvError } from "../errors.js";
import { type EventSlot, type TvEvent, clearEvent, commandEvent, isKey, slotOf } from "../events/event.js";
import type { Rect } from "../geometry/rect.js";
import { KB_ENTER, KB_ESC_ESC } from "../input/keyCodes.js";
import { DIALOG_PALETTE, type WindowPalette } from "../terminal/palette.js";
import type { Renderer } from "../terminal/renderer.js";
import { SF_MODAL, type View } from "./view.js";
import { Window } from "./window.js";

/**
 * What a modal loop needs from the application that owns the screen.
 * Implemented by Application; tests may supply their own.
 */
export interface ModalHost {
  readonly renderer: Renderer;
  /** Draw everything behind the modal view. */
  drawBackground(): void;
  /** Flush the renderer to the terminal. */
  flushFrame(): void;
  /** Wait one poll interval for the next decoded event. */
  nextEvent(): Promise<TvEvent | null>;
  /** Broadcast CM_COMMAND_SET_CHANGED if the command set is dirty, including to `extra`. */
  deliverCommandSetChanges(extra?: View): void;
  trace(record: TraceRecord): void;
}

export type DialogExecuteOptions = Readonly<{
  /**
   * Called with every command except cancel before it ends the loop. Return
   * true to absorb it and keep the dialog open.
   */
  handleCommand?: ((command: CommandId) => boolean) | undefined;
}>;

export type DialogOptions = Readonly<{
  palette?: WindowPalette | undefined;
  shadow?: boolean | undefined;
}>;

export class Dialog extends Window {
  private executing = false;
  private result: CommandId = CM_CANCEL;

  constructor(bounds: Rect, title: string, opts: DialogOptions = {}) {
    super(bounds, title, { palette: opts.palette ?? DIALOG_PALETTE, shadow: opts.shadow });
  }

  /** Command that ended the most recent execute(). */
  lastResult(): CommandId {
    return this.result;
  }

  isExecuting(): boolean {
    return this.executing;
  }

  override handleEvent(slot: EventSlot): void {
    super.handleEvent(slot);
    const ev = slot.event;
    if (ev.kind !== "keyboard") return;
    if (ev.code === KB_ESC_ESC) {
      slot.event = commandEvent(CM_CANCEL);
      return;
    }
    if (ev.code === KB_ENTER) {
      const command = this.defaultButtonCommand();
      if (command === null) clearEvent(slot);
      else slot.event = commandEvent(command);
    }
  }

  /** Command of the first default button, or null when it is missing or cannot take focus. */
  defaultButtonCommand(): CommandId | null {
    for (let i = 0; i < this.childCount(); i++) {
      const child = this.childAt(i);
      if (child === null || !child.isDefaultButton()) continue;
      return child.canFocus() ? child.buttonCommand() : null;
    }
    return null;
  }

  /**
   * Run the dialog modally on top of `host` and resolve with the command that
   * ended it. The dialog's SF_MODAL bit is set for the duration and cleared on
   * every exit path.
   */
  async execute(host: ModalHost, opts: DialogExecuteOptions = {}): Promise<CommandId> {
    if (this.executing) {
      throw new TvError("TV_REENTRANT_CALL", "Dialog.execute: dialog is already executing");
    }
    this.executing = true;
    this.result = CM_CANCEL;
    const hadModal = (this._state & SF_MODAL) !== 0;
    this._state |= SF_MODAL;
    if (!this.isFocused()) this.setFocus(true);
    host.trace({ scope: "dialog", event: "execute", data: { title: this.title() } });

    try {
      for (;;) {
        host.deliverCommandSetChanges(this);
        host.drawBackground();
        this.draw(host.renderer);
        this.updateCursor(host.renderer);
        host.flushFrame();

        const ev = await host.nextEvent();
        if (ev === null) continue;
        if (isKey(ev, KB_ESC_ESC)) {
          this.result = CM_CANCEL;
          break;
        }

        const slot = slotOf(ev);
        this.handleEvent(slot);
        if (slot.event.kind !== "command") continue;

        const command = slot.event.command === CM_CLOSE ? CM_CANCEL : slot.event.command;
        if (command !== CM_CANCEL && opts.handleCommand?.(command) === true) continue;
        this.result = command;
        break;
      }
    } finally {
      if (!hadModal) this._state &= ~SF_MODAL;
      this.executing = false;
    }

    host.trace({ scope: "dialog", event: "result", data: { command: this.result } });
    return this.result;
  }
}
