/**
 * packages/core/src/views/view.ts — The contract every visual component implements.
 *
 * Why: Containers, windows and the run loop only ever talk to children through
 * this interface. Concrete widgets live outside the core and need nothing
 * beyond it plus the event and command vocabulary.
 *
 * Capability queries (default button, button command, label link) have
 * neutral defaults in BaseView so plain views never implement them.
 */

import type { CommandId } from "../commands/commands.js";
import type { EventSlot } from "../events/event.js";
import { type Rect, rect } from "../geometry/rect.js";
import type { Renderer } from "../terminal/renderer.js";

/* --- State flags --- */

export const SF_SHADOW = 0x008;
export const SF_FOCUSED = 0x040;
export const SF_DRAGGING = 0x080;
export const SF_DISABLED = 0x100;
export const SF_MODAL = 0x200;

export type StateFlags = number;

export interface View {
  /** Absolute screen bounds. */
  bounds(): Rect;
  setBounds(bounds: Rect): void;

  draw(renderer: Renderer): void;

  /** Handle the event in `slot`, replacing it with a command or clearing it when consumed. */
  handleEvent(slot: EventSlot): void;

  canFocus(): boolean;
  setFocus(focused: boolean): void;

  state(): StateFlags;
  setState(flags: StateFlags): void;

  /** Place (or hide) the hardware cursor for the current frame. */
  updateCursor(renderer: Renderer): void;

  isDefaultButton(): boolean;
  /** Command emitted when the view is activated as a button. */
  buttonCommand(): CommandId | null;
  /** Index of a sibling in the same container that this view labels. */
  labelLink(): number | null;

  /** Bounds including any decoration drawn outside `bounds()` (shadows). */
  shadowBounds(): Rect;
}

export function hasState(view: View, flag: StateFlags): boolean {
  return (view.state() & flag) !== 0;
}

export abstract class BaseView implements View {
  protected _bounds: Rect;
  protected _state: StateFlags = 0;

  constructor(bounds: Rect) {
    this._bounds = bounds;
  }

  bounds(): Rect {
    return this._bounds;
  }

  setBounds(bounds: Rect): void {
    this._bounds = bounds;
  }

  abstract draw(renderer: Renderer): void;

  handleEvent(_slot: EventSlot): void {}

  canFocus(): boolean {
    return false;
  }

  setFocus(focused: boolean): void {
    this._state = focused ? this._state | SF_FOCUSED : this._state & ~SF_FOCUSED;
  }

  isFocused(): boolean {
    return (this._state & SF_FOCUSED) !== 0;
  }

  state(): StateFlags {
    return this._state;
  }

  setState(flags: StateFlags): void {
    this._state = flags;
  }

  updateCursor(_renderer: Renderer): void {}

  isDefaultButton(): boolean {
    return false;
  }

  buttonCommand(): CommandId | null {
    return null;
  }

  labelLink(): number | null {
    return null;
  }

  shadowBounds(): Rect {
    const b = this._bounds;
    if ((this._state & SF_SHADOW) === 0) return b;
    return rect(b.a.x, b.a.y, b.b.x + 1, b.b.y + 1);
  }
}
