/**
 * packages/core/src/views/desktop.ts — Background surface that owns the windows.
 *
 * Why: The desktop is a Group whose children are windows in z-order (last is
 * topmost). It differs from a plain group in how it routes input:
 *
 *   - mouse hit-testing walks windows topmost-first
 *   - mouse-down on a lower window brings it to the front and focuses it
 *   - after a mouse-down, moves and the matching mouse-up go to the same window
 *     (capture), so drags keep working when the pointer leaves it
 *   - keyboard and command events reach the focused window first; Tab only
 *     cycles windows when no window consumed it
 *   - a CM_CLOSE coming back from a window removes that window
 */

import { CM_CLOSE } from "../commands/commands.js";
import {
  type EventSlot,
  type MouseEvent,
  clearEvent,
  isCommand,
  isKey,
  isMouseEvent,
} from "../events/event.js";
import { type Rect, contains } from "../geometry/rect.js";
import { KB_SHIFT_TAB, KB_TAB } from "../input/keyCodes.js";
import { DESKTOP_ATTR } from "../terminal/palette.js";
import { Group, NO_FOCUS } from "./group.js";
import type { View } from "./view.js";

export const DESKTOP_PATTERN = "░";

export class Desktop extends Group {
  private capture: View | null = null;

  constructor(bounds: Rect) {
    super(bounds, { background: DESKTOP_ATTR, fillChar: DESKTOP_PATTERN });
  }

  /** Insert a window; a focusable one becomes the focused window. */
  override add(view: View): number {
    const index = super.add(view);
    if (view.canFocus()) this.setFocusTo(index);
    return index;
  }

  override remove(view: View): boolean {
    if (this.capture === view) this.capture = null;
    return super.remove(view);
  }

  /** Forget the window holding the mouse, e.g. when a modal loop takes over the input. */
  releaseCapture(): void {
    this.capture = null;
  }

  /** Remove `view` and focus the new topmost focusable window. */
  closeWindow(view: View): boolean {
    if (!this.remove(view)) return false;
    for (let i = this.children.length - 1; i >= 0; i--) {
      if (this.setFocusTo(i)) break;
    }
    return true;
  }

  topmost(): View | null {
    return this.children[this.children.length - 1] ?? null;
  }

  /** Move `view` to the end of the z-order, keeping the focused window focused. */
  bringToFront(view: View): void {
    const index = this.children.indexOf(view);
    if (index < 0 || index === this.children.length - 1) return;
    const focusedView = this.focusedChild();
    this.children.splice(index, 1);
    this.children.push(view);
    this.focused = focusedView === null ? NO_FOCUS : this.children.indexOf(focusedView);
  }

  /** Topmost window containing the pointer. */
  windowAt(pos: { x: number; y: number }): View | null {
    for (let i = this.children.length - 1; i >= 0; i--) {
      const child = this.children[i];
      if (child !== undefined && contains(child.bounds(), pos)) return child;
    }
    return null;
  }

  override handleEvent(slot: EventSlot): void {
    const ev = slot.event;
    if (isMouseEvent(ev)) {
      this.routeDesktopMouse(ev, slot);
      return;
    }
    if (ev.kind === "keyboard" || ev.kind === "command") {
      const target = this.focusedChild();
      if (target !== null) this.deliver(target, slot);
      if (isKey(slot.event, KB_TAB) || isKey(slot.event, KB_SHIFT_TAB)) super.handleEvent(slot);
      return;
    }
    super.handleEvent(slot);
  }

  private routeDesktopMouse(ev: MouseEvent, slot: EventSlot): void {
    const captured = this.capture;
    if (captured !== null && ev.kind !== "mouseDown") {
      if (ev.kind === "mouseUp") this.capture = null;
      this.deliver(captured, slot);
      return;
    }

    const hit = this.windowAt(ev.pos);
    if (hit === null) return;
    if (ev.kind === "mouseDown") {
      this.bringToFront(hit);
      this.setFocusTo(this.children.indexOf(hit));
      this.capture = hit;
    }
    this.deliver(hit, slot);
  }

  private deliver(target: View, slot: EventSlot): void {
    target.handleEvent(slot);
    if (isCommand(slot.event, CM_CLOSE) && this.children.includes(target)) {
      this.closeWindow(target);
      clearEvent(slot);
    }
  }
}
