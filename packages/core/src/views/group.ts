/**
 * packages/core/src/views/group.ts — Container view with focus and event routing.
 *
 * Why: Windows, dialogs and the desktop are all groups of owned children. The
 * group converts child bounds to absolute coordinates on insertion, clips its
 * children while drawing, and decides which child sees each event.
 *
 * Routing rules:
 *   - Tab / Shift-Tab cycle focus among focusable children (wrapping) and are consumed
 *   - Mouse events go to the first child containing the pointer; mouse-down focuses it
 *   - Mouse-down on a label focuses the sibling it links to
 *   - Keyboard and command events go to the focused child only
 *   - Broadcasts reach every child, each with its own copy of the slot
 *
 * Invariant: at most one child carries SF_FOCUSED; `focused` is -1 when none does.
 */

import { KB_SHIFT_TAB, KB_TAB } from "../input/keyCodes.js";
import {
  type EventSlot,
  type MouseEvent,
  clearEvent,
  isMouseEvent,
  slotOf,
} from "../events/event.js";
import { type Rect, contains, intersects, translate } from "../geometry/rect.js";
import type { Attr } from "../terminal/palette.js";
import type { Renderer } from "../terminal/renderer.js";
import { BaseView, SF_FOCUSED, type View, hasState } from "./view.js";

export const NO_FOCUS = -1;

export type GroupOptions = Readonly<{
  /** Fill the group's bounds before drawing children. */
  background?: Attr | undefined;
  fillChar?: string | undefined;
}>;

export class Group extends BaseView {
  protected readonly children: View[] = [];
  protected focused = NO_FOCUS;
  private readonly background: Attr | null;
  private readonly fillChar: string;

  constructor(bounds: Rect, opts: GroupOptions = {}) {
    super(bounds);
    this.background = opts.background ?? null;
    this.fillChar = opts.fillChar ?? " ";
  }

  /* ========== Children ========== */

  /**
   * Insert `view`, converting its bounds from group-relative to absolute.
   * Returns the child's index.
   */
  add(view: View): number {
    const origin = this._bounds.a;
    view.setBounds(translate(view.bounds(), origin.x, origin.y));
    this.children.push(view);
    return this.children.length - 1;
  }

  /** Remove `view`; the focus index keeps tracking the same focused child. */
  remove(view: View): boolean {
    const index = this.children.indexOf(view);
    if (index < 0) return false;
    if (index === this.focused) {
      view.setFocus(false);
      this.focused = NO_FOCUS;
    } else if (index < this.focused) {
      this.focused--;
    }
    this.children.splice(index, 1);
    return true;
  }

  childCount(): number {
    return this.children.length;
  }

  childAt(index: number): View | null {
    return this.children[index] ?? null;
  }

  indexOf(view: View): number {
    return this.children.indexOf(view);
  }

  focusedIndex(): number {
    return this.focused;
  }

  focusedChild(): View | null {
    return this.children[this.focused] ?? null;
  }

  /* ========== Focus ========== */

  /** Focus child `index` if it can take focus. Returns whether focus is now there. */
  setFocusTo(index: number): boolean {
    const child = this.children[index];
    if (child === undefined || !child.canFocus()) return false;
    if (index === this.focused) return true;
    this.focusedChild()?.setFocus(false);
    this.focused = index;
    child.setFocus(true);
    return true;
  }

  /** Focus the first focusable child, replacing any current focus. */
  setInitialFocus(): void {
    for (let i = 0; i < this.children.length; i++) {
      if (this.children[i]?.canFocus() === true) {
        this.setFocusTo(i);
        return;
      }
    }
  }

  clearAllFocus(): void {
    for (const child of this.children) {
      if (hasState(child, SF_FOCUSED)) child.setFocus(false);
    }
    this.focused = NO_FOCUS;
  }

  selectNext(): void {
    this.cycleFocus(1);
  }

  selectPrevious(): void {
    this.cycleFocus(-1);
  }

  private cycleFocus(dir: 1 | -1): void {
    const n = this.children.length;
    if (n === 0) return;
    const start = this.focused === NO_FOCUS ? (dir === 1 ? -1 : n) : this.focused;
    // A full cycle back to the focused child means nothing else can take focus.
    const steps = this.focused === NO_FOCUS ? n : n - 1;
    for (let step = 1; step <= steps; step++) {
      const index = (((start + dir * step) % n) + n) % n;
      if (this.children[index]?.canFocus() === true) {
        this.setFocusTo(index);
        return;
      }
    }
  }

  /* ========== View ========== */

  override setBounds(bounds: Rect): void {
    const dx = bounds.a.x - this._bounds.a.x;
    const dy = bounds.a.y - this._bounds.a.y;
    this._bounds = bounds;
    if (dx === 0 && dy === 0) return;
    for (const child of this.children) {
      child.setBounds(translate(child.bounds(), dx, dy));
    }
  }

  override draw(renderer: Renderer): void {
    if (this.background !== null) {
      renderer.fillRect(this._bounds, this.fillChar, this.background);
    }
    renderer.pushClip(this._bounds);
    try {
      for (const child of this.children) {
        if (intersects(this._bounds, child.bounds())) child.draw(renderer);
      }
    } finally {
      renderer.popClip();
    }
  }

  override handleEvent(slot: EventSlot): void {
    const ev = slot.event;
    switch (ev.kind) {
      case "nothing":
        return;
      case "keyboard":
        if (ev.code === KB_TAB) {
          this.selectNext();
          clearEvent(slot);
          return;
        }
        if (ev.code === KB_SHIFT_TAB) {
          this.selectPrevious();
          clearEvent(slot);
          return;
        }
        break;
      case "broadcast":
        this.broadcast(slot);
        return;
      default:
        if (isMouseEvent(ev) && this.routeMouse(ev, slot)) return;
        break;
    }
    this.focusedChild()?.handleEvent(slot);
  }

  /** Deliver a broadcast to every child, each with a private slot. */
  protected broadcast(slot: EventSlot): void {
    for (const child of this.children) {
      child.handleEvent(slotOf(slot.event));
    }
  }

  /** Returns false when no child contains the pointer. */
  protected routeMouse(ev: MouseEvent, slot: EventSlot): boolean {
    const index = this.children.findIndex((c) => contains(c.bounds(), ev.pos));
    const child = this.children[index];
    if (child === undefined) return false;

    if (ev.kind === "mouseDown") {
      const link = child.labelLink();
      if (link !== null) {
        if (link >= 0 && link < this.children.length) this.setFocusTo(link);
        clearEvent(slot);
        return true;
      }
      if (child.canFocus()) this.setFocusTo(index);
    }
    child.handleEvent(slot);
    return true;
  }

  override updateCursor(renderer: Renderer): void {
    renderer.hideCursor();
    this.focusedChild()?.updateCursor(renderer);
  }
}
