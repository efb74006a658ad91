/**
 * packages/core/src/views/window.ts — Framed, focusable, draggable container.
 *
 * Why: A window is a Frame plus an interior Group inset by one cell. Children
 * added to the window are positioned relative to the interior. Windows cast a
 * drop shadow (SF_SHADOW, on by default) one column right and one row below,
 * drawn by darkening whatever is already on screen there.
 *
 * Mouse behavior:
 *   - mouse-down on the close control  -> command CM_CLOSE (handled by the desktop)
 *   - mouse-down elsewhere on the title row starts a drag (SF_DRAGGING)
 *   - mouse-move while dragging moves the window by the pointer delta
 *   - mouse-up ends the drag
 */

import type { EventSlot } from "../events/event.js";
import { clearEvent, isMouseEvent } from "../events/event.js";
import { type Point, type Rect, grow, translate } from "../geometry/rect.js";
import { WINDOW_PALETTE, type WindowPalette, darkenAttr } from "../terminal/palette.js";
import type { Renderer } from "../terminal/renderer.js";
import { Frame } from "./frame.js";
import { Group, NO_FOCUS } from "./group.js";
import { BaseView, SF_DISABLED, SF_DRAGGING, SF_SHADOW, type View } from "./view.js";

export type WindowOptions = Readonly<{
  palette?: WindowPalette | undefined;
  /** Cast a drop shadow. Defaults to true. */
  shadow?: boolean | undefined;
}>;

export class Window extends BaseView {
  protected readonly frame: Frame;
  protected readonly interior: Group;
  private dragAnchor: Point | null = null;
  private lastFocus = NO_FOCUS;

  constructor(bounds: Rect, title: string, opts: WindowOptions = {}) {
    super(bounds);
    const palette = opts.palette ?? WINDOW_PALETTE;
    this.frame = new Frame(bounds, title, palette);
    this.interior = new Group(grow(bounds, -1, -1), { background: palette.interior });
    this._state = opts.shadow === false ? 0 : SF_SHADOW;
  }

  /* ========== Children ========== */

  /** Insert `view` with bounds relative to the interior's top-left corner. */
  add(view: View): number {
    return this.interior.add(view);
  }

  remove(view: View): boolean {
    return this.interior.remove(view);
  }

  childCount(): number {
    return this.interior.childCount();
  }

  childAt(index: number): View | null {
    return this.interior.childAt(index);
  }

  focusedChild(): View | null {
    return this.interior.focusedChild();
  }

  focusedIndex(): number {
    return this.interior.focusedIndex();
  }

  setFocusTo(index: number): boolean {
    return this.interior.setFocusTo(index);
  }

  setInitialFocus(): void {
    this.interior.setInitialFocus();
  }

  title(): string {
    return this.frame.title();
  }

  setTitle(title: string): void {
    this.frame.setTitle(title);
  }

  /** Interior bounds, where children live. */
  clientBounds(): Rect {
    return this.interior.bounds();
  }

  isDragging(): boolean {
    return (this._state & SF_DRAGGING) !== 0;
  }

  /* ========== View ========== */

  override setBounds(bounds: Rect): void {
    super.setBounds(bounds);
    this.frame.setBounds(bounds);
    this.interior.setBounds(grow(bounds, -1, -1));
  }

  override canFocus(): boolean {
    return (this._state & SF_DISABLED) === 0;
  }

  override setFocus(focused: boolean): void {
    super.setFocus(focused);
    if (focused) {
      if (this.interior.focusedIndex() !== NO_FOCUS) return;
      if (!this.interior.setFocusTo(this.lastFocus)) this.interior.setInitialFocus();
      return;
    }
    this.lastFocus = this.interior.focusedIndex();
    this.interior.clearAllFocus();
  }

  override draw(renderer: Renderer): void {
    this.frame.setActive(this.isFocused());
    this.frame.draw(renderer);
    this.interior.draw(renderer);
    if ((this._state & SF_SHADOW) !== 0) this.drawShadow(renderer);
  }

  /** Darken the column right of and the row below the window. */
  protected drawShadow(renderer: Renderer): void {
    const b = this._bounds;
    for (let y = b.a.y + 1; y <= b.b.y; y++) this.darkenCell(renderer, { x: b.b.x, y });
    for (let x = b.a.x + 1; x < b.b.x; x++) this.darkenCell(renderer, { x, y: b.b.y });
  }

  private darkenCell(renderer: Renderer, pos: Point): void {
    const c = renderer.cellAt(pos);
    if (c !== null) renderer.writeCell(pos, { ch: c.ch, attr: darkenAttr(c.attr) });
  }

  override updateCursor(renderer: Renderer): void {
    this.interior.updateCursor(renderer);
  }

  override handleEvent(slot: EventSlot): void {
    const ev = slot.event;
    if (isMouseEvent(ev)) {
      if (ev.kind === "mouseDown") {
        this.frame.handleEvent(slot);
        if (slot.event !== ev) return;
        if (this.frame.hitsTitleBar(ev.pos)) {
          this._state |= SF_DRAGGING;
          this.dragAnchor = ev.pos;
          clearEvent(slot);
          return;
        }
      } else if (this.dragAnchor !== null) {
        if (ev.kind === "mouseMove") {
          const dx = ev.pos.x - this.dragAnchor.x;
          const dy = ev.pos.y - this.dragAnchor.y;
          if (dx !== 0 || dy !== 0) this.setBounds(translate(this._bounds, dx, dy));
          this.dragAnchor = ev.pos;
        } else {
          this._state &= ~SF_DRAGGING;
          this.dragAnchor = null;
        }
        clearEvent(slot);
        return;
      }
    }
    this.interior.handleEvent(slot);
  }
}
