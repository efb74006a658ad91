/**
 * packages/core/src/views/frame.ts — Window border with title and close control.
 *
 * The frame occupies the outermost ring of its window's bounds. It is double
 * lined while the window is active and single lined otherwise; the close
 * control "[■]" sits at columns 2-4 of the top row and is shown only while
 * active.
 */

import { CM_CLOSE } from "../commands/commands.js";
import { type EventSlot, commandEvent } from "../events/event.js";
import { type Point, type Rect, height, width } from "../geometry/rect.js";
import type { WindowPalette } from "../terminal/palette.js";
import type { Renderer } from "../terminal/renderer.js";
import { BaseView } from "./view.js";

type BorderGlyphs = Readonly<{ tl: string; tr: string; bl: string; br: string; h: string; v: string }>;

const DOUBLE: BorderGlyphs = Object.freeze({ tl: "╔", tr: "╗", bl: "╚", br: "╝", h: "═", v: "║" });
const SINGLE: BorderGlyphs = Object.freeze({ tl: "┌", tr: "┐", bl: "└", br: "┘", h: "─", v: "│" });

export const CLOSE_ICON = "[■]";
const CLOSE_OFFSET = 2;
/* Columns kept clear of the title on each side (corner + close icon + gap). */
const TITLE_MARGIN = 6;

export class Frame extends BaseView {
  private _title: string;
  private readonly palette: WindowPalette;
  private active = false;

  constructor(bounds: Rect, title: string, palette: WindowPalette) {
    super(bounds);
    this._title = title;
    this.palette = palette;
  }

  title(): string {
    return this._title;
  }

  setTitle(title: string): void {
    this._title = title;
  }

  setActive(active: boolean): void {
    this.active = active;
  }

  isActive(): boolean {
    return this.active;
  }

  /** Whether `pos` hits the close control of an active frame. */
  hitsClose(pos: Point): boolean {
    if (!this.active || width(this._bounds) < CLOSE_OFFSET + CLOSE_ICON.length + 1) return false;
    const x0 = this._bounds.a.x + CLOSE_OFFSET;
    return pos.y === this._bounds.a.y && pos.x >= x0 && pos.x < x0 + CLOSE_ICON.length;
  }

  /** Whether `pos` is on the title row, where a drag can start. */
  hitsTitleBar(pos: Point): boolean {
    const b = this._bounds;
    return pos.y === b.a.y && pos.x >= b.a.x && pos.x < b.b.x;
  }

  override draw(renderer: Renderer): void {
    const b = this._bounds;
    const w = width(b);
    const h = height(b);
    if (w < 2 || h < 2) return;

    const g = this.active ? DOUBLE : SINGLE;
    const attr = this.active ? this.palette.frameActive : this.palette.framePassive;
    const right = b.b.x - 1;
    const bottom = b.b.y - 1;

    renderer.writeText({ x: b.a.x, y: b.a.y }, `${g.tl}${g.h.repeat(w - 2)}${g.tr}`, attr);
    renderer.writeText({ x: b.a.x, y: bottom }, `${g.bl}${g.h.repeat(w - 2)}${g.br}`, attr);
    for (let y = b.a.y + 1; y < bottom; y++) {
      renderer.writeCell({ x: b.a.x, y }, { ch: g.v, attr });
      renderer.writeCell({ x: right, y }, { ch: g.v, attr });
    }

    const room = w - 2 * TITLE_MARGIN;
    if (this._title.length > 0 && room > 2) {
      const text = ` ${this._title.slice(0, room - 2)} `;
      const x = b.a.x + Math.trunc((w - text.length) / 2);
      renderer.writeText({ x, y: b.a.y }, text, this.palette.title);
    }

    if (this.active && w >= CLOSE_OFFSET + CLOSE_ICON.length + 1) {
      renderer.writeText({ x: b.a.x + CLOSE_OFFSET, y: b.a.y }, CLOSE_ICON, this.palette.closeIcon);
    }
  }

  /** Mouse-down on the close control becomes CM_CLOSE. */
  override handleEvent(slot: EventSlot): void {
    const ev = slot.event;
    if (ev.kind === "mouseDown" && this.hitsClose(ev.pos)) {
      slot.event = commandEvent(CM_CLOSE);
    }
  }
}
