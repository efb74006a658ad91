/**
 * packages/core/src/terminal/renderer.ts — Double-buffered diff renderer.
 *
 * Why: Views draw the whole frame into `current` every tick; `flush()` emits
 * only what differs from `previous` (what the terminal is known to show) and
 * then copies current into previous. Nothing is written for an unchanged frame.
 *
 * Per row, changed cells are grouped into runs that share one attribute. Each
 * run costs at most one cursor move and one SGR sequence, and both are skipped
 * when the terminal is already in the required state.
 *
 * Clipping: writes are dropped unless they fall inside the screen and inside
 * the intersection of every rect on the clip stack.
 */

import { TvError, warnDev } from "../errors.js";
import { type Point, type Rect, contains, intersect, rect } from "../geometry/rect.js";
import { HIDE_CURSOR, SHOW_CURSOR, cursorTo, sgrTransition } from "./ansi.js";
import { type Cell, CellGrid, UNKNOWN_CODEPOINT, cellCodepoint } from "./cell.js";
import { type Attr, DEFAULT_ATTR, packAttr } from "./palette.js";

export type RendererSink = Readonly<{
  write(chunk: string): void;
}>;

export type FlushStats = Readonly<{
  /** Attribute-homogeneous runs of changed cells. */
  runs: number;
  /** Changed cells written. */
  cells: number;
  /** UTF-8 size of the emitted frame. */
  bytes: number;
  /** Escape sequences emitted (cursor moves, SGR, cursor visibility). */
  sequences: number;
}>;

const EMPTY_STATS: FlushStats = Object.freeze({ runs: 0, cells: 0, bytes: 0, sequences: 0 });

function utf8Length(s: string): number {
  let n = 0;
  for (let i = 0; i < s.length; i++) {
    const c = s.charCodeAt(i);
    if (c < 0x80) n += 1;
    else if (c < 0x800) n += 2;
    else if (c >= 0xd800 && c <= 0xdbff) {
      n += 4;
      i++;
    } else n += 3;
  }
  return n;
}

export class Renderer {
  private readonly current: CellGrid;
  private readonly previous: CellGrid;
  private readonly sink: RendererSink;
  private readonly clipStack: Rect[] = [];

  // What the terminal is known to be showing; null = unknown.
  private termAttr: number | null = null;
  private termCursorX: number | null = null;
  private termCursorY: number | null = null;
  private termCursorVisible: boolean | null = null;

  private cursorWanted: Point | null = null;
  private screen: Rect;

  constructor(cols: number, rows: number, sink: RendererSink) {
    this.current = new CellGrid(cols, rows);
    this.previous = new CellGrid(cols, rows);
    this.previous.invalidate();
    this.sink = sink;
    this.screen = rect(0, 0, this.current.cols, this.current.rows);
  }

  get cols(): number {
    return this.current.cols;
  }

  get rows(): number {
    return this.current.rows;
  }

  screenRect(): Rect {
    return this.screen;
  }

  /* ========== Clipping ========== */

  clipRect(): Rect {
    return this.clipStack[this.clipStack.length - 1] ?? this.screenRect();
  }

  pushClip(r: Rect): void {
    this.clipStack.push(intersect(this.clipRect(), r));
  }

  popClip(): void {
    if (this.clipStack.length === 0) {
      warnDev("[tvcore] Renderer.popClip called with an empty clip stack");
      return;
    }
    this.clipStack.pop();
  }

  clipDepth(): number {
    return this.clipStack.length;
  }

  /* ========== Drawing ========== */

  writeCell(pos: Point, c: Cell): void {
    if (!this.current.inBounds(pos.x, pos.y)) return;
    if (!contains(this.clipRect(), pos)) return;
    this.current.set(this.current.index(pos.x, pos.y), cellCodepoint(c.ch), packAttr(c.attr));
  }

  writeRow(pos: Point, cells: readonly Cell[]): void {
    for (let i = 0; i < cells.length; i++) {
      const c = cells[i];
      if (c !== undefined) this.writeCell({ x: pos.x + i, y: pos.y }, c);
    }
  }

  /** Write `text` left to right, one code point per cell. Returns the columns consumed. */
  writeText(pos: Point, text: string, attr: Attr): number {
    let x = pos.x;
    for (const ch of text) {
      this.writeCell({ x, y: pos.y }, { ch, attr });
      x++;
    }
    return x - pos.x;
  }

  fillRect(r: Rect, ch: string, attr: Attr): void {
    const c = { ch, attr };
    for (let y = r.a.y; y < r.b.y; y++) {
      for (let x = r.a.x; x < r.b.x; x++) {
        this.writeCell({ x, y }, c);
      }
    }
  }

  /** Blank the whole back buffer, ignoring clipping. */
  clear(attr: Attr = DEFAULT_ATTR): void {
    this.current.fill(0x20, packAttr(attr));
  }

  cellAt(pos: Point): Cell | null {
    return this.current.get(pos.x, pos.y);
  }

  rowText(y: number): string {
    return this.current.rowText(y);
  }

  /* ========== Cursor ========== */

  hideCursor(): void {
    this.cursorWanted = null;
  }

  showCursor(pos: Point): void {
    if (!this.current.inBounds(pos.x, pos.y)) {
      this.cursorWanted = null;
      return;
    }
    this.cursorWanted = { x: pos.x, y: pos.y };
  }

  cursor(): Point | null {
    return this.cursorWanted;
  }

  /* ========== Lifecycle ========== */

  /** Forget what the terminal shows; the next flush repaints every cell. */
  invalidate(): void {
    this.previous.invalidate();
    this.termAttr = null;
    this.termCursorX = null;
    this.termCursorY = null;
    this.termCursorVisible = null;
  }

  resize(cols: number, rows: number): void {
    this.current.resize(cols, rows);
    this.previous.resize(cols, rows);
    this.screen = rect(0, 0, this.current.cols, this.current.rows);
    this.clipStack.length = 0;
    if (this.cursorWanted !== null && !this.current.inBounds(this.cursorWanted.x, this.cursorWanted.y)) {
      this.cursorWanted = null;
    }
    this.invalidate();
  }

  /** Whether the back buffer matches what the terminal shows. */
  isClean(): boolean {
    return this.current.equals(this.previous);
  }

  /* ========== Flush ========== */

  flush(): FlushStats {
    const cur = this.current;
    const prev = this.previous;
    const cols = cur.cols;

    let attr = this.termAttr;
    let cx = this.termCursorX;
    let cy = this.termCursorY;
    let visible = this.termCursorVisible;

    let out = "";
    let runs = 0;
    let cells = 0;
    let sequences = 0;

    for (let y = 0; y < cur.rows; y++) {
      let x = 0;
      while (x < cols) {
        const i = cur.index(x, y);
        const cp = cur.codepointAt(i);
        const ab = cur.attrByteAt(i);
        if (cp === prev.codepointAt(i) && ab === prev.attrByteAt(i)) {
          x++;
          continue;
        }

        if (cx !== x || cy !== y) {
          out += cursorTo(x, y);
          sequences++;
        }
        const sgr = sgrTransition(attr, ab);
        if (sgr.length > 0) {
          out += sgr;
          sequences++;
        }
        attr = ab;

        while (x < cols) {
          const j = cur.index(x, y);
          const rcp = cur.codepointAt(j);
          if (cur.attrByteAt(j) !== ab) break;
          if (rcp === prev.codepointAt(j) && ab === prev.attrByteAt(j)) break;
          out += String.fromCodePoint(rcp === UNKNOWN_CODEPOINT ? 0x20 : rcp);
          cells++;
          x++;
        }
        runs++;
        // Writing the last column leaves the cursor in a terminal-specific spot.
        cx = x < cols ? x : null;
        cy = y;
      }
    }

    const want = this.cursorWanted;
    if (want === null) {
      if (visible !== false) {
        out += HIDE_CURSOR;
        sequences++;
        visible = false;
      }
    } else {
      if (cx !== want.x || cy !== want.y) {
        out += cursorTo(want.x, want.y);
        sequences++;
        cx = want.x;
        cy = want.y;
      }
      if (visible !== true) {
        out += SHOW_CURSOR;
        sequences++;
        visible = true;
      }
    }

    if (out.length === 0) return EMPTY_STATS;

    try {
      this.sink.write(out);
    } catch (err) {
      throw new TvError("TV_IO_ERROR", "Renderer.flush: terminal write failed", { cause: err });
    }

    prev.copyFrom(cur);
    this.termAttr = attr;
    this.termCursorX = cx;
    this.termCursorY = cy;
    this.termCursorVisible = visible;

    return Object.freeze({ runs, cells, bytes: utf8Length(out), sequences });
  }
}
