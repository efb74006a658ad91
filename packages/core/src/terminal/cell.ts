/**
 * packages/core/src/terminal/cell.ts — Screen cells and the packed cell grid.
 *
 * Why: The renderer keeps two grids of identical shape and compares them cell
 * by cell every frame. Storing code points and packed attributes in typed
 * arrays keeps that comparison allocation-free.
 *
 * A code point of 0 is never written by views; it marks a cell whose terminal
 * contents are unknown, so it differs from every real cell and forces a repaint.
 */

import { type Attr, DEFAULT_ATTR, attrEquals, packAttr, unpackAttr } from "./palette.js";

export type Cell = Readonly<{
  /** One single-width character. */
  ch: string;
  attr: Attr;
}>;

export const UNKNOWN_CODEPOINT = 0;

const SPACE = 0x20;

export function cell(ch: string, attr: Attr): Cell {
  return Object.freeze({ ch, attr });
}

export function cellEquals(x: Cell, y: Cell): boolean {
  return x.ch === y.ch && attrEquals(x.attr, y.attr);
}

/** First code point of `ch`; space for an empty string or a control character. */
export function cellCodepoint(ch: string): number {
  const cp = ch.codePointAt(0);
  if (cp === undefined || cp < 0x20 || cp === 0x7f) return SPACE;
  return cp;
}

export class CellGrid {
  private _cols: number;
  private _rows: number;
  private chars: Uint32Array;
  private attrs: Uint8Array;

  constructor(cols: number, rows: number) {
    this._cols = Math.max(0, Math.trunc(cols));
    this._rows = Math.max(0, Math.trunc(rows));
    this.chars = new Uint32Array(this._cols * this._rows);
    this.attrs = new Uint8Array(this._cols * this._rows);
    this.fill(SPACE, packAttr(DEFAULT_ATTR));
  }

  get cols(): number {
    return this._cols;
  }

  get rows(): number {
    return this._rows;
  }

  inBounds(x: number, y: number): boolean {
    return x >= 0 && y >= 0 && x < this._cols && y < this._rows;
  }

  index(x: number, y: number): number {
    return y * this._cols + x;
  }

  codepointAt(i: number): number {
    return this.chars[i] ?? UNKNOWN_CODEPOINT;
  }

  attrByteAt(i: number): number {
    return this.attrs[i] ?? 0;
  }

  set(i: number, codepoint: number, attrByte: number): void {
    this.chars[i] = codepoint;
    this.attrs[i] = attrByte;
  }

  get(x: number, y: number): Cell | null {
    if (!this.inBounds(x, y)) return null;
    const i = this.index(x, y);
    const cp = this.codepointAt(i);
    return cell(String.fromCodePoint(cp === UNKNOWN_CODEPOINT ? SPACE : cp), unpackAttr(this.attrByteAt(i)));
  }

  fill(codepoint: number, attrByte: number): void {
    this.chars.fill(codepoint);
    this.attrs.fill(attrByte);
  }

  /** Mark every cell as unknown so it compares unequal to any drawn cell. */
  invalidate(): void {
    this.chars.fill(UNKNOWN_CODEPOINT);
  }

  copyFrom(other: CellGrid): void {
    if (other._cols !== this._cols || other._rows !== this._rows) {
      this.resize(other._cols, other._rows);
    }
    this.chars.set(other.chars);
    this.attrs.set(other.attrs);
  }

  equals(other: CellGrid): boolean {
    if (other._cols !== this._cols || other._rows !== this._rows) return false;
    for (let i = 0; i < this.chars.length; i++) {
      if (this.chars[i] !== other.chars[i] || this.attrs[i] !== other.attrs[i]) return false;
    }
    return true;
  }

  /** Reallocate to a new shape; contents reset to blank default cells. */
  resize(cols: number, rows: number): void {
    this._cols = Math.max(0, Math.trunc(cols));
    this._rows = Math.max(0, Math.trunc(rows));
    this.chars = new Uint32Array(this._cols * this._rows);
    this.attrs = new Uint8Array(this._cols * this._rows);
    this.fill(SPACE, packAttr(DEFAULT_ATTR));
  }

  rowText(y: number): string {
    if (y < 0 || y >= this._rows) return "";
    let out = "";
    for (let x = 0; x < this._cols; x++) {
      const cp = this.codepointAt(this.index(x, y));
      out += String.fromCodePoint(cp === UNKNOWN_CODEPOINT ? SPACE : cp);
    }
    return out;
  }
}
