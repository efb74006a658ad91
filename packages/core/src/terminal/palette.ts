/**
 * packages/core/src/terminal/palette.ts — 16-color palette and cell attributes.
 *
 * Why: Cells carry a foreground/background pair from a fixed 16-entry palette
 * in CGA order. The pair packs into one byte (`fg | bg << 4`) so the cell grid
 * can store attributes in a Uint8Array and compare them as integers.
 *
 * The RGB table is only consulted for derived colors (shadows); output always
 * uses the SGR codes below.
 */

export enum Color {
  Black = 0,
  Blue = 1,
  Green = 2,
  Cyan = 3,
  Red = 4,
  Magenta = 5,
  Brown = 6,
  LightGray = 7,
  DarkGray = 8,
  LightBlue = 9,
  LightGreen = 10,
  LightCyan = 11,
  LightRed = 12,
  LightMagenta = 13,
  Yellow = 14,
  White = 15,
}

export type Rgb = Readonly<{ r: number; g: number; b: number }>;

export type Attr = Readonly<{ fg: Color; bg: Color }>;

const COLOR_COUNT = 16;

const PALETTE_RGB: readonly Rgb[] = Object.freeze([
  { r: 0, g: 0, b: 0 },
  { r: 0, g: 0, b: 170 },
  { r: 0, g: 170, b: 0 },
  { r: 0, g: 170, b: 170 },
  { r: 170, g: 0, b: 0 },
  { r: 170, g: 0, b: 170 },
  { r: 170, g: 85, b: 0 },
  { r: 170, g: 170, b: 170 },
  { r: 85, g: 85, b: 85 },
  { r: 85, g: 85, b: 255 },
  { r: 85, g: 255, b: 85 },
  { r: 85, g: 255, b: 255 },
  { r: 255, g: 85, b: 85 },
  { r: 255, g: 85, b: 255 },
  { r: 255, g: 255, b: 85 },
  { r: 255, g: 255, b: 255 },
]);

/* Foreground SGR parameter per Color; background is +10. */
const SGR_FG: readonly number[] = Object.freeze([
  30, 34, 32, 36, 31, 35, 33, 37, 90, 94, 92, 96, 91, 95, 93, 97,
]);

export function toColor(n: number): Color {
  switch (n & 0x0f) {
    case 0:
      return Color.Black;
    case 1:
      return Color.Blue;
    case 2:
      return Color.Green;
    case 3:
      return Color.Cyan;
    case 4:
      return Color.Red;
    case 5:
      return Color.Magenta;
    case 6:
      return Color.Brown;
    case 7:
      return Color.LightGray;
    case 8:
      return Color.DarkGray;
    case 9:
      return Color.LightBlue;
    case 10:
      return Color.LightGreen;
    case 11:
      return Color.LightCyan;
    case 12:
      return Color.LightRed;
    case 13:
      return Color.LightMagenta;
    case 14:
      return Color.Yellow;
    default:
      return Color.White;
  }
}

export function colorRgb(c: Color): Rgb {
  return PALETTE_RGB[c] ?? { r: 0, g: 0, b: 0 };
}

export function sgrForeground(c: Color): number {
  return SGR_FG[c] ?? 39;
}

export function sgrBackground(c: Color): number {
  return (SGR_FG[c] ?? 39) + 10;
}

/** Palette entry closest to `rgb` by squared distance; the lowest index wins ties. */
export function nearestColor(rgb: Rgb): Color {
  let best = 0;
  let bestDist = Number.POSITIVE_INFINITY;
  for (let i = 0; i < COLOR_COUNT; i++) {
    const p = PALETTE_RGB[i];
    if (p === undefined) continue;
    const dr = p.r - rgb.r;
    const dg = p.g - rgb.g;
    const db = p.b - rgb.b;
    const dist = dr * dr + dg * dg + db * db;
    if (dist < bestDist) {
      bestDist = dist;
      best = i;
    }
  }
  return toColor(best);
}

export function attr(fg: Color, bg: Color): Attr {
  return Object.freeze({ fg, bg });
}

export function packAttr(a: Attr): number {
  return (a.fg & 0x0f) | ((a.bg & 0x0f) << 4);
}

export function unpackAttr(byte: number): Attr {
  return attr(toColor(byte & 0x0f), toColor((byte >> 4) & 0x0f));
}

export function attrEquals(x: Attr, y: Attr): boolean {
  return x.fg === y.fg && x.bg === y.bg;
}

function darkenColor(c: Color, factor: number): Color {
  const rgb = colorRgb(c);
  return nearestColor({
    r: Math.trunc(rgb.r * factor),
    g: Math.trunc(rgb.g * factor),
    b: Math.trunc(rgb.b * factor),
  });
}

/** Scale both colors toward black and snap back onto the palette. */
export function darkenAttr(a: Attr, factor = 0.5): Attr {
  const f = Math.min(1, Math.max(0, factor));
  return attr(darkenColor(a.fg, f), darkenColor(a.bg, f));
}

/* ========== Standard attributes ========== */

export const DEFAULT_ATTR: Attr = attr(Color.LightGray, Color.Black);

export type WindowPalette = Readonly<{
  frameActive: Attr;
  framePassive: Attr;
  title: Attr;
  closeIcon: Attr;
  interior: Attr;
}>;

export const WINDOW_PALETTE: WindowPalette = Object.freeze({
  frameActive: attr(Color.White, Color.Blue),
  framePassive: attr(Color.LightGray, Color.Blue),
  title: attr(Color.White, Color.Blue),
  closeIcon: attr(Color.LightGreen, Color.Blue),
  interior: attr(Color.Yellow, Color.Blue),
});

export const DIALOG_PALETTE: WindowPalette = Object.freeze({
  frameActive: attr(Color.White, Color.LightGray),
  framePassive: attr(Color.Black, Color.LightGray),
  title: attr(Color.Black, Color.LightGray),
  closeIcon: attr(Color.LightGreen, Color.LightGray),
  interior: attr(Color.Black, Color.LightGray),
});

export const DESKTOP_ATTR: Attr = attr(Color.LightGray, Color.DarkGray);
