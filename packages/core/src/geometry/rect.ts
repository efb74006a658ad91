/**
 * packages/core/src/geometry/rect.ts — Integer point and rectangle arithmetic.
 *
 * Why: Every view stores its bounds as a half-open box in screen cells. The
 * helpers here are pure and return fresh frozen values; nothing mutates a Rect.
 *
 * Conventions:
 *   - `a` is the top-left corner (inclusive), `b` the bottom-right (exclusive)
 *   - a.x <= b.x and a.y <= b.y always hold; constructors normalize inverted input
 *   - Shrinking past zero size clamps to an empty rect centered on the original
 */

export type Point = Readonly<{ x: number; y: number }>;

export type Rect = Readonly<{ a: Point; b: Point }>;

export function point(x: number, y: number): Point {
  return Object.freeze({ x, y });
}

/** Build a rect from two corners, swapping coordinates that arrive inverted. */
export function rect(ax: number, ay: number, bx: number, by: number): Rect {
  return Object.freeze({
    a: point(Math.min(ax, bx), Math.min(ay, by)),
    b: point(Math.max(ax, bx), Math.max(ay, by)),
  });
}

export function rectFromSize(x: number, y: number, w: number, h: number): Rect {
  return rect(x, y, x + Math.max(0, w), y + Math.max(0, h));
}

export function width(r: Rect): number {
  return r.b.x - r.a.x;
}

export function height(r: Rect): number {
  return r.b.y - r.a.y;
}

export function isEmpty(r: Rect): boolean {
  return r.b.x <= r.a.x || r.b.y <= r.a.y;
}

/** Half-open containment: the right and bottom edges are outside. */
export function contains(r: Rect, p: Point): boolean {
  return p.x >= r.a.x && p.x < r.b.x && p.y >= r.a.y && p.y < r.b.y;
}

export function intersects(r: Rect, other: Rect): boolean {
  if (isEmpty(r) || isEmpty(other)) return false;
  return r.a.x < other.b.x && other.a.x < r.b.x && r.a.y < other.b.y && other.a.y < r.b.y;
}

/** Overlap of two rects; disjoint input yields an empty rect at `r.a`. */
export function intersect(r: Rect, other: Rect): Rect {
  const x0 = Math.max(r.a.x, other.a.x);
  const y0 = Math.max(r.a.y, other.a.y);
  const x1 = Math.min(r.b.x, other.b.x);
  const y1 = Math.min(r.b.y, other.b.y);
  if (x1 <= x0 || y1 <= y0) return rect(r.a.x, r.a.y, r.a.x, r.a.y);
  return rect(x0, y0, x1, y1);
}

export function union(r: Rect, other: Rect): Rect {
  if (isEmpty(r)) return other;
  if (isEmpty(other)) return r;
  return rect(
    Math.min(r.a.x, other.a.x),
    Math.min(r.a.y, other.a.y),
    Math.max(r.b.x, other.b.x),
    Math.max(r.b.y, other.b.y),
  );
}

export function translate(r: Rect, dx: number, dy: number): Rect {
  return rect(r.a.x + dx, r.a.y + dy, r.b.x + dx, r.b.y + dy);
}

/**
 * Grow (positive) or shrink (negative) every edge. A shrink larger than half
 * the size collapses that axis to zero width at its midpoint.
 */
export function grow(r: Rect, dx: number, dy: number): Rect {
  let ax = r.a.x - dx;
  let bx = r.b.x + dx;
  let ay = r.a.y - dy;
  let by = r.b.y + dy;
  if (bx < ax) {
    ax = Math.trunc((r.a.x + r.b.x) / 2);
    bx = ax;
  }
  if (by < ay) {
    ay = Math.trunc((r.a.y + r.b.y) / 2);
    by = ay;
  }
  return rect(ax, ay, bx, by);
}

export function rectEquals(r: Rect, other: Rect): boolean {
  return r.a.x === other.a.x && r.a.y === other.a.y && r.b.x === other.b.x && r.b.y === other.b.y;
}

export function pointEquals(p: Point, other: Point): boolean {
  return p.x === other.x && p.y === other.y;
}
