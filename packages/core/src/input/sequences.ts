/**
 * Known CSI / SS3 key sequences, keyed by the bytes after ESC.
 *
 * Covers the xterm, VT220 and rxvt variants terminals commonly send for the
 * navigation and function keys. Modifier-parameterized forms ("[1;5A") map to
 * the unmodified key.
 */

import {
  KB_DEL,
  KB_DOWN,
  KB_END,
  KB_F1,
  KB_F10,
  KB_F11,
  KB_F12,
  KB_F2,
  KB_F3,
  KB_F4,
  KB_F5,
  KB_F6,
  KB_F7,
  KB_F8,
  KB_F9,
  KB_HOME,
  KB_INS,
  KB_LEFT,
  KB_PGDN,
  KB_PGUP,
  KB_RIGHT,
  KB_SHIFT_TAB,
  KB_UP,
} from "./keyCodes.js";

const TILDE_KEYS: ReadonlyMap<number, number> = new Map<number, number>([
  [1, KB_HOME],
  [2, KB_INS],
  [3, KB_DEL],
  [4, KB_END],
  [5, KB_PGUP],
  [6, KB_PGDN],
  [7, KB_HOME],
  [8, KB_END],
  [11, KB_F1],
  [12, KB_F2],
  [13, KB_F3],
  [14, KB_F4],
  [15, KB_F5],
  [17, KB_F6],
  [18, KB_F7],
  [19, KB_F8],
  [20, KB_F9],
  [21, KB_F10],
  [23, KB_F11],
  [24, KB_F12],
]);

/* Final byte of "ESC [ A" / "ESC O A" style sequences. */
const LETTER_KEYS: ReadonlyMap<string, number> = new Map<string, number>([
  ["A", KB_UP],
  ["B", KB_DOWN],
  ["C", KB_RIGHT],
  ["D", KB_LEFT],
  ["H", KB_HOME],
  ["F", KB_END],
  ["P", KB_F1],
  ["Q", KB_F2],
  ["R", KB_F3],
  ["S", KB_F4],
]);

/**
 * Look up a complete sequence. `body` is everything after ESC, e.g. "[A",
 * "OP", "[15~", "[1;5C". Returns null for well-formed but unknown sequences.
 */
export function lookupSequence(body: string): number | null {
  const m = /^([[O])(\d*)(?:;(\d*))?([A-Za-z~])$/.exec(body);
  if (m === null) return null;
  const intro = m[1];
  const first = m[2] ?? "";
  const final = m[4] ?? "";

  if (final === "~") {
    if (intro !== "[" || first.length === 0) return null;
    return TILDE_KEYS.get(Number(first)) ?? null;
  }
  if (final === "Z") return intro === "[" ? KB_SHIFT_TAB : null;
  // "[P".."[S" are F1-F4 only after a "1;" modifier prefix (xterm) or in SS3 form.
  if (intro === "[" && "PQRS".includes(final) && first.length === 0) return null;
  return LETTER_KEYS.get(final) ?? null;
}
