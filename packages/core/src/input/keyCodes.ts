/**
 * packages/core/src/input/keyCodes.ts — Keyboard codes delivered in events.
 *
 * Special keys use 16-bit scan/char codes (scan code in the high byte, ASCII
 * in the low byte, 0 for non-character keys). Printable ASCII is its own code
 * point; printable non-ASCII is offset by KB_UNICODE_BASE so it can never
 * collide with a special key.
 */

/* --- Editing / control --- */

export const KB_ESC = 0x011b;
/** Synthetic: two ESC presses in a row. */
export const KB_ESC_ESC = 0x011c;
export const KB_BACKSPACE = 0x0e08;
export const KB_TAB = 0x0f09;
export const KB_SHIFT_TAB = 0x0f00;
export const KB_ENTER = 0x1c0d;

/* --- Navigation --- */

export const KB_HOME = 0x4700;
export const KB_UP = 0x4800;
export const KB_PGUP = 0x4900;
export const KB_LEFT = 0x4b00;
export const KB_RIGHT = 0x4d00;
export const KB_END = 0x4f00;
export const KB_DOWN = 0x5000;
export const KB_PGDN = 0x5100;
export const KB_INS = 0x5200;
export const KB_DEL = 0x5300;

/* --- Function keys --- */

export const KB_F1 = 0x3b00;
export const KB_F2 = 0x3c00;
export const KB_F3 = 0x3d00;
export const KB_F4 = 0x3e00;
export const KB_F5 = 0x3f00;
export const KB_F6 = 0x4000;
export const KB_F7 = 0x4100;
export const KB_F8 = 0x4200;
export const KB_F9 = 0x4300;
export const KB_F10 = 0x4400;
export const KB_F11 = 0x8500;
export const KB_F12 = 0x8600;

/* --- Control letters (Ctrl+A = 0x01 ... Ctrl+Z = 0x1a) --- */

export const KB_CTRL_A = 0x0001;
export const KB_CTRL_C = 0x0003;
export const KB_CTRL_Z = 0x001a;

export const KB_UNICODE_BASE = 0x200000;

/* Scan codes for Alt+letter, indexed by letter (a..z). */
const ALT_LETTER_SCAN: readonly number[] = Object.freeze([
  0x1e, 0x30, 0x2e, 0x20, 0x12, 0x21, 0x22, 0x23, 0x17, 0x24, 0x25, 0x26, 0x32, 0x31, 0x18, 0x19,
  0x10, 0x13, 0x1f, 0x14, 0x16, 0x2f, 0x11, 0x2d, 0x15, 0x2c,
]);

/** Alt+letter code for `letter` (case-insensitive), or null for non-letters. */
export function altLetter(letter: string): number | null {
  const c = letter.toLowerCase().charCodeAt(0);
  if (!(c >= 0x61 && c <= 0x7a)) return null;
  const scan = ALT_LETTER_SCAN[c - 0x61];
  return scan === undefined ? null : scan << 8;
}

/** Alt+digit code: Alt+1..Alt+9 are 0x7800..0x8000, Alt+0 is 0x8100. */
export function altDigit(digit: string): number | null {
  const c = digit.charCodeAt(0);
  if (!(c >= 0x30 && c <= 0x39)) return null;
  return c === 0x30 ? 0x8100 : (0x78 + (c - 0x31)) << 8;
}

export const KB_ALT_X = 0x2d00;

/** Ctrl+letter code for `letter` (case-insensitive), or null. */
export function ctrlLetter(letter: string): number | null {
  const c = letter.toLowerCase().charCodeAt(0);
  if (!(c >= 0x61 && c <= 0x7a)) return null;
  return c - 0x60;
}

/** Key code for one printable character. */
export function charKey(ch: string): number {
  const cp = ch.codePointAt(0) ?? 0;
  return cp < 0x80 ? cp : KB_UNICODE_BASE + cp;
}

/** Printable character carried by `code`, or null for special keys. */
export function keyCodeToChar(code: number): string | null {
  if (code >= 0x20 && code < 0x7f) return String.fromCharCode(code);
  if (code >= KB_UNICODE_BASE + 0x80 && code <= KB_UNICODE_BASE + 0x10ffff) {
    return String.fromCodePoint(code - KB_UNICODE_BASE);
  }
  return null;
}

/* ========== Names ========== */

const NAMED_KEYS: ReadonlyMap<string, number> = new Map<string, number>([
  ["escape", KB_ESC],
  ["esc", KB_ESC],
  ["backspace", KB_BACKSPACE],
  ["tab", KB_TAB],
  ["shift+tab", KB_SHIFT_TAB],
  ["enter", KB_ENTER],
  ["home", KB_HOME],
  ["end", KB_END],
  ["up", KB_UP],
  ["down", KB_DOWN],
  ["left", KB_LEFT],
  ["right", KB_RIGHT],
  ["pageup", KB_PGUP],
  ["pagedown", KB_PGDN],
  ["insert", KB_INS],
  ["delete", KB_DEL],
  ["f1", KB_F1],
  ["f2", KB_F2],
  ["f3", KB_F3],
  ["f4", KB_F4],
  ["f5", KB_F5],
  ["f6", KB_F6],
  ["f7", KB_F7],
  ["f8", KB_F8],
  ["f9", KB_F9],
  ["f10", KB_F10],
  ["f11", KB_F11],
  ["f12", KB_F12],
]);

/**
 * Resolve a human-readable key name ("f10", "ctrl+c", "alt+x", "a") to its
 * code. Returns null for names that do not denote a single key.
 */
export function keyFromName(name: string): number | null {
  const lower = name.trim().toLowerCase();
  const named = NAMED_KEYS.get(lower);
  if (named !== undefined) return named;

  if (lower.startsWith("ctrl+") && lower.length === 6) return ctrlLetter(lower.slice(5));
  if (lower.startsWith("alt+") && lower.length === 5) {
    return altLetter(lower.slice(4)) ?? altDigit(lower.slice(4));
  }
  if ([...name].length === 1) return charKey(name);
  return null;
}

/** Stable display name for a key code (used by tracing). */
export function keyName(code: number): string {
  for (const [name, value] of NAMED_KEYS) {
    if (value === code) return name;
  }
  if (code === KB_ESC_ESC) return "esc+esc";
  if (code >= KB_CTRL_A && code <= KB_CTRL_Z) return `ctrl+${String.fromCharCode(code + 0x60)}`;
  for (let i = 0; i < ALT_LETTER_SCAN.length; i++) {
    if (ALT_LETTER_SCAN[i] === code >> 8 && (code & 0xff) === 0) {
      return `alt+${String.fromCharCode(0x61 + i)}`;
    }
  }
  const ch = keyCodeToChar(code);
  if (ch !== null) return ch;
  return `0x${code.toString(16).padStart(4, "0")}`;
}
