/**
 * packages/core/src/terminal/ansi.ts — Control sequences emitted to the terminal.
 *
 * Coordinates are zero-based on input and converted to the one-based form the
 * terminal expects.
 */

import { sgrBackground, sgrForeground, toColor } from "./palette.js";

const ESC = "\u001b";
const CSI = `${ESC}[`;

export const HIDE_CURSOR = `${CSI}?25l`;
export const SHOW_CURSOR = `${CSI}?25h`;
export const ENTER_ALT_SCREEN = `${CSI}?1049h`;
export const LEAVE_ALT_SCREEN = `${CSI}?1049l`;
export const RESET_ATTRS = `${CSI}0m`;
export const CLEAR_SCREEN = `${CSI}2J`;

/* Click, drag, SGR extended coordinates. */
export const ENABLE_MOUSE = `${CSI}?1000h${CSI}?1002h${CSI}?1006h`;
export const DISABLE_MOUSE = `${CSI}?1006l${CSI}?1002l${CSI}?1000l`;

export function cursorTo(x: number, y: number): string {
  return `${CSI}${y + 1};${x + 1}H`;
}

/**
 * SGR sequence moving the terminal from packed attribute `prev` to `next`.
 * Only the half that changed is emitted; `prev === null` means unknown.
 * Returns "" when nothing changes.
 */
export function sgrTransition(prev: number | null, next: number): string {
  const fg = sgrForeground(toColor(next & 0x0f));
  const bg = sgrBackground(toColor((next >> 4) & 0x0f));
  if (prev === null) return `${CSI}${fg};${bg}m`;
  const fgChanged = (prev & 0x0f) !== (next & 0x0f);
  const bgChanged = (prev & 0xf0) !== (next & 0xf0);
  if (fgChanged && bgChanged) return `${CSI}${fg};${bg}m`;
  if (fgChanged) return `${CSI}${fg}m`;
  if (bgChanged) return `${CSI}${bg}m`;
  return "";
}
