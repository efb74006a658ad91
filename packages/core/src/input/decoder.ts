/**
 * packages/core/src/input/decoder.ts — Raw terminal input to keyboard/mouse events.
 *
 * Why: Terminals send special keys as multi-byte escape sequences that begin
 * with the same byte as a lone ESC press. The decoder is a small state machine
 * that holds an ESC until the following byte (or a poll timeout) disambiguates
 * it.
 *
 * States:
 *   - idle: every byte is a key by itself, except ESC
 *   - escape(buffer): an ESC arrived; `buffer` holds the bytes after it
 *
 * Resolution in escape state:
 *   - ESC             -> KB_ESC_ESC, unless "[" or "O" follows it in the same
 *                        chunk: then a lone KB_ESC and a fresh sequence
 *   - letter/digit    -> Alt+key
 *   - "[" or "O"      -> collect a CSI/SS3 sequence until its final byte
 *   - anything else   -> lone KB_ESC, then this byte reprocessed from idle
 *   - timeout()       -> lone KB_ESC; the buffered bytes are dropped
 *
 * Complete sequences resolve through the known-sequence table; unknown ones
 * are consumed silently. SGR mouse reports ("ESC [ < b ; x ; y M|m") become
 * mouse primitives and then mouse events.
 *
 * The decoder knows nothing about views.
 */

import type { Point } from "../geometry/rect.js";
import { MB_LEFT, MB_MIDDLE, MB_RIGHT, type TvEvent, keyEvent, mouseEvent } from "../events/event.js";
import {
  KB_BACKSPACE,
  KB_ENTER,
  KB_ESC,
  KB_ESC_ESC,
  KB_TAB,
  altDigit,
  altLetter,
  charKey,
} from "./keyCodes.js";
import { lookupSequence } from "./sequences.js";

const ESC = "\u001b";

/** Longest escape body kept before the pending ESC is abandoned. */
export const MAX_SEQUENCE_LENGTH = 32;

export type MouseAction = "down" | "up" | "drag" | "move" | "wheel";
export type MouseButton = "left" | "right" | "middle" | "none";

/** Host-level mouse report before translation into a TvEvent. */
export type MousePrimitive = Readonly<{
  action: MouseAction;
  button: MouseButton;
  pos: Point;
}>;

export type InputDecoder = Readonly<{
  /** Decode a chunk of terminal input. Incomplete escape sequences stay pending. */
  feed: (data: string) => readonly TvEvent[];
  /** Resolve a pending ESC after the disambiguation timeout elapsed. */
  timeout: () => readonly TvEvent[];
  hasPending: () => boolean;
  /** Translate a mouse primitive, tracking the held-button mask. Wheel reports yield null. */
  mouse: (primitive: MousePrimitive) => TvEvent | null;
  reset: () => void;
}>;

type DecoderState = Readonly<{ mode: "idle" }> | Readonly<{ mode: "escape"; buffer: string }>;

const IDLE: DecoderState = Object.freeze({ mode: "idle" });

const SGR_MOUSE_RE = /^\[<(\d+);(\d+);(\d+)([Mm])$/;

function buttonMask(button: MouseButton): number {
  switch (button) {
    case "left":
      return MB_LEFT;
    case "right":
      return MB_RIGHT;
    case "middle":
      return MB_MIDDLE;
    default:
      return 0;
  }
}

/** Decode an SGR (1006) mouse report body such as "[<0;10;5M". */
export function parseSgrMouse(body: string): MousePrimitive | null {
  const m = SGR_MOUSE_RE.exec(body);
  if (m === null) return null;
  const code = Number(m[1]);
  const x = Number(m[2]) - 1;
  const y = Number(m[3]) - 1;
  const release = m[4] === "m";
  if (x < 0 || y < 0) return null;

  const low = code & 0x03;
  const button: MouseButton = low === 0 ? "left" : low === 1 ? "middle" : low === 2 ? "right" : "none";
  const pos = { x, y };

  if ((code & 0x40) !== 0) return { action: "wheel", button: "none", pos };
  if ((code & 0x20) !== 0) {
    return button === "none" ? { action: "move", button, pos } : { action: "drag", button, pos };
  }
  if (release) return { action: "up", button, pos };
  if (button === "none") return { action: "move", button, pos };
  return { action: "down", button, pos };
}

function isFinalByte(c: number): boolean {
  return c >= 0x40 && c <= 0x7e;
}

function isParamOrIntermediate(c: number): boolean {
  return c >= 0x20 && c <= 0x3f;
}

export function createInputDecoder(): InputDecoder {
  let state: DecoderState = IDLE;
  let held = 0;

  const mouse = (p: MousePrimitive): TvEvent | null => {
    switch (p.action) {
      case "down":
        held = buttonMask(p.button);
        return mouseEvent("mouseDown", p.pos, held);
      case "drag": {
        const mask = buttonMask(p.button);
        return mouseEvent("mouseMove", p.pos, mask !== 0 ? mask : held);
      }
      case "move":
        return mouseEvent("mouseMove", p.pos, held);
      case "up":
        held = 0;
        return mouseEvent("mouseUp", p.pos, 0);
      case "wheel":
        return null;
    }
  };

  const emitPlain = (ch: string, out: TvEvent[]): void => {
    const c = ch.codePointAt(0) ?? 0;
    switch (c) {
      case 0x00:
        return;
      case 0x0d:
      case 0x0a:
        out.push(keyEvent(KB_ENTER));
        return;
      case 0x09:
        out.push(keyEvent(KB_TAB));
        return;
      case 0x08:
      case 0x7f:
        out.push(keyEvent(KB_BACKSPACE));
        return;
      default:
        out.push(keyEvent(c < 0x20 ? c : charKey(ch)));
    }
  };

  const complete = (body: string, out: TvEvent[]): void => {
    if (body.startsWith("[<")) {
      const primitive = parseSgrMouse(body);
      if (primitive === null) return;
      const ev = mouse(primitive);
      if (ev !== null) out.push(ev);
      return;
    }
    const code = lookupSequence(body);
    if (code !== null) out.push(keyEvent(code));
  };

  // Lone ESC, then `ch` from idle. Whatever was buffered is dropped.
  const abandon = (ch: string, out: TvEvent[]): void => {
    state = IDLE;
    out.push(keyEvent(KB_ESC));
    step(ch, undefined, out);
  };

  // `next` is the byte after `ch` within the same chunk, if any.
  const step = (ch: string, next: string | undefined, out: TvEvent[]): void => {
    if (state.mode === "idle") {
      if (ch === ESC) state = { mode: "escape", buffer: "" };
      else emitPlain(ch, out);
      return;
    }

    const buffer = state.buffer;
    if (buffer.length === 0) {
      if (ch === ESC) {
        // ESC then an escape sequence: the first ESC was a key press of its own.
        if (next === "[" || next === "O") {
          out.push(keyEvent(KB_ESC));
          state = { mode: "escape", buffer: "" };
          return;
        }
        state = IDLE;
        out.push(keyEvent(KB_ESC_ESC));
        return;
      }
      if (ch === "[" || ch === "O") {
        state = { mode: "escape", buffer: ch };
        return;
      }
      const alt = altLetter(ch) ?? altDigit(ch);
      if (alt !== null) {
        state = IDLE;
        out.push(keyEvent(alt));
        return;
      }
      abandon(ch, out);
      return;
    }

    const c = ch.codePointAt(0) ?? 0;
    if (isFinalByte(c)) {
      state = IDLE;
      complete(buffer + ch, out);
      return;
    }
    // SS3 carries exactly one byte after "O".
    if (buffer[0] === "[" && isParamOrIntermediate(c) && buffer.length < MAX_SEQUENCE_LENGTH) {
      state = { mode: "escape", buffer: buffer + ch };
      return;
    }
    abandon(ch, out);
  };

  return Object.freeze({
    feed: (data: string) => {
      const out: TvEvent[] = [];
      const chars = Array.from(data);
      for (let i = 0; i < chars.length; i++) {
        const ch = chars[i];
        if (ch !== undefined) step(ch, chars[i + 1], out);
      }
      return out;
    },
    timeout: () => {
      if (state.mode === "idle") return [];
      state = IDLE;
      return [keyEvent(KB_ESC)];
    },
    hasPending: () => state.mode === "escape",
    mouse,
    reset: () => {
      state = IDLE;
      held = 0;
    },
  });
}
