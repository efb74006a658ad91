/**
 * packages/core/src/events/event.ts — Events routed through the view tree.
 *
 * An event travels inside a mutable EventSlot. A view that handles it either
 * replaces the slot's event with a `command` (so ancestors see a higher-level
 * request) or clears it to `nothing` (so nobody else sees it). Dispatch stops
 * as soon as the slot holds `nothing`.
 */

import type { Point } from "../geometry/rect.js";
import type { CommandId } from "../commands/commands.js";

export type MouseKind = "mouseDown" | "mouseMove" | "mouseUp";

export type TvEvent =
  | Readonly<{ kind: "nothing" }>
  | Readonly<{ kind: "keyboard"; code: number }>
  | Readonly<{
      kind: MouseKind;
      /** Absolute screen position. */
      pos: Point;
      /** MB_* bitmask of buttons held while the event happened. */
      buttons: number;
    }>
  /** A request to act on `command`; delivered to the focused chain. */
  | Readonly<{ kind: "command"; command: CommandId }>
  /** A notification delivered to every view regardless of focus. */
  | Readonly<{ kind: "broadcast"; command: CommandId }>;

export type MouseEvent = Extract<TvEvent, Readonly<{ kind: MouseKind }>>;

export type EventSlot = { event: TvEvent };

export const MB_LEFT = 0x01;
export const MB_RIGHT = 0x02;
export const MB_MIDDLE = 0x04;

export const NOTHING: TvEvent = Object.freeze({ kind: "nothing" });

export function keyEvent(code: number): TvEvent {
  return Object.freeze({ kind: "keyboard", code });
}

export function mouseEvent(kind: MouseKind, pos: Point, buttons: number): TvEvent {
  return Object.freeze({ kind, pos: Object.freeze({ x: pos.x, y: pos.y }), buttons });
}

export function commandEvent(command: CommandId): TvEvent {
  return Object.freeze({ kind: "command", command });
}

export function broadcastEvent(command: CommandId): TvEvent {
  return Object.freeze({ kind: "broadcast", command });
}

export function slotOf(event: TvEvent): EventSlot {
  return { event };
}

export function clearEvent(slot: EventSlot): void {
  slot.event = NOTHING;
}

export function isNothing(slot: EventSlot): boolean {
  return slot.event.kind === "nothing";
}

export function isMouseEvent(ev: TvEvent): ev is MouseEvent {
  return ev.kind === "mouseDown" || ev.kind === "mouseMove" || ev.kind === "mouseUp";
}

export function isKey(ev: TvEvent, code: number): boolean {
  return ev.kind === "keyboard" && ev.code === code;
}

export function isCommand(ev: TvEvent, command: CommandId): boolean {
  return ev.kind === "command" && ev.command === command;
}
