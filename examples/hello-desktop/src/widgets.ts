/**
 * Example-local widgets. The core ships no controls; these are the minimum
 * needed to exercise windows, dialogs and the command set.
 */

import {
  type Attr,
  BaseView,
  CM_COMMAND_SET_CHANGED,
  Color,
  type CommandId,
  type CommandSet,
  type EventSlot,
  KB_ENTER,
  type Rect,
  type Renderer,
  SF_DISABLED,
  attr,
  commandEvent,
  contains,
  width,
} from "@tvcore/core";

const BUTTON_NORMAL = attr(Color.Black, Color.Green);
const BUTTON_DEFAULT = attr(Color.LightCyan, Color.Green);
const BUTTON_FOCUSED = attr(Color.White, Color.Green);
const BUTTON_DISABLED = attr(Color.DarkGray, Color.Green);

const SPACE = 0x20;

export type ButtonOptions = Readonly<{
  isDefault?: boolean | undefined;
  /** Disable the button whenever its command is disabled in this set. */
  commands?: CommandSet | undefined;
}>;

export class Button extends BaseView {
  private readonly label: string;
  private readonly command: CommandId;
  private readonly isDefault: boolean;
  private readonly commands: CommandSet | null;

  constructor(bounds: Rect, label: string, command: CommandId, opts: ButtonOptions = {}) {
    super(bounds);
    this.label = label;
    this.command = command;
    this.isDefault = opts.isDefault ?? false;
    this.commands = opts.commands ?? null;
    if (this.commands !== null && !this.commands.isEnabled(command)) this._state |= SF_DISABLED;
  }

  isDisabled(): boolean {
    return (this._state & SF_DISABLED) !== 0;
  }

  override canFocus(): boolean {
    return !this.isDisabled();
  }

  override isDefaultButton(): boolean {
    return this.isDefault;
  }

  override buttonCommand(): CommandId {
    return this.command;
  }

  override draw(renderer: Renderer): void {
    const a = this.isDisabled()
      ? BUTTON_DISABLED
      : this.isFocused()
        ? BUTTON_FOCUSED
        : this.isDefault
          ? BUTTON_DEFAULT
          : BUTTON_NORMAL;
    const text = `[ ${this.label} ]`.padEnd(width(this._bounds)).slice(0, width(this._bounds));
    renderer.writeText(this._bounds.a, text, a);
  }

  override handleEvent(slot: EventSlot): void {
    const ev = slot.event;
    if (ev.kind === "broadcast") {
      if (ev.command === CM_COMMAND_SET_CHANGED && this.commands !== null) {
        if (this.commands.isEnabled(this.command)) this._state &= ~SF_DISABLED;
        else this._state |= SF_DISABLED;
      }
      return;
    }
    if (this.isDisabled()) return;
    if (ev.kind === "keyboard" && (ev.code === KB_ENTER || ev.code === SPACE)) {
      slot.event = commandEvent(this.command);
    } else if (ev.kind === "mouseDown" && contains(this._bounds, ev.pos)) {
      slot.event = commandEvent(this.command);
    }
  }
}

export class StaticText extends BaseView {
  private readonly lines: readonly string[];
  private readonly color: Attr;

  constructor(bounds: Rect, text: string, color: Attr) {
    super(bounds);
    this.lines = text.split("\n");
    this.color = color;
  }

  override draw(renderer: Renderer): void {
    const b = this._bounds;
    renderer.fillRect(b, " ", this.color);
    this.lines.forEach((line, i) => {
      if (b.a.y + i < b.b.y) renderer.writeText({ x: b.a.x, y: b.a.y + i }, line.slice(0, width(b)), this.color);
    });
  }
}

export type StatusItem = Readonly<{
  key: number;
  /** Shown highlighted before the label, e.g. "F1". */
  keyLabel: string;
  label: string;
  command: CommandId;
}>;

type StatusSpan = Readonly<{ x0: number; x1: number; item: StatusItem }>;

const STATUS_ATTR = attr(Color.Black, Color.LightGray);
const STATUS_KEY_ATTR = attr(Color.Red, Color.LightGray);

/** One-row hint bar; each item's key (or a click on it) produces its command. */
export class StatusLine extends BaseView {
  private readonly items: readonly StatusItem[];

  constructor(bounds: Rect, items: readonly StatusItem[]) {
    super(bounds);
    this.items = items;
  }

  // Each item is drawn as " <keyLabel> <label> ".
  private spans(): readonly StatusSpan[] {
    const out: StatusSpan[] = [];
    let x = this._bounds.a.x;
    for (const item of this.items) {
      const len = item.keyLabel.length + item.label.length + 3;
      out.push({ x0: x, x1: x + len, item });
      x += len;
    }
    return out;
  }

  override draw(renderer: Renderer): void {
    const b = this._bounds;
    renderer.fillRect(b, " ", STATUS_ATTR);
    for (const { x0, item } of this.spans()) {
      const keyCols = renderer.writeText({ x: x0 + 1, y: b.a.y }, item.keyLabel, STATUS_KEY_ATTR);
      renderer.writeText({ x: x0 + 2 + keyCols, y: b.a.y }, item.label, STATUS_ATTR);
    }
  }

  override handleEvent(slot: EventSlot): void {
    const ev = slot.event;
    if (ev.kind === "keyboard") {
      const hit = this.items.find((item) => item.key === ev.code);
      if (hit !== undefined) slot.event = commandEvent(hit.command);
      return;
    }
    if (ev.kind === "mouseDown" && ev.pos.y === this._bounds.a.y) {
      const hit = this.spans().find((s) => ev.pos.x >= s.x0 && ev.pos.x < s.x1);
      if (hit !== undefined) slot.event = commandEvent(hit.item.command);
    }
  }
}
