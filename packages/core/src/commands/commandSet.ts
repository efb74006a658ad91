/**
 * packages/core/src/commands/commandSet.ts — Command enablement set.
 *
 * Why: Views that expose a command (buttons, menu items) need to grey out when
 * the command is unavailable. Rather than notifying each observer on every
 * change, the set raises a dirty flag; the run loop turns a dirty set into one
 * CM_COMMAND_SET_CHANGED broadcast per iteration and observers re-query.
 *
 * Absent entries are enabled. The dirty flag is raised only when an entry
 * actually changes, so redundant enable/disable calls cost no broadcast.
 *
 * A single JavaScript thread serializes every access, so the set needs no lock.
 */

import type { CommandId } from "./commands.js";

export type CommandSet = Readonly<{
  enable: (command: CommandId) => void;
  disable: (command: CommandId) => void;
  enableMany: (commands: Iterable<CommandId>) => void;
  disableMany: (commands: Iterable<CommandId>) => void;
  isEnabled: (command: CommandId) => boolean;
  /** True when an entry changed since the last clearDirty(). */
  isDirty: () => boolean;
  clearDirty: () => void;
  /** Disabled ids in ascending order. */
  disabled: () => readonly CommandId[];
}>;

export function createCommandSet(initiallyDisabled: Iterable<CommandId> = []): CommandSet {
  const disabledIds = new Set<CommandId>(initiallyDisabled);
  let dirty = false;

  const enable = (command: CommandId): void => {
    if (disabledIds.delete(command)) dirty = true;
  };

  const disable = (command: CommandId): void => {
    if (disabledIds.has(command)) return;
    disabledIds.add(command);
    dirty = true;
  };

  return Object.freeze({
    enable,
    disable,
    enableMany: (commands: Iterable<CommandId>) => {
      for (const c of commands) enable(c);
    },
    disableMany: (commands: Iterable<CommandId>) => {
      for (const c of commands) disable(c);
    },
    isEnabled: (command: CommandId) => !disabledIds.has(command),
    isDirty: () => dirty,
    clearDirty: () => {
      dirty = false;
    },
    disabled: () => Object.freeze([...disabledIds].sort((x, y) => x - y)),
  });
}

/* ========== Process-wide default ========== */

let defaultSet: CommandSet = createCommandSet();

/** The set used when an application or view is not given one explicitly. */
export function defaultCommandSet(): CommandSet {
  return defaultSet;
}

/** Replace the process-wide set (tests install a fresh one per case). */
export function setDefaultCommandSet(set: CommandSet): CommandSet {
  const previous = defaultSet;
  defaultSet = set;
  return previous;
}

export function enableCommand(command: CommandId): void {
  defaultSet.enable(command);
}

export function disableCommand(command: CommandId): void {
  defaultSet.disable(command);
}

export function commandEnabled(command: CommandId): boolean {
  return defaultSet.isEnabled(command);
}
