/**
 * Standard command identifiers.
 *
 * Ids below CM_USER are reserved for the runtime and stock dialogs;
 * applications allocate theirs from CM_USER upward.
 */

export type CommandId = number;

export const CM_QUIT = 1;
export const CM_CLOSE = 4;
export const CM_OK = 10;
export const CM_CANCEL = 11;
export const CM_YES = 12;
export const CM_NO = 13;
export const CM_DEFAULT = 14;
export const CM_CUT = 20;
export const CM_COPY = 21;
export const CM_PASTE = 22;
export const CM_UNDO = 23;
export const CM_CLEAR = 24;
export const CM_REDO = 25;

/** Broadcast after the command enablement set changed. */
export const CM_COMMAND_SET_CHANGED = 52;

export const CM_USER = 100;
