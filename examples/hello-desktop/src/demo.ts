/**
 * Demo desktop: a notes window, an about dialog and a command toggled from
 * the status line.
 */

import {
  type Application,
  CM_CANCEL,
  CM_CLOSE,
  CM_OK,
  CM_QUIT,
  CM_USER,
  Color,
  type CommandId,
  Dialog,
  KB_ALT_X,
  KB_F1,
  KB_F2,
  KB_F3,
  KB_F4,
  WINDOW_PALETTE,
  Window,
  attr,
  rect,
} from "@tvcore/core";
import { Button, StaticText, StatusLine } from "./widgets.js";

export const CM_ABOUT: CommandId = CM_USER + 1;
export const CM_NEW_WINDOW: CommandId = CM_USER + 2;
export const CM_TOGGLE_SAVE: CommandId = CM_USER + 3;
export const CM_SAVE: CommandId = CM_USER + 4;

const DIALOG_TEXT = attr(Color.Black, Color.LightGray);

export function createStatusLine(cols: number, rows: number): StatusLine {
  return new StatusLine(rect(0, rows - 1, cols, rows), [
    { key: KB_F1, keyLabel: "F1", label: "About", command: CM_ABOUT },
    { key: KB_F2, keyLabel: "F2", label: "New", command: CM_NEW_WINDOW },
    { key: KB_F3, keyLabel: "F3", label: "Lock save", command: CM_TOGGLE_SAVE },
    { key: KB_F4, keyLabel: "F4", label: "Save", command: CM_SAVE },
    { key: KB_ALT_X, keyLabel: "Alt+X", label: "Exit", command: CM_QUIT },
  ]);
}

export function createNotesWindow(app: Application, index: number): Window {
  const offset = (index % 5) * 2;
  const win = new Window(rect(2 + offset, 1 + offset, 40 + offset, 12 + offset), `Notes ${index}`);
  win.add(new StaticText(rect(1, 1, 35, 4), "Tab moves focus.\nDrag the title bar to move.", WINDOW_PALETTE.interior));
  win.add(new Button(rect(1, 6, 11, 7), "Save", CM_SAVE, { isDefault: true, commands: app.commands }));
  win.add(new Button(rect(13, 6, 24, 7), "Close", CM_CLOSE));
  win.setInitialFocus();
  return win;
}

export function createAboutDialog(): Dialog {
  const dialog = new Dialog(rect(20, 6, 56, 15), "About");
  dialog.add(new StaticText(rect(2, 1, 32, 3), "Text-mode desktop demo", DIALOG_TEXT));
  dialog.add(new Button(rect(4, 5, 14, 6), "OK", CM_OK, { isDefault: true }));
  dialog.add(new Button(rect(17, 5, 31, 6), "Cancel", CM_CANCEL));
  dialog.setInitialFocus();
  return dialog;
}

export type DemoState = {
  windows: number;
  saves: number;
  lastDialogResult: CommandId | null;
};

export function createDemoState(): DemoState {
  return { windows: 0, saves: 0, lastDialogResult: null };
}

export function openNotesWindow(app: Application, state: DemoState): void {
  state.windows++;
  app.desktop.add(createNotesWindow(app, state.windows));
}

/** Application command handler for the demo. */
export async function handleDemoCommand(
  command: CommandId,
  app: Application,
  state: DemoState,
): Promise<void> {
  switch (command) {
    case CM_ABOUT:
      state.lastDialogResult = await createAboutDialog().execute(app);
      return;
    case CM_NEW_WINDOW:
      openNotesWindow(app, state);
      return;
    case CM_TOGGLE_SAVE:
      if (app.commands.isEnabled(CM_SAVE)) app.commands.disable(CM_SAVE);
      else app.commands.enable(CM_SAVE);
      return;
    case CM_SAVE:
      state.saves++;
      return;
    default:
      return;
  }
}
