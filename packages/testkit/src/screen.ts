/**
 * packages/testkit/src/screen.ts — Headless terminal for checking emitted output.
 *
 * Why: Asserting on raw escape bytes only proves the renderer emitted what it
 * meant to. Feeding those bytes through a real terminal emulator and reading
 * the resulting grid proves they produce the intended screen.
 */

import xtermHeadless from "@xterm/headless";

const { Terminal } = xtermHeadless;

export type ScreenCell = Readonly<{
  ch: string;
  /** Palette index 0-15, or -1 for the terminal default. */
  fg: number;
  bg: number;
}>;

export type Screen = Readonly<{
  write: (data: string) => Promise<void>;
  flush: () => Promise<void>;
  lines: () => readonly string[];
  line: (row: number) => string;
  cell: (x: number, y: number) => ScreenCell | null;
  cursor: () => Readonly<{ x: number; y: number }>;
  dispose: () => void;
}>;

export function createScreen(opts: Readonly<{ cols: number; rows: number }>): Screen {
  const term = new Terminal({
    cols: opts.cols,
    rows: opts.rows,
    allowProposedApi: true,
    convertEol: false,
    scrollback: 0,
  });

  let pending = Promise.resolve();
  const write = async (data: string): Promise<void> => {
    pending = pending.then(
      () =>
        new Promise<void>((resolve) => {
          term.write(data, resolve);
        }),
    );
    await pending;
  };

  const line = (row: number): string => {
    const text = term.buffer.active.getLine(row)?.translateToString(false) ?? "";
    return text.padEnd(opts.cols, " ").slice(0, opts.cols);
  };

  return Object.freeze({
    write,
    flush: async () => {
      await pending;
    },
    lines: () => {
      const out: string[] = [];
      for (let r = 0; r < opts.rows; r++) out.push(line(r));
      return out;
    },
    line,
    cell: (x: number, y: number) => {
      const c = term.buffer.active.getLine(y)?.getCell(x);
      if (c === undefined) return null;
      return {
        ch: c.getChars() === "" ? " " : c.getChars(),
        fg: c.isFgPalette() ? c.getFgColor() : -1,
        bg: c.isBgPalette() ? c.getBgColor() : -1,
      };
    },
    cursor: () => ({ x: term.buffer.active.cursorX, y: term.buffer.active.cursorY }),
    dispose: () => {
      term.dispose();
    },
  });
}
