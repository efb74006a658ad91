import { strict as assert } from "node:assert";

/** Render control characters visibly, e.g. ESC as "\x1b". */
export function escapeControls(s: string): string {
  let out = "";
  for (const ch of s) {
    const c = ch.codePointAt(0) ?? 0;
    out += c < 0x20 || c === 0x7f ? `\\x${c.toString(16).padStart(2, "0")}` : ch;
  }
  return out;
}

/**
 * Compare terminal output exactly, reporting both sides with control
 * characters made visible so a mismatch is readable in the test log.
 */
export function assertOutputEqual(actual: string, expected: string, label = "terminal output"): void {
  if (actual === expected) return;
  let i = 0;
  while (i < actual.length && i < expected.length && actual[i] === expected[i]) i++;
  assert.fail(
    `${label}: mismatch at offset ${String(i)}\n` +
      `  actual:   ${escapeControls(actual)}\n` +
      `  expected: ${escapeControls(expected)}`,
  );
}
