export { assertOutputEqual, escapeControls } from "./golden.js";
export { assert, describe, test } from "./nodeTest.js";
export { type Screen, type ScreenCell, createScreen } from "./screen.js";
