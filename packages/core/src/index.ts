/**
 * @tvcore/core
 *
 * Runtime-agnostic core of the tvcore text-mode application framework.
 * This package MUST NOT use Node-specific APIs (Buffer, process, node:* imports).
 */

// =============================================================================
// Errors and diagnostics
// =============================================================================

export { TvError, type TvErrorCode, describeThrown, isTvError, warnDev } from "./errors.js";
export {
  NOOP_TRACE,
  type TraceRecord,
  type TraceScope,
  type TraceSink,
  createMemoryTrace,
} from "./debug/trace.js";

// =============================================================================
// Geometry
// =============================================================================

export {
  type Point,
  type Rect,
  contains,
  grow,
  height,
  intersect,
  intersects,
  isEmpty,
  point,
  pointEquals,
  rect,
  rectEquals,
  rectFromSize,
  translate,
  union,
  width,
} from "./geometry/rect.js";

// =============================================================================
// Terminal output
// =============================================================================

export {
  type Attr,
  Color,
  DEFAULT_ATTR,
  DESKTOP_ATTR,
  DIALOG_PALETTE,
  type Rgb,
  WINDOW_PALETTE,
  type WindowPalette,
  attr,
  attrEquals,
  colorRgb,
  darkenAttr,
  nearestColor,
  packAttr,
  unpackAttr,
} from "./terminal/palette.js";
export { type Cell, CellGrid, cell, cellEquals } from "./terminal/cell.js";
export { type FlushStats, Renderer, type RendererSink } from "./terminal/renderer.js";
export * as ansi from "./terminal/ansi.js";
export type { BackendInput, TerminalBackend, TerminalSize } from "./terminal/backend.js";

// =============================================================================
// Input
// =============================================================================

export * from "./input/keyCodes.js";
export {
  type InputDecoder,
  MAX_SEQUENCE_LENGTH,
  type MouseAction,
  type MouseButton,
  type MousePrimitive,
  createInputDecoder,
  parseSgrMouse,
} from "./input/decoder.js";
export { lookupSequence } from "./input/sequences.js";

// =============================================================================
// Events and commands
// =============================================================================

export {
  type EventSlot,
  MB_LEFT,
  MB_MIDDLE,
  MB_RIGHT,
  type MouseEvent,
  type MouseKind,
  NOTHING,
  type TvEvent,
  broadcastEvent,
  clearEvent,
  commandEvent,
  isCommand,
  isKey,
  isMouseEvent,
  isNothing,
  keyEvent,
  mouseEvent,
  slotOf,
} from "./events/event.js";
export * from "./commands/commands.js";
export {
  type CommandSet,
  commandEnabled,
  createCommandSet,
  defaultCommandSet,
  disableCommand,
  enableCommand,
  setDefaultCommandSet,
} from "./commands/commandSet.js";

// =============================================================================
// Views
// =============================================================================

export {
  BaseView,
  SF_DISABLED,
  SF_DRAGGING,
  SF_FOCUSED,
  SF_MODAL,
  SF_SHADOW,
  type StateFlags,
  type View,
  hasState,
} from "./views/view.js";
export { Group, type GroupOptions, NO_FOCUS } from "./views/group.js";
export { CLOSE_ICON, Frame } from "./views/frame.js";
export { Window, type WindowOptions } from "./views/window.js";
export {
  Dialog,
  type DialogExecuteOptions,
  type DialogOptions,
  type ModalHost,
} from "./views/dialog.js";
export { DESKTOP_PATTERN, Desktop } from "./views/desktop.js";

// =============================================================================
// Application
// =============================================================================

export {
  Application,
  type ApplicationOptions,
  type CommandHandler,
} from "./app/application.js";
export { type AppConfig, type ResolvedAppConfig, resolveAppConfig } from "./app/config.js";
