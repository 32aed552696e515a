export { Menu, type MenuOptions } from "./menu/menu.js"
export { MenuSession, type MenuSettings } from "./menu/session.js"
export { MenuConfigError, TerminalError } from "./menu/errors.js"
export { BoundedWriter } from "./menu/boundedWriter.js"
export { DisplayItem, ItemMaterializer, stringDisplay, type MaterializerOptions } from "./menu/itemMaterializer.js"
export { SelectionEngine, type SelectionOutcome } from "./menu/selection.js"
export {
  SCROLL_DOWN_THRESHOLD,
  SCROLL_UP_THRESHOLD,
  Viewport,
  type MoveDelta,
  type MoveResult,
  type ViewportSnapshot,
} from "./menu/viewport.js"
export { DEFAULT_BINDINGS, KeyBindings, QUIT_KEYS, isQuitKey, type ActionBindingTable } from "./menu/keymap.js"
export { Region, complementSide, resolveRect, screenRect } from "./menu/geometry.js"
export type {
  Coordinate,
  DisplayFn,
  DisplayRenderer,
  MenuAction,
  Placement,
  Rect,
  RectOffset,
  RendererLike,
  ScreenSide,
  SelectionMode,
} from "./menu/types.js"
export { AnsiTerminal, openTerminal, type AnsiTerminalOptions } from "./terminal/ansiTerminal.js"
export type { TerminalAttribute, TerminalDriver, TerminalSize } from "./terminal/driver.js"
export { KEY, decodeKeys, describeKey, parseKeyName } from "./terminal/keyCodes.js"
export { applyMenuConfig } from "./menu_config/apply.js"
export { resolveMenuConfig } from "./menu_config/load.js"
export type { MenuConfigInput, ResolveMenuConfigOptions, ResolvedMenuConfig } from "./menu_config/types.js"
export { createDebugLogger, NOOP_LOGGER, type MenuLogger } from "./util/debugLog.js"
