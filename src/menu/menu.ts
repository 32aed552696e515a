import { openTerminal } from "../terminal/ansiTerminal.js"
import type { TerminalDriver } from "../terminal/driver.js"
import {
  BOX_GLYPHS,
  DEFAULT_PREVIEW_LABEL,
  ICONS,
  resolveBoxGlyphs,
  resolveColorMode,
  resolveIcons,
  type BoxGlyphs,
  type ColorMode,
} from "../theme.js"
import { NOOP_LOGGER, type MenuLogger } from "../util/debugLog.js"
import { MenuConfigError } from "./errors.js"
import { assertWidth, complementSide } from "./geometry.js"
import { stringDisplay } from "./itemMaterializer.js"
import { KeyBindings, MENU_ACTIONS, type ActionBindingTable } from "./keymap.js"
import { MenuSession } from "./session.js"
import { toRenderer, type DisplayRenderer, type MenuAction, type Placement, type RendererLike, type ScreenSide } from "./types.js"

export interface MenuOptions<T> {
  readonly title?: string
  readonly display?: RendererLike<T>
  readonly preview?: RendererLike<T>
  readonly previewSide?: ScreenSide
  readonly previewWidth?: number
  readonly previewLabel?: string
  readonly multiselect?: boolean
  readonly icon?: string
  readonly chosenIcon?: string
  readonly boxed?: boolean
  readonly asciiOnly?: boolean
  readonly colorMode?: ColorMode
  readonly keys?: Partial<ActionBindingTable>
  readonly logger?: MenuLogger
}

const PREVIEW_DEFAULT_PLACEMENT: Placement = { side: "right", width: 0.5 }

/**
 * Interactive selection menu over a lazily consumed source. Configure it with
 * the chained setters, then `show` it once; the resolved indices come back in
 * the order they were chosen (empty when the user quits).
 */
export class Menu<T> {
  private titleText: string | null = null
  private displayRenderer: DisplayRenderer<T> = stringDisplay()
  private previewRenderer: DisplayRenderer<T> | null = null
  private mainPlacement: Placement = { side: "full", width: 1 }
  private previewPlacement: Placement = PREVIEW_DEFAULT_PLACEMENT
  private previewLabelText = DEFAULT_PREVIEW_LABEL
  private multi = false
  private itemIcon: string = ICONS.item
  private chosenItemIcon: string = ICONS.chosen
  private iconsCustomized = { item: false, chosen: false }
  private isBoxed = false
  private glyphs: BoxGlyphs = BOX_GLYPHS
  private colorModeOverride: ColorMode | null = null
  private readonly bindings = new KeyBindings()
  private log: MenuLogger = NOOP_LOGGER
  private started = false

  constructor(
    private readonly source: Iterable<T>,
    options: MenuOptions<T> = {},
  ) {
    if (options.asciiOnly != null) this.asciiOnly(options.asciiOnly)
    if (options.title != null) this.title(options.title)
    if (options.display) this.display(options.display)
    if (options.preview) this.preview(options.preview)
    if (options.previewSide != null || options.previewWidth != null) {
      this.previewPosition(
        options.previewSide ?? PREVIEW_DEFAULT_PLACEMENT.side,
        options.previewWidth ?? PREVIEW_DEFAULT_PLACEMENT.width,
      )
    }
    if (options.previewLabel != null) this.previewLabel(options.previewLabel)
    if (options.multiselect != null) this.multiselect(options.multiselect)
    if (options.icon != null) this.icon(options.icon)
    if (options.chosenIcon != null) this.selectedIcon(options.chosenIcon)
    if (options.boxed != null) this.boxed(options.boxed)
    if (options.colorMode != null) this.colorMode(options.colorMode)
    if (options.logger) this.logger(options.logger)
    for (const action of MENU_ACTIONS) {
      for (const code of options.keys?.[action] ?? []) this.addKey(action, code)
    }
  }

  private assertConfigurable(setting: string): void {
    if (this.started) {
      throw new MenuConfigError(setting, "the menu has already been shown")
    }
  }

  private addKey(action: MenuAction, code: number): this {
    this.assertConfigurable(`keys.${action}`)
    if (!Number.isInteger(code) || code < 0) {
      throw new MenuConfigError(`keys.${action}`, `expected a non-negative integer key code, received ${code}`)
    }
    this.bindings.add(action, code)
    return this
  }

  title(text: string): this {
    this.assertConfigurable("title")
    this.titleText = text.length > 0 ? text : null
    return this
  }

  display(renderer: RendererLike<T>): this {
    this.assertConfigurable("display")
    this.displayRenderer = toRenderer(renderer)
    return this
  }

  /** Adds a preview pane; the list moves to the left half and the preview takes the right. */
  preview(renderer: RendererLike<T>): this {
    this.assertConfigurable("preview")
    this.previewRenderer = toRenderer(renderer)
    this.mainPlacement = { side: "left", width: 0.5 }
    this.previewPlacement = PREVIEW_DEFAULT_PLACEMENT
    return this
  }

  /** Places the preview on `side`; the list takes the opposite side and the rest of the width. */
  previewPosition(side: ScreenSide, width: number): this {
    this.assertConfigurable("previewPosition")
    if (!this.previewRenderer) {
      throw new MenuConfigError("previewPosition", "set a preview before positioning it")
    }
    if (side === "full") {
      throw new MenuConfigError("previewPosition", "the preview needs a side: top, bottom, left or right")
    }
    assertWidth(width, "previewPosition")
    if (width >= 1) {
      throw new MenuConfigError("previewPosition", "a preview covering the whole width leaves no room for the list")
    }
    this.previewPlacement = { side, width }
    this.mainPlacement = { side: complementSide(side), width: 1 - width }
    return this
  }

  previewLabel(label: string): this {
    this.assertConfigurable("previewLabel")
    if (!this.previewRenderer) {
      throw new MenuConfigError("previewLabel", "set a preview before labelling it")
    }
    this.previewLabelText = label
    return this
  }

  multiselect(enabled = true): this {
    this.assertConfigurable("multiselect")
    this.multi = enabled
    return this
  }

  icon(icon: string): this {
    this.assertConfigurable("icon")
    this.itemIcon = icon
    this.iconsCustomized.item = true
    return this
  }

  selectedIcon(icon: string): this {
    this.assertConfigurable("selectedIcon")
    this.chosenItemIcon = icon
    this.iconsCustomized.chosen = true
    return this
  }

  boxed(enabled = true): this {
    this.assertConfigurable("boxed")
    this.isBoxed = enabled
    return this
  }

  /** Swaps box glyphs and any icons not set explicitly for their ASCII forms. */
  asciiOnly(enabled = true): this {
    this.assertConfigurable("asciiOnly")
    this.glyphs = resolveBoxGlyphs(enabled)
    const icons = resolveIcons(enabled)
    if (!this.iconsCustomized.item) this.itemIcon = icons.item
    if (!this.iconsCustomized.chosen) this.chosenItemIcon = icons.chosen
    return this
  }

  colorMode(mode: ColorMode): this {
    this.assertConfigurable("colorMode")
    this.colorModeOverride = mode
    return this
  }

  logger(logger: MenuLogger): this {
    this.assertConfigurable("logger")
    this.log = logger
    return this
  }

  addUpKey(code: number): this {
    return this.addKey("moveUp", code)
  }

  addDownKey(code: number): this {
    return this.addKey("moveDown", code)
  }

  addSelectKey(code: number): this {
    return this.addKey("select", code)
  }

  addMultiselectKey(code: number): this {
    return this.addKey("toggleSelect", code)
  }

  get keyBindings(): ActionBindingTable {
    return this.bindings.toTable()
  }

  get hasPreview(): boolean {
    return this.previewRenderer != null
  }

  get layout(): { readonly main: Placement; readonly preview: Placement | null } {
    return { main: this.mainPlacement, preview: this.previewRenderer ? this.previewPlacement : null }
  }

  /**
   * Runs the interactive session. Without a driver the controlling terminal is
   * opened. The source is consumed, so a menu can only be shown once.
   */
  async show(terminal?: TerminalDriver): Promise<number[]> {
    if (this.started) {
      throw new MenuConfigError("show", "a menu can only be shown once")
    }
    const driver = terminal ?? openTerminal(this.colorModeOverride ?? resolveColorMode())
    this.started = true
    this.bindings.freeze()
    const session = new MenuSession(
      this.source,
      {
        title: this.titleText,
        display: this.displayRenderer,
        preview: this.previewRenderer,
        mainPlacement: this.mainPlacement,
        previewPlacement: this.previewPlacement,
        previewLabel: this.previewLabelText,
        mode: this.multi ? "multi" : "single",
        icon: this.itemIcon,
        chosenIcon: this.chosenItemIcon,
        bindings: this.bindings,
        boxed: this.isBoxed,
        glyphs: this.glyphs,
        logger: this.log,
      },
      driver,
    )
    return session.run()
  }
}
