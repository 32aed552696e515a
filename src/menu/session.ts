import type { TerminalDriver } from "../terminal/driver.js"
import type { BoxGlyphs } from "../theme.js"
import type { MenuLogger } from "../util/debugLog.js"
import { graphemeLength } from "../util/graphemes.js"
import { BoundedWriter } from "./boundedWriter.js"
import { INSET_ONE, Region, combineOffsets, rectHeight, screenRect, topRowsOffset } from "./geometry.js"
import { ItemMaterializer } from "./itemMaterializer.js"
import { isQuitKey, type KeyBindings } from "./keymap.js"
import { SelectionEngine, type SelectionOutcome } from "./selection.js"
import type { DisplayRenderer, Placement, SelectionMode } from "./types.js"
import { Viewport } from "./viewport.js"

export interface MenuSettings<T> {
  readonly title: string | null
  readonly display: DisplayRenderer<T>
  readonly preview: DisplayRenderer<T> | null
  readonly mainPlacement: Placement
  readonly previewPlacement: Placement
  readonly previewLabel: string
  readonly mode: SelectionMode
  readonly icon: string
  readonly chosenIcon: string
  readonly bindings: KeyBindings
  readonly boxed: boolean
  readonly glyphs: BoxGlyphs
  readonly logger: MenuLogger
}

interface PreviewPanes {
  readonly border: Region
  readonly content: Region
  readonly borderWriter: BoundedWriter
  readonly contentWriter: BoundedWriter
}

const titleRowsFor = (title: string, columns: number): number =>
  Math.floor(graphemeLength(title) / Math.max(1, columns)) + 1

/**
 * One run of a menu: owns the item cache, viewport and selection, and the
 * regions that are laid out again on every frame.
 */
export class MenuSession<T> {
  readonly items: ItemMaterializer<T>
  readonly viewport = new Viewport()
  readonly selection: SelectionEngine
  private readonly titleRegion = new Region({ side: "full", width: 1 })
  private readonly mainBorder: Region
  private readonly mainContent: Region
  private readonly titleWriter: BoundedWriter
  private readonly mainBorderWriter: BoundedWriter
  private readonly mainWriter: BoundedWriter
  private readonly previewPanes: PreviewPanes | null
  private readonly title: string | null

  constructor(
    source: Iterable<T>,
    private readonly settings: MenuSettings<T>,
    private readonly terminal: TerminalDriver,
  ) {
    this.items = new ItemMaterializer(source, {
      icon: settings.icon,
      chosenIcon: settings.chosenIcon,
      display: settings.display,
      preview: settings.preview,
    })
    this.selection = new SelectionEngine(settings.mode)
    this.title = settings.title ? settings.title.replace(/\s*\n\s*/g, " ") : null
    this.mainBorder = new Region(settings.mainPlacement)
    this.mainContent = new Region(settings.mainPlacement)
    this.titleWriter = new BoundedWriter(terminal, this.titleRegion, settings.glyphs)
    this.mainBorderWriter = new BoundedWriter(terminal, this.mainBorder, settings.glyphs)
    this.mainWriter = new BoundedWriter(terminal, this.mainContent, settings.glyphs)
    if (settings.preview) {
      const border = new Region(settings.previewPlacement)
      const content = new Region(settings.previewPlacement)
      this.previewPanes = {
        border,
        content,
        borderWriter: new BoundedWriter(terminal, border, settings.glyphs),
        contentWriter: new BoundedWriter(terminal, content, settings.glyphs),
      }
    } else {
      this.previewPanes = null
    }
  }

  /** Rows reserved above the panes; a boxed menu carries its title in the border instead. */
  private reservedTitleRows(columns: number): number {
    if (!this.title || this.settings.boxed) return 0
    return titleRowsFor(this.title, columns)
  }

  private layout(): void {
    const { rows, columns } = this.terminal.size()
    const screen = screenRect(rows, columns)
    const titleRows = Math.min(rows, this.reservedTitleRows(columns))
    const titleOffset = topRowsOffset(titleRows)

    this.titleRegion.layout({ topLeft: screen.topLeft, bottomRight: { row: titleRows, col: columns } })
    this.mainBorder.setOffset(titleOffset)
    this.mainContent.setOffset(combineOffsets(titleOffset, this.settings.boxed ? INSET_ONE : null))
    this.mainBorder.layout(screen)
    this.mainContent.layout(screen)
    if (this.previewPanes) {
      this.previewPanes.border.setOffset(titleOffset)
      this.previewPanes.content.setOffset(combineOffsets(titleOffset, INSET_ONE))
      this.previewPanes.border.layout(screen)
      this.previewPanes.content.layout(screen)
    }
  }

  private drawFrame(): void {
    this.terminal.erase()
    this.layout()

    if (this.title && !this.settings.boxed) {
      this.titleWriter.reset()
      this.terminal.attributeOn("bold")
      this.titleWriter.write(this.title)
      this.terminal.attributeOff("bold")
    }
    if (this.settings.boxed) {
      this.mainBorderWriter.drawBox(this.title ?? "")
    }

    this.mainWriter.reset()
    const paneHeight = rectHeight(this.mainContent.bounds)
    this.items.ensureMaterialized(this.viewport.materializationTarget(paneHeight))

    if (this.previewPanes) {
      this.previewPanes.borderWriter.drawBox(this.settings.previewLabel)
      this.previewPanes.contentWriter.reset()
    }

    const highlighted = this.viewport.highlighted
    for (let index = this.viewport.windowStart; ; index += 1) {
      const item = this.items.get(index)
      if (!item) break
      const isHighlighted = index === highlighted
      if (!this.mainWriter.writeItem(item, isHighlighted)) break
      if (isHighlighted && this.previewPanes && item.previewText != null) {
        this.previewPanes.contentWriter.write(item.previewText)
      }
    }
  }

  render(): void {
    this.drawFrame()
    const hoverBefore = this.viewport.hover
    this.viewport.setRendered(this.mainWriter.itemsWritten)
    // A shrunken pane can cut off the hovered row; redraw once with the hover pulled back.
    if (this.viewport.hover !== hoverBefore) {
      this.drawFrame()
      this.viewport.setRendered(this.mainWriter.itemsWritten)
    }
    this.terminal.refresh()
    this.settings.logger.debug("frame", {
      main: this.mainContent.bounds,
      preview: this.previewPanes?.content.bounds ?? null,
      ...this.viewport.snapshot(),
      cached: this.items.length,
    })
  }

  handleKey(code: number): SelectionOutcome {
    const action = this.settings.bindings.resolve(code, this.settings.mode === "multi")
    const index = this.viewport.highlighted
    switch (action) {
      case "moveDown":
      case "moveUp": {
        const result = this.viewport.move(action === "moveDown" ? 1 : -1, this.items.length)
        if (result === "scrolled") {
          this.settings.logger.debug("scroll", { windowStart: this.viewport.windowStart })
        }
        return "continue"
      }
      case "toggleSelect": {
        const outcome = this.selection.toggle(index, this.items.get(index))
        this.settings.logger.debug("selection", { action, index, selection: this.selection.indices })
        return outcome
      }
      case "select": {
        const outcome = this.selection.select(index, this.items.get(index))
        this.settings.logger.debug("selection", { action, index, selection: this.selection.indices })
        return outcome
      }
      default:
        return "continue"
    }
  }

  /** Render, wait for a key, dispatch; the terminal is released on every exit path. */
  async run(): Promise<number[]> {
    this.settings.logger.debug("session.start", { mode: this.settings.mode })
    this.terminal.enter()
    try {
      this.render()
      for (;;) {
        const code = await this.terminal.readKey()
        this.settings.logger.debug("key", { code })
        if (isQuitKey(code)) break
        if (this.handleKey(code) === "done") break
        this.render()
      }
    } finally {
      this.terminal.leave()
    }
    const selected = this.selection.finish()
    this.settings.logger.debug("session.end", { selection: selected })
    return selected
  }
}
