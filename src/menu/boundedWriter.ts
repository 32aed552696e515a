import type { TerminalAttribute, TerminalDriver } from "../terminal/driver.js"
import { BOX_GLYPHS, DEFAULT_PREVIEW_LABEL, type BoxGlyphs } from "../theme.js"
import { clipGraphemes, graphemeLength, splitGraphemes } from "../util/graphemes.js"
import { rectHeight, rectWidth, type Region } from "./geometry.js"
import type { DisplayItem } from "./itemMaterializer.js"
import type { Coordinate, Rect } from "./types.js"

/**
 * Cursor-driven writer confined to one region. Text wraps at the right edge and
 * anything past the bottom edge is dropped.
 */
export class BoundedWriter {
  private cursorRow = 0
  private cursorCol = 0
  private written = 0

  constructor(
    private readonly terminal: TerminalDriver,
    private readonly region: Region,
    private readonly glyphs: BoxGlyphs = BOX_GLYPHS,
  ) {}

  get bounds(): Rect {
    return this.region.bounds
  }

  get cursor(): Coordinate {
    return { row: this.cursorRow, col: this.cursorCol }
  }

  /** Items accepted by `writeItem` since the last reset. */
  get itemsWritten(): number {
    return this.written
  }

  reset(): void {
    const { topLeft } = this.region.bounds
    this.cursorRow = topLeft.row
    this.cursorCol = topLeft.col
    this.written = 0
  }

  private get clipped(): boolean {
    return this.cursorRow >= this.region.bounds.bottomRight.row
  }

  private newline(): void {
    this.cursorRow += 1
    this.cursorCol = this.region.bounds.topLeft.col
  }

  write(text: string): void {
    const { topLeft, bottomRight } = this.region.bounds
    if (bottomRight.col <= topLeft.col) return
    let run = ""
    let runCol = this.cursorCol

    const flush = () => {
      if (run.length > 0) {
        this.terminal.writeAt(this.cursorRow, runCol, run)
        run = ""
      }
    }

    for (const grapheme of splitGraphemes(text)) {
      if (grapheme === "\n") {
        flush()
        this.newline()
        runCol = this.cursorCol
        continue
      }
      // Wrapping is deferred until a character needs the next row, so a line
      // that exactly fills the width followed by `\n` does not leave a blank row.
      if (this.cursorCol >= bottomRight.col) {
        flush()
        this.newline()
        runCol = this.cursorCol
      }
      if (this.clipped) return
      run += grapheme
      this.cursorCol += 1
    }
    flush()
  }

  writeChar(char: string): void {
    this.write(clipGraphemes(char, 1))
  }

  skipLines(count: number): void {
    this.cursorRow += count
    this.cursorCol = this.region.bounds.topLeft.col
  }

  private withAttributes(attributes: readonly TerminalAttribute[], draw: () => void): void {
    for (const attribute of attributes) this.terminal.attributeOn(attribute)
    try {
      draw()
    } finally {
      for (const attribute of [...attributes].reverse()) this.terminal.attributeOff(attribute)
    }
  }

  /** Draws one list row; false means the pane is full and nothing was drawn. */
  writeItem(item: DisplayItem, highlighted: boolean): boolean {
    if (this.clipped) return false
    this.withAttributes([item.chosen ? "chosen" : "unchosen", "bold"], () => {
      this.write(item.icon)
      this.write(" ")
    })
    this.withAttributes(highlighted ? ["highlight"] : [], () => this.write(item.rawText))
    this.written += 1
    this.skipLines(1)
    return true
  }

  drawBox(label: string = DEFAULT_PREVIEW_LABEL): void {
    const { topLeft, bottomRight } = this.region.bounds
    const width = rectWidth(this.region.bounds)
    const height = rectHeight(this.region.bounds)
    if (width < 2 || height < 2) return
    const { horizontal, vertical } = this.glyphs
    const shownLabel = clipGraphemes(label, width - 2)
    const fill = width - 2 - graphemeLength(shownLabel)

    this.terminal.writeAt(
      topLeft.row,
      topLeft.col,
      `${this.glyphs.topLeft}${shownLabel}${horizontal.repeat(fill)}${this.glyphs.topRight}`,
    )
    for (let row = topLeft.row + 1; row < bottomRight.row - 1; row += 1) {
      this.terminal.writeAt(row, topLeft.col, vertical)
      this.terminal.writeAt(row, bottomRight.col - 1, vertical)
    }
    this.terminal.writeAt(
      bottomRight.row - 1,
      topLeft.col,
      `${this.glyphs.bottomLeft}${horizontal.repeat(width - 2)}${this.glyphs.bottomRight}`,
    )
  }
}
