import { MenuConfigError } from "./errors.js"
import type { Coordinate, Placement, Rect, RectOffset, ScreenSide } from "./types.js"

export const ZERO: Coordinate = { row: 0, col: 0 }

export const rect = (top: number, left: number, bottom: number, right: number): Rect => ({
  topLeft: { row: top, col: left },
  bottomRight: { row: bottom, col: right },
})

export const screenRect = (rows: number, columns: number): Rect => rect(0, 0, Math.max(0, rows), Math.max(0, columns))

export const rectHeight = (bounds: Rect): number => Math.max(0, bounds.bottomRight.row - bounds.topLeft.row)

export const rectWidth = (bounds: Rect): number => Math.max(0, bounds.bottomRight.col - bounds.topLeft.col)

export const isValidWidth = (width: number): boolean => Number.isFinite(width) && width > 0 && width <= 1

export const assertWidth = (width: number, setting = "width"): void => {
  if (!isValidWidth(width)) {
    throw new MenuConfigError(setting, `expected a fraction in (0, 1], received ${width}`)
  }
}

export const complementSide = (side: ScreenSide): ScreenSide => {
  switch (side) {
    case "top":
      return "bottom"
    case "bottom":
      return "top"
    case "left":
      return "right"
    case "right":
      return "left"
    case "full":
    default:
      return "full"
  }
}

/**
 * Carves the part of `screen` that sits on `side` and covers `width` of it.
 * Bottom and right panes start one cell past the complementary split so the
 * two halves of a split never share an edge row/column.
 */
export const resolveRect = (screen: Rect, side: ScreenSide, width: number): Rect => {
  assertWidth(width)
  const { topLeft, bottomRight } = screen
  const height = bottomRight.row - topLeft.row
  const span = bottomRight.col - topLeft.col
  switch (side) {
    case "top":
      return {
        topLeft,
        bottomRight: { row: topLeft.row + Math.floor(height * width), col: bottomRight.col },
      }
    case "bottom":
      return {
        topLeft: { row: topLeft.row + Math.floor(height * (1 - width)) + 1, col: topLeft.col },
        bottomRight,
      }
    case "left":
      return {
        topLeft,
        bottomRight: { row: bottomRight.row, col: topLeft.col + Math.floor(span * width) },
      }
    case "right":
      return {
        topLeft: { row: topLeft.row, col: topLeft.col + Math.floor(span * (1 - width)) + 1 },
        bottomRight,
      }
    case "full":
    default:
      return screen
  }
}

export const addOffset = (bounds: Rect, offset: RectOffset | null): Rect => {
  if (!offset) return bounds
  return {
    topLeft: {
      row: bounds.topLeft.row + offset.topLeft.row,
      col: bounds.topLeft.col + offset.topLeft.col,
    },
    bottomRight: {
      row: bounds.bottomRight.row + offset.bottomRight.row,
      col: bounds.bottomRight.col + offset.bottomRight.col,
    },
  }
}

export const combineOffsets = (...offsets: ReadonlyArray<RectOffset | null>): RectOffset | null => {
  const present = offsets.filter((entry): entry is RectOffset => entry != null)
  if (present.length === 0) return null
  return present.reduce((acc, entry) => ({
    topLeft: { row: acc.topLeft.row + entry.topLeft.row, col: acc.topLeft.col + entry.topLeft.col },
    bottomRight: {
      row: acc.bottomRight.row + entry.bottomRight.row,
      col: acc.bottomRight.col + entry.bottomRight.col,
    },
  }))
}

export const INSET_ONE: RectOffset = {
  topLeft: { row: 1, col: 1 },
  bottomRight: { row: -1, col: -1 },
}

export const topRowsOffset = (rows: number): RectOffset | null =>
  rows > 0 ? { topLeft: { row: rows, col: 0 }, bottomRight: ZERO } : null

/** Keeps the top-left <= bottom-right invariant after offsets shrink a tiny pane. */
const normalizeRect = (bounds: Rect): Rect => ({
  topLeft: bounds.topLeft,
  bottomRight: {
    row: Math.max(bounds.topLeft.row, bounds.bottomRight.row),
    col: Math.max(bounds.topLeft.col, bounds.bottomRight.col),
  },
})

/**
 * A pane: a placement rule plus an optional static offset. `layout` must run on
 * every frame so terminal resizes are picked up.
 */
export class Region {
  private placement: Placement
  private offset: RectOffset | null
  private current: Rect = rect(0, 0, 0, 0)

  constructor(placement: Placement, offset: RectOffset | null = null) {
    assertWidth(placement.width)
    this.placement = placement
    this.offset = offset
  }

  get side(): ScreenSide {
    return this.placement.side
  }

  get width(): number {
    return this.placement.width
  }

  get bounds(): Rect {
    return this.current
  }

  setPlacement(side: ScreenSide, width: number): void {
    assertWidth(width)
    this.placement = { side, width }
  }

  setOffset(offset: RectOffset | null): void {
    this.offset = offset
  }

  layout(screen: Rect): Rect {
    const placed = resolveRect(screen, this.placement.side, this.placement.width)
    this.current = normalizeRect(addOffset(placed, this.offset))
    return this.current
  }
}
