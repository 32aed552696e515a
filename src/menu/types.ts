export interface Coordinate {
  readonly row: number
  readonly col: number
}

/** Screen rectangle; `bottomRight` is exclusive on both axes. */
export interface Rect {
  readonly topLeft: Coordinate
  readonly bottomRight: Coordinate
}

/** Corner deltas added to a resolved rectangle, e.g. to reserve title rows. */
export interface RectOffset {
  readonly topLeft: Coordinate
  readonly bottomRight: Coordinate
}

export type ScreenSide = "top" | "bottom" | "left" | "right" | "full"

export const SCREEN_SIDES: readonly ScreenSide[] = ["top", "bottom", "left", "right", "full"]

export interface Placement {
  readonly side: ScreenSide
  readonly width: number
}

/** Converts a source element into text. Plain functions and objects both qualify. */
export interface DisplayRenderer<T> {
  render(element: T): string
}

export type DisplayFn<T> = (element: T) => string

export type RendererLike<T> = DisplayRenderer<T> | DisplayFn<T>

export const toRenderer = <T>(value: RendererLike<T>): DisplayRenderer<T> =>
  typeof value === "function" ? { render: value } : value

export type MenuAction = "moveUp" | "moveDown" | "select" | "toggleSelect"

export type SelectionMode = "single" | "multi"
