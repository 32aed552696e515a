export const SCROLL_DOWN_THRESHOLD = 0.67
export const SCROLL_UP_THRESHOLD = 0.33

export type MoveDelta = 1 | -1

export interface ViewportSnapshot {
  readonly hover: number
  readonly windowStart: number
  readonly itemsRendered: number
}

export type MoveResult = "rejected" | "moved" | "scrolled"

/**
 * Hover and scroll state over the item cache. Hover is relative to the window
 * and bounded by what the last frame actually drew; the window scrolls one row
 * at a time once the hover crosses the top or bottom third.
 */
export class Viewport {
  private hoverIndex = 0
  private start = 0
  private rendered = 0

  get hover(): number {
    return this.hoverIndex
  }

  get windowStart(): number {
    return this.start
  }

  get itemsRendered(): number {
    return this.rendered
  }

  /** Absolute index of the highlighted item. */
  get highlighted(): number {
    return this.start + this.hoverIndex
  }

  snapshot(): ViewportSnapshot {
    return { hover: this.hoverIndex, windowStart: this.start, itemsRendered: this.rendered }
  }

  /** Last index the cache must hold so a pane of `paneHeight` rows can be filled. */
  materializationTarget(paneHeight: number): number {
    return this.start + Math.max(0, paneHeight)
  }

  /**
   * Records how many items the frame drew. A shrinking terminal can leave the
   * hover below the last drawn row; it is pulled back onto it.
   */
  setRendered(count: number): void {
    this.rendered = Math.max(0, count)
    if (this.rendered > 0 && this.hoverIndex >= this.rendered) {
      this.hoverIndex = this.rendered - 1
    }
  }

  move(delta: MoveDelta, cachedItems: number): MoveResult {
    const visible = this.rendered
    const nextHover = this.hoverIndex + delta
    if (nextHover < 0 || nextHover >= visible) return "rejected"

    this.hoverIndex = nextHover
    if (nextHover > visible * SCROLL_DOWN_THRESHOLD && this.start + visible < cachedItems) {
      this.start += 1
      this.hoverIndex -= 1
      return "scrolled"
    }
    if (nextHover < visible * SCROLL_UP_THRESHOLD && this.start > 0 && delta < 0) {
      this.start -= 1
      this.hoverIndex += 1
      return "scrolled"
    }
    return "moved"
  }
}
