import { sanitizeDisplayText } from "../util/graphemes.js"
import type { DisplayRenderer } from "./types.js"

export class DisplayItem {
  private isChosen = false

  constructor(
    readonly rawText: string,
    readonly iconDefault: string,
    readonly iconChosen: string,
    readonly previewText: string | null = null,
  ) {}

  get chosen(): boolean {
    return this.isChosen
  }

  get icon(): string {
    return this.isChosen ? this.iconChosen : this.iconDefault
  }

  toggleChosen(): boolean {
    this.isChosen = !this.isChosen
    return this.isChosen
  }

  toString(): string {
    return `${this.icon} ${this.rawText}`
  }
}

export interface MaterializerOptions<T> {
  readonly icon: string
  readonly chosenIcon: string
  readonly display: DisplayRenderer<T>
  readonly preview?: DisplayRenderer<T> | null
  readonly onMaterialize?: (index: number) => void
}

const defaultDisplay: DisplayRenderer<unknown> = { render: (element) => String(element) }

export const stringDisplay = <T>(): DisplayRenderer<T> => defaultDisplay

/**
 * Append-only cache over a pull-based source. The source iterator is created
 * once and each element is read from it at most once.
 */
export class ItemMaterializer<T> {
  private readonly items: DisplayItem[] = []
  private readonly iterator: Iterator<T>
  private done = false

  constructor(
    source: Iterable<T>,
    private readonly options: MaterializerOptions<T>,
  ) {
    this.iterator = source[Symbol.iterator]()
  }

  get length(): number {
    return this.items.length
  }

  get exhausted(): boolean {
    return this.done
  }

  /** Cached entry only; never pulls from the source. */
  get(index: number): DisplayItem | undefined {
    return this.items[index]
  }

  ensureMaterialized(index: number): DisplayItem | undefined {
    if (!Number.isInteger(index) || index < 0) return undefined
    while (this.items.length <= index) {
      if (this.done) return undefined
      const next = this.iterator.next()
      if (next.done) {
        this.done = true
        return undefined
      }
      this.items.push(this.materialize(next.value))
      this.options.onMaterialize?.(this.items.length - 1)
    }
    return this.items[index]
  }

  private materialize(element: T): DisplayItem {
    const text = sanitizeDisplayText(this.options.display.render(element))
    // Previews are computed eagerly, once per element, whether or not the item is ever hovered.
    const preview = this.options.preview ? sanitizeDisplayText(this.options.preview.render(element)) : null
    return new DisplayItem(text, this.options.icon, this.options.chosenIcon, preview)
  }
}
