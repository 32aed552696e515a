export type TerminalAttribute = "highlight" | "chosen" | "unchosen" | "bold"

export interface TerminalSize {
  readonly rows: number
  readonly columns: number
}

/**
 * The drawing surface a menu session owns while it runs. Rows and columns are
 * zero-based; key codes are opaque integers matched against key bindings.
 */
export interface TerminalDriver {
  enter(): void
  leave(): void
  size(): TerminalSize
  readKey(): Promise<number>
  writeAt(row: number, col: number, text: string): void
  attributeOn(attribute: TerminalAttribute): void
  attributeOff(attribute: TerminalAttribute): void
  erase(): void
  refresh(): void
}
