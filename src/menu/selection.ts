import type { DisplayItem } from "./itemMaterializer.js"
import type { SelectionMode } from "./types.js"

export type SelectionOutcome = "continue" | "done"

export class SelectionEngine {
  private readonly chosen: number[] = []

  constructor(readonly mode: SelectionMode) {}

  get indices(): readonly number[] {
    return this.chosen
  }

  /**
   * The select key always ends the session. In single mode it records the
   * highlighted index first, unless that index is already the last recorded one.
   * In multi mode the selection is finalized as it stands.
   */
  select(index: number, item: DisplayItem | undefined): SelectionOutcome {
    if (this.mode === "multi" || !item) return "done"
    if (this.chosen[this.chosen.length - 1] === index) return "done"
    item.toggleChosen()
    this.chosen.push(index)
    return "done"
  }

  /** Multi mode only; single mode ignores the toggle key. */
  toggle(index: number, item: DisplayItem | undefined): SelectionOutcome {
    if (this.mode !== "multi" || !item) return "continue"
    const nowChosen = item.toggleChosen()
    const position = this.chosen.indexOf(index)
    if (nowChosen && position === -1) {
      this.chosen.push(index)
    } else if (!nowChosen && position !== -1) {
      this.chosen.splice(position, 1)
    }
    return "continue"
  }

  finish(): number[] {
    return [...this.chosen]
  }
}
