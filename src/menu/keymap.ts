import { KEY } from "../terminal/keyCodes.js"
import { MenuConfigError } from "./errors.js"
import type { MenuAction } from "./types.js"

export type ActionBindingTable = Record<MenuAction, ReadonlyArray<number>>

export const MENU_ACTIONS: readonly MenuAction[] = ["moveUp", "moveDown", "select", "toggleSelect"]

export const DEFAULT_BINDINGS: ActionBindingTable = {
  moveDown: [KEY.down, "j".charCodeAt(0)],
  moveUp: [KEY.up, "k".charCodeAt(0)],
  select: [KEY.enter],
  toggleSelect: [KEY.space],
}

// Checked before any binding, so neither key can be rebound.
export const QUIT_KEYS: ReadonlySet<number> = new Set([KEY.escape, "q".charCodeAt(0)])

/** Dispatch order when one code is bound to several actions. */
const DISPATCH_ORDER: readonly MenuAction[] = ["moveDown", "moveUp", "toggleSelect", "select"]

export class KeyBindings {
  private readonly table: Record<MenuAction, number[]>
  private frozen = false

  constructor(base: ActionBindingTable = DEFAULT_BINDINGS) {
    this.table = {
      moveUp: [...base.moveUp],
      moveDown: [...base.moveDown],
      select: [...base.select],
      toggleSelect: [...base.toggleSelect],
    }
  }

  add(action: MenuAction, code: number): void {
    if (this.frozen) {
      throw new MenuConfigError(`keys.${action}`, `cannot bind ${code} while a session runs`)
    }
    if (!this.table[action].includes(code)) this.table[action].push(code)
  }

  codes(action: MenuAction): readonly number[] {
    return this.table[action]
  }

  freeze(): void {
    this.frozen = true
  }

  /**
   * Maps a key code to the action it triggers. The toggle action only
   * participates when `toggleEnabled` is set (multi-select menus).
   */
  resolve(code: number, toggleEnabled: boolean): MenuAction | null {
    for (const action of DISPATCH_ORDER) {
      if (action === "toggleSelect" && !toggleEnabled) continue
      if (this.table[action].includes(code)) return action
    }
    return null
  }

  toTable(): ActionBindingTable {
    return {
      moveUp: [...this.table.moveUp],
      moveDown: [...this.table.moveDown],
      select: [...this.table.select],
      toggleSelect: [...this.table.toggleSelect],
    }
  }
}

export const isQuitKey = (code: number): boolean => QUIT_KEYS.has(code)
