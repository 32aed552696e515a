import os from "node:os"

export const ALT_SCREEN_ENABLE = "\u001B[?1049h"
export const ALT_SCREEN_DISABLE = "\u001B[?1049l"
export const CURSOR_HIDE = "\u001B[?25l"
export const CURSOR_SHOW = "\u001B[?25h"
export const ERASE_SCREEN = "\u001B[2J"
export const CURSOR_HOME = "\u001B[H"

export const moveTo = (row: number, col: number): string => `\u001B[${row + 1};${col + 1}H`

type Restorer = () => void

const restorers = new Set<Restorer>()
let cleanupRegistered = false

const SIGNALS: Array<NodeJS.Signals> = ["SIGINT", "SIGTERM", "SIGQUIT"]

const runRestorers = () => {
  for (const restore of [...restorers]) {
    restorers.delete(restore)
    restore()
  }
}

const handleProcessExit = () => {
  runRestorers()
}

const handleSignal = (signal: NodeJS.Signals) => {
  runRestorers()
  unregisterCleanupHandlers()
  process.exit(128 + (os.constants.signals[signal] ?? 0))
}

const registerCleanupHandlers = () => {
  if (cleanupRegistered) return
  cleanupRegistered = true
  process.on("exit", handleProcessExit)
  for (const signal of SIGNALS) {
    process.on(signal, handleSignal)
  }
}

const unregisterCleanupHandlers = () => {
  if (!cleanupRegistered) return
  cleanupRegistered = false
  process.removeListener("exit", handleProcessExit)
  for (const signal of SIGNALS) {
    process.removeListener(signal, handleSignal)
  }
}

/**
 * Keeps `restore` armed until the returned release function runs, so a process
 * that exits or is signalled while a menu is open still gets its terminal back.
 */
export const armTerminalRestore = (restore: Restorer): (() => void) => {
  restorers.add(restore)
  registerCleanupHandlers()
  return () => {
    restorers.delete(restore)
    if (restorers.size === 0) unregisterCleanupHandlers()
  }
}

export const pendingRestoreCount = (): number => restorers.size
