import { openSync } from "node:fs"
import tty from "node:tty"
import type { ChalkInstance } from "chalk"
import { TerminalError } from "../menu/errors.js"
import { createChalk, type ColorMode } from "../theme.js"
import type { TerminalAttribute, TerminalDriver, TerminalSize } from "./driver.js"
import { decodeKeys, splitPendingEscape } from "./keyCodes.js"
import {
  ALT_SCREEN_DISABLE,
  ALT_SCREEN_ENABLE,
  CURSOR_HIDE,
  CURSOR_HOME,
  CURSOR_SHOW,
  ERASE_SCREEN,
  armTerminalRestore,
  moveTo,
} from "./terminalControl.js"

const FALLBACK_SIZE: TerminalSize = { rows: 24, columns: 80 }

/** How long a trailing ESC waits for the rest of a sequence before it counts as the Escape key. */
export const ESCAPE_TIMEOUT_MS = 50

export interface KeyInput extends NodeJS.EventEmitter {
  readonly isTTY?: boolean
  setRawMode?: (mode: boolean) => unknown
  setEncoding(encoding: BufferEncoding): unknown
  resume(): unknown
  pause(): unknown
}

export interface ScreenOutput {
  readonly rows?: number
  readonly columns?: number
  write(chunk: string): boolean
}

export interface AnsiTerminalOptions {
  readonly input?: KeyInput
  readonly output?: ScreenOutput
  readonly colorMode?: ColorMode
  /** Runs after the terminal is restored on `leave`; closes streams the caller opened for this terminal. */
  readonly onLeave?: () => void
}

type PendingRead = {
  resolve: (code: number) => void
  reject: (error: Error) => void
}

/**
 * Escape-sequence terminal over Node streams. Drawing is buffered until
 * `refresh`; the alternate screen keeps the user's scrollback untouched.
 */
export class AnsiTerminal implements TerminalDriver {
  private readonly input: KeyInput
  private readonly output: ScreenOutput
  private readonly chalk: ChalkInstance
  private readonly active = new Set<TerminalAttribute>()
  private readonly queued: number[] = []
  private pending: PendingRead | null = null
  private failure: TerminalError | null = null
  private buffer = ""
  private entered = false
  private releaseRestore: (() => void) | null = null
  private pendingEscape = ""
  private escapeTimer: NodeJS.Timeout | null = null
  private readonly onLeave: (() => void) | null

  constructor(options: AnsiTerminalOptions = {}) {
    this.input = options.input ?? process.stdin
    this.output = options.output ?? process.stdout
    this.chalk = createChalk(options.colorMode ?? "ansi16")
    this.onLeave = options.onLeave ?? null
  }

  private readonly onData = (chunk: string | Buffer) => {
    const text = typeof chunk === "string" ? chunk : chunk.toString("utf8")
    this.clearEscapeTimer()
    const { complete, pending } = splitPendingEscape(this.pendingEscape + text)
    this.pendingEscape = pending
    this.deliver(complete)
    if (pending.length > 0) {
      this.escapeTimer = setTimeout(this.flushPendingEscape, ESCAPE_TIMEOUT_MS)
    }
  }

  private readonly flushPendingEscape = () => {
    this.escapeTimer = null
    const pending = this.pendingEscape
    this.pendingEscape = ""
    this.deliver(pending)
  }

  private clearEscapeTimer(): void {
    if (this.escapeTimer) {
      clearTimeout(this.escapeTimer)
      this.escapeTimer = null
    }
  }

  private deliver(text: string): void {
    for (const code of decodeKeys(text)) {
      if (this.pending) {
        const { resolve } = this.pending
        this.pending = null
        resolve(code)
      } else {
        this.queued.push(code)
      }
    }
  }

  private readonly onEnd = () => {
    this.clearEscapeTimer()
    this.flushPendingEscape()
    this.fail(new TerminalError("Terminal input closed while waiting for a key."))
  }

  private readonly onError = (error: Error) => {
    this.fail(new TerminalError(`Terminal input failed: ${error.message}`, error))
  }

  private fail(error: TerminalError): void {
    this.failure = error
    if (this.pending) {
      const { reject } = this.pending
      this.pending = null
      reject(error)
    }
  }

  enter(): void {
    if (this.entered) return
    if (!this.input.isTTY || typeof this.input.setRawMode !== "function") {
      throw new TerminalError("An interactive terminal is required to show the menu.")
    }
    this.input.setRawMode(true)
    this.input.setEncoding("utf8")
    this.input.on("data", this.onData)
    this.input.on("end", this.onEnd)
    this.input.on("error", this.onError)
    this.input.resume()
    this.output.write(`${ALT_SCREEN_ENABLE}${CURSOR_HIDE}`)
    this.entered = true
    this.releaseRestore = armTerminalRestore(() => this.restore())
  }

  leave(): void {
    if (!this.entered) return
    this.releaseRestore?.()
    this.releaseRestore = null
    this.restore()
  }

  private restore(): void {
    if (!this.entered) return
    this.entered = false
    this.input.removeListener("data", this.onData)
    this.input.removeListener("end", this.onEnd)
    this.input.removeListener("error", this.onError)
    this.clearEscapeTimer()
    this.pendingEscape = ""
    this.input.setRawMode?.(false)
    this.input.pause()
    this.buffer = ""
    this.active.clear()
    this.output.write(`${CURSOR_SHOW}${ALT_SCREEN_DISABLE}`)
    this.onLeave?.()
  }

  size(): TerminalSize {
    const rows = this.output.rows
    const columns = this.output.columns
    return {
      rows: rows && rows > 0 ? rows : FALLBACK_SIZE.rows,
      columns: columns && columns > 0 ? columns : FALLBACK_SIZE.columns,
    }
  }

  readKey(): Promise<number> {
    const next = this.queued.shift()
    if (next !== undefined) return Promise.resolve(next)
    if (this.failure) return Promise.reject(this.failure)
    if (this.pending) {
      return Promise.reject(new TerminalError("Only one key read may be pending at a time."))
    }
    return new Promise<number>((resolve, reject) => {
      this.pending = { resolve, reject }
    })
  }

  private styled(text: string): string {
    if (this.active.size === 0 || this.chalk.level === 0) {
      return this.active.has("highlight") ? `\u001B[7m${text}\u001B[27m` : text
    }
    let style = this.chalk
    if (this.active.has("bold")) style = style.bold
    if (this.active.has("chosen")) style = style.green
    else if (this.active.has("unchosen")) style = style.red
    if (this.active.has("highlight")) style = style.black.bgWhite
    return style(text)
  }

  writeAt(row: number, col: number, text: string): void {
    if (text.length === 0) return
    this.buffer += `${moveTo(row, col)}${this.styled(text)}`
  }

  attributeOn(attribute: TerminalAttribute): void {
    this.active.add(attribute)
  }

  attributeOff(attribute: TerminalAttribute): void {
    this.active.delete(attribute)
  }

  erase(): void {
    this.buffer += `${ERASE_SCREEN}${CURSOR_HOME}`
  }

  refresh(): void {
    if (this.buffer.length === 0) return
    const frame = this.buffer
    this.buffer = ""
    this.output.write(frame)
  }
}

export interface ClosableInput extends KeyInput {
  destroy(): unknown
}

export interface ClosableOutput extends ScreenOutput {
  destroy(): unknown
}

/** Opens the controlling terminal for key input or for drawing. */
export interface ControllingTty {
  openInput(): ClosableInput
  openOutput(): ClosableOutput
}

export interface TerminalHost {
  readonly stdinIsTTY: boolean
  readonly stdoutIsTTY: boolean
  readonly stdin: KeyInput
  readonly stdout: ScreenOutput
  readonly tty: ControllingTty
}

const openControllingTty = (flags: "r" | "w"): number => {
  try {
    return openSync("/dev/tty", flags)
  } catch (error) {
    throw new TerminalError("No controlling terminal available for the menu.", error)
  }
}

export const DEV_TTY: ControllingTty = {
  openInput: () => new tty.ReadStream(openControllingTty("r")),
  openOutput: () => new tty.WriteStream(openControllingTty("w")),
}

// process.stdin is only touched when it is the key source; piped items are read from fd 0 directly.
const processHost = (): TerminalHost => ({
  stdinIsTTY: tty.isatty(0),
  stdoutIsTTY: tty.isatty(1),
  get stdin() {
    return process.stdin
  },
  get stdout() {
    return process.stdout
  },
  tty: DEV_TTY,
})

/**
 * Terminal bound to the controlling TTY. Piped stdin carries items, so keys
 * come from `/dev/tty`; redirected stdout carries the result, so drawing goes
 * to `/dev/tty` as well. Streams opened here are closed on `leave`.
 */
export const openTerminal = (colorMode: ColorMode, host: TerminalHost = processHost()): AnsiTerminal => {
  const opened: Array<ClosableInput | ClosableOutput> = []
  try {
    let input = host.stdin
    if (!host.stdinIsTTY) {
      const ttyInput = host.tty.openInput()
      opened.push(ttyInput)
      input = ttyInput
    }
    let output = host.stdout
    if (!host.stdoutIsTTY) {
      const ttyOutput = host.tty.openOutput()
      opened.push(ttyOutput)
      output = ttyOutput
    }
    return new AnsiTerminal({
      input,
      output,
      colorMode,
      onLeave: () => {
        for (const stream of opened) stream.destroy()
      },
    })
  } catch (error) {
    for (const stream of opened) stream.destroy()
    throw error
  }
}
