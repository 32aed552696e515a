import { closeSync, openSync, promises as fs, readSync } from "node:fs"
import path from "node:path"
import { StringDecoder } from "node:string_decoder"
import tty from "node:tty"
import { MenuConfigError } from "../menu/errors.js"
import { Menu } from "../menu/menu.js"
import type { ScreenSide } from "../menu/types.js"
import { applyMenuConfig } from "../menu_config/apply.js"
import { resolveMenuConfig } from "../menu_config/load.js"
import type { TerminalDriver } from "../terminal/driver.js"
import { createDebugLogger } from "../util/debugLog.js"
import { normalizeNewlines } from "../util/graphemes.js"

export type OutputMode = "indices" | "items" | "json"

export const OUTPUT_MODES: readonly OutputMode[] = ["indices", "items", "json"]

export interface RangeSpec {
  readonly start: number
  /** Exclusive; null means the sequence never ends. */
  readonly end: number | null
}

const RANGE_RE = /^(-?\d+)\.\.(-?\d+)?$/

export const parseRange = (value: string): RangeSpec => {
  const match = value.trim().match(RANGE_RE)
  if (!match) {
    throw new MenuConfigError("--range", `expected <start>..<end> or <start>.., received "${value}"`)
  }
  const start = Number.parseInt(match[1] ?? "0", 10)
  const end = match[2] == null ? null : Number.parseInt(match[2], 10)
  if (end != null && end < start) {
    throw new MenuConfigError("--range", `end ${end} is below start ${start}`)
  }
  return { start, end }
}

export function* rangeItems(spec: RangeSpec): Generator<string> {
  for (let value = spec.start; spec.end == null || value < spec.end; value += 1) {
    yield String(value)
  }
}

/** Splits text into lines, dropping the empty line a trailing newline leaves behind. */
export const splitLines = (text: string): string[] => {
  const lines = normalizeNewlines(text).split("\n")
  if (lines[lines.length - 1] === "") lines.pop()
  return lines
}

/** Fills `buffer` from the start and returns the byte count; 0 means end of input. */
export type ChunkReader = (buffer: Buffer) => number

const READ_CHUNK_BYTES = 64 * 1024

/**
 * Lines pulled from `read` only as far as the consumer iterates, so an endless
 * producer (`yes | pickpane`) still opens the menu.
 */
export function* readerLines(read: ChunkReader, chunkBytes = READ_CHUNK_BYTES): Generator<string> {
  const buffer = Buffer.alloc(chunkBytes)
  const decoder = new StringDecoder("utf8")
  let partial = ""
  for (;;) {
    const count = read(buffer)
    if (count === 0) break
    const lines = (partial + decoder.write(buffer.subarray(0, count))).split("\n")
    partial = lines.pop() ?? ""
    for (const line of lines) yield line.endsWith("\r") ? line.slice(0, -1) : line
  }
  partial += decoder.end()
  if (partial.length > 0) yield partial.endsWith("\r") ? partial.slice(0, -1) : partial
}

const errnoCode = (error: unknown): string | null =>
  error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : null

const pause = (ms: number) => Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms)

/** Blocking reader over a descriptor; a non-blocking pipe is polled until data or end of input. */
export const descriptorReader =
  (fd: number): ChunkReader =>
  (buffer) => {
    for (;;) {
      try {
        return readSync(fd, buffer, 0, buffer.length, null)
      } catch (error) {
        const code = errnoCode(error)
        if (code === "EAGAIN") {
          pause(10)
          continue
        }
        if (code === "EOF") return 0
        throw error
      }
    }
  }

export interface ItemSourceOptions {
  readonly items: readonly string[]
  readonly file: string | null
  readonly range: string | null
}

export interface ItemInput {
  readonly isTTY: boolean
  readonly read: ChunkReader
}

const processStdin = (): ItemInput => ({ isTTY: tty.isatty(0), read: descriptorReader(0) })

/**
 * Exactly one source is used: positional items, `--file`, `--range`, or piped
 * stdin when none of the others is given.
 */
export const resolveItemSource = async (options: ItemSourceOptions, stdin: ItemInput): Promise<Iterable<string>> => {
  const given = [options.items.length > 0, options.file != null, options.range != null].filter(Boolean).length
  if (given > 1) {
    throw new MenuConfigError("items", "use only one of positional items, --file or --range")
  }
  if (options.items.length > 0) return options.items
  if (options.file != null) {
    return splitLines(await fs.readFile(path.resolve(options.file), "utf8"))
  }
  if (options.range != null) {
    const spec = parseRange(options.range)
    return { [Symbol.iterator]: () => rangeItems(spec) }
  }
  if (stdin.isTTY) {
    throw new MenuConfigError("items", "no items given; pass them as arguments, --file, --range or on stdin")
  }
  return { [Symbol.iterator]: () => readerLines(stdin.read) }
}

/**
 * Wraps a source so every element handed to the menu is remembered by index,
 * which lets chosen indices be mapped back to their text afterwards.
 */
export const recordingSource = <T>(source: Iterable<T>): { readonly source: Iterable<T>; readonly seen: T[] } => {
  const seen: T[] = []
  const recorded: Iterable<T> = {
    *[Symbol.iterator]() {
      for (const element of source) {
        seen.push(element)
        yield element
      }
    },
  }
  return { source: recorded, seen }
}

const PREVIEW_BYTES = 16 * 1024

/** Preview renderer that shows the start of the file an item names, relative to `root`. */
export const filePreview =
  (root: string, maxLines = 200) =>
  (item: string): string => {
    const target = path.resolve(root, item)
    let fd: number
    try {
      fd = openSync(target, "r")
    } catch (error) {
      const code = error instanceof Error && "code" in error ? String(error.code) : "unreadable"
      return `(cannot open ${item}: ${code})`
    }
    try {
      const buffer = Buffer.alloc(PREVIEW_BYTES)
      const read = readSync(fd, buffer, 0, PREVIEW_BYTES, 0)
      return splitLines(buffer.subarray(0, read).toString("utf8")).slice(0, maxLines).join("\n")
    } catch (error) {
      const code = error instanceof Error && "code" in error ? String(error.code) : "unreadable"
      return `(cannot read ${item}: ${code})`
    } finally {
      closeSync(fd)
    }
  }

export const formatSelection = (indices: readonly number[], items: readonly string[], mode: OutputMode): string[] => {
  switch (mode) {
    case "items":
      return indices.map((index) => items[index] ?? "")
    case "json":
      return [JSON.stringify({ indices, items: indices.map((index) => items[index] ?? null) })]
    case "indices":
    default:
      return indices.map(String)
  }
}

export interface PickOptions extends ItemSourceOptions {
  readonly title: string | null
  readonly multi: boolean
  readonly boxed: boolean
  readonly previewFile: boolean
  readonly previewSide: Exclude<ScreenSide, "full"> | null
  readonly previewWidth: number | null
  readonly previewLabel: string | null
  readonly configPath: string | null
  readonly workspace: string | null
  readonly output: OutputMode
}

export interface PickDependencies {
  readonly stdin?: ItemInput
  readonly terminal?: TerminalDriver
  readonly env?: NodeJS.ProcessEnv
  readonly homeDir?: string
}

export interface PickResult {
  readonly indices: number[]
  readonly lines: string[]
  readonly warnings: readonly string[]
}

export const runPick = async (options: PickOptions, deps: PickDependencies = {}): Promise<PickResult> => {
  const env = deps.env ?? process.env
  const workspace = options.workspace ?? process.cwd()
  const config = await resolveMenuConfig({
    workspace,
    cliConfigPath: options.configPath,
    env,
    homeDir: deps.homeDir,
  })
  const logger = createDebugLogger({}, env)
  for (const warning of config.meta.warnings) logger.debug("config.warning", { warning })

  const items = await resolveItemSource(options, deps.stdin ?? processStdin())
  const recorded = recordingSource(items)
  const menu = new Menu(recorded.source, { logger })
  if (options.previewFile) menu.preview(filePreview(workspace))
  applyMenuConfig(menu, config)

  // Flags win over every config layer.
  if (options.title) menu.title(options.title)
  if (options.multi) menu.multiselect(true)
  if (options.boxed) menu.boxed(true)
  // Without --preview-file these throw: there is no preview to place.
  if (options.previewSide != null || options.previewWidth != null) {
    menu.previewPosition(options.previewSide ?? config.preview.side, options.previewWidth ?? config.preview.width)
  }
  if (options.previewLabel != null) menu.previewLabel(options.previewLabel)

  const indices = await menu.show(deps.terminal)
  return {
    indices,
    lines: formatSelection(indices, recorded.seen, options.output),
    warnings: config.meta.warnings,
  }
}
