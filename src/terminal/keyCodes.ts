// Integer key codes follow curses numbering so bindings written as numbers keep
// the meaning they have in curses-based menus.
export const KEY = {
  ctrlC: 3,
  tab: 9,
  enter: 10,
  escape: 27,
  space: 32,
  backspace: 127,
  down: 258,
  up: 259,
  left: 260,
  right: 261,
  home: 262,
  pageDown: 338,
  pageUp: 339,
  end: 360,
} as const

const ESC = "\u001b"

const CSI_FINAL: Record<string, number> = {
  A: KEY.up,
  B: KEY.down,
  C: KEY.right,
  D: KEY.left,
  H: KEY.home,
  F: KEY.end,
}

const TILDE_CODES: Record<string, number> = {
  "1": KEY.home,
  "4": KEY.end,
  "5": KEY.pageUp,
  "6": KEY.pageDown,
  "7": KEY.home,
  "8": KEY.end,
}

// CSI: ESC [ params final, SS3: ESC O final
const CSI_RE = /^\u001b\[([0-9;]*)([A-Za-z~])/
const SS3_RE = /^\u001bO([A-Za-z])/

const decodeEscape = (chunk: string): { code: number | null; length: number } => {
  const csi = chunk.match(CSI_RE)
  if (csi) {
    const params = csi[1] ?? ""
    const final = csi[2] ?? ""
    if (final === "~") {
      const first = params.split(";")[0] ?? ""
      return { code: TILDE_CODES[first] ?? null, length: csi[0].length }
    }
    return { code: CSI_FINAL[final] ?? null, length: csi[0].length }
  }
  const ss3 = chunk.match(SS3_RE)
  if (ss3) {
    return { code: CSI_FINAL[ss3[1] ?? ""] ?? null, length: ss3[0].length }
  }
  // Lone ESC, or ESC followed by a plain key (alt+key): report ESC and keep the rest.
  return { code: KEY.escape, length: 1 }
}

// ESC, ESC [, ESC O, or a CSI still waiting for its final byte.
const INCOMPLETE_ESCAPE_RE = /\u001b(?:\[[0-9;]*|O)?$/

/**
 * Separates a trailing escape sequence that may continue in the next chunk.
 * Terminals can split an arrow key's bytes across reads; decoding the head
 * alone would report a lone ESC.
 */
export const splitPendingEscape = (text: string): { complete: string; pending: string } => {
  const match = text.match(INCOMPLETE_ESCAPE_RE)
  if (!match || match.index == null) return { complete: text, pending: "" }
  return { complete: text.slice(0, match.index), pending: text.slice(match.index) }
}

/**
 * Splits one raw input chunk into key codes. Unknown escape sequences are
 * consumed and dropped so their bytes are not read as letters.
 */
export const decodeKeys = (chunk: string): number[] => {
  const codes: number[] = []
  let rest = chunk
  while (rest.length > 0) {
    if (rest.startsWith(ESC)) {
      const { code, length } = decodeEscape(rest)
      if (code != null) codes.push(code)
      rest = rest.slice(length)
      continue
    }
    const codePoint = rest.codePointAt(0) ?? 0
    const width = codePoint > 0xffff ? 2 : 1
    rest = rest.slice(width)
    if (codePoint === 13) {
      // Raw mode delivers Enter as CR; CRLF pairs count once.
      if (rest.startsWith("\n")) rest = rest.slice(1)
      codes.push(KEY.enter)
      continue
    }
    codes.push(codePoint)
  }
  return codes
}

const NAMED_KEYS: Record<string, number> = {
  up: KEY.up,
  down: KEY.down,
  left: KEY.left,
  right: KEY.right,
  home: KEY.home,
  end: KEY.end,
  pageup: KEY.pageUp,
  pagedown: KEY.pageDown,
  enter: KEY.enter,
  return: KEY.enter,
  escape: KEY.escape,
  esc: KEY.escape,
  space: KEY.space,
  tab: KEY.tab,
  backspace: KEY.backspace,
}

const CTRL_RE = /^ctrl[+-]([a-z])$/

/**
 * Parses a binding written in configuration: a key name ("down", "enter"),
 * "ctrl+<letter>", a single character, or an integer code.
 */
export const parseKeyName = (value: string | number): number | null => {
  if (typeof value === "number") {
    return Number.isInteger(value) && value >= 0 ? value : null
  }
  const raw = value
  if (raw.length === 0) return null
  const chars = Array.from(raw)
  if (chars.length === 1) return raw.codePointAt(0) ?? null
  const normalized = raw.trim().toLowerCase()
  if (/^\d+$/.test(normalized)) return Number.parseInt(normalized, 10)
  const named = NAMED_KEYS[normalized]
  if (named != null) return named
  const ctrl = normalized.match(CTRL_RE)
  if (ctrl) return (ctrl[1] ?? "a").charCodeAt(0) - 96
  return null
}

const CODE_NAMES = new Map<number, string>(
  Object.entries(NAMED_KEYS)
    .filter(([name]) => name !== "return" && name !== "esc")
    .map(([name, code]) => [code, name]),
)

export const describeKey = (code: number): string => {
  const named = CODE_NAMES.get(code)
  if (named) return named
  if (code >= 1 && code <= 26) return `ctrl+${String.fromCharCode(code + 96)}`
  if (code > 32 && code <= 0x10ffff) return String.fromCodePoint(code)
  return String(code)
}
