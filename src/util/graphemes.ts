import GraphemerModule from "graphemer"
import stripAnsi from "strip-ansi"

type GraphemerInstance = {
  splitGraphemes: (text: string) => string[]
}

// graphemer ships CommonJS with `exports.default`; under ESM interop the class can sit one level deeper.
const GraphemerCtor = ((GraphemerModule as unknown as { default?: new () => GraphemerInstance }).default ??
  (GraphemerModule as unknown as new () => GraphemerInstance)) as new () => GraphemerInstance

const graphemer = new GraphemerCtor()

/** Splits text into user-perceived characters, the unit every column count uses. */
export const splitGraphemes = (text: string): string[] => (text.length === 0 ? [] : graphemer.splitGraphemes(text))

export const graphemeLength = (text: string): number => splitGraphemes(text).length

export const clipGraphemes = (text: string, max: number): string => {
  if (max <= 0) return ""
  const parts = splitGraphemes(text)
  return parts.length <= max ? text : parts.slice(0, max).join("")
}

export const normalizeNewlines = (value: string): string => value.replace(/\r\n?/g, "\n")

const TAB_EXPANSION = "    "

/** Strips escape sequences and carriage returns so column accounting matches what the terminal shows. */
export const sanitizeDisplayText = (value: string): string =>
  normalizeNewlines(stripAnsi(value)).replace(/\t/g, TAB_EXPANSION)
