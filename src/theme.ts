import { Chalk, type ChalkInstance } from "chalk"

export type ColorMode = "truecolor" | "ansi256" | "ansi16" | "none"

export const COLOR_MODES: readonly ColorMode[] = ["truecolor", "ansi256", "ansi16", "none"]

export const ICONS = {
  item: "❯",
  chosen: "*",
} as const

export const ASCII_FALLBACK_ICONS = {
  item: ">",
  chosen: "*",
} as const

export interface BoxGlyphs {
  readonly horizontal: string
  readonly vertical: string
  readonly topLeft: string
  readonly topRight: string
  readonly bottomLeft: string
  readonly bottomRight: string
}

export const BOX_GLYPHS: BoxGlyphs = {
  horizontal: "─",
  vertical: "│",
  topLeft: "┌",
  topRight: "┐",
  bottomLeft: "└",
  bottomRight: "┘",
}

export const ASCII_BOX_GLYPHS: BoxGlyphs = {
  horizontal: "-",
  vertical: "|",
  topLeft: "+",
  topRight: "+",
  bottomLeft: "+",
  bottomRight: "+",
}

export const DEFAULT_PREVIEW_LABEL = " preview "

const isUtf8Locale = (env: NodeJS.ProcessEnv): boolean => {
  const locale = env.LC_ALL || env.LC_CTYPE || env.LANG || ""
  if (!locale) return true
  return /utf-?8/i.test(locale)
}

export const resolveAsciiOnly = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const explicit = env.PICKPANE_ASCII_ONLY?.trim().toLowerCase()
  if (explicit === "1" || explicit === "true") return true
  if (explicit === "0" || explicit === "false") return false
  if (env.TERM === "dumb") return true
  return !isUtf8Locale(env)
}

export const resolveColorMode = (env: NodeJS.ProcessEnv = process.env, colorAllowed = true): ColorMode => {
  if (!colorAllowed || env.NO_COLOR) return "none"
  const explicit = env.PICKPANE_COLOR_MODE?.trim().toLowerCase()
  const match = COLOR_MODES.find((mode) => mode === explicit)
  if (match) return match
  const colorTerm = env.COLORTERM?.toLowerCase() ?? ""
  if (colorTerm.includes("truecolor") || colorTerm.includes("24bit")) return "truecolor"
  if ((env.TERM ?? "").includes("256")) return "ansi256"
  return "ansi16"
}

export const colorLevel = (mode: ColorMode): 0 | 1 | 2 | 3 => {
  switch (mode) {
    case "truecolor":
      return 3
    case "ansi256":
      return 2
    case "ansi16":
      return 1
    case "none":
    default:
      return 0
  }
}

export const createChalk = (mode: ColorMode): ChalkInstance => new Chalk({ level: colorLevel(mode) })

export const resolveIcons = (asciiOnly: boolean): { readonly item: string; readonly chosen: string } =>
  asciiOnly ? ASCII_FALLBACK_ICONS : ICONS

export const resolveBoxGlyphs = (asciiOnly: boolean): BoxGlyphs => (asciiOnly ? ASCII_BOX_GLYPHS : BOX_GLYPHS)
