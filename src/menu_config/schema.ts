import { isValidWidth } from "../menu/geometry.js"
import { SCREEN_SIDES } from "../menu/types.js"
import { parseKeyName } from "../terminal/keyCodes.js"
import { COLOR_MODES } from "../theme.js"
import type { MenuConfigInput } from "./types.js"

export type ValidationIssue = {
  readonly severity: "error" | "warning"
  readonly path: string
  readonly message: string
}

type ValidationResult = {
  readonly config: MenuConfigInput
  readonly issues: readonly ValidationIssue[]
}

type ValidationOptions = {
  readonly strictUnknownKeys: boolean
}

const BOOL_TRUE = new Set(["1", "true", "yes", "on"])
const BOOL_FALSE = new Set(["0", "false", "no", "off"])

const toPath = (parts: readonly string[]): string => (parts.length > 0 ? parts.join(".") : "<root>")

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value != null && !Array.isArray(value)

export const parseBooleanLike = (value: unknown): boolean | undefined => {
  if (typeof value === "boolean") return value
  if (typeof value !== "string") return undefined
  const normalized = value.trim().toLowerCase()
  if (BOOL_TRUE.has(normalized)) return true
  if (BOOL_FALSE.has(normalized)) return false
  return undefined
}

const readRecord = (
  source: Record<string, unknown>,
  key: string,
  path: readonly string[],
  issues: ValidationIssue[],
): Record<string, unknown> | undefined => {
  if (!(key in source) || source[key] == null) return undefined
  const value = source[key]
  if (!isRecord(value)) {
    issues.push({
      severity: "error",
      path: toPath([...path, key]),
      message: `Expected object, received ${Array.isArray(value) ? "array" : typeof value}.`,
    })
    return undefined
  }
  return value
}

const readBoolean = (
  source: Record<string, unknown>,
  key: string,
  path: readonly string[],
  issues: ValidationIssue[],
): boolean | undefined => {
  if (!(key in source) || source[key] == null) return undefined
  const parsed = parseBooleanLike(source[key])
  if (parsed == null) {
    issues.push({
      severity: "error",
      path: toPath([...path, key]),
      message: "Expected boolean (or bool-like string).",
    })
    return undefined
  }
  return parsed
}

const readString = (
  source: Record<string, unknown>,
  key: string,
  path: readonly string[],
  issues: ValidationIssue[],
): string | undefined => {
  if (!(key in source) || source[key] == null) return undefined
  const value = source[key]
  if (typeof value !== "string") {
    issues.push({
      severity: "error",
      path: toPath([...path, key]),
      message: `Expected string, received ${typeof value}.`,
    })
    return undefined
  }
  return value
}

const readNonEmptyString = (
  source: Record<string, unknown>,
  key: string,
  path: readonly string[],
  issues: ValidationIssue[],
): string | undefined => {
  const value = readString(source, key, path, issues)
  if (value == null) return undefined
  if (value.length === 0) {
    issues.push({ severity: "error", path: toPath([...path, key]), message: "Expected non-empty string." })
    return undefined
  }
  return value
}

const readFraction = (
  source: Record<string, unknown>,
  key: string,
  path: readonly string[],
  issues: ValidationIssue[],
): number | undefined => {
  if (!(key in source) || source[key] == null) return undefined
  const value = source[key]
  const parsed =
    typeof value === "number" ? value : typeof value === "string" ? Number.parseFloat(value.trim()) : Number.NaN
  if (!isValidWidth(parsed)) {
    issues.push({
      severity: "error",
      path: toPath([...path, key]),
      message: "Expected a fraction greater than 0 and at most 1.",
    })
    return undefined
  }
  return parsed
}

const readEnum = <T extends string>(
  source: Record<string, unknown>,
  key: string,
  values: readonly T[],
  path: readonly string[],
  issues: ValidationIssue[],
): T | undefined => {
  const raw = readString(source, key, path, issues)
  if (raw == null) return undefined
  const normalized = raw.trim().toLowerCase()
  const match = values.find((value) => value === normalized)
  if (match == null) {
    issues.push({
      severity: "error",
      path: toPath([...path, key]),
      message: `Expected one of ${values.join(", ")}.`,
    })
    return undefined
  }
  return match
}

/** A single key or a list of keys; every entry must name a key `parseKeyName` understands. */
const readKeyList = (
  source: Record<string, unknown>,
  key: string,
  path: readonly string[],
  issues: ValidationIssue[],
): number[] | undefined => {
  if (!(key in source) || source[key] == null) return undefined
  const value = source[key]
  const entries: unknown[] = Array.isArray(value) ? value : [value]
  const codes: number[] = []
  entries.forEach((entry, index) => {
    const code = typeof entry === "string" || typeof entry === "number" ? parseKeyName(entry) : null
    if (code == null) {
      issues.push({
        severity: "error",
        path: toPath([...path, key, String(index)]),
        message: `Unrecognized key ${JSON.stringify(entry)}.`,
      })
      return
    }
    codes.push(code)
  })
  return codes
}

const detectUnknownKeys = (
  source: Record<string, unknown>,
  allowed: readonly string[],
  path: readonly string[],
  issues: ValidationIssue[],
  strictUnknownKeys: boolean,
) => {
  for (const key of Object.keys(source)) {
    if (allowed.includes(key)) continue
    issues.push({
      severity: strictUnknownKeys ? "error" : "warning",
      path: toPath([...path, key]),
      message: "Unknown key.",
    })
  }
}

export const validateMenuConfigInput = (input: unknown, options: ValidationOptions): ValidationResult => {
  const issues: ValidationIssue[] = []
  // An empty YAML document parses to null.
  if (input == null) return { config: {}, issues }
  if (!isRecord(input)) {
    issues.push({
      severity: "error",
      path: "<root>",
      message: "Expected top-level object.",
    })
    return { config: {}, issues }
  }

  const root = input
  detectUnknownKeys(
    root,
    ["display", "icons", "preview", "layout", "selection", "keys"],
    [],
    issues,
    options.strictUnknownKeys,
  )

  const config: MenuConfigInput = {}

  const displayRaw = readRecord(root, "display", [], issues)
  if (displayRaw) {
    detectUnknownKeys(displayRaw, ["asciiOnly", "colorMode"], ["display"], issues, options.strictUnknownKeys)
    const display: NonNullable<MenuConfigInput["display"]> = {}
    const asciiOnly = readBoolean(displayRaw, "asciiOnly", ["display"], issues)
    if (asciiOnly != null) display.asciiOnly = asciiOnly
    const colorMode = readEnum(displayRaw, "colorMode", COLOR_MODES, ["display"], issues)
    if (colorMode != null) display.colorMode = colorMode
    config.display = display
  }

  const iconsRaw = readRecord(root, "icons", [], issues)
  if (iconsRaw) {
    detectUnknownKeys(iconsRaw, ["item", "chosen"], ["icons"], issues, options.strictUnknownKeys)
    const icons: NonNullable<MenuConfigInput["icons"]> = {}
    const item = readNonEmptyString(iconsRaw, "item", ["icons"], issues)
    if (item != null) icons.item = item
    const chosen = readNonEmptyString(iconsRaw, "chosen", ["icons"], issues)
    if (chosen != null) icons.chosen = chosen
    config.icons = icons
  }

  const previewRaw = readRecord(root, "preview", [], issues)
  if (previewRaw) {
    detectUnknownKeys(previewRaw, ["side", "width", "label"], ["preview"], issues, options.strictUnknownKeys)
    const preview: NonNullable<MenuConfigInput["preview"]> = {}
    const side = readEnum(previewRaw, "side", SCREEN_SIDES, ["preview"], issues)
    if (side === "full") {
      issues.push({ severity: "error", path: "preview.side", message: "Expected one of top, bottom, left, right." })
    } else if (side != null) {
      preview.side = side
    }
    const width = readFraction(previewRaw, "width", ["preview"], issues)
    if (width === 1) {
      issues.push({ severity: "error", path: "preview.width", message: "Expected a fraction below 1." })
    } else if (width != null) {
      preview.width = width
    }
    const label = readString(previewRaw, "label", ["preview"], issues)
    if (label != null) preview.label = label
    config.preview = preview
  }

  const layoutRaw = readRecord(root, "layout", [], issues)
  if (layoutRaw) {
    detectUnknownKeys(layoutRaw, ["boxed"], ["layout"], issues, options.strictUnknownKeys)
    const layout: NonNullable<MenuConfigInput["layout"]> = {}
    const boxed = readBoolean(layoutRaw, "boxed", ["layout"], issues)
    if (boxed != null) layout.boxed = boxed
    config.layout = layout
  }

  const selectionRaw = readRecord(root, "selection", [], issues)
  if (selectionRaw) {
    detectUnknownKeys(selectionRaw, ["multiselect"], ["selection"], issues, options.strictUnknownKeys)
    const selection: NonNullable<MenuConfigInput["selection"]> = {}
    const multiselect = readBoolean(selectionRaw, "multiselect", ["selection"], issues)
    if (multiselect != null) selection.multiselect = multiselect
    config.selection = selection
  }

  const keysRaw = readRecord(root, "keys", [], issues)
  if (keysRaw) {
    detectUnknownKeys(
      keysRaw,
      ["moveUp", "moveDown", "select", "toggleSelect"],
      ["keys"],
      issues,
      options.strictUnknownKeys,
    )
    const keys: NonNullable<MenuConfigInput["keys"]> = {}
    const moveUp = readKeyList(keysRaw, "moveUp", ["keys"], issues)
    if (moveUp != null) keys.moveUp = moveUp
    const moveDown = readKeyList(keysRaw, "moveDown", ["keys"], issues)
    if (moveDown != null) keys.moveDown = moveDown
    const select = readKeyList(keysRaw, "select", ["keys"], issues)
    if (select != null) keys.select = select
    const toggleSelect = readKeyList(keysRaw, "toggleSelect", ["keys"], issues)
    if (toggleSelect != null) keys.toggleSelect = toggleSelect
    config.keys = keys
  }

  return { config, issues }
}

export const formatValidationIssues = (issues: readonly ValidationIssue[]): string[] =>
  issues.map((issue) => `[${issue.severity}] ${issue.path}: ${issue.message}`)
