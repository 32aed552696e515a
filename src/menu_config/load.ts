import { promises as fs } from "node:fs"
import os from "node:os"
import path from "node:path"
import { parse } from "yaml"
import { MenuConfigError } from "../menu/errors.js"
import { DEFAULT_PREVIEW_LABEL, resolveAsciiOnly, resolveColorMode, resolveIcons } from "../theme.js"
import { formatValidationIssues, parseBooleanLike, validateMenuConfigInput } from "./schema.js"
import type { MenuConfigInput, ResolveMenuConfigOptions, ResolvedMenuConfig } from "./types.js"

const DEFAULT_PREVIEW_SIDE = "right"
const DEFAULT_PREVIEW_WIDTH = 0.5

const mergeConfigInput = (base: MenuConfigInput, patch: MenuConfigInput): MenuConfigInput => ({
  ...base,
  ...patch,
  display: { ...(base.display ?? {}), ...(patch.display ?? {}) },
  icons: { ...(base.icons ?? {}), ...(patch.icons ?? {}) },
  preview: { ...(base.preview ?? {}), ...(patch.preview ?? {}) },
  layout: { ...(base.layout ?? {}), ...(patch.layout ?? {}) },
  selection: { ...(base.selection ?? {}), ...(patch.selection ?? {}) },
  keys: { ...(base.keys ?? {}), ...(patch.keys ?? {}) },
})

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT"

const readYamlInput = async (
  filePath: string,
  strictUnknownKeys: boolean,
): Promise<{ config: MenuConfigInput; warnings: string[] }> => {
  let raw: string
  try {
    raw = await fs.readFile(filePath, "utf8")
  } catch (error) {
    if (isMissingFile(error)) {
      return { config: {}, warnings: [] }
    }
    throw error
  }
  let parsed: unknown
  try {
    parsed = parse(raw)
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error)
    throw new MenuConfigError(filePath, `could not parse YAML\n${detail}`)
  }
  const validated = validateMenuConfigInput(parsed, { strictUnknownKeys })
  const errors = validated.issues.filter((issue) => issue.severity === "error")
  if (errors.length > 0) {
    const formatted = formatValidationIssues(errors).join("\n")
    throw new MenuConfigError(filePath, `invalid menu config\n${formatted}`)
  }
  const warnings = formatValidationIssues(validated.issues.filter((issue) => issue.severity === "warning"))
  return { config: validated.config, warnings }
}

const resolveRepoConfigPath = async (workspace?: string | null): Promise<string | null> => {
  const root = workspace?.trim() || process.cwd()
  const candidates = [path.join(root, ".pickpane", "menu.yaml"), path.join(root, "pickpane.yaml")]
  for (const candidate of candidates) {
    try {
      // eslint-disable-next-line no-await-in-loop
      await fs.access(candidate)
      return candidate
    } catch {
      // Keep searching.
    }
  }
  return null
}

export const resolveUserConfigPath = (homeDir: string = os.homedir()): string =>
  path.join(homeDir, ".config", "pickpane", "menu.yaml")

/**
 * Environment overrides, written in the same raw shape a config file uses so
 * they go through the same validation.
 */
const envConfigLayer = (env: NodeJS.ProcessEnv): Record<string, Record<string, unknown>> => {
  const display: Record<string, unknown> = {}
  const icons: Record<string, unknown> = {}
  const preview: Record<string, unknown> = {}
  const layout: Record<string, unknown> = {}
  const selection: Record<string, unknown> = {}
  const config: Record<string, Record<string, unknown>> = {}

  const envAsciiOnly = parseBooleanLike(env.PICKPANE_ASCII_ONLY)
  if (envAsciiOnly != null) display.asciiOnly = envAsciiOnly
  if (env.PICKPANE_COLOR_MODE?.trim()) display.colorMode = env.PICKPANE_COLOR_MODE.trim()
  if (env.PICKPANE_ICON?.trim()) icons.item = env.PICKPANE_ICON.trim()
  if (env.PICKPANE_CHOSEN_ICON?.trim()) icons.chosen = env.PICKPANE_CHOSEN_ICON.trim()
  if (env.PICKPANE_PREVIEW_SIDE?.trim()) preview.side = env.PICKPANE_PREVIEW_SIDE.trim()
  if (env.PICKPANE_PREVIEW_WIDTH?.trim()) preview.width = env.PICKPANE_PREVIEW_WIDTH.trim()
  if (env.PICKPANE_PREVIEW_LABEL != null && env.PICKPANE_PREVIEW_LABEL !== "") {
    preview.label = env.PICKPANE_PREVIEW_LABEL
  }
  const envBoxed = parseBooleanLike(env.PICKPANE_BOXED)
  if (envBoxed != null) layout.boxed = envBoxed
  const envMultiselect = parseBooleanLike(env.PICKPANE_MULTISELECT)
  if (envMultiselect != null) selection.multiselect = envMultiselect

  if (Object.keys(display).length > 0) config.display = display
  if (Object.keys(icons).length > 0) config.icons = icons
  if (Object.keys(preview).length > 0) config.preview = preview
  if (Object.keys(layout).length > 0) config.layout = layout
  if (Object.keys(selection).length > 0) config.selection = selection
  return config
}

const resolveEnvLayer = (env: NodeJS.ProcessEnv, strict: boolean): MenuConfigInput => {
  const validated = validateMenuConfigInput(envConfigLayer(env), { strictUnknownKeys: strict })
  const errors = validated.issues.filter((issue) => issue.severity === "error")
  if (errors.length > 0) {
    throw new MenuConfigError("environment", `invalid PICKPANE_* override\n${formatValidationIssues(errors).join("\n")}`)
  }
  return validated.config
}

/**
 * Resolves the menu configuration. Precedence, lowest first: built-in
 * defaults, repo file, user file, `--config` file, environment.
 */
export const resolveMenuConfig = async (options: ResolveMenuConfigOptions = {}): Promise<ResolvedMenuConfig> => {
  const env = options.env ?? process.env
  const strictFromEnv = parseBooleanLike(env.PICKPANE_CONFIG_STRICT)
  const strict = options.cliStrict ?? strictFromEnv ?? false
  const warnings: string[] = []
  const sources: string[] = ["defaults"]
  let merged: MenuConfigInput = {}

  const applyLayer = (layer: MenuConfigInput, source: string) => {
    if (!layer || Object.keys(layer).length === 0) return
    merged = mergeConfigInput(merged, layer)
    sources.push(source)
  }

  const repoConfigPath = await resolveRepoConfigPath(options.workspace)
  if (repoConfigPath) {
    const repoLayer = await readYamlInput(repoConfigPath, strict)
    warnings.push(...repoLayer.warnings.map((line) => `${repoConfigPath}: ${line}`))
    applyLayer(repoLayer.config, `repo:${repoConfigPath}`)
  }

  const userConfigPath = resolveUserConfigPath(options.homeDir)
  const userLayer = await readYamlInput(userConfigPath, strict)
  warnings.push(...userLayer.warnings.map((line) => `${userConfigPath}: ${line}`))
  applyLayer(userLayer.config, `user:${userConfigPath}`)

  const cliConfigPath = options.cliConfigPath?.trim()
  if (cliConfigPath) {
    const resolvedCliPath = path.isAbsolute(cliConfigPath) ? cliConfigPath : path.resolve(process.cwd(), cliConfigPath)
    try {
      await fs.access(resolvedCliPath)
    } catch {
      throw new MenuConfigError("--config", `no config file at ${resolvedCliPath}`)
    }
    const cliLayer = await readYamlInput(resolvedCliPath, strict)
    warnings.push(...cliLayer.warnings.map((line) => `${resolvedCliPath}: ${line}`))
    applyLayer(cliLayer.config, `cli-config:${resolvedCliPath}`)
  }

  applyLayer(resolveEnvLayer(env, strict), "env")

  const colorAllowed = options.colorAllowed ?? true
  const noColorRequested = Boolean(env.NO_COLOR)
  const asciiOnly = merged.display?.asciiOnly ?? resolveAsciiOnly(env)
  // NO_COLOR wins over any configured mode.
  const requestedColorMode = merged.display?.colorMode ?? resolveColorMode(env, colorAllowed)
  const colorMode = !colorAllowed || noColorRequested ? "none" : requestedColorMode
  const icons = resolveIcons(asciiOnly)

  return {
    display: {
      asciiOnly,
      colorMode,
    },
    icons: {
      item: merged.icons?.item ?? icons.item,
      chosen: merged.icons?.chosen ?? icons.chosen,
    },
    preview: {
      side: merged.preview?.side ?? DEFAULT_PREVIEW_SIDE,
      width: merged.preview?.width ?? DEFAULT_PREVIEW_WIDTH,
      label: merged.preview?.label ?? DEFAULT_PREVIEW_LABEL,
    },
    layout: {
      boxed: merged.layout?.boxed ?? false,
    },
    selection: {
      multiselect: merged.selection?.multiselect ?? false,
    },
    keys: {
      moveUp: [...(merged.keys?.moveUp ?? [])],
      moveDown: [...(merged.keys?.moveDown ?? [])],
      select: [...(merged.keys?.select ?? [])],
      toggleSelect: [...(merged.keys?.toggleSelect ?? [])],
    },
    meta: {
      strict,
      warnings,
      sources,
    },
  }
}
