import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs"
import { tmpdir } from "node:os"
import path from "node:path"
import { afterEach, describe, expect, it } from "vitest"
import { MenuConfigError } from "../../menu/errors.js"
import { Menu } from "../../menu/menu.js"
import { KEY } from "../../terminal/keyCodes.js"
import { applyMenuConfig } from "../apply.js"
import { resolveMenuConfig, resolveUserConfigPath } from "../load.js"

const tempDirs: string[] = []

const makeDir = (prefix: string) => {
  const dir = mkdtempSync(path.join(tmpdir(), prefix))
  tempDirs.push(dir)
  return dir
}

const writeFile = (filePath: string, contents: string) => {
  mkdirSync(path.dirname(filePath), { recursive: true })
  writeFileSync(filePath, contents, "utf8")
  return filePath
}

const fixture = () => {
  const workspace = makeDir("pickpane-ws-")
  const homeDir = makeDir("pickpane-home-")
  return {
    workspace,
    homeDir,
    repoPath: path.join(workspace, ".pickpane", "menu.yaml"),
    userPath: resolveUserConfigPath(homeDir),
  }
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) rmSync(dir, { recursive: true, force: true })
})

describe("resolveMenuConfig", () => {
  it("falls back to built-in defaults", async () => {
    const { workspace, homeDir } = fixture()
    const resolved = await resolveMenuConfig({ workspace, homeDir, env: {} })

    expect(resolved.display).toEqual({ asciiOnly: false, colorMode: "ansi16" })
    expect(resolved.icons).toEqual({ item: "❯", chosen: "*" })
    expect(resolved.preview).toEqual({ side: "right", width: 0.5, label: " preview " })
    expect(resolved.layout).toEqual({ boxed: false })
    expect(resolved.selection).toEqual({ multiselect: false })
    expect(resolved.keys).toEqual({ moveUp: [], moveDown: [], select: [], toggleSelect: [] })
    expect(resolved.meta).toEqual({ strict: false, warnings: [], sources: ["defaults"] })
  })

  it("layers repo, user, --config and environment in that order", async () => {
    const { workspace, homeDir, repoPath, userPath } = fixture()
    writeFile(repoPath, "icons:\n  item: '>'\nlayout:\n  boxed: true\nkeys:\n  moveDown: [n]\n")
    writeFile(userPath, "icons:\n  item: '»'\n  chosen: '+'\n")
    const cliPath = writeFile(path.join(workspace, "extra.yaml"), "preview:\n  side: bottom\n  width: 0.3\n")

    const resolved = await resolveMenuConfig({
      workspace,
      homeDir,
      cliConfigPath: cliPath,
      env: {
        PICKPANE_MULTISELECT: "1",
        PICKPANE_PREVIEW_LABEL: " peek ",
        PICKPANE_ASCII_ONLY: "0",
        PICKPANE_COLOR_MODE: "ansi256",
      },
    })

    expect(resolved.display).toEqual({ asciiOnly: false, colorMode: "ansi256" })
    expect(resolved.icons).toEqual({ item: "»", chosen: "+" })
    expect(resolved.preview).toEqual({ side: "bottom", width: 0.3, label: " peek " })
    expect(resolved.layout.boxed).toBe(true)
    expect(resolved.selection.multiselect).toBe(true)
    expect(resolved.keys.moveDown).toEqual(["n".charCodeAt(0)])
    expect(resolved.meta.sources).toEqual([
      "defaults",
      `repo:${repoPath}`,
      `user:${userPath}`,
      `cli-config:${cliPath}`,
      "env",
    ])
  })

  it("replaces a key list instead of appending to it", async () => {
    const { workspace, homeDir, repoPath, userPath } = fixture()
    writeFile(repoPath, "keys:\n  select: [tab]\n  moveUp: [ctrl+p]\n")
    writeFile(userPath, "keys:\n  select: [' ', 13]\n")

    const resolved = await resolveMenuConfig({ workspace, homeDir, env: {} })
    expect(resolved.keys.select).toEqual([KEY.space, 13])
    expect(resolved.keys.moveUp).toEqual([16])
  })

  it("finds pickpane.yaml at the workspace root", async () => {
    const { workspace, homeDir } = fixture()
    const rootPath = writeFile(path.join(workspace, "pickpane.yaml"), "selection:\n  multiselect: yes\n")
    const resolved = await resolveMenuConfig({ workspace, homeDir, env: {} })
    expect(resolved.selection.multiselect).toBe(true)
    expect(resolved.meta.sources).toEqual(["defaults", `repo:${rootPath}`])
  })

  it("skips an empty file", async () => {
    const { workspace, homeDir, repoPath } = fixture()
    writeFile(repoPath, "")
    const resolved = await resolveMenuConfig({ workspace, homeDir, env: {} })
    expect(resolved.meta.sources).toEqual(["defaults"])
  })

  it("warns about unknown keys and rejects them in strict mode", async () => {
    const { workspace, homeDir, userPath } = fixture()
    writeFile(userPath, "extra: 1\nlayout:\n  boxed: true\n")

    const lenient = await resolveMenuConfig({ workspace, homeDir, env: {} })
    expect(lenient.meta.warnings).toEqual([`${userPath}: [warning] extra: Unknown key.`])
    expect(lenient.layout.boxed).toBe(true)

    await expect(resolveMenuConfig({ workspace, homeDir, env: {}, cliStrict: true })).rejects.toThrow(
      `${userPath}: invalid menu config\n[error] extra: Unknown key.`,
    )
    await expect(resolveMenuConfig({ workspace, homeDir, env: { PICKPANE_CONFIG_STRICT: "true" } })).rejects.toThrow(
      MenuConfigError,
    )
  })

  it("rejects invalid values with their path", async () => {
    const { workspace, homeDir, repoPath } = fixture()
    writeFile(repoPath, "preview:\n  width: 1.5\n")
    await expect(resolveMenuConfig({ workspace, homeDir, env: {} })).rejects.toThrow(
      `${repoPath}: invalid menu config\n[error] preview.width: Expected a fraction greater than 0 and at most 1.`,
    )
  })

  it("reports malformed YAML", async () => {
    const { workspace, homeDir, repoPath } = fixture()
    writeFile(repoPath, "icons: [unclosed\n")
    await expect(resolveMenuConfig({ workspace, homeDir, env: {} })).rejects.toThrow(
      `${repoPath}: could not parse YAML`,
    )
  })

  it("fails when the --config file is missing", async () => {
    const { workspace, homeDir } = fixture()
    const missing = path.join(workspace, "nope.yaml")
    await expect(resolveMenuConfig({ workspace, homeDir, env: {}, cliConfigPath: missing })).rejects.toThrow(
      `--config: no config file at ${missing}`,
    )
  })

  it("validates environment overrides", async () => {
    const { workspace, homeDir } = fixture()
    await expect(
      resolveMenuConfig({ workspace, homeDir, env: { PICKPANE_PREVIEW_SIDE: "full" } }),
    ).rejects.toThrow("environment: invalid PICKPANE_* override\n[error] preview.side: Expected one of top, bottom, left, right.")
    await expect(
      resolveMenuConfig({ workspace, homeDir, env: { PICKPANE_PREVIEW_WIDTH: "wide" } }),
    ).rejects.toThrow(MenuConfigError)
  })

  it("turns colors off for NO_COLOR whatever the configured mode", async () => {
    const { workspace, homeDir } = fixture()
    const resolved = await resolveMenuConfig({
      workspace,
      homeDir,
      env: { NO_COLOR: "1", PICKPANE_COLOR_MODE: "truecolor" },
    })
    expect(resolved.display.colorMode).toBe("none")
    const disallowed = await resolveMenuConfig({ workspace, homeDir, env: {}, colorAllowed: false })
    expect(disallowed.display.colorMode).toBe("none")
  })

  it("uses ASCII icons when ASCII output is configured", async () => {
    const { workspace, homeDir } = fixture()
    const resolved = await resolveMenuConfig({ workspace, homeDir, env: { PICKPANE_ASCII_ONLY: "yes" } })
    expect(resolved.icons).toEqual({ item: ">", chosen: "*" })
  })
})

describe("applyMenuConfig", () => {
  it("configures a menu from the resolved settings", async () => {
    const { workspace, homeDir, repoPath } = fixture()
    writeFile(repoPath, "preview:\n  side: left\n  width: 0.25\nkeys:\n  moveDown: [n]\n")
    const resolved = await resolveMenuConfig({ workspace, homeDir, env: {} })

    const withPreview = applyMenuConfig(new Menu(["a"]).preview(String), resolved)
    expect(withPreview.layout).toEqual({
      main: { side: "right", width: 0.75 },
      preview: { side: "left", width: 0.25 },
    })
    expect(withPreview.keyBindings.moveDown).toEqual([KEY.down, "j".charCodeAt(0), "n".charCodeAt(0)])

    const plain = applyMenuConfig(new Menu(["a"]), resolved)
    expect(plain.layout).toEqual({ main: { side: "full", width: 1 }, preview: null })
  })
})
