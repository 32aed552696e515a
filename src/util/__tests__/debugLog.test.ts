import { mkdtempSync, readFileSync, rmSync } from "node:fs"
import { tmpdir } from "node:os"
import path from "node:path"
import { afterEach, describe, expect, it } from "vitest"
import { NOOP_LOGGER, createDebugLogger } from "../debugLog.js"

const tempDirs: string[] = []

afterEach(() => {
  for (const dir of tempDirs.splice(0)) rmSync(dir, { recursive: true, force: true })
})

describe("createDebugLogger", () => {
  it("stays silent unless PICKPANE_DEBUG is set", () => {
    expect(createDebugLogger({}, {})).toBe(NOOP_LOGGER)
    expect(createDebugLogger({}, { PICKPANE_DEBUG: "true" })).toBe(NOOP_LOGGER)
    expect(createDebugLogger({}, { PICKPANE_DEBUG: "1" })).not.toBe(NOOP_LOGGER)
  })

  it("writes one JSON object per event", () => {
    const lines: string[] = []
    const logger = createDebugLogger({ enabled: true, sink: (line) => lines.push(line) }, {})
    logger.debug("key", { code: 258 })
    logger.debug("frame")

    expect(lines).toHaveLength(2)
    const first = JSON.parse(lines[0] ?? "{}")
    expect(first.event).toBe("key")
    expect(first.code).toBe(258)
    expect(typeof first.ts).toBe("number")
    expect(Object.keys(JSON.parse(lines[1] ?? "{}"))).toEqual(["ts", "event"])
  })

  it("appends to PICKPANE_DEBUG_FILE", () => {
    const dir = mkdtempSync(path.join(tmpdir(), "pickpane-log-"))
    tempDirs.push(dir)
    const filePath = path.join(dir, "debug.jsonl")
    const logger = createDebugLogger({}, { PICKPANE_DEBUG: "1", PICKPANE_DEBUG_FILE: filePath })
    logger.debug("session.start", { mode: "single" })
    logger.debug("session.end")

    const lines = readFileSync(filePath, "utf8").trimEnd().split("\n")
    expect(lines.map((line) => JSON.parse(line).event)).toEqual(["session.start", "session.end"])
  })
})
