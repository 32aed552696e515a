import { describe, expect, it } from "vitest"
import { MemoryTerminal } from "../../../tests/helpers/memoryTerminal.js"
import { KEY } from "../../terminal/keyCodes.js"
import { createDebugLogger } from "../../util/debugLog.js"
import { MenuConfigError } from "../errors.js"
import { Menu } from "../menu.js"

const q = "q".charCodeAt(0)

const counting = () => {
  const state = { pulled: 0 }
  const source: Iterable<string> = {
    *[Symbol.iterator]() {
      for (let value = 0; ; value += 1) {
        state.pulled += 1
        yield String(value)
      }
    },
  }
  return { source, state }
}

describe("Menu.show (single select)", () => {
  it("returns the index picked after moving down twice", async () => {
    const terminal = new MemoryTerminal({ rows: 5, columns: 20 }, [KEY.down, KEY.down, KEY.enter])
    const result = await new Menu(["a", "b", "c"]).show(terminal)

    expect(result).toEqual([2])
    expect(terminal.events).toEqual(["enter", "erase", "erase", "erase", "leave"])
    expect(terminal.refreshCount).toBe(3)
    expect(terminal.screen()).toEqual(["❯ a", "❯ b", "❯ c", "", ""])
    expect(terminal.writesWith("highlight").at(-1)).toEqual({ row: 2, col: 2, text: "c", attributes: ["highlight"] })
  })

  it("returns nothing when the user quits", async () => {
    const withQ = new MemoryTerminal({ rows: 5, columns: 20 }, [KEY.down, q])
    expect(await new Menu(["a", "b"]).show(withQ)).toEqual([])
    expect(withQ.events.at(-1)).toBe("leave")

    const withEscape = new MemoryTerminal({ rows: 5, columns: 20 }, [KEY.escape])
    expect(await new Menu(["a", "b"]).show(withEscape)).toEqual([])
  })

  it("accepts extra bindings and vim keys", async () => {
    const terminal = new MemoryTerminal({ rows: 5, columns: 20 }, ["j".charCodeAt(0), "n".charCodeAt(0), KEY.tab])
    const menu = new Menu(["a", "b", "c"]).addDownKey("n".charCodeAt(0)).addSelectKey(KEY.tab)
    expect(await menu.show(terminal)).toEqual([2])
  })

  it("ignores the toggle key outside multi-select", async () => {
    const terminal = new MemoryTerminal({ rows: 5, columns: 20 }, [KEY.space, KEY.enter])
    expect(await new Menu(["a", "b"]).show(terminal)).toEqual([0])
  })

  it("renders through a display renderer object", async () => {
    const terminal = new MemoryTerminal({ rows: 3, columns: 20 }, [q])
    const people = [{ name: "Ada" }, { name: "Grace" }]
    await new Menu(people, { display: { render: (person) => person.name } }).show(terminal)
    expect(terminal.screen()).toEqual(["❯ Ada", "❯ Grace", ""])
  })
})

describe("Menu.show (multi select)", () => {
  it("toggles membership and finishes on select", async () => {
    const terminal = new MemoryTerminal({ rows: 5, columns: 20 }, [
      KEY.space,
      KEY.down,
      KEY.space,
      KEY.space,
      KEY.down,
      KEY.space,
      KEY.enter,
    ])
    const result = await new Menu(["a", "b", "c", "d"]).multiselect().show(terminal)

    expect(result).toEqual([0, 2])
    expect(terminal.screen().slice(0, 4)).toEqual(["* a", "❯ b", "* c", "❯ d"])
  })
})

describe("Menu.show (scrolling)", () => {
  it("materializes lazily and scrolls an endless source", async () => {
    const { source, state } = counting()
    const terminal = new MemoryTerminal({ rows: 5, columns: 20 }, [KEY.down, KEY.down, KEY.down, KEY.down, q])

    expect(await new Menu(source).show(terminal)).toEqual([])

    expect(state.pulled).toBe(7)
    expect(terminal.screen()).toEqual(["❯ 1", "❯ 2", "❯ 3", "❯ 4", "❯ 5"])
    expect(terminal.writesWith("highlight").at(-1)).toEqual({ row: 3, col: 2, text: "4", attributes: ["highlight"] })
  })
})

describe("Menu layout", () => {
  it("reserves rows for the title", async () => {
    const terminal = new MemoryTerminal({ rows: 5, columns: 10 }, [q])
    await new Menu(["a", "b"]).title("abcdefghijkl").show(terminal)
    expect(terminal.screen()).toEqual(["abcdefghij", "kl", "❯ a", "❯ b", ""])
    expect(terminal.writesWith("bold")[0]).toEqual({ row: 0, col: 0, text: "abcdefghij", attributes: ["bold"] })
  })

  it("shows the preview of the highlighted item in a labelled box", async () => {
    const terminal = new MemoryTerminal({ rows: 6, columns: 20 }, [KEY.down, q])
    await new Menu(["x", "y"]).preview((value) => `about ${value}`).show(terminal)

    expect(terminal.screen()).toEqual([
      "❯ x        ┌ previe┐",
      "❯ y        │about y│",
      "           │       │",
      "           │       │",
      "           │       │",
      "           └───────┘",
    ])
  })

  it("draws a border around a boxed list with the title on it", async () => {
    const terminal = new MemoryTerminal({ rows: 4, columns: 12 }, [q])
    await new Menu(["a", "b"], { boxed: true, title: "T" }).show(terminal)
    expect(terminal.screen()).toEqual(["┌T─────────┐", "│❯ a       │", "│❯ b       │", "└──────────┘"])
  })

  it("falls back to ASCII icons and glyphs", async () => {
    const terminal = new MemoryTerminal({ rows: 3, columns: 8 }, [q])
    await new Menu(["a"], { asciiOnly: true, boxed: true }).show(terminal)
    expect(terminal.screen()).toEqual(["+------+", "|> a   |", "+------+"])
  })

  it("keeps explicit icons when switching to ASCII", async () => {
    const terminal = new MemoryTerminal({ rows: 2, columns: 8 }, [q])
    await new Menu(["a"]).icon("->").asciiOnly().show(terminal)
    expect(terminal.line(0)).toBe("-> a")
  })
})

describe("Menu configuration", () => {
  it("rejects preview settings before a preview exists", () => {
    const menu = new Menu(["a"])
    expect(() => menu.previewPosition("left", 0.3)).toThrow(MenuConfigError)
    expect(() => menu.previewLabel("x")).toThrow("previewLabel: set a preview before labelling it")
  })

  it("validates the preview position", () => {
    const menu = new Menu(["a"]).preview(String)
    expect(() => menu.previewPosition("bottom", 0)).toThrow(MenuConfigError)
    expect(() => menu.previewPosition("right", 1.2)).toThrow(MenuConfigError)
    expect(() => menu.previewPosition("right", 1)).toThrow(MenuConfigError)
    expect(() => menu.previewPosition("full", 0.5)).toThrow(MenuConfigError)
  })

  it("puts the list on the opposite side of the preview", () => {
    const menu = new Menu(["a"]).preview(String).previewPosition("top", 0.25)
    expect(menu.layout).toEqual({ main: { side: "bottom", width: 0.75 }, preview: { side: "top", width: 0.25 } })
    expect(new Menu(["a"]).preview(String).layout.main).toEqual({ side: "left", width: 0.5 })
  })

  it("applies constructor options like the setters", () => {
    const menu = new Menu(["a"], {
      preview: String,
      previewSide: "bottom",
      previewWidth: 0.4,
      keys: { moveDown: ["n".charCodeAt(0)] },
    })
    expect(menu.layout.preview).toEqual({ side: "bottom", width: 0.4 })
    expect(menu.keyBindings.moveDown).toEqual([KEY.down, "j".charCodeAt(0), "n".charCodeAt(0)])
  })

  it("rejects invalid key codes", () => {
    expect(() => new Menu(["a"]).addUpKey(-1)).toThrow(MenuConfigError)
    expect(() => new Menu(["a"]).addSelectKey(1.5)).toThrow(MenuConfigError)
  })

  it("freezes configuration once shown", async () => {
    const menu = new Menu(["a"])
    await menu.show(new MemoryTerminal({ rows: 2, columns: 8 }, [q]))
    expect(() => menu.title("late")).toThrow("title: the menu has already been shown")
    expect(() => menu.addDownKey(1)).toThrow(MenuConfigError)
    await expect(menu.show(new MemoryTerminal({ rows: 2, columns: 8 }, [q]))).rejects.toThrow(
      "show: a menu can only be shown once",
    )
  })
})

describe("Menu failure handling", () => {
  it("releases the terminal when the display renderer throws", async () => {
    const terminal = new MemoryTerminal({ rows: 3, columns: 8 }, [q])
    const menu = new Menu(["a"], {
      display: () => {
        throw new Error("bad item")
      },
    })
    await expect(menu.show(terminal)).rejects.toThrow("bad item")
    expect(terminal.events).toEqual(["enter", "erase", "leave"])
  })

  it("releases the terminal when key input fails", async () => {
    const terminal = new MemoryTerminal({ rows: 3, columns: 8 }, [KEY.down])
    await expect(new Menu(["a", "b"]).show(terminal)).rejects.toThrow("no scripted keys left")
    expect(terminal.inRawMode).toBe(false)
    expect(terminal.events.at(-1)).toBe("leave")
  })
})

describe("Menu logging", () => {
  it("emits session events through the injected logger", async () => {
    const lines: string[] = []
    const logger = createDebugLogger({ enabled: true, sink: (line) => lines.push(line) })
    const terminal = new MemoryTerminal({ rows: 3, columns: 8 }, [KEY.down, KEY.enter])

    await new Menu(["a", "b"], { logger }).show(terminal)

    const events = lines.map((line) => JSON.parse(line).event)
    expect(events).toEqual(["session.start", "frame", "key", "frame", "key", "selection", "session.end"])
    expect(JSON.parse(lines.at(-1) ?? "{}").selection).toEqual([1])
  })
})
