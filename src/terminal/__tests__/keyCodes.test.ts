import { describe, expect, it } from "vitest"
import { KEY, decodeKeys, describeKey, parseKeyName, splitPendingEscape } from "../keyCodes.js"

describe("decodeKeys", () => {
  it("maps arrow sequences to curses codes", () => {
    expect(decodeKeys("\u001b[A")).toEqual([KEY.up])
    expect(decodeKeys("\u001b[B\u001b[B")).toEqual([KEY.down, KEY.down])
    expect(decodeKeys("\u001bOB")).toEqual([KEY.down])
    expect(decodeKeys("\u001b[1;5A")).toEqual([KEY.up])
  })

  it("maps paging and home/end sequences", () => {
    expect(decodeKeys("\u001b[5~\u001b[6~")).toEqual([KEY.pageUp, KEY.pageDown])
    expect(decodeKeys("\u001b[H\u001b[4~")).toEqual([KEY.home, KEY.end])
  })

  it("reports Enter as 10 whether it arrives as CR or CRLF", () => {
    expect(decodeKeys("\r")).toEqual([KEY.enter])
    expect(decodeKeys("\r\n")).toEqual([KEY.enter])
    expect(decodeKeys("\n")).toEqual([KEY.enter])
  })

  it("splits printable input into code points", () => {
    expect(decodeKeys("jk q")).toEqual([106, 107, 32, 113])
    expect(decodeKeys("👍")).toEqual([0x1f44d])
  })

  it("reports a lone escape and keeps what follows it", () => {
    expect(decodeKeys("\u001b")).toEqual([KEY.escape])
    expect(decodeKeys("\u001bq")).toEqual([KEY.escape, 113])
  })

  it("drops unknown escape sequences", () => {
    expect(decodeKeys("\u001b[Zj")).toEqual([106])
    expect(decodeKeys("\u001b[200~")).toEqual([])
  })
})

describe("splitPendingEscape", () => {
  it("holds back a sequence that may continue in the next chunk", () => {
    expect(splitPendingEscape("\u001b")).toEqual({ complete: "", pending: "\u001b" })
    expect(splitPendingEscape("j\u001b[")).toEqual({ complete: "j", pending: "\u001b[" })
    expect(splitPendingEscape("\u001bO")).toEqual({ complete: "", pending: "\u001bO" })
    expect(splitPendingEscape("\u001b[B\u001b[1;")).toEqual({ complete: "\u001b[B", pending: "\u001b[1;" })
  })

  it("passes finished input through", () => {
    expect(splitPendingEscape("\u001b[B")).toEqual({ complete: "\u001b[B", pending: "" })
    expect(splitPendingEscape("\u001bq")).toEqual({ complete: "\u001bq", pending: "" })
    expect(splitPendingEscape("jk")).toEqual({ complete: "jk", pending: "" })
  })

  it("decodes the joined halves of a split arrow key", () => {
    const first = splitPendingEscape("\u001b")
    const second = splitPendingEscape(first.pending + "[B")
    expect(decodeKeys(first.complete)).toEqual([])
    expect(decodeKeys(second.complete)).toEqual([KEY.down])
  })
})

describe("parseKeyName", () => {
  it("accepts names, characters, digits and codes", () => {
    expect(parseKeyName("down")).toBe(KEY.down)
    expect(parseKeyName("Enter")).toBe(KEY.enter)
    expect(parseKeyName("PageUp")).toBe(KEY.pageUp)
    expect(parseKeyName("j")).toBe(106)
    expect(parseKeyName(" ")).toBe(32)
    expect(parseKeyName("1")).toBe(49)
    expect(parseKeyName("10")).toBe(10)
    expect(parseKeyName(258)).toBe(KEY.down)
    expect(parseKeyName("ctrl+n")).toBe(14)
    expect(parseKeyName("Ctrl-J")).toBe(10)
  })

  it("rejects what it cannot name", () => {
    expect(parseKeyName("")).toBeNull()
    expect(parseKeyName("bogus")).toBeNull()
    expect(parseKeyName(-1)).toBeNull()
    expect(parseKeyName(2.5)).toBeNull()
  })
})

describe("describeKey", () => {
  it("prints codes the way configuration spells them", () => {
    expect(describeKey(KEY.down)).toBe("down")
    expect(describeKey(KEY.enter)).toBe("enter")
    expect(describeKey(KEY.escape)).toBe("escape")
    expect(describeKey(KEY.tab)).toBe("tab")
    expect(describeKey(14)).toBe("ctrl+n")
    expect(describeKey(106)).toBe("j")
    expect(describeKey(0)).toBe("0")
  })
})
