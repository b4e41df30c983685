import fc from "fast-check"
import { ParseError } from "../../errors"
import { parse } from "../parse"
import { parseEntries } from "../parse-entries"

function parseFailure(text: string): ParseError {
  try {
    parse(text)
  } catch (err) {
    if (err instanceof ParseError) return err
    throw err
  }
  throw new Error("expected parse to fail")
}

describe("parse", () => {
  describe("assignments", () => {
    it("parses assignments and skips comments and blank lines", () => {
      const store = parse("net.ipv4.ip_forward = 1\n# comment\n\ndebug=true")

      expect(store.toRecord()).toEqual({ "net.ipv4.ip_forward": "1", debug: "true" })
      expect(store.keys()).toEqual(["net.ipv4.ip_forward", "debug"])
    })

    it("trims surrounding whitespace but keeps inner whitespace", () => {
      const store = parse("  kernel.banner  =  hello   big  world \t")

      expect(store.get("kernel.banner")).toBe("hello   big  world")
    })

    it("splits at the first '=' only", () => {
      const store = parse("net.opts = mtu=1500")

      expect(store.get("net.opts")).toBe("mtu=1500")
    })

    it("accepts an empty value", () => {
      const store = parse("vm.swappiness =")

      expect(store.get("vm.swappiness")).toBe("")
    })

    it("keeps '#' inside a value", () => {
      const store = parse("kernel.hostname = web # primary")

      expect(store.get("kernel.hostname")).toBe("web # primary")
    })

    it("treats an escaped '=' as part of the key", () => {
      const store = parse("label\\=primary = on")

      expect(store.keys()).toEqual(["label=primary"])
      expect(store.get("label=primary")).toBe("on")
    })

    it("unescapes a doubled backslash in the key", () => {
      const store = parse("path\\\\ = x")

      expect(store.get("path\\")).toBe("x")
    })

    it("handles CRLF line endings", () => {
      const store = parse("a = 1\r\nb = 2\r\n")

      expect(store.toRecord()).toEqual({ a: "1", b: "2" })
    })

    it("drops a leading byte-order mark", () => {
      const store = parse("\uFEFFfs.file-max = 65536")

      expect(store.keys()).toEqual(["fs.file-max"])
    })

    it("returns an empty store for empty input", () => {
      expect(parse("").isEmpty()).toBe(true)
    })
  })

  describe("comments and blank lines", () => {
    it("skips '#' and ';' comments, indented or not", () => {
      const store = parse("# one\n; two\n   # three\n\t; four\nkey = value")

      expect(store.toRecord()).toEqual({ key: "value" })
    })

    it("skips whitespace-only lines", () => {
      const store = parse("a = 1\n   \t\nb = 2")

      expect(store.size).toBe(2)
    })
  })

  describe("duplicate keys", () => {
    it("keeps the first position and takes the last value", () => {
      const store = parse("a = 1\nb = 2\na = 3")

      expect(store.keys()).toEqual(["a", "b"])
      expect(store.get("a")).toBe("3")
    })
  })

  describe("errors", () => {
    it("reports a line without '=' with its line number", () => {
      const err = parseFailure("badline")

      expect(err.line).toBe(1)
      expect(err.reason).toBe("missing_separator")
      expect(err.message).toBe("Parse error at line 1: missing '=' separator")
    })

    it("counts comment and blank lines when numbering", () => {
      const err = parseFailure("a = 1\n# note\n\n   = orphan")

      expect(err.line).toBe(4)
      expect(err.reason).toBe("empty_key")
      expect(err.message).toBe("Parse error at line 4: empty key")
    })

    it("rejects a line whose only '=' is escaped", () => {
      const err = parseFailure("ok = 1\nlabel\\=primary")

      expect(err.line).toBe(2)
      expect(err.reason).toBe("missing_separator")
    })

    it("stops at the first malformed line", () => {
      const err = parseFailure("first\n= second")

      expect(err.line).toBe(1)
    })

    it("carries line and reason in the error context", () => {
      const err = parseFailure("x = 1\ny")

      expect(err.code).toBe("parse_error")
      expect(err.context).toEqual({ line: 2, reason: "missing_separator" })
    })
  })

  describe("properties", () => {
    const key = fc.stringMatching(/^[a-z][a-z0-9_.]{0,12}$/)
    const value = fc.stringMatching(/^[A-Za-z0-9_./:-]{0,16}$/)

    it("round-trips rendered assignments in first-insertion order", () => {
      fc.assert(
        fc.property(fc.array(fc.tuple(key, value), { maxLength: 20 }), (entries) => {
          const text = entries.map(([k, v]) => `${k} = ${v}`).join("\n")
          const expected = new Map(entries)

          const store = parse(text)

          expect(store.keys()).toEqual([...expected.keys()])
          expect(store.toRecord()).toEqual(Object.fromEntries(expected))
        }),
        { numRuns: 100 },
      )
    })
  })
})

describe("parseEntries", () => {
  it("returns every assignment with its source line", () => {
    expect(parseEntries("# header\nx = 1\n\ny=2\nx = 3")).toEqual([
      { key: "x", value: "1", line: 2 },
      { key: "y", value: "2", line: 4 },
      { key: "x", value: "3", line: 5 },
    ])
  })
})
