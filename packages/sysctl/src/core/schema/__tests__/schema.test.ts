import { YAMLParseError } from "yaml"
import { SchemaLoadError } from "../../errors"
import { isFieldType, loadSchema, parseSchema, Schema } from "../schema"

function loadFailure(load: () => unknown): SchemaLoadError {
  try {
    load()
  } catch (err) {
    if (err instanceof SchemaLoadError) return err
    throw err
  }
  throw new Error("expected schema loading to fail")
}

describe("loadSchema", () => {
  it("loads fields in declaration order", () => {
    const schema = loadSchema({
      schema: {
        endpoint: { type: "string", required: true, description: "Upstream URL" },
        debug: { type: "bool" },
        "net.core.somaxconn": { type: "int", required: false },
        ratio: { type: "float" },
      },
    })

    expect(schema.fields()).toEqual([
      { name: "endpoint", type: "string", required: true, description: "Upstream URL" },
      { name: "debug", type: "bool", required: false },
      { name: "net.core.somaxconn", type: "int", required: false },
      { name: "ratio", type: "float", required: false },
    ])
  })

  it("reads type tokens case-insensitively", () => {
    const schema = loadSchema({ schema: { debug: { type: "BOOL" }, port: { type: "Int" } } })

    expect(schema.get("debug")?.type).toBe("bool")
    expect(schema.get("port")?.type).toBe("int")
  })

  it("omits description when none is given", () => {
    const field = loadSchema({ schema: { debug: { type: "bool" } } }).get("debug")

    expect(field).not.toHaveProperty("description")
  })

  it("accepts an empty schema", () => {
    expect(loadSchema({ schema: {} }).size).toBe(0)
  })

  describe("unknown types", () => {
    it("reports the field and the token as written", () => {
      const err = loadFailure(() => loadSchema({ schema: { endpoint: { type: "stringg" } } }))

      expect(err.issue).toEqual({ kind: "unknown_type", field: "endpoint", token: "stringg" })
      expect(err.message).toBe('Unknown type "stringg" for field "endpoint"')
    })

    it("reports the first unknown type in declaration order", () => {
      const err = loadFailure(() =>
        loadSchema({
          schema: {
            a: { type: "string" },
            b: { type: "Integer" },
            c: { type: "double" },
          },
        }),
      )

      expect(err.issue).toEqual({ kind: "unknown_type", field: "b", token: "Integer" })
    })
  })

  describe("malformed definitions", () => {
    it.each([
      ["null", null],
      ["a list", [{ type: "string" }]],
      ["a missing schema key", { fields: {} }],
      ["a non-mapping schema", { schema: "endpoint" }],
      ["a field without type", { schema: { endpoint: { required: true } } }],
      ["an empty field name", { schema: { "": { type: "string" } } }],
    ])("rejects %s", (_label, definition) => {
      const err = loadFailure(() => loadSchema(definition))

      expect(err.issue.kind).toBe("malformed")
      expect(err.code).toBe("schema_load_failed")
    })

    it("points at the offending path", () => {
      const err = loadFailure(() =>
        loadSchema({ schema: { debug: { type: "bool", required: "yes" } } }),
      )

      expect(err.issue.kind === "malformed" && err.issue.detail).toContain(
        "schema.debug.required",
      )
    })
  })
})

describe("parseSchema", () => {
  it("reads a YAML document", () => {
    const schema = parseSchema(
      [
        "schema:",
        "  endpoint:",
        "    type: string",
        "    required: true",
        "    description: Upstream URL",
        "  debug:",
        "    type: bool",
      ].join("\n"),
    )

    expect(schema.fields().map((f) => f.name)).toEqual(["endpoint", "debug"])
    expect(schema.get("endpoint")?.required).toBe(true)
  })

  it("keeps document order for integer-like field names", () => {
    const schema = parseSchema(
      [
        "schema:",
        "  b: { type: int, required: true }",
        "  1: { type: int, required: true }",
        "  a: { type: bool }",
      ].join("\n"),
    )

    expect(schema.fields().map((f) => f.name)).toEqual(["b", "1", "a"])
  })

  it("reads a JSON document", () => {
    const schema = parseSchema('{"schema": {"port": {"type": "int", "required": true}}}')

    expect(schema.get("port")).toEqual({ name: "port", type: "int", required: true })
  })

  it("reports YAML syntax errors as malformed", () => {
    const err = loadFailure(() => parseSchema("schema: [unclosed"))

    expect(err.issue.kind).toBe("malformed")
    expect(err.cause).toBeInstanceOf(YAMLParseError)
  })

  it("reports duplicate YAML keys as malformed", () => {
    const err = loadFailure(() =>
      parseSchema("schema:\n  debug:\n    type: bool\n  debug:\n    type: int"),
    )

    expect(err.issue.kind).toBe("malformed")
  })

  it("reports an empty document as malformed", () => {
    expect(loadFailure(() => parseSchema("")).issue.kind).toBe("malformed")
  })
})

describe("Schema", () => {
  it("rejects duplicate field names", () => {
    const err = loadFailure(
      () =>
        new Schema([
          { name: "debug", type: "bool", required: false },
          { name: "debug", type: "int", required: true },
        ]),
    )

    expect(err.issue).toEqual({
      kind: "malformed",
      detail: 'field "debug" is declared more than once',
    })
  })

  it("freezes its fields", () => {
    const schema = new Schema([{ name: "debug", type: "bool", required: false }])

    expect(Object.isFrozen(schema.get("debug"))).toBe(true)
  })

  it("iterates fields in declaration order", () => {
    const schema = new Schema([
      { name: "b", type: "int", required: false },
      { name: "a", type: "bool", required: true },
    ])

    expect([...schema].map((f) => f.name)).toEqual(["b", "a"])
    expect(schema.has("a")).toBe(true)
    expect(schema.has("c")).toBe(false)
  })
})

describe("isFieldType", () => {
  it("accepts only the four lowercase tokens", () => {
    expect(["string", "bool", "int", "float"].every(isFieldType)).toBe(true)
    expect(isFieldType("Bool")).toBe(false)
    expect(isFieldType("optional")).toBe(false)
  })
})
