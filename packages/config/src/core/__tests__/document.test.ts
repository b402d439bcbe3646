import type { Logger } from "@keel/logger"
import { mock } from "vitest-mock-extended"
import { ConfigDocument } from "../document"
import type { ListValue, Value } from "../../ports/value"
import {
  DecodeError,
  InvalidValueError,
  OutOfRangeError,
  TypeMismatchError,
  UnknownOptionError,
} from "../errors"
import { Schema } from "../schema"
import { boolean, integer, list, nullValue, text } from "../value"

function sampleSchema(): Schema {
  return new Schema([
    { section: "net", option: "port", kinds: ["integer"], default: integer(8080), min: 1, max: 65535 },
    { section: "net", option: "hosts", kinds: ["list"], itemKinds: ["text"], default: list([text("localhost")]) },
    { section: "app", option: "debug", kinds: ["boolean"], default: boolean(false) },
    { section: "app", option: "token", kinds: ["text", "null"], default: nullValue() },
  ])
}

const fullText = [
  "[net]",
  "port = 9090",
  'hosts = ["a", "b"]',
  "[app]",
  "debug = true",
  "token =",
].join("\n")

describe("ConfigDocument", () => {
  describe("fromDefaults", () => {
    it("holds every default", () => {
      const doc = ConfigDocument.fromDefaults(sampleSchema())

      expect(doc.entries()).toEqual([
        { section: "net", option: "port", value: integer(8080), provenance: "default" },
        { section: "net", option: "hosts", value: list([text("localhost")]), provenance: "default" },
        { section: "app", option: "debug", value: boolean(false), provenance: "default" },
        { section: "app", option: "token", value: nullValue(), provenance: "default" },
      ])
      expect(doc.healed()).toEqual([])
      expect(doc.unknownEntries()).toEqual([])
    })
  })

  describe("fromText", () => {
    it("reads every declared option", () => {
      const doc = ConfigDocument.fromText(sampleSchema(), fullText)

      expect(doc.get("net", "port")).toEqual(integer(9090))
      expect(doc.get("net", "hosts")).toEqual(list([text("a"), text("b")]))
      expect(doc.get("app", "debug")).toEqual(boolean(true))
      expect(doc.get("app", "token")).toBe(nullValue())
      expect(doc.explain("net", "port")).toBe("file")
      expect(doc.healed()).toEqual([])
    })

    it("reads a multi-line list whose last item is a list", () => {
      const schema = new Schema([
        { section: "grid", option: "rows", kinds: ["list"], itemKinds: ["list"], default: list([]) },
      ])
      const doc = ConfigDocument.fromText(schema, "[grid]\nrows = [\n    [1, 2]\n]\n")

      expect(doc.get("grid", "rows")).toEqual(list([list([integer(1), integer(2)])]))
      expect(doc.explain("grid", "rows")).toBe("file")
    })

    it("fills in and reports options missing from the text", () => {
      const doc = ConfigDocument.fromText(sampleSchema(), "[net]\nport = 1\n")

      expect(doc.get("app", "debug")).toEqual(boolean(false))
      expect(doc.explain("app", "debug")).toBe("default")
      expect(doc.explain("net", "port")).toBe("file")
      expect(doc.healed()).toEqual([
        { section: "net", option: "hosts" },
        { section: "app", option: "debug" },
        { section: "app", option: "token" },
      ])
    })

    it("keeps the last of repeated assignments", () => {
      const doc = ConfigDocument.fromText(sampleSchema(), "[net]\nport = 1\nport = 2")

      expect(doc.get("net", "port")).toEqual(integer(2))
    })

    it("collects undeclared entries without exposing them as values", () => {
      const raw = ["[net]", "port = 1", "legacy = 3", "legacy = 4", "[old]", 'x = "y"'].join("\n")
      const doc = ConfigDocument.fromText(sampleSchema(), raw)

      expect(doc.unknownEntries()).toEqual([
        { section: "net", option: "legacy", literal: "4", line: 4 },
        { section: "old", option: "x", literal: '"y"', line: 6 },
      ])
      expect(doc.has("net", "legacy")).toBe(false)
      expect(() => doc.get("net", "legacy")).toThrow(UnknownOptionError)
      expect(doc.entries()).toHaveLength(4)
    })

    it("warns once per undeclared entry under the warn policy", () => {
      const logger = mock<Logger>()

      ConfigDocument.fromText(sampleSchema(), "[net]\nlegacy = 3\nlegacy = 4", {
        unknownEntries: "warn",
        logger,
      })

      expect(logger.warn).toHaveBeenCalledOnce()
      expect(logger.warn).toHaveBeenCalledWith("Ignoring undeclared configuration option", {
        section: "net",
        option: "legacy",
        line: 4,
      })
    })

    it("stays quiet under the ignore policy", () => {
      const logger = mock<Logger>()

      ConfigDocument.fromText(sampleSchema(), "[net]\nlegacy = 3", { logger })

      expect(logger.warn).not.toHaveBeenCalled()
    })

    it("locates literal errors on the file line", () => {
      const raw = ["[net]", "port = 1", "hosts = [", '    "a",', "    oops", "]"].join("\n")
      const attempt = () => ConfigDocument.fromText(sampleSchema(), raw)

      expect(attempt).toThrow(DecodeError)
      expect(attempt).toThrow(
        'Invalid value for net.hosts at line 3: Malformed literal: unknown keyword "oops" at line 3, column 5',
      )
      expect(attempt).toThrow(
        expect.objectContaining({ context: expect.objectContaining({ section: "net", option: "hosts", line: 5 }) }),
      )
    })

    it("reports a literal of the wrong kind", () => {
      expect(() => ConfigDocument.fromText(sampleSchema(), "[net]\nport =")).toThrow(
        "Invalid value for net.port at line 2: Expected integer but found null",
      )
    })

    it("reports rule violations with the line", () => {
      const attempt = () => ConfigDocument.fromText(sampleSchema(), "[net]\nport = 70000")

      expect(attempt).toThrow(OutOfRangeError)
      expect(attempt).toThrow(
        expect.objectContaining({
          context: expect.objectContaining({ section: "net", option: "port", line: 2, bound: "max" }),
        }),
      )
    })

    it("rejects malformed text", () => {
      expect(() => ConfigDocument.fromText(sampleSchema(), "port = 1")).toThrow(DecodeError)
    })
  })

  describe("set", () => {
    it("stores a valid value and marks it as set", () => {
      const doc = ConfigDocument.fromDefaults(sampleSchema())

      doc.set("net", "port", integer(9090))

      expect(doc.get("net", "port")).toEqual(integer(9090))
      expect(doc.explain("net", "port")).toBe("set")
    })

    it("leaves the document unchanged on rejection", () => {
      const doc = ConfigDocument.fromDefaults(sampleSchema())

      expect(() => doc.set("net", "port", text("9090"))).toThrow(TypeMismatchError)
      expect(() => doc.set("net", "port", integer(0))).toThrow(OutOfRangeError)
      expect(() => doc.set("net", "nope", integer(1))).toThrow(UnknownOptionError)
      expect(doc.get("net", "port")).toEqual(integer(8080))
      expect(doc.explain("net", "port")).toBe("default")
    })
  })

  describe("set with hand-built values", () => {
    it("rejects an integer the file cannot hold and keeps the old value", () => {
      const doc = ConfigDocument.fromDefaults(sampleSchema())
      const huge: Value = { kind: "integer", value: 2n ** 64n }

      expect(() => doc.set("net", "port", huge)).toThrow(InvalidValueError)
      expect(() => doc.set("net", "port", huge)).toThrow(
        expect.objectContaining({
          context: expect.objectContaining({ section: "net", option: "port", path: "$" }),
        }),
      )
      expect(doc.get("net", "port")).toEqual(integer(8080))
      expect(doc.explain("net", "port")).toBe("default")
      expect(() => doc.toText()).not.toThrow()
    })

    it("rejects a list that contains itself", () => {
      const doc = ConfigDocument.fromDefaults(sampleSchema())
      const items: Value[] = [text("a")]
      const loop: ListValue = { kind: "list", items }
      items.push(loop)

      expect(() => doc.set("net", "hosts", loop)).toThrow("Value contains itself (at $[1])")
      expect(doc.get("net", "hosts")).toEqual(list([text("localhost")]))
    })
  })

  describe("toText", () => {
    it("renders current values that read back to the same document", () => {
      const schema = sampleSchema()
      const doc = ConfigDocument.fromText(schema, fullText)
      doc.set("app", "token", text("test-secret"))

      const reread = ConfigDocument.fromText(schema, doc.toText({ header: null }))

      expect(reread.entries().map(({ value }) => value)).toEqual(doc.entries().map(({ value }) => value))
      expect(reread.healed()).toEqual([])
    })

    it("renders the same text after a read of its own output", () => {
      const schema = sampleSchema()
      const once = ConfigDocument.fromText(schema, fullText).toText()

      expect(ConfigDocument.fromText(schema, once).toText()).toBe(once)
    })

    it("writes the assignment lines in pretty style", () => {
      const doc = ConfigDocument.fromDefaults(sampleSchema())
      doc.set("net", "port", integer(8443))

      const lines = doc.toText().split("\n")

      expect(lines).toContain("port = 8443")
      expect(lines).toContain("hosts = [")
      expect(lines).toContain("token =")
    })
  })
})
