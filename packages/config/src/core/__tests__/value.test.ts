import type { ListValue, Value } from "../../ports/value"
import { InvalidValueError } from "../errors"
import {
  assertRepresentable,
  boolean,
  decimal,
  dict,
  fromPlain,
  INTEGER_MAX,
  INTEGER_MIN,
  integer,
  isValue,
  kindOf,
  list,
  nullValue,
  text,
  toPlain,
  valuesEqual,
} from "../value"

describe("value constructors", () => {
  it("builds frozen values", () => {
    const v = list([integer(1), text("a")])

    expect(Object.isFrozen(v)).toBe(true)
    expect(Object.isFrozen(v.items)).toBe(true)
    expect(v.items).toEqual([
      { kind: "integer", value: 1n },
      { kind: "text", value: "a" },
    ])
  })

  it("accepts the 64-bit signed range and nothing beyond", () => {
    expect(integer(INTEGER_MAX).value).toBe(9223372036854775807n)
    expect(integer(INTEGER_MIN).value).toBe(-9223372036854775808n)

    expect(() => integer(INTEGER_MAX + 1n)).toThrow(InvalidValueError)
    expect(() => integer(INTEGER_MIN - 1n)).toThrow(InvalidValueError)
  })

  it("rejects non-integral and unsafe numbers as integers", () => {
    expect(() => integer(1.5)).toThrow("1.5 is not a safe integer")
    expect(() => integer(2 ** 60)).toThrow(InvalidValueError)
    expect(integer(42).value).toBe(42n)
  })

  it("rejects non-finite decimals", () => {
    expect(() => decimal(Number.NaN)).toThrow(InvalidValueError)
    expect(() => decimal(Number.POSITIVE_INFINITY)).toThrow("Decimal values must be finite, got Infinity")
  })

  it("keeps dict insertion order", () => {
    const d = dict([
      ["b", integer(2)],
      ["a", integer(1)],
    ])

    expect([...d.entries.keys()]).toEqual(["b", "a"])
  })

  it("shares a single null value", () => {
    expect(nullValue()).toBe(nullValue())
    expect(kindOf(nullValue())).toBe("null")
  })
})

describe("fromPlain / toPlain", () => {
  it("maps JS values to kinds", () => {
    const v = fromPlain({ name: "svc", port: 8080, ratio: 0.5, on: true, tags: ["a"], extra: null })

    expect(v).toEqual(
      dict([
        ["name", text("svc")],
        ["port", integer(8080)],
        ["ratio", decimal(0.5)],
        ["on", boolean(true)],
        ["tags", list([text("a")])],
        ["extra", nullValue()],
      ]),
    )
  })

  it("accepts Maps with string keys and rejects other keys", () => {
    expect(fromPlain(new Map([["k", 1n]]))).toEqual(dict([["k", integer(1n)]]))
    expect(() => fromPlain(new Map([[1, "x"]]))).toThrow("Dictionary keys must be strings (at $)")
  })

  it("passes Values through unchanged", () => {
    const v = decimal(2)

    expect(fromPlain(v)).toBe(v)
    expect(fromPlain([v])).toEqual(list([decimal(2)]))
  })

  it("rejects cycles and unsupported types", () => {
    const cyclic: unknown[] = []
    cyclic.push(cyclic)

    expect(() => fromPlain(cyclic)).toThrow("Unsupported value of type cyclic reference at $[0]")
    expect(() => fromPlain(new Date(0))).toThrow("Unsupported value of type Date at $")
    expect(() => fromPlain(() => 1)).toThrow("Unsupported value of type function at $")
  })

  it("converts back to JS values", () => {
    const v = dict([
      ["n", integer(3)],
      ["items", list([decimal(1.5), nullValue(), boolean(false)])],
    ])

    expect(toPlain(v)).toEqual({ n: 3n, items: [1.5, null, false] })
  })
})

describe("valuesEqual", () => {
  it("compares nested structures", () => {
    const a = fromPlain({ x: [1, "two", { y: null }] })
    const b = fromPlain({ x: [1, "two", { y: null }] })

    expect(valuesEqual(a, b)).toBe(true)
    expect(valuesEqual(a, fromPlain({ x: [1, "two", { y: 0 }] }))).toBe(false)
  })

  it("ignores dict key order", () => {
    const a = dict([
      ["a", integer(1)],
      ["b", integer(2)],
    ])
    const b = dict([
      ["b", integer(2)],
      ["a", integer(1)],
    ])

    expect(valuesEqual(a, b)).toBe(true)
  })

  it("distinguishes kinds and signed zero", () => {
    expect(valuesEqual(integer(1), decimal(1))).toBe(false)
    expect(valuesEqual(decimal(-0), decimal(0))).toBe(false)
    expect(valuesEqual(list([]), dict([]))).toBe(false)
  })
})

describe("isValue", () => {
  it("checks the shape of each kind", () => {
    expect(isValue(text("x"))).toBe(true)
    expect(isValue({ kind: "integer", value: 1 })).toBe(false)
    expect(isValue({ kind: "list", items: [] })).toBe(true)
    expect(isValue({ kind: "dict", entries: {} })).toBe(false)
    expect(isValue({ kind: "date" })).toBe(false)
    expect(isValue("text")).toBe(false)
  })
})

describe("assertRepresentable", () => {
  it("accepts anything built through the constructors", () => {
    const value = dict([
      ["limits", list([integer(INTEGER_MAX), decimal(-0.5), nullValue()])],
      ["name", text("x")],
    ])

    expect(() => assertRepresentable(value)).not.toThrow()
  })

  it("rejects an integer outside the 64-bit range", () => {
    const huge: Value = { kind: "integer", value: 2n ** 64n }

    expect(() => assertRepresentable(huge)).toThrow(InvalidValueError)
    expect(() => assertRepresentable(huge)).toThrow(
      "Integer 18446744073709551616 is outside the 64-bit signed range",
    )
  })

  it("names the path of a nested non-finite decimal", () => {
    const value = dict([["ratio", { kind: "decimal", value: Number.NaN }]])

    expect(() => assertRepresentable(value, { option: "tuning" })).toThrow(
      expect.objectContaining({
        message: "Decimal values must be finite, got NaN",
        context: { option: "tuning", path: "$.ratio", value: "NaN" },
      }),
    )
  })

  it("rejects a list that contains itself", () => {
    const items: Value[] = []
    const loop: ListValue = { kind: "list", items }
    items.push(loop)

    expect(() => assertRepresentable(loop)).toThrow("Value contains itself (at $[0])")
  })

  it("accepts the same value twice in one container", () => {
    const shared = list([integer(1)])

    expect(() => assertRepresentable(list([shared, shared]))).not.toThrow()
  })
})
