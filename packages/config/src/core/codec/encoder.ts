import type { Value } from "../../ports/value"
import { EncodeError } from "../errors"
import { isInIntegerRange } from "../value"

export type EncodeStyle = "inline" | "pretty"

export type EncodeOptions = {
  /**
   * `inline` keeps the literal on one line; `pretty` puts each list item and
   * dict entry on its own line, indented by four spaces per level.
   * @default "inline"
   */
  style?: EncodeStyle
}

const INDENT = "    "

/**
 * Canonical literal for `value`. A top-level null encodes as empty text;
 * nested nulls use the `null` keyword.
 *
 * @throws EncodeError for a hand-built value that contains itself or holds
 * a number the format cannot represent.
 */
export function encodeValue(value: Value, options: EncodeOptions = {}): string {
  if (value.kind === "null") return ""

  return new Encoder(options.style ?? "inline").encode(value, "$", 0)
}

/**
 * Decimal in plain notation with at least one fractional digit.
 * `3` → `3.0`, `1e21` → `1000000000000000000000.0`, `-0` → `-0.0`.
 */
export function formatDecimal(value: number): string {
  if (Object.is(value, -0)) return "-0.0"

  const repr = String(value)
  const plain = /e/i.test(repr) ? expandExponent(repr) : repr

  return plain.includes(".") ? plain : `${plain}.0`
}

function expandExponent(repr: string): string {
  const match = /^(-?)(\d+)(?:\.(\d+))?e([+-]?\d+)$/i.exec(repr)
  if (!match) return repr

  const [, sign = "", whole = "", fraction = "", exponent = "0"] = match
  const digits = whole + fraction
  const point = whole.length + Number(exponent)

  if (point >= digits.length) return `${sign}${digits}${"0".repeat(point - digits.length)}`
  if (point <= 0) return `${sign}0.${"0".repeat(-point)}${digits}`

  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`
}

/** Double-quoted string with JSON escapes; non-ASCII is kept as is. */
export function quoteText(value: string): string {
  return JSON.stringify(value)
}

class Encoder {
  /** Containers on the current path, for cycle detection. */
  private readonly open = new WeakSet<object>()

  constructor(private readonly style: EncodeStyle) {}

  encode(value: Value, path: string, depth: number): string {
    switch (value.kind) {
      case "text":
        return quoteText(value.value)
      case "integer":
        if (!isInIntegerRange(value.value)) {
          throw EncodeError.unrepresentable(path, "integer outside the 64-bit signed range")
        }
        return value.value.toString()
      case "decimal":
        if (!Number.isFinite(value.value)) {
          throw EncodeError.unrepresentable(path, `non-finite decimal ${value.value}`)
        }
        return formatDecimal(value.value)
      case "boolean":
        return value.value ? "true" : "false"
      case "null":
        return "null"
      case "list": {
        const items = value.items
        const parts = this.enter(value, path, () =>
          items.map((item, i) => this.encode(item, `${path}[${i}]`, depth + 1)),
        )
        return this.wrap(parts, "[", "]", depth)
      }
      case "dict": {
        const entries = value.entries
        const parts = this.enter(value, path, () =>
          [...entries].map(
            ([key, item]) => `${quoteText(key)}: ${this.encode(item, `${path}.${key}`, depth + 1)}`,
          ),
        )
        return this.wrap(parts, "{", "}", depth)
      }
    }
  }

  private enter<T>(container: object, path: string, fn: () => T): T {
    if (this.open.has(container)) throw EncodeError.cyclic(path)

    this.open.add(container)
    try {
      return fn()
    } finally {
      this.open.delete(container)
    }
  }

  private wrap(parts: string[], start: string, end: string, depth: number): string {
    if (parts.length === 0) return `${start}${end}`
    if (this.style === "inline") return `${start}${parts.join(", ")}${end}`

    const inner = INDENT.repeat(depth + 1)
    return `${start}\n${inner}${parts.join(`,\n${inner}`)}\n${INDENT.repeat(depth)}${end}`
  }
}
