import type { Value, ValueKind } from "../../ports/value"
import { valueKinds } from "../../ports/value"
import { DecodeError, type TextPosition } from "../errors"
import { boolean, decimal, dict, integer, isInIntegerRange, list, nullValue, text } from "../value"

const NUMBER = /-?\d+(?:\.\d+)?/y
const WORD = /[A-Za-z_][A-Za-z0-9_]*/y
const HEX4 = /^[0-9a-fA-F]{4}$/

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  '"': '"',
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
}

/**
 * Parse one literal and check its kind.
 *
 * Empty (or whitespace-only) text and the keyword `null` decode to null.
 * Whitespace and line breaks between tokens are ignored.
 *
 * @throws DecodeError when the literal is malformed or its kind is not in
 * `expectedKinds`.
 */
export function decodeValue(
  literal: string,
  expectedKinds: Iterable<ValueKind> = valueKinds,
): Value {
  const expected = new Set(expectedKinds)
  const value = literal.trim() === "" ? nullValue() : new LiteralParser(literal).parseDocument()

  if (!expected.has(value.kind)) {
    throw DecodeError.unexpectedKind(value.kind, expected)
  }

  return value
}

class LiteralParser {
  private pos = 0

  constructor(private readonly source: string) {}

  parseDocument(): Value {
    this.skipWhitespace()
    const value = this.parseValue()
    this.skipWhitespace()

    if (!this.atEnd()) return this.fail(`unexpected ${this.describeNext()} after the value`)

    return value
  }

  private parseValue(): Value {
    const ch = this.peek()

    if (ch === undefined) return this.fail("unexpected end of literal")
    if (ch === '"') return text(this.parseString())
    if (ch === "[") return this.parseList()
    if (ch === "{") return this.parseDict()
    if (ch === "-" || isDigit(ch)) return this.parseNumber()
    if (/[A-Za-z_]/.test(ch)) return this.parseKeyword()

    return this.fail(`unexpected ${this.describeNext()}`)
  }

  private parseString(): string {
    const start = this.pos
    this.pos++ // opening quote

    let out = ""

    for (;;) {
      const ch = this.peek()

      if (ch === undefined || ch === "\n" || ch === "\r") {
        return this.fail("unterminated string", start)
      }

      this.pos++

      if (ch === '"') return out
      if (ch !== "\\") {
        out += ch
        continue
      }

      const escape = this.peek()
      if (escape === undefined) return this.fail("unterminated string", start)

      const simple = SIMPLE_ESCAPES[escape]
      if (simple !== undefined) {
        out += simple
        this.pos++
        continue
      }

      if (escape === "u") {
        const hex = this.source.slice(this.pos + 1, this.pos + 5)
        if (!HEX4.test(hex)) return this.fail("invalid \\u escape", this.pos - 1)

        out += String.fromCharCode(Number.parseInt(hex, 16))
        this.pos += 5
        continue
      }

      return this.fail(`invalid escape "\\${escape}"`, this.pos - 1)
    }
  }

  private parseList(): Value {
    const start = this.pos
    this.pos++ // [

    const items: Value[] = []

    this.skipWhitespace()
    if (this.peek() === "]") {
      this.pos++
      return list(items)
    }

    for (;;) {
      items.push(this.parseItem("list item", start, "unterminated list"))
      this.skipWhitespace()

      const ch = this.peek()
      if (ch === undefined) return this.fail("unterminated list", start)

      this.pos++
      if (ch === "]") return list(items)
      if (ch !== ",") return this.fail(`expected "," or "]" but found ${JSON.stringify(ch)}`, this.pos - 1)

      this.skipWhitespace()
    }
  }

  private parseDict(): Value {
    const start = this.pos
    this.pos++ // {

    const entries = new Map<string, Value>()

    this.skipWhitespace()
    if (this.peek() === "}") {
      this.pos++
      return dict(entries)
    }

    for (;;) {
      const ch = this.peek()
      if (ch === undefined) return this.fail("unterminated dictionary", start)
      if (ch === "," || ch === "}") return this.fail("empty dictionary entry")
      if (ch !== '"') return this.fail("dictionary keys must be quoted strings")

      const key = this.parseString()

      this.skipWhitespace()
      if (this.peek() !== ":") {
        return this.atEnd()
          ? this.fail("unterminated dictionary", start)
          : this.fail(`expected ":" after key ${JSON.stringify(key)}`)
      }
      this.pos++
      this.skipWhitespace()

      // A repeated key keeps its first position and takes the last value.
      entries.set(key, this.parseItem("dictionary value", start, "unterminated dictionary"))
      this.skipWhitespace()

      const next = this.peek()
      if (next === undefined) return this.fail("unterminated dictionary", start)

      this.pos++
      if (next === "}") return dict(entries)
      if (next !== ",") {
        return this.fail(`expected "," or "}" but found ${JSON.stringify(next)}`, this.pos - 1)
      }

      this.skipWhitespace()
    }
  }

  /** A nested value; only the `null` keyword stands for null here. */
  private parseItem(what: string, containerStart: number, unterminated: string): Value {
    const ch = this.peek()

    if (ch === undefined) return this.fail(unterminated, containerStart)
    if (ch === "," || ch === "]" || ch === "}") return this.fail(`empty ${what}`)

    return this.parseValue()
  }

  private parseNumber(): Value {
    const start = this.pos
    NUMBER.lastIndex = start

    const match = NUMBER.exec(this.source)
    if (!match) return this.fail("expected digits")

    const token = match[0]
    this.pos += token.length

    const next = this.peek()
    if (next !== undefined && /[A-Za-z0-9_.]/.test(next)) {
      return this.fail(`invalid number "${token}${next}"`, start)
    }

    if (token.includes(".")) {
      const value = Number(token)
      if (!Number.isFinite(value)) return this.fail("decimal out of range", start)

      return decimal(value)
    }

    const value = BigInt(token)
    if (!isInIntegerRange(value)) return this.fail("integer out of the 64-bit signed range", start)

    return integer(value)
  }

  private parseKeyword(): Value {
    const start = this.pos
    WORD.lastIndex = start

    const token = WORD.exec(this.source)?.[0] ?? ""
    this.pos += token.length

    switch (token) {
      case "true":
        return boolean(true)
      case "false":
        return boolean(false)
      case "null":
        return nullValue()
      default:
        return this.fail(`unknown keyword "${token}"`, start)
    }
  }

  private skipWhitespace(): void {
    while (this.pos < this.source.length && /\s/.test(this.source.charAt(this.pos))) {
      this.pos++
    }
  }

  private peek(): string | undefined {
    return this.pos < this.source.length ? this.source.charAt(this.pos) : undefined
  }

  private atEnd(): boolean {
    return this.pos >= this.source.length
  }

  private describeNext(): string {
    const ch = this.peek()
    return ch === undefined ? "end of literal" : `character ${JSON.stringify(ch)}`
  }

  private fail(reason: string, offset: number = this.pos): never {
    throw DecodeError.malformed(reason, positionOf(this.source, offset))
  }
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9"
}

export function positionOf(source: string, offset: number): TextPosition {
  let line = 1
  let lineStart = 0

  for (let i = 0; i < offset && i < source.length; i++) {
    if (source.charAt(i) === "\n") {
      line++
      lineStart = i + 1
    }
  }

  return { offset, line, column: offset - lineStart + 1 }
}
