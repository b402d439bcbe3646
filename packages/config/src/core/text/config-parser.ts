import { decodeValue } from "../codec/decoder"
import { DecodeError } from "../errors"

/** One `option = literal` assignment as read from the file. */
export type ParsedEntry = {
  section: string
  option: string
  /** Raw literal text, spanning several lines when brackets are left open. */
  literal: string
  /** 1-based line of the assignment */
  line: number
}

const SECTION_HEADER = /^\[(.*)\]$/

function isComment(trimmed: string): boolean {
  return trimmed.startsWith("#") || trimmed.startsWith(";")
}

/**
 * A comment or a named header ends an open literal. Inside an open list, a
 * bracketed line that reads as a literal on its own (`[]`, `[1, 2]`) is an
 * item instead.
 */
function endsLiteral(trimmed: string, literal: string): boolean {
  if (isComment(trimmed)) return true

  const header = SECTION_HEADER.exec(trimmed)
  if (header === null) return false
  if (scanBrackets(literal).open.at(-1) === "[" && isLiteral(trimmed)) return false

  return (header[1] ?? "").trim() !== ""
}

function isLiteral(text: string): boolean {
  try {
    decodeValue(text)
    return true
  } catch (error) {
    if (error instanceof DecodeError) return false
    throw error
  }
}

/**
 * Split configuration text into assignments, in file order.
 *
 * Recognised lines: `[section]` headers, `option = literal` assignments,
 * blank lines, and full-line comments starting with `#` or `;`. A literal
 * continues onto the following lines while a bracket or brace is open; a
 * comment line, a named section header or the end of the text ends it.
 *
 * Repeated keys are all returned; callers keep the last.
 *
 * @throws DecodeError for any other line, an empty section or option name,
 * or an assignment before the first section header.
 */
export function parseConfigText(text: string): ParsedEntry[] {
  const lines = text.split(/\r\n|\r|\n/)
  const entries: ParsedEntry[] = []

  let section: string | undefined
  let pending: ParsedEntry | undefined

  for (const [index, raw] of lines.entries()) {
    const lineNo = index + 1
    const trimmed = raw.trim()

    if (pending) {
      if (!endsLiteral(trimmed, pending.literal)) {
        pending.literal += `\n${raw}`
        if (isBalanced(pending.literal)) pending = undefined
        continue
      }
      pending = undefined
    }

    if (trimmed === "" || isComment(trimmed)) continue

    const header = SECTION_HEADER.exec(trimmed)
    if (header) {
      const name = (header[1] ?? "").trim()
      if (name === "") throw DecodeError.syntax("empty section name", lineNo, raw)

      section = name
      continue
    }

    if (trimmed.startsWith("[")) {
      throw DecodeError.syntax("unterminated section header", lineNo, raw)
    }

    const eq = trimmed.indexOf("=")
    if (eq < 0) throw DecodeError.syntax("expected [section], option = value or a comment", lineNo, raw)

    const option = trimmed.slice(0, eq).trim()
    if (option === "") throw DecodeError.syntax("empty option name", lineNo, raw)
    if (section === undefined) {
      throw DecodeError.syntax(`option "${option}" appears before any [section]`, lineNo, raw)
    }

    const entry: ParsedEntry = { section, option, literal: trimmed.slice(eq + 1).trim(), line: lineNo }
    entries.push(entry)

    if (!isBalanced(entry.literal)) pending = entry
  }

  return entries
}

/**
 * `true` when every `[` and `{` outside of string literals is closed, or a
 * string is left open (the decoder reports that one).
 */
function isBalanced(literal: string): boolean {
  const { open, stringLeftOpen } = scanBrackets(literal)
  return stringLeftOpen || open.length === 0
}

/** Brackets still open at the end of `literal`, outermost first. */
function scanBrackets(literal: string): { open: string[]; stringLeftOpen: boolean } {
  const open: string[] = []
  let inString = false

  for (let i = 0; i < literal.length; i++) {
    const ch = literal.charAt(i)

    if (inString) {
      if (ch === "\\") i++
      else if (ch === '"') inString = false
      else if (ch === "\n") return { open, stringLeftOpen: true }
      continue
    }

    if (ch === '"') inString = true
    else if (ch === "[" || ch === "{") open.push(ch)
    else if (ch === "]" || ch === "}") open.pop()
  }

  return { open, stringLeftOpen: inString }
}
