import type { ErrorContext } from "@keel/errors"
import type {
  BooleanValue,
  DecimalValue,
  DictValue,
  IntegerValue,
  ListValue,
  NullValue,
  PlainValue,
  TextValue,
  Value,
  ValueKind,
} from "../ports/value"
import { valueKinds } from "../ports/value"
import { InvalidValueError } from "./errors"

export const INTEGER_MIN = -(2n ** 63n)
export const INTEGER_MAX = 2n ** 63n - 1n

export function text(value: string): TextValue {
  return Object.freeze({ kind: "text", value })
}

/** @throws InvalidValueError outside the 64-bit signed range, or for a non-integral number. */
export function integer(value: bigint | number): IntegerValue {
  if (typeof value === "number" && !Number.isSafeInteger(value)) {
    throw InvalidValueError.notAnInteger(value)
  }

  const big = BigInt(value)
  if (!isInIntegerRange(big)) throw InvalidValueError.integerOutOfRange(value)

  return Object.freeze({ kind: "integer", value: big })
}

/** @throws InvalidValueError for NaN and infinities. */
export function decimal(value: number): DecimalValue {
  if (!Number.isFinite(value)) throw InvalidValueError.notFinite(value)

  return Object.freeze({ kind: "decimal", value })
}

export function boolean(value: boolean): BooleanValue {
  return Object.freeze({ kind: "boolean", value })
}

export function list(items: Iterable<Value>): ListValue {
  return Object.freeze({ kind: "list", items: Object.freeze([...items]) })
}

export function dict(entries: Iterable<readonly [string, Value]>): DictValue {
  return Object.freeze({ kind: "dict", entries: new Map(entries) })
}

const NULL: NullValue = Object.freeze({ kind: "null" })

export function nullValue(): NullValue {
  return NULL
}

export function kindOf(value: Value): ValueKind {
  return value.kind
}

export function isInIntegerRange(value: bigint): boolean {
  return value >= INTEGER_MIN && value <= INTEGER_MAX
}

export function isValueKind(value: unknown): value is ValueKind {
  return typeof value === "string" && valueKinds.some((kind) => kind === value)
}

/**
 * Structural check that `input` is a `Value`. Nested items are not walked.
 */
export function isValue(input: unknown): input is Value {
  if (typeof input !== "object" || input === null || !("kind" in input)) return false

  switch (input.kind) {
    case "text":
      return "value" in input && typeof input.value === "string"
    case "integer":
      return "value" in input && typeof input.value === "bigint"
    case "decimal":
      return "value" in input && typeof input.value === "number"
    case "boolean":
      return "value" in input && typeof input.value === "boolean"
    case "list":
      return "items" in input && Array.isArray(input.items)
    case "dict":
      return "entries" in input && input.entries instanceof Map
    case "null":
      return true
    default:
      return false
  }
}

/**
 * Check that `value` and everything nested in it can be written as a literal.
 * Values built through the constructors always can; hand-built ones may hold
 * an out-of-range integer, a non-finite decimal or a container that contains
 * itself.
 *
 * `context` is merged into the context of the error raised.
 *
 * @throws InvalidValueError
 */
export function assertRepresentable(value: Value, context?: ErrorContext): void {
  checkRepresentable(value, "$", new WeakSet(), context)
}

function checkRepresentable(
  value: Value,
  path: string,
  open: WeakSet<object>,
  context: ErrorContext | undefined,
): void {
  switch (value.kind) {
    case "integer":
      if (!isInIntegerRange(value.value)) {
        throw InvalidValueError.integerOutOfRange(value.value, { ...context, path })
      }
      return
    case "decimal":
      if (!Number.isFinite(value.value)) {
        throw InvalidValueError.notFinite(value.value, { ...context, path })
      }
      return
    case "list":
    case "dict": {
      if (open.has(value)) throw InvalidValueError.cyclic(path, context)

      open.add(value)
      if (value.kind === "list") {
        value.items.forEach((item, i) => checkRepresentable(item, `${path}[${i}]`, open, context))
      } else {
        for (const [key, item] of value.entries) {
          checkRepresentable(item, `${path}.${key}`, open, context)
        }
      }
      open.delete(value)
      return
    }
    default:
      return
  }
}

function isPlainObject(input: unknown): input is Record<string, unknown> {
  if (typeof input !== "object" || input === null) return false

  const proto: unknown = Object.getPrototypeOf(input)
  return proto === Object.prototype || proto === null
}

/**
 * Convert a JS value to a `Value`.
 *
 * Integral numbers become integers; use `decimal()` directly for a whole
 * number that must stay a decimal.
 */
export function fromPlain(input: unknown): Value {
  return convertPlain(input, "$", new Set())
}

function convertPlain(input: unknown, path: string, ancestors: Set<object>): Value {
  if (input === null || input === undefined) return NULL

  switch (typeof input) {
    case "string":
      return text(input)
    case "bigint":
      return integer(input)
    case "number":
      return Number.isInteger(input) ? integer(input) : decimal(input)
    case "boolean":
      return boolean(input)
  }

  if (isValue(input)) return input

  if (typeof input !== "object") throw InvalidValueError.unsupported(path, typeof input)
  if (ancestors.has(input)) throw InvalidValueError.unsupported(path, "cyclic reference")

  ancestors.add(input)
  try {
    if (Array.isArray(input)) {
      const items: unknown[] = input
      return list(items.map((item, i) => convertPlain(item, `${path}[${i}]`, ancestors)))
    }

    if (input instanceof Map) {
      const source: ReadonlyMap<unknown, unknown> = input
      const entries: [string, Value][] = []

      for (const [key, item] of source) {
        if (typeof key !== "string") throw InvalidValueError.invalidKey(path)
        entries.push([key, convertPlain(item, `${path}.${key}`, ancestors)])
      }
      return dict(entries)
    }

    if (isPlainObject(input)) {
      return dict(
        Object.entries(input).map(([key, item]): [string, Value] => [
          key,
          convertPlain(item, `${path}.${key}`, ancestors),
        ]),
      )
    }

    throw InvalidValueError.unsupported(path, input.constructor.name)
  } finally {
    ancestors.delete(input)
  }
}

export function toPlain(value: Value): PlainValue {
  switch (value.kind) {
    case "text":
    case "integer":
    case "decimal":
    case "boolean":
      return value.value
    case "null":
      return null
    case "list":
      return value.items.map(toPlain)
    case "dict":
      return Object.fromEntries(
        [...value.entries].map(([key, item]): [string, PlainValue] => [key, toPlain(item)]),
      )
  }
}

/**
 * Deep structural equality. Dict comparison ignores key order; decimals are
 * compared with `Object.is`, so `-0.0` and `0.0` differ.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.kind) {
    case "text":
      return b.kind === "text" && b.value === a.value
    case "integer":
      return b.kind === "integer" && b.value === a.value
    case "boolean":
      return b.kind === "boolean" && b.value === a.value
    case "decimal":
      return b.kind === "decimal" && Object.is(a.value, b.value)
    case "null":
      return b.kind === "null"
    case "list":
      return (
        b.kind === "list" &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => {
          const other = b.items[i]
          return other !== undefined && valuesEqual(item, other)
        })
      )
    case "dict": {
      if (b.kind !== "dict" || a.entries.size !== b.entries.size) return false

      for (const [key, item] of a.entries) {
        const other = b.entries.get(key)
        if (other === undefined || !valuesEqual(item, other)) return false
      }
      return true
    }
  }
}
