export const valueKinds = ["text", "integer", "decimal", "boolean", "list", "dict", "null"] as const

export type ValueKind = (typeof valueKinds)[number]

/** Kinds accepted for list items and dict values unless a blueprint narrows them. */
export const scalarKinds = [
  "text",
  "integer",
  "decimal",
  "boolean",
  "null",
] as const satisfies readonly ValueKind[]

export type TextValue = Readonly<{ kind: "text"; value: string }>

/** 64-bit signed integer. */
export type IntegerValue = Readonly<{ kind: "integer"; value: bigint }>

/** Finite IEEE-754 double. */
export type DecimalValue = Readonly<{ kind: "decimal"; value: number }>

export type BooleanValue = Readonly<{ kind: "boolean"; value: boolean }>

export type ListValue = Readonly<{ kind: "list"; items: readonly Value[] }>

/** Text keys, insertion order preserved. */
export type DictValue = Readonly<{ kind: "dict"; entries: ReadonlyMap<string, Value> }>

export type NullValue = Readonly<{ kind: "null" }>

export type Value =
  | TextValue
  | IntegerValue
  | DecimalValue
  | BooleanValue
  | ListValue
  | DictValue
  | NullValue

export type ValueOfKind<K extends ValueKind> = Extract<Value, { kind: K }>

/**
 * JS-native shape of a value, as produced by `toPlain`.
 * Integers stay `bigint` so no precision is lost.
 */
export type PlainValue =
  | string
  | bigint
  | number
  | boolean
  | null
  | PlainValue[]
  | { [key: string]: PlainValue }
