import type { Value } from "./value"

/** Where the current value of an option came from. */
export type Provenance = "file" | "default" | "set"

/** What to do with assignments the schema does not declare. */
export type UnknownEntryPolicy = "ignore" | "warn"

export type OptionKey = Readonly<{ section: string; option: string }>

/** An assignment found in configuration text but absent from the schema. */
export type UnknownEntry = Readonly<{
  section: string
  option: string
  literal: string
  /** 1-based line of the assignment */
  line: number
}>

export type DocumentEntry = Readonly<{
  section: string
  option: string
  value: Value
  provenance: Provenance
}>
