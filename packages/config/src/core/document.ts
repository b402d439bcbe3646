import type { Logger } from "@keel/logger"
import type {
  DocumentEntry,
  OptionKey,
  Provenance,
  UnknownEntry,
  UnknownEntryPolicy,
} from "../ports/document"
import type { Value } from "../ports/value"
import type { Blueprint } from "./blueprint"
import { decodeValue } from "./codec/decoder"
import { DecodeError } from "./errors"
import type { Schema } from "./schema"
import { type ParsedEntry, parseConfigText } from "./text/config-parser"
import { type RenderOptions, renderConfigText } from "./text/config-renderer"

export type FromTextOptions = {
  /** @default "ignore" */
  unknownEntries?: UnknownEntryPolicy
  /** Receives one warning per undeclared entry under the `"warn"` policy. */
  logger?: Logger
}

type Slot = { value: Value; provenance: Provenance }

/**
 * In-memory values of a configuration: exactly one entry per blueprint of
 * its schema, never an undeclared one.
 */
export class ConfigDocument {
  private constructor(
    private readonly schema: Schema,
    private readonly slots: Map<Blueprint, Slot>,
    private readonly unknown: readonly UnknownEntry[],
    private readonly healedKeys: readonly OptionKey[],
  ) {}

  /** Every option at its default. */
  static fromDefaults(schema: Schema): ConfigDocument {
    const slots = new Map<Blueprint, Slot>()
    for (const blueprint of schema) {
      slots.set(blueprint, { value: blueprint.default, provenance: "default" })
    }

    return new ConfigDocument(schema, slots, [], [])
  }

  /**
   * Read values from configuration text. Options missing from the text take
   * their default and are reported by `healed()`.
   *
   * @throws DecodeError for malformed text or literals, and the validation
   * errors of `Blueprint.validate`, each with section, option and line.
   */
  static fromText(schema: Schema, rawText: string, options: FromTextOptions = {}): ConfigDocument {
    const policy = options.unknownEntries ?? "ignore"
    const assigned = new Map<Blueprint, ParsedEntry>()
    const unknownByKey = new Map<string, ParsedEntry>()

    for (const entry of parseConfigText(rawText)) {
      const blueprint = schema.get(entry.section, entry.option)

      if (blueprint) assigned.set(blueprint, entry)
      else unknownByKey.set(JSON.stringify([entry.section, entry.option]), entry)
    }

    const slots = new Map<Blueprint, Slot>()
    const healed: OptionKey[] = []

    for (const blueprint of schema) {
      const entry = assigned.get(blueprint)

      if (!entry) {
        slots.set(blueprint, { value: blueprint.default, provenance: "default" })
        healed.push({ section: blueprint.section, option: blueprint.option })
        continue
      }

      slots.set(blueprint, { value: readEntry(blueprint, entry), provenance: "file" })
    }

    const unknown = [...unknownByKey.values()].map((entry) => Object.freeze({ ...entry }))

    if (policy === "warn") {
      for (const entry of unknown) {
        options.logger?.warn("Ignoring undeclared configuration option", {
          section: entry.section,
          option: entry.option,
          line: entry.line,
        })
      }
    }

    return new ConfigDocument(schema, slots, unknown, healed)
  }

  /** @throws UnknownOptionError */
  get(section: string, option: string): Value {
    return this.slot(section, option).value
  }

  has(section: string, option: string): boolean {
    return this.schema.has(section, option)
  }

  /**
   * Validate and store `value`. On any error the document is left unchanged.
   *
   * @throws UnknownOptionError, InvalidValueError, TypeMismatchError, OutOfRangeError or
   * PatternMismatchError.
   */
  set(section: string, option: string, value: Value): void {
    const blueprint = this.schema.require(section, option)
    blueprint.validate(value)

    this.slots.set(blueprint, { value, provenance: "set" })
  }

  /** @throws UnknownOptionError */
  explain(section: string, option: string): Provenance {
    return this.slot(section, option).provenance
  }

  /** Options that were missing from the parsed text and took their default. */
  healed(): OptionKey[] {
    return [...this.healedKeys]
  }

  /** Assignments in the parsed text that the schema does not declare. */
  unknownEntries(): UnknownEntry[] {
    return [...this.unknown]
  }

  /** Current values in schema order. */
  entries(): DocumentEntry[] {
    return [...this.schema].map((blueprint) => {
      const { value, provenance } = this.slotOf(blueprint)
      return { section: blueprint.section, option: blueprint.option, value, provenance }
    })
  }

  toText(options: RenderOptions = {}): string {
    return renderConfigText(this.schema, (blueprint) => this.slotOf(blueprint).value, options)
  }

  private slot(section: string, option: string): Slot {
    return this.slotOf(this.schema.require(section, option))
  }

  private slotOf(blueprint: Blueprint): Slot {
    const slot = this.slots.get(blueprint)
    if (slot) return slot

    // Declared after this document was built; only possible before the schema is frozen.
    const fallback: Slot = { value: blueprint.default, provenance: "default" }
    this.slots.set(blueprint, fallback)

    return fallback
  }
}

function readEntry(blueprint: Blueprint, entry: ParsedEntry): Value {
  let value: Value

  try {
    value = decodeValue(entry.literal, blueprint.kinds)
  } catch (err) {
    if (err instanceof DecodeError) throw DecodeError.inEntry(err, entry)
    throw err
  }

  return blueprint.validate(value, { line: entry.line })
}
