import type { ErrorContext } from "@keel/errors"
import type { Value } from "../ports/value"
import { Blueprint, type BlueprintDefinition } from "./blueprint"
import { DuplicateOptionError, SchemaFrozenError, UnknownOptionError } from "./errors"

/**
 * Ordered collection of blueprints keyed by (section, option).
 *
 * Sections keep the order in which they were first declared; options keep
 * declaration order within their section. That order is the file order.
 */
export class Schema implements Iterable<Blueprint> {
  private readonly bySection = new Map<string, Map<string, Blueprint>>()
  private frozen = false

  constructor(blueprints: Iterable<Blueprint | BlueprintDefinition> = []) {
    for (const blueprint of blueprints) this.add(blueprint)
  }

  /**
   * @throws DuplicateOptionError when (section, option) is already declared.
   * @throws InvalidBlueprintError for a malformed definition.
   * @throws SchemaFrozenError once the schema is frozen.
   */
  add(input: Blueprint | BlueprintDefinition): this {
    if (this.frozen) throw SchemaFrozenError.of(input.section, input.option)

    const blueprint = input instanceof Blueprint ? input : Blueprint.define(input)
    const { section, option } = blueprint

    if (this.has(section, option)) throw DuplicateOptionError.of(section, option)

    let options = this.bySection.get(section)
    if (!options) {
      options = new Map()
      this.bySection.set(section, options)
    }
    options.set(option, blueprint)

    return this
  }

  get(section: string, option: string): Blueprint | undefined {
    return this.bySection.get(section)?.get(option)
  }

  /** @throws UnknownOptionError */
  require(section: string, option: string): Blueprint {
    const blueprint = this.get(section, option)
    if (!blueprint) throw UnknownOptionError.of(section, option)

    return blueprint
  }

  has(section: string, option: string): boolean {
    return this.get(section, option) !== undefined
  }

  /**
   * Check `value` against the blueprint of (section, option).
   *
   * @throws UnknownOptionError, InvalidValueError, TypeMismatchError, OutOfRangeError or
   * PatternMismatchError.
   */
  validate(section: string, option: string, value: Value, context?: ErrorContext): Value {
    return this.require(section, option).validate(value, context)
  }

  sections(): string[] {
    return [...this.bySection.keys()]
  }

  optionsOf(section: string): Blueprint[] {
    return [...(this.bySection.get(section)?.values() ?? [])]
  }

  get size(): number {
    let count = 0
    for (const options of this.bySection.values()) count += options.size

    return count
  }

  freeze(): this {
    this.frozen = true
    return this
  }

  get isFrozen(): boolean {
    return this.frozen
  }

  *[Symbol.iterator](): Iterator<Blueprint> {
    for (const options of this.bySection.values()) {
      yield* options.values()
    }
  }
}
