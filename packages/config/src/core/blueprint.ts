import type { ErrorContext } from "@keel/errors"
import { z } from "zod"
import type { Value, ValueKind } from "../ports/value"
import { scalarKinds, valueKinds } from "../ports/value"
import {
  InvalidBlueprintError,
  OutOfRangeError,
  PatternMismatchError,
  TypeMismatchError,
} from "./errors"
import { assertRepresentable, isValue } from "./value"

/** Section and option names must survive a write and re-read of the file. */
const NAME = /^[^\s[\]=#;][^\n\r[\]=]*$/

const nameSchema = (what: string) =>
  z
    .string()
    .min(1, `${what} must not be empty`)
    .refine((name) => name === name.trim(), `${what} must not start or end with whitespace`)
    .refine((name) => NAME.test(name), `${what} contains characters the file format cannot hold`)

const boundSchema = z.union([z.number(), z.bigint()])

export const blueprintDefinitionSchema = z
  .object({
    section: nameSchema("section"),
    option: nameSchema("option"),
    kinds: z.array(z.enum(valueKinds)).min(1, "kinds must not be empty"),
    default: z.custom<Value>(isValue, "default must be a Value"),
    description: z.string().default(""),
    itemKinds: z.array(z.enum(valueKinds)).min(1, "itemKinds must not be empty").optional(),
    min: boundSchema.optional(),
    max: boundSchema.optional(),
    patterns: z.record(z.string().min(1), z.union([z.string(), z.instanceof(RegExp)])).optional(),
  })
  .refine((d) => d.min === undefined || d.max === undefined || d.min <= d.max, {
    message: "min must not exceed max",
    path: ["min"],
  })

export type BlueprintDefinition = z.input<typeof blueprintDefinitionSchema>

type Bound = number | bigint

/**
 * Declaration of one (section, option): accepted kinds, default, description
 * and constraints. Immutable once built.
 */
export class Blueprint {
  readonly section: string
  readonly option: string
  readonly kinds: readonly ValueKind[]
  readonly itemKinds: readonly ValueKind[]
  readonly default: Value
  readonly description: string
  readonly min: Bound | undefined
  readonly max: Bound | undefined
  /** Named patterns, anchored to match the whole text. */
  readonly patterns: ReadonlyMap<string, RegExp>

  private constructor(definition: z.output<typeof blueprintDefinitionSchema>) {
    this.section = definition.section
    this.option = definition.option
    this.kinds = Object.freeze(unique(definition.kinds))
    this.itemKinds = Object.freeze(unique(definition.itemKinds ?? scalarKinds))
    this.default = definition.default
    this.description = definition.description
    this.min = definition.min
    this.max = definition.max
    this.patterns = compilePatterns(definition.section, definition.option, definition.patterns)

    Object.freeze(this)
  }

  /**
   * @throws InvalidBlueprintError when the definition is malformed or the
   * default breaks one of the blueprint's own rules.
   */
  static define(definition: BlueprintDefinition): Blueprint {
    const parsed = blueprintDefinitionSchema.safeParse(definition)

    if (!parsed.success) {
      throw InvalidBlueprintError.invalidDefinition(z.prettifyError(parsed.error))
    }

    const blueprint = new Blueprint(parsed.data)

    try {
      blueprint.validate(blueprint.default)
    } catch (err) {
      throw InvalidBlueprintError.invalidDefault(blueprint.section, blueprint.option, err)
    }

    return blueprint
  }

  /** `true` when null is an accepted kind. */
  get optional(): boolean {
    return this.kinds.includes("null")
  }

  /** `true` when list items or dict values are restricted below the default set. */
  get hasNarrowItemKinds(): boolean {
    return (
      this.itemKinds.length !== scalarKinds.length ||
      scalarKinds.some((kind) => !this.itemKinds.includes(kind))
    )
  }

  accepts(kind: ValueKind): boolean {
    return this.kinds.includes(kind)
  }

  /**
   * Check `value` against every rule and return it unchanged. A value that
   * cannot be written to the file fails with InvalidValueError first.
   *
   * `context` is merged into the context of any error raised.
   */
  validate(value: Value, context?: ErrorContext): Value {
    assertRepresentable(value, { ...context, section: this.section, option: this.option })
    this.checkKinds(value, context)
    this.checkPatterns(value, context)
    this.checkRange(value, context)

    return value
  }

  private checkKinds(value: Value, context?: ErrorContext): void {
    const where = { section: this.section, option: this.option, context }

    if (!this.accepts(value.kind)) {
      throw TypeMismatchError.of({ ...where, actual: value.kind, expected: this.kinds })
    }

    for (const [item, child] of children(value)) {
      if (!this.itemKinds.includes(child.kind)) {
        throw TypeMismatchError.of({ ...where, actual: child.kind, expected: this.itemKinds, item })
      }
    }
  }

  private checkPatterns(value: Value, context?: ErrorContext): void {
    if (this.patterns.size === 0) return

    if (value.kind === "text") {
      this.matchPatterns(value.value, undefined, context)
      return
    }

    for (const [item, child] of children(value)) {
      if (child.kind === "text") this.matchPatterns(child.value, item, context)
    }
  }

  private matchPatterns(text: string, item: number | string | undefined, context?: ErrorContext) {
    for (const pattern of this.patterns.values()) {
      if (pattern.test(text)) return
    }

    throw PatternMismatchError.of({
      section: this.section,
      option: this.option,
      value: text,
      patterns: [...this.patterns.keys()],
      item,
      context,
    })
  }

  private checkRange(value: Value, context?: ErrorContext): void {
    if (value.kind !== "integer" && value.kind !== "decimal") return

    const where = { section: this.section, option: this.option, value: value.value, context }

    if (this.min !== undefined && value.value < this.min) {
      throw OutOfRangeError.of({ ...where, bound: "min", limit: this.min })
    }
    if (this.max !== undefined && value.value > this.max) {
      throw OutOfRangeError.of({ ...where, bound: "max", limit: this.max })
    }
  }
}

export function defineBlueprint(definition: BlueprintDefinition): Blueprint {
  return Blueprint.define(definition)
}

/** Direct items of a list (by index) or dict (by key). */
function children(value: Value): Array<[number | string, Value]> {
  if (value.kind === "list") return value.items.map((item, i): [number, Value] => [i, item])
  if (value.kind === "dict") return [...value.entries]

  return []
}

function unique<T>(items: readonly T[]): T[] {
  return [...new Set(items)]
}

function compilePatterns(
  section: string,
  option: string,
  patterns: Readonly<Record<string, string | RegExp>> | undefined,
): ReadonlyMap<string, RegExp> {
  const compiled = new Map<string, RegExp>()

  for (const [name, pattern] of Object.entries(patterns ?? {})) {
    const source = typeof pattern === "string" ? pattern : pattern.source
    const flags = typeof pattern === "string" ? "u" : pattern.flags.replace(/[gy]/g, "")

    try {
      compiled.set(name, new RegExp(`^(?:${source})$`, flags))
    } catch (err) {
      throw InvalidBlueprintError.invalidPattern(section, option, name, err)
    }
  }

  return compiled
}
