import { BaseError, type ErrorContext } from "@keel/errors"
import type { ValueKind } from "../ports/value"

/** Location of a decoding failure inside a literal or a file. */
export type TextPosition = Readonly<{
  /** 0-based character offset */
  offset: number
  /** 1-based */
  line: number
  /** 1-based */
  column: number
}>

export type EntryLocation = Readonly<{
  section: string
  option: string
  /** 1-based line of the assignment in the file */
  line: number
}>

function formatKinds(kinds: Iterable<ValueKind>): string {
  return [...kinds].join(" | ")
}

export class DecodeError extends BaseError<"decode_error"> {
  static malformed(reason: string, position: TextPosition): DecodeError {
    return new DecodeError(
      `Malformed literal: ${reason} at line ${position.line}, column ${position.column}`,
      { code: "decode_error", context: { reason, ...position } },
    )
  }

  static unexpectedKind(actual: ValueKind, expected: Iterable<ValueKind>): DecodeError {
    const expectedKinds = [...expected]

    return new DecodeError(`Expected ${formatKinds(expectedKinds)} but found ${actual}`, {
      code: "decode_error",
      context: { reason: "unexpected kind", actual, expected: expectedKinds },
    })
  }

  /** A line of the file that fits none of the grammar's line forms. */
  static syntax(reason: string, line: number, text: string): DecodeError {
    return new DecodeError(`Invalid configuration text at line ${line}: ${reason}`, {
      code: "decode_error",
      context: { reason, line, text },
    })
  }

  /** Rebase a literal-level failure onto the entry it was read from. */
  static inEntry(cause: DecodeError, entry: EntryLocation): DecodeError {
    const literalLine = typeof cause.context.line === "number" ? cause.context.line : 1

    return new DecodeError(
      `Invalid value for ${entry.section}.${entry.option} at line ${entry.line}: ${cause.message}`,
      {
        code: "decode_error",
        context: {
          ...cause.context,
          section: entry.section,
          option: entry.option,
          line: entry.line + literalLine - 1,
        },
        cause,
      },
    )
  }
}

export class EncodeError extends BaseError<"encode_error"> {
  static cyclic(path: string): EncodeError {
    return new EncodeError(`Cannot encode a value that contains itself (at ${path})`, {
      code: "encode_error",
      context: { path },
    })
  }

  static unrepresentable(path: string, reason: string): EncodeError {
    return new EncodeError(`Cannot encode value at ${path}: ${reason}`, {
      code: "encode_error",
      context: { path, reason },
    })
  }
}

export class InvalidValueError extends BaseError<"invalid_value"> {
  static integerOutOfRange(value: bigint | number, context?: ErrorContext): InvalidValueError {
    return new InvalidValueError(`Integer ${value} is outside the 64-bit signed range`, {
      code: "invalid_value",
      context: { ...context, value: String(value) },
    })
  }

  static notAnInteger(value: number): InvalidValueError {
    return new InvalidValueError(`${value} is not a safe integer`, {
      code: "invalid_value",
      context: { value },
    })
  }

  static notFinite(value: number, context?: ErrorContext): InvalidValueError {
    return new InvalidValueError(`Decimal values must be finite, got ${value}`, {
      code: "invalid_value",
      context: { ...context, value: String(value) },
    })
  }

  static cyclic(path: string, context?: ErrorContext): InvalidValueError {
    return new InvalidValueError(`Value contains itself (at ${path})`, {
      code: "invalid_value",
      context: { ...context, path },
    })
  }

  static unsupported(path: string, type: string): InvalidValueError {
    return new InvalidValueError(`Unsupported value of type ${type} at ${path}`, {
      code: "invalid_value",
      context: { path, type },
    })
  }

  static invalidKey(path: string): InvalidValueError {
    return new InvalidValueError(`Dictionary keys must be strings (at ${path})`, {
      code: "invalid_value",
      context: { path },
    })
  }
}

export class DuplicateOptionError extends BaseError<"duplicate_option"> {
  static of(section: string, option: string): DuplicateOptionError {
    return new DuplicateOptionError(`Option ${section}.${option} is already declared`, {
      code: "duplicate_option",
      context: { section, option },
      isOperational: false,
    })
  }
}

export class InvalidBlueprintError extends BaseError<"invalid_blueprint"> {
  static invalidDefinition(details: string): InvalidBlueprintError {
    return new InvalidBlueprintError(`Invalid blueprint definition:\n${details}`, {
      code: "invalid_blueprint",
      context: { details },
      isOperational: false,
    })
  }

  static invalidPattern(
    section: string,
    option: string,
    name: string,
    cause: unknown,
  ): InvalidBlueprintError {
    return new InvalidBlueprintError(
      `Pattern "${name}" of ${section}.${option} is not a valid regular expression`,
      {
        code: "invalid_blueprint",
        context: { section, option, pattern: name },
        cause,
        isOperational: false,
      },
    )
  }

  static invalidDefault(section: string, option: string, cause: unknown): InvalidBlueprintError {
    return new InvalidBlueprintError(
      `Default of ${section}.${option} does not satisfy its own blueprint`,
      {
        code: "invalid_blueprint",
        context: { section, option },
        cause,
        isOperational: false,
      },
    )
  }
}

export class UnknownOptionError extends BaseError<"unknown_option"> {
  static of(section: string, option: string): UnknownOptionError {
    return new UnknownOptionError(`Option ${section}.${option} is not declared`, {
      code: "unknown_option",
      context: { section, option },
      isOperational: false,
    })
  }
}

export class TypeMismatchError extends BaseError<"type_mismatch"> {
  static of(input: {
    section: string
    option: string
    actual: ValueKind
    expected: Iterable<ValueKind>
    /** Position of the offending item inside a list or dict */
    item?: number | string
    context?: ErrorContext
  }): TypeMismatchError {
    const expected = [...input.expected]
    const where =
      input.item === undefined
        ? ""
        : typeof input.item === "number"
          ? ` at index ${input.item}`
          : ` at key ${JSON.stringify(input.item)}`

    return new TypeMismatchError(
      `${input.section}.${input.option}${where} expects ${formatKinds(expected)} but got ${input.actual}`,
      {
        code: "type_mismatch",
        context: {
          ...input.context,
          section: input.section,
          option: input.option,
          actual: input.actual,
          expected,
          ...(input.item !== undefined && { item: input.item }),
        },
      },
    )
  }
}

export class OutOfRangeError extends BaseError<"out_of_range"> {
  static of(input: {
    section: string
    option: string
    value: bigint | number
    bound: "min" | "max"
    limit: bigint | number
    context?: ErrorContext
  }): OutOfRangeError {
    const relation = input.bound === "min" ? "at least" : "at most"

    return new OutOfRangeError(
      `${input.section}.${input.option} must be ${relation} ${input.limit}, got ${input.value}`,
      {
        code: "out_of_range",
        context: {
          ...input.context,
          section: input.section,
          option: input.option,
          value: String(input.value),
          bound: input.bound,
          limit: String(input.limit),
        },
      },
    )
  }
}

export class PatternMismatchError extends BaseError<"pattern_mismatch"> {
  static of(input: {
    section: string
    option: string
    value: string
    patterns: readonly string[]
    item?: number | string
    context?: ErrorContext
  }): PatternMismatchError {
    return new PatternMismatchError(
      `${input.section}.${input.option} value ${JSON.stringify(input.value)} matches none of: ${input.patterns.join(", ")}`,
      {
        code: "pattern_mismatch",
        context: {
          ...input.context,
          section: input.section,
          option: input.option,
          value: input.value,
          patterns: input.patterns,
          ...(input.item !== undefined && { item: input.item }),
        },
      },
    )
  }
}

export class SchemaFrozenError extends BaseError<"schema_frozen"> {
  static of(section: string, option: string): SchemaFrozenError {
    return new SchemaFrozenError(
      `Cannot declare ${section}.${option}: the schema is frozen once a manager is initialized`,
      { code: "schema_frozen", context: { section, option }, isOperational: false },
    )
  }
}

export class EmptySchemaError extends BaseError<"empty_schema"> {
  static create(): EmptySchemaError {
    return new EmptySchemaError("Cannot initialize a configuration without any declared option", {
      code: "empty_schema",
      isOperational: false,
    })
  }
}

export class NotInitializedError extends BaseError<"not_initialized"> {
  static create(operation: string): NotInitializedError {
    return new NotInitializedError(`Cannot call ${operation}() before initialize()`, {
      code: "not_initialized",
      context: { operation },
      isOperational: false,
    })
  }
}

export class AlreadyInitializedError extends BaseError<"already_initialized"> {
  static create(state: string, path?: string): AlreadyInitializedError {
    return new AlreadyInitializedError(`Configuration is already ${state}`, {
      code: "already_initialized",
      context: { state, ...(path !== undefined && { path }) },
      isOperational: false,
    })
  }
}

export class InvalidOptionsError extends BaseError<"invalid_options"> {
  static of(subject: string, details: string): InvalidOptionsError {
    return new InvalidOptionsError(`Invalid ${subject}:\n${details}`, {
      code: "invalid_options",
      context: { subject, details },
      isOperational: false,
    })
  }
}

export class DuplicateRegistrationError extends BaseError<"duplicate_registration"> {
  static of(name: string): DuplicateRegistrationError {
    return new DuplicateRegistrationError(`A configuration named "${name}" is already registered`, {
      code: "duplicate_registration",
      context: { name },
      isOperational: false,
    })
  }
}

export class UnregisteredConfigError extends BaseError<"unregistered_config"> {
  static of(name: string): UnregisteredConfigError {
    return new UnregisteredConfigError(`No configuration named "${name}" is registered`, {
      code: "unregistered_config",
      context: { name },
      isOperational: false,
    })
  }
}
