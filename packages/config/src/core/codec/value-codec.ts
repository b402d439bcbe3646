import type { Value, ValueKind } from "../../ports/value"
import { decodeValue } from "./decoder"
import { type EncodeOptions, encodeValue } from "./encoder"

/**
 * Converts single values to and from their literal form.
 *
 * @example
 * ```ts
 * const codec = new ValueCodec()
 *
 * codec.encode(list([integer(1), text("a"), boolean(true)])) // '[1, "a", true]'
 * codec.decode("[1, 2]", ["list"])                           // list of two integers
 * codec.decode("True", ["boolean"])                          // throws DecodeError
 * ```
 */
export class ValueCodec {
  constructor(private readonly defaults: EncodeOptions = {}) {}

  encode(value: Value, options?: EncodeOptions): string {
    return encodeValue(value, { ...this.defaults, ...options })
  }

  decode(literal: string, expectedKinds?: Iterable<ValueKind>): Value {
    return decodeValue(literal, expectedKinds)
  }
}

export const valueCodec = new ValueCodec()
