export { Blueprint, type BlueprintDefinition, defineBlueprint } from "./core/blueprint"
export { decodeValue, positionOf } from "./core/codec/decoder"
export {
  type EncodeOptions,
  type EncodeStyle,
  encodeValue,
  formatDecimal,
  quoteText,
} from "./core/codec/encoder"
export { ValueCodec, valueCodec } from "./core/codec/value-codec"
export { ConfigDocument, type FromTextOptions } from "./core/document"
export {
  AlreadyInitializedError,
  DecodeError,
  DuplicateOptionError,
  DuplicateRegistrationError,
  EmptySchemaError,
  EncodeError,
  type EntryLocation,
  InvalidBlueprintError,
  InvalidOptionsError,
  InvalidValueError,
  NotInitializedError,
  OutOfRangeError,
  PatternMismatchError,
  SchemaFrozenError,
  type TextPosition,
  TypeMismatchError,
  UnknownOptionError,
  UnregisteredConfigError,
} from "./core/errors"
export { commentLines, describeBlueprint, formatHeader, type HeaderInfo } from "./core/format/comments"
export { DEFAULT_DESCRIPTION } from "./core/format/default-description"
export { type DocumentationOptions, formatDocumentation } from "./core/format/format-documentation"
export { type DocumentationLabels, defaultDocumentationLabels, typeLabel } from "./core/format/labels"
export { ConfigManager, type ConfigManagerDeps } from "./core/manager"
export type { ConfigManagerOptions, InitializeOptions } from "./core/manager-options"
export { ConfigRegistry } from "./core/registry"
export { Schema } from "./core/schema"
export { type ParsedEntry, parseConfigText } from "./core/text/config-parser"
export { type RenderOptions, renderConfigText } from "./core/text/config-renderer"
export {
  boolean,
  decimal,
  dict,
  fromPlain,
  integer,
  INTEGER_MAX,
  INTEGER_MIN,
  isValue,
  kindOf,
  list,
  nullValue,
  text,
  toPlain,
  valuesEqual,
} from "./core/value"
export { KEEL_NAME, KEEL_VERSION } from "./core/version"
export type { ConfigManagerState, IConfigManager } from "./ports/config-manager"
export type {
  DocumentEntry,
  OptionKey,
  Provenance,
  UnknownEntry,
  UnknownEntryPolicy,
} from "./ports/document"
export {
  type BooleanValue,
  type DecimalValue,
  type DictValue,
  type IntegerValue,
  type ListValue,
  type NullValue,
  type PlainValue,
  scalarKinds,
  type TextValue,
  type Value,
  type ValueKind,
  type ValueOfKind,
  valueKinds,
} from "./ports/value"
