import type { DocumentEntry, OptionKey, Provenance, UnknownEntry } from "./document"
import type { Value } from "./value"

export type ConfigManagerState = "uninitialized" | "initializing" | "initialized"

/**
 * Typed access to one configuration file.
 *
 * @example
 * ```ts
 * const schema = new Schema().add({
 *   section: "net",
 *   option: "port",
 *   kinds: ["integer"],
 *   default: integer(8080),
 * })
 *
 * const config = new ConfigManager({ schema })
 * await config.initialize({ profile: "dev", directory: "./config" })
 *
 * config.getValue("net", "port")                 // { kind: "integer", value: 8080n }
 * await config.setValue("net", "port", integer(9090))
 * config.explain("net", "port")                  // "set"
 * ```
 */
export interface IConfigManager {
  readonly state: ConfigManagerState

  /** Read the current value. Does not wait for writes in progress. */
  getValue(section: string, option: string): Value

  /**
   * Validate, store and immediately persist a new value.
   *
   * The in-memory value is kept even when persisting fails.
   */
  setValue(section: string, option: string, value: Value): Promise<void>

  has(section: string, option: string): boolean

  /** Where the current value came from: the file, the default, or `setValue`. */
  explain(section: string, option: string): Provenance

  entries(): DocumentEntry[]

  /** Options that were missing from the file when it was loaded. */
  healed(): OptionKey[]

  /** Assignments found in the file that the schema does not declare. */
  unknownEntries(): UnknownEntry[]
}
