import * as path from "node:path"
import { createMemoryLock, type Lock, withLock } from "@keel/lock"
import { createNullLogger, type Logger } from "@keel/logger"
import { FileSystemTextStore, IOError, type TextFileStore } from "@keel/storage"
import type { ConfigManagerState, IConfigManager } from "../ports/config-manager"
import type { DocumentEntry, OptionKey, Provenance, UnknownEntry } from "../ports/document"
import type { Value } from "../ports/value"
import { ConfigDocument } from "./document"
import { AlreadyInitializedError, EmptySchemaError, NotInitializedError } from "./errors"
import {
  type ConfigManagerOptions,
  configManagerOptionsSchema,
  type InitializeOptions,
  initializeOptionsSchema,
  parseOptions,
  type ResolvedConfigManagerOptions,
} from "./manager-options"
import type { Schema } from "./schema"

export type ConfigManagerDeps = {
  schema: Schema
  /** @default FileSystemTextStore */
  store?: TextFileStore
  /** Serializes load and write-through. @default a private MemoryLock */
  lock?: Lock
  logger?: Logger
}

type Loaded = {
  document: ConfigDocument
  path: string
  profile: string
  directory: string
  encoding: string
  log: Logger
}

type WriteTarget = Pick<Loaded, "path" | "encoding" | "log">

/**
 * Façade over one configuration file: loads or generates it on
 * `initialize`, then keeps the file in step with every `setValue`.
 */
export class ConfigManager implements IConfigManager {
  private readonly schema: Schema
  private readonly store: TextFileStore
  private readonly lock: Lock
  private readonly logger: Logger
  private readonly options: ResolvedConfigManagerOptions

  private currentState: ConfigManagerState = "uninitialized"
  private currentDescription: string
  private loaded: Loaded | undefined

  /** @throws InvalidOptionsError */
  constructor(deps: ConfigManagerDeps, options: ConfigManagerOptions = {}) {
    this.options = parseOptions(configManagerOptionsSchema, options, "config manager options")
    this.schema = deps.schema
    this.store = deps.store ?? new FileSystemTextStore()
    this.lock = deps.lock ?? createMemoryLock()
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "config-manager" })
    this.currentDescription = this.options.description
  }

  get state(): ConfigManagerState {
    return this.currentState
  }

  get path(): string {
    return this.requireLoaded("path").path
  }

  get profile(): string {
    return this.requireLoaded("profile").profile
  }

  get directory(): string {
    return this.requireLoaded("directory").directory
  }

  get encoding(): string {
    return this.requireLoaded("encoding").encoding
  }

  /** Free text written under the header. */
  get description(): string {
    return this.currentDescription
  }

  /** Takes effect on the next write. */
  setDescription(text: string): void {
    this.currentDescription = text
  }

  /**
   * Load `<directory>/<profile>.<extension>`, or generate it from defaults
   * when it does not exist. A failed attempt leaves the manager
   * uninitialized so it can be retried.
   *
   * @throws AlreadyInitializedError, InvalidOptionsError, EmptySchemaError,
   * IOError, and the decoding and validation errors of the file contents.
   */
  async initialize(input: InitializeOptions): Promise<void> {
    if (this.currentState !== "uninitialized") {
      throw AlreadyInitializedError.create(this.currentState, this.loaded?.path)
    }

    const { profile, directory, encoding } = parseOptions(
      initializeOptionsSchema,
      input,
      "initialize options",
    )
    if (this.schema.size === 0) throw EmptySchemaError.create()

    const resolvedDirectory = path.resolve(directory)
    const filePath = path.join(resolvedDirectory, `${profile}.${this.options.extension}`)
    const target: WriteTarget = {
      path: filePath,
      encoding,
      log: this.logger.child({ profile, path: filePath }),
    }

    this.currentState = "initializing"

    try {
      const document = await withLock(this.lock, lockKey(filePath), () => this.loadOrGenerate(target))

      this.schema.freeze()
      this.loaded = { ...target, document, profile, directory: resolvedDirectory }
      this.currentState = "initialized"
    } catch (err) {
      this.currentState = "uninitialized"
      throw err
    }
  }

  /** @throws NotInitializedError, UnknownOptionError */
  getValue(section: string, option: string): Value {
    return this.requireLoaded("getValue").document.get(section, option)
  }

  /**
   * @throws NotInitializedError, UnknownOptionError, InvalidValueError,
   * TypeMismatchError, OutOfRangeError, PatternMismatchError (document
   * unchanged), or IOError (document already changed).
   */
  async setValue(section: string, option: string, value: Value): Promise<void> {
    const loaded = this.requireLoaded("setValue")

    await withLock(this.lock, lockKey(loaded.path), async () => {
      loaded.document.set(section, option, value)

      const started = performance.now()
      await this.writeDocument(loaded, loaded.document, { section, option })

      loaded.log.debug("Persisted configuration change", {
        section,
        option,
        durationMs: Math.round(performance.now() - started),
      })
    })
  }

  has(section: string, option: string): boolean {
    return this.requireLoaded("has").document.has(section, option)
  }

  explain(section: string, option: string): Provenance {
    return this.requireLoaded("explain").document.explain(section, option)
  }

  entries(): DocumentEntry[] {
    return this.requireLoaded("entries").document.entries()
  }

  healed(): OptionKey[] {
    return this.requireLoaded("healed").document.healed()
  }

  unknownEntries(): UnknownEntry[] {
    return this.requireLoaded("unknownEntries").document.unknownEntries()
  }

  /** The file content as it would be written now. */
  toText(): string {
    return this.render(this.requireLoaded("toText").document)
  }

  private async loadOrGenerate(target: WriteTarget): Promise<ConfigDocument> {
    if (!(await this.store.exists(target.path))) {
      const document = ConfigDocument.fromDefaults(this.schema)
      await this.writeDocument(target, document, { operation: "generate" })

      target.log.info("Generated configuration file from defaults", { options: this.schema.size })
      return document
    }

    const raw = await this.store.read(target.path, target.encoding)
    const document = ConfigDocument.fromText(this.schema, raw, {
      unknownEntries: this.options.unknownEntries,
      logger: target.log,
    })

    const healed = document.healed()
    if (healed.length > 0) {
      target.log.warn("Filled options missing from the file with defaults", {
        healed: healed.map(({ section, option }) => `${section}.${option}`),
      })
    }

    if (this.options.normalizeOnLoad && this.render(document) !== raw) {
      await this.writeDocument(target, document, { operation: "normalize" })
    }

    target.log.info("Loaded configuration file", { options: this.schema.size })
    return document
  }

  private async writeDocument(
    target: WriteTarget,
    document: ConfigDocument,
    meta: Record<string, unknown>,
  ): Promise<void> {
    const content = this.render(document)

    try {
      await this.store.write(target.path, content, target.encoding)
    } catch (err) {
      target.log.error("Failed to persist configuration", { ...meta, err })
      throw err instanceof IOError ? err : IOError.writeFailed(target.path, err)
    }
  }

  private render(document: ConfigDocument): string {
    return document.toText({ header: this.options.header, description: this.currentDescription })
  }

  private requireLoaded(operation: string): Loaded {
    if (this.currentState !== "initialized" || !this.loaded) {
      throw NotInitializedError.create(operation)
    }

    return this.loaded
  }
}

function lockKey(filePath: string): string {
  return `config:${filePath}`
}
