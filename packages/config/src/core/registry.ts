import { DuplicateRegistrationError, UnregisteredConfigError } from "./errors"
import type { ConfigManager } from "./manager"

/**
 * Name → ConfigManager map, created and owned by the application entry point
 * and passed to whatever needs a shared configuration.
 */
export class ConfigRegistry {
  private readonly managers = new Map<string, ConfigManager>()

  /** @throws DuplicateRegistrationError */
  register(name: string, manager: ConfigManager): ConfigManager {
    if (this.managers.has(name)) throw DuplicateRegistrationError.of(name)

    this.managers.set(name, manager)
    return manager
  }

  /** @throws UnregisteredConfigError */
  get(name: string): ConfigManager {
    const manager = this.managers.get(name)
    if (!manager) throw UnregisteredConfigError.of(name)

    return manager
  }

  has(name: string): boolean {
    return this.managers.has(name)
  }

  /** Return the manager registered as `name`, registering `create()` first if there is none. */
  getOrCreate(name: string, create: () => ConfigManager): ConfigManager {
    return this.managers.get(name) ?? this.register(name, create())
  }

  names(): string[] {
    return [...this.managers.keys()]
  }
}
