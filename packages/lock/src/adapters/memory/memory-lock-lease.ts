import type { LockKey } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"

export type MemoryLeaseDeps = {
  onRelease: (lease: MemoryLease) => void
}

export class MemoryLease implements LockLease {
  public readonly key: LockKey
  private readonly deps: MemoryLeaseDeps

  private released = false

  public constructor(key: LockKey, deps: MemoryLeaseDeps) {
    this.key = key
    this.deps = deps
  }

  public get held(): boolean {
    return !this.released
  }

  public async release(): Promise<void> {
    if (this.released) return

    this.released = true
    this.deps.onRelease(this)
  }
}
