import type { Lock, LockKey } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"
import { MemoryLease } from "./memory-lock-lease"

type Waiter = (lease: MemoryLease) => void

type HeldLock = {
  lease: MemoryLease
  waiters: Waiter[]
}

/**
 * In-process lock. Waiters are served strictly in arrival order; a released
 * key is handed directly to the next waiter so no later caller can cut in.
 */
export class MemoryLock implements Lock {
  private readonly locks = new Map<LockKey, HeldLock>()

  public async acquire(key: LockKey): Promise<LockLease> {
    const held = this.locks.get(key)

    if (!held) return this.grant(key)

    return await new Promise<LockLease>((resolve) => {
      held.waiters.push(resolve)
    })
  }

  public isLocked(key: LockKey): boolean {
    return this.locks.has(key)
  }

  private grant(key: LockKey): MemoryLease {
    const lease = this.createLease(key)
    this.locks.set(key, { lease, waiters: [] })

    return lease
  }

  private createLease(key: LockKey): MemoryLease {
    return new MemoryLease(key, { onRelease: (lease) => this.handOff(lease) })
  }

  private handOff(released: MemoryLease): void {
    const held = this.locks.get(released.key)
    if (held?.lease !== released) return

    const next = held.waiters.shift()

    if (!next) {
      this.locks.delete(released.key)
      return
    }

    held.lease = this.createLease(released.key)
    next(held.lease)
  }
}

export function createMemoryLock(): Lock {
  return new MemoryLock()
}
