import type { LockKey } from "./lock"

export interface LockLease {
  /** The key this lease holds. */
  readonly key: LockKey

  /** `false` once `release()` has been called. */
  readonly held: boolean

  /**
   * Release the lock, handing it to the next waiter if any.
   * Idempotent: safe to call multiple times.
   */
  release(): Promise<void>
}
