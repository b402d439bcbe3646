import type { LockLease } from "./lock-lease"

export type LockKey = string

/**
 * Mutual exclusion over string keys.
 *
 * There is no timeout and no cancellation: `acquire` resolves once every
 * earlier holder of the same key has released it.
 */
export interface Lock {
  /**
   * Acquire the lock for `key`, waiting behind earlier callers if it is held.
   */
  acquire(key: LockKey): Promise<LockLease>

  /** `true` while `key` has a holder. */
  isLocked(key: LockKey): boolean
}
