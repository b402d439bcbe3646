import type { Lock, LockKey } from "../ports/lock"

/**
 * Run `fn` while holding `key`, waiting for the lock if needed.
 * The lease is released whether `fn` resolves or throws.
 */
export async function withLock<T>(lock: Lock, key: LockKey, fn: () => Promise<T>): Promise<T> {
  const lease = await lock.acquire(key)

  try {
    return await fn()
  } finally {
    await lease.release()
  }
}
