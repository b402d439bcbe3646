function getCause(v: unknown): unknown {
  if (typeof v !== "object" || v === null || !("cause" in v)) return undefined

  return v.cause
}

/**
 * Walk the `cause` chain starting at `err` (inclusive).
 *
 * Stops at `maxDepth` entries or at the first value already visited.
 */
export function errorChain(err: unknown, maxDepth: number = 50): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()

  let current: unknown = err

  while (current != null && chain.length < maxDepth) {
    if (typeof current === "object") {
      if (seen.has(current)) break
      seen.add(current)
    }

    chain.push(current)

    const next = getCause(current)

    if (next === undefined) break
    current = next
  }

  return chain
}

/**
 * First entry of the cause chain accepted by `predicate`, if any.
 *
 * @example
 * ```ts
 * const errno = findInChain(err, isErrnoException)
 * if (errno?.code === "ENOENT") ...
 * ```
 */
export function findInChain<T>(
  err: unknown,
  predicate: (value: unknown) => value is T,
): T | undefined {
  for (const entry of errorChain(err)) {
    if (predicate(entry)) return entry
  }

  return undefined
}
