function getCause(v: unknown): unknown {
  return typeof v === "object" && v !== null && "cause" in v ? v.cause : undefined
}

/**
 * Walk the `cause` chain of a thrown value, outermost first.
 * Stops at `maxDepth` entries or when a value repeats.
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
 * First entry of the cause chain matching `guard`.
 *
 * @example
 * ```ts
 * const edit = findInChain(err, (e) => e instanceof MessageEditError)
 * ```
 */
export function findInChain<T>(err: unknown, guard: (value: unknown) => value is T): T | undefined {
  for (const entry of errorChain(err)) {
    if (guard(entry)) return entry
  }

  return undefined
}
