export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> | T[P] : T[P]
}

/**
 * Layers `overrides` over `base` without mutating either.
 *
 * Object literals merge key by key. Class instances, arrays and functions are
 * replaced whole, so a test can swap the Telegram platform or the clock
 * without its prototype being flattened. `undefined` never overrides.
 */
export function applyOverrides<T extends object>(base: T, overrides?: DeepPartial<T>): T {
  if (!overrides) return base

  return merge(base, overrides)
}

function merge<T extends object>(base: T, overrides: DeepPartial<T>): T {
  const result: Record<string, unknown> = Object.fromEntries(Object.entries(base))

  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue

    const current = result[key]
    result[key] = isPlainObject(current) && isPlainObject(value) ? merge(current, value) : value
  }

  return result as T
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false

  const proto = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}
