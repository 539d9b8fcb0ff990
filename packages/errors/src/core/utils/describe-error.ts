/**
 * One-line `Name: message` rendering of a thrown value, as shown to chat users.
 * The result is cut to `maxLength` characters.
 */
export function describeError(err: unknown, maxLength: number = Number.POSITIVE_INFINITY): string {
  const text =
    err instanceof Error
      ? err.message
        ? `${err.name}: ${err.message}`
        : err.name
      : `NonErrorThrown: ${String(err)}`

  return text.slice(0, maxLength)
}
