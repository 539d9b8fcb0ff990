const FALLBACK_ZONE = "UTC"

const formatters = new Map<string, Intl.DateTimeFormat | null>()

function formatterFor(timeZone: string): Intl.DateTimeFormat | null {
  const cached = formatters.get(timeZone)
  if (cached !== undefined) return cached

  let formatter: Intl.DateTimeFormat | null
  try {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    })
  } catch (err) {
    if (!(err instanceof RangeError)) throw err
    formatter = null
  }

  formatters.set(timeZone, formatter)
  return formatter
}

export function isValidTimeZone(timeZone: string): boolean {
  return formatterFor(timeZone) !== null
}

/**
 * Renders `date` as `YYYY-MM-DD HH:mm:ss ±HHMM` in an IANA zone.
 *
 * An unknown `timeZone` falls back to `fallbackTimeZone`, then to UTC.
 */
export function formatInTimeZone(
  date: Date,
  timeZone: string,
  fallbackTimeZone: string = FALLBACK_ZONE,
): string {
  const formatter =
    formatterFor(timeZone) ?? formatterFor(fallbackTimeZone) ?? formatterFor(FALLBACK_ZONE)
  if (!formatter) throw new RangeError("No usable time zone")

  const parts: Record<string, string> = {}
  for (const part of formatter.formatToParts(date)) {
    parts[part.type] = part.value
  }

  const year = Number(parts.year)
  const month = Number(parts.month)
  const day = Number(parts.day)
  const hour = Number(parts.hour)
  const minute = Number(parts.minute)
  const second = Number(parts.second)

  const wholeSeconds = Math.floor(date.getTime() / 1000) * 1000
  const asUtc = Date.UTC(year, month - 1, day, hour, minute, second)
  const offsetMinutes = Math.round((asUtc - wholeSeconds) / 60_000)

  const sign = offsetMinutes >= 0 ? "+" : "-"
  const abs = Math.abs(offsetMinutes)
  const offset = `${sign}${pad(Math.floor(abs / 60))}${pad(abs % 60)}`

  return `${year}-${pad(month)}-${pad(day)} ${pad(hour)}:${pad(minute)}:${pad(second)} ${offset}`
}

function pad(value: number): string {
  return String(value).padStart(2, "0")
}
