const COMMA_MILLIS = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2}),(\d{1,6})$/
const SECONDS = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/

/**
 * Log times carry no zone, so they are kept as naive wall-clock values on the
 * UTC axis. Fields the calendar does not have (month 13, Feb 30, hour 24...)
 * are rejected; Date.UTC silently rolls those over.
 */
function naiveDate(parts: string[], millis: number): Date | null {
  const [year, month, day, hour, minute, second] = parts.map(p => parseInt(p, 10))
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millis))

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    return null
  }
  return date
}

/**
 * Parses a log line timestamp.
 *
 * Accepts `YYYY-MM-DD HH:MM:SS,mmm` (the fraction is read as a decimal
 * fraction of a second, truncated to milliseconds), then the first 19
 * characters as `YYYY-MM-DD HH:MM:SS`. Anything else yields `now()`: callers
 * get a usable but unreliable value instead of an error.
 */
export function parseLogTimestamp(text: string, now: () => Date = () => new Date()): Date {
  const withMillis = COMMA_MILLIS.exec(text)
  if (withMillis) {
    const fraction = withMillis[7].padEnd(6, '0')
    const parsed = naiveDate(withMillis.slice(1, 7), Math.floor(parseInt(fraction, 10) / 1000))
    if (parsed) return parsed
  }

  const seconds = SECONDS.exec(text.slice(0, 19))
  if (seconds) {
    const parsed = naiveDate(seconds.slice(1, 7), 0)
    if (parsed) return parsed
  }

  return now()
}

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0')
}

/** `YYYY-MM-DD HH:MM:SS` wall-clock */
export function formatTimestamp(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ${formatTime(date)}`
}

/** `HH:MM:SS` wall-clock */
export function formatTime(date: Date): string {
  return `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
}

/** `YYYYMMDD_HHMMSS` wall-clock */
export function formatCompactTimestamp(date: Date): string {
  return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
}
