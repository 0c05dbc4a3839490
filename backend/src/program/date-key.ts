import type { DateKey, Weekday } from './program.types'

const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/
const MS_PER_DAY = 24 * 60 * 60 * 1000

// Date.getUTCDay() order: 0=Sunday .. 6=Saturday
const WEEKDAY_BY_UTC_DAY: Weekday[] = [
  'SUNDAY',
  'MONDAY',
  'TUESDAY',
  'WEDNESDAY',
  'THURSDAY',
  'FRIDAY',
  'SATURDAY',
]

const toUtcMs = (key: DateKey): number => {
  const [y, m, d] = key.split('-').map(Number)
  return Date.UTC(y ?? 0, (m ?? 1) - 1, d ?? 1)
}

const fromUtcMs = (ms: number): DateKey => {
  const date = new Date(ms)
  const yyyy = String(date.getUTCFullYear()).padStart(4, '0')
  const mm = String(date.getUTCMonth() + 1).padStart(2, '0')
  const dd = String(date.getUTCDate()).padStart(2, '0')
  return `${yyyy}-${mm}-${dd}`
}

/**
 * Parse a `YYYY-MM-DD` token. Returns null unless it names a real calendar day.
 */
export function parseDateKey(raw: unknown): DateKey | null {
  if (typeof raw !== 'string') return null
  const match = DATE_KEY_PATTERN.exec(raw)
  if (!match) return null

  const y = Number(match[1])
  const m = Number(match[2])
  const d = Number(match[3])
  if (m < 1 || m > 12 || d < 1) return null

  // Date.UTC rolls overflowing days into the next month, so compare back
  const ms = Date.UTC(y, m - 1, d)
  return fromUtcMs(ms) === raw ? raw : null
}

export function compareDateKeys(a: DateKey, b: DateKey): number {
  return a < b ? -1 : a > b ? 1 : 0
}

export function addDays(key: DateKey, days: number): DateKey {
  return fromUtcMs(toUtcMs(key) + days * MS_PER_DAY)
}

/** Whole days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: DateKey, to: DateKey): number {
  return Math.round((toUtcMs(to) - toUtcMs(from)) / MS_PER_DAY)
}

export function weekdayOf(key: DateKey): Weekday {
  const day = new Date(toUtcMs(key)).getUTCDay()
  return WEEKDAY_BY_UTC_DAY[day] ?? 'SUNDAY'
}

/** `YYYY-MM` of the day. */
export function yearMonthOf(key: DateKey): string {
  return key.slice(0, 7)
}

/** Inclusive iteration over `[from, to]`; yields nothing when `to < from`. */
export function* eachDay(from: DateKey, to: DateKey): Generator<DateKey> {
  for (let d = from; d <= to; d = addDays(d, 1)) {
    yield d
  }
}

/** `YYYYMMDD`, the basic form used in calendar identifiers. */
export function compactDateKey(key: DateKey): string {
  return key.replace(/-/g, '')
}
