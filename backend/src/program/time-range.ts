import type { TimeOfDay, TimeRange } from './program.types'

export const MINUTES_PER_DAY = 24 * 60

const TIME_PATTERN = /^(\d{2}):(\d{2})(?::(\d{2}))?$/

/**
 * Parse `HH:MM` or `HH:MM:SS`. Seconds are accepted and dropped.
 */
export function parseTimeOfDay(raw: unknown): TimeOfDay | null {
  if (typeof raw !== 'string') return null
  const match = TIME_PATTERN.exec(raw.trim())
  if (!match) return null

  const hour = Number(match[1])
  const minute = Number(match[2])
  const second = match[3] !== undefined ? Number(match[3]) : 0
  if (hour > 23 || minute > 59 || second > 59) return null
  return { hour, minute }
}

export function formatTimeOfDay(t: TimeOfDay): string {
  return `${String(t.hour).padStart(2, '0')}:${String(t.minute).padStart(2, '0')}`
}

export function minuteOfDay(t: TimeOfDay): number {
  return t.hour * 60 + t.minute
}

export function compareTimeOfDay(a: TimeOfDay, b: TimeOfDay): number {
  return minuteOfDay(a) - minuteOfDay(b)
}

export function crossesMidnight(range: TimeRange): boolean {
  return compareTimeOfDay(range.end, range.start) < 0
}

/**
 * Duration in minutes. An end before the start rolls into the next day;
 * equal start and end give 0.
 */
export function timeRangeMinutes(range: TimeRange): number {
  let end = minuteOfDay(range.end)
  if (crossesMidnight(range)) {
    end += MINUTES_PER_DAY
  }
  return Math.max(0, end - minuteOfDay(range.start))
}

export function parseTimeRange(raw: { start?: unknown; end?: unknown }): TimeRange | null {
  const start = parseTimeOfDay(raw.start)
  const end = parseTimeOfDay(raw.end)
  if (!start || !end) return null
  return { start, end }
}

export function formatTimeRange(range: TimeRange): { start: string; end: string } {
  return { start: formatTimeOfDay(range.start), end: formatTimeOfDay(range.end) }
}
