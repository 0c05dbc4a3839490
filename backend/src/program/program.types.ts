export const WEEKDAYS = [
  'MONDAY',
  'TUESDAY',
  'WEDNESDAY',
  'THURSDAY',
  'FRIDAY',
  'SATURDAY',
  'SUNDAY',
] as const

export type Weekday = (typeof WEEKDAYS)[number]

export type DateKey = string // YYYY-MM-DD, calendar day without time

export type TimeOfDay = {
  hour: number // 0..23
  minute: number // 0..59
}

export type TimeRange = {
  start: TimeOfDay
  end: TimeOfDay // may be earlier than start: window crosses midnight
}

export type CalendarEvent = {
  title: string
  description: string
  location: string
  time: TimeRange
  reminder: boolean
}

export type DayOverride = 'on' | 'off' | null

export type ProgramSummary = {
  start: DateKey
  end: DateKey
  selectedDays: number
  totalMinutes: number
  weeksInRange: number
  weeksWithTraining: number
  minutesByMonth: Record<string, number> // 'YYYY-MM' -> minutes, chronological
  minutesByWeek: Record<number, number> // program week (1-based) -> minutes
}

export function isWeekday(raw: unknown): raw is Weekday {
  return WEEKDAYS.some((w) => w === raw)
}
