import type { ProgramDocument, CalendarEventDocument } from '../program-storage/program-document.types'
import type { DateKey, DayOverride, ProgramSummary, Weekday } from './program.types'

export type ProgramView = {
  program: ProgramDocument
  pinnedOutsideDate: DateKey | null // session-only, never persisted
  summary: ProgramSummary | null
}

export type DayView = {
  date: DateKey
  weekday: Weekday
  selected: boolean
  insideRange: boolean
  override: DayOverride
  scheduledMinutes: number
  events: CalendarEventDocument[]
}

export type EventInput = {
  title: string
  description?: string
  location?: string
  start: string
  end: string
  reminder?: boolean
}
