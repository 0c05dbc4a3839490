import type { Weekday } from '../program/program.types'

export type TimeRangeDocument = {
  start: string // HH:MM
  end: string // HH:MM
}

export type CalendarEventDocument = {
  title: string
  description: string
  location: string
  time: TimeRangeDocument
  reminder: boolean
}

// Informational only: written on save, ignored on load
export type ProgramTotalsDocument = {
  start: string
  end: string
  weeksInRange: number
  weeksWithTraining: number
  selectedDays: number
  totalMinutes: number
}

export type ProgramDocument = {
  start: string | null
  end: string | null
  trainingDays: Weekday[]
  timeByDay: Partial<Record<Weekday, TimeRangeDocument>>
  forceOn: string[]
  forceOff: string[]
  events: Record<string, CalendarEventDocument[]>
  totals?: ProgramTotalsDocument
}
