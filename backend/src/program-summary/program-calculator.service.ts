import { Injectable } from '@nestjs/common'
import { daysBetween, eachDay, weekdayOf, yearMonthOf } from '../program/date-key'
import { timeRangeMinutes } from '../program/time-range'
import type { ProgramState } from '../program/program-state'
import type { DateKey, ProgramSummary } from '../program/program.types'

@Injectable()
export class ProgramCalculatorService {
  /**
   * Scheduled minutes for the day's weekday, 0 without a schedule.
   * Does not look at selection.
   */
  minutesForDate(state: ProgramState, d: DateKey): number {
    const range = state.getSchedule(weekdayOf(d))
    return range ? timeRangeMinutes(range) : 0
  }

  /**
   * Program week of `d`, 1-based, counted from `start` (not a calendar week).
   */
  weekOfProgram(start: DateKey, d: DateKey): number {
    return Math.floor(daysBetween(start, d) / 7) + 1
  }

  /**
   * Replays the selection over the whole range. Null without a range.
   */
  calculate(state: ProgramState): ProgramSummary | null {
    const start = state.minDate()
    const end = state.maxDate()
    if (start === null || end === null) return null

    const minutesByMonth: Record<string, number> = {}
    const minutesByWeek: Record<number, number> = {}
    const weeksWithAny = new Set<number>()

    let selectedDays = 0
    let totalMinutes = 0

    for (const d of eachDay(start, end)) {
      if (!state.isSelected(d)) continue

      selectedDays++
      const mins = this.minutesForDate(state, d)
      totalMinutes += mins

      const month = yearMonthOf(d)
      minutesByMonth[month] = (minutesByMonth[month] ?? 0) + mins

      const week = this.weekOfProgram(start, d)
      weeksWithAny.add(week)
      minutesByWeek[week] = (minutesByWeek[week] ?? 0) + mins
    }

    const daysInRange = daysBetween(start, end) + 1
    const weeksInRange = Math.ceil(daysInRange / 7)

    return {
      start,
      end,
      selectedDays,
      totalMinutes,
      weeksInRange,
      weeksWithTraining: weeksWithAny.size,
      minutesByMonth,
      minutesByWeek,
    }
  }
}
