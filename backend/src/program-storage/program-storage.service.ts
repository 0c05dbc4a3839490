import {
  BadRequestException,
  Injectable,
  InternalServerErrorException,
  Logger,
} from '@nestjs/common'
import { readFile, writeFile } from 'fs/promises'
import { eachDay, parseDateKey, weekdayOf } from '../program/date-key'
import { ProgramState } from '../program/program-state'
import { WEEKDAYS, isWeekday } from '../program/program.types'
import type { CalendarEvent, DateKey, TimeRange } from '../program/program.types'
import { formatTimeRange, parseTimeRange } from '../program/time-range'
import { ProgramCalculatorService } from '../program-summary/program-calculator.service'
import {
  calendarEventDocumentSchema,
  programDocumentInputSchema,
  timeRangeDocumentSchema,
} from './program-document.schema'
import type { CalendarEventDocument, ProgramDocument } from './program-document.types'

const MIDNIGHT_RANGE: TimeRange = { start: { hour: 0, minute: 0 }, end: { hour: 0, minute: 0 } }

const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err))

@Injectable()
export class ProgramStorageService {
  private readonly logger = new Logger(ProgramStorageService.name)

  constructor(private readonly calculator: ProgramCalculatorService) {}

  toDocument(state: ProgramState, opts?: { includeTotals?: boolean }): ProgramDocument {
    const timeByDay: ProgramDocument['timeByDay'] = {}
    for (const day of WEEKDAYS) {
      const range = state.getSchedule(day)
      if (range) timeByDay[day] = formatTimeRange(range)
    }

    const events: Record<string, CalendarEventDocument[]> = {}
    for (const d of state.getEventDates()) {
      events[d] = state.getEvents(d).map((ev) => ({
        title: ev.title,
        description: ev.description,
        location: ev.location,
        time: formatTimeRange(ev.time),
        reminder: ev.reminder,
      }))
    }

    const doc: ProgramDocument = {
      start: state.getStart(),
      end: state.getEnd(),
      trainingDays: state.getTrainingDays(),
      timeByDay,
      forceOn: state.getForceOn(),
      forceOff: state.getForceOff(),
      events,
    }

    if (opts?.includeTotals) {
      const summary = this.calculator.calculate(state)
      if (summary) {
        doc.totals = {
          start: summary.start,
          end: summary.end,
          weeksInRange: summary.weeksInRange,
          weeksWithTraining: summary.weeksWithTraining,
          selectedDays: summary.selectedDays,
          totalMinutes: summary.totalMinutes,
        }
      }
    }

    return doc
  }

  serialize(state: ProgramState, opts?: { includeTotals?: boolean }): string {
    return JSON.stringify(this.toDocument(state, opts), null, 2)
  }

  /**
   * Build a fresh state from a parsed document. A document of the wrong shape
   * is rejected as a whole; unreadable weekday, date or time tokens inside an
   * otherwise valid document are dropped one by one.
   */
  fromDocument(raw: unknown): ProgramState {
    const parsed = programDocumentInputSchema.safeParse(raw)
    if (!parsed.success) {
      throw new BadRequestException(
        `Program document validation failed: ${JSON.stringify(parsed.error.format())}`,
      )
    }
    const doc = parsed.data
    const state = new ProgramState()
    let skipped = 0

    state.setRange(this.parseAnchor('start', doc.start), this.parseAnchor('end', doc.end))

    for (const token of doc.trainingDays ?? []) {
      if (isWeekday(token)) {
        state.enableTrainingDay(token)
      } else {
        skipped++
      }
    }

    for (const [token, rawRange] of Object.entries(doc.timeByDay ?? {})) {
      const range = this.toTimeRange(rawRange)
      if (isWeekday(token) && range) {
        state.setSchedule(token, range)
      } else {
        skipped++
      }
    }

    // forceOn last: a date listed in both sets ends up forced on
    for (const token of doc.forceOff ?? []) {
      const d = parseDateKey(token)
      if (d) state.forceOff(d)
      else skipped++
    }
    for (const token of doc.forceOn ?? []) {
      const d = parseDateKey(token)
      if (d) state.forceOn(d)
      else skipped++
    }

    for (const [token, list] of Object.entries(doc.events ?? {})) {
      const d = parseDateKey(token)
      if (!d) {
        skipped += list.length
        continue
      }
      const kept: CalendarEvent[] = []
      for (const rawEvent of list) {
        const ev = this.toEvent(rawEvent)
        if (ev) kept.push(ev)
        else skipped++
      }
      // stored order is kept as written
      state.setEvents(d, kept)
    }

    if (skipped > 0) {
      this.logger.debug(`Skipped ${skipped} unreadable entries while loading program document`)
    }

    return state
  }

  parse(json: string): ProgramState {
    let raw: unknown
    try {
      raw = JSON.parse(json)
    } catch (err) {
      throw new BadRequestException(`Program document is not valid JSON: ${errorMessage(err)}`)
    }
    return this.fromDocument(raw)
  }

  /**
   * Flat table: one row per selected day, a blank line, then the totals.
   */
  toCsv(state: ProgramState): string {
    const summary = this.calculator.calculate(state)
    if (!summary) {
      throw new BadRequestException('No range defined: cannot export CSV')
    }

    const lines: string[] = ['fecha,dow,minutos']
    for (const d of eachDay(summary.start, summary.end)) {
      if (!state.isSelected(d)) continue
      lines.push(`${d},${weekdayOf(d)},${this.calculator.minutesForDate(state, d)}`)
    }

    lines.push(
      '',
      'resumen,valor',
      `semanas_del_rango,${summary.weeksInRange}`,
      `semanas_con_entrenamiento,${summary.weeksWithTraining}`,
      `dias_seleccionados,${summary.selectedDays}`,
      `minutos_totales,${summary.totalMinutes}`,
    )
    return lines.join('\n') + '\n'
  }

  async saveToFile(path: string, state: ProgramState): Promise<void> {
    const json = this.serialize(state, { includeTotals: true })
    try {
      await writeFile(path, json, 'utf8')
    } catch (err) {
      throw new InternalServerErrorException(`Cannot write program file: ${errorMessage(err)}`)
    }
    this.logger.log(`Program saved to ${path}`)
  }

  async loadFromFile(path: string): Promise<ProgramState> {
    let json: string
    try {
      json = await readFile(path, 'utf8')
    } catch (err) {
      throw new InternalServerErrorException(`Cannot read program file: ${errorMessage(err)}`)
    }
    const state = this.parse(json)
    this.logger.log(`Program loaded from ${path}`)
    return state
  }

  private parseAnchor(field: 'start' | 'end', raw: string | null | undefined): DateKey | null {
    if (raw === null || raw === undefined) return null
    const d = parseDateKey(raw)
    if (!d) {
      throw new BadRequestException(`Invalid ${field} date: ${raw}`)
    }
    return d
  }

  private toTimeRange(raw: unknown): TimeRange | null {
    const parsed = timeRangeDocumentSchema.safeParse(raw)
    return parsed.success ? parseTimeRange(parsed.data) : null
  }

  private toEvent(raw: unknown): CalendarEvent | null {
    const parsed = calendarEventDocumentSchema.safeParse(raw)
    if (!parsed.success) return null
    const ev = parsed.data
    const time = ev.time ? parseTimeRange(ev.time) : MIDNIGHT_RANGE
    if (!time) return null
    return {
      title: ev.title ?? '',
      description: ev.description ?? '',
      location: ev.location ?? '',
      time,
      reminder: ev.reminder ?? false,
    }
  }
}
