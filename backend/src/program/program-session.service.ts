import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common'
import { APP_CONFIG, type AppConfig } from '../config/app-config'
import { IcsExporterService } from '../ics-export/ics-exporter.service'
import { ProgramCalculatorService } from '../program-summary/program-calculator.service'
import { ProgramStorageService } from '../program-storage/program-storage.service'
import { parseDateKey, weekdayOf } from './date-key'
import { ProgramState } from './program-state'
import type { CalendarEvent, DateKey, ProgramSummary, TimeRange, Weekday } from './program.types'
import { formatTimeRange, parseTimeRange } from './time-range'
import type { DayView, EventInput, ProgramView } from './program-session.types'

/**
 * The one editing session: owns the program and the pinned outside-range
 * day, applies each operation and hands back a fresh view.
 */
@Injectable()
export class ProgramSessionService {
  private readonly logger = new Logger(ProgramSessionService.name)

  private readonly state = new ProgramState()
  private pinnedOutsideDate: DateKey | null = null

  constructor(
    private readonly calculator: ProgramCalculatorService,
    private readonly storage: ProgramStorageService,
    private readonly icsExporter: IcsExporterService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  view(): ProgramView {
    return {
      program: this.storage.toDocument(this.state),
      pinnedOutsideDate: this.pinnedOutsideDate,
      summary: this.calculator.calculate(this.state),
    }
  }

  dayView(d: DateKey): DayView {
    const events = this.state.getEvents(d).map((ev) => ({ ...ev, time: formatTimeRange(ev.time) }))
    return {
      date: d,
      weekday: weekdayOf(d),
      selected: this.state.isSelected(d),
      insideRange: this.state.isInsideRange(d),
      override: this.state.overrideOf(d),
      scheduledMinutes: this.calculator.minutesForDate(this.state, d),
      events,
    }
  }

  summary(): ProgramSummary | null {
    return this.calculator.calculate(this.state)
  }

  // ---- range ----

  setRange(start: string | null, end: string | null): ProgramView {
    this.state.setRange(this.optionalDate('start', start), this.optionalDate('end', end))
    return this.view()
  }

  beginRangeAt(d: DateKey): ProgramView {
    this.state.beginRangeAt(d)
    return this.view()
  }

  closeRangeAt(d: DateKey): ProgramView {
    this.state.closeRangeAt(d)
    return this.view()
  }

  adjustRangeWith(d: DateKey): ProgramView {
    this.state.adjustRangeWith(d)
    return this.view()
  }

  // ---- weekdays ----

  enableTrainingDay(day: Weekday, schedule?: { start?: string; end?: string }): ProgramView {
    const range =
      schedule?.start !== undefined || schedule?.end !== undefined
        ? this.requireTimeRange(schedule)
        : null
    this.state.enableTrainingDay(day)
    if (range) this.state.setSchedule(day, range)
    return this.view()
  }

  disableTrainingDay(day: Weekday): ProgramView {
    this.state.disableTrainingDay(day)
    return this.view()
  }

  setSchedule(day: Weekday, schedule: { start: string; end: string }): ProgramView {
    this.state.setSchedule(day, this.requireTimeRange(schedule))
    return this.view()
  }

  clearSchedule(day: Weekday): ProgramView {
    this.state.clearSchedule(day)
    return this.view()
  }

  // ---- per-date overrides ----

  toggleException(d: DateKey): DayView {
    this.state.toggleException(d)
    return this.dayView(d)
  }

  toggleOutsideSelection(d: DateKey): DayView {
    this.pinnedOutsideDate = this.state.toggleOutsideSelection(d, this.pinnedOutsideDate)
    return this.dayView(d)
  }

  forceOn(d: DateKey): DayView {
    this.state.forceOn(d)
    return this.dayView(d)
  }

  forceOff(d: DateKey): DayView {
    this.state.forceOff(d)
    return this.dayView(d)
  }

  clearOverride(d: DateKey): DayView {
    this.state.clearOverride(d)
    return this.dayView(d)
  }

  // ---- events ----

  addEvent(d: DateKey, input: EventInput): DayView {
    this.state.addEvent(d, this.toEvent(input))
    return this.dayView(d)
  }

  replaceEvent(d: DateKey, index: number, input: EventInput): DayView {
    this.state.replaceEvent(d, index, this.toEvent(input))
    return this.dayView(d)
  }

  removeEvent(d: DateKey, index: number): DayView {
    this.state.removeEvent(d, index)
    return this.dayView(d)
  }

  clearEvents(d: DateKey): DayView {
    this.state.clearEvents(d)
    return this.dayView(d)
  }

  // ---- documents and exports ----

  exportJson(): string {
    return this.storage.serialize(this.state, { includeTotals: true })
  }

  exportCsv(): string {
    return this.storage.toCsv(this.state)
  }

  exportIcs(): string {
    return this.icsExporter.export(this.state)
  }

  /** Replaces the whole program; the current one is kept if the document is rejected. */
  importDocument(raw: unknown): ProgramView {
    this.replaceWith(this.storage.fromDocument(raw))
    return this.view()
  }

  async save(): Promise<{ path: string }> {
    await this.storage.saveToFile(this.config.programFile, this.state)
    return { path: this.config.programFile }
  }

  async load(): Promise<ProgramView> {
    const loaded = await this.storage.loadFromFile(this.config.programFile)
    this.replaceWith(loaded)
    return this.view()
  }

  private replaceWith(loaded: ProgramState): void {
    this.state.copyFrom(loaded)
    this.pinnedOutsideDate = null
    this.logger.log(`Program replaced (range ${loaded.getStart() ?? '-'}..${loaded.getEnd() ?? '-'})`)
  }

  private optionalDate(field: string, raw: string | null): DateKey | null {
    if (raw === null) return null
    const d = parseDateKey(raw)
    if (!d) throw new BadRequestException(`Invalid ${field} date: ${raw}`)
    return d
  }

  private requireTimeRange(raw: { start?: string; end?: string }): TimeRange {
    const range = parseTimeRange(raw)
    if (!range) throw new BadRequestException('A schedule needs valid start and end times (HH:MM)')
    return range
  }

  private toEvent(input: EventInput): CalendarEvent {
    const title = input.title.trim()
    if (!title) throw new BadRequestException('Event title is required')
    return {
      title,
      description: (input.description ?? '').trim(),
      location: (input.location ?? '').trim(),
      time: this.requireTimeRange(input),
      reminder: input.reminder ?? false,
    }
  }
}
