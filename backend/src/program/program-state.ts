import { NotFoundException } from '@nestjs/common'
import { compareDateKeys, weekdayOf } from './date-key'
import { compareTimeOfDay } from './time-range'
import { WEEKDAYS } from './program.types'
import type { CalendarEvent, DateKey, DayOverride, TimeRange, Weekday } from './program.types'

const copyRange = (r: TimeRange): TimeRange => ({ start: { ...r.start }, end: { ...r.end } })

const copyEvent = (ev: CalendarEvent): CalendarEvent => ({ ...ev, time: copyRange(ev.time) })

/**
 * Training program: date range, weekday filter, per-weekday schedules,
 * per-date overrides and events. Single source of truth for `isSelected`.
 *
 * Collections are never handed out; every read returns a copy and every
 * mutation keeps a date out of at least one of the two override sets.
 */
export class ProgramState {
  private start: DateKey | null = null
  private end: DateKey | null = null

  // empty = every day of the range qualifies
  private readonly trainingDays = new Set<Weekday>()
  private readonly timeByDay = new Map<Weekday, TimeRange>()

  private readonly forcedOn = new Set<DateKey>()
  private readonly forcedOff = new Set<DateKey>()

  private readonly events = new Map<DateKey, CalendarEvent[]>()

  // ---- range ----

  getStart(): DateKey | null {
    return this.start
  }

  getEnd(): DateKey | null {
    return this.end
  }

  hasRange(): boolean {
    return this.start !== null && this.end !== null
  }

  minDate(): DateKey | null {
    if (this.start === null || this.end === null) return null
    return compareDateKeys(this.start, this.end) <= 0 ? this.start : this.end
  }

  maxDate(): DateKey | null {
    if (this.start === null || this.end === null) return null
    return compareDateKeys(this.end, this.start) >= 0 ? this.end : this.start
  }

  isInsideRange(d: DateKey): boolean {
    const min = this.minDate()
    const max = this.maxDate()
    if (min === null || max === null) return false
    return compareDateKeys(d, min) >= 0 && compareDateKeys(d, max) <= 0
  }

  /** Stored as given; min/max normalize at read time. */
  setRange(a: DateKey | null, z: DateKey | null): void {
    this.start = a
    this.end = z
  }

  beginRangeAt(d: DateKey): void {
    this.start = d
    this.end = null
  }

  /**
   * Second click of a two-click range pick. The first click (no start yet)
   * only sets the anchor; a click before the anchor swaps the roles.
   */
  closeRangeAt(d: DateKey): void {
    if (this.start === null) {
      this.beginRangeAt(d)
      return
    }
    if (compareDateKeys(d, this.start) < 0) {
      this.end = this.start
      this.start = d
    } else {
      this.end = d
    }
  }

  /** Shift-click: anchor, then close, then re-anchor against `start`. */
  adjustRangeWith(d: DateKey): void {
    if (this.start === null) {
      this.beginRangeAt(d)
      return
    }
    if (this.end === null) {
      this.closeRangeAt(d)
      return
    }
    if (compareDateKeys(d, this.start) < 0) {
      this.end = this.start
      this.start = d
    } else {
      this.end = d
    }
  }

  // ---- selection ----

  /**
   * Priority: forced on, forced off, outside range, empty filter, weekday filter.
   */
  isSelected(d: DateKey): boolean {
    if (this.forcedOn.has(d)) return true
    if (this.forcedOff.has(d)) return false

    if (!this.isInsideRange(d)) return false

    if (this.trainingDays.size === 0) return true
    return this.trainingDays.has(weekdayOf(d))
  }

  overrideOf(d: DateKey): DayOverride {
    if (this.forcedOn.has(d)) return 'on'
    if (this.forcedOff.has(d)) return 'off'
    return null
  }

  /** Ctrl-click: flip the effective selection through an override. */
  toggleException(d: DateKey): void {
    if (this.isSelected(d)) {
      this.forceOff(d)
    } else {
      this.forceOn(d)
    }
  }

  /**
   * Click on a day outside the range. Keeps at most one pinned out-of-range
   * day; `pinned` is the caller's pointer and the updated pointer is returned.
   *
   * The un-pin guard only looks at current forceOn membership, not at how the
   * date got there, so a day forced on from the day menu can still be unpinned
   * by toggling it here.
   */
  toggleOutsideSelection(d: DateKey, pinned: DateKey | null): DateKey | null {
    if (this.isInsideRange(d)) return pinned

    if (pinned !== null && pinned !== d && !this.forcedOn.has(pinned)) {
      this.forcedOn.delete(pinned)
    }

    if (this.forcedOn.has(d)) {
      this.forcedOn.delete(d)
      return pinned === d ? null : pinned
    }

    this.forceOn(d)
    return d
  }

  forceOn(d: DateKey): void {
    this.forcedOff.delete(d)
    this.forcedOn.add(d)
  }

  forceOff(d: DateKey): void {
    this.forcedOn.delete(d)
    this.forcedOff.add(d)
  }

  clearOverride(d: DateKey): void {
    this.forcedOn.delete(d)
    this.forcedOff.delete(d)
  }

  getForceOn(): DateKey[] {
    return [...this.forcedOn].sort(compareDateKeys)
  }

  getForceOff(): DateKey[] {
    return [...this.forcedOff].sort(compareDateKeys)
  }

  // ---- weekday filter and schedules ----

  /** Monday first. */
  getTrainingDays(): Weekday[] {
    return WEEKDAYS.filter((w) => this.trainingDays.has(w))
  }

  enableTrainingDay(day: Weekday): void {
    this.trainingDays.add(day)
  }

  /** Also drops the weekday's schedule. */
  disableTrainingDay(day: Weekday): void {
    this.trainingDays.delete(day)
    this.timeByDay.delete(day)
  }

  getSchedule(day: Weekday): TimeRange | null {
    const range = this.timeByDay.get(day)
    return range ? copyRange(range) : null
  }

  getSchedules(): Partial<Record<Weekday, TimeRange>> {
    const out: Partial<Record<Weekday, TimeRange>> = {}
    for (const w of WEEKDAYS) {
      const range = this.timeByDay.get(w)
      if (range) out[w] = copyRange(range)
    }
    return out
  }

  setSchedule(day: Weekday, range: TimeRange): void {
    this.timeByDay.set(day, copyRange(range))
  }

  clearSchedule(day: Weekday): void {
    this.timeByDay.delete(day)
  }

  // ---- events ----

  getEventDates(): DateKey[] {
    return [...this.events.keys()].sort(compareDateKeys)
  }

  getEvents(d: DateKey): CalendarEvent[] {
    return (this.events.get(d) ?? []).map(copyEvent)
  }

  /** Appends and keeps the day's list ordered by start time. */
  addEvent(d: DateKey, ev: CalendarEvent): void {
    const list = this.events.get(d) ?? []
    list.push(copyEvent(ev))
    list.sort((a, b) => compareTimeOfDay(a.time.start, b.time.start))
    this.events.set(d, list)
  }

  /** Puts a date's list back exactly as given, without re-sorting; empty clears it. */
  setEvents(d: DateKey, list: CalendarEvent[]): void {
    if (list.length === 0) {
      this.events.delete(d)
      return
    }
    this.events.set(d, list.map(copyEvent))
  }

  replaceEvent(d: DateKey, index: number, ev: CalendarEvent): void {
    const list = this.requireEventList(d, index)
    list.splice(index, 1)
    this.addEvent(d, ev)
  }

  removeEvent(d: DateKey, index: number): void {
    const list = this.requireEventList(d, index)
    list.splice(index, 1)
    if (list.length === 0) {
      this.events.delete(d)
    }
  }

  clearEvents(d: DateKey): void {
    this.events.delete(d)
  }

  private requireEventList(d: DateKey, index: number): CalendarEvent[] {
    const list = this.events.get(d)
    if (!list || !Number.isInteger(index) || index < 0 || index >= list.length) {
      throw new NotFoundException(`No event #${index} on ${d}`)
    }
    return list
  }

  // ---- whole-state ----

  /** Value-independent copy of every field of `other`. */
  copyFrom(other: ProgramState): void {
    this.start = other.start
    this.end = other.end

    this.trainingDays.clear()
    for (const w of other.trainingDays) this.trainingDays.add(w)

    this.timeByDay.clear()
    for (const [w, range] of other.timeByDay) this.timeByDay.set(w, copyRange(range))

    this.forcedOn.clear()
    for (const d of other.forcedOn) this.forcedOn.add(d)

    this.forcedOff.clear()
    for (const d of other.forcedOff) this.forcedOff.add(d)

    this.events.clear()
    for (const [d, list] of other.events) this.events.set(d, list.map(copyEvent))
  }

  clone(): ProgramState {
    const copy = new ProgramState()
    copy.copyFrom(this)
    return copy
  }
}
