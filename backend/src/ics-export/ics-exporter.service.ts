import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common'
import { randomUUID } from 'crypto'
import { CLOCK, type Clock } from '../clock/clock'
import { APP_CONFIG, type AppConfig } from '../config/app-config'
import { addDays, compactDateKey, eachDay, weekdayOf } from '../program/date-key'
import type { ProgramState } from '../program/program-state'
import type { DateKey, TimeOfDay, TimeRange, Weekday } from '../program/program.types'
import { crossesMidnight } from '../program/time-range'

export const PROD_ID = '-//Training Calendar//1.0//EN'

const SHORT_DAY_NAMES: Record<Weekday, string> = {
  MONDAY: 'Mon',
  TUESDAY: 'Tue',
  WEDNESDAY: 'Wed',
  THURSDAY: 'Thu',
  FRIDAY: 'Fri',
  SATURDAY: 'Sat',
  SUNDAY: 'Sun',
}

const pad2 = (n: number): string => String(n).padStart(2, '0')

/**
 * Escapes TEXT values: backslash, semicolon and comma get a backslash,
 * line breaks become a literal \n.
 */
export function escapeText(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r\n|\r|\n/g, '\\n')
}

const FOLD_OCTETS = 75

/**
 * Folds lines longer than 75 octets of UTF-8; continuation lines start with a
 * space. Breaks fall between code points, never inside one.
 */
export function foldLine(line: string): string {
  if (Buffer.byteLength(line, 'utf8') <= FOLD_OCTETS) return line

  const parts: string[] = []
  let current = ''
  let octets = 0
  for (const ch of line) {
    const size = Buffer.byteLength(ch, 'utf8')
    if (octets + size > FOLD_OCTETS) {
      parts.push(current)
      current = ' '
      octets = 1
    }
    current += ch
    octets += size
  }
  parts.push(current)
  return parts.join('\r\n')
}

/** Floating local date-time, `YYYYMMDDTHHMMSS`. */
export function formatLocalDateTime(d: DateKey, t: TimeOfDay): string {
  return `${compactDateKey(d)}T${pad2(t.hour)}${pad2(t.minute)}00`
}

/** UTC timestamp, `YYYYMMDDTHHMMSSZ`. */
export function formatUtcStamp(now: Date): string {
  return (
    `${now.getUTCFullYear()}${pad2(now.getUTCMonth() + 1)}${pad2(now.getUTCDate())}` +
    `T${pad2(now.getUTCHours())}${pad2(now.getUTCMinutes())}${pad2(now.getUTCSeconds())}Z`
  )
}

@Injectable()
export class IcsExporterService {
  private readonly logger = new Logger(IcsExporterService.name)

  constructor(
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  /**
   * One VEVENT per selected day that has a schedule for its weekday, then one
   * per custom event. Custom events do not depend on range or selection.
   */
  export(state: ProgramState): string {
    const start = state.minDate()
    const end = state.maxDate()
    if (start === null || end === null) {
      throw new BadRequestException('No range defined: cannot export calendar')
    }

    const tzid = this.config.calendarTzid
    const dtstamp = formatUtcStamp(this.clock.now())
    const lines: string[] = [
      'BEGIN:VCALENDAR',
      `PRODID:${PROD_ID}`,
      'VERSION:2.0',
      'CALSCALE:GREGORIAN',
      'METHOD:PUBLISH',
    ]

    let sessions = 0
    for (const d of eachDay(start, end)) {
      if (!state.isSelected(d)) continue
      const weekday = weekdayOf(d)
      const range = state.getSchedule(weekday)
      if (!range) continue

      lines.push(
        'BEGIN:VEVENT',
        `UID:${compactDateKey(d)}-${randomUUID()}`,
        foldLine(`SUMMARY:${escapeText(`Training (${SHORT_DAY_NAMES[weekday]})`)}`),
        `DTSTAMP:${dtstamp}`,
        ...this.timeLines(d, range, tzid),
        'END:VEVENT',
      )
      sessions++
    }

    let custom = 0
    for (const d of state.getEventDates()) {
      for (const ev of state.getEvents(d)) {
        lines.push(
          'BEGIN:VEVENT',
          `UID:${compactDateKey(d)}-evt-${randomUUID()}`,
          foldLine(`SUMMARY:${escapeText(ev.title)}`),
        )
        if (ev.description.trim()) {
          lines.push(foldLine(`DESCRIPTION:${escapeText(ev.description)}`))
        }
        if (ev.location.trim()) {
          lines.push(foldLine(`LOCATION:${escapeText(ev.location)}`))
        }
        lines.push(`DTSTAMP:${dtstamp}`, ...this.timeLines(d, ev.time, tzid))

        if (ev.reminder) {
          lines.push(
            'BEGIN:VALARM',
            'TRIGGER:-PT10M',
            'ACTION:DISPLAY',
            foldLine(`DESCRIPTION:${escapeText(ev.title)}`),
            'END:VALARM',
          )
        }

        lines.push('END:VEVENT')
        custom++
      }
    }

    lines.push('END:VCALENDAR')
    this.logger.log(`Exported ${sessions} training sessions and ${custom} events (TZID=${tzid})`)

    return lines.map((line) => `${line}\r\n`).join('')
  }

  private timeLines(d: DateKey, range: TimeRange, tzid: string): string[] {
    const endDay = crossesMidnight(range) ? addDays(d, 1) : d
    return [
      `DTSTART;TZID=${tzid}:${formatLocalDateTime(d, range.start)}`,
      `DTEND;TZID=${tzid}:${formatLocalDateTime(endDay, range.end)}`,
    ]
  }
}
