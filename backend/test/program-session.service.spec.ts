import { BadRequestException, NotFoundException } from '@nestjs/common'
import { Test } from '@nestjs/testing'
import { mkdtemp, rm } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { CLOCK } from '../src/clock/clock'
import { ClockModule } from '../src/clock/clock.module'
import { APP_CONFIG } from '../src/config/app-config'
import type { AppConfig } from '../src/config/app-config'
import { AppConfigModule } from '../src/config/app-config.module'
import { ProgramModule } from '../src/program/program.module'
import { ProgramSessionService } from '../src/program/program-session.service'

describe('ProgramSessionService', () => {
  let dir: string
  let session: ProgramSessionService

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'training-session-'))
    const config: AppConfig = {
      port: 3000,
      corsOrigin: 'http://localhost:5173',
      calendarTzid: 'UTC',
      programFile: join(dir, 'program.json'),
    }

    const mod = await Test.createTestingModule({
      imports: [AppConfigModule, ClockModule, ProgramModule],
    })
      .overrideProvider(APP_CONFIG)
      .useValue(config)
      .overrideProvider(CLOCK)
      .useValue({ now: () => new Date('2025-03-10T08:15:30.000Z') })
      .compile()

    session = mod.get(ProgramSessionService)
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  // 2024-01-01 is a Monday
  const planTwoWeeks = () => {
    session.setRange('2024-01-01', '2024-01-14')
    session.enableTrainingDay('MONDAY', { start: '18:00', end: '19:00' })
    return session.enableTrainingDay('WEDNESDAY', { start: '18:00', end: '19:30' })
  }

  it('starts empty', () => {
    expect(session.view()).toEqual({
      program: {
        start: null,
        end: null,
        trainingDays: [],
        timeByDay: {},
        forceOn: [],
        forceOff: [],
        events: {},
      },
      pinnedOutsideDate: null,
      summary: null,
    })
  })

  it('summarizes a Monday/Wednesday plan', () => {
    const view = planTwoWeeks()

    expect(view.program.trainingDays).toEqual(['MONDAY', 'WEDNESDAY'])
    expect(view.summary).toMatchObject({
      selectedDays: 4,
      totalMinutes: 300,
      weeksInRange: 2,
      weeksWithTraining: 2,
    })
  })

  it('rejects an unreadable range anchor', () => {
    expect(() => session.setRange('2024-02-30', null)).toThrow(BadRequestException)
  })

  it('rejects a half-specified schedule and leaves the weekday off', () => {
    session.setRange('2024-01-01', '2024-01-14')
    expect(() => session.enableTrainingDay('MONDAY', { start: '18:00' })).toThrow(
      BadRequestException,
    )
    expect(session.view().program.trainingDays).toEqual([])
  })

  it('drops the schedule when a weekday is disabled', () => {
    planTwoWeeks()
    const view = session.disableTrainingDay('MONDAY')

    expect(view.program.timeByDay).toEqual({ WEDNESDAY: { start: '18:00', end: '19:30' } })
    expect(view.summary).toMatchObject({ selectedDays: 2, totalMinutes: 180 })
  })

  describe('day overrides', () => {
    it('flips a day with toggleException', () => {
      planTwoWeeks()

      expect(session.toggleException('2024-01-01')).toMatchObject({
        selected: false,
        override: 'off',
      })
      expect(session.toggleException('2024-01-01')).toMatchObject({
        selected: true,
        override: 'on',
      })
      expect(session.clearOverride('2024-01-01')).toMatchObject({
        selected: true,
        override: null,
      })
    })

    it('pins a day outside the range and keeps an earlier forced-on pin', () => {
      planTwoWeeks()

      expect(session.toggleOutsideSelection('2024-02-01')).toMatchObject({
        selected: true,
        insideRange: false,
        override: 'on',
      })
      expect(session.view().pinnedOutsideDate).toBe('2024-02-01')

      session.toggleOutsideSelection('2024-02-05')
      const view = session.view()
      expect(view.pinnedOutsideDate).toBe('2024-02-05')
      expect(view.program.forceOn).toEqual(['2024-02-01', '2024-02-05'])

      expect(session.toggleOutsideSelection('2024-02-05').selected).toBe(false)
      expect(session.view().pinnedOutsideDate).toBeNull()
    })

    it('ignores toggleOutsideSelection inside the range', () => {
      planTwoWeeks()
      const day = session.toggleOutsideSelection('2024-01-02')

      expect(day).toMatchObject({ selected: false, override: null })
      expect(session.view().pinnedOutsideDate).toBeNull()
    })
  })

  describe('events', () => {
    it('trims input and reports the day', () => {
      planTwoWeeks()
      const day = session.addEvent('2024-01-06', {
        title: ' Long run ',
        description: ' easy ',
        start: '07:00',
        end: '09:00',
      })

      expect(day).toEqual({
        date: '2024-01-06',
        weekday: 'SATURDAY',
        selected: false,
        insideRange: true,
        override: null,
        scheduledMinutes: 0,
        events: [
          {
            title: 'Long run',
            description: 'easy',
            location: '',
            time: { start: '07:00', end: '09:00' },
            reminder: false,
          },
        ],
      })
    })

    it('keeps events ordered by start when replacing', () => {
      session.addEvent('2024-01-06', { title: 'A', start: '07:00', end: '08:00' })
      session.addEvent('2024-01-06', { title: 'B', start: '10:00', end: '11:00' })
      const day = session.replaceEvent('2024-01-06', 0, { title: 'A2', start: '12:00', end: '13:00' })

      expect(day.events.map((ev) => ev.title)).toEqual(['B', 'A2'])
    })

    it('rejects a blank title', () => {
      expect(() =>
        session.addEvent('2024-01-06', { title: '   ', start: '07:00', end: '08:00' }),
      ).toThrow(BadRequestException)
    })

    it('reports a missing event', () => {
      expect(() => session.removeEvent('2024-01-06', 0)).toThrow(NotFoundException)
    })

    it('removes and clears events', () => {
      session.addEvent('2024-01-06', { title: 'A', start: '07:00', end: '08:00' })
      session.addEvent('2024-01-06', { title: 'B', start: '10:00', end: '11:00' })

      expect(session.removeEvent('2024-01-06', 0).events.map((ev) => ev.title)).toEqual(['B'])
      expect(session.clearEvents('2024-01-06').events).toEqual([])
      expect(session.view().program.events).toEqual({})
    })
  })

  describe('documents', () => {
    it('exports JSON with totals', () => {
      planTwoWeeks()
      const doc: unknown = JSON.parse(session.exportJson())

      expect(doc).toMatchObject({
        start: '2024-01-01',
        totals: { selectedDays: 4, totalMinutes: 300 },
      })
    })

    it('exports the calendar with the injected clock', () => {
      planTwoWeeks()
      const ics = session.exportIcs()

      expect(ics.split('\r\n')).toContain('DTSTAMP:20250310T081530Z')
      expect(ics.split('\r\n')).toContain('DTSTART;TZID=UTC:20240103T180000')
    })

    it('replaces the program on import and forgets the pin', () => {
      planTwoWeeks()
      session.toggleOutsideSelection('2024-02-01')

      const view = session.importDocument({ start: '2024-03-01', end: '2024-03-31' })

      expect(view.pinnedOutsideDate).toBeNull()
      expect(view.program).toMatchObject({
        start: '2024-03-01',
        end: '2024-03-31',
        trainingDays: [],
        forceOn: [],
      })
    })

    it('keeps the current program when an import is rejected', () => {
      planTwoWeeks()

      expect(() => session.importDocument({ trainingDays: 5 })).toThrow(BadRequestException)
      expect(session.view().program.trainingDays).toEqual(['MONDAY', 'WEDNESDAY'])
    })

    it('saves to and loads from the configured file', async () => {
      planTwoWeeks()
      session.addEvent('2024-01-06', { title: 'Race', start: '09:00', end: '11:00', reminder: true })
      const saved = session.view().program

      await expect(session.save()).resolves.toEqual({ path: join(dir, 'program.json') })

      session.setRange(null, null)
      session.disableTrainingDay('MONDAY')
      session.clearEvents('2024-01-06')

      const loaded = await session.load()
      expect(loaded.program).toEqual(saved)
    })
  })
})
