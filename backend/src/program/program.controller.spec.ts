import { BadRequestException } from '@nestjs/common'
import { ProgramController } from './program.controller'
import { ProgramSessionService } from './program-session.service'

describe('ProgramController', () => {
  let controller: ProgramController
  let mockSession: {
    setRange: jest.Mock
    beginRangeAt: jest.Mock
    enableTrainingDay: jest.Mock
    clearSchedule: jest.Mock
    dayView: jest.Mock
    toggleOutsideSelection: jest.Mock
    removeEvent: jest.Mock
    importDocument: jest.Mock
  }

  beforeEach(() => {
    mockSession = {
      setRange: jest.fn().mockReturnValue('view'),
      beginRangeAt: jest.fn().mockReturnValue('view'),
      enableTrainingDay: jest.fn().mockReturnValue('view'),
      clearSchedule: jest.fn().mockReturnValue('view'),
      dayView: jest.fn().mockReturnValue('day'),
      toggleOutsideSelection: jest.fn().mockReturnValue('day'),
      removeEvent: jest.fn().mockReturnValue('day'),
      importDocument: jest.fn().mockReturnValue('view'),
    }

    controller = new ProgramController(mockSession as unknown as ProgramSessionService)
  })

  it('passes missing range anchors as null', () => {
    expect(controller.setRange({ start: '2024-01-01' })).toBe('view')
    expect(mockSession.setRange).toHaveBeenCalledWith('2024-01-01', null)
  })

  it('clears the range', () => {
    controller.clearRange()
    expect(mockSession.setRange).toHaveBeenCalledWith(null, null)
  })

  it('rejects anchors that are not calendar days', () => {
    expect(() => controller.beginRange({ date: '2024-02-30' })).toThrow(BadRequestException)
    expect(mockSession.beginRangeAt).not.toHaveBeenCalled()
  })

  it('accepts weekdays in any case', () => {
    controller.enableTrainingDay('monday', { start: '18:00', end: '19:00' })
    expect(mockSession.enableTrainingDay).toHaveBeenCalledWith('MONDAY', {
      start: '18:00',
      end: '19:00',
    })

    controller.clearSchedule('Friday')
    expect(mockSession.clearSchedule).toHaveBeenCalledWith('FRIDAY')
  })

  it('rejects unknown weekdays', () => {
    expect(() => controller.clearSchedule('funday')).toThrow(BadRequestException)
    expect(mockSession.clearSchedule).not.toHaveBeenCalled()
  })

  it('validates the date in day routes', () => {
    expect(controller.getDay('2024-01-06')).toBe('day')
    expect(mockSession.dayView).toHaveBeenCalledWith('2024-01-06')

    expect(() => controller.toggleOutside('06/01/2024')).toThrow(BadRequestException)
    expect(mockSession.toggleOutsideSelection).not.toHaveBeenCalled()
  })

  it('forwards event indexes', () => {
    controller.removeEvent('2024-01-06', 2)
    expect(mockSession.removeEvent).toHaveBeenCalledWith('2024-01-06', 2)
  })

  it('hands the raw body to import', () => {
    const body = { start: '2024-01-01', end: '2024-01-31' }
    controller.importDocument(body)
    expect(mockSession.importDocument).toHaveBeenCalledWith(body)
  })
})
