import { loadAppConfig } from '../src/config/app-config'

describe('loadAppConfig', () => {
  it('reads every setting from the environment', () => {
    expect(
      loadAppConfig({
        PORT: '8080',
        CORS_ORIGIN: 'http://example.test',
        CALENDAR_TZID: ' Europe/Madrid ',
        PROGRAM_FILE: '/tmp/plan.json',
      }),
    ).toEqual({
      port: 8080,
      corsOrigin: 'http://example.test',
      calendarTzid: 'Europe/Madrid',
      programFile: '/tmp/plan.json',
    })
  })

  it('falls back to defaults', () => {
    const config = loadAppConfig({ CALENDAR_TZID: 'UTC' })
    expect(config).toEqual({
      port: 3000,
      corsOrigin: 'http://localhost:5173',
      calendarTzid: 'UTC',
      programFile: './program.json',
    })
  })

  it('ignores an unusable port', () => {
    expect(loadAppConfig({ PORT: 'abc' }).port).toBe(3000)
    expect(loadAppConfig({ PORT: '70000' }).port).toBe(3000)
    expect(loadAppConfig({ PORT: '' }).port).toBe(3000)
  })

  it('uses the host time zone when none is set', () => {
    expect(loadAppConfig({ CALENDAR_TZID: '  ' }).calendarTzid).toBe(
      Intl.DateTimeFormat().resolvedOptions().timeZone || 'UTC',
    )
  })
})
