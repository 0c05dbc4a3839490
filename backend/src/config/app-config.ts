export type AppConfig = {
  port: number
  corsOrigin: string
  calendarTzid: string // TZID attached to exported DTSTART/DTEND
  programFile: string // target of /program/save and /program/load
}

export const APP_CONFIG = Symbol('APP_CONFIG')

const DEFAULT_PORT = 3000
const DEFAULT_CORS_ORIGIN = 'http://localhost:5173'
const DEFAULT_PROGRAM_FILE = './program.json'

const hostTimeZone = (): string => Intl.DateTimeFormat().resolvedOptions().timeZone || 'UTC'

const nonEmpty = (raw: string | undefined): string | undefined => {
  const trimmed = raw?.trim()
  return trimmed ? trimmed : undefined
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsedPort = Number(env.PORT)
  const port =
    Number.isInteger(parsedPort) && parsedPort > 0 && parsedPort < 65536 ? parsedPort : DEFAULT_PORT

  return {
    port,
    corsOrigin: nonEmpty(env.CORS_ORIGIN) ?? DEFAULT_CORS_ORIGIN,
    calendarTzid: nonEmpty(env.CALENDAR_TZID) ?? hostTimeZone(),
    programFile: nonEmpty(env.PROGRAM_FILE) ?? DEFAULT_PROGRAM_FILE,
  }
}
