/** Source of "now" for calendar stamps; tests provide a fixed one under `CLOCK`. */
export interface Clock {
  now(): Date
}

export const CLOCK = Symbol('CLOCK')

// wall clock of the host
export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }
}
