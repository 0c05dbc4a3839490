import { z } from 'zod'

// Containers are checked here; the items inside them are not. The loader
// drops weekday, date, time and event entries that do not parse one by one.

export const timeRangeDocumentSchema = z.object({
  start: z.unknown(),
  end: z.unknown(),
})

export const calendarEventDocumentSchema = z.object({
  title: z.string().nullish(),
  description: z.string().nullish(),
  location: z.string().nullish(),
  time: timeRangeDocumentSchema.nullish(),
  reminder: z.boolean().nullish(),
})

export const programDocumentInputSchema = z.object({
  start: z.string().nullish(),
  end: z.string().nullish(),
  trainingDays: z.array(z.unknown()).nullish(),
  timeByDay: z.record(z.string(), z.unknown()).nullish(),
  forceOn: z.array(z.unknown()).nullish(),
  forceOff: z.array(z.unknown()).nullish(),
  events: z.record(z.string(), z.array(z.unknown())).nullish(),
  totals: z.unknown().optional(),
})
