import { IsOptional, Matches } from 'class-validator'

const TIME_PATTERN = /^\d{2}:\d{2}(:\d{2})?$/

export class TimeRangeDto {
  @Matches(TIME_PATTERN, { message: 'start must be HH:MM' })
  start!: string

  @Matches(TIME_PATTERN, { message: 'end must be HH:MM' })
  end!: string
}

export class TrainingDayDto {
  @IsOptional()
  @Matches(TIME_PATTERN, { message: 'start must be HH:MM' })
  start?: string

  @IsOptional()
  @Matches(TIME_PATTERN, { message: 'end must be HH:MM' })
  end?: string
}
