import { IsBoolean, IsNotEmpty, IsOptional, IsString, Matches } from 'class-validator'

const TIME_PATTERN = /^\d{2}:\d{2}(:\d{2})?$/

export class CalendarEventDto {
  @IsString()
  @IsNotEmpty()
  title!: string

  @IsString()
  @IsOptional()
  description?: string

  @IsString()
  @IsOptional()
  location?: string

  @Matches(TIME_PATTERN, { message: 'start must be HH:MM' })
  start!: string

  @Matches(TIME_PATTERN, { message: 'end must be HH:MM' })
  end!: string

  @IsBoolean()
  @IsOptional()
  reminder?: boolean
}
