import { IsOptional, Matches, ValidateIf } from 'class-validator'

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/

export class SetRangeDto {
  @IsOptional()
  @ValidateIf((_, value) => value !== null)
  @Matches(DATE_PATTERN, { message: 'start must be YYYY-MM-DD' })
  start?: string | null

  @IsOptional()
  @ValidateIf((_, value) => value !== null)
  @Matches(DATE_PATTERN, { message: 'end must be YYYY-MM-DD' })
  end?: string | null
}

export class RangeAnchorDto {
  @Matches(DATE_PATTERN, { message: 'date must be YYYY-MM-DD' })
  date!: string
}
