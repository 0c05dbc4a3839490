import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  Header,
  HttpCode,
  Param,
  ParseIntPipe,
  Post,
  Put,
  UsePipes,
  ValidationPipe,
} from '@nestjs/common'
import { parseDateKey } from './date-key'
import { isWeekday } from './program.types'
import type { DateKey, Weekday } from './program.types'
import { ProgramSessionService } from './program-session.service'
import { CalendarEventDto } from './dto/calendar-event.dto'
import { RangeAnchorDto, SetRangeDto } from './dto/set-range.dto'
import { TimeRangeDto, TrainingDayDto } from './dto/time-range.dto'

const validation = new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true })

@Controller('program')
export class ProgramController {
  constructor(private readonly session: ProgramSessionService) {}

  private toDate(raw: string): DateKey {
    const d = parseDateKey(raw)
    if (!d) throw new BadRequestException(`Invalid date: ${raw}`)
    return d
  }

  private toWeekday(raw: string): Weekday {
    const day = raw.toUpperCase()
    if (!isWeekday(day)) throw new BadRequestException(`Invalid weekday: ${raw}`)
    return day
  }

  @Get()
  getProgram() {
    return this.session.view()
  }

  @Get('summary')
  getSummary() {
    return this.session.summary()
  }

  // ---- range ----

  @Put('range')
  @UsePipes(validation)
  setRange(@Body() dto: SetRangeDto) {
    return this.session.setRange(dto.start ?? null, dto.end ?? null)
  }

  @Delete('range')
  clearRange() {
    return this.session.setRange(null, null)
  }

  @Post('range/begin')
  @HttpCode(200)
  @UsePipes(validation)
  beginRange(@Body() dto: RangeAnchorDto) {
    return this.session.beginRangeAt(this.toDate(dto.date))
  }

  @Post('range/close')
  @HttpCode(200)
  @UsePipes(validation)
  closeRange(@Body() dto: RangeAnchorDto) {
    return this.session.closeRangeAt(this.toDate(dto.date))
  }

  @Post('range/adjust')
  @HttpCode(200)
  @UsePipes(validation)
  adjustRange(@Body() dto: RangeAnchorDto) {
    return this.session.adjustRangeWith(this.toDate(dto.date))
  }

  // ---- weekdays ----

  @Put('training-days/:weekday')
  @UsePipes(validation)
  enableTrainingDay(@Param('weekday') weekday: string, @Body() dto: TrainingDayDto) {
    return this.session.enableTrainingDay(this.toWeekday(weekday), dto)
  }

  @Delete('training-days/:weekday')
  disableTrainingDay(@Param('weekday') weekday: string) {
    return this.session.disableTrainingDay(this.toWeekday(weekday))
  }

  @Put('schedules/:weekday')
  @UsePipes(validation)
  setSchedule(@Param('weekday') weekday: string, @Body() dto: TimeRangeDto) {
    return this.session.setSchedule(this.toWeekday(weekday), dto)
  }

  @Delete('schedules/:weekday')
  clearSchedule(@Param('weekday') weekday: string) {
    return this.session.clearSchedule(this.toWeekday(weekday))
  }

  // ---- days ----

  @Get('days/:date')
  getDay(@Param('date') date: string) {
    return this.session.dayView(this.toDate(date))
  }

  @Post('days/:date/toggle-exception')
  @HttpCode(200)
  toggleException(@Param('date') date: string) {
    return this.session.toggleException(this.toDate(date))
  }

  @Post('days/:date/toggle-outside')
  @HttpCode(200)
  toggleOutside(@Param('date') date: string) {
    return this.session.toggleOutsideSelection(this.toDate(date))
  }

  @Post('days/:date/force-on')
  @HttpCode(200)
  forceOn(@Param('date') date: string) {
    return this.session.forceOn(this.toDate(date))
  }

  @Post('days/:date/force-off')
  @HttpCode(200)
  forceOff(@Param('date') date: string) {
    return this.session.forceOff(this.toDate(date))
  }

  @Delete('days/:date/override')
  clearOverride(@Param('date') date: string) {
    return this.session.clearOverride(this.toDate(date))
  }

  @Post('days/:date/events')
  @UsePipes(validation)
  addEvent(@Param('date') date: string, @Body() dto: CalendarEventDto) {
    return this.session.addEvent(this.toDate(date), dto)
  }

  @Put('days/:date/events/:index')
  @UsePipes(validation)
  replaceEvent(
    @Param('date') date: string,
    @Param('index', ParseIntPipe) index: number,
    @Body() dto: CalendarEventDto,
  ) {
    return this.session.replaceEvent(this.toDate(date), index, dto)
  }

  @Delete('days/:date/events/:index')
  removeEvent(@Param('date') date: string, @Param('index', ParseIntPipe) index: number) {
    return this.session.removeEvent(this.toDate(date), index)
  }

  @Delete('days/:date/events')
  clearEvents(@Param('date') date: string) {
    return this.session.clearEvents(this.toDate(date))
  }

  // ---- documents ----

  @Get('export.json')
  @Header('Content-Type', 'application/json; charset=utf-8')
  @Header('Content-Disposition', 'attachment; filename="program.json"')
  exportJson() {
    return this.session.exportJson()
  }

  @Get('export.csv')
  @Header('Content-Type', 'text/csv; charset=utf-8')
  @Header('Content-Disposition', 'attachment; filename="program.csv"')
  exportCsv() {
    return this.session.exportCsv()
  }

  @Get('export.ics')
  @Header('Content-Type', 'text/calendar; charset=utf-8')
  @Header('Content-Disposition', 'attachment; filename="program.ics"')
  exportIcs() {
    return this.session.exportIcs()
  }

  @Post('import')
  @HttpCode(200)
  importDocument(@Body() body: unknown) {
    return this.session.importDocument(body)
  }

  @Post('save')
  @HttpCode(200)
  save() {
    return this.session.save()
  }

  @Post('load')
  @HttpCode(200)
  load() {
    return this.session.load()
  }
}
