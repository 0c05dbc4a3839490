import { Module } from '@nestjs/common'
import { AppController } from './app.controller'
import { ClockModule } from './clock/clock.module'
import { AppConfigModule } from './config/app-config.module'
import { ProgramModule } from './program/program.module'

@Module({
  imports: [AppConfigModule, ClockModule, ProgramModule],
  controllers: [AppController],
})
export class AppModule {}
