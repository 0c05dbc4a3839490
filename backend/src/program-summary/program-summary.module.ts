import { Module } from '@nestjs/common'
import { ProgramCalculatorService } from './program-calculator.service'

@Module({
  providers: [ProgramCalculatorService],
  exports: [ProgramCalculatorService],
})
export class ProgramSummaryModule {}
