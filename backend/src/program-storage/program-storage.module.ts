import { Module } from '@nestjs/common'
import { ProgramSummaryModule } from '../program-summary/program-summary.module'
import { ProgramStorageService } from './program-storage.service'

@Module({
  imports: [ProgramSummaryModule],
  providers: [ProgramStorageService],
  exports: [ProgramStorageService],
})
export class ProgramStorageModule {}
