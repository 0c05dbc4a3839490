import { Module } from '@nestjs/common'
import { IcsExportModule } from '../ics-export/ics-export.module'
import { ProgramStorageModule } from '../program-storage/program-storage.module'
import { ProgramSummaryModule } from '../program-summary/program-summary.module'
import { ProgramController } from './program.controller'
import { ProgramSessionService } from './program-session.service'

@Module({
  imports: [ProgramSummaryModule, ProgramStorageModule, IcsExportModule],
  providers: [ProgramSessionService],
  controllers: [ProgramController],
  exports: [ProgramSessionService],
})
export class ProgramModule {}
