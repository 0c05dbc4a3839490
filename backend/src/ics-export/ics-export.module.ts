import { Module } from '@nestjs/common'
import { IcsExporterService } from './ics-exporter.service'

@Module({
  providers: [IcsExporterService],
  exports: [IcsExporterService],
})
export class IcsExportModule {}
