import { Module } from '@nestjs/common';
import { ResultReportService } from './result-report.service';

@Module({
  providers: [ResultReportService],
  exports: [ResultReportService],
})
export class ReportingModule {}
