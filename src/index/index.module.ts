import { Module } from '@nestjs/common';
import { AnalysisModule } from '../analysis/analysis.module';
import { IndexService } from './index.service';

@Module({
  imports: [AnalysisModule],
  providers: [IndexService],
  exports: [IndexService],
})
export class IndexModule {}
