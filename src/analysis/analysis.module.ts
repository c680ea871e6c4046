import { Module } from '@nestjs/common';
import { AnalyzerRegistryService } from './analyzer-registry.service';

@Module({
  providers: [AnalyzerRegistryService],
  exports: [AnalyzerRegistryService],
})
export class AnalysisModule {}
