import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import retrievalConfig from './config/retrieval.config';
import { validate } from './config/env.validation';
import { AnalysisModule } from './analysis/analysis.module';
import { DocumentModule } from './document/document.module';
import { IndexModule } from './index/index.module';
import { SearchModule } from './search/search.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [retrievalConfig],
      validate,
    }),
    AnalysisModule,
    DocumentModule,
    IndexModule,
    SearchModule,
  ],
})
export class AppModule {}
