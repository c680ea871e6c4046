import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { RetrievalConfig } from './config/retrieval.config';
import { DocumentLoaderService } from './document/document-loader.service';
import { IndexService } from './index/index.service';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule);
  const logger = new Logger('Bootstrap');

  try {
    const config = app.get(ConfigService).getOrThrow<RetrievalConfig>('retrieval');
    const documents = await app
      .get(DocumentLoaderService)
      .loadDocuments(config.corpus.directory, config.corpus.extension);

    const snapshot = app.get(IndexService).build(documents);
    logger.log(
      `Index ready: ${snapshot.documentCount} documents, ${snapshot.inverted.size} terms ` +
        `(analyzer '${config.defaultAnalyzer}', k=${config.kgram.size})`,
    );
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(error instanceof Error ? error.stack ?? error.message : String(error));
  process.exitCode = 1;
});
