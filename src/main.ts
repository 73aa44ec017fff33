#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { parseCliArguments, USAGE } from './cli';
import { PipelineError } from './common/errors/pipeline.errors';
import { PipelineOptionsDto } from './pipeline/dto/pipeline-options.dto';
import { PipelineService } from './pipeline/pipeline.service';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  let options: PipelineOptionsDto;
  try {
    options = parseCliArguments(process.argv.slice(2));
  } catch (err) {
    logger.error(err instanceof Error ? err.message : String(err));
    logger.log(USAGE);
    process.exitCode = 2;
    return;
  }

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['log', 'warn', 'error'],
  });

  try {
    const summary = await app.get(PipelineService).run(options);
    logger.log(
      `✅ ${summary.totalPairs} pairs in ${summary.totalBatches} batches -> ` +
        `${summary.recordsWritten} records (${summary.skippedBatches} batches skipped)`,
    );
  } catch (err) {
    if (err instanceof PipelineError) {
      logger.error(`❌ ${err.message}`);
    } else {
      logger.error('❌ Pipeline failed', err instanceof Error ? err.stack : err);
    }
    process.exitCode = 1;
  } finally {
    await app.close();
  }
}

bootstrap().catch((err) => {
  console.error(err);
  process.exit(1);
});
