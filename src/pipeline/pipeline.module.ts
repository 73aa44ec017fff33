import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  FixedDelayRateLimiter,
  PAIR_BATCH_RATE_LIMITER,
  Scheduler,
  SCHEDULER,
} from '../common/scheduling';
import { DEFAULT_RATE_LIMIT_MS } from '../config/env.validation';
import { LabelsModule } from '../labels/labels.module';
import { PathsModule } from '../paths/paths.module';
import { OutputWriter } from './output.writer';
import { PipelineService } from './pipeline.service';

@Module({
  imports: [ConfigModule, PathsModule, LabelsModule],
  providers: [
    {
      provide: PAIR_BATCH_RATE_LIMITER,
      inject: [SCHEDULER, ConfigService],
      useFactory: (scheduler: Scheduler, configService: ConfigService) =>
        new FixedDelayRateLimiter(
          scheduler,
          configService.get<number>('RATE_LIMIT_MS', DEFAULT_RATE_LIMIT_MS),
        ),
    },
    OutputWriter,
    PipelineService,
  ],
  exports: [PipelineService],
})
export class PipelineModule {}
