import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  FixedDelayRateLimiter,
  LABEL_RATE_LIMITER,
  Scheduler,
  SCHEDULER,
} from '../common/scheduling';
import { DEFAULT_RATE_LIMIT_MS } from '../config/env.validation';
import { WikidataModule } from '../wikidata/wikidata.module';
import { LabelResolverService } from './label-resolver.service';

@Module({
  imports: [ConfigModule, WikidataModule],
  providers: [
    {
      provide: LABEL_RATE_LIMITER,
      inject: [SCHEDULER, ConfigService],
      useFactory: (scheduler: Scheduler, configService: ConfigService) =>
        new FixedDelayRateLimiter(
          scheduler,
          configService.get<number>('RATE_LIMIT_MS', DEFAULT_RATE_LIMIT_MS),
        ),
    },
    LabelResolverService,
  ],
  exports: [LabelResolverService],
})
export class LabelsModule {}
