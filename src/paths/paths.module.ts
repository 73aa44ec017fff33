import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  FixedDelayRateLimiter,
  QUERY_BACKOFF_LIMITER,
  Scheduler,
  SCHEDULER,
} from '../common/scheduling';
import { DEFAULT_QUERY_BACKOFF_MS } from '../config/env.validation';
import { WikidataModule } from '../wikidata/wikidata.module';
import { PathAggregatorService } from './path-aggregator.service';
import { PathQueryService } from './path-query.service';

@Module({
  imports: [ConfigModule, WikidataModule],
  providers: [
    {
      provide: QUERY_BACKOFF_LIMITER,
      inject: [SCHEDULER, ConfigService],
      useFactory: (scheduler: Scheduler, configService: ConfigService) =>
        new FixedDelayRateLimiter(
          scheduler,
          configService.get<number>(
            'QUERY_BACKOFF_MS',
            DEFAULT_QUERY_BACKOFF_MS,
          ),
        ),
    },
    PathQueryService,
    PathAggregatorService,
  ],
  exports: [PathQueryService, PathAggregatorService],
})
export class PathsModule {}
