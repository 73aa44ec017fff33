import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { InvalidPipelineOptionsError } from '../common/errors/pipeline.errors';
import { PAIR_BATCH_RATE_LIMITER, RateLimiter } from '../common/scheduling';
import { chunk } from '../common/utils/chunk';
import { LabelResolverService } from '../labels/label-resolver.service';
import { PathAggregatorService } from '../paths/path-aggregator.service';
import { PathQueryService } from '../paths/path-query.service';
import { getPathTemplate, PathTemplate } from '../paths/templates';
import { EntityPair } from '../paths/types/path.types';
import { PipelineOptionsDto } from './dto/pipeline-options.dto';
import { readEntityPairs } from './entity-pair.reader';
import { OutputWriter } from './output.writer';
import { PipelineSummary } from './types/pipeline.types';

interface BatchSettings {
  template: PathTemplate;
  labelBatchSize: number;
  outputPath: string;
}

@Injectable()
export class PipelineService {
  private readonly logger = new Logger(PipelineService.name);

  constructor(
    private readonly pathQuery: PathQueryService,
    private readonly aggregator: PathAggregatorService,
    private readonly labelResolver: LabelResolverService,
    private readonly writer: OutputWriter,
    private readonly configService: ConfigService,
    @Inject(PAIR_BATCH_RATE_LIMITER) private readonly rateLimiter: RateLimiter,
  ) {}

  /**
   * Enriches every pair of `inputPath` and appends the records to
   * `outputPath`. Batches run strictly one after another; a batch whose query
   * fails is skipped without output. Running twice over the same input without
   * `truncate` leaves both runs' lines in the output.
   */
  async run(input: PipelineOptionsDto): Promise<PipelineSummary> {
    const options = this.validateOptions(input);
    const template = getPathTemplate(options.variant);

    const pairBatchSize =
      options.pairBatchSize ??
      this.configService.get<number>('PAIR_BATCH_SIZE') ??
      template.defaultPairBatchSize;
    const labelBatchSize =
      options.labelBatchSize ??
      this.configService.get<number>('LABEL_BATCH_SIZE') ??
      template.defaultLabelBatchSize;

    const pairs = await readEntityPairs(options.inputPath);
    if (options.truncate) {
      await this.writer.truncate(options.outputPath);
    }

    const batches = chunk(pairs, pairBatchSize);
    const summary: PipelineSummary = {
      variant: template.variant,
      totalPairs: pairs.length,
      totalBatches: batches.length,
      skippedBatches: 0,
      recordsWritten: 0,
    };
    const settings: BatchSettings = {
      template,
      labelBatchSize,
      outputPath: options.outputPath,
    };

    for (const [i, batch] of batches.entries()) {
      this.logger.log(
        `Processing batch ${i + 1}/${batches.length} for entity pairs...`,
      );

      const written = await this.processBatch(batch, settings);
      if (written === null) {
        summary.skippedBatches++;
      } else {
        summary.recordsWritten += written;
      }

      await this.rateLimiter.pause();
    }

    this.logger.log(
      `Finished ${template.variant}: ${summary.recordsWritten} records, ` +
        `${summary.skippedBatches}/${summary.totalBatches} batches skipped`,
    );
    return summary;
  }

  /** Resolves to the number of lines written, or `null` if the batch was skipped. */
  private async processBatch(
    batch: readonly EntityPair[],
    { template, labelBatchSize, outputPath }: BatchSettings,
  ): Promise<number | null> {
    const bindings = await this.pathQuery.queryPaths(batch, template);
    if (bindings === null) return null;

    const { groups, relationCodes, entityCodes } = this.aggregator.aggregate(
      bindings,
      template,
    );

    const relations = await this.labelResolver.resolveInBatches(
      relationCodes,
      labelBatchSize,
      'relation',
    );
    const entities = await this.labelResolver.resolveInBatches(
      entityCodes,
      labelBatchSize,
      'entity',
    );

    const lines = template.formatRecords(batch, groups, { relations, entities });
    await this.writer.append(outputPath, lines);
    return lines.length;
  }

  private validateOptions(input: PipelineOptionsDto): PipelineOptionsDto {
    const options = plainToInstance(PipelineOptionsDto, input);
    const errors = validateSync(options);
    if (errors.length > 0) {
      throw new InvalidPipelineOptionsError(
        errors.flatMap((e) => Object.values(e.constraints ?? {})),
      );
    }
    return options;
  }
}
