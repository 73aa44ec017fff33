import { parseArgs } from 'node:util';
import { HOP_VARIANTS, HopVariant } from './paths/types/path.types';
import { PipelineOptionsDto } from './pipeline/dto/pipeline-options.dto';

export const USAGE = `Usage: wikidata-path-enricher --variant <one-hop|four-hop> --input <pairs.tsv> --output <out.txt>
       [--pair-batch-size <n>] [--label-batch-size <n>] [--truncate]`;

/**
 * Maps command-line flags onto pipeline options. Values are passed through as
 * given; `PipelineService.run` validates them.
 */
export function parseCliArguments(argv: string[]): PipelineOptionsDto {
  const { values } = parseArgs({
    args: argv,
    options: {
      variant: { type: 'string', short: 'v', default: 'one-hop' },
      input: { type: 'string', short: 'i' },
      output: { type: 'string', short: 'o' },
      'pair-batch-size': { type: 'string' },
      'label-batch-size': { type: 'string' },
      truncate: { type: 'boolean', default: false },
    },
    strict: true,
  });

  const options = new PipelineOptionsDto();
  options.variant = parseVariant(values.variant ?? 'one-hop');
  options.inputPath = values.input ?? '';
  options.outputPath = values.output ?? '';
  options.pairBatchSize = toNumber(values['pair-batch-size']);
  options.labelBatchSize = toNumber(values['label-batch-size']);
  options.truncate = values.truncate ?? false;
  return options;
}

function parseVariant(value: string): HopVariant {
  const variant = HOP_VARIANTS.find((v) => v === value);
  if (!variant) {
    throw new Error(
      `Unknown variant "${value}", expected one of ${HOP_VARIANTS.join(', ')}`,
    );
  }
  return variant;
}

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}
