import { HopVariant } from '../../paths/types/path.types';

export interface PipelineSummary {
  variant: HopVariant;
  totalPairs: number;
  totalBatches: number;
  skippedBatches: number;
  recordsWritten: number;
}
