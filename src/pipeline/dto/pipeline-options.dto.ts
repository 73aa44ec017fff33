import { Type } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import { MAX_LABEL_BATCH_SIZE } from '../../labels/label-resolver.service';
import { HOP_VARIANTS, HopVariant } from '../../paths/types/path.types';

export class PipelineOptionsDto {
  @IsIn([...HOP_VARIANTS])
  variant!: HopVariant;

  /** Tab-separated pairs, one per line. */
  @IsString()
  @IsNotEmpty()
  inputPath!: string;

  /** Appended to; see `truncate`. */
  @IsString()
  @IsNotEmpty()
  outputPath!: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Type(() => Number)
  pairBatchSize?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(MAX_LABEL_BATCH_SIZE)
  @Type(() => Number)
  labelBatchSize?: number;

  // Empties the output file once before the first batch
  @IsOptional()
  @IsBoolean()
  truncate?: boolean = false;
}
