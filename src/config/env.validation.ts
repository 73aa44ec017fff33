import { plainToInstance } from 'class-transformer';
import {
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export const DEFAULT_WDQS_ENDPOINT = 'https://query.wikidata.org/sparql';
export const DEFAULT_WIKIDATA_API_ENDPOINT = 'https://www.wikidata.org/w/api.php';

// Wikimedia rejects anonymous clients, keep a contact in here
export const DEFAULT_USER_AGENT =
  'WikidataPathEnricher/1.0 (contact: maintainer@example.org)';

export const DEFAULT_RATE_LIMIT_MS = 1500;
export const DEFAULT_QUERY_BACKOFF_MS = 5000;
export const DEFAULT_HTTP_TIMEOUT_MS = 60_000;

export class EnvironmentVariables {
  @IsOptional()
  @IsUrl({ require_tld: false })
  WDQS_ENDPOINT?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  WIKIDATA_API_ENDPOINT?: string;

  @IsOptional()
  @IsString()
  WIKIDATA_USER_AGENT?: string;

  @IsOptional()
  @IsString()
  LABEL_LANGUAGE?: string;

  @IsOptional()
  @IsString()
  HTTPS_PROXY?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  HTTP_TIMEOUT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  RATE_LIMIT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  QUERY_BACKOFF_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  PAIR_BATCH_SIZE?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(50)
  LABEL_BATCH_SIZE?: number;
}

/**
 * Passed to `ConfigModule.forRoot({ validate })`. Numeric variables arrive as
 * strings from the environment and are converted before validation.
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const messages = errors.flatMap((e) => Object.values(e.constraints ?? {}));
    throw new Error(`Invalid environment: ${messages.join('; ')}`);
  }
  return validated;
}
