import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LABEL_RATE_LIMITER, RateLimiter } from '../common/scheduling';
import { chunk } from '../common/utils/chunk';
import { DEFAULT_WIKIDATA_API_ENDPOINT } from '../config/env.validation';
import { JSON_CONTENT } from '../wikidata/wikidata.constants';
import {
  HttpResponse,
  WikidataHttpClient,
} from '../wikidata/wikidata-http.client';
import { WikidataEntity } from '../wikidata/wikidata.types';
import { CodeLabelMap } from './label.types';

// wbgetentities refuses more ids than this per call
export const MAX_LABEL_BATCH_SIZE = 50;

@Injectable()
export class LabelResolverService {
  private readonly logger = new Logger(LabelResolverService.name);
  private readonly endpoint: string;
  private readonly language: string;

  constructor(
    private readonly http: WikidataHttpClient,
    private readonly configService: ConfigService,
    @Inject(LABEL_RATE_LIMITER) private readonly rateLimiter: RateLimiter,
  ) {
    this.endpoint = this.configService.get<string>(
      'WIKIDATA_API_ENDPOINT',
      DEFAULT_WIKIDATA_API_ENDPOINT,
    );
    this.language = this.configService.get<string>('LABEL_LANGUAGE', 'en');
  }

  /**
   * Resolves `codes` in sub-batches of `batchSize`, pausing the label rate
   * limiter after every request.
   */
  async resolveInBatches(
    codes: ReadonlySet<string>,
    batchSize: number,
    kind = 'label',
  ): Promise<CodeLabelMap> {
    const labels: CodeLabelMap = new Map();
    const batches = chunk([...codes], batchSize);

    for (const [i, batch] of batches.entries()) {
      this.logger.log(
        `Fetching ${kind} labels batch ${i + 1}/${batches.length}...`,
      );
      const resolved = await this.resolveLabels(batch);
      resolved.forEach((label, code) => labels.set(code, label));
      await this.rateLimiter.pause();
    }
    return labels;
  }

  /**
   * One `wbgetentities` request. The result has an entry for every requested
   * code; anything that cannot be resolved maps to the code itself.
   */
  async resolveLabels(codes: Iterable<string>): Promise<CodeLabelMap> {
    const ids = [...new Set(codes)];
    if (ids.length === 0) return new Map();

    const url = new URL(this.endpoint);
    url.searchParams.set('action', 'wbgetentities');
    url.searchParams.set('ids', ids.join('|'));
    url.searchParams.set('format', 'json');
    url.searchParams.set('props', 'labels');

    let response: HttpResponse;
    try {
      response = await this.http.get(url, JSON_CONTENT);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.error(
        `Label request failed for ids ${ids.join(', ')}: ${error.message}`,
      );
      return identityMap(ids);
    }

    if (!response.ok) {
      this.logger.error(
        `Received status code ${response.status} for ids: ${ids.join(', ')}`,
      );
      return identityMap(ids);
    }

    if (!response.body.trim()) {
      this.logger.warn(`Empty response for ids: ${ids.join(', ')}`);
      return identityMap(ids);
    }

    const entities = parseEntities(response.body);
    if (!entities) {
      this.logger.warn(
        `Malformed response, 'entities' missing for ids: ${ids.join(', ')}`,
      );
      return identityMap(ids);
    }

    const labels: CodeLabelMap = new Map();
    for (const id of ids) {
      labels.set(id, this.pickLabel(entities[id]) ?? id);
    }
    return labels;
  }

  private pickLabel(entity: WikidataEntity | undefined): string | undefined {
    const value = entity?.labels?.[this.language]?.value;
    return typeof value === 'string' ? value : undefined;
  }
}

function identityMap(ids: readonly string[]): CodeLabelMap {
  return new Map(ids.map((id): [string, string] => [id, id]));
}

function parseEntities(
  body: string,
): Record<string, WikidataEntity | undefined> | null {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    return null;
  }
  if (typeof data !== 'object' || data === null || !('entities' in data)) {
    return null;
  }
  const { entities } = data;
  return isEntityRecord(entities) ? entities : null;
}

function isEntityRecord(
  value: unknown,
): value is Record<string, WikidataEntity | undefined> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
