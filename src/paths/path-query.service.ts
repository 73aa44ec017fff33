import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { QUERY_BACKOFF_LIMITER, RateLimiter } from '../common/scheduling';
import { DEFAULT_WDQS_ENDPOINT } from '../config/env.validation';
import { SPARQL_RESULTS_JSON } from '../wikidata/wikidata.constants';
import {
  HttpResponse,
  WikidataHttpClient,
} from '../wikidata/wikidata-http.client';
import { SparqlBinding, SparqlResponse } from '../wikidata/wikidata.types';
import { PathTemplate } from './templates';
import { EntityPair } from './types/path.types';

@Injectable()
export class PathQueryService {
  private readonly logger = new Logger(PathQueryService.name);
  private readonly endpoint: string;

  constructor(
    private readonly http: WikidataHttpClient,
    private readonly configService: ConfigService,
    @Inject(QUERY_BACKOFF_LIMITER) private readonly backoff: RateLimiter,
  ) {
    this.endpoint = this.configService.get<string>(
      'WDQS_ENDPOINT',
      DEFAULT_WDQS_ENDPOINT,
    );
  }

  /**
   * Runs one query for the whole batch. Resolves to `null` when the batch
   * could not be queried, after the back-off pause. Failed batches are not
   * retried.
   */
  async queryPaths(
    pairs: readonly EntityPair[],
    template: PathTemplate,
  ): Promise<SparqlBinding[] | null> {
    if (pairs.length === 0) return [];

    const url = new URL(this.endpoint);
    url.searchParams.set('query', template.buildQuery(pairs));
    url.searchParams.set('format', 'json');

    let response: HttpResponse;
    try {
      response = await this.http.get(url, SPARQL_RESULTS_JSON);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      return this.fail(`Path query request failed: ${error.message}`);
    }

    if (!response.ok) {
      return this.fail(`Path query returned status ${response.status}`);
    }

    const bindings = parseBindings(response.body);
    if (!bindings) {
      return this.fail('Path query returned a body that is not SPARQL JSON');
    }
    return bindings;
  }

  private async fail(reason: string): Promise<null> {
    this.logger.error(
      `${reason}, skipping batch after ${this.backoff.delayMs} ms back-off`,
    );
    await this.backoff.pause();
    return null;
  }
}

function parseBindings(body: string): SparqlBinding[] | null {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    return null;
  }
  return isSparqlResponse(data) ? data.results.bindings : null;
}

function isSparqlResponse(data: unknown): data is SparqlResponse {
  if (typeof data !== 'object' || data === null || !('results' in data)) {
    return false;
  }
  const { results } = data;
  return (
    typeof results === 'object' &&
    results !== null &&
    'bindings' in results &&
    Array.isArray(results.bindings) &&
    results.bindings.every(isBindingObject)
  );
}

function isBindingObject(value: unknown): boolean {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
