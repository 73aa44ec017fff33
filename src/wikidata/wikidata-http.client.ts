import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { fetch } from 'undici';
import type { Dispatcher } from 'undici';
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
} from '../config/env.validation';
import { HTTP_DISPATCHER } from './wikidata.constants';

export interface HttpResponse {
  status: number;
  ok: boolean;
  body: string;
}

/**
 * Thin GET wrapper shared by the query and label clients. Transport errors
 * (DNS, reset, timeout) reject; HTTP error statuses resolve with `ok: false`
 * so callers decide how to degrade.
 */
@Injectable()
export class WikidataHttpClient {
  private readonly userAgent: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly configService: ConfigService,
    @Inject(HTTP_DISPATCHER) private readonly dispatcher: Dispatcher,
  ) {
    this.userAgent = this.configService.get<string>(
      'WIKIDATA_USER_AGENT',
      DEFAULT_USER_AGENT,
    );
    this.timeoutMs = this.configService.get<number>(
      'HTTP_TIMEOUT_MS',
      DEFAULT_HTTP_TIMEOUT_MS,
    );
  }

  async get(url: URL, accept: string): Promise<HttpResponse> {
    const res = await fetch(url, {
      headers: {
        'User-Agent': this.userAgent,
        Accept: accept,
      },
      dispatcher: this.dispatcher,
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    return {
      status: res.status,
      ok: res.ok,
      body: await res.text(),
    };
  }
}
