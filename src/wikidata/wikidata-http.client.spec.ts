import { ConfigModule } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { MockAgent } from 'undici';
import { HTTP_DISPATCHER } from './wikidata.constants';
import { WikidataHttpClient } from './wikidata-http.client';

describe('WikidataHttpClient', () => {
  let mockAgent: MockAgent;
  let client: WikidataHttpClient;

  beforeEach(async () => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();

    const moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          ignoreEnvFile: true,
          load: [() => ({ WIKIDATA_USER_AGENT: 'path-enricher-test/0.0' })],
        }),
      ],
      providers: [
        WikidataHttpClient,
        { provide: HTTP_DISPATCHER, useValue: mockAgent },
      ],
    }).compile();

    client = moduleRef.get(WikidataHttpClient);
  });

  afterEach(async () => {
    await mockAgent.close();
  });

  it('sends the configured user agent and accept header', async () => {
    // header matchers are case-insensitive; a mismatch fails the request
    mockAgent
      .get('https://query.wikidata.org')
      .intercept({
        path: (p) => p.startsWith('/sparql?'),
        method: 'GET',
        headers: {
          'user-agent': 'path-enricher-test/0.0',
          accept: 'application/sparql-results+json',
        },
      })
      .reply(200, '{"results":{"bindings":[]}}');

    const response = await client.get(
      new URL('https://query.wikidata.org/sparql?format=json'),
      'application/sparql-results+json',
    );

    expect(response).toEqual({
      status: 200,
      ok: true,
      body: '{"results":{"bindings":[]}}',
    });
  });

  it('resolves error statuses instead of rejecting', async () => {
    mockAgent
      .get('https://www.wikidata.org')
      .intercept({ path: (p) => p.startsWith('/w/api.php'), method: 'GET' })
      .reply(503, 'maxlag');

    const response = await client.get(
      new URL('https://www.wikidata.org/w/api.php?action=wbgetentities'),
      'application/json',
    );

    expect(response).toEqual({ status: 503, ok: false, body: 'maxlag' });
  });

  it('rejects when the request cannot be made', async () => {
    await expect(
      client.get(new URL('https://unreachable.test/sparql'), 'application/json'),
    ).rejects.toThrow();
  });
});
