import { HttpResponse } from '../../src/wikidata/wikidata-http.client';

type Handler = (url: URL) => HttpResponse | Promise<HttpResponse>;

export function jsonResponse(data: unknown, status = 200): HttpResponse {
  return {
    status,
    ok: status >= 200 && status < 300,
    body: JSON.stringify(data),
  };
}

export function statusResponse(status: number, body = ''): HttpResponse {
  return { status, ok: status >= 200 && status < 300, body };
}

export function sparqlResponse(
  bindings: Array<Record<string, string>>,
): HttpResponse {
  return jsonResponse({
    head: { vars: [] },
    results: {
      bindings: bindings.map((b) =>
        Object.fromEntries(
          Object.entries(b).map(([name, value]) => [
            name,
            { type: 'uri', value },
          ]),
        ),
      ),
    },
  });
}

/** Answers wbgetentities requests from a code -> English label table. */
export function labelTable(table: Record<string, string>): Handler {
  return (url) => {
    const ids = (url.searchParams.get('ids') ?? '').split('|');
    const entities: Record<string, unknown> = {};
    for (const id of ids) {
      entities[id] =
        id in table
          ? { id, labels: { en: { language: 'en', value: table[id] } } }
          : { id, missing: '' };
    }
    return jsonResponse({ entities, success: 1 });
  };
}

/**
 * Stands in for WikidataHttpClient. Requests to a path ending in `/sparql`
 * go to the SPARQL handler, everything else to the label handler.
 */
export class FakeWikidataHttpClient {
  readonly requests: URL[] = [];
  private sparqlHandlers: Handler[] = [];
  private labelHandler: Handler = labelTable({});

  /** Queues handlers; each SPARQL request consumes one, the last one repeats. */
  onSparql(...handlers: Handler[]): this {
    this.sparqlHandlers.push(...handlers);
    return this;
  }

  onLabels(handler: Handler): this {
    this.labelHandler = handler;
    return this;
  }

  get sparqlRequests(): URL[] {
    return this.requests.filter((u) => u.pathname.endsWith('/sparql'));
  }

  get labelRequests(): URL[] {
    return this.requests.filter((u) => !u.pathname.endsWith('/sparql'));
  }

  async get(url: URL, _accept: string): Promise<HttpResponse> {
    this.requests.push(url);
    if (url.pathname.endsWith('/sparql')) {
      const handler =
        this.sparqlHandlers.length > 1
          ? this.sparqlHandlers.shift()
          : this.sparqlHandlers[0];
      return handler ? handler(url) : sparqlResponse([]);
    }
    return this.labelHandler(url);
  }
}
