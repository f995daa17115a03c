import { describe, expect, it } from 'vitest';
import { ProviderError, classifyStatus } from '../src/core/errors.js';
import { RateLimiter } from '../src/core/rate-limiter.js';
import { ApiHttpClient } from '../src/providers/http-client.js';
import { OpenAlexClient, shortOpenAlexId } from '../src/providers/openalex-client.js';
import { SemanticScholarClient } from '../src/providers/semantic-scholar-client.js';
import { quoteTitle } from '../src/providers/types.js';
import { createFetchStub, jsonResponse, silentLogger, type FetchRoute } from './support/fakes.js';

const httpClient = (route: FetchRoute, retryAttempts = 0) => {
  const stub = createFetchStub(route);
  const client = new ApiHttpClient(
    { timeoutMs: 1000, retryAttempts, retryDelayMs: 0, fetchImpl: stub.fetchImpl, sleep: async () => undefined },
    new RateLimiter(0),
    silentLogger()
  );
  return { client, requests: stub.requests };
};

describe('failure classification', () => {
  it('maps statuses onto the taxonomy', () => {
    expect(classifyStatus(undefined)).toBe('retriable');
    expect(classifyStatus(429)).toBe('retriable');
    expect(classifyStatus(500)).toBe('retriable');
    expect(classifyStatus(503)).toBe('retriable');
    expect(classifyStatus(404)).toBe('not_found');
    expect(classifyStatus(400)).toBe('permanent');
    expect(classifyStatus(403)).toBe('permanent');
  });
});

describe('ApiHttpClient', () => {
  it('turns network failures into retriable provider errors', async () => {
    const { client } = httpClient(() => {
      throw new TypeError('fetch failed');
    });

    const failure = await client
      .fetchJson({ provider: 'openalex', url: new URL('https://api.test/works') })
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ProviderError);
    expect(failure instanceof ProviderError && failure.status).toBeUndefined();
    expect(failure instanceof ProviderError && failure.retriable).toBe(true);
    expect(failure instanceof Error && failure.message).toBe('Provider openalex request failed: fetch failed');
  });

  it('does not retry permanent failures', async () => {
    const { client, requests } = httpClient(() => new Response('nope', { status: 401 }), 3);

    await expect(client.fetchJson({ provider: 'openalex', url: new URL('https://api.test/works') })).rejects.toMatchObject({
      status: 401
    });
    expect(requests).toHaveLength(1);
  });

  it('gives up after the configured retries', async () => {
    const { client, requests } = httpClient(() => new Response('slow down', { status: 429 }), 2);

    await expect(client.fetchJson({ provider: 'openalex', url: new URL('https://api.test/works') })).rejects.toMatchObject({
      status: 429
    });
    expect(requests).toHaveLength(3);
  });
});

describe('OpenAlexClient', () => {
  it('sends an exact-phrase search with the polite-pool address', async () => {
    const { client, requests } = httpClient(() => jsonResponse({ results: [] }));
    const openAlex = new OpenAlexClient({ baseUrl: 'https://api.openalex.org', email: 'team@example.org' }, client);

    expect(await openAlex.searchWork('Attention  "is"  all')).toBeNull();

    const url = requests[0]?.url;
    expect(url?.pathname).toBe('/works');
    expect(url?.searchParams.get('search')).toBe('"Attention is all"');
    expect(url?.searchParams.get('per-page')).toBe('1');
    expect(url?.searchParams.get('mailto')).toBe('team@example.org');
  });

  it('shortens author ids', () => {
    expect(shortOpenAlexId('https://openalex.org/A123')).toBe('A123');
    expect(shortOpenAlexId('A123')).toBe('A123');
  });

  it('quotes titles without nested quotes', () => {
    expect(quoteTitle(' A "quoted"\ttitle ')).toBe('"A quoted title"');
  });
});

describe('SemanticScholarClient', () => {
  const route: FetchRoute = (request) => {
    if (request.url.pathname === '/graph/v1/paper/search') {
      return jsonResponse({
        total: 1,
        data: [
          {
            paperId: 'S1',
            title: 'Deep Learning',
            citationCount: 9,
            authors: [
              { authorId: '11', name: 'Ada' },
              { authorId: null, name: 'Anon' },
              { authorId: '22', name: 'Grace' }
            ]
          }
        ]
      });
    }

    return jsonResponse([{ authorId: '11', hIndex: 3 }, null]);
  };

  const create = () => {
    const { client, requests } = httpClient(route);
    return {
      requests,
      provider: new SemanticScholarClient(
        { baseUrl: 'https://api.semanticscholar.org/graph/v1', apiKey: 'test-key' },
        client
      )
    };
  };

  it('matches the top search result', async () => {
    const { provider, requests } = create();

    expect(await provider.searchWork('Deep Learning')).toEqual({
      providerId: 'S1',
      title: 'Deep Learning',
      citationCount: 9,
      authors: [
        { authorId: '11', name: 'Ada' },
        { authorId: null, name: 'Anon' },
        { authorId: '22', name: 'Grace' }
      ]
    });
    expect(requests[0]?.url.searchParams.get('query')).toBe('"Deep Learning"');
    expect(requests[0]?.url.searchParams.get('limit')).toBe('1');
    expect(requests[0]?.headers['x-api-key']).toBe('test-key');
  });

  it('reads positional batch author results', async () => {
    const { provider, requests } = create();

    const table = await provider.getAuthorHIndices(['11', '22']);

    expect([...table.entries()]).toEqual([
      ['11', 3],
      ['22', null]
    ]);
    expect(requests[0]?.method).toBe('POST');
    expect(requests[0]?.url.pathname).toBe('/graph/v1/author/batch');
    expect(requests[0]?.body).toBe('{"ids":["11","22"]}');
    expect(requests[0]?.headers['content-type']).toBe('application/json');
  });
});
