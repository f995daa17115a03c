import { describe, expect, it } from 'vitest';
import { createHttpApp } from '../src/http/start-http-server.js';
import type { DispatchChainResult } from '../src/pipeline/dispatch-chain.js';
import { createWorkerRuntime } from '../src/runtime/create-runtime.js';
import { InMemoryObjectStore, createFetchStub, jsonResponse, silentLogger, testConfig } from './support/fakes.js';

const AUTH = { authorization: 'Bearer test-secret' };

const chainResult: DispatchChainResult = {
  invocations: [],
  totals: { files: 2, batches: 3, records: 250, rejected: 1, publishFailures: 0 }
};

const setup = (startDispatch: () => Promise<DispatchChainResult> = async () => chainResult) => {
  const { fetchImpl } = createFetchStub((request) =>
    request.url.searchParams.get('search') === '"Flaky"'
      ? new Response('busy', { status: 503 })
      : jsonResponse({
          results: [{ id: 'https://openalex.org/W1', display_name: 'Deep Learning', cited_by_count: 5, authorships: [] }]
        })
  );
  const runtime = createWorkerRuntime(testConfig(), { store: new InMemoryObjectStore(), fetchImpl, logger: silentLogger() });
  return createHttpApp(
    { httpHealthPath: '/health', httpApiKey: 'test-secret', provider: 'openalex' },
    { worker: runtime.worker, startDispatch, logger: silentLogger() }
  );
};

const post = (body: unknown, headers: Record<string, string> = AUTH): RequestInit => ({
  method: 'POST',
  headers: { 'content-type': 'application/json', ...headers },
  body: JSON.stringify(body)
});

describe('control server', () => {
  it('reports health without credentials', async () => {
    const { app } = setup();

    const response = await app.request('/health');

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: 'ok', provider: 'openalex', dispatch: 'idle' });
  });

  it('requires the bearer token', async () => {
    const { app } = setup();

    const response = await app.request('/enrich', post({ id: 'p1', title: 'Deep Learning' }, {}));

    expect(response.status).toBe(401);
    expect(await response.json()).toEqual({ error: 'Unauthorized' });
  });

  it('enriches a single record', async () => {
    const { app } = setup();

    const response = await app.request('/enrich', post({ id: 'p1', title: 'Deep Learning' }));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      outcome: 'success',
      key: 'citation_results/success/p1.json',
      result: {
        original_id: 'p1',
        searched_title: 'Deep Learning',
        found_title: 'Deep Learning',
        citation_count: 5,
        authors: []
      }
    });
  });

  it('answers 503 for a transient provider failure', async () => {
    const { app } = setup();

    const response = await app.request('/enrich', post({ id: 'p3', title: 'Flaky' }));

    expect(response.status).toBe(503);
    expect(await response.json()).toEqual({
      outcome: 'retriable',
      key: 'citation_results/error/p3_retriable.json',
      error: 'Provider openalex returned HTTP 503'
    });
  });

  it('rejects invalid records', async () => {
    const { app } = setup();

    const response = await app.request('/enrich', post({ title: 'No id' }));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'id: Required' });
  });

  it('runs one dispatch at a time', async () => {
    let finish: (result: DispatchChainResult) => void = () => undefined;
    const pending = new Promise<DispatchChainResult>((resolve) => {
      finish = resolve;
    });
    const { app, settled } = setup(() => pending);

    const first = await app.request('/dispatch', { method: 'POST', headers: AUTH });
    const second = await app.request('/dispatch', { method: 'POST', headers: AUTH });

    expect(first.status).toBe(202);
    expect(second.status).toBe(409);

    finish(chainResult);
    await settled();

    const state = await app.request('/dispatch', { headers: AUTH });
    expect(await state.json()).toMatchObject({ status: 'complete', invocations: 0, totals: chainResult.totals });
  });

  it('records a failed dispatch', async () => {
    const { app, settled } = setup(async () => {
      throw new Error('listing denied');
    });

    await app.request('/dispatch', { method: 'POST', headers: AUTH });
    await settled();

    const state = await app.request('/dispatch', { headers: AUTH });
    expect(await state.json()).toMatchObject({ status: 'failed', error: 'listing denied' });
  });
});
