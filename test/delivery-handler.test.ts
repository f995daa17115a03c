import { describe, expect, it } from 'vitest';
import { digest } from '../src/core/utils.js';
import { createWorkerRuntime } from '../src/runtime/create-runtime.js';
import {
  INPUT_BUCKET,
  InMemoryObjectStore,
  OUTPUT_BUCKET,
  createFetchStub,
  jsonLines,
  jsonResponse,
  silentLogger,
  testConfig
} from './support/fakes.js';

// Every title matches a work without authors, except "Flaky", which fails transiently.
const setup = () => {
  const store = new InMemoryObjectStore();
  const { fetchImpl } = createFetchStub((request) => {
    const search = request.url.searchParams.get('search');
    if (search === '"Flaky"') {
      return new Response('busy', { status: 503 });
    }

    return jsonResponse({
      results: [{ id: 'https://openalex.org/W1', display_name: search, cited_by_count: 3, authorships: [] }]
    });
  });
  const runtime = createWorkerRuntime(testConfig(), { store, fetchImpl, logger: silentLogger() });
  return { store, handler: runtime.deliveries };
};

const counts = (overrides: Partial<Record<string, number>>) => ({
  success: 0,
  not_found: 0,
  skipped: 0,
  retriable: 0,
  permanent: 0,
  unexpected: 0,
  ...overrides
});

describe('DeliveryHandler', () => {
  it('processes an inline batch and records invalid items as permanent errors', async () => {
    const { store, handler } = setup();

    const report = await handler.handle({
      messageId: 'm1',
      body: JSON.stringify([{ id: 'p1', title: 'One' }, { id: 'x' }, { paper_id: 2, title: 'Two' }])
    });

    expect(report).toEqual({
      messageId: 'm1',
      disposition: 'ack',
      records: 3,
      counts: counts({ success: 2, permanent: 1 })
    });
    expect(store.readJson(OUTPUT_BUCKET, 'citation_results/error/x_permanent_error.json')).toMatchObject({
      error_type: 'MalformedMessageError',
      error_message: 'title: Required',
      original_message: '{"id":"x"}',
      retriable: false
    });
    expect(store.keys(OUTPUT_BUCKET, 'citation_results/success/')).toEqual([
      'citation_results/success/2.json',
      'citation_results/success/p1.json'
    ]);
  });

  it('reads a staged batch named by bucket and key', async () => {
    const { store, handler } = setup();
    store.seed(INPUT_BUCKET, 'citation_batches_tmp/batch_0.jsonl', jsonLines([{ id: 'p1', title: 'One' }, { id: 'p2', title: 'Two' }]));

    const report = await handler.handle({
      messageId: 'm2',
      body: '{"bucket":"input-bucket","key":"citation_batches_tmp/batch_0.jsonl"}'
    });

    expect(report.disposition).toBe('ack');
    expect(report.counts).toEqual(counts({ success: 2 }));
  });

  it('reads a staged batch named only by key from the input bucket', async () => {
    const { store, handler } = setup();
    store.seed(INPUT_BUCKET, 'citation_batches_tmp/batch_1.jsonl', jsonLines([{ id: 'p3', title: 'Three' }]));

    const report = await handler.handle({
      messageId: 'm3',
      body: '{"batch_id":1,"s3_key":"citation_batches_tmp/batch_1.jsonl"}'
    });

    expect(report.counts).toEqual(counts({ success: 1 }));
  });

  it('redelivers when the staged batch cannot be read', async () => {
    const { store, handler } = setup();

    const report = await handler.handle({ messageId: 'm4', body: '{"bucket":"input-bucket","key":"missing.jsonl"}' });

    expect(report.disposition).toBe('redeliver');
    expect(report.records).toBe(0);
    expect(report.reason).toBe(
      'Cannot read staged batch s3://input-bucket/missing.jsonl: Failed to read missing.jsonl: NoSuchKey: missing.jsonl'
    );
    expect(store.keys(OUTPUT_BUCKET)).toEqual([]);
  });

  it('acknowledges a body that is not JSON and stores it as a permanent error', async () => {
    const { store, handler } = setup();

    const report = await handler.handle({ messageId: 'm5', body: 'oops' });

    expect(report.disposition).toBe('ack');
    expect(report.counts).toEqual(counts({ permanent: 1 }));
    expect(store.keys(OUTPUT_BUCKET)).toEqual([`citation_results/error/malformed_${digest('oops')}_permanent_error.json`]);
  });

  it('processes a single record message', async () => {
    const { store, handler } = setup();

    const report = await handler.handle({ messageId: 'm6', body: '{"paper_id":"p7","title":"Seven"}' });

    expect(report.counts).toEqual(counts({ success: 1 }));
    expect(store.readJson(OUTPUT_BUCKET, 'citation_results/success/p7.json')).toMatchObject({
      original_id: 'p7',
      searched_title: 'Seven',
      citation_count: 3
    });
  });

  it('redelivers a batch with a transient failure after finishing its siblings', async () => {
    const { store, handler } = setup();

    const report = await handler.handle({
      messageId: 'm7',
      body: JSON.stringify([{ id: 'p1', title: 'One' }, { id: 'p3', title: 'Flaky' }])
    });

    expect(report.disposition).toBe('redeliver');
    expect(report.counts).toEqual(counts({ success: 1, retriable: 1 }));
    expect(store.keys(OUTPUT_BUCKET)).toEqual([
      'citation_results/error/p3_retriable.json',
      'citation_results/success/p1.json'
    ]);
  });

  it('keeps one report per delivery in order', async () => {
    const { handler } = setup();

    const reports = await handler.handleAll([
      { messageId: 'a', body: '{"id":"p1","title":"One"}' },
      { messageId: 'b', body: '{"id":"p3","title":"Flaky"}' }
    ]);

    expect(reports.map((report) => [report.messageId, report.disposition])).toEqual([
      ['a', 'ack'],
      ['b', 'redeliver']
    ]);
  });
});
