import { Readable } from 'node:stream';
import type { SQSRecord } from 'aws-lambda';
import { parseConfig, type ConfigOverrides, type PipelineConfig } from '../../src/config.js';
import { Logger } from '../../src/core/logger.js';
import type { Clock } from '../../src/core/rate-limiter.js';
import type { BatchSendResult, QueueClient, QueueEntry, ReceivedMessage } from '../../src/queue/queue-client.js';
import type { ListPage, ObjectStore } from '../../src/storage/object-store.js';

export const INPUT_BUCKET = 'input-bucket';
export const OUTPUT_BUCKET = 'results-bucket';
export const QUEUE_URL = 'https://sqs.test/records';

/** Configuration built from the given settings only; the shell environment is ignored. */
export const testConfig = (overrides: ConfigOverrides = {}): PipelineConfig =>
  parseConfig(
    {
      INPUT_BUCKET,
      OUTPUT_BUCKET,
      QUEUE_URL,
      API_RETRY_ATTEMPTS: 0,
      API_REQUEST_INTERVAL_MS: 0,
      LOG_LEVEL: 'error',
      ...overrides
    },
    {}
  );

export const silentLogger = (): Logger => new Logger('error', {}, () => undefined);

export const recordingLogger = (): { logger: Logger; lines: string[] } => {
  const lines: string[] = [];
  return { logger: new Logger('debug', {}, (line) => lines.push(line)), lines };
};

interface StoredObject {
  body: string;
  contentType: string;
}

/** Object store kept in memory; listings are sorted and paginated by `pageSize`. */
export class InMemoryObjectStore implements ObjectStore {
  private readonly objects = new Map<string, StoredObject>();
  listCalls = 0;

  constructor(private readonly pageSize = 1000) {}

  seed(bucket: string, key: string, body: string, contentType = 'application/x-ndjson'): void {
    this.objects.set(`${bucket}/${key}`, { body, contentType });
  }

  read(bucket: string, key: string): string | undefined {
    return this.objects.get(`${bucket}/${key}`)?.body;
  }

  contentType(bucket: string, key: string): string | undefined {
    return this.objects.get(`${bucket}/${key}`)?.contentType;
  }

  readJson(bucket: string, key: string): unknown {
    const body = this.read(bucket, key);
    if (body === undefined) {
      throw new Error(`No object ${bucket}/${key}`);
    }

    const value: unknown = JSON.parse(body);
    return value;
  }

  keys(bucket: string, prefix = ''): string[] {
    return [...this.objects.keys()]
      .filter((name) => name.startsWith(`${bucket}/`))
      .map((name) => name.slice(bucket.length + 1))
      .filter((key) => key.startsWith(prefix))
      .sort();
  }

  async listKeys(bucket: string, prefix: string, continuationToken?: string | null): Promise<ListPage> {
    this.listCalls += 1;
    const keys = this.keys(bucket, prefix);
    const start = continuationToken ? Number(continuationToken) : 0;
    const end = start + this.pageSize;

    return {
      keys: keys.slice(start, end),
      nextContinuationToken: end < keys.length ? String(end) : null
    };
  }

  async getObjectStream(bucket: string, key: string): Promise<Readable> {
    const stored = this.objects.get(`${bucket}/${key}`);
    if (!stored) {
      throw new Error(`NoSuchKey: ${key}`);
    }

    return Readable.from([stored.body]);
  }

  async headObject(bucket: string, key: string): Promise<boolean> {
    return this.objects.has(`${bucket}/${key}`);
  }

  async putObject(bucket: string, key: string, body: string, contentType: string): Promise<void> {
    this.objects.set(`${bucket}/${key}`, { body, contentType });
  }
}

/** Queue client that records every call and can reject chosen entries. */
export class RecordingQueueClient implements QueueClient {
  readonly batchCalls: QueueEntry[][] = [];
  readonly sent: Array<{ queueUrl: string; body: string }> = [];
  readonly deleted: string[] = [];
  readonly inbox: ReceivedMessage[] = [];
  readonly rejectIds = new Set<string>();
  throwOnCall?: number;

  async sendMessage(queueUrl: string, body: string): Promise<void> {
    this.sent.push({ queueUrl, body });
  }

  async sendMessageBatch(_queueUrl: string, entries: QueueEntry[]): Promise<BatchSendResult> {
    const call = this.batchCalls.length;
    this.batchCalls.push(entries.map((entry) => ({ ...entry })));
    if (this.throwOnCall === call) {
      throw new Error('queue unavailable');
    }

    return {
      successful: entries.filter((entry) => !this.rejectIds.has(entry.id)).map((entry) => entry.id),
      failed: entries
        .filter((entry) => this.rejectIds.has(entry.id))
        .map((entry) => ({ id: entry.id, code: 'InvalidMessageContents', message: 'rejected', senderFault: true }))
    };
  }

  async receiveMessages(_queueUrl: string, maxMessages: number): Promise<ReceivedMessage[]> {
    return this.inbox.splice(0, maxMessages);
  }

  async deleteMessage(_queueUrl: string, receiptHandle: string): Promise<void> {
    this.deleted.push(receiptHandle);
  }

  get entryIds(): string[] {
    return this.batchCalls.flat().map((entry) => entry.id);
  }

  get bodies(): string[] {
    return this.batchCalls.flat().map((entry) => entry.body);
  }
}

export class FakeClock implements Clock {
  current = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export interface RecordedRequest {
  url: URL;
  method: string;
  headers: Record<string, string>;
  body?: string;
}

export type FetchRoute = (request: RecordedRequest) => Response | Promise<Response>;

export const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

export const createFetchStub = (route: FetchRoute): { fetchImpl: typeof fetch; requests: RecordedRequest[] } => {
  const requests: RecordedRequest[] = [];

  const fetchImpl: typeof fetch = async (input, init) => {
    const request: RecordedRequest = {
      url: new URL(input instanceof Request ? input.url : input.toString()),
      method: init?.method ?? 'GET',
      headers: Object.fromEntries(new Headers(init?.headers).entries()),
      ...(typeof init?.body === 'string' ? { body: init.body } : {})
    };
    requests.push(request);
    return route(request);
  };

  return { fetchImpl, requests };
};

export const jsonLines = (values: unknown[]): string => values.map((value) => JSON.stringify(value)).join('\n');

export const sqsRecord = (messageId: string, body: string): SQSRecord => ({
  messageId,
  receiptHandle: `receipt-${messageId}`,
  body,
  attributes: {
    ApproximateReceiveCount: '1',
    SentTimestamp: '0',
    SenderId: 'test-sender',
    ApproximateFirstReceiveTimestamp: '0'
  },
  messageAttributes: {},
  md5OfBody: '',
  eventSource: 'aws:sqs',
  eventSourceARN: 'arn:aws:sqs:us-east-1:000000000000:records',
  awsRegion: 'us-east-1'
});
