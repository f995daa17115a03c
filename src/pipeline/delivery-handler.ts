import { z } from 'zod';
import { BatchContainerError, MalformedMessageError, RecordSourceError } from '../core/errors.js';
import { describeError, Logger } from '../core/logger.js';
import { digest, errorMessage } from '../core/utils.js';
import type { EnrichmentWorker } from './enrichment-worker.js';
import type { ObjectStore } from '../storage/object-store.js';
import { RecordSource } from './record-source.js';
import { parseJson, salvageRecordId, toPaperRecord } from './records.js';
import type { PaperRecord } from './types.js';

export interface Delivery {
  messageId: string;
  body: string;
}

export type Disposition = 'ack' | 'redeliver';

export interface DeliveryCounts {
  success: number;
  not_found: number;
  skipped: number;
  retriable: number;
  permanent: number;
  unexpected: number;
}

export interface DeliveryReport {
  messageId: string;
  disposition: Disposition;
  records: number;
  counts: DeliveryCounts;
  reason?: string;
}

type DeliveryItem =
  | { valid: true; record: PaperRecord; original: string }
  | { valid: false; recordId: string; original: string; reason: string };

type DecodedDelivery =
  | { kind: 'records'; container: 'inline' | 'staged' | 'single'; items: DeliveryItem[] }
  | { kind: 'malformed'; recordId: string; reason: string };

const stagedReferenceSchema = z.object({
  bucket: z.string().min(1),
  key: z.string().min(1)
});

const legacyStagedReferenceSchema = z.object({
  batch_id: z.union([z.string(), z.number()]),
  s3_key: z.string().min(1)
});

const emptyCounts = (): DeliveryCounts => ({
  success: 0,
  not_found: 0,
  skipped: 0,
  retriable: 0,
  permanent: 0,
  unexpected: 0
});

const malformedId = (text: string): string => `malformed_${digest(text)}`;

const toItem = (value: unknown): DeliveryItem => {
  const original = JSON.stringify(value);
  const record = toPaperRecord(value);
  return record.ok
    ? { valid: true, record: record.value, original }
    : { valid: false, recordId: salvageRecordId(value) ?? malformedId(original), original, reason: record.error };
};

/**
 * Adapts queue deliveries to the enrichment worker. A delivery is acknowledged unless
 * a record failed transiently, its batch container could not be read, or an
 * unexpected fault escaped record handling.
 */
export class DeliveryHandler {
  private readonly logger: Logger;

  constructor(
    private readonly worker: EnrichmentWorker,
    private readonly store: ObjectStore,
    /** Bucket for batch references that name only a key. */
    private readonly defaultBucket: string | undefined,
    logger: Logger
  ) {
    this.logger = logger.child('delivery-handler');
  }

  async handleAll(deliveries: readonly Delivery[]): Promise<DeliveryReport[]> {
    const reports: DeliveryReport[] = [];

    for (const delivery of deliveries) {
      try {
        reports.push(await this.handle(delivery));
      } catch (error) {
        this.logger.error('Delivery handling failed unexpectedly', { messageId: delivery.messageId, ...describeError(error) });
        reports.push({
          messageId: delivery.messageId,
          disposition: 'redeliver',
          records: 0,
          counts: { ...emptyCounts(), unexpected: 1 },
          reason: errorMessage(error)
        });
      }
    }

    return reports;
  }

  async handle(delivery: Delivery): Promise<DeliveryReport> {
    let decoded: DecodedDelivery;
    try {
      decoded = await this.decode(delivery.body);
    } catch (error) {
      if (!(error instanceof BatchContainerError)) {
        throw error;
      }

      this.logger.error('Batch container unreadable, delivery will be retried', {
        messageId: delivery.messageId,
        ...describeError(error),
        ...(error.details ?? {})
      });
      return { messageId: delivery.messageId, disposition: 'redeliver', records: 0, counts: emptyCounts(), reason: error.message };
    }

    const counts = emptyCounts();

    if (decoded.kind === 'malformed') {
      await this.worker.fail(decoded.recordId, new MalformedMessageError(decoded.reason), delivery.body, false);
      counts.permanent += 1;
      return { messageId: delivery.messageId, disposition: 'ack', records: 0, counts, reason: decoded.reason };
    }

    for (const item of decoded.items) {
      if (!item.valid) {
        await this.worker.fail(item.recordId, new MalformedMessageError(item.reason), item.original, false);
        counts.permanent += 1;
        continue;
      }

      try {
        const result = await this.worker.processRecord(item.record, item.original);
        counts[result.ok ? result.value.kind : result.error.kind] += 1;
      } catch (error) {
        counts.unexpected += 1;
        this.logger.error('Unexpected failure while processing record', {
          messageId: delivery.messageId,
          recordId: item.record.id,
          ...describeError(error)
        });
      }
    }

    const disposition: Disposition = counts.retriable > 0 || counts.unexpected > 0 ? 'redeliver' : 'ack';
    this.logger.info('Delivery processed', {
      messageId: delivery.messageId,
      container: decoded.container,
      records: decoded.items.length,
      disposition,
      counts
    });

    return { messageId: delivery.messageId, disposition, records: decoded.items.length, counts };
  }

  private async decode(body: string): Promise<DecodedDelivery> {
    const parsed = parseJson(body);
    if (!parsed.ok) {
      return { kind: 'malformed', recordId: malformedId(body), reason: `Message body is not JSON: ${parsed.error}` };
    }

    const value = parsed.value;
    if (Array.isArray(value)) {
      return { kind: 'records', container: 'inline', items: value.map(toItem) };
    }

    const staged = stagedReferenceSchema.safeParse(value);
    if (staged.success) {
      return { kind: 'records', container: 'staged', items: await this.loadStaged(staged.data.bucket, staged.data.key) };
    }

    const legacy = legacyStagedReferenceSchema.safeParse(value);
    if (legacy.success) {
      if (!this.defaultBucket) {
        throw new BatchContainerError('No input bucket configured for batch references without a bucket', {
          key: legacy.data.s3_key
        });
      }
      return { kind: 'records', container: 'staged', items: await this.loadStaged(this.defaultBucket, legacy.data.s3_key) };
    }

    const record = toPaperRecord(value);
    if (record.ok) {
      return { kind: 'records', container: 'single', items: [{ valid: true, record: record.value, original: body }] };
    }

    return { kind: 'malformed', recordId: salvageRecordId(value) ?? malformedId(body), reason: record.error };
  }

  private async loadStaged(bucket: string, key: string): Promise<DeliveryItem[]> {
    const source = new RecordSource(this.store, bucket);
    const items: DeliveryItem[] = [];
    try {
      for await (const line of source.readLines(key)) {
        items.push(
          line.valid
            ? { valid: true, record: line.record, original: JSON.stringify(line.record) }
            : {
                valid: false,
                recordId: salvageRecordId(parseJsonOrNull(line.line)) ?? malformedId(line.line),
                original: line.line,
                reason: line.reason
              }
        );
      }
    } catch (error) {
      if (error instanceof RecordSourceError) {
        throw new BatchContainerError(`Cannot read staged batch s3://${bucket}/${key}: ${error.message}`, { bucket, key });
      }
      throw error;
    }

    return items;
  }
}

const parseJsonOrNull = (text: string): unknown => {
  const parsed = parseJson(text);
  return parsed.ok ? parsed.value : null;
};
