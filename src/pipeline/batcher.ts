import { OversizeBatchError } from '../core/errors.js';
import { joinKey, type ObjectStore } from '../storage/object-store.js';
import { encodeRecordLines } from './records.js';
import type { Batch, OutboundMessage, PaperRecord } from './types.js';
import type { BatchStrategy } from '../config.js';

/** SQS rejects message bodies above 256 KiB. */
export const MAX_MESSAGE_BYTES = 256 * 1024;

export class Batcher {
  constructor(readonly batchSize: number) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError(`Batch size must be a positive integer, got ${batchSize}`);
    }
  }

  /**
   * Splits a record stream into batches of `batchSize`; only the last may be shorter.
   * Sequences start at `firstSequence` so a resumed dispatch keeps numbering.
   */
  async *split(
    records: AsyncIterable<PaperRecord>,
    sourceKey: string,
    firstSequence = 0
  ): AsyncGenerator<Batch> {
    let buffer: PaperRecord[] = [];
    let sequence = firstSequence;

    for await (const record of records) {
      buffer.push(record);

      if (buffer.length >= this.batchSize) {
        yield { sequence, sourceKey, records: buffer };
        buffer = [];
        sequence += 1;
      }
    }

    if (buffer.length > 0) {
      yield { sequence, sourceKey, records: buffer };
    }
  }
}

export interface BatchMaterializer {
  readonly strategy: BatchStrategy;
  materialize(batch: Batch): Promise<OutboundMessage[]>;
}

export const batchEntryId = (batch: Batch): string => `batch_${batch.sequence}`;

export const stagedBatchKey = (batchPrefix: string, sequence: number): string =>
  joinKey(batchPrefix, `batch_${sequence}.jsonl`);

/** Writes each batch as a JSONL object and queues only its address. */
export class StagedBatchMaterializer implements BatchMaterializer {
  readonly strategy = 'staged';

  constructor(
    private readonly store: ObjectStore,
    private readonly bucket: string,
    private readonly batchPrefix: string
  ) {}

  async materialize(batch: Batch): Promise<OutboundMessage[]> {
    const key = stagedBatchKey(this.batchPrefix, batch.sequence);
    await this.store.putObject(this.bucket, key, encodeRecordLines(batch.records), 'application/x-ndjson');

    return [
      {
        entryId: batchEntryId(batch),
        body: JSON.stringify({ bucket: this.bucket, key })
      }
    ];
  }
}

export class InlineBatchMaterializer implements BatchMaterializer {
  readonly strategy = 'inline';

  async materialize(batch: Batch): Promise<OutboundMessage[]> {
    const body = JSON.stringify(batch.records.map((record) => ({ id: record.id, title: record.title })));
    const size = Buffer.byteLength(body, 'utf8');
    if (size > MAX_MESSAGE_BYTES) {
      throw new OversizeBatchError(`Inline batch ${batch.sequence} is ${size} bytes, above the ${MAX_MESSAGE_BYTES} byte message limit`, {
        sequence: batch.sequence,
        records: batch.records.length
      });
    }

    return [{ entryId: batchEntryId(batch), body }];
  }
}

/** One message per record, keyed by the record id. */
export class RecordMessageMaterializer implements BatchMaterializer {
  readonly strategy = 'record';

  async materialize(batch: Batch): Promise<OutboundMessage[]> {
    return batch.records.map((record) => ({
      entryId: record.id,
      body: JSON.stringify({ id: record.id, title: record.title })
    }));
  }
}
