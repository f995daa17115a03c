import type { SQSBatchResponse, SQSEvent } from 'aws-lambda';
import { parseConfig } from '../config.js';
import { createWorkerRuntime, type WorkerRuntime } from '../runtime/create-runtime.js';

/**
 * SQS-triggered enrichment. Deliveries that must be retried are reported as batch
 * item failures, so the rest of the batch is removed from the queue.
 */
export const createWorkerHandler =
  (getRuntime: () => WorkerRuntime) =>
  async (event: SQSEvent): Promise<SQSBatchResponse> => {
    const runtime = getRuntime();
    const reports = await runtime.deliveries.handleAll(
      event.Records.map((record) => ({ messageId: record.messageId, body: record.body }))
    );

    const batchItemFailures = reports
      .filter((report) => report.disposition === 'redeliver')
      .map((report) => ({ itemIdentifier: report.messageId }));

    runtime.logger.info('Worker invocation finished', {
      deliveries: reports.length,
      redelivered: batchItemFailures.length
    });

    return { batchItemFailures };
  };

let runtime: WorkerRuntime | undefined;

// Built on first invocation and reused while the container stays warm.
const sharedRuntime = (): WorkerRuntime => {
  runtime ??= createWorkerRuntime(parseConfig());
  return runtime;
};

export const handler = createWorkerHandler(sharedRuntime);
