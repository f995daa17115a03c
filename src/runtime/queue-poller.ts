import { setTimeout as sleep } from 'node:timers/promises';
import { describeError, Logger } from '../core/logger.js';
import type { DeliveryHandler, DeliveryReport } from '../pipeline/delivery-handler.js';
import type { QueueClient, ReceivedMessage } from '../queue/queue-client.js';

export interface QueuePollerOptions {
  queueUrl: string;
  maxMessages: number;
  waitSeconds: number;
  /** Pause after a failed receive before polling again. */
  errorBackoffMs?: number;
}

export interface PollSummary {
  polls: number;
  received: number;
  acknowledged: number;
  redelivered: number;
}

/**
 * Long-polls the record queue outside Lambda. Acknowledged deliveries are deleted;
 * the rest are left to reappear once their visibility timeout lapses.
 */
export class QueuePoller {
  private readonly logger: Logger;

  constructor(
    private readonly queue: QueueClient,
    private readonly deliveries: DeliveryHandler,
    private readonly options: QueuePollerOptions,
    logger: Logger
  ) {
    this.logger = logger.child('queue-poller');
  }

  async pollOnce(): Promise<DeliveryReport[]> {
    const messages = await this.queue.receiveMessages(
      this.options.queueUrl,
      this.options.maxMessages,
      this.options.waitSeconds
    );

    if (messages.length === 0) {
      return [];
    }

    const reports = await this.deliveries.handleAll(
      messages.map((message) => ({ messageId: message.messageId, body: message.body }))
    );

    for (const [index, report] of reports.entries()) {
      const message = messages[index];
      if (message && report.disposition === 'ack') {
        await this.acknowledge(message);
      }
    }

    return reports;
  }

  async run(signal: AbortSignal): Promise<PollSummary> {
    const summary: PollSummary = { polls: 0, received: 0, acknowledged: 0, redelivered: 0 };
    this.logger.info('Polling started', { queueUrl: this.options.queueUrl });

    while (!signal.aborted) {
      let reports: DeliveryReport[];
      try {
        reports = await this.pollOnce();
      } catch (error) {
        this.logger.error('Poll failed', describeError(error));
        await sleep(this.options.errorBackoffMs ?? 5000, undefined, { signal }).catch((sleepError: unknown) => {
          if (!signal.aborted) {
            throw sleepError;
          }
        });
        continue;
      }

      summary.polls += 1;
      summary.received += reports.length;
      for (const report of reports) {
        if (report.disposition === 'ack') {
          summary.acknowledged += 1;
        } else {
          summary.redelivered += 1;
        }
      }
    }

    this.logger.info('Polling stopped', { ...summary });
    return summary;
  }

  private async acknowledge(message: ReceivedMessage): Promise<void> {
    try {
      await this.queue.deleteMessage(this.options.queueUrl, message.receiptHandle);
    } catch (error) {
      this.logger.warn('Failed to delete processed message, it will be delivered again', {
        messageId: message.messageId,
        ...describeError(error)
      });
    }
  }
}
