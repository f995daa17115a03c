import { describeError, Logger } from '../core/logger.js';
import { chunk, errorMessage } from '../core/utils.js';
import {
  MAX_ENTRIES_PER_CALL,
  MAX_ENTRY_ID_LENGTH,
  type QueueClient,
  type QueueEntry
} from '../queue/queue-client.js';
import type { OutboundMessage } from './types.js';

export interface PublishFailure {
  entryId: string;
  reason: string;
}

export interface PublishReport {
  attempted: number;
  sent: number;
  calls: number;
  failed: PublishFailure[];
}

export interface PublishOptions {
  /** Send the sequence last-to-first, so the newest batch is consumed first. */
  reverse?: boolean;
}

export const toEntryId = (raw: string): string => {
  const cleaned = raw.replace(/[^A-Za-z0-9_-]/g, '_').slice(0, MAX_ENTRY_ID_LENGTH);
  return cleaned.length > 0 ? cleaned : 'entry';
};

const withUniqueIds = (messages: readonly OutboundMessage[]): QueueEntry[] => {
  const seen = new Set<string>();

  return messages.map((message) => {
    const base = toEntryId(message.entryId);
    let id = base;
    let counter = 1;

    while (seen.has(id)) {
      const suffix = `_${counter}`;
      id = `${base.slice(0, MAX_ENTRY_ID_LENGTH - suffix.length)}${suffix}`;
      counter += 1;
    }

    seen.add(id);
    return { id, body: message.body };
  });
};

export const emptyReport = (): PublishReport => ({ attempted: 0, sent: 0, calls: 0, failed: [] });

export const mergeReports = (left: PublishReport, right: PublishReport): PublishReport => ({
  attempted: left.attempted + right.attempted,
  sent: left.sent + right.sent,
  calls: left.calls + right.calls,
  failed: [...left.failed, ...right.failed]
});

export class QueuePublisher {
  private readonly logger: Logger;

  constructor(
    private readonly queue: QueueClient,
    private readonly queueUrl: string,
    logger: Logger
  ) {
    this.logger = logger.child('queue-publisher');
  }

  /**
   * Sends messages in calls of at most ten entries. Failed entries are logged and
   * reported, never retried here.
   */
  async publish(messages: readonly OutboundMessage[], options: PublishOptions = {}): Promise<PublishReport> {
    const ordered = options.reverse ? [...messages].reverse() : messages;
    const report = emptyReport();

    for (const entries of chunk(ordered, MAX_ENTRIES_PER_CALL).map(withUniqueIds)) {
      report.attempted += entries.length;
      report.calls += 1;

      try {
        const result = await this.queue.sendMessageBatch(this.queueUrl, entries);
        report.sent += result.successful.length;

        for (const failure of result.failed) {
          this.logger.error('Queue entry rejected', {
            entryId: failure.id,
            code: failure.code,
            reason: failure.message,
            senderFault: failure.senderFault
          });
          report.failed.push({ entryId: failure.id, reason: `${failure.code}: ${failure.message}` });
        }
      } catch (error) {
        this.logger.error('Queue batch send failed', {
          entryIds: entries.map((entry) => entry.id),
          ...describeError(error)
        });
        report.failed.push(...entries.map((entry) => ({ entryId: entry.id, reason: errorMessage(error) })));
      }
    }

    return report;
  }
}
