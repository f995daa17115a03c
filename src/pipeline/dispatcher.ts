import type { DispatchOrder } from '../config.js';
import { OversizeBatchError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { batchEntryId, type BatchMaterializer, type Batcher } from './batcher.js';
import type { ContinuationScheduler } from './continuation.js';
import type { GroupWalker } from './group-walker.js';
import { emptyReport, mergeReports, type PublishFailure, type PublishReport, type QueuePublisher } from './queue-publisher.js';
import type { RecordSource } from './record-source.js';
import {
  addTotals,
  emptyTotals,
  type Batch,
  type DispatchCommand,
  type DispatchCursor,
  type DispatchState,
  type DispatchTotals,
  type OutboundMessage,
  type PaperRecord,
  type ResumeCommand
} from './types.js';

/** Milliseconds left before the host terminates the current invocation. */
export type RemainingTime = () => number;

export interface DispatcherOptions {
  continuationThresholdMs: number;
  dispatchOrder: DispatchOrder;
}

export interface DispatcherDependencies {
  source: RecordSource;
  walker: GroupWalker;
  batcher: Batcher;
  materializer: BatchMaterializer;
  publisher: QueuePublisher;
  continuation: ContinuationScheduler;
  logger: Logger;
  options: DispatcherOptions;
}

export interface DispatchInvocationResult {
  status: 'complete' | 'continued';
  invocation: number;
  /** Groups handled by this invocation, in processing order. */
  groups: string[];
  invocationTotals: DispatchTotals;
  chainTotals: DispatchTotals;
  failedEntries: PublishFailure[];
  resume?: ResumeCommand;
}

interface InvocationProgress {
  cursor: DispatchCursor;
  sequence: number;
  groups: string[];
  totals: DispatchTotals;
  report: PublishReport;
  collected: OutboundMessage[];
}

/**
 * Streams source groups into queued batches under a wall-clock budget. When the
 * budget runs low between groups it hands the cursor to the next invocation.
 */
export class Dispatcher {
  private readonly logger: Logger;

  constructor(private readonly deps: DispatcherDependencies) {
    this.logger = deps.logger.child('dispatcher');
  }

  async run(command: DispatchCommand, remainingTimeMs: RemainingTime): Promise<DispatchInvocationResult> {
    this.deps.walker.reset();
    const state = command.action === 'resume' ? command.state : await this.initialState();
    const progress: InvocationProgress = {
      cursor: state.cursor,
      sequence: state.nextBatchSequence,
      groups: [],
      totals: emptyTotals(),
      report: emptyReport(),
      collected: []
    };

    this.logger.info('Dispatch invocation started', {
      invocation: state.invocation,
      action: command.action,
      cursor: describeCursor(state.cursor)
    });

    for (;;) {
      const step = await this.deps.walker.next(progress.cursor);
      if (!step) {
        break;
      }

      // The first group always runs so every invocation advances the cursor.
      if (progress.groups.length > 0) {
        const remaining = remainingTimeMs();
        if (remaining < this.deps.options.continuationThresholdMs) {
          return this.handOff(state, progress, remaining);
        }
      }

      await this.dispatchGroup(step.key, progress);
      progress.groups.push(step.key);
      progress.cursor = step.after;
    }

    await this.flushCollected(progress);
    const chainTotals = addTotals(state.totals, progress.totals);

    this.logger.info('Dispatch complete', {
      invocation: state.invocation,
      invocationTotals: progress.totals,
      chainTotals
    });

    return {
      status: 'complete',
      invocation: state.invocation,
      groups: progress.groups,
      invocationTotals: progress.totals,
      chainTotals,
      failedEntries: progress.report.failed
    };
  }

  private async initialState(): Promise<DispatchState> {
    const cursor = await this.deps.walker.begin();
    return { cursor, nextBatchSequence: 0, invocation: 0, totals: emptyTotals() };
  }

  private async handOff(
    state: DispatchState,
    progress: InvocationProgress,
    remainingMs: number
  ): Promise<DispatchInvocationResult> {
    await this.flushCollected(progress);
    const chainTotals = addTotals(state.totals, progress.totals);
    const resume: ResumeCommand = {
      action: 'resume',
      state: {
        cursor: progress.cursor,
        nextBatchSequence: progress.sequence,
        invocation: state.invocation + 1,
        totals: chainTotals
      }
    };

    await this.deps.continuation.schedule(resume);

    this.logger.info('Time budget low, handed off dispatch', {
      invocation: state.invocation,
      remainingMs,
      continuation: this.deps.continuation.mode,
      cursor: describeCursor(progress.cursor),
      invocationTotals: progress.totals
    });

    return {
      status: 'continued',
      invocation: state.invocation,
      groups: progress.groups,
      invocationTotals: progress.totals,
      chainTotals,
      failedEntries: progress.report.failed,
      resume
    };
  }

  private async dispatchGroup(key: string, progress: InvocationProgress): Promise<void> {
    const reverse = this.deps.options.dispatchOrder === 'reverse';
    const records = this.validRecords(key, progress.totals);
    let batches = 0;

    for await (const batch of this.deps.batcher.split(records, key, progress.sequence)) {
      batches += 1;
      progress.sequence = batch.sequence + 1;
      progress.totals.batches += 1;
      progress.totals.records += batch.records.length;

      const messages = await this.materialize(batch, progress);
      if (messages.length === 0) {
        continue;
      }

      if (reverse) {
        progress.collected.push(...messages);
      } else {
        this.record(progress, await this.deps.publisher.publish(messages));
      }
    }

    progress.totals.files += 1;
    this.logger.debug('Group dispatched', { key, batches, strategy: this.deps.materializer.strategy });
  }

  private async materialize(batch: Batch, progress: InvocationProgress): Promise<OutboundMessage[]> {
    try {
      return await this.deps.materializer.materialize(batch);
    } catch (error) {
      if (!(error instanceof OversizeBatchError)) {
        throw error;
      }

      const failure: PublishFailure = { entryId: batchEntryId(batch), reason: error.message };
      this.logger.warn('Batch not published', { ...failure, sourceKey: batch.sourceKey });
      this.record(progress, { attempted: 1, sent: 0, calls: 0, failed: [failure] });
      return [];
    }
  }

  private async *validRecords(key: string, totals: DispatchTotals): AsyncGenerator<PaperRecord> {
    for await (const line of this.deps.source.readLines(key)) {
      if (line.valid) {
        yield line.record;
        continue;
      }

      totals.rejected += 1;
      this.logger.warn('Rejected invalid record', { key, lineNumber: line.lineNumber, reason: line.reason });
    }
  }

  private async flushCollected(progress: InvocationProgress): Promise<void> {
    if (progress.collected.length === 0) {
      return;
    }

    const messages = progress.collected.splice(0, progress.collected.length);
    this.record(progress, await this.deps.publisher.publish(messages, { reverse: true }));
  }

  private record(progress: InvocationProgress, report: PublishReport): void {
    progress.report = mergeReports(progress.report, report);
    progress.totals.publishFailures += report.failed.length;
  }
}

const describeCursor = (cursor: DispatchCursor): Record<string, unknown> =>
  cursor.kind === 'file-list'
    ? { kind: cursor.kind, startIndex: cursor.startIndex, files: cursor.fileList.length }
    : { kind: cursor.kind, continuationToken: cursor.continuationToken, offset: cursor.offset };
