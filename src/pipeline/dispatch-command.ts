import { z } from 'zod';
import { PipelineError } from '../core/errors.js';
import type { DispatchCommand, DispatchCursor, DispatchTotals } from './types.js';

const count = z.number().int().min(0);

const fileListCursorSchema = z.object({
  file_list: z.array(z.string().min(1)),
  start_index: count
});

const pagedCursorSchema = z.object({
  prefix: z.string(),
  continuation_token: z.string().min(1).nullable(),
  offset: count
});

const totalsSchema = z.object({
  files: count,
  batches: count,
  records: count,
  rejected: count,
  publish_failures: count
});

const resumeSchema = z.object({
  action: z.literal('resume'),
  cursor: z.union([fileListCursorSchema, pagedCursorSchema]),
  next_batch_number: count,
  invocation: count,
  totals: totalsSchema
});

const startSchema = z.object({ action: z.literal('start').optional() });

export type DispatchCommandWire = z.input<typeof resumeSchema> | { action: 'start' };

const toCursor = (wire: z.infer<typeof resumeSchema>['cursor']): DispatchCursor =>
  'file_list' in wire
    ? { kind: 'file-list', fileList: wire.file_list, startIndex: wire.start_index }
    : { kind: 'paged', prefix: wire.prefix, continuationToken: wire.continuation_token, offset: wire.offset };

const toTotals = (wire: z.infer<typeof totalsSchema>): DispatchTotals => ({
  files: wire.files,
  batches: wire.batches,
  records: wire.records,
  rejected: wire.rejected,
  publishFailures: wire.publish_failures
});

/**
 * Decodes a hand-off payload. Anything without an `action` (an empty object, a
 * scheduled trigger) starts a fresh chain.
 */
export const decodeDispatchCommand = (payload: unknown): DispatchCommand => {
  if (payload === undefined || payload === null) {
    return { action: 'start' };
  }

  const resumed = resumeSchema.safeParse(payload);
  if (resumed.success) {
    return {
      action: 'resume',
      state: {
        cursor: toCursor(resumed.data.cursor),
        nextBatchSequence: resumed.data.next_batch_number,
        invocation: resumed.data.invocation,
        totals: toTotals(resumed.data.totals)
      }
    };
  }

  const started = startSchema.safeParse(payload);
  if (started.success && typeof payload === 'object' && !('cursor' in payload)) {
    return { action: 'start' };
  }

  throw new PipelineError('Invalid dispatch command', {
    issues: resumed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
  });
};

export const encodeDispatchCommand = (command: DispatchCommand): DispatchCommandWire => {
  if (command.action === 'start') {
    return { action: 'start' };
  }

  const { cursor, nextBatchSequence, invocation, totals } = command.state;
  return {
    action: 'resume',
    cursor:
      cursor.kind === 'file-list'
        ? { file_list: cursor.fileList, start_index: cursor.startIndex }
        : { prefix: cursor.prefix, continuation_token: cursor.continuationToken, offset: cursor.offset },
    next_batch_number: nextBatchSequence,
    invocation,
    totals: {
      files: totals.files,
      batches: totals.batches,
      records: totals.records,
      rejected: totals.rejected,
      publish_failures: totals.publishFailures
    }
  };
};
