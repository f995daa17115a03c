import type { SQSBatchResponse } from 'aws-lambda';
import { z } from 'zod';
import { parseConfig } from '../config.js';
import { PipelineError } from '../core/errors.js';
import { describeError } from '../core/logger.js';
import { decodeDispatchCommand } from '../pipeline/dispatch-command.js';
import type { DispatchInvocationResult } from '../pipeline/dispatcher.js';
import { parseJson } from '../pipeline/records.js';
import type { DispatchCommand, DispatchTotals } from '../pipeline/types.js';
import { createDispatcherRuntime, type DispatcherRuntime } from '../runtime/create-runtime.js';

export interface InvocationContext {
  getRemainingTimeInMillis(): number;
}

export interface DispatchSummary {
  status: DispatchInvocationResult['status'];
  invocation: number;
  groups: number;
  invocationTotals: DispatchTotals;
  chainTotals: DispatchTotals;
  failedEntries: number;
}

const controlEventSchema = z.object({
  Records: z.array(
    z.object({
      messageId: z.string(),
      body: z.string(),
      eventSource: z.literal('aws:sqs').optional()
    })
  )
});

const decodeControlMessage = (body: string): DispatchCommand => {
  const parsed = parseJson(body);
  if (!parsed.ok) {
    throw new PipelineError(`Control message is not JSON: ${parsed.error}`);
  }

  return decodeDispatchCommand(parsed.value);
};

const summarize = (result: DispatchInvocationResult): DispatchSummary => ({
  status: result.status,
  invocation: result.invocation,
  groups: result.groups.length,
  invocationTotals: result.invocationTotals,
  chainTotals: result.chainTotals,
  failedEntries: result.failedEntries.length
});

/**
 * Entry point of the dispatch chain. A direct invocation carries one command (empty
 * for a fresh start); a control-queue trigger carries one command per record.
 */
export const createDispatcherHandler =
  (getRuntime: () => DispatcherRuntime) =>
  async (event: unknown, context: InvocationContext): Promise<DispatchSummary | SQSBatchResponse> => {
    const runtime = getRuntime();
    const remaining = () => context.getRemainingTimeInMillis();

    const control = controlEventSchema.safeParse(event);
    if (!control.success) {
      return summarize(await runtime.dispatcher.run(decodeDispatchCommand(event), remaining));
    }

    const batchItemFailures: SQSBatchResponse['batchItemFailures'] = [];
    for (const record of control.data.Records) {
      let command: DispatchCommand;
      try {
        command = decodeControlMessage(record.body);
      } catch (error) {
        runtime.logger.error('Discarding undecodable control message', {
          messageId: record.messageId,
          ...describeError(error)
        });
        continue;
      }

      try {
        await runtime.dispatcher.run(command, remaining);
      } catch (error) {
        runtime.logger.error('Dispatch invocation failed', { messageId: record.messageId, ...describeError(error) });
        batchItemFailures.push({ itemIdentifier: record.messageId });
      }
    }

    return { batchItemFailures };
  };

let runtime: DispatcherRuntime | undefined;

const sharedRuntime = (): DispatcherRuntime => {
  runtime ??= createDispatcherRuntime(parseConfig());
  return runtime;
};

export const handler = createDispatcherHandler(sharedRuntime);
