import { AwsClients } from '../aws/clients.js';
import { SqsQueueClient } from '../aws/sqs-queue-client.js';
import { requireSetting, type PipelineConfig } from '../config.js';
import { PipelineError } from '../core/errors.js';
import { InProcessContinuationScheduler } from '../pipeline/continuation.js';
import { runDispatchChain, type DispatchChainResult } from '../pipeline/dispatch-chain.js';
import { decodeDispatchCommand } from '../pipeline/dispatch-command.js';
import { parseJson } from '../pipeline/records.js';
import type { DispatchCommand } from '../pipeline/types.js';
import { createDispatcherRuntime, createWorkerRuntime, type RuntimeOverrides } from '../runtime/create-runtime.js';
import { QueuePoller, type PollSummary } from '../runtime/queue-poller.js';

export const parseResumeArgument = (text: string): DispatchCommand => {
  const parsed = parseJson(text);
  if (!parsed.ok) {
    throw new PipelineError(`--resume is not valid JSON: ${parsed.error}`);
  }

  return decodeDispatchCommand(parsed.value);
};

/**
 * Runs a dispatch from this process. In local continuation mode every hand-off is
 * picked up here until the chain completes; otherwise the first hand-off goes to
 * the configured scheduler and this run ends.
 */
export const runDispatch = async (
  config: PipelineConfig,
  initial: DispatchCommand = { action: 'start' },
  overrides: RuntimeOverrides = {}
): Promise<DispatchChainResult> => {
  if (config.continuationMode === 'local') {
    const scheduler = new InProcessContinuationScheduler();
    const runtime = createDispatcherRuntime(config, { ...overrides, continuation: scheduler });
    return runDispatchChain(runtime.dispatcher, scheduler, { budgetMs: config.dispatchTimeBudgetMs, initial });
  }

  const runtime = createDispatcherRuntime(config, overrides);
  const deadline = Date.now() + config.dispatchTimeBudgetMs;
  const result = await runtime.dispatcher.run(initial, () => deadline - Date.now());
  return { invocations: [result], totals: result.chainTotals };
};

export interface WorkOptions {
  once: boolean;
  signal: AbortSignal;
}

export const runWork = async (
  config: PipelineConfig,
  options: WorkOptions,
  overrides: RuntimeOverrides = {}
): Promise<PollSummary> => {
  const aws = overrides.aws ?? new AwsClients(config.awsRegion);
  const queue = overrides.queue ?? new SqsQueueClient(aws.sqsClient);
  const runtime = createWorkerRuntime(config, { ...overrides, aws });
  const poller = new QueuePoller(
    queue,
    runtime.deliveries,
    {
      queueUrl: requireSetting(config.queueUrl, 'QUEUE_URL'),
      maxMessages: config.pollMaxMessages,
      waitSeconds: config.pollWaitSeconds
    },
    runtime.logger
  );

  if (!options.once) {
    return poller.run(options.signal);
  }

  const reports = await poller.pollOnce();
  const acknowledged = reports.filter((report) => report.disposition === 'ack').length;
  return {
    polls: 1,
    received: reports.length,
    acknowledged,
    redelivered: reports.length - acknowledged
  };
};
