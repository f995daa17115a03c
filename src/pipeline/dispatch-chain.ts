import { PipelineError } from '../core/errors.js';
import type { InProcessContinuationScheduler } from './continuation.js';
import type { DispatchInvocationResult, Dispatcher } from './dispatcher.js';
import type { DispatchCommand, DispatchTotals } from './types.js';

export interface DispatchChainOptions {
  /** Wall-clock budget given to each invocation of the chain. */
  budgetMs: number;
  initial?: DispatchCommand;
  now?: () => number;
}

export interface DispatchChainResult {
  invocations: DispatchInvocationResult[];
  totals: DispatchTotals;
}

/** Runs every invocation of a dispatch chain in this process, feeding each hand-off back in. */
export const runDispatchChain = async (
  dispatcher: Dispatcher,
  scheduler: InProcessContinuationScheduler,
  options: DispatchChainOptions
): Promise<DispatchChainResult> => {
  const now = options.now ?? Date.now;
  const invocations: DispatchInvocationResult[] = [];
  let command: DispatchCommand = options.initial ?? { action: 'start' };

  for (;;) {
    const deadline = now() + options.budgetMs;
    const result = await dispatcher.run(command, () => deadline - now());
    invocations.push(result);

    if (result.status === 'complete') {
      return { invocations, totals: result.chainTotals };
    }

    const next = scheduler.take();
    if (!next) {
      throw new PipelineError('Dispatch handed off without scheduling a resume command', {
        invocation: result.invocation
      });
    }

    command = next;
  }
};
