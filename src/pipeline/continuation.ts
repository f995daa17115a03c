import type { QueueClient } from '../queue/queue-client.js';
import { encodeDispatchCommand } from './dispatch-command.js';
import type { ResumeCommand } from './types.js';

/** Delivers a resume command to whatever runs the next dispatcher invocation. */
export interface ContinuationScheduler {
  readonly mode: string;
  schedule(command: ResumeCommand): Promise<void>;
}

/** Puts the resume command on a control queue that feeds the dispatcher handler. */
export class QueueContinuationScheduler implements ContinuationScheduler {
  readonly mode = 'queue';

  constructor(
    private readonly queue: QueueClient,
    private readonly controlQueueUrl: string
  ) {}

  async schedule(command: ResumeCommand): Promise<void> {
    await this.queue.sendMessage(this.controlQueueUrl, JSON.stringify(encodeDispatchCommand(command)));
  }
}

/** Holds resume commands for a runner in the same process to pick up. */
export class InProcessContinuationScheduler implements ContinuationScheduler {
  readonly mode = 'local';
  private readonly pending: ResumeCommand[] = [];

  async schedule(command: ResumeCommand): Promise<void> {
    this.pending.push(command);
  }

  take(): ResumeCommand | undefined {
    return this.pending.shift();
  }

  get size(): number {
    return this.pending.length;
  }
}
