import { InvokeCommand, type LambdaClient } from '@aws-sdk/client-lambda';
import { PipelineError } from '../core/errors.js';
import type { ContinuationScheduler } from '../pipeline/continuation.js';
import { encodeDispatchCommand } from '../pipeline/dispatch-command.js';
import type { ResumeCommand } from '../pipeline/types.js';

/** Hands the resume command to a fresh asynchronous invocation of the dispatcher function. */
export class LambdaContinuationScheduler implements ContinuationScheduler {
  readonly mode = 'lambda';

  constructor(
    private readonly client: LambdaClient,
    private readonly functionName: string
  ) {}

  async schedule(command: ResumeCommand): Promise<void> {
    const output = await this.client.send(
      new InvokeCommand({
        FunctionName: this.functionName,
        InvocationType: 'Event',
        Payload: Buffer.from(JSON.stringify(encodeDispatchCommand(command)))
      })
    );

    if (output.StatusCode !== 202) {
      throw new PipelineError(`Asynchronous invocation of ${this.functionName} returned status ${output.StatusCode}`, {
        functionName: this.functionName,
        functionError: output.FunctionError
      });
    }
  }
}
