import { describe, expect, it } from 'vitest';
import { PipelineError } from '../src/core/errors.js';
import { decodeDispatchCommand, encodeDispatchCommand } from '../src/pipeline/dispatch-command.js';
import type { ResumeCommand } from '../src/pipeline/types.js';

const pagedResume: ResumeCommand = {
  action: 'resume',
  state: {
    cursor: { kind: 'paged', prefix: 'cleaned_data/', continuationToken: 'token-2', offset: 1 },
    nextBatchSequence: 14,
    invocation: 3,
    totals: { files: 5, batches: 14, records: 1400, rejected: 2, publishFailures: 1 }
  }
};

describe('dispatch commands', () => {
  it('treats empty payloads as a fresh start', () => {
    expect(decodeDispatchCommand(undefined)).toEqual({ action: 'start' });
    expect(decodeDispatchCommand(null)).toEqual({ action: 'start' });
    expect(decodeDispatchCommand({})).toEqual({ action: 'start' });
    expect(decodeDispatchCommand({ action: 'start' })).toEqual({ action: 'start' });
  });

  it('encodes a resume command in snake case', () => {
    expect(encodeDispatchCommand(pagedResume)).toEqual({
      action: 'resume',
      cursor: { prefix: 'cleaned_data/', continuation_token: 'token-2', offset: 1 },
      next_batch_number: 14,
      invocation: 3,
      totals: { files: 5, batches: 14, records: 1400, rejected: 2, publish_failures: 1 }
    });
  });

  it('decodes what it encodes', () => {
    const fileList: ResumeCommand = {
      action: 'resume',
      state: { ...pagedResume.state, cursor: { kind: 'file-list', fileList: ['a.jsonl', 'b.jsonl'], startIndex: 1 } }
    };

    expect(decodeDispatchCommand(JSON.parse(JSON.stringify(encodeDispatchCommand(pagedResume))))).toEqual(pagedResume);
    expect(decodeDispatchCommand(JSON.parse(JSON.stringify(encodeDispatchCommand(fileList))))).toEqual(fileList);
  });

  it('rejects incomplete resume payloads', () => {
    expect(() => decodeDispatchCommand({ action: 'resume', cursor: { file_list: ['a'] } })).toThrow(PipelineError);
    expect(() => decodeDispatchCommand({ cursor: { file_list: ['a'], start_index: 0 } })).toThrow(
      'Invalid dispatch command'
    );
  });
});
