import { RecordSourceError } from '../core/errors.js';
import { errorMessage } from '../core/utils.js';
import { readLines, type ListPage, type ObjectStore } from '../storage/object-store.js';
import { parseRecordLine } from './records.js';
import type { PaperRecord } from './types.js';

export type SourceLine =
  | { valid: true; record: PaperRecord }
  | { valid: false; line: string; lineNumber: number; reason: string };

/** Groups of newline-delimited JSON records kept under one bucket. */
export class RecordSource {
  constructor(
    private readonly store: ObjectStore,
    readonly bucket: string
  ) {}

  async listGroups(prefix: string, continuationToken?: string | null): Promise<ListPage> {
    try {
      const page = await this.store.listKeys(this.bucket, prefix, continuationToken);
      return {
        keys: page.keys.filter((key) => !key.endsWith('/')),
        nextContinuationToken: page.nextContinuationToken
      };
    } catch (error) {
      throw new RecordSourceError(`Failed to list groups under ${prefix}: ${errorMessage(error)}`, this.bucket, undefined, {
        prefix
      });
    }
  }

  async listAllGroups(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    let token: string | null = null;

    do {
      const page = await this.listGroups(prefix, token);
      keys.push(...page.keys);
      token = page.nextContinuationToken;
    } while (token);

    return keys;
  }

  async *readLines(key: string): AsyncGenerator<SourceLine> {
    let lineNumber = 0;

    try {
      const stream = await this.store.getObjectStream(this.bucket, key);
      for await (const line of readLines(stream)) {
        lineNumber += 1;
        const parsed = parseRecordLine(line);
        yield parsed.ok
          ? { valid: true, record: parsed.value }
          : { valid: false, line, lineNumber, reason: parsed.error };
      }
    } catch (error) {
      if (error instanceof RecordSourceError) {
        throw error;
      }

      throw new RecordSourceError(`Failed to read ${key}: ${errorMessage(error)}`, this.bucket, key, { lineNumber });
    }
  }
}
