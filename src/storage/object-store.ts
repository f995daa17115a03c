import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';

export interface ListPage {
  keys: string[];
  nextContinuationToken: string | null;
}

/** The slice of an object store the pipeline reads from and writes to. */
export interface ObjectStore {
  listKeys(bucket: string, prefix: string, continuationToken?: string | null): Promise<ListPage>;
  getObjectStream(bucket: string, key: string): Promise<Readable>;
  headObject(bucket: string, key: string): Promise<boolean>;
  putObject(bucket: string, key: string, body: string, contentType: string): Promise<void>;
}

/** Yields the non-blank lines of a UTF-8 stream without buffering the whole object. */
export async function* readLines(stream: Readable): AsyncGenerator<string> {
  const lines = createInterface({ input: stream, crlfDelay: Number.POSITIVE_INFINITY });

  try {
    for await (const line of lines) {
      const trimmed = line.trim();
      if (trimmed.length > 0) {
        yield trimmed;
      }
    }
  } finally {
    lines.close();
  }
}

export const joinKey = (...parts: string[]): string =>
  parts
    .map((part) => part.replace(/^\/+|\/+$/g, ''))
    .filter((part) => part.length > 0)
    .join('/');
