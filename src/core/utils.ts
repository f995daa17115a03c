import { createHash } from 'node:crypto';

export const normalizeWhitespace = (input: string): string => input.replace(/\s+/g, ' ').trim();

export const digest = (value: string, length = 16): string =>
  createHash('sha1').update(value).digest('hex').slice(0, length);

export const chunk = <T>(items: readonly T[], size: number): T[][] => {
  if (size < 1) {
    throw new RangeError(`Chunk size must be at least 1, got ${size}`);
  }

  const chunks: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    chunks.push(items.slice(index, index + size));
  }

  return chunks;
};

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
