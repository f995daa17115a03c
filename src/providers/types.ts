import type { ProviderName } from '../config.js';
import { normalizeWhitespace } from '../core/utils.js';

export interface MatchedAuthor {
  authorId: string | null;
  name: string;
}

export interface MatchedWork {
  providerId: string;
  title: string;
  citationCount: number;
  authors: MatchedAuthor[];
}

/** A bibliographic API that can match a title and report author h-indices. */
export interface BibliographicProvider {
  readonly name: ProviderName;
  /** Most author ids one filtered request accepts; 0 when only single lookups exist. */
  readonly maxAuthorBatchSize: number;
  /** Best match for an exact-phrase title search, or null when nothing matches. */
  searchWork(title: string): Promise<MatchedWork | null>;
  getAuthorHIndices(authorIds: readonly string[]): Promise<Map<string, number | null>>;
  getAuthorHIndex(authorId: string): Promise<number | null>;
}

export const quoteTitle = (title: string): string => `"${normalizeWhitespace(title.replace(/"/g, ' '))}"`;

export const toHIndex = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null;

export const withTrailingSlash = (value: string): string => (value.endsWith('/') ? value : `${value}/`);
