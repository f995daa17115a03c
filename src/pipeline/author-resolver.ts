import pLimit from 'p-limit';
import type { AuthorLookupMode } from '../config.js';
import { ProviderError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { chunk } from '../core/utils.js';
import type { BibliographicProvider, MatchedAuthor } from '../providers/types.js';
import type { AuthorMetrics } from './types.js';

export interface AuthorResolverOptions {
  mode: AuthorLookupMode;
  concurrency: number;
}

type HIndexTable = Map<string, number | null>;

/**
 * Attaches an h-index to each author of a matched work. A failed lookup leaves that
 * author's h-index null; the output keeps the work's author order.
 */
export class AuthorResolver {
  private readonly logger: Logger;

  constructor(
    private readonly provider: BibliographicProvider,
    private readonly options: AuthorResolverOptions,
    logger: Logger
  ) {
    this.logger = logger.child('author-resolver');
  }

  async resolve(authors: readonly MatchedAuthor[]): Promise<AuthorMetrics[]> {
    const ids = [...new Set(authors.map((author) => author.authorId).filter((id): id is string => Boolean(id)))];
    const table = ids.length === 0 ? new Map<string, number | null>() : await this.lookup(ids);

    return authors.map((author) => ({
      name: author.name,
      h_index: author.authorId ? table.get(author.authorId) ?? null : null
    }));
  }

  private lookup(ids: string[]): Promise<HIndexTable> {
    const batched = this.options.mode === 'batch' && this.provider.maxAuthorBatchSize > 0;
    return batched ? this.lookupBatched(ids) : this.lookupEach(ids);
  }

  private async lookupBatched(ids: string[]): Promise<HIndexTable> {
    const limit = pLimit(this.options.concurrency);
    const tables = await Promise.all(
      chunk(ids, this.provider.maxAuthorBatchSize).map((group) =>
        limit(async (): Promise<HIndexTable> => {
          try {
            return await this.provider.getAuthorHIndices(group);
          } catch (error) {
            this.degrade(error, group);
            return new Map(group.map((id): [string, null] => [id, null]));
          }
        })
      )
    );

    return new Map(tables.flatMap((table) => [...table.entries()]));
  }

  private async lookupEach(ids: string[]): Promise<HIndexTable> {
    const limit = pLimit(this.options.concurrency);
    const entries = await Promise.all(
      ids.map((id) =>
        limit(async (): Promise<[string, number | null]> => {
          try {
            return [id, await this.provider.getAuthorHIndex(id)];
          } catch (error) {
            this.degrade(error, [id]);
            return [id, null];
          }
        })
      )
    );

    return new Map(entries);
  }

  private degrade(error: unknown, authorIds: string[]): void {
    if (!(error instanceof ProviderError)) {
      throw error;
    }

    this.logger.warn('Author lookup failed, h-index left empty', {
      provider: this.provider.name,
      authorIds,
      status: error.status,
      error: error.message
    });
  }
}
