import type { ApiHttpClient } from './http-client.js';
import { quoteTitle, toHIndex, withTrailingSlash, type BibliographicProvider, type MatchedWork } from './types.js';

export interface OpenAlexOptions {
  baseUrl: string;
  /** Contact address that admits requests to the polite pool. */
  email?: string;
  apiKey?: string;
}

interface OpenAlexListResponse<T> {
  results?: T[];
}

interface OpenAlexWork {
  id?: string;
  display_name?: string | null;
  cited_by_count?: number;
  authorships?: Array<{
    author?: { id?: string | null; display_name?: string | null } | null;
    raw_author_name?: string | null;
  }>;
}

interface OpenAlexAuthor {
  id?: string;
  summary_stats?: { h_index?: number | null } | null;
}

const PROVIDER = 'openalex';

/** `https://openalex.org/A123` and `A123` both name author A123. */
export const shortOpenAlexId = (id: string): string => id.slice(id.lastIndexOf('/') + 1);

export class OpenAlexClient implements BibliographicProvider {
  readonly name = 'openalex';
  readonly maxAuthorBatchSize = 50;

  constructor(
    private readonly options: OpenAlexOptions,
    private readonly httpClient: ApiHttpClient
  ) {}

  async searchWork(title: string): Promise<MatchedWork | null> {
    const url = this.url('works');
    url.searchParams.set('search', quoteTitle(title));
    url.searchParams.set('per-page', '1');
    url.searchParams.set('select', 'id,display_name,cited_by_count,authorships');

    const payload = await this.httpClient.fetchJson<OpenAlexListResponse<OpenAlexWork>>({ provider: PROVIDER, url });
    const work = payload.results?.[0];
    if (!work?.id) {
      return null;
    }

    return {
      providerId: work.id,
      title: work.display_name ?? '',
      citationCount: work.cited_by_count ?? 0,
      authors: (work.authorships ?? [])
        .map((authorship) => ({
          authorId: authorship.author?.id ?? null,
          name: authorship.author?.display_name ?? authorship.raw_author_name ?? ''
        }))
        .filter((author) => author.name.length > 0 || author.authorId !== null)
    };
  }

  async getAuthorHIndices(authorIds: readonly string[]): Promise<Map<string, number | null>> {
    const result = new Map<string, number | null>();
    if (authorIds.length === 0) {
      return result;
    }

    const url = this.url('authors');
    url.searchParams.set('filter', `openalex:${authorIds.map(shortOpenAlexId).join('|')}`);
    url.searchParams.set('per-page', String(Math.max(authorIds.length, 1)));
    url.searchParams.set('select', 'id,summary_stats');

    const payload = await this.httpClient.fetchJson<OpenAlexListResponse<OpenAlexAuthor>>({ provider: PROVIDER, url });
    const byShortId = new Map<string, number | null>();
    for (const author of payload.results ?? []) {
      if (author.id) {
        byShortId.set(shortOpenAlexId(author.id), toHIndex(author.summary_stats?.h_index));
      }
    }

    for (const id of authorIds) {
      result.set(id, byShortId.get(shortOpenAlexId(id)) ?? null);
    }

    return result;
  }

  async getAuthorHIndex(authorId: string): Promise<number | null> {
    const url = this.url(`authors/${encodeURIComponent(shortOpenAlexId(authorId))}`);
    url.searchParams.set('select', 'id,summary_stats');

    const payload = await this.httpClient.fetchJson<OpenAlexAuthor>({ provider: PROVIDER, url });
    return toHIndex(payload.summary_stats?.h_index);
  }

  private url(path: string): URL {
    const url = new URL(path, withTrailingSlash(this.options.baseUrl));
    if (this.options.email) {
      url.searchParams.set('mailto', this.options.email);
    }
    if (this.options.apiKey) {
      url.searchParams.set('api_key', this.options.apiKey);
    }

    return url;
  }
}
