import type { ApiHttpClient } from './http-client.js';
import { quoteTitle, toHIndex, withTrailingSlash, type BibliographicProvider, type MatchedWork } from './types.js';

export interface SemanticScholarOptions {
  baseUrl: string;
  apiKey?: string;
}

interface SemanticScholarSearchResponse {
  total?: number;
  data?: Array<{
    paperId?: string;
    title?: string;
    citationCount?: number | null;
    authors?: Array<{ authorId?: string | null; name?: string | null }>;
  }>;
}

interface SemanticScholarAuthor {
  authorId?: string;
  hIndex?: number | null;
}

const PROVIDER = 'semantic_scholar';

export class SemanticScholarClient implements BibliographicProvider {
  readonly name = 'semantic_scholar';
  readonly maxAuthorBatchSize = 100;

  constructor(
    private readonly options: SemanticScholarOptions,
    private readonly httpClient: ApiHttpClient
  ) {}

  async searchWork(title: string): Promise<MatchedWork | null> {
    const url = this.url('paper/search');
    url.searchParams.set('query', quoteTitle(title));
    url.searchParams.set('limit', '1');
    url.searchParams.set('fields', 'title,citationCount,authors.name,authors.authorId');

    const payload = await this.httpClient.fetchJson<SemanticScholarSearchResponse>({
      provider: PROVIDER,
      url,
      headers: this.headers()
    });

    const paper = payload.data?.[0];
    if (!paper?.paperId) {
      return null;
    }

    return {
      providerId: paper.paperId,
      title: paper.title ?? '',
      citationCount: paper.citationCount ?? 0,
      authors: (paper.authors ?? [])
        .map((author) => ({ authorId: author.authorId ?? null, name: author.name ?? '' }))
        .filter((author) => author.name.length > 0 || author.authorId !== null)
    };
  }

  async getAuthorHIndices(authorIds: readonly string[]): Promise<Map<string, number | null>> {
    const result = new Map<string, number | null>();
    if (authorIds.length === 0) {
      return result;
    }

    const url = this.url('author/batch');
    url.searchParams.set('fields', 'hIndex');

    // The response is positional: entry i answers authorIds[i], null when unknown.
    const payload = await this.httpClient.fetchJson<Array<SemanticScholarAuthor | null>>({
      provider: PROVIDER,
      url,
      method: 'POST',
      headers: this.headers(),
      body: { ids: authorIds }
    });

    authorIds.forEach((id, index) => {
      result.set(id, toHIndex(payload[index]?.hIndex));
    });

    return result;
  }

  async getAuthorHIndex(authorId: string): Promise<number | null> {
    const url = this.url(`author/${encodeURIComponent(authorId)}`);
    url.searchParams.set('fields', 'hIndex');

    const payload = await this.httpClient.fetchJson<SemanticScholarAuthor>({
      provider: PROVIDER,
      url,
      headers: this.headers()
    });

    return toHIndex(payload.hIndex);
  }

  private url(path: string): URL {
    return new URL(path, withTrailingSlash(this.options.baseUrl));
  }

  private headers(): Record<string, string> {
    return this.options.apiKey ? { 'x-api-key': this.options.apiKey } : {};
  }
}
