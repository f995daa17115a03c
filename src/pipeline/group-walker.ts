import { PipelineError } from '../core/errors.js';
import type { ListPage } from '../storage/object-store.js';
import type { RecordSource } from './record-source.js';
import type { DispatchCursor, FileListCursor, PagedCursor } from './types.js';

export interface GroupStep {
  key: string;
  /** Cursor naming the group after `key`, i.e. the first one not yet started. */
  after: DispatchCursor;
}

/** Walks the source groups of a dispatch chain from a resumable cursor. */
export interface GroupWalker {
  /** Drops state kept from an earlier invocation; called at the start of every run. */
  reset(): void;
  begin(): Promise<DispatchCursor>;
  next(cursor: DispatchCursor): Promise<GroupStep | null>;
}

export const sortGroups = (keys: readonly string[], order: 'desc' | 'asc'): string[] => {
  const sorted = [...keys].sort((left, right) => (left < right ? -1 : left > right ? 1 : 0));
  return order === 'desc' ? sorted.reverse() : sorted;
};

const unexpectedCursor = (cursor: DispatchCursor, expected: DispatchCursor['kind']): PipelineError =>
  new PipelineError(`Expected a ${expected} cursor, received ${cursor.kind}`);

/** Lists every group once, sorts them, and walks the list by index. */
export class FileListWalker implements GroupWalker {
  constructor(
    private readonly source: RecordSource,
    private readonly prefix: string,
    private readonly order: 'desc' | 'asc',
    private readonly inputKey?: string
  ) {}

  reset(): void {}

  async begin(): Promise<FileListCursor> {
    const fileList = this.inputKey
      ? [this.inputKey]
      : sortGroups(await this.source.listAllGroups(this.prefix), this.order);

    return { kind: 'file-list', fileList, startIndex: 0 };
  }

  async next(cursor: DispatchCursor): Promise<GroupStep | null> {
    if (cursor.kind !== 'file-list') {
      throw unexpectedCursor(cursor, 'file-list');
    }

    const current = cursor;
    const key = current.fileList[current.startIndex];
    if (key === undefined) {
      return null;
    }

    return { key, after: { ...current, startIndex: current.startIndex + 1 } };
  }
}

/**
 * Walks the store's paginated listing in its own order. Only the continuation token
 * of the current page and an offset into it are carried between invocations.
 */
export class PagedWalker implements GroupWalker {
  private readonly pages = new Map<string, ListPage>();

  constructor(
    private readonly source: RecordSource,
    private readonly prefix: string
  ) {}

  /** Listings change between chains, so cached pages live for one invocation only. */
  reset(): void {
    this.pages.clear();
  }

  async begin(): Promise<PagedCursor> {
    return { kind: 'paged', prefix: this.prefix, continuationToken: null, offset: 0 };
  }

  async next(cursor: DispatchCursor): Promise<GroupStep | null> {
    if (cursor.kind !== 'paged') {
      throw unexpectedCursor(cursor, 'paged');
    }

    let current: PagedCursor = cursor;

    for (;;) {
      const page = await this.page(current);
      const key = page.keys[current.offset];
      if (key !== undefined) {
        return { key, after: { ...current, offset: current.offset + 1 } };
      }

      if (!page.nextContinuationToken) {
        return null;
      }

      current = { ...current, continuationToken: page.nextContinuationToken, offset: 0 };
    }
  }

  private async page(cursor: PagedCursor): Promise<ListPage> {
    const cacheKey = cursor.continuationToken ?? '';
    const cached = this.pages.get(cacheKey);
    if (cached) {
      return cached;
    }

    const page = await this.source.listGroups(cursor.prefix, cursor.continuationToken);
    this.pages.set(cacheKey, page);
    return page;
  }
}
