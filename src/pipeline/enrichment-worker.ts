import { ProviderError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { err, ok, type Result } from '../core/result.js';
import type { BibliographicProvider, MatchedWork } from '../providers/types.js';
import type { AuthorResolver } from './author-resolver.js';
import type { ResultSink } from './result-sink.js';
import type { ErrorPayload, NotFoundPayload, PaperRecord, RecordFailure, RecordOutcome, SuccessPayload } from './types.js';

export interface EnrichmentWorkerOptions {
  /** Probe for an existing success result before calling the provider. */
  skipExistingSuccess: boolean;
}

export type RecordResult = Result<RecordOutcome, RecordFailure>;

export const toErrorPayload = (
  error: unknown,
  originalMessage: string,
  retriable: boolean
): ErrorPayload => {
  const base = {
    original_message: originalMessage,
    retriable
  };

  if (error instanceof Error) {
    return {
      error_type: error.name,
      error_message: error.message,
      ...base,
      ...(error.stack ? { traceback: error.stack } : {})
    };
  }

  return { error_type: typeof error, error_message: String(error), ...base };
};

/**
 * Resolves one record against the bibliographic provider and stores the outcome.
 * Expected failures come back as `err`; only unexpected faults throw.
 */
export class EnrichmentWorker {
  private readonly logger: Logger;

  constructor(
    private readonly provider: BibliographicProvider,
    private readonly authors: AuthorResolver,
    private readonly sink: ResultSink,
    private readonly options: EnrichmentWorkerOptions,
    logger: Logger
  ) {
    this.logger = logger.child('enrichment-worker', { provider: provider.name });
  }

  async processRecord(record: PaperRecord, originalMessage: string = JSON.stringify(record)): Promise<RecordResult> {
    if (this.options.skipExistingSuccess && (await this.sink.hasSuccess(record.id))) {
      this.logger.debug('Success result already stored, skipping', { recordId: record.id });
      return ok({ kind: 'skipped', recordId: record.id, key: this.sink.successKey(record.id) });
    }

    let work: MatchedWork | null;
    try {
      work = await this.provider.searchWork(record.title);
    } catch (error) {
      if (!(error instanceof ProviderError)) {
        throw error;
      }

      return this.lookupFailed(record, error, originalMessage);
    }

    if (!work) {
      return ok(await this.notFound(record, `No results found for title '${record.title}'.`));
    }

    const payload: SuccessPayload = {
      original_id: record.id,
      searched_title: record.title,
      found_title: work.title,
      citation_count: work.citationCount,
      authors: await this.authors.resolve(work.authors)
    };

    const key = await this.sink.writeSuccess(payload);
    this.logger.info('Record enriched', {
      recordId: record.id,
      key,
      citationCount: payload.citation_count,
      authors: payload.authors.length
    });

    return ok({ kind: 'success', recordId: record.id, key, payload });
  }

  /** Stores an error result for a record that cannot be processed. */
  async fail(recordId: string, error: unknown, originalMessage: string, retriable: boolean): Promise<RecordFailure> {
    const payload = toErrorPayload(error, originalMessage, retriable);
    const key = await this.sink.writeError(recordId, payload);

    this.logger.error(retriable ? 'Transient failure, delivery will be retried' : 'Permanent failure', {
      recordId,
      key,
      errorType: payload.error_type,
      error: payload.error_message
    });

    return { kind: retriable ? 'retriable' : 'permanent', recordId, key, payload };
  }

  private async lookupFailed(record: PaperRecord, error: ProviderError, originalMessage: string): Promise<RecordResult> {
    switch (error.failureClass) {
      case 'not_found':
        return ok(await this.notFound(record, error.message));
      case 'retriable':
        return err(await this.fail(record.id, error, originalMessage, true));
      case 'permanent':
        return err(await this.fail(record.id, error, originalMessage, false));
    }
  }

  private async notFound(record: PaperRecord, details: string): Promise<RecordOutcome> {
    const payload: NotFoundPayload = {
      paper_id: record.id,
      title: record.title,
      status: 'Not Found',
      details
    };

    const key = await this.sink.writeNotFound(payload);
    this.logger.info('No match found', { recordId: record.id, key });
    return { kind: 'not_found', recordId: record.id, key, payload };
  }
}
