import type { ResultLayout } from '../config.js';
import { joinKey, type ObjectStore } from '../storage/object-store.js';
import type { ErrorPayload, NotFoundPayload, SuccessPayload } from './types.js';

/** Object keys carry the id as one path segment. */
export const toKeySegment = (id: string): string => id.replace(/\//g, '_');

/**
 * Outcome-keyed result objects. Keys depend only on the record id and outcome, so a
 * retried record overwrites its own earlier result.
 */
export class ResultSink {
  constructor(
    private readonly store: ObjectStore,
    readonly bucket: string,
    private readonly layout: ResultLayout
  ) {}

  successKey(recordId: string): string {
    return joinKey(this.layout.prefix, this.layout.successDir, `${toKeySegment(recordId)}.json`);
  }

  notFoundKey(recordId: string): string {
    return joinKey(this.layout.prefix, this.layout.notFoundDir, `${toKeySegment(recordId)}.json`);
  }

  errorKey(recordId: string, retriable: boolean): string {
    const suffix = retriable ? 'retriable' : 'permanent_error';
    return joinKey(this.layout.prefix, this.layout.errorDir, `${toKeySegment(recordId)}_${suffix}.json`);
  }

  hasSuccess(recordId: string): Promise<boolean> {
    return this.store.headObject(this.bucket, this.successKey(recordId));
  }

  async writeSuccess(payload: SuccessPayload): Promise<string> {
    const key = this.successKey(payload.original_id);
    await this.write(key, payload);
    return key;
  }

  async writeNotFound(payload: NotFoundPayload): Promise<string> {
    const key = this.notFoundKey(payload.paper_id);
    await this.write(key, payload);
    return key;
  }

  async writeError(recordId: string, payload: ErrorPayload): Promise<string> {
    const key = this.errorKey(recordId, payload.retriable);
    await this.write(key, payload);
    return key;
  }

  private async write(key: string, payload: object): Promise<void> {
    await this.store.putObject(this.bucket, key, JSON.stringify(payload, null, 2), 'application/json');
  }
}
