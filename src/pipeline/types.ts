export interface PaperRecord {
  id: string;
  title: string;
}

export interface Batch {
  /** Monotonic across a whole dispatch chain; names the staging object. */
  sequence: number;
  sourceKey: string;
  records: readonly PaperRecord[];
}

export interface OutboundMessage {
  entryId: string;
  body: string;
}

export interface FileListCursor {
  kind: 'file-list';
  fileList: string[];
  startIndex: number;
}

export interface PagedCursor {
  kind: 'paged';
  prefix: string;
  continuationToken: string | null;
  offset: number;
}

export type DispatchCursor = FileListCursor | PagedCursor;

export interface DispatchTotals {
  files: number;
  batches: number;
  records: number;
  rejected: number;
  publishFailures: number;
}

export interface DispatchState {
  cursor: DispatchCursor;
  nextBatchSequence: number;
  invocation: number;
  totals: DispatchTotals;
}

export type DispatchCommand = { action: 'start' } | { action: 'resume'; state: DispatchState };

export type ResumeCommand = Extract<DispatchCommand, { action: 'resume' }>;

export const emptyTotals = (): DispatchTotals => ({
  files: 0,
  batches: 0,
  records: 0,
  rejected: 0,
  publishFailures: 0
});

export const addTotals = (left: DispatchTotals, right: DispatchTotals): DispatchTotals => ({
  files: left.files + right.files,
  batches: left.batches + right.batches,
  records: left.records + right.records,
  rejected: left.rejected + right.rejected,
  publishFailures: left.publishFailures + right.publishFailures
});

export interface AuthorMetrics {
  name: string;
  h_index: number | null;
}

export interface SuccessPayload {
  original_id: string;
  searched_title: string;
  found_title: string;
  citation_count: number;
  authors: AuthorMetrics[];
}

export interface NotFoundPayload {
  paper_id: string;
  title: string;
  status: 'Not Found';
  details: string;
}

export interface ErrorPayload {
  error_type: string;
  error_message: string;
  original_message: string;
  retriable: boolean;
  traceback?: string;
}

export type RecordOutcome =
  | { kind: 'success'; recordId: string; key: string; payload: SuccessPayload }
  | { kind: 'not_found'; recordId: string; key: string; payload: NotFoundPayload }
  | { kind: 'skipped'; recordId: string; key: string };

export interface RecordFailure {
  kind: 'retriable' | 'permanent';
  recordId: string;
  key: string;
  payload: ErrorPayload;
}
