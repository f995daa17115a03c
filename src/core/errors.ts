export class PipelineError extends Error {
  constructor(message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = 'PipelineError';
  }
}

export class ConfigError extends PipelineError {
  constructor(public readonly setting: string, message?: string) {
    super(message ?? `Missing required setting ${setting}`, { setting });
    this.name = 'ConfigError';
  }
}

export type FailureClass = 'not_found' | 'retriable' | 'permanent';

/**
 * Maps a provider HTTP status onto the failure taxonomy. An absent status means the
 * request never produced a response (network failure or timeout).
 */
export const classifyStatus = (status: number | undefined): FailureClass => {
  if (status === undefined || status === 429 || status >= 500) {
    return 'retriable';
  }

  if (status === 404) {
    return 'not_found';
  }

  return 'permanent';
};

export class ProviderError extends PipelineError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly status?: number,
    details?: Record<string, unknown>
  ) {
    super(message, details);
    this.name = 'ProviderError';
  }

  get failureClass(): FailureClass {
    return classifyStatus(this.status);
  }

  get retriable(): boolean {
    return this.failureClass === 'retriable';
  }
}

export class RecordSourceError extends PipelineError {
  constructor(
    message: string,
    public readonly bucket: string,
    public readonly key?: string,
    details?: Record<string, unknown>
  ) {
    super(message, { bucket, ...(key ? { key } : {}), ...(details ?? {}) });
    this.name = 'RecordSourceError';
  }
}

/** A queue delivery whose batch container could not be loaded; retried as a whole. */
export class BatchContainerError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'BatchContainerError';
  }
}

/** A batch whose message body exceeds the queue's size limit; reported as a publish failure. */
export class OversizeBatchError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'OversizeBatchError';
  }
}

/** A queue message that cannot be decoded into records; never retried. */
export class MalformedMessageError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'MalformedMessageError';
  }
}
