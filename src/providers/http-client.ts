import { setTimeout as sleep } from 'node:timers/promises';
import { ProviderError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import type { RateLimiter } from '../core/rate-limiter.js';
import { errorMessage } from '../core/utils.js';

export interface HttpClientOptions {
  timeoutMs: number;
  retryAttempts: number;
  retryDelayMs: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

interface FetchJsonOptions {
  provider: string;
  url: URL;
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: unknown;
}

const defaultSleep = async (ms: number): Promise<void> => {
  await sleep(ms);
};

/**
 * JSON over HTTP for the bibliographic providers. Every attempt passes the rate
 * limiter first; only failures classified as retriable are attempted again.
 */
export class ApiHttpClient {
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(
    private readonly options: HttpClientOptions,
    private readonly rateLimiter: RateLimiter,
    logger: Logger
  ) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = logger.child('http-client');
  }

  async fetchJson<T>({ provider, url, method = 'GET', headers, body }: FetchJsonOptions): Promise<T> {
    let attempt = 0;

    for (;;) {
      try {
        return await this.attempt<T>({ provider, url, method, headers, body });
      } catch (error) {
        if (!(error instanceof ProviderError) || !error.retriable || attempt >= this.options.retryAttempts) {
          throw error;
        }

        attempt += 1;
        const delayMs = this.options.retryDelayMs * attempt;
        this.logger.warn('Retrying provider request', {
          provider,
          url: url.toString(),
          attempt,
          delayMs,
          status: error.status,
          error: error.message
        });
        await this.sleep(delayMs);
      }
    }
  }

  private async attempt<T>({ provider, url, method, headers, body }: FetchJsonOptions): Promise<T> {
    await this.rateLimiter.wait();

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method,
          headers: {
            accept: 'application/json',
            ...(body === undefined ? {} : { 'content-type': 'application/json' }),
            ...(headers ?? {})
          },
          body: body === undefined ? undefined : JSON.stringify(body),
          signal: controller.signal
        });
      } catch (error) {
        const timedOut = controller.signal.aborted;
        throw new ProviderError(
          timedOut
            ? `Provider ${provider} timed out after ${this.options.timeoutMs}ms`
            : `Provider ${provider} request failed: ${errorMessage(error)}`,
          provider,
          undefined,
          { url: url.toString(), timedOut }
        );
      }

      if (!response.ok) {
        const text = await response.text();
        throw new ProviderError(`Provider ${provider} returned HTTP ${response.status}`, provider, response.status, {
          url: url.toString(),
          body: text.slice(0, 1000)
        });
      }

      return (await response.json()) as T;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
