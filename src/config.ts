import { z } from 'zod';
import { ConfigError } from './core/errors.js';

export type BatchStrategy = 'staged' | 'inline' | 'record';
export type DispatchOrder = 'fifo' | 'reverse';
export type CursorStrategy = 'file-list' | 'paged';
export type ContinuationMode = 'lambda' | 'queue' | 'local';
export type ProviderName = 'openalex' | 'semantic_scholar';
export type AuthorLookupMode = 'batch' | 'single';

const numberFromEnv = (defaultValue: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(defaultValue);

const optionalNumberFromEnv = (min: number, max: number) =>
  z.preprocess(
    (value) => (typeof value === 'string' && value.trim().length === 0 ? undefined : value),
    z.coerce.number().int().min(min).max(max).optional()
  );

const optionalString = () =>
  z.preprocess((value) => {
    if (typeof value !== 'string') {
      return value;
    }

    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }, z.string().optional());

const booleanFromEnv = (defaultValue: boolean) =>
  z.preprocess((value) => {
    if (typeof value === 'boolean') {
      return value;
    }

    if (typeof value === 'number') {
      return value !== 0;
    }

    if (typeof value === 'string') {
      const normalized = value.trim().toLowerCase();
      if (['1', 'true', 'yes', 'on'].includes(normalized)) {
        return true;
      }
      if (['0', 'false', 'no', 'off'].includes(normalized)) {
        return false;
      }
    }

    return value;
  }, z.boolean().default(defaultValue));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  AWS_REGION: optionalString(),
  AWS_LAMBDA_FUNCTION_NAME: optionalString(),
  INPUT_BUCKET: optionalString(),
  INPUT_PREFIX: z.string().default('cleaned_data/'),
  INPUT_KEY: optionalString(),
  OUTPUT_BUCKET: optionalString(),
  RESULT_PREFIX: z.string().default('citation_results'),
  RESULT_SUCCESS_DIR: z.string().min(1).default('success'),
  RESULT_NOT_FOUND_DIR: z.string().min(1).default('not_found'),
  RESULT_ERROR_DIR: z.string().min(1).default('error'),
  BATCH_PREFIX: z.string().default('citation_batches_tmp'),
  BATCH_SIZE: numberFromEnv(100, 1, 10000),
  BATCH_STRATEGY: z.enum(['staged', 'inline', 'record']).default('staged'),
  DISPATCH_ORDER: z.enum(['fifo', 'reverse']).default('fifo'),
  CURSOR_STRATEGY: z.enum(['file-list', 'paged']).default('file-list'),
  GROUP_SORT_ORDER: z.enum(['desc', 'asc']).default('desc'),
  QUEUE_URL: optionalString(),
  CONTINUATION_MODE: z.enum(['lambda', 'queue', 'local']).default('lambda'),
  CONTINUATION_THRESHOLD_MS: numberFromEnv(30000, 0, 900000),
  DISPATCHER_FUNCTION_NAME: optionalString(),
  CONTROL_QUEUE_URL: optionalString(),
  DISPATCH_TIME_BUDGET_MS: numberFromEnv(900000, 1000, 86400000),
  BIBLIO_PROVIDER: z.enum(['openalex', 'semantic_scholar']).default('openalex'),
  OPENALEX_BASE_URL: z.string().url().default('https://api.openalex.org'),
  OPENALEX_EMAIL: optionalString(),
  OPENALEX_API_KEY: optionalString(),
  SEMANTIC_SCHOLAR_BASE_URL: z.string().url().default('https://api.semanticscholar.org/graph/v1'),
  SEMANTIC_SCHOLAR_API_KEY: optionalString(),
  API_TIMEOUT_MS: numberFromEnv(30000, 1000, 120000),
  API_RETRY_ATTEMPTS: numberFromEnv(2, 0, 5),
  API_RETRY_DELAY_MS: numberFromEnv(800, 0, 30000),
  API_RATE_LIMIT_PER_SECOND: numberFromEnv(10, 1, 1000),
  WORKER_EXPECTED_CONCURRENCY: numberFromEnv(50, 1, 1000),
  API_REQUEST_INTERVAL_MS: optionalNumberFromEnv(0, 60000),
  AUTHOR_LOOKUP_MODE: z.enum(['batch', 'single']).default('batch'),
  AUTHOR_LOOKUP_CONCURRENCY: numberFromEnv(10, 1, 100),
  SKIP_EXISTING_SUCCESS: booleanFromEnv(true),
  HTTP_HOST: z.string().default('127.0.0.1'),
  HTTP_PORT: numberFromEnv(3000, 1, 65535),
  HTTP_HEALTH_PATH: z.string().default('/health'),
  HTTP_API_KEY: optionalString(),
  POLL_WAIT_SECONDS: numberFromEnv(20, 0, 20),
  POLL_MAX_MESSAGES: numberFromEnv(10, 1, 10)
});

type ParsedEnv = z.infer<typeof envSchema>;

const normalizePath = (value: string): string => {
  const withPrefix = value.startsWith('/') ? value : `/${value}`;
  return withPrefix.length > 1 && withPrefix.endsWith('/')
    ? withPrefix.slice(0, -1)
    : withPrefix;
};

const trimSlashes = (value: string): string => value.replace(/^\/+|\/+$/g, '');

export interface ResultLayout {
  prefix: string;
  successDir: string;
  notFoundDir: string;
  errorDir: string;
}

export interface PipelineConfig {
  nodeEnv: ParsedEnv['NODE_ENV'];
  logLevel: ParsedEnv['LOG_LEVEL'];
  awsRegion?: string;
  inputBucket?: string;
  inputPrefix: string;
  inputKey?: string;
  outputBucket?: string;
  resultLayout: ResultLayout;
  batchPrefix: string;
  batchSize: number;
  batchStrategy: BatchStrategy;
  dispatchOrder: DispatchOrder;
  cursorStrategy: CursorStrategy;
  groupSortOrder: 'desc' | 'asc';
  queueUrl?: string;
  continuationMode: ContinuationMode;
  continuationThresholdMs: number;
  dispatcherFunctionName?: string;
  controlQueueUrl?: string;
  dispatchTimeBudgetMs: number;
  provider: ProviderName;
  openAlexBaseUrl: string;
  openAlexEmail?: string;
  openAlexApiKey?: string;
  semanticScholarBaseUrl: string;
  semanticScholarApiKey?: string;
  apiTimeoutMs: number;
  apiRetryAttempts: number;
  apiRetryDelayMs: number;
  apiRateLimitPerSecond: number;
  workerExpectedConcurrency: number;
  apiRequestIntervalMs?: number;
  authorLookupMode: AuthorLookupMode;
  authorLookupConcurrency: number;
  skipExistingSuccess: boolean;
  httpHost: string;
  httpPort: number;
  httpHealthPath: string;
  httpApiKey?: string;
  pollWaitSeconds: number;
  pollMaxMessages: number;
}

export type ConfigOverrides = Partial<Record<keyof ParsedEnv, string | number | boolean>>;

export const parseConfig = (
  overrides?: ConfigOverrides,
  baseEnv: Record<string, string | undefined> = process.env
): PipelineConfig => {
  const mergedEnv: Record<string, string | number | boolean | undefined> = {
    ...baseEnv,
    ...(overrides ?? {})
  };

  const env = envSchema.parse(mergedEnv);

  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    awsRegion: env.AWS_REGION,
    inputBucket: env.INPUT_BUCKET,
    inputPrefix: env.INPUT_PREFIX,
    inputKey: env.INPUT_KEY,
    outputBucket: env.OUTPUT_BUCKET ?? env.INPUT_BUCKET,
    resultLayout: {
      prefix: trimSlashes(env.RESULT_PREFIX),
      successDir: trimSlashes(env.RESULT_SUCCESS_DIR),
      notFoundDir: trimSlashes(env.RESULT_NOT_FOUND_DIR),
      errorDir: trimSlashes(env.RESULT_ERROR_DIR)
    },
    batchPrefix: trimSlashes(env.BATCH_PREFIX),
    batchSize: env.BATCH_SIZE,
    batchStrategy: env.BATCH_STRATEGY,
    dispatchOrder: env.DISPATCH_ORDER,
    cursorStrategy: env.CURSOR_STRATEGY,
    groupSortOrder: env.GROUP_SORT_ORDER,
    queueUrl: env.QUEUE_URL,
    continuationMode: env.CONTINUATION_MODE,
    continuationThresholdMs: env.CONTINUATION_THRESHOLD_MS,
    dispatcherFunctionName: env.DISPATCHER_FUNCTION_NAME ?? env.AWS_LAMBDA_FUNCTION_NAME,
    controlQueueUrl: env.CONTROL_QUEUE_URL,
    dispatchTimeBudgetMs: env.DISPATCH_TIME_BUDGET_MS,
    provider: env.BIBLIO_PROVIDER,
    openAlexBaseUrl: env.OPENALEX_BASE_URL,
    openAlexEmail: env.OPENALEX_EMAIL,
    openAlexApiKey: env.OPENALEX_API_KEY,
    semanticScholarBaseUrl: env.SEMANTIC_SCHOLAR_BASE_URL,
    semanticScholarApiKey: env.SEMANTIC_SCHOLAR_API_KEY,
    apiTimeoutMs: env.API_TIMEOUT_MS,
    apiRetryAttempts: env.API_RETRY_ATTEMPTS,
    apiRetryDelayMs: env.API_RETRY_DELAY_MS,
    apiRateLimitPerSecond: env.API_RATE_LIMIT_PER_SECOND,
    workerExpectedConcurrency: env.WORKER_EXPECTED_CONCURRENCY,
    apiRequestIntervalMs: env.API_REQUEST_INTERVAL_MS,
    authorLookupMode: env.AUTHOR_LOOKUP_MODE,
    authorLookupConcurrency: env.AUTHOR_LOOKUP_CONCURRENCY,
    skipExistingSuccess: env.SKIP_EXISTING_SUCCESS,
    httpHost: env.HTTP_HOST,
    httpPort: env.HTTP_PORT,
    httpHealthPath: normalizePath(env.HTTP_HEALTH_PATH),
    httpApiKey: env.HTTP_API_KEY,
    pollWaitSeconds: env.POLL_WAIT_SECONDS,
    pollMaxMessages: env.POLL_MAX_MESSAGES
  };
};

/** Narrows an optional setting an entry point cannot run without. */
export const requireSetting = <T>(value: T | undefined, setting: string): T => {
  if (value === undefined) {
    throw new ConfigError(setting);
  }

  return value;
};
