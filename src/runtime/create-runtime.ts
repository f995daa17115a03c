import { AwsClients } from '../aws/clients.js';
import { LambdaContinuationScheduler } from '../aws/lambda-continuation.js';
import { S3ObjectStore } from '../aws/s3-object-store.js';
import { SqsQueueClient } from '../aws/sqs-queue-client.js';
import { requireSetting, type PipelineConfig } from '../config.js';
import { Logger } from '../core/logger.js';
import { RateLimiter, systemClock, type Clock } from '../core/rate-limiter.js';
import { ApiHttpClient } from '../providers/http-client.js';
import { OpenAlexClient } from '../providers/openalex-client.js';
import { SemanticScholarClient } from '../providers/semantic-scholar-client.js';
import type { BibliographicProvider } from '../providers/types.js';
import { AuthorResolver } from '../pipeline/author-resolver.js';
import {
  Batcher,
  InlineBatchMaterializer,
  RecordMessageMaterializer,
  StagedBatchMaterializer,
  type BatchMaterializer
} from '../pipeline/batcher.js';
import {
  InProcessContinuationScheduler,
  QueueContinuationScheduler,
  type ContinuationScheduler
} from '../pipeline/continuation.js';
import { DeliveryHandler } from '../pipeline/delivery-handler.js';
import { Dispatcher } from '../pipeline/dispatcher.js';
import { EnrichmentWorker } from '../pipeline/enrichment-worker.js';
import { FileListWalker, PagedWalker, type GroupWalker } from '../pipeline/group-walker.js';
import { QueuePublisher } from '../pipeline/queue-publisher.js';
import { RecordSource } from '../pipeline/record-source.js';
import { ResultSink } from '../pipeline/result-sink.js';
import type { QueueClient } from '../queue/queue-client.js';
import type { ObjectStore } from '../storage/object-store.js';

/** Collaborators that replace the AWS-backed defaults, mostly in tests. */
export interface RuntimeOverrides {
  aws?: AwsClients;
  store?: ObjectStore;
  queue?: QueueClient;
  continuation?: ContinuationScheduler;
  fetchImpl?: typeof fetch;
  clock?: Clock;
  logger?: Logger;
}

export const createLogger = (config: PipelineConfig): Logger =>
  new Logger(config.logLevel, { service: 'citation-pipeline' });

export const createRateLimiter = (config: PipelineConfig, clock: Clock = systemClock): RateLimiter =>
  config.apiRequestIntervalMs !== undefined
    ? new RateLimiter(config.apiRequestIntervalMs, clock)
    : RateLimiter.fromCeiling(config.apiRateLimitPerSecond, config.workerExpectedConcurrency, clock);

export const createProvider = (config: PipelineConfig, httpClient: ApiHttpClient): BibliographicProvider => {
  switch (config.provider) {
    case 'openalex':
      return new OpenAlexClient(
        { baseUrl: config.openAlexBaseUrl, email: config.openAlexEmail, apiKey: config.openAlexApiKey },
        httpClient
      );
    case 'semantic_scholar':
      return new SemanticScholarClient(
        { baseUrl: config.semanticScholarBaseUrl, apiKey: config.semanticScholarApiKey },
        httpClient
      );
  }
};

const resolveStore = (overrides: RuntimeOverrides, aws: AwsClients): ObjectStore =>
  overrides.store ?? new S3ObjectStore(aws.s3Client);

const resolveQueue = (overrides: RuntimeOverrides, aws: AwsClients): QueueClient =>
  overrides.queue ?? new SqsQueueClient(aws.sqsClient);

export interface WorkerRuntime {
  config: PipelineConfig;
  logger: Logger;
  provider: BibliographicProvider;
  worker: EnrichmentWorker;
  deliveries: DeliveryHandler;
}

export const createWorkerRuntime = (config: PipelineConfig, overrides: RuntimeOverrides = {}): WorkerRuntime => {
  const logger = overrides.logger ?? createLogger(config);
  const aws = overrides.aws ?? new AwsClients(config.awsRegion);
  const store = resolveStore(overrides, aws);
  const clock = overrides.clock;
  const rateLimiter = createRateLimiter(config, clock);

  const httpClient = new ApiHttpClient(
    {
      timeoutMs: config.apiTimeoutMs,
      retryAttempts: config.apiRetryAttempts,
      retryDelayMs: config.apiRetryDelayMs,
      fetchImpl: overrides.fetchImpl,
      sleep: clock ? (ms) => clock.sleep(ms) : undefined
    },
    rateLimiter,
    logger
  );
  const provider = createProvider(config, httpClient);
  const authors = new AuthorResolver(
    provider,
    { mode: config.authorLookupMode, concurrency: config.authorLookupConcurrency },
    logger
  );
  const sink = new ResultSink(store, requireSetting(config.outputBucket, 'OUTPUT_BUCKET'), config.resultLayout);
  const worker = new EnrichmentWorker(provider, authors, sink, { skipExistingSuccess: config.skipExistingSuccess }, logger);

  logger.debug('Worker runtime ready', {
    provider: provider.name,
    rateLimitIntervalMs: rateLimiter.intervalMs,
    authorLookupMode: config.authorLookupMode
  });

  return {
    config,
    logger,
    provider,
    worker,
    deliveries: new DeliveryHandler(worker, store, config.inputBucket, logger)
  };
};

export interface DispatcherRuntime {
  config: PipelineConfig;
  logger: Logger;
  dispatcher: Dispatcher;
  continuation: ContinuationScheduler;
}

const createWalker = (config: PipelineConfig, source: RecordSource): GroupWalker =>
  config.cursorStrategy === 'paged'
    ? new PagedWalker(source, config.inputPrefix)
    : new FileListWalker(source, config.inputPrefix, config.groupSortOrder, config.inputKey);

const createMaterializer = (config: PipelineConfig, store: ObjectStore, bucket: string): BatchMaterializer => {
  switch (config.batchStrategy) {
    case 'staged':
      return new StagedBatchMaterializer(store, bucket, config.batchPrefix);
    case 'inline':
      return new InlineBatchMaterializer();
    case 'record':
      return new RecordMessageMaterializer();
  }
};

export const createContinuationScheduler = (
  config: PipelineConfig,
  aws: AwsClients,
  queue: QueueClient
): ContinuationScheduler => {
  switch (config.continuationMode) {
    case 'lambda':
      return new LambdaContinuationScheduler(
        aws.lambdaClient,
        requireSetting(config.dispatcherFunctionName, 'DISPATCHER_FUNCTION_NAME')
      );
    case 'queue':
      return new QueueContinuationScheduler(queue, requireSetting(config.controlQueueUrl, 'CONTROL_QUEUE_URL'));
    case 'local':
      return new InProcessContinuationScheduler();
  }
};

export const createDispatcherRuntime = (
  config: PipelineConfig,
  overrides: RuntimeOverrides = {}
): DispatcherRuntime => {
  const logger = overrides.logger ?? createLogger(config);
  const aws = overrides.aws ?? new AwsClients(config.awsRegion);
  const store = resolveStore(overrides, aws);
  const queue = resolveQueue(overrides, aws);
  const inputBucket = requireSetting(config.inputBucket, 'INPUT_BUCKET');
  const source = new RecordSource(store, inputBucket);
  const continuation = overrides.continuation ?? createContinuationScheduler(config, aws, queue);

  const dispatcher = new Dispatcher({
    source,
    walker: createWalker(config, source),
    batcher: new Batcher(config.batchSize),
    materializer: createMaterializer(config, store, inputBucket),
    publisher: new QueuePublisher(queue, requireSetting(config.queueUrl, 'QUEUE_URL'), logger),
    continuation,
    logger,
    options: {
      continuationThresholdMs: config.continuationThresholdMs,
      dispatchOrder: config.dispatchOrder
    }
  });

  return { config, logger, dispatcher, continuation };
};
