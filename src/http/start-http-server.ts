import { serve } from '@hono/node-server';
import { Hono, type MiddlewareHandler } from 'hono';
import type { PipelineConfig } from '../config.js';
import { describeError, Logger } from '../core/logger.js';
import { errorMessage } from '../core/utils.js';
import type { DispatchChainResult } from '../pipeline/dispatch-chain.js';
import type { EnrichmentWorker } from '../pipeline/enrichment-worker.js';
import { toPaperRecord } from '../pipeline/records.js';
import type { DispatchTotals } from '../pipeline/types.js';
import { getPackageVersion } from '../version.js';

export interface HttpAppDependencies {
  worker: EnrichmentWorker;
  /** Runs a whole dispatch chain in this process. */
  startDispatch: () => Promise<DispatchChainResult>;
  logger: Logger;
}

type DispatchRunState =
  | { status: 'idle' }
  | { status: 'running'; startedAt: string }
  | { status: 'complete'; startedAt: string; finishedAt: string; invocations: number; totals: DispatchTotals }
  | { status: 'failed'; startedAt: string; finishedAt: string; error: string };

export interface HttpAppRuntime {
  app: Hono;
  /** Settles once the dispatch started over HTTP, if any, has finished. */
  settled: () => Promise<void>;
}

const isAuthorized = (authorization: string | undefined, apiKey: string | undefined): boolean => {
  if (!apiKey) {
    return true;
  }

  if (!authorization || !authorization.startsWith('Bearer ')) {
    return false;
  }

  const token = authorization.slice('Bearer '.length).trim();
  return token.length > 0 && token === apiKey;
};

export const createHttpApp = (
  config: Pick<PipelineConfig, 'httpHealthPath' | 'httpApiKey' | 'provider'>,
  deps: HttpAppDependencies
): HttpAppRuntime => {
  const app = new Hono();
  const logger = deps.logger.child('http');
  let dispatchState: DispatchRunState = { status: 'idle' };
  let activeDispatch: Promise<void> | undefined;

  const requireAuth: MiddlewareHandler = async (c, next) => {
    if (!isAuthorized(c.req.header('authorization'), config.httpApiKey)) {
      return c.json({ error: 'Unauthorized' }, 401);
    }

    await next();
  };

  app.onError((error, c) => {
    logger.error('Unhandled HTTP runtime error', describeError(error));
    return c.json({ error: 'Internal server error' }, 500);
  });

  app.get(config.httpHealthPath, (c) =>
    c.json({
      status: 'ok',
      uptimeSeconds: Math.round(process.uptime()),
      version: getPackageVersion(),
      provider: config.provider,
      dispatch: dispatchState.status
    })
  );

  app.use('/dispatch', requireAuth);
  app.use('/enrich', requireAuth);

  app.get('/dispatch', (c) => c.json(dispatchState));

  app.post('/dispatch', (c) => {
    if (dispatchState.status === 'running') {
      return c.json({ error: 'A dispatch is already running', startedAt: dispatchState.startedAt }, 409);
    }

    const startedAt = new Date().toISOString();
    dispatchState = { status: 'running', startedAt };
    logger.info('Dispatch started over HTTP');

    activeDispatch = deps.startDispatch().then(
      (result) => {
        dispatchState = {
          status: 'complete',
          startedAt,
          finishedAt: new Date().toISOString(),
          invocations: result.invocations.length,
          totals: result.totals
        };
        logger.info('Dispatch finished', { invocations: result.invocations.length, totals: result.totals });
      },
      (error: unknown) => {
        dispatchState = { status: 'failed', startedAt, finishedAt: new Date().toISOString(), error: errorMessage(error) };
        logger.error('Dispatch failed', describeError(error));
      }
    );

    return c.json({ status: 'started', startedAt }, 202);
  });

  app.post('/enrich', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: 'Request body must be JSON' }, 400);
    }

    const record = toPaperRecord(body);
    if (!record.ok) {
      return c.json({ error: record.error }, 400);
    }

    const result = await deps.worker.processRecord(record.value);
    if (result.ok) {
      const outcome = result.value;
      return c.json({
        outcome: outcome.kind,
        key: outcome.key,
        ...(outcome.kind === 'skipped' ? {} : { result: outcome.payload })
      });
    }

    const failure = result.error;
    return c.json(
      { outcome: failure.kind, key: failure.key, error: failure.payload.error_message },
      failure.kind === 'retriable' ? 503 : 502
    );
  });

  return {
    app,
    settled: async () => {
      await activeDispatch;
    }
  };
};

export const startHttpServer = (
  config: PipelineConfig,
  deps: HttpAppDependencies
) => {
  const runtime = createHttpApp(config, deps);

  const server = serve(
    {
      fetch: runtime.app.fetch,
      port: config.httpPort,
      hostname: config.httpHost
    },
    (info) => {
      deps.logger.info('Control server listening', {
        host: config.httpHost,
        port: info.port,
        health: config.httpHealthPath
      });
    }
  );

  const shutdown = (signal: string) => {
    deps.logger.info('Shutting down control server', { signal });
    server.close();
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  return server;
};
