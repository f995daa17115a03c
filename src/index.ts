#!/usr/bin/env node

import { config as loadDotEnv } from 'dotenv';
import { parseCliArgs, CLI_USAGE, type CliArgs } from './cli/args.js';
import { parseResumeArgument, runDispatch, runWork } from './cli/commands.js';
import { parseConfig, type PipelineConfig } from './config.js';
import { startHttpServer } from './http/start-http-server.js';
import { createLogger, createWorkerRuntime } from './runtime/create-runtime.js';
import { getPackageVersion } from './version.js';

loadDotEnv({ quiet: true });

const printStdout = (message: string): void => {
  process.stdout.write(`${message}\n`);
};

const printStderr = (message: string): void => {
  process.stderr.write(`${message}\n`);
};

const abortOnSignals = (): AbortSignal => {
  const controller = new AbortController();
  const stop = () => controller.abort();
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
  return controller.signal;
};

const execute = async (cli: CliArgs & { command: NonNullable<CliArgs['command']> }, config: PipelineConfig) => {
  switch (cli.command) {
    case 'dispatch': {
      const initial = cli.resume ? parseResumeArgument(cli.resume) : undefined;
      const result = await runDispatch(config, initial);
      printStdout(JSON.stringify({ invocations: result.invocations.length, totals: result.totals }));
      return;
    }
    case 'work': {
      const summary = await runWork(config, { once: cli.once, signal: abortOnSignals() });
      printStdout(JSON.stringify(summary));
      return;
    }
    case 'serve': {
      const logger = createLogger(config);
      const worker = createWorkerRuntime(config, { logger });
      startHttpServer(config, {
        worker: worker.worker,
        startDispatch: () => runDispatch({ ...config, continuationMode: 'local' }, undefined, { logger }),
        logger
      });
      return;
    }
  }
};

const run = async (): Promise<void> => {
  const cli = parseCliArgs(process.argv.slice(2));

  if (cli.showHelp) {
    printStdout(CLI_USAGE);
    return;
  }

  if (cli.showVersion) {
    printStdout(getPackageVersion());
    return;
  }

  const { command } = cli;
  if (!command) {
    printStderr(CLI_USAGE);
    process.exitCode = 1;
    return;
  }

  await execute({ ...cli, command }, parseConfig());
};

run().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  printStderr(`citation-pipeline failed: ${message}`);
  if (error instanceof Error && error.stack) {
    printStderr(error.stack);
  }
  if (message.includes('Unknown argument') || message.includes('Unknown command')) {
    printStderr('');
    printStderr(CLI_USAGE);
  }
  process.exitCode = 1;
});
