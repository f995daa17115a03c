export type CliCommand = 'dispatch' | 'work' | 'serve';

export interface CliArgs {
  showHelp: boolean;
  showVersion: boolean;
  command?: CliCommand;
  /** `work`: handle a single poll and exit. */
  once: boolean;
  /** `dispatch`: resume from this encoded command instead of starting a new chain. */
  resume?: string;
}

const COMMANDS: CliCommand[] = ['dispatch', 'work', 'serve'];
const COMMAND_SET = new Set<string>(COMMANDS);

const isCommand = (value: string): value is CliCommand => COMMAND_SET.has(value);

export const CLI_USAGE = `citation-pipeline: queue-driven citation enrichment

Usage:
  citation-pipeline dispatch [--resume <json>]
  citation-pipeline work [--once]
  citation-pipeline serve
  citation-pipeline --help
  citation-pipeline --version

Commands:
  dispatch            Split the input records into batches and queue them
  work                Poll the record queue and enrich each delivery
  serve               Start the HTTP control server

Options:
  --resume <json>     Continue a dispatch chain from a resume command
  --once              Handle one poll of the queue, then exit
  -h, --help          Show help
  -v, --version       Print package version`;

export const parseCliArgs = (argv: string[]): CliArgs => {
  const args: CliArgs = {
    showHelp: false,
    showVersion: false,
    once: false
  };

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index]?.trim();

    if (!arg) {
      continue;
    }

    if (arg === '-h' || arg === '--help') {
      args.showHelp = true;
      continue;
    }

    if (arg === '-v' || arg === '--version') {
      args.showVersion = true;
      continue;
    }

    if (arg === '--once') {
      args.once = true;
      continue;
    }

    if (arg === '--resume') {
      const nextValue = argv[index + 1];
      if (!nextValue) {
        throw new Error('Missing value after --resume.');
      }

      args.resume = nextValue;
      index += 1;
      continue;
    }

    if (arg.startsWith('--resume=')) {
      args.resume = arg.slice('--resume='.length);
      continue;
    }

    if (!arg.startsWith('-') && args.command === undefined) {
      if (!isCommand(arg)) {
        throw new Error(`Unknown command "${arg}". Expected one of: ${COMMANDS.join(', ')}.`);
      }

      args.command = arg;
      continue;
    }

    throw new Error(`Unknown argument "${arg}".`);
  }

  if (args.once && args.command !== 'work') {
    throw new Error('--once applies only to the work command.');
  }

  if (args.resume !== undefined && args.command !== 'dispatch') {
    throw new Error('--resume applies only to the dispatch command.');
  }

  return args;
};
