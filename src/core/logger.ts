export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export type LogWriter = (line: string) => void;

const writeStderr: LogWriter = (line) => {
  process.stderr.write(`${line}\n`);
};

export class Logger {
  constructor(
    private readonly minLevel: LogLevel,
    private readonly bindings: Record<string, unknown> = {},
    private readonly write: LogWriter = writeStderr
  ) {}

  /** Returns a logger that stamps every entry with `component`. */
  child(component: string, bindings: Record<string, unknown> = {}): Logger {
    return new Logger(this.minLevel, { ...this.bindings, component, ...bindings }, this.write);
  }

  isEnabled(level: LogLevel): boolean {
    return PRIORITY[level] >= PRIORITY[this.minLevel];
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const merged = { ...this.bindings, ...(context ?? {}) };
    const payload = {
      ts: new Date().toISOString(),
      level,
      message,
      ...(Object.keys(merged).length > 0 ? { context: merged } : {})
    };

    this.write(JSON.stringify(payload));
  }
}

export const describeError = (error: unknown): Record<string, unknown> =>
  error instanceof Error
    ? { errorType: error.name, error: error.message }
    : { errorType: typeof error, error: String(error) };
