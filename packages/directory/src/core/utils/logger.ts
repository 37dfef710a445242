/**
 * Module logger for the restroom directory
 *
 * One JSON object per line in production; a single readable line with the
 * module name otherwise. `LOG_LEVEL` selects the threshold (default `info`,
 * `error` under vitest).
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

interface ModuleLoggerOptions {
  readonly module: string;
  readonly level: LogLevel;
  readonly pretty: boolean;
  /** Fields attached to every entry */
  readonly bound: LogMetadata;
}

const SEVERITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

const SERVICE = 'restroom-finder';

export class Logger {
  constructor(private readonly options: ModuleLoggerOptions) {}

  debug(message: string, metadata?: LogMetadata): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.write('error', message, metadata);
  }

  /**
   * Logger for the same module with extra fields on every entry
   */
  child(bound: LogMetadata): Logger {
    return new Logger({ ...this.options, bound: { ...this.options.bound, ...bound } });
  }

  private write(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (SEVERITY[level] < SEVERITY[this.options.level]) return;

    const fields = { ...this.options.bound, ...metadata };
    const timestamp = new Date().toISOString();
    const hasFields = Object.keys(fields).length > 0;

    const line = this.options.pretty
      ? `[${timestamp}] ${level.toUpperCase()} ${this.options.module}: ${message}` +
        (hasFields ? ` ${JSON.stringify(fields)}` : '')
      : JSON.stringify({
          timestamp,
          level,
          service: SERVICE,
          module: this.options.module,
          message,
          ...fields,
        });

    WRITERS[level](line);
  }
}

function resolveLevel(): LogLevel {
  const requested = process.env.LOG_LEVEL?.toLowerCase();
  switch (requested) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return requested;
    default:
      return process.env.VITEST ? 'error' : 'info';
  }
}

/**
 * Logger scoped to a module, e.g. `createLogger({ module: 'tabular-import' })`
 */
export function createLogger(context: { readonly module: string }): Logger {
  return new Logger({
    module: context.module,
    level: resolveLevel(),
    pretty: process.env.NODE_ENV !== 'production',
    bound: {},
  });
}

export const logger = createLogger({ module: 'directory' });
