/**
 * Restroom Finder CLI Logging
 *
 * Diagnostics (`debug` to `error`) are filtered by level and rendered either
 * as JSON lines or as colored single lines. Command results (import
 * summaries, cleaning reports, added records) go through `print`, which is
 * never filtered and never decorated.
 *
 * @module cli/lib/logger
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

export interface StructuredLogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly message: string;
  readonly service: string;
  readonly command?: string;
  readonly [key: string]: unknown;
}

/** Destination for rendered lines; the console unless a sink is given */
export type LogSink = (level: LogLevel | 'print', line: string) => void;

export interface CLILoggerConfig {
  /** Minimum level for diagnostics */
  readonly level: LogLevel;
  /** Render diagnostics as JSON lines */
  readonly json: boolean;
  readonly service?: string;
  readonly sink?: LogSink;
}

interface RenderInput {
  readonly level: LogLevel;
  readonly message: string;
  readonly service: string;
  readonly command: string | null;
  readonly metadata: LogMetadata;
}

type Renderer = (input: RenderInput) => string;

// ============================================================================
// Rendering
// ============================================================================

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const ANSI = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  key: '\x1b[36m',
  debug: '\x1b[90m',
  info: '\x1b[34m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
} as const;

const paint = (style: keyof typeof ANSI, text: string): string =>
  `${ANSI[style]}${text}${ANSI.reset}`;

const renderJson: Renderer = ({ level, message, service, command, metadata }) => {
  const entry: StructuredLogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    service,
    ...(command ? { command } : {}),
    ...metadata,
  };
  return JSON.stringify(entry);
};

const renderHuman: Renderer = ({ level, message, metadata }) => {
  const head = `${paint('dim', new Date().toISOString())} ${paint(level, level.toUpperCase().padEnd(5))} ${message}`;
  const pairs = Object.entries(metadata).map(([key, value]) => {
    const text = value !== null && typeof value === 'object' ? JSON.stringify(value) : String(value);
    return `${paint('key', key)}=${text}`;
  });
  return pairs.length > 0 ? `${head} ${paint('dim', `(${pairs.join(' ')})`)}` : head;
};

const consoleSink: LogSink = (level, line) => {
  if (level === 'print') {
    console.log(line);
  } else if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.info(line);
  }
};

// ============================================================================
// CLI Logger
// ============================================================================

export class CLILogger {
  private readonly level: LogLevel;
  private readonly service: string;
  private readonly sink: LogSink;
  private readonly render: Renderer;
  readonly json: boolean;

  private command: string | null = null;
  private commandStartedAt = Date.now();

  constructor(config: CLILoggerConfig) {
    this.level = config.level;
    this.json = config.json;
    this.service = config.service ?? 'restroom-finder';
    this.sink = config.sink ?? consoleSink;
    this.render = config.json ? renderJson : renderHuman;
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.emit('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.emit('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.emit('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.emit('error', message, metadata);
  }

  /**
   * One line of command output
   */
  print(line: string): void {
    this.sink('print', line);
  }

  /**
   * Tag later entries with the command name and restart its timer
   */
  commandStart(command: string, options?: LogMetadata): void {
    this.command = command;
    this.commandStartedAt = Date.now();
    this.debug(`Starting ${command}`, options);
  }

  commandEnd(success: boolean, metadata?: LogMetadata): void {
    const summary = { duration_ms: Date.now() - this.commandStartedAt, ...metadata };
    if (success) {
      this.debug('Command completed', summary);
    } else {
      this.error('Command failed', summary);
    }
  }

  private emit(level: LogLevel, message: string, metadata: LogMetadata = {}): void {
    if (RANK[level] < RANK[this.level]) return;
    this.sink(
      level,
      this.render({ level, message, service: this.service, command: this.command, metadata })
    );
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function createCLILogger(config: Partial<CLILoggerConfig> = {}): CLILogger {
  return new CLILogger({
    level: config.level ?? 'info',
    json: config.json ?? false,
    service: config.service,
    sink: config.sink,
  });
}

/**
 * "850ms", "12.40s", "3m 5.0s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(2)}s`;

  const minutes = Math.floor(ms / 60_000);
  return `${minutes}m ${((ms % 60_000) / 1000).toFixed(1)}s`;
}
