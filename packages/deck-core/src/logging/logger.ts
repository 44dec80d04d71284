/**
 * Structured logging for the assembly pipeline.
 * Core functions receive a Logger through their options and default to silence.
 */

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  prefix?: string;
  timestamps?: boolean;
  colors?: boolean;
}

const MAX_META_STRING_LENGTH = 500;

/**
 * Console-based logger implementation.
 * debug/info go to stdout, warn/error to stderr.
 */
export class ConsoleLogger implements Logger {
  private level: LogLevel;
  private prefix: string;
  private timestamps: boolean;
  private colors: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? LogLevel.WARN;
    this.prefix = options.prefix ?? '';
    this.timestamps = options.timestamps ?? false;
    this.colors = options.colors ?? false;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (this.level <= LogLevel.DEBUG) {
      console.log(this.format('DEBUG', message, meta, '\x1b[36m')); // Cyan
    }
  }

  info(message: string, meta?: Record<string, unknown>): void {
    if (this.level <= LogLevel.INFO) {
      console.log(this.format('INFO', message, meta, '\x1b[32m')); // Green
    }
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    if (this.level <= LogLevel.WARN) {
      console.error(this.format('WARN', message, meta, '\x1b[33m')); // Yellow
    }
  }

  error(message: string, meta?: Record<string, unknown>): void {
    if (this.level <= LogLevel.ERROR) {
      console.error(this.format('ERROR', message, meta, '\x1b[31m')); // Red
    }
  }

  format(
    level: string,
    message: string,
    meta: Record<string, unknown> | undefined,
    color: string
  ): string {
    const parts: string[] = [];

    if (this.timestamps) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    parts.push(this.colors ? `${color}${level}\x1b[0m` : level);

    if (this.prefix) {
      parts.push(`[${this.prefix}]`);
    }

    parts.push(message);

    if (meta && Object.keys(meta).length > 0) {
      // Compact JSON keeps one entry per line
      parts.push(JSON.stringify(truncateMeta(meta)));
    }

    return parts.join(' ');
  }
}

function truncateMeta(meta: Record<string, unknown>): Record<string, unknown> {
  const truncated: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    if (typeof value === 'string' && value.length > MAX_META_STRING_LENGTH) {
      truncated[key] = `${value.slice(0, MAX_META_STRING_LENGTH)}... [${value.length} chars]`;
    } else if (value instanceof Error) {
      truncated[key] = value.message;
    } else {
      truncated[key] = value;
    }
  }
  return truncated;
}

/**
 * No-op logger for testing or silent mode
 */
export class SilentLogger implements Logger {
  debug(_message: string, _meta?: Record<string, unknown>): void {
    // No-op
  }

  info(_message: string, _meta?: Record<string, unknown>): void {
    // No-op
  }

  warn(_message: string, _meta?: Record<string, unknown>): void {
    // No-op
  }

  error(_message: string, _meta?: Record<string, unknown>): void {
    // No-op
  }
}

/**
 * Parse a LOG_LEVEL style name
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}

/**
 * Create a logger based on environment
 */
export function createLogger(options?: ConsoleLoggerOptions): Logger {
  // In test environment, use silent logger
  if (process.env.NODE_ENV === 'test') {
    return new SilentLogger();
  }

  return new ConsoleLogger({
    ...options,
    level: options?.level ?? parseLogLevel(process.env.LOG_LEVEL),
  });
}
