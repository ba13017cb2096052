/**
 * Module loggers
 *
 * Default sink for library components used outside the CLI.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

/**
 * Anything that accepts leveled log lines (module loggers, the CLI logger)
 */
export interface LogSink {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;
}

export interface LoggerConfig {
  readonly level: LogLevel;
  readonly service: string;
  readonly pretty: boolean;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export class Logger implements LogSink {
  constructor(private readonly config: LoggerConfig) {}

  private emit(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.config.level]) return;

    const timestamp = new Date().toISOString();
    const hasMetadata = metadata !== undefined && Object.keys(metadata).length > 0;

    if (this.config.pretty) {
      const metaStr = hasMetadata ? ` ${JSON.stringify(metadata)}` : '';
      console[level](`[${timestamp}] ${level.toUpperCase()} ${this.config.service}: ${message}${metaStr}`);
      return;
    }

    console[level](JSON.stringify({ timestamp, level, service: this.config.service, message, ...metadata }));
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
}

function levelFromEnv(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  return level === 'debug' || level === 'info' || level === 'warn' || level === 'error'
    ? level
    : 'info';
}

/**
 * Logger for one module; level from LOG_LEVEL, JSON lines when NODE_ENV=production
 */
export function createLogger(context: { readonly module: string }): Logger {
  return new Logger({
    level: levelFromEnv(),
    service: `geo-harvest:${context.module}`,
    pretty: process.env.NODE_ENV !== 'production',
  });
}
