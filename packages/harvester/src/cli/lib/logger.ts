/**
 * CLI output
 *
 * Human-readable lines for interactive runs, one JSON object per line with
 * --json. The same instance is handed to the harvest components as their log
 * sink, so progress lines and retry warnings share the command's format.
 *
 * @module cli/lib/logger
 */

import type { LogLevel, LogMetadata, LogSink } from '../../core/utils/logger.js';

export interface CLILoggerConfig {
  /** Minimum log level to output */
  readonly level: LogLevel;
  /** Output as JSON */
  readonly json: boolean;
  /** Colour the level label in human output */
  readonly color?: boolean;
  readonly service?: string;
}

const LEVELS: Record<LogLevel, { readonly rank: number; readonly label: string; readonly ansi: string }> = {
  debug: { rank: 0, label: 'DEBUG', ansi: '\x1b[90m' },
  info: { rank: 1, label: 'INFO ', ansi: '\x1b[34m' },
  warn: { rank: 2, label: 'WARN ', ansi: '\x1b[33m' },
  error: { rank: 3, label: 'ERROR', ansi: '\x1b[31m' },
};

export class CLILogger implements LogSink {
  private readonly config: CLILoggerConfig;
  private startTime: number;
  private commandContext: string | null = null;

  constructor(config: CLILoggerConfig) {
    this.config = {
      service: 'geo-harvest',
      ...config,
    };
    this.startTime = Date.now();
  }

  get isJson(): boolean {
    return this.config.json;
  }

  private formatJson(level: LogLevel, message: string, metadata?: LogMetadata): string {
    return JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.config.service && { service: this.config.service }),
      ...(this.commandContext && { command: this.commandContext }),
      ...metadata,
    });
  }

  private formatHuman(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const { label, ansi } = LEVELS[level];
    const tag = this.config.color ? `${ansi}${label}\x1b[0m` : label;
    let line = `${new Date().toISOString()} ${tag} ${message}`;

    if (metadata && Object.keys(metadata).length > 0) {
      const pairs = Object.entries(metadata).map(
        ([key, value]) => `${key}=${typeof value === 'object' ? JSON.stringify(value) : String(value)}`
      );
      line += ` (${pairs.join(' ')})`;
    }

    return line;
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (LEVELS[level].rank < LEVELS[this.config.level].rank) return;

    const formatted = this.config.json
      ? this.formatJson(level, message, metadata)
      : this.formatHuman(level, message, metadata);
    console[level](formatted);
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', message, metadata);
  }

  /**
   * Tag subsequent entries with the command and restart the duration clock
   */
  commandStart(command: string, options?: LogMetadata): void {
    this.commandContext = command;
    this.startTime = Date.now();
    this.info(`Starting ${command}`, options);
  }

  commandEnd(success: boolean, metadata?: LogMetadata): void {
    const baseMetadata = { duration_ms: Date.now() - this.startTime, ...metadata };

    if (success) {
      this.info('Command completed', baseMetadata);
    } else {
      this.error('Command failed', baseMetadata);
    }
  }

  /**
   * Print rows as an aligned table, or a single JSON array under --json
   */
  table(data: readonly Record<string, unknown>[], columns?: readonly string[]): void {
    if (this.config.json) {
      console.log(JSON.stringify(data));
      return;
    }

    const first = data[0];
    if (first === undefined) {
      this.info('No data to display');
      return;
    }

    const cols = columns ?? Object.keys(first);
    const widths = new Map<string, number>();
    for (const col of cols) {
      let width = col.length;
      for (const row of data) {
        width = Math.max(width, String(row[col] ?? '').length);
      }
      widths.set(col, width);
    }

    const pad = (col: string, value: string): string => value.padEnd(widths.get(col) ?? 0);
    console.log(cols.map((col) => pad(col, col)).join(' | '));
    console.log(cols.map((col) => '-'.repeat(widths.get(col) ?? 0)).join('-+-'));
    for (const row of data) {
      console.log(cols.map((col) => pad(col, String(row[col] ?? ''))).join(' | '));
    }
  }
}

export function createCLILogger(config: Partial<CLILoggerConfig> = {}): CLILogger {
  return new CLILogger({
    level: config.level ?? 'info',
    json: config.json ?? false,
    color: config.color ?? process.stdout.isTTY === true,
    service: config.service ?? 'geo-harvest',
  });
}

/**
 * Format a duration in milliseconds for display
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(1);
  return `${minutes}m ${seconds}s`;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  } else if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(2)} KB`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}
