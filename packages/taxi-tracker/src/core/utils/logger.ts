/**
 * Structured logging utility for Taxi Tracker
 *
 * Leveled logging with timestamps and contextual metadata. All output goes
 * to stderr: stdout is reserved for the report itself.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

interface LoggerConfig {
  readonly service: string;
  readonly pretty: boolean;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

const getLogLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  return level !== undefined && isLogLevel(level) ? level : 'info';
};

// Shared by every logger so --verbose reaches module loggers too
let activeLevel: LogLevel = getLogLevel();

/**
 * Override the level for all loggers (CLI --verbose)
 */
export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export function getActiveLogLevel(): LogLevel {
  return activeLevel;
}

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[activeLevel];
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    metadata?: LogMetadata
  ): string {
    const timestamp = new Date().toISOString();
    const hasMeta = metadata !== undefined && Object.keys(metadata).length > 0;

    if (this.config.pretty) {
      const metaStr = hasMeta ? ` ${JSON.stringify(metadata)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.config.service}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.config.service,
      message,
      ...(hasMeta ? metadata : {}),
    });
  }

  private write(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(level)) return;
    process.stderr.write(this.formatMessage(level, message, metadata) + '\n');
  }

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
}

/**
 * Create a logger tagged with a module name
 */
export function createLogger(module: string): Logger {
  return new Logger({
    service: `taxi-tracker:${module}`,
    pretty: process.env.NODE_ENV !== 'production',
  });
}
