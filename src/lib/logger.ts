/**
 * Structured Logger
 * JSON-lines logging to stderr, one logger per component.
 * stdout is reserved for command output so it stays machine-readable.
 */

import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** Correlates every log line of one executor call */
  requestId?: string;
  method?: string;
  path?: string;
  /** Milliseconds */
  duration?: number;
  statusCode?: number;
  attempt?: number;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  /** Minimum level written (default: MYOB_LOG_LEVEL or 'warn') */
  minLevel?: LogLevel;
  /** Custom formatter */
  formatter?: (entry: LogEntry) => string;
  /** Include stack traces on errors (default: false) */
  includeStack?: boolean;
  /** Sink for formatted lines (default: stderr) */
  write?: (line: string) => void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.MYOB_LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'warn';
}

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export class StructuredLogger {
  private readonly component: string;
  private minLevel: LogLevel;
  private readonly formatter: (entry: LogEntry) => string;
  private readonly includeStack: boolean;
  private readonly write: (line: string) => void;

  constructor(component: string, config: LoggerConfig = {}) {
    this.component = component;
    this.minLevel = config.minLevel ?? defaultLevel();
    this.formatter = config.formatter ?? ((entry) => JSON.stringify(entry));
    this.includeStack = config.includeStack ?? false;
    this.write = config.write ?? ((line) => process.stderr.write(`${line}\n`));
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error | null, context?: LogContext): void {
    if (!this.shouldLog('error')) return;

    const entry = this.entry('error', message, context);
    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        code: errorCode(error),
        stack: this.includeStack ? error.stack : undefined,
      };
    }
    this.write(this.formatter(entry));
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) return;
    this.write(this.formatter(this.entry(level, message, context)));
  }

  private entry(level: LogLevel, message: string, context?: LogContext): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      message,
      component: this.component,
      context,
    };
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }
}

/**
 * Component loggers
 */
export const loggers = {
  api: new StructuredLogger('API'),
  auth: new StructuredLogger('Auth'),
  cache: new StructuredLogger('Cache'),
  retry: new StructuredLogger('Retry'),
  config: new StructuredLogger('Config'),
  cli: new StructuredLogger('CLI'),
};

/**
 * Apply one level to every component logger (`--verbose`, MYOB_LOG_LEVEL)
 */
export function setLogLevel(level: LogLevel): void {
  for (const logger of Object.values(loggers)) {
    logger.setMinLevel(level);
  }
}

export function generateRequestId(): string {
  return randomUUID();
}
