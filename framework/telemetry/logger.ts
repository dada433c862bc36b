/**
 * Structured Logging
 *
 * Diagnostic channel for the decoration layer. Entries are structured
 * (level, message, context) and go to an output hook, so applications can
 * route them to their own logging pipeline and tests can capture them.
 */

import { getConfig } from '../config/config.ts';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: 'json' | 'pretty';
  context?: Record<string, unknown>;
  output?: (entry: LogEntry) => void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Structured logger
 */
export class Logger {
  private level: LogLevel;
  private format: 'json' | 'pretty';
  private context: Record<string, unknown>;
  private output: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'json';
    this.context = options.context ?? {};
    this.output = options.output ?? this.defaultOutput.bind(this);
  }

  /**
   * Log at debug level
   */
  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  /**
   * Log at info level
   */
  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  /**
   * Log at warn level
   */
  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  /**
   * Log at error level
   */
  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      context: { ...this.context, ...context },
      output: this.output,
    });
  }

  /**
   * Set the log level
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Check if a level is enabled
   */
  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  /**
   * Core logging method
   */
  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: { ...this.context, ...context },
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    this.output(entry);
  }

  private defaultOutput(entry: LogEntry): void {
    const write = entry.level === 'warn' || entry.level === 'error' ? console.error : console.log;

    if (this.format === 'json') {
      write(JSON.stringify(entry));
      return;
    }

    const colors: Record<LogLevel, string> = {
      debug: '\x1b[36m', // Cyan
      info: '\x1b[32m', // Green
      warn: '\x1b[33m', // Yellow
      error: '\x1b[31m', // Red
    };
    const reset = '\x1b[0m';
    const dim = '\x1b[2m';

    const level = colors[entry.level] + entry.level.toUpperCase().padEnd(5) + reset;
    let line = `${dim}${entry.timestamp}${reset} ${level} ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      line += ` ${dim}${JSON.stringify(entry.context)}${reset}`;
    }

    write(line);

    if (entry.error?.stack) {
      write(dim + entry.error.stack + reset);
    }
  }
}

let defaultLogger: Logger | null = null;

/**
 * Get the default logger, built from the current configuration on first use
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    const config = getConfig();
    const production = config.get<string>('env') === 'production';
    defaultLogger = new Logger({
      level: config.get<LogLevel>('logLevel', 'info'),
      format: production ? 'json' : 'pretty',
      context: { component: 'mantle' },
    });
  }
  return defaultLogger;
}

/**
 * Replace the default logger. Passing null resets it to the configured one.
 */
export function setLogger(logger: Logger | null): void {
  defaultLogger = logger;
}
