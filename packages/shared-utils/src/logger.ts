/**
 * Simple logging utility
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  level: LogLevel;
  prefix?: string;
  timestamps?: boolean;
}

// Level used by loggers created without an explicit one
let defaultLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  defaultLevel = level;
}

export class Logger {
  private fixedLevel: LogLevel | undefined;
  private prefix: string;
  private timestamps: boolean;

  constructor(options: Partial<LoggerOptions> = {}) {
    this.fixedLevel = options.level;
    this.prefix = options.prefix ?? '';
    this.timestamps = options.timestamps ?? true;
  }

  get level(): LogLevel {
    return this.fixedLevel ?? defaultLevel;
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS[this.level] <= LOG_LEVELS[level];
  }

  formatMessage(level: LogLevel, message: string, ...args: unknown[]): string {
    const parts: string[] = [];

    if (this.timestamps) {
      parts.push(new Date().toISOString());
    }

    parts.push(`[${level.toUpperCase()}]`);

    if (this.prefix) {
      parts.push(`[${this.prefix}]`);
    }

    parts.push(message);

    if (args.length > 0) {
      parts.push(args.map(formatArg).join(' '));
    }

    return parts.join(' ');
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled('debug')) {
      console.debug(this.formatMessage('debug', message, ...args));
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled('info')) {
      console.info(this.formatMessage('info', message, ...args));
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled('warn')) {
      console.warn(this.formatMessage('warn', message, ...args));
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled('error')) {
      console.error(this.formatMessage('error', message, ...args));
    }
  }
}

function formatArg(arg: unknown): string {
  // Error fields are non-enumerable, JSON.stringify would print {}
  if (arg instanceof Error) return arg.message;
  return typeof arg === 'object' ? JSON.stringify(arg) : String(arg);
}

// Create a logger with specific prefix
export function createLogger(prefix: string, options: Partial<LoggerOptions> = {}): Logger {
  return new Logger({ ...options, prefix });
}
