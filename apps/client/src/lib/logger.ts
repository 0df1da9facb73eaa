/**
 * Veilpost - Logger
 *
 * Namespaced, levelled logging. Every record goes to a sink; the default
 * sink prints to the console, hosts and tests can pass their own.
 * The threshold comes from VEILPOST_LOG_LEVEL unless a logger is given one.
 * Errors are never filtered.
 */

import { config, type LogLevel } from './env.js';

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const CONSOLE_METHOD: Record<LogLevel, 'log' | 'info' | 'warn' | 'error'> = {
  debug: 'log',
  info: 'info',
  warn: 'warn',
  error: 'error',
};

export interface LogRecord {
  level: LogLevel;
  namespace: string;
  message: string;
  args: unknown[];
  time: Date;
}

export type LogSink = (record: LogRecord) => void;

export interface LoggerOptions {
  /** Lowest level passed to the sink */
  level?: LogLevel;
  sink?: LogSink;
}

/**
 * Print `[namespace] message`, prefixed with an ISO timestamp outside development.
 */
export function createConsoleSink(timestamps: boolean = !config.isDev): LogSink {
  return ({ level, namespace, message, args, time }) => {
    const line = `[${namespace}] ${message}`;
    // eslint-disable-next-line no-console
    console[CONSOLE_METHOD[level]](timestamps ? `${time.toISOString()} ${line}` : line, ...args);
  };
}

export class Logger {
  private readonly level: LogLevel;
  private readonly sink: LogSink;

  constructor(
    readonly namespace: string,
    options: LoggerOptions = {}
  ) {
    this.level = options.level ?? config.logLevel;
    this.sink = options.sink ?? createConsoleSink();
  }

  /** Logger for `namespace:<name>` with the same threshold and sink. */
  child(name: string): Logger {
    return new Logger(`${this.namespace}:${name}`, { level: this.level, sink: this.sink });
  }

  debug(message: string, ...args: unknown[]): void {
    this.emit('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.emit('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.emit('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.emit('error', message, args);
  }

  private emit(level: LogLevel, message: string, args: unknown[]): void {
    if (SEVERITY[level] < SEVERITY[this.level] && level !== 'error') return;
    this.sink({ level, namespace: this.namespace, message, args, time: new Date() });
  }
}

export function createLogger(namespace: string, options: LoggerOptions = {}): Logger {
  return new Logger(namespace, options);
}

// Module loggers
export const cryptoLogger = createLogger('E2EE');
export const keyStoreLogger = createLogger('LocalKeyStore');
export const directoryLogger = createLogger('KeyDirectory');
