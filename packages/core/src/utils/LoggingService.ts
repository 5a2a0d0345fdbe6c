import type { Logger } from '../types/index.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3
}

/**
 * Anything lines can be appended to; process.stderr by default.
 */
export interface LogStream {
  write(chunk: string): unknown;
}

/**
 * Parse a level name such as "warn" or "DEBUG".
 */
export function parseLogLevel(value: string): LogLevel | null {
  switch (value.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return null;
  }
}

/**
 * Centralized logging service.
 *
 * Writes to stderr unless told otherwise: stdout carries the converted
 * document (CLI) or the protocol stream (MCP server).
 */
export class LoggingService implements Logger {
  private stream: LogStream;
  private logLevel: LogLevel;

  constructor(logLevel: LogLevel = LogLevel.WARN, stream: LogStream = process.stderr) {
    this.logLevel = logLevel;
    this.stream = stream;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.DEBUG) {
      this.log('DEBUG', message, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.INFO) {
      this.log('INFO', message, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.WARN) {
      this.log('WARN', message, ...args);
    }
  }

  error(message: string, error?: Error, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.ERROR) {
      this.log('ERROR', message, ...args);
      if (error?.stack) {
        this.stream.write(`  Stack: ${error.stack}\n`);
      }
    }
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  getLevel(): LogLevel {
    return this.logLevel;
  }

  private log(level: string, message: string, ...args: unknown[]): void {
    const timestamp = new Date().toISOString();
    this.stream.write(`[${timestamp}] [${level}] ${message}\n`);

    args.forEach(arg => {
      if (typeof arg === 'object' && arg !== null) {
        this.stream.write(`  ${JSON.stringify(arg, null, 2)}\n`);
      } else {
        this.stream.write(`  ${String(arg)}\n`);
      }
    });
  }
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
