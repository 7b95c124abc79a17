/**
 * Logger for the Smart Format Language Server
 * Writes to the client's output channel once a connection is attached
 */

import type { Connection } from 'vscode-languageserver/node';

/**
 * Log levels
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
  VERBOSE = 4
}

/**
 * Context attached to a log line
 */
export interface LogContext {
  uri?: string;
  position?: { line: number; character: number };
  operation?: string;
  duration?: number;
  error?: unknown;
  [key: string]: unknown;
}

const KNOWN_CONTEXT_KEYS = ['uri', 'position', 'operation', 'duration', 'error'];

type ConsoleMethod = 'error' | 'warn' | 'info' | 'log';

export class Logger {
  private connection: Pick<Connection, 'console'> | null = null;
  private level: LogLevel = LogLevel.INFO;
  private verboseLogging: boolean = false;

  /**
   * Attach the language server connection
   * @param verboseLogging - log every formatting decision regardless of level
   */
  initialize(connection: Pick<Connection, 'console'>, level: LogLevel = LogLevel.INFO, verboseLogging: boolean = false): void {
    this.connection = connection;
    this.level = level;
    this.verboseLogging = verboseLogging;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setVerboseLogging(enabled: boolean): void {
    this.verboseLogging = enabled;
    if (enabled) {
      this.info('Verbose logging enabled - every formatting decision will be logged');
    }
  }

  isVerboseLoggingEnabled(): boolean {
    return this.verboseLogging || this.level >= LogLevel.VERBOSE;
  }

  error(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.ERROR) {
      this.write('error', this.format(message, args));
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.WARN) {
      this.write('warn', this.format(message, args));
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.INFO) {
      this.write('info', this.format(message, args));
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.DEBUG) {
      this.write('log', this.format(message, args));
    }
  }

  /**
   * Only shown when verbose logging is enabled
   */
  verbose(message: string, ...args: unknown[]): void {
    if (this.isVerboseLoggingEnabled()) {
      this.write('log', `[VERBOSE] ${this.format(message, args)}`);
    }
  }

  verboseWithContext(message: string, context: LogContext): void {
    if (!this.isVerboseLoggingEnabled()) {
      return;
    }
    this.write('log', this.formatContext(`[VERBOSE] ${message}`, context));
  }

  debugWithContext(message: string, context: LogContext): void {
    this.debug(this.formatContext(message, context));
  }

  /**
   * Log an error with context, including the stack when there is one
   */
  errorWithContext(message: string, context: LogContext): void {
    let formatted = this.formatContext(message, context);
    if (context.error instanceof Error && context.error.stack) {
      formatted += ` | Stack: ${context.error.stack}`;
    }
    this.error(formatted);
  }

  private write(method: ConsoleMethod, formatted: string): void {
    if (this.connection) {
      this.connection.console[method](formatted);
      return;
    }

    switch (method) {
      case 'error':
        console.error(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      case 'info':
        console.info(formatted);
        break;
      case 'log':
        console.log(formatted);
        break;
    }
  }

  private formatContext(message: string, context: LogContext): string {
    const parts: string[] = [message];

    if (context.uri) {
      parts.push(`URI: ${context.uri}`);
    }

    if (context.position) {
      parts.push(`Position: ${context.position.line}:${context.position.character}`);
    }

    if (context.operation) {
      parts.push(`Operation: ${context.operation}`);
    }

    if (context.duration !== undefined) {
      parts.push(`Duration: ${context.duration}ms`);
    }

    for (const [key, value] of Object.entries(context)) {
      if (!KNOWN_CONTEXT_KEYS.includes(key)) {
        parts.push(`${key}: ${this.stringify(value)}`);
      }
    }

    if (context.error !== undefined) {
      parts.push(`Error: ${getErrorMessage(context.error)}`);
    }

    return parts.join(' | ');
  }

  private format(message: string, args: unknown[]): string {
    if (args.length === 0) {
      return message;
    }
    return `${message} ${args.map(arg => this.stringify(arg)).join(' ')}`;
  }

  private stringify(value: unknown): string {
    if (typeof value !== 'object' || value === null) {
      return String(value);
    }
    try {
      return JSON.stringify(value);
    } catch {
      return '[unserializable]';
    }
  }
}

/**
 * Extract a message from any thrown value
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Global logger instance
 */
export const logger = new Logger();
