/**
 * Centralized logging system with multiple output levels
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

export interface LoggerOptions {
  context?: string;
  level?: LogLevel;
}

export interface LoggingSettings {
  level?: LogLevel;
  file?: string | null;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LEVELS.some(level => level === value);
}

const envLevel = process.env.LOG_LEVEL;

// Shared by every Logger that was not given its own level.
const settings: { level: LogLevel; file: string | null } = {
  level: isLogLevel(envLevel) ? envLevel : 'info',
  file: null,
};

/**
 * Set the default level and the optional log file for all loggers.
 */
export function configureLogging(update: LoggingSettings): void {
  if (update.level) {
    settings.level = update.level;
  }
  if (update.file !== undefined) {
    settings.file = update.file;
  }
}

export function getLoggingSettings(): { level: LogLevel; file: string | null } {
  return { ...settings };
}

export class Logger {
  private logs: LogEntry[] = [];
  private maxLogs = 1000;
  private context?: string;
  private minLevel?: LogLevel;

  constructor(options: LoggerOptions = {}) {
    this.context = options.context;
    this.minLevel = options.level;
  }

  private shouldLog(level: LogLevel): boolean {
    const minIndex = LEVELS.indexOf(this.minLevel ?? settings.level);
    return LEVELS.indexOf(level) >= minIndex;
  }

  private formatMessage(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const context = entry.context ? `[${entry.context}]` : '';

    let message = `${timestamp} ${level} ${context} ${entry.message}`;

    if (entry.data && Object.keys(entry.data).length > 0) {
      message += '\n  ' + JSON.stringify(entry.data, null, 2).split('\n').join('\n  ');
    }

    if (entry.error) {
      message += `\n  Error: ${entry.error.message}\n  Stack: ${entry.error.stack}`;
    }

    return message;
  }

  private getConsoleColor(level: LogLevel): string {
    const colors: Record<LogLevel, string> = {
      debug: '\x1b[36m',    // Cyan
      info: '\x1b[32m',     // Green
      warn: '\x1b[33m',     // Yellow
      error: '\x1b[31m'     // Red
    };
    return colors[level];
  }

  private writeToFile(formatted: string): void {
    if (!settings.file) return;
    try {
      mkdirSync(dirname(settings.file), { recursive: true });
      appendFileSync(settings.file, `${formatted}\n`, 'utf8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.error(`Unable to write log file ${settings.file}: ${reason}`);
    }
  }

  private log(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) return;

    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }

    const formatted = this.formatMessage(entry);
    const color = this.getConsoleColor(entry.level);
    const reset = '\x1b[0m';

    switch (entry.level) {
      case 'error':
        console.error(`${color}${formatted}${reset}`);
        break;
      case 'warn':
        console.warn(`${color}${formatted}${reset}`);
        break;
      default:
        console.log(`${color}${formatted}${reset}`);
    }

    this.writeToFile(formatted);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'debug', message, data, context: this.context });
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'info', message, data, context: this.context });
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'warn', message, data, context: this.context });
  }

  error(message: string, error?: Error, data?: Record<string, unknown>): void {
    this.log({
      timestamp: new Date(),
      level: 'error',
      message,
      error,
      data,
      context: this.context
    });
  }

  getLogs(level?: LogLevel): LogEntry[] {
    return level ? this.logs.filter(log => log.level === level) : this.logs;
  }

  clear(): void {
    this.logs = [];
  }
}

// Singleton instance
export const logger = new Logger();

/**
 * Custom error class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string = 'UNKNOWN_ERROR',
    public exitCode: number = 1,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Normalise any thrown value into an AppError and log it
 */
export function handleError(error: unknown, context?: string): AppError {
  const contextLogger = context ? new Logger({ context }) : logger;

  if (error instanceof AppError) {
    contextLogger.error(error.message, error);
    return error;
  }

  if (error instanceof Error) {
    const appError = new AppError(error.message, 'INTERNAL_ERROR');
    contextLogger.error(error.message, error);
    return appError;
  }

  const appError = new AppError(String(error), 'UNKNOWN_ERROR');
  contextLogger.error(String(error));
  return appError;
}
