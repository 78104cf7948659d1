/**
 * Structured JSON logger for git-readout
 *
 * Provides configurable logging with:
 * - JSON output format
 * - Configurable log levels (debug/info/warn/error)
 * - Optional file output
 * - Timestamps and context metadata
 */

import pino, { type Logger, type LoggerOptions, type DestinationStream } from 'pino';
import { createWriteStream } from 'node:fs';
import type { LoggingConfig } from '../config/schema.js';

/**
 * Log level type
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Context metadata for log entries
 */
export interface LogContext {
  /** Decoder or command that produced the entry */
  component?: string;
  /** Operation name */
  operation?: string;
  /** Additional metadata */
  [key: string]: unknown;
}

/**
 * Logger instance type
 */
export type ReadoutLogger = Logger;

/**
 * Create a destination stream for logging
 */
function createDestination(config: LoggingConfig): DestinationStream | undefined {
  if (config.file !== undefined && config.file !== '') {
    return createWriteStream(config.file, { flags: 'a' });
  }
  return undefined;
}

/**
 * Create logger options from configuration
 */
function createLoggerOptions(config: LoggingConfig): LoggerOptions {
  const options: LoggerOptions = {
    level: config.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'git-readout',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (config.pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: 2,
      },
    };
  }

  return options;
}

/**
 * Create a configured logger instance
 *
 * Logs go to stderr unless a file is configured, so decoded output on
 * stdout stays clean.
 */
export function createLogger(config: LoggingConfig): ReadoutLogger {
  const options = createLoggerOptions(config);
  const destination = createDestination(config);

  if (destination !== undefined) {
    return pino(options, destination);
  }

  if (options.transport !== undefined) {
    return pino(options);
  }

  return pino(options, pino.destination(2));
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(logger: ReadoutLogger, context: LogContext): ReadoutLogger {
  return logger.child(context);
}

/**
 * Default logger instance (warn level, stderr, JSON format).
 * Replaced through setDefaultLogger() once configuration is loaded.
 */
let defaultLogger: ReadoutLogger | null = null;

/**
 * Get or create the default logger instance
 */
export function getLogger(): ReadoutLogger {
  defaultLogger ??= createLogger({
    level: 'warn',
    pretty: false,
  });
  return defaultLogger;
}

/**
 * Set the default logger instance
 */
export function setDefaultLogger(logger: ReadoutLogger): void {
  defaultLogger = logger;
}

/**
 * Utility function to log operation start
 */
export function logOperationStart(
  logger: ReadoutLogger,
  operation: string,
  context?: LogContext
): void {
  logger.debug({ operation, ...context }, `Starting ${operation}`);
}

/**
 * Utility function to log operation completion
 */
export function logOperationComplete(
  logger: ReadoutLogger,
  operation: string,
  durationMs: number,
  context?: LogContext
): void {
  logger.debug(
    { operation, durationMs, ...context },
    `Completed ${operation} in ${durationMs}ms`
  );
}

/**
 * Utility function to log operation failure
 */
export function logOperationError(
  logger: ReadoutLogger,
  operation: string,
  error: Error,
  context?: LogContext
): void {
  logger.error(
    {
      operation,
      error: {
        message: error.message,
        name: error.name,
        stack: error.stack,
      },
      ...context,
    },
    `Failed ${operation}: ${error.message}`
  );
}

/**
 * Run a synchronous operation, logging its start, completion and failure
 */
export function withLogging<T>(
  logger: ReadoutLogger,
  operation: string,
  fn: () => T,
  context?: LogContext
): T {
  const start = Date.now();
  logOperationStart(logger, operation, context);

  try {
    const result = fn();
    logOperationComplete(logger, operation, Date.now() - start, context);
    return result;
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logOperationError(logger, operation, err, context);
    throw error;
  }
}
