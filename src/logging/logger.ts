/**
 * Structured JSON logger for partlens
 *
 * Provides configurable logging with:
 * - JSON output format
 * - Configurable log levels (debug/info/warn/error)
 * - Optional file output
 * - Timestamps and component metadata
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
  /** Component emitting the entry (cache, router, index, ...) */
  component?: string;
  /** Operation name */
  operation?: string;
  /** Additional metadata */
  [key: string]: unknown;
}

/**
 * Logger instance type
 */
export type PartlensLogger = Logger;

/**
 * Log file when configured, stderr otherwise: stdout carries CLI output and
 * the MCP stdio protocol
 */
function createDestination(config: LoggingConfig): DestinationStream {
  if (config.file !== undefined && config.file !== '') {
    return createWriteStream(config.file, { flags: 'a' });
  }
  return pino.destination(2);
}

function createLoggerOptions(config: LoggingConfig): LoggerOptions {
  const options: LoggerOptions = {
    level: config.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'partlens',
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
        destination: config.file !== undefined && config.file !== '' ? config.file : 2,
      },
    };
  }

  return options;
}

/**
 * Create a configured logger instance
 */
export function createLogger(config: LoggingConfig): PartlensLogger {
  const options = createLoggerOptions(config);
  if (options.transport !== undefined) {
    return pino(options);
  }
  return pino(options, createDestination(config));
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(logger: PartlensLogger, context: LogContext): PartlensLogger {
  return logger.child(context);
}

let defaultLogger: PartlensLogger | null = null;

/**
 * Get or create the default logger instance.
 * CLI and MCP entry points replace it via setDefaultLogger() once config is loaded.
 */
export function getLogger(): PartlensLogger {
  defaultLogger ??= createLogger({
    level: process.env.PARTLENS_LOG_LEVEL === 'debug' ? 'debug' : 'warn',
    pretty: false,
  });
  return defaultLogger;
}

/**
 * Set the default logger instance
 */
export function setDefaultLogger(logger: PartlensLogger): void {
  defaultLogger = logger;
}

/**
 * Scoped logger for one engine component
 */
export function getComponentLogger(component: string): PartlensLogger {
  return createChildLogger(getLogger(), { component });
}

export function logOperationStart(
  logger: PartlensLogger,
  operation: string,
  context?: LogContext
): void {
  logger.info({ operation, ...context }, `Starting ${operation}`);
}

export function logOperationComplete(
  logger: PartlensLogger,
  operation: string,
  durationMs: number,
  context?: LogContext
): void {
  logger.info({ operation, durationMs, ...context }, `Completed ${operation} in ${durationMs}ms`);
}

export function logOperationError(
  logger: PartlensLogger,
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
 * Run an async operation, logging start, completion and failure
 */
export async function withLogging<T>(
  logger: PartlensLogger,
  operation: string,
  fn: () => Promise<T>,
  context?: LogContext
): Promise<T> {
  const start = Date.now();
  logOperationStart(logger, operation, context);

  try {
    const result = await fn();
    logOperationComplete(logger, operation, Date.now() - start, context);
    return result;
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logOperationError(logger, operation, err, context);
    throw error;
  }
}
