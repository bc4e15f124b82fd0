/**
 * Logger Service
 *
 * Structured logging with Pino.
 *
 * Log Levels:
 * - error: Error conditions
 * - warn: Warning conditions
 * - info: Informational messages
 * - debug: Debug information (default outside production)
 * - silent: Used under the test runner unless LOG_LEVEL is set
 */

import pino from 'pino';

// =============================================================================
// Configuration
// =============================================================================

const nodeEnv = process.env.NODE_ENV;
const isTest = nodeEnv === 'test';
const isDevelopment = nodeEnv !== 'production' && !isTest;

function resolveLogLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (isTest) return 'silent';
  return isDevelopment ? 'debug' : 'info';
}

// =============================================================================
// Logger Instance
// =============================================================================

export const logger = pino({
  level: resolveLogLevel(),
  transport: isDevelopment
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  base: {
    app: 'comicinfo',
  },
});

// =============================================================================
// Child Loggers for Services
// =============================================================================

/**
 * Create a child logger with service context
 */
export function createServiceLogger(service: string) {
  return logger.child({ service });
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Log an error with context
 */
export function logError(context: string, error: unknown, metadata?: Record<string, unknown>) {
  const errorMessage = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  logger.error({
    context,
    error: errorMessage,
    stack,
    ...metadata,
  }, `[${context}] ${errorMessage}`);
}

/**
 * Log a warning with context
 */
export function logWarn(context: string, message: string, metadata?: Record<string, unknown>) {
  logger.warn({
    context,
    ...metadata,
  }, `[${context}] ${message}`);
}

/**
 * Log info with context
 */
export function logInfo(context: string, message: string, metadata?: Record<string, unknown>) {
  logger.info({
    context,
    ...metadata,
  }, `[${context}] ${message}`);
}

/**
 * Log debug with context
 */
export function logDebug(context: string, message: string, metadata?: Record<string, unknown>) {
  logger.debug({
    context,
    ...metadata,
  }, `[${context}] ${message}`);
}

export default logger;
