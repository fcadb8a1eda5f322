/**
 * Error Tracking Service
 *
 * Structured error logging for failures that abort a pipeline run.
 * Critical errors carry a fixed `CRITICAL_ERROR` marker so log-based
 * alerting can match on them.
 */

import { AppError } from '../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';

export interface ErrorContext {
  videoId?: number;
  clipId?: number;
  sourcePath?: string;
  operation?: string;
  stage?: string;
  [key: string]: unknown;
}

export interface CriticalErrorEntry {
  severity: 'ERROR';
  message: 'CRITICAL_ERROR';
  error: {
    name: string;
    message: string;
    internalMessage?: string | null;
    stack?: string;
  };
  context: ErrorContext;
  timestamp: string;
}

/**
 * Build the structured entry for a critical error
 */
export function buildCriticalErrorEntry(error: unknown, context: ErrorContext): CriticalErrorEntry {
  return {
    severity: 'ERROR',
    message: 'CRITICAL_ERROR',
    error: {
      name: error instanceof Error ? error.name : 'UnknownError',
      message: error instanceof Error ? error.message : String(error),
      internalMessage: error instanceof AppError ? error.internalMessage : undefined,
      stack: error instanceof Error ? error.stack : undefined,
    },
    context,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Log a critical error with structured data
 *
 * @param error - The error object
 * @param context - Additional context about the error
 * @param log - Destination logger
 */
export function logCriticalError(
  error: unknown,
  context: ErrorContext,
  log: Logger = defaultLogger
): void {
  const entry = buildCriticalErrorEntry(error, context);
  log.error(entry.message, { error: entry.error, context: entry.context });
}
