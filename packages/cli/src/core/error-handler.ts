/**
 * Error Handler - User-friendly error messages for the CLI
 */

import { ZodError } from 'zod';
import { AppError, ValidationError, type Logger } from '@seedhash/utils';

/**
 * Format error for user display
 */
export function formatError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) => {
        const where =
          issue.path.length > 0
            ? `--${issue.path.map((p) => String(p).replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`)).join('.')}`
            : 'arguments';
        return `Invalid ${where}: ${issue.message}`;
      })
      .join('\n');
  }

  if (error instanceof ValidationError) {
    return `${error.kind}: ${error.message}`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return 'An unexpected error occurred';
}

/**
 * Log error with full context (for debugging)
 */
export function logError(logger: Logger, error: unknown, context?: Record<string, unknown>): void {
  if (error instanceof AppError) {
    logger.warn('CLI error', { ...error.context, ...context, code: error.code, message: error.message });
  } else {
    logger.error('CLI error', error, context);
  }
}

/**
 * Handle and format error for CLI output
 */
export function handleError(
  logger: Logger,
  error: unknown,
  context?: Record<string, unknown>
): string {
  logError(logger, error, context);
  return formatError(error);
}
