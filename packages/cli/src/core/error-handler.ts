/**
 * Error Handler - User-friendly error messages
 *
 * Messages are printed as raised: identifier errors must name the source
 * and the offending value.
 */

import { AppError, logger } from '@idsampler/utils';

/**
 * Format error for user display
 */
export function formatError(error: unknown): string {
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
export function logError(error: unknown, context?: Record<string, unknown>): void {
  if (error instanceof AppError) {
    logger.error('CLI error', error, {
      code: error.code,
      errorContext: error.context,
      context,
    });
  } else if (error instanceof Error) {
    logger.error('CLI error', error, { context });
  } else {
    logger.error('CLI error', String(error), { context });
  }
}

/**
 * Handle and format error for CLI output
 */
export function handleError(error: unknown, context?: Record<string, unknown>): string {
  // Log full error for debugging
  logError(error, context);

  // Return user-friendly message
  return formatError(error);
}
