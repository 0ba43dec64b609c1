/**
 * Process-level error handling for the CLI
 *
 * - Catch unhandled errors (uncaughtException, unhandledRejection)
 * - Log with structured context (category, module, message)
 * - Map any thrown value to a category and exit code
 *
 * @module main/error-handler
 */

import { logger } from './config/logger.js';
import { ErrorCategory, PipelineError } from './errors.js';

/** Exit code when any archive failed or the run was cancelled */
export const EXIT_ARCHIVE_FAILURE = 1;

/** Exit code when the run aborted before dispatching work */
export const EXIT_CONFIG_ERROR = 2;

/** Exit code for crashes outside the pipeline's own error handling */
export const EXIT_UNEXPECTED = 70;

/**
 * Categorize error by type, falling back to its message
 */
export function categorizeError(error: unknown): ErrorCategory {
  if (error instanceof PipelineError) {
    return error.category;
  }

  if (!(error instanceof Error)) {
    return ErrorCategory.UNKNOWN;
  }

  const message = error.message.toLowerCase();

  if (message.includes('sqlite') || message.includes('database')) {
    return ErrorCategory.DATABASE;
  }

  if (
    message.includes('enoent') ||
    message.includes('eacces') ||
    message.includes('enospc') ||
    message.includes('eexist')
  ) {
    return ErrorCategory.FILESYSTEM;
  }

  if (message.includes('mbox') || message.includes('parse')) {
    return ErrorCategory.EMAIL_PARSING;
  }

  return ErrorCategory.UNKNOWN;
}

/**
 * Global error handler
 *
 * Registers handlers for uncaughtException and unhandledRejection.
 * An uncaught exception terminates the process; a rejection marks the exit code.
 */
class GlobalErrorHandler {
  private initialized = false;

  initialize(): void {
    if (this.initialized) {
      return;
    }

    process.on('uncaughtException', (error: Error) => {
      this.handle('Uncaught exception', error);
      process.exit(EXIT_UNEXPECTED);
    });
    process.on('unhandledRejection', (reason: unknown) =>
      this.handle('Unhandled promise rejection', reason)
    );

    this.initialized = true;
    logger.info('ErrorHandler', 'Global error handlers registered');
  }

  private handle(message: string, reason: unknown): void {
    logger.error('ErrorHandler', message, reason, {
      category: categorizeError(reason),
    });
    process.exitCode = EXIT_UNEXPECTED;
  }
}

export const errorHandler = new GlobalErrorHandler();
