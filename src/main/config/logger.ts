/**
 * electron-log v5 Configuration (Node entry)
 *
 * Structured logging for the indexing pipeline
 * Features:
 * - Structured output (module, message, timestamp, context)
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - Console output, optional file output with rotation
 */

import log from 'electron-log/node';

type ConsoleLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug';

const LEVELS: readonly ConsoleLevel[] = ['error', 'warn', 'info', 'verbose', 'debug'];

/**
 * Check if running in test environment
 */
function isTestEnvironment(): boolean {
  return process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';
}

function resolveConsoleLevel(value: string | undefined): ConsoleLevel {
  const normalized = value?.toLowerCase();
  const match = LEVELS.find((level) => level === normalized);
  return match ?? 'info';
}

/**
 * Initialize electron-log transports
 */
function initializeLogger(): void {
  if (isTestEnvironment()) {
    log.transports.console.level = 'debug';
    log.transports.file.level = false;
    return;
  }

  log.transports.console.level = resolveConsoleLevel(process.env.LOG_LEVEL);

  // File output is opt-in for a batch tool; LOG_FILE names the target
  const logFile = process.env.LOG_FILE;
  if (logFile) {
    log.transports.file.level = 'debug';
    log.transports.file.maxSize = 10 * 1024 * 1024; // 10MB per file
    log.transports.file.resolvePathFn = () => logFile;
  } else {
    log.transports.file.level = false;
  }
}

initializeLogger();

export type LogContext = Record<string, unknown>;

/**
 * Structured logging helper
 * Provides consistent logging interface across the pipeline
 */
export const logger = {
  /**
   * @param module - Module name (e.g., 'MboxParser', 'EmailStore')
   */
  debug: (module: string, message: string, context?: LogContext) => {
    log.debug({
      level: 'DEBUG',
      module,
      message,
      timestamp: Date.now(),
      ...context,
    });
  },

  info: (module: string, message: string, context?: LogContext) => {
    log.info({
      level: 'INFO',
      module,
      message,
      timestamp: Date.now(),
      ...context,
    });
  },

  warn: (module: string, message: string, context?: LogContext) => {
    log.warn({
      level: 'WARN',
      module,
      message,
      timestamp: Date.now(),
      ...context,
    });
  },

  /**
   * Log error message
   * @param error - Error object (optional), serialized to message/stack/name
   */
  error: (module: string, message: string, error?: unknown, context?: LogContext) => {
    const errorData: LogContext = {};

    if (error instanceof Error) {
      errorData.error = {
        message: error.message,
        stack: error.stack,
        name: error.name,
      };
    } else if (error !== undefined && error !== null) {
      errorData.error = String(error);
    }

    log.error({
      level: 'ERROR',
      module,
      message,
      timestamp: Date.now(),
      ...errorData,
      ...context,
    });
  },
};

export default log;
