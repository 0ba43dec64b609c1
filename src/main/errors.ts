/**
 * Pipeline error taxonomy
 *
 * - ConfigError: fatal, raised before any archive is dispatched
 * - ArchiveError: isolated to one archive, becomes a Failed report line
 * - MessageError: isolated to one message, absorbed by the parser and counted
 *
 * @module main/errors
 */

/**
 * Error categories for logging and reporting
 */
export enum ErrorCategory {
  /** Invalid or unusable run configuration */
  CONFIGURATION = 'configuration',

  /** External archive converter failures */
  CONVERSION = 'conversion',

  /** Email parsing errors */
  EMAIL_PARSING = 'email_parsing',

  /** File system errors */
  FILESYSTEM = 'filesystem',

  /** Database/Storage errors */
  DATABASE = 'database',

  /** Unknown/uncategorized errors */
  UNKNOWN = 'unknown',
}

/**
 * Pipeline stage an archive can fail in
 */
export type ArchiveStage = 'discovered' | 'converting' | 'parsing' | 'extracting' | 'persisting';

export abstract class PipelineError extends Error {
  abstract readonly category: ErrorCategory;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends PipelineError {
  readonly category = ErrorCategory.CONFIGURATION;
}

export class ArchiveError extends PipelineError {
  readonly category: ErrorCategory;

  constructor(
    message: string,
    readonly archive: string,
    readonly stage: ArchiveStage,
    options?: { cause?: unknown; category?: ErrorCategory }
  ) {
    super(message, options);
    this.category = options?.category ?? categoryForStage(stage);
  }
}

export type ConversionFailureReason =
  | 'missing-source'
  | 'empty-source'
  | 'spawn-failed'
  | 'exit-code'
  | 'timeout'
  | 'cancelled'
  | 'empty-output';

export class ConversionError extends ArchiveError {
  constructor(
    readonly reason: ConversionFailureReason,
    archive: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, archive, 'converting', { ...options, category: ErrorCategory.CONVERSION });
  }
}

export class MessageError extends PipelineError {
  readonly category = ErrorCategory.EMAIL_PARSING;

  constructor(
    message: string,
    readonly index: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export function categoryForStage(stage: ArchiveStage): ErrorCategory {
  switch (stage) {
    case 'converting':
      return ErrorCategory.CONVERSION;
    case 'parsing':
      return ErrorCategory.EMAIL_PARSING;
    case 'extracting':
      return ErrorCategory.FILESYSTEM;
    case 'persisting':
      return ErrorCategory.DATABASE;
    default:
      return ErrorCategory.UNKNOWN;
  }
}

/**
 * Extract a printable message from any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
