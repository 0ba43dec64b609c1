import os from 'os';
import path from 'path';
import type { ZodError } from 'zod';
import {
  PipelineConfigSchema,
  type ConverterConfig,
  type PipelineConfigInput,
} from '../../shared/schemas/validation.js';
import { ConfigError } from '../errors.js';

/**
 * Fully resolved run configuration: every path absolute, every default applied
 */
export interface PipelineConfig {
  targetDir: string;
  mboxDir: string;

  /** Directory of per-archive stores, or the shared store file when sharedDb */
  dbPath: string;
  attachmentsDir: string;
  maxWorkers: number;
  keepIntermediate: boolean;
  sharedDb: boolean;
  batchSize: number;
  converter: ConverterConfig;
}

/**
 * Validate raw configuration and resolve defaults
 *
 * The attachments root defaults to `attachments` beside the store: inside
 * dbPath in per-archive mode, next to the store file in shared mode.
 *
 * @throws ConfigError with every validation issue listed
 */
export function loadPipelineConfig(input: PipelineConfigInput): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`, {
      cause: result.error,
    });
  }

  const parsed = result.data;

  const dbPath = path.resolve(parsed.dbPath);
  const storeDir = parsed.sharedDb ? path.dirname(dbPath) : dbPath;

  return {
    targetDir: path.resolve(parsed.targetDir),
    mboxDir: path.resolve(parsed.mboxDir),
    dbPath,
    attachmentsDir: path.resolve(parsed.attachmentsDir ?? path.join(storeDir, 'attachments')),
    maxWorkers: parsed.maxWorkers ?? defaultWorkerCount(),
    keepIntermediate: parsed.keepIntermediate,
    sharedDb: parsed.sharedDb,
    batchSize: parsed.batchSize,
    converter: parsed.converter,
  };
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * One worker per available processing unit
 */
export function defaultWorkerCount(): number {
  return Math.max(1, os.availableParallelism());
}
