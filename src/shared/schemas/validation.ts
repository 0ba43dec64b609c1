import { z } from 'zod';

/**
 * Base Zod Schemas for validation
 *
 * Run configuration arrives from the CLI (strings and flags) or from code;
 * both go through these schemas before the pipeline starts.
 */

// =============================================================================
// Configuration Schemas
// =============================================================================

/** Default converter timeout: 30 minutes per archive */
export const DEFAULT_CONVERTER_TIMEOUT_MS = 30 * 60 * 1000;

/** Default number of records per shared-store transaction */
export const DEFAULT_BATCH_SIZE = 500;

/**
 * External converter settings
 */
export const ConverterConfigSchema = z.object({
  command: z.string().min(1).default('readpst'),
  timeoutMs: z.number().int().positive().default(DEFAULT_CONVERTER_TIMEOUT_MS),
});

export type ConverterConfig = z.infer<typeof ConverterConfigSchema>;

/**
 * Pipeline run configuration
 *
 * attachmentsDir and maxWorkers are optional here and resolved by
 * loadPipelineConfig (they depend on dbPath and the host).
 */
export const PipelineConfigSchema = z.object({
  targetDir: z.string().min(1),
  mboxDir: z.string().min(1),
  dbPath: z.string().min(1),
  attachmentsDir: z.string().min(1).optional(),
  maxWorkers: z.number().int().positive().optional(),
  keepIntermediate: z.boolean().default(false),
  sharedDb: z.boolean().default(false),
  batchSize: z.number().int().positive().default(DEFAULT_BATCH_SIZE),
  converter: ConverterConfigSchema.default({}),
});

export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;
