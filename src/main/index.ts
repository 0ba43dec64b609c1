#!/usr/bin/env node
import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { parseArgs } from 'util';
import { logger } from './config/logger.js';
import { loadPipelineConfig } from './config/PipelineConfig.js';
import { errorHandler, EXIT_CONFIG_ERROR, EXIT_UNEXPECTED } from './error-handler.js';
import { ConfigError, errorMessage } from './errors.js';
import { PipelineOrchestrator } from './pipeline/PipelineOrchestrator.js';
import { exitCodeFor, formatReport } from './pipeline/report.js';
import type { PipelineConfigInput } from '../shared/schemas/validation.js';

/**
 * CLI Entry Point
 *
 * Responsibilities:
 * - Argument parsing and configuration
 * - Signal handling (SIGINT/SIGTERM cancel the run)
 * - Report printing and exit code
 */

const USAGE = `Usage: pst-indexer [options]

  --target-dir DIR       Directory scanned recursively for .pst/.ost archives (default: target_files)
  --mbox-dir DIR         Directory for intermediate mbox files (default: mbox_dir)
  --db-path PATH         Store directory, or store file with --shared-db (default: output)
  --attachments-dir DIR  Attachment root (default: <store dir>/attachments)
  --max-workers N        Archives processed concurrently (default: CPU count)
  --keep-mbox            Keep intermediate mbox files
  --shared-db            Write every archive into one shared store
  --batch-size N         Records per write transaction (default: 500)
  --converter CMD        Archive converter executable (default: readpst)
  --timeout SECONDS      Per-archive conversion timeout (default: 1800)
  -h, --help             Show this help`;

/**
 * Translate argv into raw configuration input
 *
 * @throws ConfigError on unknown flags or non-numeric values
 */
export function parseCliArgs(argv: string[]): PipelineConfigInput | null {
  const { values } = readFlags(argv);

  if (values.help) {
    return null;
  }

  const timeoutSeconds = toNumber('--timeout', values.timeout);

  return {
    targetDir: values['target-dir'] ?? 'target_files',
    mboxDir: values['mbox-dir'] ?? 'mbox_dir',
    dbPath: values['db-path'] ?? 'output',
    attachmentsDir: values['attachments-dir'],
    maxWorkers: toNumber('--max-workers', values['max-workers']),
    keepIntermediate: values['keep-mbox'],
    sharedDb: values['shared-db'],
    batchSize: toNumber('--batch-size', values['batch-size']),
    converter: {
      command: values.converter,
      timeoutMs: timeoutSeconds === undefined ? undefined : timeoutSeconds * 1000,
    },
  };
}

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        'target-dir': { type: 'string' },
        'mbox-dir': { type: 'string' },
        'db-path': { type: 'string' },
        'attachments-dir': { type: 'string' },
        'max-workers': { type: 'string' },
        'keep-mbox': { type: 'boolean' },
        'shared-db': { type: 'boolean' },
        'batch-size': { type: 'string' },
        converter: { type: 'string' },
        timeout: { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (error) {
    throw new ConfigError(errorMessage(error), { cause: error });
  }
}

function toNumber(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new ConfigError(`${flag} expects a number, got "${value}"`);
  }
  return parsed;
}

export async function main(argv: string[]): Promise<number> {
  errorHandler.initialize();

  const controller = new AbortController();
  const cancel = (signal: NodeJS.Signals): void => {
    logger.warn('CLI', `Received ${signal}, cancelling run`);
    controller.abort();
  };
  process.once('SIGINT', cancel);
  process.once('SIGTERM', cancel);

  try {
    const input = parseCliArgs(argv);
    if (!input) {
      console.log(USAGE);
      return 0;
    }

    const config = loadPipelineConfig(input);
    const report = await new PipelineOrchestrator(config).run(controller.signal);

    console.log(formatReport(report));
    return exitCodeFor(report);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error('CLI', 'Configuration error', error);
      console.error(`Error: ${error.message}\n\n${USAGE}`);
      return EXIT_CONFIG_ERROR;
    }
    logger.error('CLI', 'Run aborted by unexpected error', error);
    return EXIT_UNEXPECTED;
  } finally {
    process.off('SIGINT', cancel);
    process.off('SIGTERM', cancel);
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (script === undefined) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.error('CLI', 'Fatal error', error);
      process.exitCode = EXIT_UNEXPECTED;
    }
  );
}
