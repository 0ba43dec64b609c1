/**
 * Pipeline Orchestrator - end-to-end archive processing
 *
 * Per archive:
 *   Discovered → Converting → Parsing → Extracting → Persisting → Done | Failed
 *
 * 1. Discover .pst/.ost archives under the target directory
 * 2. Convert each to mbox (external converter, one child process per archive)
 * 3. Stream messages out of the mbox
 * 4. Write attachments, fan messages out into records
 * 5. Commit records to the per-archive store or the shared store
 *
 * Parsing, extraction and persistence are interleaved message by message;
 * an archive's failure is recorded against the stage it was in.
 *
 * @module main/pipeline/PipelineOrchestrator
 */

import { constants as fsConstants, promises as fs } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger.js';
import type { PipelineConfig } from '../config/PipelineConfig.js';
import { ProcessConverter, type ArchiveConverter } from '../conversion/ArchiveConverter.js';
import { AttachmentExtractor, type StagedAttachments } from '../email/AttachmentExtractor.js';
import { buildEmailRecords } from '../email/fanOut.js';
import { MboxParser } from '../email/parsers/MboxParser.js';
import {
  PerArchiveSink,
  SharedStoreSink,
  SharedStoreWriter,
  perArchiveStorePath,
  type ArchiveSink,
} from '../database/sinks.js';
import {
  ArchiveError,
  ConfigError,
  ConversionError,
  categoryForStage,
  errorMessage,
  type ArchiveStage,
} from '../errors.js';
import { ArchiveState, type SourceArchive } from '../../shared/types/index.js';
import { discoverArchives } from './discovery.js';
import { WorkerPool } from './WorkerPool.js';
import { buildReport, type ArchiveFailure, type ArchiveResult, type RunReport } from './report.js';

/**
 * Collaborators that tests (or embedders) may replace
 */
export interface PipelineDependencies {
  converter?: ArchiveConverter;
}

/**
 * One archive bound to the worker slot processing it
 */
export interface ConversionJob {
  archive: SourceArchive;
  workerSlot: number;
}

interface ArchiveCounters {
  messages: number;
  malformedMessages: number;
  attachments: number;
  records: number;
}

/**
 * Orchestrates one pipeline run
 *
 * All run-wide state (worker pool, shared store handle) is created in
 * run() and released before it returns, so each run starts fresh.
 *
 * Example:
 * ```typescript
 * const orchestrator = new PipelineOrchestrator(loadPipelineConfig({
 *   targetDir: 'target_files', mboxDir: 'mbox_dir', dbPath: 'output',
 * }));
 * const report = await orchestrator.run();
 * console.log(formatReport(report));
 * ```
 */
export class PipelineOrchestrator {
  private readonly converter: ArchiveConverter;
  private readonly parser = new MboxParser();
  private readonly extractor: AttachmentExtractor;

  constructor(
    private readonly config: PipelineConfig,
    dependencies: PipelineDependencies = {}
  ) {
    this.converter =
      dependencies.converter ??
      new ProcessConverter({
        command: config.converter.command,
        timeoutMs: config.converter.timeoutMs,
      });
    this.extractor = new AttachmentExtractor(config.attachmentsDir);
  }

  /**
   * Process every archive in the target directory
   *
   * @param signal - Run-level cancellation: stops dispatching, aborts in-flight archives
   * @throws ConfigError before any archive is dispatched
   */
  async run(signal?: AbortSignal): Promise<RunReport> {
    const runId = uuidv4();
    const startedAt = new Date();

    await this.validateEnvironment();

    const archives = await discoverArchives(this.config.targetDir);
    logger.info('PipelineOrchestrator', `Discovered ${archives.length} archive(s)`, {
      runId,
      targetDir: this.config.targetDir,
      maxWorkers: this.config.maxWorkers,
      sharedDb: this.config.sharedDb,
    });

    const shared = this.config.sharedDb ? this.openSharedStore() : null;
    const pool = new WorkerPool(this.config.maxWorkers);

    const outcomes = await pool
      .run(archives, (archive, workerSlot) => this.processArchive({ archive, workerSlot }, shared, signal), signal)
      .finally(() => shared?.close());

    const results = outcomes.map((outcome, position): ArchiveResult => {
      const archive = archives[position];
      if (outcome.status === 'fulfilled') {
        return outcome.value;
      }
      if (outcome.status === 'skipped') {
        return failedResult(archive, 0, emptyCounters(), {
          stage: 'discovered',
          code: 'cancelled',
          message: 'cancelled before dispatch',
        });
      }
      return failedResult(archive, 0, emptyCounters(), {
        stage: 'discovered',
        code: 'unexpected',
        message: errorMessage(outcome.reason),
      });
    });

    const report = buildReport(runId, startedAt, Date.now() - startedAt.getTime(), results, signal?.aborted ?? false);

    logger.info('PipelineOrchestrator', 'Run complete', {
      runId,
      archivesProcessed: report.archivesProcessed,
      archivesFailed: report.archivesFailed,
      messages: report.messages,
      records: report.records,
      elapsedMs: report.elapsedMs,
    });
    return report;
  }

  /**
   * Fail fast before any work: inputs readable, outputs writable, converter present
   */
  private async validateEnvironment(): Promise<void> {
    const { targetDir, mboxDir, attachmentsDir, dbPath, sharedDb } = this.config;

    const target = await fs.stat(targetDir).catch(() => null);
    if (!target?.isDirectory()) {
      throw new ConfigError(`Target directory does not exist: ${targetDir}`);
    }

    if (sharedDb) {
      const existing = await fs.stat(dbPath).catch(() => null);
      if (existing?.isDirectory()) {
        throw new ConfigError(`Shared store path is a directory: ${dbPath}`);
      }
    }

    const storeDir = sharedDb ? path.dirname(dbPath) : dbPath;
    for (const dir of [mboxDir, attachmentsDir, storeDir]) {
      await ensureWritableDir(dir);
    }

    await this.converter.assertAvailable();
  }

  private openSharedStore(): SharedStoreWriter {
    try {
      return SharedStoreWriter.open(this.config.dbPath);
    } catch (error) {
      throw new ConfigError(`Cannot open shared store ${this.config.dbPath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Run one archive through every stage
   *
   * Never rejects: any failure becomes a Failed result for this archive.
   */
  private async processArchive(
    job: ConversionJob,
    shared: SharedStoreWriter | null,
    signal?: AbortSignal
  ): Promise<ArchiveResult> {
    const { archive } = job;
    const startedAt = Date.now();
    const counters = emptyCounters();

    let stage: ArchiveStage = 'converting';
    let sink: ArchiveSink | null = null;
    let attachments: StagedAttachments | null = null;
    let mboxPath: string | null = null;

    const enter = (state: ArchiveState): void => {
      logger.debug('PipelineOrchestrator', `${archive.name}: ${state}`, { workerSlot: job.workerSlot });
    };

    try {
      enter(ArchiveState.CONVERTING);
      mboxPath = await this.converter.convert(archive.path, this.config.mboxDir, {
        stem: archive.stem,
        signal,
      });

      stage = 'parsing';
      enter(ArchiveState.PARSING);
      attachments = this.extractor.stage(archive.stem);
      sink = this.openSink(archive, shared);
      let extracting = false;

      for await (const event of this.parser.parse(mboxPath)) {
        if (signal?.aborted) {
          throw new ArchiveError('Run cancelled', archive.name, stage);
        }

        if (event.kind === 'malformed') {
          counters.malformedMessages++;
          continue;
        }

        const { message } = event;
        counters.messages++;

        if (message.attachments.length > 0 && !extracting) {
          extracting = true;
          enter(ArchiveState.EXTRACTING);
        }
        stage = 'extracting';
        const files = await attachments.extract(message, message.index);
        counters.attachments += files.length;

        stage = 'persisting';
        const records = buildEmailRecords(message, files, archive.name);
        await sink.write(records);

        stage = 'parsing';
      }

      stage = 'persisting';
      enter(ArchiveState.PERSISTING);
      counters.records = await sink.commit();
      sink = null;
      await attachments.publish();
      attachments = null;

      if (!this.config.keepIntermediate) {
        await fs.rm(mboxPath, { force: true });
      }

      enter(ArchiveState.DONE);
      logger.info('PipelineOrchestrator', `Archive done: ${archive.name}`, {
        ...counters,
        elapsedMs: Date.now() - startedAt,
      });

      return {
        archive,
        state: ArchiveState.DONE,
        ...counters,
        storePath: this.config.sharedDb ? this.config.dbPath : perArchiveStorePath(this.config.dbPath, archive.stem),
        mboxPath: this.config.keepIntermediate ? mboxPath : null,
        elapsedMs: Date.now() - startedAt,
      };
    } catch (error) {
      const failure = describeFailure(error, stage, signal);
      logger.error('PipelineOrchestrator', `Archive failed: ${archive.name}`, error, {
        stage: failure.stage,
        code: failure.code,
      });

      await this.cleanUpFailedArchive(archive, sink, attachments, mboxPath);
      enter(ArchiveState.FAILED);
      return failedResult(archive, Date.now() - startedAt, counters, failure);
    }
  }

  private openSink(archive: SourceArchive, shared: SharedStoreWriter | null): ArchiveSink {
    if (shared) {
      return new SharedStoreSink(shared, archive.name, this.config.batchSize);
    }
    return new PerArchiveSink(perArchiveStorePath(this.config.dbPath, archive.stem), this.config.batchSize);
  }

  /**
   * Remove everything a failed archive wrote; cleanup errors are logged,
   * the first failure is what gets reported
   *
   * Attachments published by an earlier run stay, since the store that
   * references them is left as it was.
   */
  private async cleanUpFailedArchive(
    archive: SourceArchive,
    sink: ArchiveSink | null,
    attachments: StagedAttachments | null,
    mboxPath: string | null
  ): Promise<void> {
    const steps: Array<[string, () => Promise<void>]> = [
      ['discard records', async () => sink?.abort()],
      ['discard staged attachments', async () => attachments?.discard()],
    ];
    if (mboxPath && !this.config.keepIntermediate) {
      const intermediate = mboxPath;
      steps.push(['remove intermediate mbox', () => fs.rm(intermediate, { force: true })]);
    }

    for (const [name, step] of steps) {
      try {
        await step();
      } catch (error) {
        logger.error('PipelineOrchestrator', `Cleanup step failed: ${name}`, error, { archive: archive.name });
      }
    }
  }
}

async function ensureWritableDir(dir: string): Promise<void> {
  try {
    await fs.mkdir(dir, { recursive: true });
    await fs.access(dir, fsConstants.W_OK);
  } catch (error) {
    throw new ConfigError(`Output directory is not writable: ${dir}`, { cause: error });
  }
}

function describeFailure(error: unknown, stage: ArchiveStage, signal?: AbortSignal): ArchiveFailure {
  if (error instanceof ConversionError) {
    return { stage: error.stage, code: error.reason, message: error.message };
  }
  if (signal?.aborted) {
    return { stage, code: 'cancelled', message: 'Run cancelled' };
  }
  if (error instanceof ArchiveError) {
    return { stage: error.stage, code: error.category, message: error.message };
  }
  return { stage, code: categoryForStage(stage), message: errorMessage(error) };
}

function emptyCounters(): ArchiveCounters {
  return { messages: 0, malformedMessages: 0, attachments: 0, records: 0 };
}

function failedResult(
  archive: SourceArchive,
  elapsedMs: number,
  counters: ArchiveCounters,
  failure: ArchiveFailure
): ArchiveResult {
  return {
    archive,
    state: ArchiveState.FAILED,
    ...counters,
    records: 0,
    storePath: null,
    mboxPath: null,
    elapsedMs,
    failure,
  };
}
