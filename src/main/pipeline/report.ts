/**
 * Run report: the one externally observable summary of a pipeline run
 *
 * @module main/pipeline/report
 */

import { formatDuration } from '../../shared/utils/dateUtils.js';
import { ArchiveState, type SourceArchive } from '../../shared/types/index.js';
import type { ArchiveStage } from '../errors.js';
import { EXIT_ARCHIVE_FAILURE } from '../error-handler.js';

/**
 * Why an archive ended in Failed
 */
export interface ArchiveFailure {
  stage: ArchiveStage;

  /** Machine-readable reason, e.g. 'timeout', 'cancelled', 'database' */
  code: string;
  message: string;
}

export interface ArchiveResult {
  archive: SourceArchive;
  state: ArchiveState.DONE | ArchiveState.FAILED;
  messages: number;
  malformedMessages: number;
  attachments: number;
  records: number;

  /** Store the records went to; null when nothing was committed */
  storePath: string | null;

  /** Intermediate mbox, when it was kept */
  mboxPath: string | null;
  elapsedMs: number;
  failure?: ArchiveFailure;
}

export interface RunReport {
  runId: string;

  /** ISO 8601 start time */
  startedAt: string;
  elapsedMs: number;
  cancelled: boolean;
  archives: ArchiveResult[];
  archivesProcessed: number;
  archivesFailed: number;
  messages: number;
  malformedMessages: number;
  attachments: number;
  records: number;
}

export function buildReport(
  runId: string,
  startedAt: Date,
  elapsedMs: number,
  archives: ArchiveResult[],
  cancelled: boolean
): RunReport {
  const done = archives.filter((result) => result.state === ArchiveState.DONE);
  const sum = (pick: (result: ArchiveResult) => number): number =>
    done.reduce((total, result) => total + pick(result), 0);

  return {
    runId,
    startedAt: startedAt.toISOString(),
    elapsedMs,
    cancelled,
    archives,
    archivesProcessed: done.length,
    archivesFailed: archives.length - done.length,
    messages: sum((result) => result.messages),
    malformedMessages: sum((result) => result.malformedMessages),
    attachments: sum((result) => result.attachments),
    records: sum((result) => result.records),
  };
}

/**
 * 0 only when every discovered archive reached Done
 */
export function exitCodeFor(report: RunReport): number {
  return report.archivesFailed === 0 && !report.cancelled ? 0 : EXIT_ARCHIVE_FAILURE;
}

/**
 * Human-readable summary, one line per archive
 */
export function formatReport(report: RunReport): string {
  const lines = [
    `Run ${report.runId} ${report.cancelled ? 'cancelled' : 'finished'} in ${formatDuration(report.elapsedMs)}`,
    `Archives: ${report.archivesProcessed} done, ${report.archivesFailed} failed (${report.archives.length} discovered)`,
    `Messages: ${report.messages} indexed, ${report.malformedMessages} malformed skipped`,
    `Attachments: ${report.attachments} extracted; records written: ${report.records}`,
  ];

  for (const result of report.archives) {
    if (result.state === ArchiveState.DONE) {
      lines.push(
        `  done    ${result.archive.name}: ${result.messages} messages, ` +
          `${result.malformedMessages} malformed, ${result.attachments} attachments, ${result.records} records`
      );
    } else {
      const failure = result.failure;
      const detail = failure ? `[${failure.stage}/${failure.code}] ${failure.message}` : '[unknown]';
      lines.push(`  FAILED  ${result.archive.name} ${detail}`);
    }
  }

  return lines.join('\n');
}
