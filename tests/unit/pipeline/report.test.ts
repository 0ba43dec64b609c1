/**
 * Unit tests for the run report
 */

import { describe, it, expect } from 'vitest';
import { buildReport, exitCodeFor, formatReport, type ArchiveResult } from '@/pipeline/report.js';
import { ArchiveState } from '@shared/types/index.js';

function done(name: string, counts: Partial<ArchiveResult> = {}): ArchiveResult {
  return {
    archive: { path: `/in/${name}`, name, stem: name.replace(/\.pst$/, '') },
    state: ArchiveState.DONE,
    messages: 2,
    malformedMessages: 1,
    attachments: 1,
    records: 3,
    storePath: `/out/${name}.sqlite3`,
    mboxPath: null,
    elapsedMs: 100,
    ...counts,
  };
}

function failed(name: string): ArchiveResult {
  return {
    archive: { path: `/in/${name}`, name, stem: name.replace(/\.pst$/, '') },
    state: ArchiveState.FAILED,
    messages: 5,
    malformedMessages: 0,
    attachments: 2,
    records: 0,
    storePath: null,
    mboxPath: null,
    elapsedMs: 50,
    failure: { stage: 'converting', code: 'timeout', message: 'Converter timed out after 1000ms' },
  };
}

const STARTED_AT = new Date('2026-01-05T10:00:00.000Z');

describe('buildReport', () => {
  it('should total counters over Done archives only', () => {
    const report = buildReport('run-1', STARTED_AT, 1500, [done('a.pst'), failed('b.pst'), done('c.pst')], false);

    expect(report).toMatchObject({
      runId: 'run-1',
      startedAt: '2026-01-05T10:00:00.000Z',
      elapsedMs: 1500,
      cancelled: false,
      archivesProcessed: 2,
      archivesFailed: 1,
      messages: 4,
      malformedMessages: 2,
      attachments: 2,
      records: 6,
    });
  });
});

describe('exitCodeFor', () => {
  it('should be 0 only when every archive is Done', () => {
    expect(exitCodeFor(buildReport('r', STARTED_AT, 0, [done('a.pst')], false))).toBe(0);
    expect(exitCodeFor(buildReport('r', STARTED_AT, 0, [], false))).toBe(0);
    expect(exitCodeFor(buildReport('r', STARTED_AT, 0, [done('a.pst'), failed('b.pst')], false))).toBe(1);
  });

  it('should be non-zero for a cancelled run', () => {
    expect(exitCodeFor(buildReport('r', STARTED_AT, 0, [done('a.pst')], true))).toBe(1);
  });
});

describe('formatReport', () => {
  it('should render totals and one line per archive', () => {
    const report = buildReport('run-1', STARTED_AT, 1500, [done('a.pst'), failed('b.pst')], false);

    expect(formatReport(report).split('\n')).toEqual([
      'Run run-1 finished in 1.5s',
      'Archives: 1 done, 1 failed (2 discovered)',
      'Messages: 2 indexed, 1 malformed skipped',
      'Attachments: 1 extracted; records written: 3',
      '  done    a.pst: 2 messages, 1 malformed, 1 attachments, 3 records',
      '  FAILED  b.pst [converting/timeout] Converter timed out after 1000ms',
    ]);
  });

  it('should say when the run was cancelled', () => {
    const report = buildReport('run-2', STARTED_AT, 61_000, [], true);

    expect(formatReport(report).split('\n')[0]).toBe('Run run-2 cancelled in 1m 1.0s');
  });
});
