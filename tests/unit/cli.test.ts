/**
 * Unit tests for command-line parsing
 */

import { describe, it, expect } from 'vitest';
import { parseCliArgs } from '@/index.js';
import { ConfigError } from '@/errors.js';

describe('parseCliArgs', () => {
  it('should fall back to the default directories', () => {
    expect(parseCliArgs([])).toEqual({
      targetDir: 'target_files',
      mboxDir: 'mbox_dir',
      dbPath: 'output',
      attachmentsDir: undefined,
      maxWorkers: undefined,
      keepIntermediate: undefined,
      sharedDb: undefined,
      batchSize: undefined,
      converter: { command: undefined, timeoutMs: undefined },
    });
  });

  it('should map every flag onto configuration input', () => {
    const input = parseCliArgs([
      '--target-dir', '/in',
      '--mbox-dir', '/mbox',
      '--db-path', '/out/emails.sqlite3',
      '--attachments-dir', '/files',
      '--max-workers', '4',
      '--keep-mbox',
      '--shared-db',
      '--batch-size', '100',
      '--converter', '/usr/local/bin/readpst',
      '--timeout', '90',
    ]);

    expect(input).toEqual({
      targetDir: '/in',
      mboxDir: '/mbox',
      dbPath: '/out/emails.sqlite3',
      attachmentsDir: '/files',
      maxWorkers: 4,
      keepIntermediate: true,
      sharedDb: true,
      batchSize: 100,
      converter: { command: '/usr/local/bin/readpst', timeoutMs: 90_000 },
    });
  });

  it('should return null for --help', () => {
    expect(parseCliArgs(['--help'])).toBeNull();
    expect(parseCliArgs(['-h'])).toBeNull();
  });

  it('should reject unknown flags and stray arguments as configuration errors', () => {
    expect(() => parseCliArgs(['--no-such-flag'])).toThrow(ConfigError);
    expect(() => parseCliArgs(['archive.pst'])).toThrow(ConfigError);
  });

  it('should reject non-numeric values', () => {
    expect(() => parseCliArgs(['--max-workers', 'many'])).toThrow('--max-workers expects a number, got "many"');
    expect(() => parseCliArgs(['--timeout', ''])).toThrow(ConfigError);
  });
});
