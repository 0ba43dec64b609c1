/**
 * Unit tests for ProcessConverter
 *
 * The converter executable is stood in for by the running Node binary
 * executing a short inline script, so no archive tool is needed.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import { ProcessConverter, readpstArgs, resolveExecutable } from '@/conversion/ArchiveConverter.js';
import { ConfigError, ConversionError } from '@/errors.js';
import { makeTempDir, removeDir } from '../../helpers/fixtures.js';

/** Converter whose behaviour is the given script; argv[1] is the staging dir, argv[2] the source */
function scriptConverter(script: string, timeoutMs = 10_000): ProcessConverter {
  return new ProcessConverter({
    command: process.execPath,
    timeoutMs,
    buildArgs: (sourcePath, stagingDir) => ['-e', script, stagingDir, sourcePath],
  });
}

const WRITE_TWO_FOLDERS = `
  const fs = require('fs');
  const dir = process.argv[1];
  fs.mkdirSync(dir + '/Inbox');
  fs.writeFileSync(dir + '/Inbox/mbox', 'From a\\nFrom: a@example.com\\n\\nhi\\n');
  fs.mkdirSync(dir + '/Sent');
  fs.writeFileSync(dir + '/Sent/mbox', 'From b\\nFrom: b@example.com\\n\\nyo\\n');
`;

describe('ProcessConverter', () => {
  let tempDir: string;
  let sourcePath: string;
  let outputDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir();
    sourcePath = path.join(tempDir, 'archive.pst');
    outputDir = path.join(tempDir, 'mbox');
    await fs.writeFile(sourcePath, 'placeholder archive bytes');
  });

  afterEach(async () => {
    await removeDir(tempDir);
  });

  it('should concatenate every output folder into one mbox', async () => {
    const mboxPath = await scriptConverter(WRITE_TWO_FOLDERS).convert(sourcePath, outputDir);

    expect(mboxPath).toBe(path.join(outputDir, 'archive.mbox'));
    expect(await fs.readFile(mboxPath, 'utf-8')).toBe(
      'From a\nFrom: a@example.com\n\nhi\n\nFrom b\nFrom: b@example.com\n\nyo\n'
    );
  });

  it('should use the given stem and leave no staging directory behind', async () => {
    await scriptConverter(WRITE_TWO_FOLDERS).convert(sourcePath, outputDir, { stem: 'archive_1' });

    expect(await fs.readdir(outputDir)).toEqual(['archive_1.mbox']);
  });

  it('should fail with exit-code and the stderr tail on a non-zero exit', async () => {
    const converter = scriptConverter(`process.stderr.write('bad archive'); process.exit(3);`);

    await expect(converter.convert(sourcePath, outputDir)).rejects.toMatchObject({
      reason: 'exit-code',
      stage: 'converting',
      archive: 'archive.pst',
      message: 'Converter failed with exit code 3: bad archive',
    });
    expect(await fs.readdir(outputDir)).toEqual([]);
  });

  it('should kill a converter that outlives the timeout', async () => {
    const converter = scriptConverter('setTimeout(() => {}, 60000);', 300);

    const startedAt = Date.now();
    await expect(converter.convert(sourcePath, outputDir)).rejects.toMatchObject({
      reason: 'timeout',
      message: 'Converter timed out after 300ms',
    });
    expect(Date.now() - startedAt).toBeLessThan(10_000);
  });

  it('should fail with empty-output when nothing was written', async () => {
    const converter = scriptConverter('');

    await expect(converter.convert(sourcePath, outputDir)).rejects.toMatchObject({ reason: 'empty-output' });
    expect(await fs.readdir(outputDir)).toEqual([]);
  });

  it('should reject a missing archive without spawning', async () => {
    const converter = scriptConverter(WRITE_TWO_FOLDERS);

    const promise = converter.convert(path.join(tempDir, 'missing.pst'), outputDir);

    await expect(promise).rejects.toBeInstanceOf(ConversionError);
    await expect(promise).rejects.toMatchObject({ reason: 'missing-source', archive: 'missing.pst' });
  });

  it('should reject an empty archive', async () => {
    await fs.writeFile(sourcePath, '');

    await expect(scriptConverter(WRITE_TWO_FOLDERS).convert(sourcePath, outputDir)).rejects.toMatchObject({
      reason: 'empty-source',
    });
  });

  it('should report spawn-failed when the executable cannot start', async () => {
    const converter = new ProcessConverter({
      command: path.join(tempDir, 'no-such-converter'),
      timeoutMs: 5000,
    });

    await expect(converter.convert(sourcePath, outputDir)).rejects.toMatchObject({ reason: 'spawn-failed' });
  });

  it('should kill the converter when the run is cancelled', async () => {
    const controller = new AbortController();
    const converter = scriptConverter('setTimeout(() => {}, 60000);');

    const promise = converter.convert(sourcePath, outputDir, { signal: controller.signal });
    setTimeout(() => controller.abort(), 200);

    await expect(promise).rejects.toMatchObject({ reason: 'cancelled' });
  });

  it('should not start when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      scriptConverter(WRITE_TWO_FOLDERS).convert(sourcePath, outputDir, { signal: controller.signal })
    ).rejects.toMatchObject({ reason: 'cancelled' });
    await expect(fs.access(outputDir)).rejects.toThrow();
  });

  describe('assertAvailable', () => {
    it('should pass for an executable path', async () => {
      await expect(scriptConverter('').assertAvailable()).resolves.toBeUndefined();
    });

    it('should raise ConfigError when the command is not found', async () => {
      const converter = new ProcessConverter({ command: path.join(tempDir, 'readpst'), timeoutMs: 1000 });

      await expect(converter.assertAvailable()).rejects.toBeInstanceOf(ConfigError);
    });
  });
});

describe('readpstArgs', () => {
  it('should write into the staging directory', () => {
    expect(readpstArgs('/data/mail.pst', '/tmp/stage')).toEqual(['-D', '-b', '-q', '-o', '/tmp/stage', '/data/mail.pst']);
  });
});

describe('resolveExecutable', () => {
  let binDir: string;

  beforeEach(async () => {
    binDir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(binDir);
  });

  it('should find an executable on the search path', async () => {
    const executable = path.join(binDir, 'fake-readpst');
    await fs.writeFile(executable, '#!/bin/sh\n');
    await fs.chmod(executable, 0o755);

    expect(await resolveExecutable('fake-readpst', `/nonexistent-dir${path.delimiter}${binDir}`)).toBe(executable);
  });

  it('should skip files without execute permission', async () => {
    await fs.writeFile(path.join(binDir, 'fake-readpst'), '#!/bin/sh\n');
    await fs.chmod(path.join(binDir, 'fake-readpst'), 0o644);

    expect(await resolveExecutable('fake-readpst', binDir)).toBeNull();
  });

  it('should resolve a command given as a path directly', async () => {
    expect(await resolveExecutable(process.execPath, '')).toBe(process.execPath);
  });

  it('should return null for an empty search path', async () => {
    expect(await resolveExecutable('fake-readpst', '')).toBeNull();
  });
});
