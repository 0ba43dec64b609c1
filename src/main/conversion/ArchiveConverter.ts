/**
 * ArchiveConverter - PST/OST → mbox conversion through an external tool
 *
 * Runs the converter (readpst by default) as a child process in a staging
 * directory, then concatenates everything it wrote into a single
 * `<stem>.mbox`. The final file only appears once conversion succeeded.
 *
 * @module main/conversion/ArchiveConverter
 */

import { spawn } from 'child_process';
import { createReadStream, constants as fsConstants, promises as fs } from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger.js';
import { ConfigError, ConversionError, errorMessage } from '../errors.js';

/**
 * Per-call conversion options
 */
export interface ConvertOptions {
  /** Output name without extension; defaults to the source file's stem */
  stem?: string;

  /** Run-level cancellation; kills the child process when aborted */
  signal?: AbortSignal;
}

/**
 * Capability interface for the archive → mbox step
 *
 * The pipeline only depends on this contract, so tests can supply a fake
 * converter without readpst installed.
 */
export interface ArchiveConverter {
  /**
   * Check the converter can run at all
   *
   * @throws ConfigError when the executable cannot be found
   */
  assertAvailable(): Promise<void>;

  /**
   * Convert one archive into `<outputDir>/<stem>.mbox`
   *
   * @returns Absolute path of the mbox file
   * @throws ConversionError attributed to this archive only
   */
  convert(sourcePath: string, outputDir: string, options?: ConvertOptions): Promise<string>;
}

export type ConverterArgsBuilder = (sourcePath: string, stagingDir: string) => string[];

export interface ProcessConverterOptions {
  command: string;
  timeoutMs: number;
  buildArgs?: ConverterArgsBuilder;
}

/**
 * readpst flags: -D include deleted items, -b skip RTF bodies, -q quiet,
 * -o output directory
 */
export const readpstArgs: ConverterArgsBuilder = (sourcePath, stagingDir) => [
  '-D',
  '-b',
  '-q',
  '-o',
  stagingDir,
  sourcePath,
];

/** Bytes of converter stderr kept for error messages */
const STDERR_TAIL_LIMIT = 4096;

/**
 * ArchiveConverter backed by an external executable
 */
export class ProcessConverter implements ArchiveConverter {
  private readonly buildArgs: ConverterArgsBuilder;

  constructor(private readonly options: ProcessConverterOptions) {
    this.buildArgs = options.buildArgs ?? readpstArgs;
  }

  async assertAvailable(): Promise<void> {
    const resolved = await resolveExecutable(this.options.command);
    if (!resolved) {
      throw new ConfigError(
        `Converter executable not found: ${this.options.command}. ` +
          'Install libpst (provides readpst) or pass a different converter command.'
      );
    }
    logger.debug('ArchiveConverter', 'Converter executable resolved', { path: resolved });
  }

  async convert(sourcePath: string, outputDir: string, options: ConvertOptions = {}): Promise<string> {
    const archive = path.basename(sourcePath);
    const stem = options.stem ?? path.basename(sourcePath, path.extname(sourcePath));

    await this.validateSource(sourcePath, archive);

    if (options.signal?.aborted) {
      throw new ConversionError('cancelled', archive, `Conversion of ${archive} cancelled`);
    }

    await fs.mkdir(outputDir, { recursive: true });
    const stagingDir = path.join(outputDir, `.staging-${stem}-${uuidv4()}`);
    await fs.mkdir(stagingDir);

    try {
      const startedAt = Date.now();
      logger.info('ArchiveConverter', `Converting ${archive} to mbox`, { command: this.options.command });

      await this.runProcess(this.buildArgs(sourcePath, stagingDir), archive, options.signal);

      const mboxPath = path.join(outputDir, `${stem}.mbox`);
      const bytes = await concatenateOutput(stagingDir, mboxPath);
      if (bytes === 0) {
        throw new ConversionError('empty-output', archive, `Converter produced no output for ${archive}`);
      }

      logger.info('ArchiveConverter', `Converted ${archive}`, {
        mboxPath,
        bytes,
        elapsedMs: Date.now() - startedAt,
      });
      return mboxPath;
    } finally {
      await fs.rm(stagingDir, { recursive: true, force: true });
    }
  }

  private async validateSource(sourcePath: string, archive: string): Promise<void> {
    let size: number;
    try {
      const stats = await fs.stat(sourcePath);
      if (!stats.isFile()) {
        throw new ConversionError('missing-source', archive, `Archive is not a regular file: ${sourcePath}`);
      }
      size = stats.size;
    } catch (error) {
      if (error instanceof ConversionError) {
        throw error;
      }
      throw new ConversionError('missing-source', archive, `Archive not readable: ${sourcePath}`, {
        cause: error,
      });
    }

    if (size === 0) {
      throw new ConversionError('empty-source', archive, `Archive is empty: ${sourcePath}`);
    }
  }

  /**
   * Spawn the converter and wait for it, enforcing the timeout
   */
  private runProcess(args: string[], archive: string, signal?: AbortSignal): Promise<void> {
    const { command, timeoutMs } = this.options;

    return new Promise<void>((resolve, reject) => {
      let stderrTail = '';
      let timedOut = false;
      let cancelled = false;
      let settled = false;

      const child = spawn(command, args, { stdio: ['ignore', 'ignore', 'pipe'] });

      const finish = (error?: ConversionError): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      const timer = setTimeout(() => {
        timedOut = true;
        logger.warn('ArchiveConverter', `Converter timed out for ${archive}, killing`, { timeoutMs });
        child.kill('SIGKILL');
      }, timeoutMs);

      const onAbort = (): void => {
        cancelled = true;
        child.kill('SIGKILL');
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      child.stderr?.setEncoding('utf-8');
      child.stderr?.on('data', (chunk: string) => {
        stderrTail = (stderrTail + chunk).slice(-STDERR_TAIL_LIMIT);
      });

      child.on('error', (error) => {
        finish(
          new ConversionError('spawn-failed', archive, `Failed to start ${command}: ${errorMessage(error)}`, {
            cause: error,
          })
        );
      });

      child.on('close', (code, killSignal) => {
        if (timedOut) {
          finish(new ConversionError('timeout', archive, `Converter timed out after ${timeoutMs}ms`));
        } else if (cancelled) {
          finish(new ConversionError('cancelled', archive, `Conversion of ${archive} cancelled`));
        } else if (code !== 0) {
          const status = code === null ? `signal ${killSignal ?? 'unknown'}` : `exit code ${code}`;
          const detail = stderrTail.trim();
          finish(
            new ConversionError(
              'exit-code',
              archive,
              `Converter failed with ${status}${detail ? `: ${detail}` : ''}`
            )
          );
        } else {
          finish();
        }
      });
    });
  }
}

/**
 * Concatenate every file under the staging directory into one mbox
 *
 * Files are taken in relative-path order; a blank line is kept between
 * them so the next file's "From " line starts a new message.
 *
 * @returns Bytes written; the target is only created when non-zero
 */
async function concatenateOutput(stagingDir: string, mboxPath: string): Promise<number> {
  const files = await listFiles(stagingDir);
  const partialPath = `${mboxPath}.partial`;
  const handle = await fs.open(partialPath, 'w');

  let bytes = 0;
  let tail = Buffer.alloc(0);
  let completed = false;

  try {
    for (const file of files) {
      if (bytes > 0) {
        const separator = separatorAfter(tail);
        if (separator.length > 0) {
          await handle.write(separator);
          bytes += separator.length;
        }
      }

      for await (const chunk of createReadStream(file)) {
        const data = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
        if (data.length === 0) {
          continue;
        }
        await handle.write(data);
        bytes += data.length;
        tail = Buffer.concat([tail, data]).subarray(-2);
      }
    }
    completed = true;
  } finally {
    await handle.close();
    if (!completed || bytes === 0) {
      await fs.rm(partialPath, { force: true });
    }
  }

  if (bytes > 0) {
    await fs.rename(partialPath, mboxPath);
  }
  return bytes;
}

function separatorAfter(tail: Buffer): Buffer {
  if (tail.length >= 2 && tail[0] === 0x0a && tail[1] === 0x0a) {
    return Buffer.alloc(0);
  }
  return Buffer.from(tail.length > 0 && tail[tail.length - 1] === 0x0a ? '\n' : '\n\n');
}

async function listFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }

  return files;
}

/**
 * Resolve an executable name against PATH
 *
 * @returns Absolute path, or null when not found or not executable
 */
export async function resolveExecutable(
  command: string,
  searchPath: string = process.env.PATH ?? ''
): Promise<string | null> {
  const candidates = command.includes('/') || command.includes(path.sep)
    ? [path.resolve(command)]
    : searchPath
        .split(path.delimiter)
        .filter((dir) => dir.length > 0)
        .map((dir) => path.join(dir, command));

  for (const candidate of candidates) {
    try {
      await fs.access(candidate, fsConstants.X_OK);
      const stats = await fs.stat(candidate);
      if (stats.isFile()) {
        return candidate;
      }
    } catch {
      // not here; try the next PATH entry
    }
  }

  return null;
}
