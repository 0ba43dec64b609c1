/**
 * AttachmentExtractor - writes attachment bytes to disk
 *
 * Layout: `<attachmentsRoot>/<archiveStem>/<messageIndex>/<filename>`.
 * Each archive owns its own subtree, so concurrent workers never touch
 * the same directory. A run writes into a staging directory beside it and
 * swaps it in only once the archive's records are committed.
 *
 * @module main/email/AttachmentExtractor
 */

import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger.js';
import { ArchiveError, errorMessage } from '../errors.js';
import type { AttachmentFile, AttachmentPart, RawMessage } from '../../shared/types/index.js';

/** Upper bound on numeric suffixes tried for one name */
const MAX_DISAMBIGUATION = 10000;

/** Longest file name kept, in characters, extension included */
const MAX_FILENAME_LENGTH = 200;

export class AttachmentExtractor {
  constructor(private readonly attachmentsRoot: string) {}

  /**
   * Directory holding every attachment of one archive
   */
  archiveDir(archiveStem: string): string {
    return path.join(this.attachmentsRoot, archiveStem);
  }

  /**
   * Start writing one archive's attachments into a private staging
   * directory; nothing under `<stem>/` changes until publish()
   */
  stage(archiveStem: string): StagedAttachments {
    return new StagedAttachments(
      archiveStem,
      this.archiveDir(archiveStem),
      path.join(this.attachmentsRoot, `${archiveStem}.partial-${uuidv4()}`)
    );
  }
}

/**
 * Attachments of one archive run, written under `<stem>.partial-<id>/`
 *
 * References already carry the published location (`<stem>/<index>/<file>`),
 * so records built from them stay valid once publish() swaps the
 * staging directory into place.
 */
export class StagedAttachments {
  private created = false;

  constructor(
    readonly archiveStem: string,
    readonly archiveDir: string,
    readonly stagingDir: string
  ) {}

  /**
   * Write every attachment of a message
   *
   * @returns One reference per attachment, in message order
   * @throws ArchiveError (stage 'extracting') if any write fails
   */
  async extract(message: RawMessage, messageIndex: number): Promise<AttachmentFile[]> {
    if (message.attachments.length === 0) {
      return [];
    }

    const messageDir = path.join(this.stagingDir, String(messageIndex));
    const files: AttachmentFile[] = [];

    try {
      await fs.mkdir(messageDir, { recursive: true });
      this.created = true;
      for (const part of message.attachments) {
        files.push(await this.writeAttachment(part, messageDir, messageIndex));
      }
    } catch (error) {
      throw new ArchiveError(
        `Failed to extract attachments of message ${messageIndex}: ${errorMessage(error)}`,
        this.archiveStem,
        'extracting',
        { cause: error }
      );
    }

    logger.debug('AttachmentExtractor', `Extracted ${files.length} attachment(s)`, {
      archive: this.archiveStem,
      messageIndex,
    });
    return files;
  }

  /**
   * Replace the archive's published subtree with the staged one
   *
   * An archive that staged nothing ends with no subtree at all.
   */
  async publish(): Promise<void> {
    const retired = `${this.stagingDir}.old`;

    try {
      await fs.rename(this.archiveDir, retired);
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
    }

    if (this.created) {
      await fs.rename(this.stagingDir, this.archiveDir);
      this.created = false;
    }
    await fs.rm(retired, { recursive: true, force: true });
  }

  /**
   * Drop everything staged; the published subtree is left untouched
   */
  async discard(): Promise<void> {
    await fs.rm(this.stagingDir, { recursive: true, force: true });
    this.created = false;
  }

  private async writeAttachment(
    part: AttachmentPart,
    messageDir: string,
    messageIndex: number
  ): Promise<AttachmentFile> {
    const filename = sanitizeFilename(part.filename);
    const { handle, absolutePath: stagedPath } = await openExclusive(messageDir, filename);

    let written = false;
    try {
      await handle.write(part.content);
      written = true;
    } finally {
      await handle.close();
      if (!written) {
        await fs.rm(stagedPath, { force: true });
      }
    }

    const storedName = path.basename(stagedPath);
    return {
      filename,
      contentType: part.contentType,
      relativePath: [this.archiveStem, String(messageIndex), storedName].join('/'),
      absolutePath: path.join(this.archiveDir, String(messageIndex), storedName),
      size: part.content.length,
    };
  }
}

/**
 * Create a file that does not exist yet, appending `_1`, `_2`, ... before
 * the extension until the name is free
 */
async function openExclusive(
  dir: string,
  filename: string
): Promise<{ handle: FileHandle; absolutePath: string }> {
  for (let attempt = 0; attempt < MAX_DISAMBIGUATION; attempt++) {
    const absolutePath = path.join(dir, disambiguate(filename, attempt));
    try {
      const handle = await fs.open(absolutePath, 'wx');
      return { handle, absolutePath };
    } catch (error) {
      if (!isAlreadyExists(error)) {
        throw error;
      }
    }
  }

  throw new Error(`No free file name for ${filename} in ${dir}`);
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * `report.pdf`, `report_1.pdf`, `report_2.pdf`, ...
 */
export function disambiguate(filename: string, attempt: number): string {
  if (attempt === 0) {
    return filename;
  }

  const extension = path.extname(filename);
  const base = filename.slice(0, filename.length - extension.length);
  return `${base}_${attempt}${extension}`;
}

/**
 * Reduce an attachment name to a safe single path segment
 *
 * @example
 * ```typescript
 * sanitizeFilename('../../etc/passwd') // 'passwd'
 * sanitizeFilename('a:b?.txt') // 'a_b_.txt'
 * ```
 */
export function sanitizeFilename(filename: string): string {
  const base = filename.split(/[\\/]/).pop() ?? '';
  let safe = base.replace(/[\x00-\x1f\x7f<>:"|?*]/g, '_').trim();

  if (safe === '' || safe === '.' || safe === '..') {
    safe = 'attachment';
  }

  if (safe.length > MAX_FILENAME_LENGTH) {
    const extension = path.extname(safe).slice(0, 20);
    safe = safe.slice(0, MAX_FILENAME_LENGTH - extension.length) + extension;
  }

  return safe;
}
