import { promises as fs } from 'fs';
import path from 'path';
import type { SourceArchive } from '../../shared/types/index.js';

/** Recognized archive extensions (compared lowercase) */
export const ARCHIVE_EXTENSIONS: readonly string[] = ['.pst', '.ost'];

export function isArchivePath(filePath: string): boolean {
  return ARCHIVE_EXTENSIONS.includes(path.extname(filePath).toLowerCase());
}

/**
 * Find every archive under the target directory, recursively
 *
 * Archives come back sorted by path. Stems are made unique (`name`,
 * `name_1`, ...) so intermediate files, stores and attachment
 * directories of two same-named archives never collide.
 */
export async function discoverArchives(targetDir: string): Promise<SourceArchive[]> {
  const files = await walk(path.resolve(targetDir));
  return assignUniqueStems(files.filter(isArchivePath).sort());
}

/**
 * Derive `stem` and `name` for each path, suffixing repeated stems
 *
 * Comparison is case-insensitive so results are portable across
 * case-insensitive filesystems.
 */
export function assignUniqueStems(archivePaths: readonly string[]): SourceArchive[] {
  const used = new Set<string>();

  return archivePaths.map((archivePath) => {
    const extension = path.extname(archivePath);
    const baseStem = path.basename(archivePath, extension);

    let stem = baseStem;
    for (let suffix = 1; used.has(stem.toLowerCase()); suffix++) {
      stem = `${baseStem}_${suffix}`;
    }
    used.add(stem.toLowerCase());

    return { path: archivePath, name: `${stem}${extension}`, stem };
  });
}

async function walk(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await walk(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    } else if (entry.isSymbolicLink() && (await isFileTarget(fullPath))) {
      files.push(fullPath);
    }
  }

  return files;
}

async function isFileTarget(linkPath: string): Promise<boolean> {
  try {
    return (await fs.stat(linkPath)).isFile();
  } catch {
    // dangling link
    return false;
  }
}
