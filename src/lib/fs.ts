import { mkdtemp, readdir, rm, stat } from 'fs/promises';
import { join, relative, sep } from 'path';
import { toFilesystemError, type FilesystemError } from './errors.js';
import { err, ok, type Result } from './result.js';
import type { Logger } from './logger.js';

export interface LocalFile {
  /** Absolute path on disk */
  path: string;
  /** Path relative to the walked root, always `/`-separated */
  relativePath: string;
  size: number;
}

export interface DirectorySummary {
  fileCount: number;
  totalBytes: number;
  largest: LocalFile[];
}

export function toPosixPath(relativePath: string): string {
  return relativePath.split(sep).join('/');
}

async function collect(root: string, dir: string, files: LocalFile[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    const entryPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      await collect(root, entryPath, files);
    } else if (entry.isFile()) {
      const stats = await stat(entryPath);
      files.push({
        path: entryPath,
        relativePath: toPosixPath(relative(root, entryPath)),
        size: stats.size,
      });
    }
  }
}

/**
 * Recursively list every regular file under `root`, sorted by relative path.
 * Symbolic links and other special entries are skipped.
 */
export async function walkFiles(root: string): Promise<Result<LocalFile[], FilesystemError>> {
  const files: LocalFile[] = [];
  try {
    await collect(root, root, files);
  } catch (error) {
    return err(toFilesystemError(error, root, 'list'));
  }
  files.sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0));
  return ok(files);
}

export function summarizeFiles(files: LocalFile[], top = 5): DirectorySummary {
  return {
    fileCount: files.length,
    totalBytes: files.reduce((total, file) => total + file.size, 0),
    largest: [...files].sort((a, b) => b.size - a.size).slice(0, top),
  };
}

/**
 * Create a private (0700) scratch directory under `parent`.
 */
export async function createScratchDirectory(
  parent: string,
  prefix: string
): Promise<Result<string, FilesystemError>> {
  try {
    return ok(await mkdtemp(join(parent, prefix)));
  } catch (error) {
    return err(toFilesystemError(error, parent, 'create scratch directory in'));
  }
}

/**
 * Best-effort recursive removal. Failures are logged and reported as `false`.
 */
export async function removeDirectory(path: string, logger: Logger): Promise<boolean> {
  logger.info({ path }, 'Cleaning up local files');

  try {
    await rm(path, { recursive: true, force: true });
    logger.info({ path }, 'Cleanup complete');
    return true;
  } catch (error) {
    logger.warn({ path, error: toFilesystemError(error, path, 'remove') }, 'Cleanup failed (non-fatal)');
    return false;
  }
}

export const GIB = 1024 ** 3;
export const MIB = 1024 ** 2;

export function formatMegabytes(bytes: number): string {
  return (bytes / MIB).toFixed(2);
}

export function formatGigabytes(bytes: number): string {
  return (bytes / GIB).toFixed(2);
}
