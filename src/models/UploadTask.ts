import type { LocalFile } from '../lib/fs.js';

export interface UploadTask {
  /** Absolute path of the file on local disk */
  localPath: string;

  /** Destination object key */
  key: string;

  /** Path relative to the uploaded directory, `/`-separated */
  relativePath: string;

  /** Size on disk when the directory was walked */
  size: number;
}

export interface UploadSummary {
  fileCount: number;
  totalBytes: number;
}

export function createUploadTask(file: LocalFile, keyPrefix: string): UploadTask {
  return {
    localPath: file.path,
    key: `${keyPrefix}${file.relativePath}`,
    relativePath: file.relativePath,
    size: file.size,
  };
}

export function emptySummary(): UploadSummary {
  return { fileCount: 0, totalBytes: 0 };
}
