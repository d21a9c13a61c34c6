import pLimit from 'p-limit';
import { DEFAULT_UPLOAD_CONCURRENCY, ensureTrailingSlash } from '../types/index.js';
import { StoreError, type FilesystemError, errorMessage } from '../lib/errors.js';
import { walkFiles, formatMegabytes } from '../lib/fs.js';
import { err, ok, type Result } from '../lib/result.js';
import type { Logger } from '../lib/logger.js';
import { createUploadTask, emptySummary, type UploadSummary, type UploadTask } from '../models/UploadTask.js';
import type { ObjectStore } from './ObjectStoreGateway.js';

export type UploadOutcome = Result<UploadSummary, StoreError | FilesystemError>;

interface UploadProgress extends UploadSummary {
  failure: StoreError | null;
}

export interface UploadOrchestratorOptions {
  /** Log each finished file at info level instead of debug */
  showProgress?: boolean;
}

export class UploadOrchestrator {
  private readonly logger: Logger;
  private readonly showProgress: boolean;

  constructor(
    private readonly store: ObjectStore,
    logger: Logger,
    options: UploadOrchestratorOptions = {}
  ) {
    this.logger = logger.child({ component: 'upload' });
    this.showProgress = options.showProgress ?? true;
  }

  /**
   * Upload every regular file under `localDir` to `keyPrefix + relativePath`
   * with at most `concurrency` uploads in flight.
   *
   * Once a task fails, tasks still queued are not started; tasks already in
   * flight run to completion before the first failure is returned.
   */
  async uploadTree(
    localDir: string,
    bucket: string,
    keyPrefix: string,
    concurrency: number = DEFAULT_UPLOAD_CONCURRENCY
  ): Promise<UploadOutcome> {
    const prefix = ensureTrailingSlash(keyPrefix);
    this.logger.info({ localDir, bucket, prefix }, `Uploading ${localDir} to s3://${bucket}/${prefix}`);

    const listed = await walkFiles(localDir);
    if (!listed.ok) {
      return listed;
    }

    const tasks = listed.value.map(file => createUploadTask(file, prefix));
    if (tasks.length === 0) {
      this.logger.warn({ localDir }, 'No files to upload');
      return ok(emptySummary());
    }

    const workers = Math.max(1, Math.floor(concurrency));
    this.logger.info({ files: tasks.length, workers }, `Uploading ${tasks.length} files with ${workers} concurrent workers`);

    const limit = pLimit(workers);
    const progress: UploadProgress = { ...emptySummary(), failure: null };

    await Promise.all(
      tasks.map(task =>
        limit(async () => {
          if (progress.failure) {
            return;
          }

          const result = await this.runTask(task, bucket);
          if (!result.ok) {
            progress.failure ??= result.error;
            this.logger.error({ relativePath: task.relativePath, key: task.key, error: result.error }, `Failed to upload ${task.relativePath}`);
            return;
          }

          progress.totalBytes += result.value;
          progress.fileCount += 1;
          this.reportProgress(task, progress.fileCount, tasks.length);
        })
      )
    );

    if (progress.failure) {
      return err(progress.failure);
    }

    const { fileCount, totalBytes } = progress;
    this.logger.info(
      { fileCount, totalBytes },
      `Upload complete: ${fileCount} files, ${formatMegabytes(totalBytes)} MB total`
    );
    return ok({ fileCount, totalBytes });
  }

  private async runTask(task: UploadTask, bucket: string): Promise<Result<number, StoreError>> {
    let result: Result<number, StoreError>;
    try {
      result = await this.store.putObject(bucket, task.key, task.localPath);
    } catch (error) {
      result = err(
        new StoreError(errorMessage(error), { code: 'Unknown', bucket, key: task.key, cause: error })
      );
    }

    if (result.ok) {
      return result;
    }

    const cause = result.error;
    return err(
      new StoreError(`Failed to upload ${task.relativePath}: ${cause.message}`, {
        code: cause.code,
        bucket,
        key: task.key,
        relativePath: task.relativePath,
        cause,
      })
    );
  }

  private reportProgress(task: UploadTask, completed: number, total: number): void {
    const message = `Uploaded: ${task.relativePath} -> ${task.key}`;
    const fields = { completed, total, size: task.size };
    if (this.showProgress) {
      this.logger.info(fields, message);
    } else {
      this.logger.debug(fields, message);
    }
  }
}
