import pLimit from 'p-limit';
import { stat } from 'fs/promises';
import type { HubConfig } from '../types/index.js';
import { FilesystemError, toFilesystemError, type FetchError } from '../lib/errors.js';
import { formatGigabytes, formatMegabytes, summarizeFiles, walkFiles, MIB, type DirectorySummary } from '../lib/fs.js';
import { err, ok, type Result } from '../lib/result.js';
import type { Logger } from '../lib/logger.js';
import { HubClient, type RepoFile } from './HubClient.js';

export interface FetchedSnapshot {
  /** Root directory that was populated */
  path: string;
  fileCount: number;
  totalBytes: number;
}

export type FetchOutcome = Result<FetchedSnapshot, FetchError | FilesystemError>;

/**
 * Downloads a complete repository snapshot into a local directory.
 */
export interface ModelFetcher {
  fetch(modelId: string, destinationDir: string, token?: string | null): Promise<FetchOutcome>;
}

export class HubModelFetcher implements ModelFetcher {
  private readonly logger: Logger;

  constructor(
    private readonly client: HubClient,
    private readonly downloadConcurrency: number,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'fetcher' });
  }

  static fromConfig(config: HubConfig, logger: Logger): HubModelFetcher {
    const client = new HubClient(
      {
        endpoint: config.endpoint,
        revision: config.revision,
        maxRetries: config.maxRetries,
        retryDelay: config.retryDelay,
        timeout: config.timeout,
      },
      logger
    );
    return new HubModelFetcher(client, config.downloadConcurrency, logger);
  }

  async fetch(modelId: string, destinationDir: string, token: string | null = null): Promise<FetchOutcome> {
    const ready = await this.checkDestination(destinationDir);
    if (!ready.ok) {
      return ready;
    }

    this.logger.info({ modelId, destinationDir }, `Downloading model '${modelId}' from the hub`);
    this.logger.info('Starting download - this may take a while for large models...');
    const startTime = Date.now();

    const listed = await this.client.listFiles(modelId, token);
    if (!listed.ok) {
      return listed;
    }

    const downloaded = await this.downloadAll(modelId, listed.value, destinationDir, token);
    if (!downloaded.ok) {
      return downloaded;
    }

    const walked = await walkFiles(destinationDir);
    if (!walked.ok) {
      return walked;
    }

    const summary = summarizeFiles(walked.value);
    this.logSummary(destinationDir, summary, (Date.now() - startTime) / 1000);

    return ok({
      path: destinationDir,
      fileCount: summary.fileCount,
      totalBytes: summary.totalBytes,
    });
  }

  private async checkDestination(destinationDir: string): Promise<Result<void, FilesystemError>> {
    try {
      const stats = await stat(destinationDir);
      if (!stats.isDirectory()) {
        return err(new FilesystemError(`Download destination is not a directory: ${destinationDir}`, 'ENOTDIR', destinationDir));
      }
      return ok(undefined);
    } catch (error) {
      return err(toFilesystemError(error, destinationDir, 'access download destination'));
    }
  }

  private async downloadAll(
    modelId: string,
    files: RepoFile[],
    destinationDir: string,
    token: string | null
  ): Promise<Result<void, FetchError>> {
    const limit = pLimit(this.downloadConcurrency);
    const state: { failure: FetchError | null } = { failure: null };

    await Promise.all(
      files.map(file =>
        limit(async () => {
          if (state.failure) {
            return;
          }
          const result = await this.client.downloadFile(modelId, file, destinationDir, token);
          if (!result.ok) {
            state.failure ??= result.error;
          }
        })
      )
    );

    return state.failure ? err(state.failure) : ok(undefined);
  }

  private logSummary(
    destinationDir: string,
    summary: DirectorySummary,
    elapsedSeconds: number
  ): void {
    this.logger.info(
      { path: destinationDir, elapsedSeconds: Number(elapsedSeconds.toFixed(2)) },
      `Download complete: ${destinationDir} (${elapsedSeconds.toFixed(2)} seconds, ${(elapsedSeconds / 60).toFixed(2)} minutes)`
    );

    if (summary.fileCount === 0) {
      this.logger.warn('Download directory is empty - model repo may be empty or download may have failed silently');
      return;
    }

    this.logger.info({ fileCount: summary.fileCount }, `Downloaded ${summary.fileCount} files`);
    this.logger.info(
      { totalBytes: summary.totalBytes },
      `Total download size: ${formatGigabytes(summary.totalBytes)} GB (${summary.totalBytes.toLocaleString('en-US')} bytes)`
    );

    if (elapsedSeconds > 0) {
      const speed = summary.totalBytes / MIB / elapsedSeconds;
      this.logger.info({ speedMBps: Number(speed.toFixed(2)) }, `Average download speed: ${speed.toFixed(2)} MB/s`);
    }

    this.logger.info(
      { largest: summary.largest.map(file => ({ path: file.relativePath, size: file.size })) },
      `Largest files downloaded: ${summary.largest.map(file => `${file.relativePath} (${formatMegabytes(file.size)} MB)`).join(', ')}`
    );
  }
}
