import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { createWriteStream } from 'fs';
import { mkdir, rename, rm, stat } from 'fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'path';
import { Readable, Transform } from 'stream';
import { pipeline } from 'stream/promises';
import { FetchFailureReason } from '../types/index.js';
import { FetchError, errorMessage } from '../lib/errors.js';
import { err, ok, type Result } from '../lib/result.js';
import type { Logger } from '../lib/logger.js';

export interface RepoFile {
  /** Path of the file inside the repository, `/`-separated */
  path: string;
  /** Size in bytes when the hub reports it */
  size: number | null;
}

export interface HubClientOptions {
  endpoint: string;
  revision: string;
  maxRetries: number;
  retryDelay: number;
  /**
   * Idle timeout in milliseconds, for connecting and between chunks of a
   * response body; 0 disables it
   */
  timeout?: number;
}

interface RepoInfoResponse {
  siblings?: Array<{ rfilename?: unknown; size?: unknown }>;
}

const PARTIAL_SUFFIX = '.incomplete';

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function encodeRepoPath(path: string): string {
  return path.split('/').map(encodeURIComponent).join('/');
}

/**
 * Pass-through that destroys `source` when no chunk arrives for `idleMs`.
 */
function stallGuard(source: Readable, idleMs: number, onStall: () => Error): Transform {
  const timer = idleMs > 0 ? setTimeout(() => source.destroy(onStall()), idleMs) : null;
  return new Transform({
    transform(chunk, _encoding, callback) {
      timer?.refresh();
      callback(null, chunk);
    },
    flush(callback) {
      if (timer) clearTimeout(timer);
      callback();
    },
    destroy(error, callback) {
      if (timer) clearTimeout(timer);
      callback(error);
    },
  });
}

async function fileSize(path: string): Promise<number> {
  try {
    return (await stat(path)).size;
  } catch {
    return 0;
  }
}

/**
 * Minimal hub HTTP client: repository listing and resumable file download.
 */
export class HubClient {
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(
    private readonly options: HubClientOptions,
    logger: Logger
  ) {
    this.http = axios.create({
      baseURL: options.endpoint,
      timeout: options.timeout ?? 0,
      maxRedirects: 10,
    });
    this.logger = logger.child({ component: 'hub' });
  }

  private authHeaders(token: string | null): Record<string, string> {
    return token ? { Authorization: `Bearer ${token}` } : {};
  }

  /**
   * Translate a transport failure into a FetchError with a stable reason.
   */
  toFetchError(error: unknown, what: string): FetchError {
    if (error instanceof FetchError) {
      return error;
    }
    if (axios.isAxiosError(error)) {
      const status = error.response?.status ?? null;
      if (status === 401 || status === 403) {
        return new FetchError(FetchFailureReason.AUTH, `Access denied to ${what} (HTTP ${status}); check HF_TOKEN for gated or private repositories`, status, { cause: error });
      }
      if (status === 404) {
        return new FetchError(FetchFailureReason.NOT_FOUND, `${what} not found (HTTP 404)`, status, { cause: error });
      }
      if (status !== null) {
        return new FetchError(FetchFailureReason.HTTP, `Request for ${what} failed with HTTP ${status}`, status, { cause: error });
      }
      return new FetchError(FetchFailureReason.NETWORK, `Network error while fetching ${what}: ${error.code ?? error.message}`, null, { cause: error });
    }
    return new FetchError(FetchFailureReason.NETWORK, `Error while fetching ${what}: ${errorMessage(error)}`, null, { cause: error });
  }

  async listFiles(modelId: string, token: string | null): Promise<Result<RepoFile[], FetchError>> {
    const url = `/api/models/${modelId}/revision/${encodeURIComponent(this.options.revision)}`;

    try {
      const response = await this.http.get<RepoInfoResponse>(url, {
        params: { blobs: true },
        headers: this.authHeaders(token),
        responseType: 'json',
      });

      const siblings = response.data.siblings;
      if (!Array.isArray(siblings)) {
        return err(new FetchError(FetchFailureReason.INTEGRITY, `Repository listing for '${modelId}' has no file list`));
      }

      const files: RepoFile[] = [];
      for (const sibling of siblings) {
        if (typeof sibling.rfilename !== 'string') {
          continue;
        }
        files.push({
          path: sibling.rfilename,
          size: typeof sibling.size === 'number' ? sibling.size : null,
        });
      }
      return ok(files);

    } catch (error) {
      return err(this.toFetchError(error, `repository '${modelId}'`));
    }
  }

  /**
   * Resolve a repository path inside `destinationDir`, rejecting paths that
   * would land outside it.
   */
  resolveTarget(destinationDir: string, repoPath: string): Result<string, FetchError> {
    const target = resolve(destinationDir, repoPath);
    const inside = relative(destinationDir, target);
    if (inside === '' || inside === '..' || inside.startsWith(`..${sep}`) || isAbsolute(inside)) {
      return err(new FetchError(FetchFailureReason.INTEGRITY, `Repository file '${repoPath}' resolves outside ${destinationDir}`));
    }
    return ok(target);
  }

  /**
   * Download one repository file as a real file under `destinationDir`.
   *
   * Data is written to `<target>.incomplete` and renamed when complete. A retry
   * resumes from the partial file with a Range request.
   * @returns Bytes on disk for the finished file
   */
  async downloadFile(
    modelId: string,
    file: RepoFile,
    destinationDir: string,
    token: string | null
  ): Promise<Result<number, FetchError>> {
    const resolved = this.resolveTarget(destinationDir, file.path);
    if (!resolved.ok) {
      return resolved;
    }
    const target = resolved.value;
    const partial = `${target}${PARTIAL_SUFFIX}`;
    const url = `/${modelId}/resolve/${encodeURIComponent(this.options.revision)}/${encodeRepoPath(file.path)}`;
    const logger = this.logger.child({ file: file.path });

    let attempt = 0;
    while (true) {
      try {
        await mkdir(dirname(target), { recursive: true });
        const size = await this.transfer(url, file, partial, token);
        await rename(partial, target);
        logger.debug({ size }, 'File downloaded');
        return ok(size);

      } catch (error) {
        if (axios.isAxiosError(error) && error.response?.data instanceof Readable) {
          error.response.data.destroy();
        }
        const fetchError = this.toFetchError(error, `file '${file.path}' of '${modelId}'`);
        attempt++;

        if (!fetchError.retryable || attempt > this.options.maxRetries) {
          return err(fetchError);
        }

        const delay = this.options.retryDelay * Math.pow(2, attempt - 1);
        logger.warn({ attempt, maxRetries: this.options.maxRetries, delay, error: fetchError }, 'Download attempt failed, retrying');
        await sleep(delay);
      }
    }
  }

  private async transfer(url: string, file: RepoFile, partial: string, token: string | null): Promise<number> {
    const offset = await fileSize(partial);
    const headers = this.authHeaders(token);
    if (offset > 0) {
      headers.Range = `bytes=${offset}-`;
    }

    const response: AxiosResponse<Readable> = await this.http.get<Readable>(url, {
      headers,
      responseType: 'stream',
      validateStatus: (status) => (status >= 200 && status < 300) || status === 416,
    });

    if (response.status === 416) {
      response.data.destroy();
      if (file.size !== null && offset === file.size) {
        // Partial file already holds the whole object
        return offset;
      }
      await rm(partial, { force: true });
      throw new FetchError(FetchFailureReason.NETWORK, `Range not satisfiable for '${file.path}' at offset ${offset}; restarting`, 416);
    }

    const append = response.status === 206 && offset > 0;
    const idleMs = this.options.timeout ?? 0;
    const guard = stallGuard(
      response.data,
      idleMs,
      () => new FetchError(FetchFailureReason.NETWORK, `Download of '${file.path}' stalled: no data for ${idleMs} ms`)
    );
    await pipeline(response.data, guard, createWriteStream(partial, { flags: append ? 'a' : 'w' }));

    const written = await fileSize(partial);
    if (file.size !== null && written !== file.size) {
      throw new FetchError(FetchFailureReason.NETWORK, `Incomplete download of '${file.path}': ${written} of ${file.size} bytes`);
    }
    return written;
  }
}
