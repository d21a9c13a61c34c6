import { mkdir, mkdtemp, readFile, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import pino from 'pino';
import type { Logger } from '../../src/lib/logger.js';
import { StoreError, type FetchError } from '../../src/lib/errors.js';
import { err, ok, type Result } from '../../src/lib/result.js';
import type { ObjectStore } from '../../src/services/ObjectStoreGateway.js';
import type { FetchOutcome, ModelFetcher } from '../../src/services/ModelFetcher.js';
import type { RunConfig } from '../../src/types/index.js';

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export interface CapturedLogs {
  logger: Logger;
  records: () => Array<Record<string, unknown>>;
  messages: () => string[];
}

/**
 * Logger writing JSON lines into memory.
 */
export function captureLogger(level = 'debug'): CapturedLogs {
  const lines: string[] = [];
  const logger = pino({ level }, { write: (line: string) => lines.push(line) });
  const records = (): Array<Record<string, unknown>> => lines.map(line => JSON.parse(line));
  return {
    logger,
    records,
    messages: () => records().map(record => String(record.msg)),
  };
}

export async function makeTempDir(prefix = 'model-cache-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function writeTree(root: string, files: Record<string, string | Buffer>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = join(root, relativePath);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * In-process object store keyed by bucket name. Buckets must be created up
 * front; unknown buckets fail with NoSuchBucket like S3 does.
 */
export class InMemoryObjectStore implements ObjectStore {
  private readonly buckets = new Map<string, Map<string, Buffer>>();
  readonly existsCalls: Array<{ bucket: string; prefix: string }> = [];
  readonly putCalls: string[] = [];
  readonly failingKeys = new Set<string>();
  inFlight = 0;
  maxInFlight = 0;

  constructor(buckets: string[] = ['test-bucket'], private readonly delayMs = 0) {
    for (const bucket of buckets) {
      this.buckets.set(bucket, new Map());
    }
  }

  seed(bucket: string, key: string, content: string): void {
    this.buckets.get(bucket)?.set(key, Buffer.from(content));
  }

  keys(bucket: string): string[] {
    return [...(this.buckets.get(bucket)?.keys() ?? [])].sort();
  }

  object(bucket: string, key: string): Buffer | undefined {
    return this.buckets.get(bucket)?.get(key);
  }

  async exists(bucket: string, prefix: string): Promise<Result<boolean, StoreError>> {
    this.existsCalls.push({ bucket, prefix });
    const objects = this.buckets.get(bucket);
    if (!objects) {
      return err(new StoreError('The specified bucket does not exist', { code: 'NoSuchBucket', bucket }));
    }
    return ok([...objects.keys()].some(key => key.startsWith(prefix)));
  }

  async putObject(bucket: string, key: string, localPath: string): Promise<Result<number, StoreError>> {
    this.putCalls.push(key);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.delayMs > 0) {
        await sleep(this.delayMs);
      }
      const objects = this.buckets.get(bucket);
      if (!objects) {
        return err(new StoreError('The specified bucket does not exist', { code: 'NoSuchBucket', bucket, key }));
      }
      if (this.failingKeys.has(key)) {
        return err(new StoreError(`Simulated failure for ${key}`, { code: 'InternalError', bucket, key }));
      }
      const content = await readFile(localPath);
      objects.set(key, content);
      return ok(content.length);
    } finally {
      this.inFlight--;
    }
  }
}

/**
 * Fetcher that writes a fixed file tree into the destination, or fails.
 */
export class FakeModelFetcher implements ModelFetcher {
  readonly calls: Array<{ modelId: string; destinationDir: string; token: string | null }> = [];

  constructor(
    private readonly files: Record<string, string>,
    private readonly failure: FetchError | null = null
  ) {}

  async fetch(modelId: string, destinationDir: string, token: string | null = null): Promise<FetchOutcome> {
    this.calls.push({ modelId, destinationDir, token });
    await writeTree(destinationDir, this.files);
    if (this.failure) {
      return err(this.failure);
    }
    const totalBytes = Object.values(this.files).reduce((total, content) => total + Buffer.byteLength(content), 0);
    return ok({ path: destinationDir, fileCount: Object.keys(this.files).length, totalBytes });
  }
}

export function testConfig(localWorkDir: string, overrides: Partial<RunConfig['upload']> = {}): RunConfig {
  return {
    s3: {
      endpoint: 'http://localhost:9000',
      region: 'us-east-1',
      bucket: 'test-bucket',
      accessKeyId: 'AKIATEST1234567890AB',
      secretAccessKey: 'test-secret-key-0000',
      forcePathStyle: true,
    },
    hub: {
      modelId: 'test-org/tiny-model',
      token: null,
      endpoint: 'http://127.0.0.1:1',
      revision: 'main',
      downloadConcurrency: 2,
      maxRetries: 0,
      retryDelay: 0,
      timeout: 1000,
    },
    upload: {
      objectPrefix: 'models/',
      concurrency: 4,
      showProgress: true,
      ...overrides,
    },
    localWorkDir,
    logging: { level: 'info', pretty: false },
  };
}
