import { resolve } from 'path';
import type { LoggingConfig, RunConfig } from '../types/index.js';
import {
  DEFAULT_HUB_ENDPOINT,
  DEFAULT_HUB_TIMEOUT,
  DEFAULT_OBJECT_PREFIX,
  DEFAULT_UPLOAD_CONCURRENCY,
  DEFAULT_WORK_DIR,
  LOG_LEVELS,
  isLogLevel,
} from '../types/index.js';
import { ConfigError } from '../lib/errors.js';
import { err, ok, type Result } from '../lib/result.js';
import { maskCredential } from '../lib/mask.js';

type Env = Readonly<Record<string, string | undefined>>;

class EnvReader {
  constructor(private readonly env: Env) {}

  getEnv(key: string, defaultValue?: string): string {
    const value = this.env[key];
    if (value === undefined || value === '') {
      if (defaultValue !== undefined) {
        return defaultValue;
      }
      throw new ConfigError(`Missing required environment variable: ${key}`);
    }
    return value;
  }

  getOptionalEnv(key: string): string | null {
    const value = this.env[key];
    return value === undefined || value === '' ? null : value;
  }

  getEnvNumber(key: string, defaultValue: number, min = 1): number {
    const value = this.env[key];
    if (value === undefined || value === '') {
      return defaultValue;
    }
    const num = Number(value);
    if (!Number.isInteger(num)) {
      throw new ConfigError(`Environment variable ${key} must be a number, got: ${value}`);
    }
    if (num < min) {
      throw new ConfigError(`Environment variable ${key} must be at least ${min}, got: ${value}`);
    }
    return num;
  }

  getEnvBoolean(key: string, defaultValue: boolean): boolean {
    const value = this.env[key];
    if (value === undefined || value === '') {
      return defaultValue;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }
}

function readConfig(reader: EnvReader, env: Env): RunConfig {
  // Required values first, in the order operators set them
  const modelId = reader.getEnv('MODEL_NAME');
  const bucket = reader.getEnv('S3_BUCKET');
  const endpoint = reader.getEnv('S3_ENDPOINT_URL');
  const accessKeyId = reader.getEnv('AWS_ACCESS_KEY_ID');
  const secretAccessKey = reader.getEnv('AWS_SECRET_ACCESS_KEY');

  const s3 = {
    endpoint,
    region: reader.getEnv('S3_REGION', 'us-east-1'),
    bucket,
    accessKeyId,
    secretAccessKey,
    forcePathStyle: reader.getEnvBoolean('S3_FORCE_PATH_STYLE', true),
  };

  const hub = {
    modelId,
    token: reader.getOptionalEnv('HF_TOKEN'),
    endpoint: reader.getEnv('HF_ENDPOINT', DEFAULT_HUB_ENDPOINT).replace(/\/+$/, ''),
    revision: reader.getEnv('HF_REVISION', 'main'),
    downloadConcurrency: reader.getEnvNumber('DOWNLOAD_CONCURRENCY', 4),
    maxRetries: reader.getEnvNumber('DOWNLOAD_MAX_RETRIES', 3, 0),
    retryDelay: reader.getEnvNumber('DOWNLOAD_RETRY_DELAY', 1000, 0),
    timeout: reader.getEnvNumber('DOWNLOAD_TIMEOUT', DEFAULT_HUB_TIMEOUT),
  };

  // S3_PREFIX may legitimately be empty, so read it raw
  const upload = {
    objectPrefix: env.S3_PREFIX ?? DEFAULT_OBJECT_PREFIX,
    concurrency: reader.getEnvNumber('UPLOAD_CONCURRENCY', DEFAULT_UPLOAD_CONCURRENCY),
    showProgress: !reader.getEnvBoolean('DISABLE_PROGRESS', false),
  };

  const level = reader.getEnv('LOG_LEVEL', 'info');
  if (!isLogLevel(level)) {
    throw new ConfigError(`Invalid LOG_LEVEL: ${level}. Must be one of: ${LOG_LEVELS.join(', ')}`);
  }
  const logging: LoggingConfig = {
    level,
    pretty: reader.getEnvBoolean('LOG_PRETTY', env.NODE_ENV !== 'production'),
  };

  return {
    s3,
    hub,
    upload,
    localWorkDir: resolve(reader.getEnv('DOWNLOAD_DIR', DEFAULT_WORK_DIR)),
    logging,
  };
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (nested !== null && typeof nested === 'object') {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

export function loadConfig(env: Env = process.env): Result<RunConfig, ConfigError> {
  try {
    return ok(deepFreeze(readConfig(new EnvReader(env), env)));
  } catch (error) {
    if (error instanceof ConfigError) {
      return err(error);
    }
    throw error;
  }
}

/**
 * Loggable view of the configuration with credentials masked.
 */
export function describeConfig(config: RunConfig): Record<string, string | number | boolean> {
  return {
    MODEL_NAME: config.hub.modelId,
    S3_BUCKET: config.s3.bucket,
    S3_ENDPOINT_URL: config.s3.endpoint,
    S3_REGION: config.s3.region,
    S3_PREFIX: config.upload.objectPrefix,
    AWS_ACCESS_KEY_ID: maskCredential(config.s3.accessKeyId),
    AWS_SECRET_ACCESS_KEY: maskCredential(config.s3.secretAccessKey),
    HF_TOKEN: config.hub.token ? '***' : 'not set',
    HF_ENDPOINT: config.hub.endpoint,
    HF_REVISION: config.hub.revision,
    DOWNLOAD_DIR: config.localWorkDir,
    UPLOAD_CONCURRENCY: config.upload.concurrency,
    DOWNLOAD_CONCURRENCY: config.hub.downloadConcurrency,
    DOWNLOAD_TIMEOUT: config.hub.timeout,
  };
}
