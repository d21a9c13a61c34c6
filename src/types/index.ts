// ============================================================================
// Enums
// ============================================================================

export enum WorkflowState {
  INIT = 'init',
  VALIDATING = 'validating',
  CHECKING_EXISTENCE = 'checking_existence',
  SKIPPING_DOWNLOAD = 'skipping_download',
  FETCHING = 'fetching',
  UPLOADING = 'uploading',
  CLEANING_UP = 'cleaning_up',
  SUCCEEDED = 'succeeded',
  FAILED = 'failed'
}

export enum ErrorKind {
  CONFIG = 'config',
  VALIDATION = 'validation',
  STORE = 'store',
  FETCH = 'fetch',
  FILESYSTEM = 'filesystem',
  UNEXPECTED = 'unexpected'
}

export enum FetchFailureReason {
  AUTH = 'auth',
  NOT_FOUND = 'not_found',
  NETWORK = 'network',
  HTTP = 'http',
  INTEGRITY = 'integrity'
}

export enum ExitCode {
  SUCCESS = 0,
  FAILURE = 1
}

// ============================================================================
// Configuration Types
// ============================================================================

export interface S3Config {
  readonly endpoint: string;
  readonly region: string;
  readonly bucket: string;
  readonly accessKeyId: string;
  readonly secretAccessKey: string;
  readonly forcePathStyle: boolean;
}

export interface HubConfig {
  /** Hub repository id, `name` or `owner/name` */
  readonly modelId: string;
  readonly token: string | null;
  readonly endpoint: string;
  readonly revision: string;
  readonly downloadConcurrency: number;
  readonly maxRetries: number;
  /** Base backoff in milliseconds, doubled on each retry */
  readonly retryDelay: number;
  /** Idle timeout in milliseconds for hub connections and response bodies */
  readonly timeout: number;
}

export interface UploadConfig {
  readonly objectPrefix: string;
  readonly concurrency: number;
  readonly showProgress: boolean;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggingConfig {
  readonly level: LogLevel;
  readonly pretty: boolean;
}

export interface RunConfig {
  readonly s3: S3Config;
  readonly hub: HubConfig;
  readonly upload: UploadConfig;
  readonly localWorkDir: string;
  readonly logging: LoggingConfig;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_OBJECT_PREFIX = 'models/';
export const DEFAULT_WORK_DIR = '/tmp';
export const DEFAULT_UPLOAD_CONCURRENCY = 10;
export const DEFAULT_HUB_ENDPOINT = 'https://huggingface.co';
export const DEFAULT_HUB_TIMEOUT = 10000;
export const SCRATCH_DIR_PREFIX = 'hf_model_';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

// ============================================================================
// Key helpers
// ============================================================================

export function ensureTrailingSlash(prefix: string): string {
  return prefix.endsWith('/') ? prefix : `${prefix}/`;
}

/**
 * Destination root for a model: `<prefix><modelId>/`.
 * An empty prefix stays empty so the model lands at the bucket root.
 */
export function modelKeyPrefix(objectPrefix: string, modelId: string): string {
  const prefix = objectPrefix === '' ? '' : ensureTrailingSlash(objectPrefix);
  return `${prefix}${modelId}/`;
}
