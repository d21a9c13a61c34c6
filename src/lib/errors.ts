import { types } from 'util';
import { ErrorKind, FetchFailureReason } from '../types/index.js';

export abstract class ModelCacheError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends ModelCacheError {
  readonly kind = ErrorKind.CONFIG;
}

export class ValidationError extends ModelCacheError {
  readonly kind = ErrorKind.VALIDATION;

  constructor(readonly field: string, message: string) {
    super(message);
  }
}

export interface StoreErrorDetails {
  /** S3 error code or name, e.g. NoSuchBucket */
  code: string;
  bucket: string;
  key?: string;
  /** Path relative to the uploaded directory, set by the orchestrator */
  relativePath?: string;
  cause?: unknown;
}

export class StoreError extends ModelCacheError {
  readonly kind = ErrorKind.STORE;
  readonly code: string;
  readonly bucket: string;
  readonly key: string | null;
  readonly relativePath: string | null;

  constructor(message: string, details: StoreErrorDetails) {
    super(message, { cause: details.cause });
    this.code = details.code;
    this.bucket = details.bucket;
    this.key = details.key ?? null;
    this.relativePath = details.relativePath ?? null;
  }
}

export class FetchError extends ModelCacheError {
  readonly kind = ErrorKind.FETCH;

  constructor(
    readonly reason: FetchFailureReason,
    message: string,
    readonly status: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }

  get retryable(): boolean {
    if (this.reason === FetchFailureReason.NETWORK) {
      return true;
    }
    return this.reason === FetchFailureReason.HTTP && this.status !== null && this.status >= 500;
  }
}

export class FilesystemError extends ModelCacheError {
  readonly kind = ErrorKind.FILESYSTEM;

  constructor(
    message: string,
    readonly code: string | null,
    readonly path: string | null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class UnexpectedError extends ModelCacheError {
  readonly kind = ErrorKind.UNEXPECTED;

  constructor(readonly typeName: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export type RunError =
  | ConfigError
  | ValidationError
  | StoreError
  | FetchError
  | FilesystemError
  | UnexpectedError;

/**
 * Errors raised by Node's own modules can come from another realm (a Jest
 * sandbox, a worker), where `instanceof Error` is false.
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error || types.isNativeError(error);
}

export function errnoCode(error: unknown): string | null {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}

export function errorMessage(error: unknown): string {
  return isError(error) ? error.message : String(error);
}

export function toFilesystemError(error: unknown, path: string, action: string): FilesystemError {
  return new FilesystemError(`Failed to ${action} ${path}: ${errorMessage(error)}`, errnoCode(error), path, {
    cause: error,
  });
}

export function toUnexpectedError(error: unknown): UnexpectedError {
  if (error instanceof UnexpectedError) {
    return error;
  }
  const typeName = isError(error) ? error.constructor.name : typeof error;
  return new UnexpectedError(typeName, errorMessage(error), { cause: error });
}
