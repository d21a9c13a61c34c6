import { ValidationError } from '../lib/errors.js';
import { err, ok, type Result } from '../lib/result.js';

// `name` or `owner/name`; each segment starts alphanumeric
const MODEL_ID_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9._-]*(\/[a-zA-Z0-9][a-zA-Z0-9._-]*)?$/;

// S3 naming rules: 3-63 chars, lowercase letters, digits, dots, hyphens
const BUCKET_PATTERN = /^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$/;

const PATH_TRAVERSAL = '..';

export function validateModelId(modelId: string): Result<void, ValidationError> {
  if (!MODEL_ID_PATTERN.test(modelId) || modelId.includes(PATH_TRAVERSAL)) {
    return err(
      new ValidationError(
        'MODEL_NAME',
        `Invalid MODEL_NAME '${modelId}'. Must match pattern: alphanumeric start, followed by ` +
          "alphanumeric/dots/hyphens/underscores, optionally with a single '/' separator " +
          "for owner/repo format, and no '..'."
      )
    );
  }
  return ok(undefined);
}

export function validateBucket(bucket: string): Result<void, ValidationError> {
  if (!BUCKET_PATTERN.test(bucket)) {
    return err(
      new ValidationError(
        'S3_BUCKET',
        `Invalid S3_BUCKET '${bucket}'. Must be 3-63 characters, ` +
          'lowercase letters, numbers, dots, and hyphens only, starting and ending alphanumeric.'
      )
    );
  }
  return ok(undefined);
}

export function validatePrefix(prefix: string): Result<void, ValidationError> {
  if (prefix.includes(PATH_TRAVERSAL)) {
    return err(
      new ValidationError('S3_PREFIX', `Invalid S3_PREFIX '${prefix}'. Cannot contain '..' (path traversal).`)
    );
  }
  if (prefix.startsWith('/')) {
    return err(
      new ValidationError('S3_PREFIX', `Invalid S3_PREFIX '${prefix}'. Cannot start with '/' (absolute path).`)
    );
  }
  return ok(undefined);
}

/**
 * Reject identifiers that could escape the intended key space or local
 * directory before any I/O happens.
 */
export function validateInputs(modelId: string, bucket: string, prefix: string): Result<void, ValidationError> {
  for (const result of [validateModelId(modelId), validateBucket(bucket), validatePrefix(prefix)]) {
    if (!result.ok) {
      return result;
    }
  }
  return ok(undefined);
}
