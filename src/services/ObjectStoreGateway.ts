import { ListObjectsV2Command, S3Client, S3ServiceException } from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { createReadStream } from 'fs';
import { stat } from 'fs/promises';
import { lookup } from 'mime-types';
import type { S3Config } from '../types/index.js';
import { StoreError, errnoCode, errorMessage, isError } from '../lib/errors.js';
import { err, ok, type Result } from '../lib/result.js';
import type { Logger } from '../lib/logger.js';

/**
 * Existence check and single-object upload against an S3-compatible store.
 * Implementations report every failure as a StoreError result and never throw.
 */
export interface ObjectStore {
  exists(bucket: string, prefix: string): Promise<Result<boolean, StoreError>>;
  putObject(bucket: string, key: string, localPath: string): Promise<Result<number, StoreError>>;
}

export function errorCode(error: unknown): string {
  if (error instanceof S3ServiceException) {
    return error.name;
  }
  return errnoCode(error) ?? (isError(error) ? error.name : 'Unknown');
}

export function createS3Client(config: S3Config): S3Client {
  return new S3Client({
    endpoint: config.endpoint,
    region: config.region,
    credentials: {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
    },
    forcePathStyle: config.forcePathStyle,
  });
}

export class S3ObjectStore implements ObjectStore {
  private readonly logger: Logger;

  constructor(
    private readonly client: S3Client,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'object-store' });
  }

  /**
   * Check whether at least one object exists under `prefix`.
   * Lists with MaxKeys=1, so cost does not grow with the model size.
   */
  async exists(bucket: string, prefix: string): Promise<Result<boolean, StoreError>> {
    this.logger.info({ bucket, prefix }, `Checking S3 for existing model: s3://${bucket}/${prefix}`);

    try {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: bucket,
          Prefix: prefix,
          MaxKeys: 1,
        })
      );

      const found = (response.Contents ?? []).some(object => object.Key?.startsWith(prefix) ?? false);
      this.logger.info(
        { bucket, prefix, found },
        found ? `Model found in S3 at s3://${bucket}/${prefix}` : `Model not found in S3 at s3://${bucket}/${prefix}`
      );
      return ok(found);

    } catch (error) {
      const code = errorCode(error);
      this.logger.error({ bucket, prefix, code, error }, 'Error checking S3');
      return err(
        new StoreError(`Existence check failed for s3://${bucket}/${prefix} (${code}): ${errorMessage(error)}`, {
          code,
          bucket,
          key: prefix,
          cause: error,
        })
      );
    }
  }

  /**
   * Upload one local file to one key. Large files go through multipart
   * upload; a failed multipart upload is aborted so no partial object remains.
   * @returns Size of the uploaded file in bytes
   */
  async putObject(bucket: string, key: string, localPath: string): Promise<Result<number, StoreError>> {
    try {
      const { size } = await stat(localPath);
      const contentType = this.detectContentType(localPath);

      const upload = new Upload({
        client: this.client,
        params: {
          Bucket: bucket,
          Key: key,
          Body: createReadStream(localPath),
          ContentType: contentType,
        },
        leavePartsOnError: false,
      });

      upload.on('httpUploadProgress', (progress) => {
        if (progress.loaded) {
          this.logger.debug({ key, uploaded: progress.loaded, total: progress.total }, 'Upload progress');
        }
      });

      await upload.done();
      this.logger.debug({ bucket, key, size, contentType }, 'Object uploaded');
      return ok(size);

    } catch (error) {
      const code = errorCode(error);
      return err(
        new StoreError(`Upload of ${localPath} to s3://${bucket}/${key} failed (${code}): ${errorMessage(error)}`, {
          code,
          bucket,
          key,
          cause: error,
        })
      );
    }
  }

  private detectContentType(filePath: string): string {
    return lookup(filePath) || 'application/octet-stream';
  }
}
