import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import {
  ListObjectsV2Command,
  NoSuchBucket,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { mockClient } from 'aws-sdk-client-mock';
import { rm } from 'fs/promises';
import { join } from 'path';
import { S3ObjectStore, createS3Client, errorCode } from '../../src/services/ObjectStoreGateway.js';
import { StoreError } from '../../src/lib/errors.js';
import { makeTempDir, silentLogger, writeTree } from '../e2e/helpers.js';

const s3Mock = mockClient(S3Client);

function createStore(): S3ObjectStore {
  const client = createS3Client({
    endpoint: 'http://localhost:9000',
    region: 'us-east-1',
    bucket: 'test-bucket',
    accessKeyId: 'test-access-key',
    secretAccessKey: 'test-secret-key',
    forcePathStyle: true,
  });
  return new S3ObjectStore(client, silentLogger());
}

describe('S3ObjectStore', () => {
  beforeEach(() => {
    s3Mock.reset();
  });

  describe('exists', () => {
    it('should list at most one key under the prefix', async () => {
      s3Mock.on(ListObjectsV2Command).resolves({ Contents: [{ Key: 'models/gpt2/config.json' }], KeyCount: 1 });

      const result = await createStore().exists('test-bucket', 'models/gpt2/');

      expect(result).toEqual({ ok: true, value: true });
      const calls = s3Mock.commandCalls(ListObjectsV2Command);
      expect(calls).toHaveLength(1);
      expect(calls[0].args[0].input).toEqual({ Bucket: 'test-bucket', Prefix: 'models/gpt2/', MaxKeys: 1 });
    });

    it('should return false for an empty bucket', async () => {
      s3Mock.on(ListObjectsV2Command).resolves({ KeyCount: 0 });

      const result = await createStore().exists('test-bucket', 'models/gpt2/');

      expect(result).toEqual({ ok: true, value: false });
    });

    it('should ignore keys outside the prefix', async () => {
      s3Mock.on(ListObjectsV2Command).resolves({ Contents: [{ Key: 'models/gpt2-large/config.json' }] });

      const result = await createStore().exists('test-bucket', 'models/gpt2/');

      expect(result).toEqual({ ok: true, value: false });
    });

    it('should report a missing bucket as a store error', async () => {
      s3Mock.on(ListObjectsV2Command).rejects(
        new NoSuchBucket({ message: 'The specified bucket does not exist', $metadata: {} })
      );

      const result = await createStore().exists('missing-bucket', 'models/gpt2/');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(StoreError);
      expect(result.error.code).toBe('NoSuchBucket');
      expect(result.error.bucket).toBe('missing-bucket');
    });

    it('should report transport failures instead of returning false', async () => {
      s3Mock.on(ListObjectsV2Command).rejects(Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }));

      const result = await createStore().exists('test-bucket', 'models/gpt2/');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('ECONNREFUSED');
    });
  });

  describe('putObject', () => {
    let localDir: string;

    beforeEach(async () => {
      localDir = await makeTempDir();
      await writeTree(localDir, { 'notes.txt': 'hello world' });
    });

    afterEach(async () => {
      await rm(localDir, { recursive: true, force: true });
    });

    it('should upload one file to one key and return its size', async () => {
      s3Mock.on(PutObjectCommand).resolves({ ETag: '"etag-1"' });

      const result = await createStore().putObject('test-bucket', 'models/gpt2/notes.txt', join(localDir, 'notes.txt'));

      expect(result).toEqual({ ok: true, value: 11 });
      const calls = s3Mock.commandCalls(PutObjectCommand);
      expect(calls).toHaveLength(1);
      const input = calls[0].args[0].input;
      expect(input.Bucket).toBe('test-bucket');
      expect(input.Key).toBe('models/gpt2/notes.txt');
      expect(input.ContentType).toBe('text/plain');
    });

    it('should report a rejected upload as a store error', async () => {
      s3Mock.on(PutObjectCommand).rejects(
        new S3ServiceException({ name: 'AccessDenied', $fault: 'client', $metadata: {}, message: 'Access Denied' })
      );

      const result = await createStore().putObject('test-bucket', 'models/gpt2/notes.txt', join(localDir, 'notes.txt'));

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('AccessDenied');
      expect(result.error.key).toBe('models/gpt2/notes.txt');
    });

    it('should report a missing local file as a store error', async () => {
      const result = await createStore().putObject('test-bucket', 'models/gpt2/gone.txt', join(localDir, 'gone.txt'));

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('ENOENT');
      expect(s3Mock.commandCalls(PutObjectCommand)).toHaveLength(0);
    });
  });

  describe('errorCode', () => {
    it('should prefer the service exception name', () => {
      const error = new S3ServiceException({ name: 'SlowDown', $fault: 'server', $metadata: {} });
      expect(errorCode(error)).toBe('SlowDown');
    });

    it('should fall back to Unknown for non-errors', () => {
      expect(errorCode('boom')).toBe('Unknown');
    });
  });
});
