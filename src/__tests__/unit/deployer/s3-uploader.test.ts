import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { mockClient } from 'aws-sdk-client-mock';
import { ListObjectsV2Command, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { CloudFrontClient, CreateInvalidationCommand } from '@aws-sdk/client-cloudfront';
import {
  listRemoteETags,
  publish,
  uploadAsset,
} from '../../../core/deployer/s3-uploader.js';
import { scanFiles } from '../../../core/deployer/file-scanner.js';
import { ProviderError, UserAbortedError } from '../../../core/errors.js';
import { inStage } from '../../../core/pipeline/run-deployment.js';
import type { DeployContext } from '../../../core/context.js';
import type { PublishableAsset } from '../../../types/deployment.js';
import { createTempSite, createTestContext } from '../../helpers/test-context.js';

const s3Mock = mockClient(S3Client);
const cfMock = mockClient(CloudFrontClient);

const HELLO_MD5 = '5d41402abc4b2a76b9719d911017c592';
const DESTINATION = { bucketName: 'example-org-site', distributionId: 'E456' };

describe('S3 Uploader', () => {
  let site: ReturnType<typeof createTempSite>;
  let assets: PublishableAsset[];
  let context: DeployContext;

  beforeEach(async () => {
    s3Mock.reset();
    cfMock.reset();
    s3Mock.on(PutObjectCommand).resolves({ ETag: '"etag"' });
    cfMock.on(CreateInvalidationCommand).resolves({
      Invalidation: {
        Id: 'I1',
        Status: 'InProgress',
        CreateTime: new Date('2025-01-01T00:00:00Z'),
        InvalidationBatch: { Paths: { Quantity: 0 }, CallerReference: 'ref' },
      },
    });

    site = createTempSite({
      'index.html': 'hello',
      'css/styles.css': 'body { margin: 0; }',
      'about us.html': '<h1>About</h1>',
    });
    assets = await scanFiles({ outputDir: site.dir });
    context = createTestContext();
  });

  afterEach(() => {
    site.cleanup();
  });

  describe('uploadAsset', () => {
    it('should put the object with its content type', async () => {
      const index = assets[2];
      const result = await uploadAsset(context, 'example-org-site', index);

      expect(result.status).toBe('uploaded');
      const input = s3Mock.commandCalls(PutObjectCommand)[0].args[0].input;
      expect(input).toMatchObject({ Bucket: 'example-org-site', Key: 'index.html', ContentType: 'text/html' });
      expect(input.Body).toEqual(Buffer.from('hello'));
    });

    it('should report a failed upload instead of throwing', async () => {
      s3Mock.on(PutObjectCommand).rejects(new Error('AccessDenied'));

      const result = await uploadAsset(context, 'example-org-site', assets[0]);

      expect(result).toMatchObject({ status: 'failed', error: 'AccessDenied' });
      expect(s3Mock.commandCalls(PutObjectCommand)).toHaveLength(1);
    });

    it('should retry transient S3 errors', async () => {
      s3Mock.on(PutObjectCommand).rejectsOnce(new Error('SlowDown')).resolves({});

      const result = await uploadAsset(context, 'example-org-site', assets[0]);

      expect(result.status).toBe('uploaded');
      expect(s3Mock.commandCalls(PutObjectCommand)).toHaveLength(2);
    });
  });

  describe('listRemoteETags', () => {
    it('should strip quotes and follow continuation tokens', async () => {
      s3Mock
        .on(ListObjectsV2Command)
        .resolvesOnce({
          Contents: [{ Key: 'index.html', ETag: `"${HELLO_MD5}"` }],
          IsTruncated: true,
          NextContinuationToken: 'token-2',
        })
        .resolvesOnce({
          Contents: [{ Key: 'css/styles.css', ETag: '"abc"' }],
          IsTruncated: false,
        });

      const etags = await listRemoteETags(context, 'example-org-site');

      expect([...etags.entries()]).toEqual([
        ['index.html', HELLO_MD5],
        ['css/styles.css', 'abc'],
      ]);
      expect(s3Mock.commandCalls(ListObjectsV2Command)[1].args[0].input.ContinuationToken).toBe('token-2');
    });
  });

  describe('publish', () => {
    it('should upload every asset and invalidate the uploaded paths', async () => {
      const report = await publish(context, assets, DESTINATION, { callerReference: 'deploy-1' });

      expect(report).toEqual({
        uploaded: 3,
        skipped: 0,
        failed: [],
        invalidatedPaths: ['/about%20us.html', '/css/styles.css', '/index.html', '/'],
        invalidationId: 'I1',
      });
      expect(s3Mock.commandCalls(ListObjectsV2Command)).toHaveLength(0);
      expect(cfMock.commandCalls(CreateInvalidationCommand)[0].args[0].input).toEqual({
        DistributionId: 'E456',
        InvalidationBatch: {
          Paths: { Quantity: 4, Items: ['/about%20us.html', '/css/styles.css', '/index.html', '/'] },
          CallerReference: 'deploy-1',
        },
      });
    });

    it('should skip objects whose ETag matches', async () => {
      s3Mock.on(ListObjectsV2Command).resolves({
        Contents: [{ Key: 'index.html', ETag: `"${HELLO_MD5}"` }, { Key: 'css/styles.css', ETag: '"stale"' }],
      });

      const report = await publish(context, assets, DESTINATION, { skipUnchanged: true });

      expect(report.uploaded).toBe(2);
      expect(report.skipped).toBe(1);
      expect(report.invalidatedPaths).toEqual(['/about%20us.html', '/css/styles.css']);
      expect(s3Mock.commandCalls(PutObjectCommand).map((call) => call.args[0].input.Key)).toEqual([
        'about us.html',
        'css/styles.css',
      ]);
    });

    it('should not invalidate when nothing was uploaded', async () => {
      s3Mock.on(ListObjectsV2Command).resolves({
        Contents: [{ Key: 'index.html', ETag: `"${HELLO_MD5}"` }],
      });

      const report = await publish(context, [assets[2]], DESTINATION, { skipUnchanged: true });

      expect(report).toEqual({ uploaded: 0, skipped: 1, failed: [], invalidatedPaths: [] });
      expect(cfMock.calls()).toHaveLength(0);
    });

    it('should not invalidate without a distribution or when disabled', async () => {
      await publish(context, assets, { bucketName: 'example-org-site' });
      await publish(context, assets, DESTINATION, { invalidate: false });

      expect(cfMock.calls()).toHaveLength(0);
      expect(s3Mock.commandCalls(PutObjectCommand)).toHaveLength(6);
    });

    it('should keep going after a failed asset', async () => {
      s3Mock.on(PutObjectCommand, { Key: 'css/styles.css' }).rejects(new Error('AccessDenied'));

      const report = await publish(context, assets, DESTINATION);

      expect(report.uploaded).toBe(2);
      expect(report.failed).toEqual([{ asset: assets[1], error: 'AccessDenied' }]);
      expect(report.invalidatedPaths).toEqual(['/about%20us.html', '/index.html', '/']);
    });

    it('should fail the publish stage when the invalidation is rejected', async () => {
      cfMock.on(CreateInvalidationCommand).rejects(new Error('AccessDenied: not authorized'));

      const error = await inStage('publish', () => publish(context, [assets[2]], DESTINATION)).catch(
        (e: unknown) => e
      );

      expect(error).toBeInstanceOf(ProviderError);
      expect(error).toMatchObject({ stage: 'publish', message: 'AccessDenied: not authorized' });
      expect(s3Mock.commandCalls(PutObjectCommand)).toHaveLength(1);
    });

    it('should invalidate the root path when publishing a single index file', async () => {
      const report = await publish(context, [assets[2]], DESTINATION);

      expect(report.invalidatedPaths).toEqual(['/index.html', '/']);
      expect(cfMock.commandCalls(CreateInvalidationCommand)[0].args[0].input.InvalidationBatch?.Paths).toEqual({
        Quantity: 2,
        Items: ['/index.html', '/'],
      });
    });

    it('should report progress after each asset', async () => {
      const onProgress = jest.fn();

      await publish(context, assets, DESTINATION, { onProgress });

      expect(onProgress.mock.calls.map(([completed, total]) => [completed, total])).toEqual([
        [1, 3],
        [2, 3],
        [3, 3],
      ]);
    });

    it('should stop when the run is interrupted', async () => {
      const controller = new AbortController();
      const interrupted = createTestContext({ signal: controller.signal });
      const onProgress = jest.fn(() => controller.abort());

      await expect(publish(interrupted, assets, DESTINATION, { onProgress })).rejects.toBeInstanceOf(
        UserAbortedError
      );
      expect(s3Mock.commandCalls(PutObjectCommand)).toHaveLength(1);
      expect(cfMock.calls()).toHaveLength(0);
    });

    it('should treat a request cancelled by the interrupt as an abort, not a failed asset', async () => {
      const controller = new AbortController();
      const interrupted = createTestContext({ signal: controller.signal });
      s3Mock.on(PutObjectCommand).callsFake(() => {
        controller.abort();
        const cancelled = new Error('Request aborted');
        cancelled.name = 'AbortError';
        throw cancelled;
      });

      await expect(publish(interrupted, assets, DESTINATION)).rejects.toBeInstanceOf(UserAbortedError);
      expect(s3Mock.commandCalls(PutObjectCommand)).toHaveLength(1);
    });
  });
});
