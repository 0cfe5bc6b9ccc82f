/**
 * S3 content publisher
 * Uploads the site assets one by one and invalidates the uploaded paths
 */

import {
  ListObjectsV2Command,
  PutObjectCommand,
  type PutObjectCommandInput,
} from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { createReadStream } from 'node:fs';
import { readFile } from 'node:fs/promises';
import type { DeployContext } from '../context.js';
import { UserAbortedError } from '../errors.js';
import { throwIfAborted } from '../utils/clock.js';
import { AWS_RETRYABLE_ERRORS, withRetry } from '../utils/retry.js';
import { createInvalidation, invalidationPaths } from '../aws/cloudfront-invalidation.js';
import type {
  FailedAsset,
  PublishableAsset,
  PublishDestination,
  PublishReport,
} from '../../types/deployment.js';
import type { PublishOptions, UploadResult } from '../../types/deployer.js';

/**
 * Files above this size go through a managed multipart upload
 */
export const MULTIPART_THRESHOLD = 5 * 1024 * 1024;

/**
 * Upload a single asset to S3, overwriting the object at its key
 */
export async function uploadAsset(
  context: DeployContext,
  bucketName: string,
  asset: PublishableAsset,
  options: Pick<PublishOptions, 'maxRetries'> = {}
): Promise<UploadResult> {
  const { maxRetries = 3 } = options;

  try {
    await withRetry(
      async () => {
        const params: PutObjectCommandInput = {
          Bucket: bucketName,
          Key: asset.remoteKey,
          ContentType: asset.contentType,
        };

        // Use multipart upload for files larger than 5MB
        if (asset.size > MULTIPART_THRESHOLD) {
          const upload = new Upload({
            client: context.clients.s3,
            params: { ...params, Body: createReadStream(asset.localPath) },
          });
          const onAbort = () => void upload.abort();
          context.signal.addEventListener('abort', onAbort, { once: true });
          try {
            await upload.done();
          } finally {
            context.signal.removeEventListener('abort', onAbort);
          }
        } else {
          params.Body = await readFile(asset.localPath);
          await context.clients.s3.send(new PutObjectCommand(params), { abortSignal: context.signal });
        }
      },
      {
        maxRetries,
        retryableErrors: [...AWS_RETRYABLE_ERRORS.S3, ...AWS_RETRYABLE_ERRORS.General],
        clock: context.clock,
        signal: context.signal,
      }
    );

    return { asset, status: 'uploaded' };
  } catch (error) {
    if (error instanceof UserAbortedError) {
      throw error;
    }
    return {
      asset,
      status: 'failed',
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

/**
 * ETags of every object in the bucket (quotes stripped), keyed by object key
 */
export async function listRemoteETags(
  context: DeployContext,
  bucketName: string
): Promise<Map<string, string>> {
  const etags = new Map<string, string>();
  let continuationToken: string | undefined;

  do {
    const response = await context.clients.s3.send(
      new ListObjectsV2Command({
        Bucket: bucketName,
        ContinuationToken: continuationToken,
      }),
      { abortSignal: context.signal }
    );

    for (const object of response.Contents ?? []) {
      if (object.Key && object.ETag) {
        etags.set(object.Key, object.ETag.replace(/"/g, ''));
      }
    }

    continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
  } while (continuationToken);

  return etags;
}

/**
 * Publish assets to the destination bucket.
 *
 * Sequential; a failing asset is recorded and the batch goes on. When the
 * destination has a distribution and something was uploaded, one invalidation
 * covers the uploaded paths. Only per-asset failures are reported; a failed
 * listing or invalidation throws.
 */
export async function publish(
  context: DeployContext,
  assets: PublishableAsset[],
  destination: PublishDestination,
  options: PublishOptions = {}
): Promise<PublishReport> {
  const { skipUnchanged = false, invalidate = true, maxRetries, callerReference, onProgress } = options;

  const remote = skipUnchanged
    ? await listRemoteETags(context, destination.bucketName)
    : new Map<string, string>();

  const uploadedKeys: string[] = [];
  const failed: FailedAsset[] = [];
  let skipped = 0;
  let completed = 0;

  for (const asset of assets) {
    throwIfAborted(context.signal);

    let result: UploadResult;
    if (remote.get(asset.remoteKey) === asset.contentHash) {
      result = { asset, status: 'skipped' };
      skipped++;
    } else {
      result = await uploadAsset(context, destination.bucketName, asset, { maxRetries });
      if (result.status === 'uploaded') {
        uploadedKeys.push(asset.remoteKey);
      } else {
        failed.push({ asset, error: result.error ?? 'Unknown error' });
      }
    }

    completed++;
    onProgress?.(completed, assets.length, result);
  }

  const report: PublishReport = {
    uploaded: uploadedKeys.length,
    skipped,
    failed,
    invalidatedPaths: [],
  };

  if (!invalidate || !destination.distributionId || uploadedKeys.length === 0) {
    return report;
  }

  const paths = invalidationPaths(uploadedKeys);
  const invalidation = await createInvalidation(context, destination.distributionId, {
    paths,
    callerReference,
  });
  report.invalidatedPaths = paths;
  report.invalidationId = invalidation.Id;

  return report;
}
