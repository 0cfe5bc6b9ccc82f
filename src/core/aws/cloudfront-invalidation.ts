/**
 * CloudFront cache invalidation
 */

import {
  CreateInvalidationCommand,
  type Invalidation,
  type InvalidationBatch,
} from '@aws-sdk/client-cloudfront';
import type { DeployContext } from '../context.js';
import { AWS_RETRYABLE_ERRORS, withRetry } from '../utils/retry.js';

/**
 * Paths a single invalidation may list before it is cheaper to flush everything
 */
export const MAX_INVALIDATION_PATHS = 1000;

/**
 * Invalidation options
 */
export interface InvalidationOptions {
  paths: string[];
  callerReference?: string;
}

/**
 * Object served for "/" (the distribution's DefaultRootObject)
 */
export const ROOT_OBJECT_KEY = 'index.html';

/**
 * Invalidation paths for object keys: "/" + key, each segment URL-encoded.
 * The root object is also invalidated as "/", which CloudFront caches separately.
 * More than MAX_INVALIDATION_PATHS paths collapse to "/*".
 */
export function invalidationPaths(keys: string[]): string[] {
  const unique = [...new Set(keys)];
  const paths = unique.map((key) => '/' + key.split('/').map(encodeURIComponent).join('/'));

  if (unique.includes(ROOT_OBJECT_KEY)) {
    paths.push('/');
  }

  if (paths.length > MAX_INVALIDATION_PATHS) {
    return ['/*'];
  }

  return paths;
}

/**
 * Create cache invalidation
 */
export async function createInvalidation(
  context: DeployContext,
  distributionId: string,
  options: InvalidationOptions
): Promise<Invalidation> {
  const { paths, callerReference = `site-deploy-${context.clock.now()}` } = options;

  const invalidationBatch: InvalidationBatch = {
    Paths: {
      Quantity: paths.length,
      Items: paths,
    },
    CallerReference: callerReference,
  };

  const response = await withRetry(
    () =>
      context.clients.cloudFront.send(
        new CreateInvalidationCommand({
          DistributionId: distributionId,
          InvalidationBatch: invalidationBatch,
        }),
        { abortSignal: context.signal }
      ),
    {
      retryableErrors: [...AWS_RETRYABLE_ERRORS.CloudFront, ...AWS_RETRYABLE_ERRORS.General],
      clock: context.clock,
      signal: context.signal,
    }
  );

  if (!response.Invalidation) {
    throw new Error('Failed to create invalidation: No invalidation returned');
  }

  return response.Invalidation;
}
