/**
 * Content publisher type definitions
 */

import type { PublishableAsset } from './deployment.js';

/**
 * Upload result for a single asset
 */
export interface UploadResult {
  /** Asset info */
  asset: PublishableAsset;

  /** Upload status */
  status: 'uploaded' | 'skipped' | 'failed';

  /** Error message if failed */
  error?: string;
}

/**
 * Publish options
 */
export interface PublishOptions {
  /** Compare with remote ETags and skip identical objects */
  skipUnchanged?: boolean;

  /** Create a CloudFront invalidation when a distribution is present */
  invalidate?: boolean;

  /** Retries per asset for transient S3 errors */
  maxRetries?: number;

  /** CloudFront caller reference (defaults to a timestamped one) */
  callerReference?: string;

  /** Called after each asset */
  onProgress?: (completed: number, total: number, result: UploadResult) => void;
}

/**
 * File scan options
 */
export interface ScanOptions {
  /** Generated site directory to scan */
  outputDir: string;

  /** File patterns to exclude */
  exclude?: string[];
}
