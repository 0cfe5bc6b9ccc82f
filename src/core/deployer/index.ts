/**
 * Deployer module
 *
 * File scanning, hashing, and upload utilities
 */

// File scanner
export {
  scanFiles,
  collectIndexAsset,
  calculateFileHash,
  getContentType,
  pathToS3Key,
  INDEX_KEY,
} from './file-scanner.js';

// S3 Uploader
export {
  publish,
  uploadAsset,
  listRemoteETags,
  MULTIPART_THRESHOLD,
} from './s3-uploader.js';

// Re-export types
export type {
  UploadResult,
  PublishOptions,
  ScanOptions,
} from '../../types/deployer.js';
