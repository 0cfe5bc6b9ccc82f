/**
 * AWS integration module
 *
 * Credentials, clients and the managers of each deployment stage
 */

// Credentials
export {
  getCredentials,
  createCredentialProvider,
  selectCredentialProvider,
} from './credentials.js';

// Verification
export {
  verifyCredentials,
  formatAccountInfo,
} from './verify.js';

// Client creation
export {
  createS3Client,
  createCloudFrontClient,
  createACMClient,
  createRoute53Client,
  createCloudFormationClient,
  createKMSClient,
  createSTSClient,
  GLOBAL_REGION,
} from './client.js';

// Domain resolver
export { Route53Manager } from './route53-manager.js';

// Certificate provisioner
export {
  ACMManager,
  extractValidationRecords,
  idempotencyToken,
  type ACMManagerOptions,
  type ExistingCertificate,
} from './acm-manager.js';

// Stack convergence
export {
  CloudFormationManager,
  extractOutputs,
  isInProgress,
  type CloudFormationManagerOptions,
} from './cloudformation-manager.js';

// Contact form key
export { findKeyIdByAlias, contactFormKeyAlias } from './kms-manager.js';

// CloudFront Invalidation
export {
  createInvalidation,
  invalidationPaths,
  MAX_INVALIDATION_PATHS,
  ROOT_OBJECT_KEY,
  type InvalidationOptions,
} from './cloudfront-invalidation.js';

// Re-export types
export type {
  AWSCredentials,
  AWSAccountInfo,
  CredentialSource,
  CredentialResolution,
} from '../../types/aws.js';
