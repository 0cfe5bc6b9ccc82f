/**
 * AWS Client creation helpers
 */

import { ACMClient } from '@aws-sdk/client-acm';
import { CloudFormationClient } from '@aws-sdk/client-cloudformation';
import { CloudFrontClient } from '@aws-sdk/client-cloudfront';
import { KMSClient } from '@aws-sdk/client-kms';
import { Route53Client } from '@aws-sdk/client-route-53';
import { S3Client } from '@aws-sdk/client-s3';
import { STSClient } from '@aws-sdk/client-sts';
import type { ClientSettings } from '../../types/aws.js';
import { createCredentialProvider } from './credentials.js';

/**
 * Region of the global services' APIs (CloudFront, Route53) and of the
 * certificates CloudFront accepts
 */
export const GLOBAL_REGION = 'us-east-1';

/**
 * Create S3 client in the stack region
 */
export function createS3Client(settings: ClientSettings): S3Client {
  return new S3Client({
    region: settings.region,
    credentials: createCredentialProvider(settings),
  });
}

/**
 * Create CloudFront client
 * Note: CloudFront is always in us-east-1 for API calls
 */
export function createCloudFrontClient(settings: ClientSettings): CloudFrontClient {
  return new CloudFrontClient({
    region: GLOBAL_REGION,
    credentials: createCredentialProvider(settings),
  });
}

/**
 * Create ACM client
 * Note: CloudFront only accepts certificates from us-east-1
 */
export function createACMClient(settings: ClientSettings): ACMClient {
  return new ACMClient({
    region: GLOBAL_REGION,
    credentials: createCredentialProvider(settings),
  });
}

/**
 * Create Route53 client
 */
export function createRoute53Client(settings: ClientSettings): Route53Client {
  return new Route53Client({
    region: GLOBAL_REGION,
    credentials: createCredentialProvider(settings),
  });
}

/**
 * Create CloudFormation client in the stack region
 */
export function createCloudFormationClient(settings: ClientSettings): CloudFormationClient {
  return new CloudFormationClient({
    region: settings.region,
    credentials: createCredentialProvider(settings),
  });
}

/**
 * Create KMS client in the stack region
 */
export function createKMSClient(settings: ClientSettings): KMSClient {
  return new KMSClient({
    region: settings.region,
    credentials: createCredentialProvider(settings),
  });
}

/**
 * Create STS client with credentials from settings
 */
export function createSTSClient(settings: ClientSettings): STSClient {
  return new STSClient({
    region: settings.region,
    credentials: createCredentialProvider(settings),
  });
}
