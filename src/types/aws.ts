/**
 * AWS-related type definitions
 */

import type { AwsCredentialIdentity } from "@aws-sdk/types";

/**
 * AWS credentials (from AWS SDK)
 */
export type AWSCredentials = AwsCredentialIdentity;

/**
 * What the AWS clients of a run are built from
 */
export interface ClientSettings {
  /** Region of the stack, bucket and STS calls */
  region: string;

  /** Named profile; ambient credentials when omitted */
  profile?: string;
}

/**
 * AWS account information from STS
 */
export interface AWSAccountInfo {
  /** AWS Account ID */
  accountId: string;

  /** User ARN */
  arn: string;

  /** User ID */
  userId: string;
}

/**
 * Credential source type
 */
export type CredentialSource = "profile" | "environment" | "default-chain";

/**
 * Credential resolution result
 */
export interface CredentialResolution {
  /** Resolved credentials */
  credentials: AWSCredentials;

  /** Source of credentials */
  source: CredentialSource;

  /** Profile name (if using profile) */
  profile?: string;
}
