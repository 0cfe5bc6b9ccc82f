/**
 * Per-run deployment context
 *
 * Holds the AWS clients, clock and interrupt signal of one run. Built once by
 * the CLI (or by a test with stubbed clients) and destroyed when the run ends.
 */

import type { ACMClient } from '@aws-sdk/client-acm';
import type { CloudFormationClient } from '@aws-sdk/client-cloudformation';
import type { CloudFrontClient } from '@aws-sdk/client-cloudfront';
import type { KMSClient } from '@aws-sdk/client-kms';
import type { Route53Client } from '@aws-sdk/client-route-53';
import type { S3Client } from '@aws-sdk/client-s3';
import type { ClientSettings } from '../types/aws.js';
import {
  createACMClient,
  createCloudFormationClient,
  createCloudFrontClient,
  createKMSClient,
  createRoute53Client,
  createS3Client,
} from './aws/client.js';
import { systemClock, type Clock } from './utils/clock.js';

export interface DeployClients {
  route53: Route53Client;
  acm: ACMClient;
  cloudFormation: CloudFormationClient;
  s3: S3Client;
  cloudFront: CloudFrontClient;
  kms: KMSClient;
}

export interface DeployContext {
  clients: DeployClients;
  clock: Clock;
  /** Aborted on SIGINT/SIGTERM; every wait observes it */
  signal: AbortSignal;
  /** Show ora spinners */
  showProgress: boolean;
}

export interface CreateContextOptions {
  signal?: AbortSignal;
  clock?: Clock;
  showProgress?: boolean;
}

/**
 * Build the clients of a run from the region/profile of the request
 */
export function createDeployContext(
  settings: ClientSettings,
  options: CreateContextOptions = {}
): DeployContext {
  return {
    clients: {
      route53: createRoute53Client(settings),
      acm: createACMClient(settings),
      cloudFormation: createCloudFormationClient(settings),
      s3: createS3Client(settings),
      cloudFront: createCloudFrontClient(settings),
      kms: createKMSClient(settings),
    },
    clock: options.clock ?? systemClock,
    signal: options.signal ?? new AbortController().signal,
    showProgress: options.showProgress ?? true,
  };
}

/**
 * Release the sockets held by the clients
 */
export function destroyDeployContext(context: DeployContext): void {
  for (const client of Object.values(context.clients)) {
    client.destroy();
  }
}
