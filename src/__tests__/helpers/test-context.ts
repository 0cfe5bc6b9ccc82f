/**
 * Shared test helpers: a clock that never waits, a deploy context with plain
 * clients (stub them with aws-sdk-client-mock) and throwaway site directories
 */

import { ACMClient } from '@aws-sdk/client-acm';
import { CloudFormationClient } from '@aws-sdk/client-cloudformation';
import { CloudFrontClient } from '@aws-sdk/client-cloudfront';
import { KMSClient } from '@aws-sdk/client-kms';
import { Route53Client } from '@aws-sdk/client-route-53';
import { S3Client } from '@aws-sdk/client-s3';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { DeployContext } from '../../core/context.js';
import { validateConfig } from '../../core/config/schema.js';
import { throwIfAborted, type Clock } from '../../core/utils/clock.js';
import type { EnvironmentConfig } from '../../types/config.js';
import type { DeploymentRequest } from '../../types/deployment.js';

export const TEST_START_TIME = Date.parse('2025-01-01T00:00:00Z');

/**
 * Clock whose sleeps return at once and move time forward
 */
export class ManualClock implements Clock {
  readonly sleeps: number[] = [];
  private current: number;

  constructor(start: number = TEST_START_TIME) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    this.sleeps.push(ms);
    this.current += ms;
  }
}

const credentials = { accessKeyId: 'test', secretAccessKey: 'test-secret' };

export function createTestContext(
  options: { clock?: Clock; signal?: AbortSignal } = {}
): DeployContext {
  const settings = { region: 'us-east-1', credentials };

  return {
    clients: {
      route53: new Route53Client(settings),
      acm: new ACMClient(settings),
      cloudFormation: new CloudFormationClient(settings),
      s3: new S3Client(settings),
      cloudFront: new CloudFrontClient(settings),
      kms: new KMSClient(settings),
    },
    clock: options.clock ?? new ManualClock(),
    signal: options.signal ?? new AbortController().signal,
    showProgress: false,
  };
}

/**
 * Validated request for example.org with the given settings on top
 */
export function createTestRequest(overrides: EnvironmentConfig = {}): DeploymentRequest {
  return validateConfig({ domain: 'example.org', prefix: 'example-org', ...overrides });
}

/**
 * Temporary directory holding the given files (relative path → content)
 */
export function createTempSite(files: Record<string, string>): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), 'site-deploy-test-'));

  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = join(dir, relativePath);
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, content);
  }

  return {
    dir,
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}
