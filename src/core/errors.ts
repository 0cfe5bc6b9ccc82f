/**
 * Deployment error taxonomy
 *
 * Every fatal failure of a run is a DeployError naming the stage it came from,
 * so the CLI can print "[stage] message" and exit non-zero.
 */

import type { FailedAsset, StackEventSummary } from '../types/deployment.js';

export type DeployStage = 'config' | 'domain' | 'certificate' | 'stack' | 'publish';

export type DeployErrorCode =
  | 'CONFIG_INVALID'
  | 'ZONE_NOT_FOUND'
  | 'VALIDATION_RECORDS_UNAVAILABLE'
  | 'CERTIFICATE_ISSUANCE_FAILED'
  | 'CERTIFICATE_TIMEOUT'
  | 'STACK_CREATE_FAILED'
  | 'STACK_UPDATE_FAILED'
  | 'STACK_TIMEOUT'
  | 'STACK_OUTPUT_MISSING'
  | 'PUBLISH_PARTIAL_FAILURE'
  | 'PROVIDER_ERROR'
  | 'USER_ABORTED';

export class DeployError extends Error {
  readonly code: DeployErrorCode;
  readonly stage: DeployStage;

  constructor(code: DeployErrorCode, stage: DeployStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DeployError';
    this.code = code;
    this.stage = stage;
  }

  /**
   * Extra lines printed under the message (provider events, failed files)
   */
  details(): string[] {
    return [];
  }
}

export class ConfigError extends DeployError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('CONFIG_INVALID', 'config', message);
    this.name = 'ConfigError';
    this.issues = issues;
  }

  override details(): string[] {
    return this.issues;
  }
}

export class ZoneNotFoundError extends DeployError {
  readonly domainName: string;

  constructor(domainName: string) {
    super(
      'ZONE_NOT_FOUND',
      'domain',
      `No Route53 hosted zone found for ${domainName}. ` +
        `Create a public hosted zone for ${domainName} or one of its parent domains first.`
    );
    this.name = 'ZoneNotFoundError';
    this.domainName = domainName;
  }
}

export class ValidationRecordsUnavailableError extends DeployError {
  readonly certificateArn: string;

  constructor(certificateArn: string, attempts: number) {
    super(
      'VALIDATION_RECORDS_UNAVAILABLE',
      'certificate',
      `ACM did not publish DNS validation records for ${certificateArn} after ${attempts} attempts`
    );
    this.name = 'ValidationRecordsUnavailableError';
    this.certificateArn = certificateArn;
  }
}

export class CertificateIssuanceError extends DeployError {
  readonly certificateArn: string;
  readonly status: string;
  readonly reason?: string;

  constructor(certificateArn: string, status: string, reason?: string) {
    super(
      'CERTIFICATE_ISSUANCE_FAILED',
      'certificate',
      `Certificate ${certificateArn} was not issued (status: ${status}, reason: ${reason ?? 'unknown'})`
    );
    this.name = 'CertificateIssuanceError';
    this.certificateArn = certificateArn;
    this.status = status;
    this.reason = reason;
  }
}

export class CertificateTimeoutError extends DeployError {
  readonly certificateArn: string;

  constructor(certificateArn: string, elapsedMs: number) {
    super(
      'CERTIFICATE_TIMEOUT',
      'certificate',
      `Certificate ${certificateArn} was still pending after ${formatDuration(elapsedMs)}. ` +
        'It may still be issued once DNS propagates; re-run the deployment to continue.'
    );
    this.name = 'CertificateTimeoutError';
    this.certificateArn = certificateArn;
  }
}

abstract class StackOperationError extends DeployError {
  readonly stackName: string;
  readonly status: string;
  readonly events: StackEventSummary[];

  constructor(
    code: DeployErrorCode,
    operation: 'creation' | 'update',
    stackName: string,
    status: string,
    events: StackEventSummary[],
    reason?: string
  ) {
    const firstFailure = events[0];
    const cause =
      reason ??
      (firstFailure
        ? `${firstFailure.logicalResourceId}: ${firstFailure.reason ?? firstFailure.status}`
        : 'no failure events reported');
    super(code, 'stack', `Stack ${stackName} ${operation} failed (${status}): ${cause}`);
    this.stackName = stackName;
    this.status = status;
    this.events = events;
  }

  override details(): string[] {
    return this.events.map(
      (event) =>
        `${event.logicalResourceId} (${event.resourceType}) ${event.status}: ${event.reason ?? 'no reason given'}`
    );
  }
}

export class StackCreateError extends StackOperationError {
  constructor(stackName: string, status: string, events: StackEventSummary[], reason?: string) {
    super('STACK_CREATE_FAILED', 'creation', stackName, status, events, reason);
    this.name = 'StackCreateError';
  }
}

export class StackUpdateError extends StackOperationError {
  constructor(stackName: string, status: string, events: StackEventSummary[], reason?: string) {
    super('STACK_UPDATE_FAILED', 'update', stackName, status, events, reason);
    this.name = 'StackUpdateError';
  }
}

export class StackTimeoutError extends DeployError {
  readonly stackName: string;
  readonly lastStatus?: string;

  constructor(stackName: string, elapsedMs: number, lastStatus?: string) {
    super(
      'STACK_TIMEOUT',
      'stack',
      `Stack ${stackName} did not settle within ${formatDuration(elapsedMs)} ` +
        `(last status: ${lastStatus ?? 'unknown'}). It may still be converging; check the CloudFormation console.`
    );
    this.name = 'StackTimeoutError';
    this.stackName = stackName;
    this.lastStatus = lastStatus;
  }
}

export class MissingStackOutputError extends DeployError {
  constructor(stackName: string, outputKey: string) {
    super('STACK_OUTPUT_MISSING', 'stack', `Stack ${stackName} has no "${outputKey}" output`);
    this.name = 'MissingStackOutputError';
  }
}

export class PublishPartialFailure extends DeployError {
  readonly failed: FailedAsset[];

  constructor(failed: FailedAsset[], total: number) {
    super('PUBLISH_PARTIAL_FAILURE', 'publish', `${failed.length} of ${total} files failed to upload`);
    this.name = 'PublishPartialFailure';
    this.failed = failed;
  }

  override details(): string[] {
    return this.failed.map(({ asset, error }) => `${asset.remoteKey}: ${error}`);
  }
}

export class ProviderError extends DeployError {
  constructor(stage: DeployStage, cause: unknown) {
    super('PROVIDER_ERROR', stage, cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = 'ProviderError';
  }
}

export class UserAbortedError extends DeployError {
  constructor(stage: DeployStage = 'config') {
    super('USER_ABORTED', stage, 'Deployment interrupted by user');
    this.name = 'UserAbortedError';
  }
}

function formatDuration(ms: number): string {
  const seconds = Math.round(ms / 1000);
  if (seconds < 120) {
    return `${seconds}s`;
  }
  return `${Math.round(seconds / 60)}m`;
}
