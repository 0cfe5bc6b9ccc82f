/**
 * ACM (AWS Certificate Manager) Manager
 * Requests the site certificate, publishes its DNS validation records and waits for issuance
 */

import {
  RequestCertificateCommand,
  DescribeCertificateCommand,
  ListCertificatesCommand,
  type CertificateDetail,
  type CertificateSummary,
  CertificateStatus,
} from '@aws-sdk/client-acm';
import type { DeployContext } from '../context.js';
import {
  CertificateIssuanceError,
  CertificateTimeoutError,
  ValidationRecordsUnavailableError,
} from '../errors.js';
import { normalizeDomain, wwwAlias } from '../utils/dns.js';
import { done, pending, pollUntil, PollTimeoutError } from '../utils/poll.js';
import { AWS_RETRYABLE_ERRORS, withRetry } from '../utils/retry.js';
import { startSpinner } from '../utils/spinner.js';
import type {
  AttemptBound,
  CertificateRequest,
  DurationBound,
  HostedZone,
  ValidationRecord,
} from '../../types/deployment.js';
import type { Route53Manager } from './route53-manager.js';

/**
 * Statuses after which ACM will never issue the certificate
 */
const FAILED_STATUSES: ReadonlySet<string> = new Set([
  CertificateStatus.FAILED,
  CertificateStatus.VALIDATION_TIMED_OUT,
  CertificateStatus.REVOKED,
  CertificateStatus.EXPIRED,
  CertificateStatus.INACTIVE,
]);

/**
 * ACM Manager options
 */
export interface ACMManagerOptions {
  /** Bound for waiting on DNS validation records */
  validationRecords: AttemptBound;

  /** Bound for waiting on issuance */
  issuance: DurationBound;

  /** Tags put on a newly requested certificate */
  tags?: Record<string, string>;
}

/**
 * Existing certificate covering the apex and www names
 */
export interface ExistingCertificate {
  certificateArn: string;
  status: string;
  detail: CertificateDetail;
}

/**
 * ACM Manager for certificate operations
 * NOTE: the ACM client of the context is pinned to us-east-1 (CloudFront requirement)
 */
export class ACMManager {
  constructor(
    private readonly context: DeployContext,
    private readonly route53: Route53Manager,
    private readonly options: ACMManagerOptions
  ) {}

  /**
   * Make sure an issued certificate covers `domainName` and `www.domainName`.
   *
   * Reuses an issued certificate, resumes a pending one left by an interrupted
   * run, or requests a new one; then publishes the validation records into the
   * zone and waits for ACM to issue it.
   */
  async ensureCertificate(domainName: string, zone: HostedZone): Promise<CertificateRequest> {
    const domain = normalizeDomain(domainName);
    const alternateNames = [wwwAlias(domain)];

    const existing = await this.findExistingCertificate(domain);

    if (existing?.status === CertificateStatus.ISSUED) {
      startSpinner('', this.context.showProgress).succeed(
        `Reusing issued certificate ${existing.certificateArn}`
      );
      return {
        certificateArn: existing.certificateArn,
        domainName: domain,
        alternateNames,
        validationRecords: extractValidationRecords(existing.detail),
        status: 'ISSUED',
        reused: true,
      };
    }

    let certificateArn: string;
    if (existing) {
      certificateArn = existing.certificateArn;
      startSpinner('', this.context.showProgress).info(
        `Resuming pending certificate ${certificateArn}`
      );
    } else {
      certificateArn = await this.requestCertificate(domain, alternateNames);
    }

    const validationRecords = await this.waitForValidationRecords(certificateArn);
    await this.route53.upsertValidationRecords(zone.zoneId, validationRecords);
    await this.waitForCertificateValidation(certificateArn);

    return {
      certificateArn,
      domainName: domain,
      alternateNames,
      validationRecords,
      status: 'ISSUED',
      reused: false,
    };
  }

  /**
   * Find an issued (preferred) or pending certificate whose names include
   * both the apex and the www alias
   */
  async findExistingCertificate(domain: string): Promise<ExistingCertificate | null> {
    const apex = normalizeDomain(domain);
    const required = [apex, wwwAlias(apex)];

    const candidates = (await this.listCertificates()).filter(
      (summary) => summary.CertificateArn && normalizeDomain(summary.DomainName ?? '') === apex
    );

    let pendingMatch: ExistingCertificate | null = null;

    for (const summary of candidates) {
      const detail = await this.getCertificateDetails(summary.CertificateArn ?? '');
      const names = new Set((detail.SubjectAlternativeNames ?? []).map(normalizeDomain));
      if (!required.every((name) => names.has(name))) {
        continue;
      }

      const match: ExistingCertificate = {
        certificateArn: detail.CertificateArn ?? summary.CertificateArn ?? '',
        status: detail.Status ?? summary.Status ?? 'UNKNOWN',
        detail,
      };

      if (match.status === CertificateStatus.ISSUED) {
        return match;
      }
      if (match.status === CertificateStatus.PENDING_VALIDATION && !pendingMatch) {
        pendingMatch = match;
      }
    }

    return pendingMatch;
  }

  /**
   * Request a new ACM certificate with DNS validation
   */
  async requestCertificate(domain: string, alternativeNames: string[]): Promise<string> {
    const spinner = startSpinner('Requesting ACM certificate...', this.context.showProgress);

    const tags = Object.entries({
      'site-deploy:managed': 'true',
      'site-deploy:domain': domain,
      ...this.options.tags,
    }).map(([Key, Value]) => ({ Key, Value }));

    try {
      const { CertificateArn } = await this.context.clients.acm.send(
        new RequestCertificateCommand({
          DomainName: domain,
          SubjectAlternativeNames: alternativeNames,
          ValidationMethod: 'DNS',
          IdempotencyToken: idempotencyToken(domain),
          Tags: tags,
        })
      );

      if (!CertificateArn) {
        throw new Error('Failed to request certificate: No ARN returned');
      }

      spinner.succeed(`ACM certificate requested: ${CertificateArn}`);
      return CertificateArn;
    } catch (error) {
      spinner.fail('Failed to request ACM certificate');
      throw error;
    }
  }

  /**
   * Wait until ACM has generated a DNS record for every name of the certificate
   *
   * @throws ValidationRecordsUnavailableError after the attempt bound
   */
  async waitForValidationRecords(certificateArn: string): Promise<ValidationRecord[]> {
    const spinner = startSpinner('Waiting for DNS validation records...', this.context.showProgress);
    const { intervalMs, maxAttempts } = this.options.validationRecords;

    try {
      const records = await pollUntil(
        async () => {
          const detail = await this.getCertificateDetails(certificateArn);
          const options = detail.DomainValidationOptions ?? [];
          const ready = options.length > 0 && options.every((option) => option.ResourceRecord);

          return ready ? done(extractValidationRecords(detail)) : pending<ValidationRecord[]>();
        },
        {
          intervalMs,
          maxAttempts,
          clock: this.context.clock,
          signal: this.context.signal,
          onPending: (_status, attempt) => {
            spinner.text = `Waiting for DNS validation records... (attempt ${attempt}/${maxAttempts})`;
          },
        }
      );

      spinner.succeed(`Received ${records.length} DNS validation record(s)`);
      return records;
    } catch (error) {
      spinner.fail('DNS validation records unavailable');
      if (error instanceof PollTimeoutError) {
        throw new ValidationRecordsUnavailableError(certificateArn, error.attempts);
      }
      throw error;
    }
  }

  /**
   * Wait for certificate validation to complete
   * Polls certificate status until it's issued, failed, or the timeout elapses
   *
   * @throws CertificateIssuanceError when ACM gives up on the certificate
   * @throws CertificateTimeoutError when it is still pending at the timeout
   */
  async waitForCertificateValidation(certificateArn: string): Promise<void> {
    const spinner = startSpinner('Waiting for certificate validation...', this.context.showProgress);
    const { intervalMs, timeoutMs } = this.options.issuance;

    try {
      await pollUntil(
        async () => {
          const detail = await this.getCertificateDetails(certificateArn);
          const status = detail.Status ?? 'UNKNOWN';

          if (status === CertificateStatus.ISSUED) {
            return done(undefined);
          }
          if (FAILED_STATUSES.has(status)) {
            throw new CertificateIssuanceError(certificateArn, status, detail.FailureReason);
          }
          return pending<undefined>(status);
        },
        {
          intervalMs,
          timeoutMs,
          clock: this.context.clock,
          signal: this.context.signal,
          onPending: (status, attempt, elapsedMs) => {
            const minutesElapsed = Math.floor(elapsedMs / 60000);
            spinner.text = `Waiting for certificate validation... (${status}, ${minutesElapsed}m elapsed, attempt ${attempt})`;
          },
        }
      );

      spinner.succeed('Certificate validated successfully!');
    } catch (error) {
      spinner.fail('Certificate was not issued');
      if (error instanceof PollTimeoutError) {
        throw new CertificateTimeoutError(certificateArn, error.elapsedMs);
      }
      throw error;
    }
  }

  /**
   * Get certificate details
   */
  async getCertificateDetails(certificateArn: string): Promise<CertificateDetail> {
    const { Certificate } = await withRetry(
      () =>
        this.context.clients.acm.send(
          new DescribeCertificateCommand({
            CertificateArn: certificateArn,
          })
        ),
      {
        retryableErrors: [...AWS_RETRYABLE_ERRORS.ACM, ...AWS_RETRYABLE_ERRORS.General],
        clock: this.context.clock,
        signal: this.context.signal,
      }
    );

    if (!Certificate) {
      throw new Error(`Certificate not found: ${certificateArn}`);
    }

    return Certificate;
  }

  /**
   * List issued and pending certificates (all pages)
   */
  private async listCertificates(): Promise<CertificateSummary[]> {
    const summaries: CertificateSummary[] = [];
    let nextToken: string | undefined;

    do {
      const response = await this.context.clients.acm.send(
        new ListCertificatesCommand({
          CertificateStatuses: [CertificateStatus.ISSUED, CertificateStatus.PENDING_VALIDATION],
          NextToken: nextToken,
        })
      );
      summaries.push(...(response.CertificateSummaryList ?? []));
      nextToken = response.NextToken;
    } while (nextToken);

    return summaries;
  }
}

/**
 * ACM-published DNS records, one per validated name
 */
export function extractValidationRecords(detail: CertificateDetail): ValidationRecord[] {
  const records: ValidationRecord[] = [];

  for (const option of detail.DomainValidationOptions ?? []) {
    const resourceRecord = option.ResourceRecord;
    if (resourceRecord?.Name && resourceRecord.Type && resourceRecord.Value) {
      records.push({
        recordName: resourceRecord.Name,
        recordType: resourceRecord.Type,
        recordValue: resourceRecord.Value,
      });
    }
  }

  return records;
}

/**
 * ACM treats repeated requests with the same token (within an hour) as one
 */
export function idempotencyToken(domain: string): string {
  return normalizeDomain(domain).replace(/[^a-z0-9]/g, '').slice(0, 32) || 'site';
}
