/**
 * Deployment pipeline type definitions
 */

/**
 * Which bundled CloudFormation template a run converges
 */
export type TemplateVariant = 'website' | 'contact-form';

/**
 * Where the generated site comes from
 */
export type ContentSource =
  | {
      kind: 'directory';
      /** Generated site directory */
      outputDir: string;
      /** Glob patterns left out of the upload */
      exclude: string[];
    }
  | {
      kind: 'file';
      /** Single page uploaded as index.html */
      indexFile: string;
    };

/**
 * Contact form settings (contact-form template only)
 */
export interface ContactFormSettings {
  senderEmail: string;
  recipientEmail: string;
  /** KMS alias looked up to reuse an existing key */
  kmsKeyAlias: string;
  memorySize: number;
  timeoutSeconds: number;
}

/**
 * Fixed-interval poll bounded by attempts
 */
export interface AttemptBound {
  intervalMs: number;
  maxAttempts: number;
}

/**
 * Fixed-interval poll bounded by wall-clock time
 */
export interface DurationBound {
  intervalMs: number;
  timeoutMs: number;
}

export interface PollingSettings {
  validationRecords: AttemptBound;
  certificate: DurationBound;
  stack: DurationBound;
}

export interface UploadSettings {
  /** Skip files whose MD5 matches the remote ETag */
  skipUnchanged: boolean;
  /** Invalidate CloudFront for uploaded paths */
  invalidate: boolean;
}

/**
 * Validated, immutable input of one deployment run
 */
export interface DeploymentRequest {
  readonly domainName: string;
  readonly resourcePrefix: string;
  readonly region: string;
  readonly profile?: string;
  /** Days access logs are kept (BucketLogsLifeCycle) */
  readonly retentionDays: number;
  /** Days before logs move to infrequent access (BucketTransitionLifeCycle) */
  readonly transitionDays: number;
  readonly validateOnly: boolean;
  readonly content: Readonly<ContentSource>;
  readonly template: Readonly<{ variant: TemplateVariant; path?: string }>;
  readonly contactForm?: Readonly<ContactFormSettings>;
  readonly polling: Readonly<PollingSettings>;
  readonly upload: Readonly<UploadSettings>;
  readonly tags: Readonly<Record<string, string>>;
}

/**
 * Route53 hosted zone that owns the site domain
 */
export interface HostedZone {
  /** Bare zone id, without the /hostedzone/ prefix */
  zoneId: string;
  /** Zone apex, lowercase, no trailing dot */
  domainName: string;
}

export interface ValidationRecord {
  recordName: string;
  recordValue: string;
  recordType: string;
}

export type CertificateStatus = 'PENDING' | 'ISSUED' | 'FAILED' | 'TIMED_OUT';

export interface CertificateRequest {
  certificateArn: string;
  domainName: string;
  alternateNames: string[];
  validationRecords: ValidationRecord[];
  status: CertificateStatus;
  /** True when an existing issued certificate was found */
  reused: boolean;
}

export type StackStatus =
  | 'NOT_FOUND'
  | 'CREATE_IN_PROGRESS'
  | 'CREATE_COMPLETE'
  | 'UPDATE_IN_PROGRESS'
  | 'UPDATE_COMPLETE'
  | 'NO_CHANGES'
  | 'FAILED'
  | 'VALIDATED';

export interface StackDeployment {
  stackName: string;
  parameters: Record<string, string>;
  status: StackStatus;
  outputs: Record<string, string>;
  stackId?: string;
}

/**
 * Failed resource event reported by CloudFormation
 */
export interface StackEventSummary {
  logicalResourceId: string;
  resourceType: string;
  status: string;
  reason?: string;
}

export interface PublishableAsset {
  /** Absolute path on disk */
  localPath: string;
  /** Object key (forward slashes, no leading slash) */
  remoteKey: string;
  contentType: string;
  /** Hex MD5, comparable with a single-part S3 ETag */
  contentHash: string;
  size: number;
}

export interface PublishDestination {
  bucketName: string;
  distributionId?: string;
}

export interface FailedAsset {
  asset: PublishableAsset;
  error: string;
}

export interface PublishReport {
  uploaded: number;
  skipped: number;
  failed: FailedAsset[];
  invalidatedPaths: string[];
  invalidationId?: string;
}

export interface DeploymentReport {
  request: DeploymentRequest;
  zone?: HostedZone;
  certificate?: CertificateRequest;
  stack: StackDeployment;
  publish?: PublishReport;
}
