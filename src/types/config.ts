/**
 * Configuration types for cfn-site-deploy
 */

import type { AttemptBound, DurationBound, TemplateVariant } from './deployment.js';

/**
 * Generated site location
 *
 * `outputDir` wins over `indexFile`; without either, ./index.html is published.
 */
export interface ContentConfig {
  /** Directory produced by the site generator */
  outputDir?: string;

  /** Single page published as index.html */
  indexFile?: string;

  /** Glob patterns left out of the upload */
  exclude?: string[];
}

export interface TemplateConfig {
  /** Bundled template to deploy (default: website) */
  variant?: TemplateVariant;

  /** Custom template file; overrides the variant's bundled file */
  path?: string;
}

/**
 * Contact form settings, required by the contact-form template
 */
export interface ContactFormConfig {
  /** SES-verified sender address */
  senderEmail?: string;

  recipientEmail?: string;

  /** KMS alias to reuse (default: alias/<prefix>-contact-form) */
  kmsKeyAlias?: string;

  /** Lambda memory in MB (default: 128) */
  memorySize?: number;

  /** Lambda timeout in seconds (default: 10) */
  timeoutSeconds?: number;
}

export interface PollingConfig {
  validationRecords?: Partial<AttemptBound>;
  certificate?: Partial<DurationBound>;
  stack?: Partial<DurationBound>;
}

export interface UploadConfig {
  /** Skip files whose MD5 matches the remote ETag (default: false) */
  skipUnchanged?: boolean;

  /** Invalidate CloudFront for uploaded paths (default: true) */
  invalidate?: boolean;
}

/**
 * Settings an environment may override
 */
export interface EnvironmentConfig {
  /** Apex domain of the site (e.g. example.org) */
  domain?: string;

  /** Lowercase prefix of every created resource */
  prefix?: string;

  /** Stack region */
  region?: string;

  /** AWS profile from ~/.aws/credentials */
  profile?: string;

  /** Days access logs are kept (default: 365) */
  bucketLogsLifecycle?: number;

  /** Days before logs move to STANDARD_IA (default: 30) */
  bucketTransitionLifecycle?: number;

  /** Validate the template only */
  validate?: boolean;

  content?: ContentConfig;
  template?: TemplateConfig;
  contactForm?: ContactFormConfig;
  polling?: PollingConfig;
  upload?: UploadConfig;

  /** Extra tags on the stack and the certificate */
  tags?: Record<string, string>;
}

/**
 * Main configuration file shape (site-deploy.config.ts)
 */
export interface SiteDeployConfig extends EnvironmentConfig {
  /** Environment-specific overrides selected with --env */
  environments?: Record<string, EnvironmentConfig>;
}

/**
 * Load config options
 */
export interface LoadConfigOptions {
  /** Config file path (default: auto-discover) */
  configPath?: string;

  /** Environment name (e.g., 'staging', 'prod') */
  env?: string;

  /** Values from the command line; undefined entries are ignored */
  overrides?: EnvironmentConfig;

  /** Directory to search for the config and .env files (default: cwd) */
  cwd?: string;
}

/**
 * Helper function to define config with type safety
 * Provides autocomplete and type checking in user config files
 */
export function defineConfig(config: SiteDeployConfig): SiteDeployConfig {
  return config;
}
