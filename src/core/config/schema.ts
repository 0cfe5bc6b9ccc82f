/**
 * Zod schemas for deployment configuration validation
 */

import { z } from 'zod';
import { ConfigError } from '../errors.js';
import { isValidDomainName, normalizeDomain } from '../utils/dns.js';
import type { DeploymentRequest } from '../../types/deployment.js';

export const DEFAULT_REGION = 'us-east-1';
export const DEFAULT_INDEX_FILE = './index.html';

const positiveInt = z.number().int().positive();

/**
 * Generated content schema
 */
const contentSchema = z
  .object({
    outputDir: z.string().min(1, 'Output directory cannot be empty').optional(),
    indexFile: z.string().min(1, 'Index file cannot be empty').optional(),
    exclude: z.array(z.string()).default([]),
  })
  .default({});

const templateSchema = z
  .object({
    variant: z.enum(['website', 'contact-form']).default('website'),
    path: z.string().min(1).optional(),
  })
  .default({});

const contactFormSchema = z
  .object({
    senderEmail: z.string().email('Must be a valid email address').optional(),
    recipientEmail: z.string().email('Must be a valid email address').optional(),
    kmsKeyAlias: z.string().min(1).optional(),
    memorySize: z.number().int().min(128).max(1024).default(128),
    timeoutSeconds: z.number().int().min(3).max(30).default(10),
  })
  .optional();

/**
 * Polling bounds: validation records 5s x 60, certificate 15s / 30min, stack 10s / 60min
 */
const pollingSchema = z
  .object({
    validationRecords: z
      .object({ intervalMs: positiveInt.default(5_000), maxAttempts: positiveInt.default(60) })
      .default({}),
    certificate: z
      .object({ intervalMs: positiveInt.default(15_000), timeoutMs: positiveInt.default(30 * 60_000) })
      .default({}),
    stack: z
      .object({ intervalMs: positiveInt.default(10_000), timeoutMs: positiveInt.default(60 * 60_000) })
      .default({}),
  })
  .default({});

const uploadSchema = z
  .object({
    skipUnchanged: z.boolean().default(false),
    invalidate: z.boolean().default(true),
  })
  .default({});

/**
 * Merged configuration schema (file + environment + command line)
 */
export const configSchema = z
  .object({
    domain: z
      .string({ required_error: 'domain is required (--domain)' })
      .refine(isValidDomainName, 'Must be a valid DNS name with at least two labels (e.g., example.org)')
      .transform(normalizeDomain),
    prefix: z
      .string({ required_error: 'prefix is required (--prefix)' })
      .min(1, 'Prefix is required')
      .max(40, 'Prefix must be at most 40 characters')
      .regex(/^[a-z0-9-]+$/, 'Prefix must contain only lowercase letters, numbers, and hyphens'),
    region: z
      .string()
      .regex(/^[a-z]{2}(-[a-z]+)+-\d+$/, 'Must be a valid AWS region (e.g., us-east-1)')
      .default(DEFAULT_REGION),
    profile: z.string().min(1).optional(),
    bucketLogsLifecycle: positiveInt.default(365),
    bucketTransitionLifecycle: z
      .number()
      .int()
      .min(30, 'Objects can move to STANDARD_IA after 30 days at the earliest')
      .default(30),
    validate: z.boolean().default(false),
    content: contentSchema,
    template: templateSchema,
    contactForm: contactFormSchema,
    polling: pollingSchema,
    upload: uploadSchema,
    tags: z.record(z.string(), z.string()).default({}),
  })
  .superRefine((config, ctx) => {
    if (config.bucketTransitionLifecycle >= config.bucketLogsLifecycle) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['bucketTransitionLifecycle'],
        message: 'Must be lower than bucketLogsLifecycle',
      });
    }

    if (config.template.variant === 'contact-form') {
      for (const field of ['senderEmail', 'recipientEmail'] as const) {
        if (!config.contactForm?.[field]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['contactForm', field],
            message: `${field} is required by the contact-form template`,
          });
        }
      }
    }
  });

export type ValidatedConfig = z.output<typeof configSchema>;

function deepFreeze<T extends object>(value: T): Readonly<T> {
  const nestedValues: unknown[] = Object.values(value);
  for (const nested of nestedValues) {
    if (nested !== null && typeof nested === 'object' && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

/**
 * Build the immutable request of a run from a validated config
 */
export function toDeploymentRequest(config: ValidatedConfig): DeploymentRequest {
  const { content, contactForm } = config;

  const request: DeploymentRequest = {
    domainName: config.domain,
    resourcePrefix: config.prefix,
    region: config.region,
    profile: config.profile,
    retentionDays: config.bucketLogsLifecycle,
    transitionDays: config.bucketTransitionLifecycle,
    validateOnly: config.validate,
    content: content.outputDir
      ? { kind: 'directory', outputDir: content.outputDir, exclude: content.exclude }
      : { kind: 'file', indexFile: content.indexFile ?? DEFAULT_INDEX_FILE },
    template: { variant: config.template.variant, path: config.template.path },
    contactForm:
      contactForm?.senderEmail && contactForm.recipientEmail
        ? {
            senderEmail: contactForm.senderEmail,
            recipientEmail: contactForm.recipientEmail,
            kmsKeyAlias: contactForm.kmsKeyAlias ?? `alias/${config.prefix}-contact-form`,
            memorySize: contactForm.memorySize,
            timeoutSeconds: contactForm.timeoutSeconds,
          }
        : undefined,
    polling: config.polling,
    upload: config.upload,
    tags: config.tags,
  };

  return deepFreeze(request);
}

/**
 * Format zod issues as "path: message" lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Validate a merged config into a frozen DeploymentRequest
 *
 * @throws ConfigError listing every violation
 */
export function validateConfig(config: unknown): DeploymentRequest {
  const result = configSchema.safeParse(config);

  if (!result.success) {
    throw new ConfigError('Invalid configuration', formatIssues(result.error));
  }

  return toDeploymentRequest(result.data);
}
