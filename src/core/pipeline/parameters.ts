/**
 * Stack naming, parameters and tags derived from a deployment request
 */

import { ConfigError } from '../errors.js';
import type { DeploymentRequest, HostedZone } from '../../types/deployment.js';

export function stackNameFor(resourcePrefix: string): string {
  return `${resourcePrefix}-website-framework`;
}

/**
 * Tags put on the stack, its resources and the certificate
 */
export function resourceTags(request: DeploymentRequest): Record<string, string> {
  return {
    'site-deploy:managed': 'true',
    'site-deploy:prefix': request.resourcePrefix,
    'site-deploy:domain': request.domainName,
    ...request.tags,
  };
}

export interface StackParameterInputs {
  certificateArn: string;
  zone: HostedZone;
  /** Existing contact form key; empty lets the template create one */
  kmsKeyId?: string | null;
}

/**
 * CloudFormation parameters of the selected template
 */
export function buildStackParameters(
  request: DeploymentRequest,
  inputs: StackParameterInputs
): Record<string, string> {
  const parameters: Record<string, string> = {
    ACMCertificateArn: inputs.certificateArn,
    BucketLogsLifeCycle: String(request.retentionDays),
    BucketTransitionLifeCycle: String(request.transitionDays),
    DomainName: request.domainName,
    HostedZoneId: inputs.zone.zoneId,
    ProjectPrefix: request.resourcePrefix,
  };

  if (request.template.variant !== 'contact-form') {
    return parameters;
  }

  const contactForm = request.contactForm;
  if (!contactForm) {
    throw new ConfigError('The contact-form template needs contactForm.senderEmail and contactForm.recipientEmail');
  }

  return {
    ...parameters,
    KmsKeyId: inputs.kmsKeyId ?? '',
    SenderEmail: contactForm.senderEmail,
    RecipientEmail: contactForm.recipientEmail,
    ContactFormMemorySize: String(contactForm.memorySize),
    ContactFormTimeout: String(contactForm.timeoutSeconds),
  };
}
