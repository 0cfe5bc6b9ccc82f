/**
 * Status command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as logger from '../utils/logger.js';
import { runAction } from '../utils/action.js';
import { addConfigOptions, configOverrides, type ConfigOptions } from '../utils/options.js';
import { loadConfig } from '../../core/config/index.js';
import { ACMManager } from '../../core/aws/acm-manager.js';
import { CloudFormationManager, extractOutputs } from '../../core/aws/cloudformation-manager.js';
import { Route53Manager } from '../../core/aws/route53-manager.js';
import { createDeployContext, destroyDeployContext, type DeployContext } from '../../core/context.js';
import { inStage, stackNameFor } from '../../core/pipeline/index.js';
import type { DeploymentRequest } from '../../types/deployment.js';

/**
 * Status command options
 */
interface StatusOptions extends ConfigOptions {
  json?: boolean;
}

/**
 * Read-only view of the deployed site
 */
export interface SiteStatus {
  domainName: string;
  stack: {
    stackName: string;
    status: string;
    statusReason?: string;
    lastUpdated?: string;
    outputs: Record<string, string>;
  } | null;
  certificate: {
    certificateArn: string;
    status: string;
    notAfter?: string;
  } | null;
}

/**
 * Create status command
 */
export function createStatusCommand(): Command {
  const command = addConfigOptions(new Command('status'));

  command
    .description('Show the stack and certificate of the site (read-only)')
    .option('--json', 'Output as JSON')
    .action((options: StatusOptions) => runAction(() => statusCommand(options)));

  return command;
}

/**
 * Describe the stack and the certificate covering the domain; makes no changes
 */
export async function collectStatus(request: DeploymentRequest, context: DeployContext): Promise<SiteStatus> {
  const stackName = stackNameFor(request.resourcePrefix);

  const cloudFormation = new CloudFormationManager(context, { polling: request.polling.stack });
  const stack = await inStage('stack', () => cloudFormation.describeStack(stackName));

  const acm = new ACMManager(context, new Route53Manager(context), {
    validationRecords: request.polling.validationRecords,
    issuance: request.polling.certificate,
  });
  const certificate = await inStage('certificate', () => acm.findExistingCertificate(request.domainName));

  return {
    domainName: request.domainName,
    stack: stack
      ? {
          stackName,
          status: stack.StackStatus ?? 'UNKNOWN',
          statusReason: stack.StackStatusReason,
          lastUpdated: (stack.LastUpdatedTime ?? stack.CreationTime)?.toISOString(),
          outputs: extractOutputs(stack),
        }
      : null,
    certificate: certificate
      ? {
          certificateArn: certificate.certificateArn,
          status: certificate.status,
          notAfter: certificate.detail.NotAfter?.toISOString(),
        }
      : null,
  };
}

/**
 * Status command handler
 */
async function statusCommand(options: StatusOptions): Promise<void> {
  const { json = false } = options;

  const { request } = await loadConfig({
    configPath: options.config,
    env: options.env,
    overrides: configOverrides(options),
  });

  const context = createDeployContext(
    { region: request.region, profile: request.profile },
    { showProgress: false }
  );

  let status: SiteStatus;
  try {
    status = await collectStatus(request, context);
  } finally {
    destroyDeployContext(context);
  }

  // JSON output
  if (json) {
    console.log(JSON.stringify(status, null, 2));
    return;
  }

  console.log();
  console.log(chalk.bold.blue('📊 Deployment Status'));
  console.log();
  logger.keyValue('Domain', chalk.cyan(status.domainName));

  console.log();
  console.log(chalk.bold('CloudFormation Stack:'));
  if (status.stack) {
    logger.keyValue('  Name', status.stack.stackName);
    logger.keyValue('  Status', status.stack.status);
    if (status.stack.statusReason) {
      logger.keyValue('  Reason', status.stack.statusReason);
    }
    if (status.stack.lastUpdated) {
      logger.keyValue('  Last Updated', new Date(status.stack.lastUpdated).toLocaleString());
    }
    for (const [key, value] of Object.entries(status.stack.outputs)) {
      logger.keyValue(`  ${key}`, value);
    }
  } else {
    logger.warn(`  Stack ${stackNameFor(request.resourcePrefix)} not found`);
    logger.info('  Run `cfn-site-deploy deploy` to create it');
  }

  console.log();
  console.log(chalk.bold('Certificate:'));
  if (status.certificate) {
    logger.keyValue('  ARN', status.certificate.certificateArn);
    logger.keyValue('  Status', status.certificate.status);
    if (status.certificate.notAfter) {
      logger.keyValue('  Expires', new Date(status.certificate.notAfter).toLocaleDateString());
    }
  } else {
    logger.warn(`  No certificate covers ${status.domainName} and www.${status.domainName}`);
  }

  console.log();
}
