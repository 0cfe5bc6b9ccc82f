/**
 * Deployment pipeline
 *
 * Runs the four stages strictly in order, each feeding the next:
 * domain → certificate → stack → publish.
 */

import { ACMManager } from '../aws/acm-manager.js';
import { CloudFormationManager } from '../aws/cloudformation-manager.js';
import { findKeyIdByAlias } from '../aws/kms-manager.js';
import { Route53Manager } from '../aws/route53-manager.js';
import type { DeployContext } from '../context.js';
import { collectIndexAsset, scanFiles } from '../deployer/file-scanner.js';
import { publish } from '../deployer/s3-uploader.js';
import {
  ConfigError,
  DeployError,
  MissingStackOutputError,
  ProviderError,
  UserAbortedError,
  type DeployStage,
} from '../errors.js';
import { buildStackParameters, resourceTags, stackNameFor } from './parameters.js';
import { loadTemplate } from './templates.js';
import type { PublishOptions } from '../../types/deployer.js';
import type {
  DeploymentReport,
  DeploymentRequest,
  PublishableAsset,
} from '../../types/deployment.js';

export interface RunDeploymentOptions {
  /** Called when a stage starts */
  onStage?: (stage: DeployStage) => void;

  /** Called after each published asset */
  onProgress?: PublishOptions['onProgress'];
}

/**
 * Run `operation` as part of `stage`: every failure leaves as a DeployError of that stage
 */
export async function inStage<T>(stage: DeployStage, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof UserAbortedError) {
      throw error.stage === stage ? error : new UserAbortedError(stage);
    }
    if (error instanceof DeployError) {
      throw error;
    }
    if (stage === 'config') {
      throw new ConfigError(error instanceof Error ? error.message : String(error));
    }
    throw new ProviderError(stage, error);
  }
}

/**
 * Local files of the run, gathered before any AWS call
 */
export async function collectAssets(request: DeploymentRequest): Promise<PublishableAsset[]> {
  const { content } = request;

  if (content.kind === 'file') {
    return [await collectIndexAsset(content.indexFile)];
  }

  const assets = await scanFiles({ outputDir: content.outputDir, exclude: content.exclude });
  if (assets.length === 0) {
    throw new ConfigError(`No files to publish in ${content.outputDir}`);
  }
  return assets;
}

/**
 * Converge the site for one request.
 *
 * In validate-only mode only the template is validated: no zone lookup, no
 * certificate and no upload.
 */
export async function runDeployment(
  request: DeploymentRequest,
  context: DeployContext,
  options: RunDeploymentOptions = {}
): Promise<DeploymentReport> {
  const { onStage, onProgress } = options;
  const stackName = stackNameFor(request.resourcePrefix);
  const tags = resourceTags(request);

  onStage?.('config');
  const { template, assets } = await inStage('config', async () => ({
    template: await loadTemplate(request.template),
    assets: request.validateOnly ? [] : await collectAssets(request),
  }));

  const cloudFormation = new CloudFormationManager(context, {
    polling: request.polling.stack,
    tags,
  });

  if (request.validateOnly) {
    onStage?.('stack');
    const stack = await inStage('stack', () => cloudFormation.converge(stackName, template.body, {}, true));
    return { request, stack };
  }

  const route53 = new Route53Manager(context);

  onStage?.('domain');
  const zone = await inStage('domain', () => route53.resolve(request.domainName));

  onStage?.('certificate');
  const acm = new ACMManager(context, route53, {
    validationRecords: request.polling.validationRecords,
    issuance: request.polling.certificate,
    tags,
  });
  const certificate = await inStage('certificate', () => acm.ensureCertificate(request.domainName, zone));

  onStage?.('stack');
  const stack = await inStage('stack', async () => {
    const kmsKeyId =
      request.template.variant === 'contact-form' && request.contactForm
        ? await findKeyIdByAlias(context, request.contactForm.kmsKeyAlias)
        : null;

    const parameters = buildStackParameters(request, {
      certificateArn: certificate.certificateArn,
      zone,
      kmsKeyId,
    });

    return cloudFormation.converge(stackName, template.body, parameters, false);
  });

  const bucketName = stack.outputs.BucketName;
  if (!bucketName) {
    throw new MissingStackOutputError(stackName, 'BucketName');
  }

  onStage?.('publish');
  const publishReport = await inStage('publish', () =>
    publish(
      context,
      assets,
      { bucketName, distributionId: stack.outputs.DistributionId },
      {
        skipUnchanged: request.upload.skipUnchanged,
        invalidate: request.upload.invalidate,
        onProgress,
      }
    )
  );

  return { request, zone, certificate, stack, publish: publishReport };
}
