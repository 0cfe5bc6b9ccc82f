/**
 * Deploy command
 */

import { Command } from "commander";
import chalk from "chalk";
import cliProgress from "cli-progress";
import * as logger from "../utils/logger.js";
import { runAction } from "../utils/action.js";
import {
  addConfigOptions,
  configOverrides,
  parsePositiveInt,
  type ConfigOptions,
} from "../utils/options.js";
import { loadConfig } from "../../core/config/index.js";
import { getCredentials, verifyCredentials } from "../../core/aws/index.js";
import { createSTSClient } from "../../core/aws/client.js";
import { createDeployContext, destroyDeployContext } from "../../core/context.js";
import { PublishPartialFailure, type DeployStage } from "../../core/errors.js";
import { runDeployment } from "../../core/pipeline/index.js";
import type { EnvironmentConfig } from "../../types/config.js";
import type { DeploymentReport, DeploymentRequest } from "../../types/deployment.js";
import type { UploadResult } from "../../types/deployer.js";

/**
 * Deploy command options
 */
export interface DeployOptions extends ConfigOptions {
  bucketlogslifecycle?: number;
  buckettransitionlifecycle?: number;
  validate?: boolean;
  indexFile?: string;
  outputDir?: string;
  exclude?: string[];
  template?: string;
  contactForm?: boolean;
  senderEmail?: string;
  recipientEmail?: string;
  skipUnchanged?: boolean;
  invalidate?: boolean;
  quiet?: boolean;
}

const STAGE_TITLES: Record<DeployStage, string> = {
  config: "Configuration",
  domain: "Hosted Zone",
  certificate: "Certificate",
  stack: "CloudFormation Stack",
  publish: "Content",
};

/**
 * Create deploy command
 */
export function createDeployCommand(): Command {
  const command = addConfigOptions(new Command("deploy"));

  command
    .description("Provision the certificate, converge the stack and publish the site")
    .option("--bucketlogslifecycle <days>", "Days access logs are kept (default: 365)", parsePositiveInt)
    .option(
      "--buckettransitionlifecycle <days>",
      "Days before access logs move to STANDARD_IA (default: 30)",
      parsePositiveInt
    )
    .option("--validate", "Validate the CloudFormation template only")
    .option("--index-file <path>", "Single page published as index.html (default: ./index.html)")
    .option("--output-dir <dir>", "Generated site directory (takes precedence over --index-file)")
    .option("--exclude <patterns...>", "Glob patterns left out of the upload")
    .option("--template <path>", "Custom CloudFormation template")
    .option("--contact-form", "Deploy the template with the serverless contact form")
    .option("--sender-email <email>", "SES-verified sender of contact form mail")
    .option("--recipient-email <email>", "Recipient of contact form mail")
    .option("--skip-unchanged", "Skip files whose content matches the bucket")
    .option("--no-invalidate", "Skip CloudFront cache invalidation")
    .option("-q, --quiet", "Hide spinners and the progress bar")
    .action((options: DeployOptions) => runAction(() => deployCommand(options)));

  return command;
}

/**
 * Command-line layer of the deploy configuration
 */
export function deployOverrides(options: DeployOptions): EnvironmentConfig {
  return {
    ...configOverrides(options),
    bucketLogsLifecycle: options.bucketlogslifecycle,
    bucketTransitionLifecycle: options.buckettransitionlifecycle,
    validate: options.validate,
    content: {
      outputDir: options.outputDir,
      indexFile: options.indexFile,
      exclude: options.exclude,
    },
    template: {
      variant: options.contactForm ? "contact-form" : undefined,
      path: options.template,
    },
    contactForm: {
      senderEmail: options.senderEmail,
      recipientEmail: options.recipientEmail,
    },
    upload: {
      skipUnchanged: options.skipUnchanged,
      // commander defaults --no-invalidate to true; only an explicit flag overrides the file
      invalidate: options.invalidate === false ? false : undefined,
    },
  };
}

/**
 * Fail the run when any asset could not be uploaded
 *
 * @throws PublishPartialFailure listing the failed assets
 */
export function assertPublished(report: DeploymentReport): void {
  if (!report.publish || report.publish.failed.length === 0) {
    return;
  }

  const { uploaded, skipped, failed } = report.publish;
  throw new PublishPartialFailure(failed, uploaded + skipped + failed.length);
}

/**
 * Deploy command handler
 */
export async function deployCommand(options: DeployOptions): Promise<void> {
  const showProgress = !options.quiet;

  // Header
  console.log();
  console.log(chalk.bold.blue("🚀 Site Deployment"));
  console.log();

  // Step 1: Load config
  logger.info("Loading configuration...");
  const { request, configPath } = await loadConfig({
    configPath: options.config,
    env: options.env,
    overrides: deployOverrides(options),
  });

  logger.success(`Configuration loaded: ${chalk.cyan(request.domainName)}`);
  logger.keyValue("Config file", configPath ?? "none (command line only)");
  logger.keyValue("Environment", options.env || "base config");
  logger.keyValue("Prefix", request.resourcePrefix);
  logger.keyValue("Region", request.region);
  logger.keyValue("Template", request.template.path ?? request.template.variant);

  if (request.validateOnly) {
    logger.warn("Validate mode - only the template is checked, nothing is deployed");
  }

  // Step 2: Verify credentials
  console.log();
  logger.info("Verifying AWS credentials...");

  const settings = { region: request.region, profile: request.profile };
  const { source } = await getCredentials(settings);
  const stsClient = createSTSClient(settings);
  try {
    const accountInfo = await verifyCredentials(stsClient);
    logger.success(`Credentials verified (${source})`);
    logger.keyValue("Account ID", accountInfo.accountId);
    logger.keyValue("User ARN", accountInfo.arn);
  } finally {
    stsClient.destroy();
  }

  // Step 3: Run the pipeline
  const controller = new AbortController();
  const onSignal = () => {
    if (!controller.signal.aborted) {
      console.log();
      logger.warn("Interrupted, cancelling the current AWS call...");
      controller.abort();
    }
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  const context = createDeployContext(settings, {
    signal: controller.signal,
    showProgress,
  });

  const progress: { bar: cliProgress.SingleBar | null } = { bar: null };

  try {
    const report = await runDeployment(request, context, {
      onStage: (stage) => {
        if (stage !== "config") {
          logger.section(STAGE_TITLES[stage]);
        }
      },
      onProgress: (completed: number, total: number, result: UploadResult) => {
        if (!showProgress) {
          return;
        }
        if (!progress.bar) {
          progress.bar = new cliProgress.SingleBar(
            {
              format:
                "Progress |" +
                chalk.cyan("{bar}") +
                "| {percentage}% | {value}/{total} files | {current}",
              barCompleteChar: "█",
              barIncompleteChar: "░",
              hideCursor: true,
            },
            cliProgress.Presets.shades_classic
          );
          progress.bar.start(total, 0, { current: "" });
        }
        progress.bar.update(completed, { current: result.asset.remoteKey });
      },
    });

    progress.bar?.stop();
    progress.bar = null;
    printSummary(request, report);
    assertPublished(report);

    console.log();
    console.log(
      chalk.green.bold(
        request.validateOnly ? "✓ Template validated" : "✓ Deployment completed successfully!"
      )
    );
    console.log();
  } finally {
    progress.bar?.stop();
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    destroyDeployContext(context);
  }
}

/**
 * Print the deployment summary
 */
function printSummary(request: DeploymentRequest, report: DeploymentReport): void {
  const { stack, certificate, publish } = report;

  logger.section("Deployment Summary");
  logger.keyValue("Stack", `${stack.stackName} (${stack.status})`);

  if (certificate) {
    logger.keyValue(
      "Certificate",
      `${certificate.certificateArn}${certificate.reused ? " (reused)" : ""}`
    );
  }

  if (stack.outputs.DistributionDomainName) {
    logger.keyValue("CloudFront", stack.outputs.DistributionDomainName);
  }
  if (stack.outputs.ContactFormApiUrl) {
    logger.keyValue("Contact form API", stack.outputs.ContactFormApiUrl);
  }

  if (!publish) {
    return;
  }

  logger.keyValue("Files uploaded", String(publish.uploaded));
  if (publish.skipped > 0) {
    logger.keyValue("Files unchanged", String(publish.skipped));
  }
  for (const { asset, error } of publish.failed) {
    console.log(chalk.red(`  - ${asset.remoteKey}: ${error}`));
  }

  if (publish.invalidationId) {
    logger.keyValue(
      "Invalidation",
      `${publish.invalidationId} (${publish.invalidatedPaths.length} path(s))`
    );
  }

  logger.keyValue("Website URL", chalk.cyan(`https://${request.domainName}`));
}
