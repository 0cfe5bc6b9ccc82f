/**
 * Options shared by the commands that load a configuration
 */

import { Command, InvalidArgumentError } from 'commander';
import type { EnvironmentConfig } from '../../types/config.js';

export interface ConfigOptions {
  env?: string;
  config?: string;
  domain?: string;
  prefix?: string;
  region?: string;
  profile?: string;
  account?: string;
}

/**
 * Commander parser for day counts and other positive integers
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Add the site identification and config file options
 */
export function addConfigOptions(command: Command): Command {
  return command
    .option('-d, --domain <domain>', 'Apex domain of the site (e.g. example.org)')
    .option('-p, --prefix <prefix>', 'Resource prefix (lowercase letters, digits, hyphens)')
    .option('-r, --region <region>', 'Stack region (default: AWS_REGION, AWS_DEFAULT_REGION, then us-east-1)')
    .option('--profile <profile>', 'AWS profile name')
    .option('--account <profile>', 'Alias of --profile')
    .option('-e, --env <environment>', 'Environment section of the config file and .env.<environment> files')
    .option('-c, --config <path>', 'Config file path (default: site-deploy.config.* discovered upward)');
}

/**
 * Command-line layer of the configuration; unset flags stay undefined
 */
export function configOverrides(options: ConfigOptions): EnvironmentConfig {
  return {
    domain: options.domain,
    prefix: options.prefix,
    region: options.region,
    profile: options.profile ?? options.account,
  };
}
