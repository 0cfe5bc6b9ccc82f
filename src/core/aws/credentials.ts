/**
 * AWS Credentials resolution
 */

import {
  fromEnv,
  fromIni,
  fromNodeProviderChain,
} from '@aws-sdk/credential-providers';
import type { AwsCredentialIdentityProvider } from '@aws-sdk/types';
import type {
  ClientSettings,
  CredentialSource,
  CredentialResolution,
} from '../../types/aws.js';

/**
 * Pick a credential provider with priority order:
 * 1. Profile passed with --profile / --account or set in the config file
 * 2. Environment variables (AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY)
 * 3. Default provider chain (AWS_PROFILE, SSO, container and instance roles)
 *
 * CI runs usually omit the profile and rely on 2 or 3.
 */
export function selectCredentialProvider(
  settings: Pick<ClientSettings, 'profile'>,
  env: NodeJS.ProcessEnv = process.env
): { provider: AwsCredentialIdentityProvider; source: CredentialSource } {
  if (settings.profile) {
    return { provider: fromIni({ profile: settings.profile }), source: 'profile' };
  }

  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    return { provider: fromEnv(), source: 'environment' };
  }

  return { provider: fromNodeProviderChain(), source: 'default-chain' };
}

/**
 * Resolve credentials once, for display and verification
 */
export async function getCredentials(
  settings: Pick<ClientSettings, 'profile'>
): Promise<CredentialResolution> {
  const { provider, source } = selectCredentialProvider(settings);

  try {
    const credentials = await provider();
    return {
      credentials,
      source,
      profile: settings.profile,
    };
  } catch (error) {
    throw new Error(
      `Failed to resolve AWS credentials.\n` +
        `Please configure credentials using one of:\n` +
        `  1. --profile <name> (or profile in site-deploy.config.ts)\n` +
        `  2. Environment variables (AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY)\n` +
        `  3. AWS_PROFILE / ~/.aws/credentials default profile\n` +
        `  4. IAM role (EC2/ECS instance metadata)\n\n` +
        `Original error: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Create a credential provider for AWS SDK clients
 */
export function createCredentialProvider(
  settings: Pick<ClientSettings, 'profile'>
): AwsCredentialIdentityProvider {
  return selectCredentialProvider(settings).provider;
}
