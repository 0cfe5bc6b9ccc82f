/**
 * AWS Credentials verification using STS
 */

import { STSClient, GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import type { AWSAccountInfo } from '../../types/aws.js';

/**
 * Verify AWS credentials by calling STS GetCallerIdentity
 *
 * @returns AWS account information
 * @throws Error if credentials are invalid
 */
export async function verifyCredentials(client: STSClient): Promise<AWSAccountInfo> {
  try {
    const response = await client.send(new GetCallerIdentityCommand({}));

    if (!response.Account || !response.Arn || !response.UserId) {
      throw new Error('Invalid STS response: missing required fields');
    }

    return {
      accountId: response.Account,
      arn: response.Arn,
      userId: response.UserId,
    };
  } catch (error) {
    if (error instanceof Error && '$metadata' in error) {
      throw new Error(
        `AWS credentials verification failed: ${error.message}\n` +
          `Please check your credentials and try again.`
      );
    }
    throw error;
  }
}

/**
 * Format AWS account info for display
 */
export function formatAccountInfo(info: AWSAccountInfo): string {
  return [
    `Account ID: ${info.accountId}`,
    `User ARN: ${info.arn}`,
  ].join('\n');
}
