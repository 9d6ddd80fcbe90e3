/**
 * AWS Credentials verification using STS
 */

import { GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import { ListAccountAliasesCommand } from '@aws-sdk/client-iam';
import type { AWSAccountInfo, AWSCredentialProvider } from '../../types/aws.js';
import { createIAMClient, createSTSClient, type ClientOptions } from './client.js';

/**
 * Verify AWS credentials by calling STS GetCallerIdentity
 *
 * @returns AWS account information
 * @throws Error if credentials are invalid
 */
export async function verifyCredentials(
  credentials: AWSCredentialProvider,
  options: ClientOptions = {}
): Promise<AWSAccountInfo> {
  const client = createSTSClient(credentials, options);

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
    if (error instanceof Error) {
      // AWS SDK errors
      if ('Code' in error || '$metadata' in error) {
        throw new Error(
          `AWS credentials verification failed: ${error.message}\n` +
            `Please check your credentials and try again.`
        );
      }
      throw error;
    }
    throw new Error(`Unknown error during credentials verification: ${String(error)}`);
  }
}

/**
 * Look up the account's IAM alias
 *
 * @returns The first alias, or undefined when none is set or the call is denied
 */
export async function getAccountAlias(
  credentials: AWSCredentialProvider,
  options: ClientOptions = {}
): Promise<string | undefined> {
  const client = createIAMClient(credentials, options);

  try {
    const response = await client.send(new ListAccountAliasesCommand({}));
    return response.AccountAliases?.[0] || undefined;
  } catch {
    return undefined;
  }
}

/**
 * Format AWS account info for display
 */
export function formatAccountInfo(info: AWSAccountInfo): string {
  return [
    `Account ID: ${info.accountId}`,
    ...(info.alias ? [`Alias: ${info.alias}`] : []),
    `Caller ARN: ${info.arn}`,
  ].join('\n');
}
