/**
 * AWS Credentials resolution
 */

import {
  fromEnv,
  fromIni,
  fromNodeProviderChain,
} from '@aws-sdk/credential-providers';
import type { AwsCredentialIdentityProvider } from '@aws-sdk/types';
import type { InventoryConfig } from '../../types/config.js';
import type {
  CredentialSource,
  CredentialResolution,
} from '../../types/aws.js';

interface CredentialCandidate {
  source: CredentialSource;
  provider: AwsCredentialIdentityProvider;
  profile?: string;
}

/**
 * Pick the credential source for a config:
 * 1. Static keys in config
 * 2. Profile in config
 * 3. AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY
 * 4. SDK default chain (AWS_PROFILE, SSO, container and instance roles)
 */
export function selectCredentialSource(
  config: InventoryConfig,
  env: NodeJS.ProcessEnv = process.env
): CredentialCandidate {
  const { accessKeyId, secretAccessKey, sessionToken, profile } = config.credentials ?? {};

  if (accessKeyId && secretAccessKey) {
    return {
      source: 'config',
      provider: async () => ({ accessKeyId, secretAccessKey, sessionToken }),
    };
  }

  if (profile) {
    return { source: 'profile', profile, provider: fromIni({ profile }) };
  }

  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    return { source: 'environment', provider: fromEnv() };
  }

  return {
    source: 'default-chain',
    profile: env.AWS_PROFILE || undefined,
    provider: fromNodeProviderChain(),
  };
}

/**
 * Resolve AWS credentials for a config
 *
 * @throws Error listing the supported sources when nothing resolves
 */
export async function getCredentials(
  config: InventoryConfig
): Promise<CredentialResolution> {
  const { source, profile, provider } = selectCredentialSource(config);

  try {
    const credentials = await provider();
    return { credentials, source, profile };
  } catch (error) {
    throw new Error(
      `Failed to resolve AWS credentials (${source}).\n` +
        `Configure one of:\n` +
        `  1. credentials.accessKeyId + credentials.secretAccessKey in the config file\n` +
        `  2. credentials.profile in the config file, or --profile\n` +
        `  3. AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY\n` +
        `  4. AWS_PROFILE, ~/.aws/credentials, SSO or an IAM role\n\n` +
        `Original error: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Credential provider handed to every client
 *
 * Credentials are resolved once; later calls reuse the same promise.
 */
export function createCredentialProvider(
  config: InventoryConfig
): AwsCredentialIdentityProvider {
  let resolution: Promise<CredentialResolution> | undefined;

  return async () => {
    if (!resolution) {
      resolution = getCredentials(config);
    }
    const { credentials } = await resolution;
    return credentials;
  };
}
