/**
 * AWS Client creation helpers
 * Account-level clients used before the scan starts
 */

import { AccountClient } from '@aws-sdk/client-account';
import { IAMClient } from '@aws-sdk/client-iam';
import { STSClient } from '@aws-sdk/client-sts';
import type { AWSCredentialProvider } from '../../types/aws.js';

/**
 * Region used for account-level API calls
 */
export const DEFAULT_API_REGION = 'us-east-1';

/**
 * Client configuration options
 */
export interface ClientOptions {
  /** AWS region override (default: us-east-1) */
  region?: string;

  /** Max retry attempts */
  maxAttempts?: number;
}

/**
 * Create STS client
 */
export function createSTSClient(
  credentials: AWSCredentialProvider,
  options: ClientOptions = {}
): STSClient {
  return new STSClient({
    region: options.region ?? DEFAULT_API_REGION,
    credentials,
    maxAttempts: options.maxAttempts,
  });
}

/**
 * Create IAM client
 * Note: IAM is a global service, its API lives in us-east-1
 */
export function createIAMClient(
  credentials: AWSCredentialProvider,
  options: ClientOptions = {}
): IAMClient {
  return new IAMClient({
    region: options.region ?? DEFAULT_API_REGION,
    credentials,
    maxAttempts: options.maxAttempts,
  });
}

/**
 * Create Account client
 */
export function createAccountClient(
  credentials: AWSCredentialProvider,
  options: ClientOptions = {}
): AccountClient {
  return new AccountClient({
    region: options.region ?? DEFAULT_API_REGION,
    credentials,
    maxAttempts: options.maxAttempts,
  });
}
