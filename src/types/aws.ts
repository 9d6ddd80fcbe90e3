/**
 * AWS-related type definitions
 */

import type {
  AwsCredentialIdentity,
  AwsCredentialIdentityProvider,
} from "@aws-sdk/types";

/**
 * AWS credentials (from AWS SDK)
 */
export type AWSCredentials = AwsCredentialIdentity;

/**
 * Credential provider handed to every SDK client a collector creates
 */
export type AWSCredentialProvider = AwsCredentialIdentityProvider;

/**
 * AWS account information from STS
 */
export interface AWSAccountInfo {
  /** AWS Account ID */
  accountId: string;

  /** Caller ARN */
  arn: string;

  /** User ID */
  userId: string;

  /** IAM account alias, when one is set */
  alias?: string;
}

/**
 * Credential source type
 */
export type CredentialSource =
  | "config"
  | "environment"
  | "profile"
  | "default-chain";

/**
 * Credential resolution result
 */
export interface CredentialResolution {
  /** Resolved credentials */
  credentials: AWSCredentials;

  /** Source of credentials */
  source: CredentialSource;

  /** Profile name (if using profile) */
  profile?: string;
}

/**
 * Where the list of enabled regions came from
 */
export type RegionSource = "account-api" | "fallback";

/**
 * Regions enabled for the account
 */
export interface EnabledRegions {
  regions: string[];
  source: RegionSource;
}
