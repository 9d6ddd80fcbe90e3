/**
 * AWS integration module
 *
 * Credentials, account identity and region enablement
 */

// Credentials
export {
  getCredentials,
  selectCredentialSource,
  createCredentialProvider,
} from './credentials.js';

// Verification
export {
  verifyCredentials,
  getAccountAlias,
  formatAccountInfo,
} from './verify.js';

// Regions
export {
  getEnabledRegions,
  FALLBACK_REGIONS,
  type GetEnabledRegionsOptions,
} from './regions.js';

// Client creation
export {
  createSTSClient,
  createIAMClient,
  createAccountClient,
  DEFAULT_API_REGION,
  type ClientOptions,
} from './client.js';

// Re-export types
export type {
  AWSCredentials,
  AWSCredentialProvider,
  AWSAccountInfo,
  CredentialSource,
  CredentialResolution,
  EnabledRegions,
} from '../../types/aws.js';
