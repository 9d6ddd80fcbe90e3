/**
 * Region enablement lookup
 */

import { ListRegionsCommand, type RegionOptStatus } from '@aws-sdk/client-account';
import type { AWSCredentialProvider, EnabledRegions } from '../../types/aws.js';
import { createAccountClient, type ClientOptions } from './client.js';
import { withRetry } from '../utils/retry.js';

/**
 * Regions enabled by default on every account
 */
export const FALLBACK_REGIONS: readonly string[] = [
  'us-east-1',
  'us-east-2',
  'us-west-1',
  'us-west-2',
  'eu-west-1',
  'eu-west-2',
  'eu-west-3',
  'eu-central-1',
  'eu-north-1',
  'ap-northeast-1',
  'ap-northeast-2',
  'ap-northeast-3',
  'ap-southeast-1',
  'ap-southeast-2',
  'ap-south-1',
  'sa-east-1',
  'ca-central-1',
];

const ENABLED_STATUSES: RegionOptStatus[] = ['ENABLED', 'ENABLED_BY_DEFAULT'];

export interface GetEnabledRegionsOptions extends ClientOptions {
  /** Called with the failure when the fallback list is used */
  onFallback?: (error: unknown) => void;
}

/**
 * List the regions enabled for the account
 *
 * Falls back to FALLBACK_REGIONS when the Account API cannot be queried.
 */
export async function getEnabledRegions(
  credentials: AWSCredentialProvider,
  options: GetEnabledRegionsOptions = {}
): Promise<EnabledRegions> {
  const { onFallback, ...clientOptions } = options;
  const client = createAccountClient(credentials, clientOptions);
  const regions: string[] = [];

  try {
    let nextToken: string | undefined;

    do {
      const response = await withRetry(() =>
        client.send(
          new ListRegionsCommand({
            RegionOptStatusContains: ENABLED_STATUSES,
            NextToken: nextToken,
          })
        )
      );

      for (const region of response.Regions ?? []) {
        if (region.RegionName) {
          regions.push(region.RegionName);
        }
      }
      nextToken = response.NextToken;
    } while (nextToken);
  } catch (error) {
    onFallback?.(error);
    return { regions: [...FALLBACK_REGIONS], source: 'fallback' };
  }

  if (regions.length === 0) {
    onFallback?.(new Error('Account API returned no enabled regions'));
    return { regions: [...FALLBACK_REGIONS], source: 'fallback' };
  }

  return { regions: [...new Set(regions)].sort(), source: 'account-api' };
}
