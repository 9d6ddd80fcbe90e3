/**
 * CloudFront collector (global, us-east-1 control plane)
 */

import {
  CloudFrontClient,
  ListDistributionsCommand,
  ListTagsForResourceCommand,
  type DistributionSummary,
} from "@aws-sdk/client-cloudfront";
import type { CollectedRecord } from "../../types/inventory.js";
import { withRetry } from "../utils/retry.js";
import { clientConfig, defineCollector, nameFromTags, tagsToRecord } from "./utils.js";

async function listDistributions(
  client: CloudFrontClient
): Promise<DistributionSummary[]> {
  const distributions: DistributionSummary[] = [];
  let marker: string | undefined;

  do {
    const { DistributionList } = await withRetry(() =>
      client.send(new ListDistributionsCommand({ Marker: marker }))
    );
    distributions.push(...(DistributionList?.Items ?? []));
    marker = DistributionList?.IsTruncated ? DistributionList.NextMarker : undefined;
  } while (marker);

  return distributions;
}

export const cloudfrontCollector = defineCollector(
  "cloudfront",
  async (region, context) => {
    const client = new CloudFrontClient(clientConfig(region, context));
    const records: CollectedRecord[] = [];

    for (const dist of await listDistributions(client)) {
      if (!dist.Id) continue;

      const arn = dist.ARN || `arn:aws:cloudfront::${context.accountId}:distribution/${dist.Id}`;
      const { Tags } = await client.send(
        new ListTagsForResourceCommand({ Resource: arn })
      );
      const tags = tagsToRecord(Tags?.Items);

      records.push({
        service: "cloudfront",
        type: "distribution",
        id: dist.Id,
        arn,
        name: nameFromTags(tags, dist.Comment || dist.DomainName),
        region,
        details: {
          domainName: dist.DomainName,
          status: dist.Status,
          enabled: dist.Enabled,
          aliases: dist.Aliases?.Items ?? [],
          priceClass: dist.PriceClass,
        },
        tags,
      });
    }

    return records;
  }
);
