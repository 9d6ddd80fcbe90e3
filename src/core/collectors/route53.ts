/**
 * Route 53 collector (global, us-east-1 control plane)
 */

import {
  Route53Client,
  ListHostedZonesCommand,
  ListTagsForResourceCommand as ListHostedZoneTagsCommand,
  type HostedZone,
} from "@aws-sdk/client-route-53";
import type { CollectedRecord } from "../../types/inventory.js";
import { withRetry } from "../utils/retry.js";
import { clientConfig, defineCollector, tagsToRecord } from "./utils.js";

/**
 * Strip the "/hostedzone/" prefix from a zone ID
 */
export function extractHostedZoneId(zoneId: string): string {
  return zoneId.replace(/^\/hostedzone\//, "");
}

async function listHostedZones(client: Route53Client): Promise<HostedZone[]> {
  const zones: HostedZone[] = [];
  let marker: string | undefined;

  do {
    const response = await withRetry(() =>
      client.send(new ListHostedZonesCommand({ Marker: marker }))
    );
    zones.push(...(response.HostedZones ?? []));
    marker = response.IsTruncated ? response.NextMarker : undefined;
  } while (marker);

  return zones;
}

export const route53Collector = defineCollector(
  "route53",
  async (region, context) => {
    const client = new Route53Client(clientConfig(region, context));
    const records: CollectedRecord[] = [];

    for (const zone of await listHostedZones(client)) {
      if (!zone.Id) continue;

      const zoneId = extractHostedZoneId(zone.Id);
      const { ResourceTagSet } = await client.send(
        new ListHostedZoneTagsCommand({
          ResourceType: "hostedzone",
          ResourceId: zoneId,
        })
      );

      records.push({
        service: "route53",
        type: "hosted-zone",
        id: zoneId,
        arn: `arn:aws:route53:::hostedzone/${zoneId}`,
        name: zone.Name,
        region,
        details: {
          privateZone: zone.Config?.PrivateZone ?? false,
          comment: zone.Config?.Comment,
          recordSetCount: zone.ResourceRecordSetCount,
        },
        tags: tagsToRecord(ResourceTagSet?.Tags),
      });
    }

    return records;
  }
);
