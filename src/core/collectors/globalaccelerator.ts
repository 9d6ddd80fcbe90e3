/**
 * Global Accelerator collector (global, us-west-2 control plane)
 */

import {
  GlobalAcceleratorClient,
  ListAcceleratorsCommand,
  ListTagsForResourceCommand,
  type Accelerator,
} from "@aws-sdk/client-global-accelerator";
import type { CollectedRecord } from "../../types/inventory.js";
import { withRetry } from "../utils/retry.js";
import { clientConfig, defineCollector, isoDate, tagsToRecord } from "./utils.js";

async function listAccelerators(
  client: GlobalAcceleratorClient
): Promise<Accelerator[]> {
  const accelerators: Accelerator[] = [];
  let nextToken: string | undefined;

  do {
    const response = await withRetry(() =>
      client.send(new ListAcceleratorsCommand({ NextToken: nextToken }))
    );
    accelerators.push(...(response.Accelerators ?? []));
    nextToken = response.NextToken;
  } while (nextToken);

  return accelerators;
}

export const globalacceleratorCollector = defineCollector(
  "globalaccelerator",
  async (region, context) => {
    const client = new GlobalAcceleratorClient(clientConfig(region, context));
    const records: CollectedRecord[] = [];

    for (const accelerator of await listAccelerators(client)) {
      const arn = accelerator.AcceleratorArn;
      if (!arn) continue;

      const { Tags } = await client.send(
        new ListTagsForResourceCommand({ ResourceArn: arn })
      );

      records.push({
        service: "globalaccelerator",
        type: "accelerator",
        id: arn.split("/").pop() || arn,
        arn,
        name: accelerator.Name,
        region,
        details: {
          status: accelerator.Status,
          enabled: accelerator.Enabled,
          dnsName: accelerator.DnsName,
          ipAddressType: accelerator.IpAddressType,
          createdTime: isoDate(accelerator.CreatedTime),
        },
        tags: tagsToRecord(Tags),
      });
    }

    return records;
  }
);
