/**
 * SQS collector: queues
 */

import {
  SQSClient,
  ListQueuesCommand,
  ListQueueTagsCommand,
} from "@aws-sdk/client-sqs";
import type { CollectedRecord } from "../../types/inventory.js";
import { withRetry } from "../utils/retry.js";
import { clientConfig, defineCollector } from "./utils.js";

async function listQueueUrls(client: SQSClient): Promise<string[]> {
  const urls: string[] = [];
  let nextToken: string | undefined;

  do {
    const response = await withRetry(() =>
      client.send(new ListQueuesCommand({ NextToken: nextToken, MaxResults: 1000 }))
    );
    urls.push(...(response.QueueUrls ?? []));
    nextToken = response.NextToken;
  } while (nextToken);

  return urls;
}

export const sqsCollector = defineCollector("sqs", async (region, context) => {
  const client = new SQSClient(clientConfig(region, context));
  const records: CollectedRecord[] = [];

  for (const queueUrl of await listQueueUrls(client)) {
    const queueName = queueUrl.split("/").pop() || queueUrl;
    const { Tags } = await client.send(new ListQueueTagsCommand({ QueueUrl: queueUrl }));

    records.push({
      service: "sqs",
      type: "queue",
      id: queueName,
      arn: `arn:aws:sqs:${region}:${context.accountId}:${queueName}`,
      name: queueName,
      region,
      details: {
        url: queueUrl,
        fifo: queueName.endsWith(".fifo"),
      },
      tags: { ...Tags },
    });
  }

  return records;
});
