/**
 * SNS collector: topics
 */

import {
  SNSClient,
  ListTopicsCommand,
  ListTagsForResourceCommand,
  type Topic,
} from "@aws-sdk/client-sns";
import type { CollectedRecord } from "../../types/inventory.js";
import { withRetry } from "../utils/retry.js";
import { clientConfig, defineCollector, tagsToRecord } from "./utils.js";

async function listTopics(client: SNSClient): Promise<Topic[]> {
  const topics: Topic[] = [];
  let nextToken: string | undefined;

  do {
    const response = await withRetry(() =>
      client.send(new ListTopicsCommand({ NextToken: nextToken }))
    );
    topics.push(...(response.Topics ?? []));
    nextToken = response.NextToken;
  } while (nextToken);

  return topics;
}

export const snsCollector = defineCollector("sns", async (region, context) => {
  const client = new SNSClient(clientConfig(region, context));
  const records: CollectedRecord[] = [];

  for (const topic of await listTopics(client)) {
    const arn = topic.TopicArn;
    if (!arn) continue;

    const topicName = arn.split(":").pop() || arn;
    const { Tags } = await client.send(
      new ListTagsForResourceCommand({ ResourceArn: arn })
    );

    records.push({
      service: "sns",
      type: "topic",
      id: topicName,
      arn,
      name: topicName,
      region,
      details: {
        fifo: topicName.endsWith(".fifo"),
      },
      tags: tagsToRecord(Tags),
    });
  }

  return records;
});
