/**
 * EventBridge collector: event buses
 */

import {
  EventBridgeClient,
  ListEventBusesCommand,
  ListTagsForResourceCommand,
  type EventBus,
} from "@aws-sdk/client-eventbridge";
import type { CollectedRecord } from "../../types/inventory.js";
import { withRetry } from "../utils/retry.js";
import { clientConfig, defineCollector, isoDate, tagsToRecord } from "./utils.js";

async function listEventBuses(client: EventBridgeClient): Promise<EventBus[]> {
  const buses: EventBus[] = [];
  let nextToken: string | undefined;

  do {
    const response = await withRetry(() =>
      client.send(new ListEventBusesCommand({ NextToken: nextToken }))
    );
    buses.push(...(response.EventBuses ?? []));
    nextToken = response.NextToken;
  } while (nextToken);

  return buses;
}

export const eventsCollector = defineCollector("events", async (region, context) => {
  const client = new EventBridgeClient(clientConfig(region, context));
  const records: CollectedRecord[] = [];

  for (const bus of await listEventBuses(client)) {
    if (!bus.Name || !bus.Arn) continue;

    const { Tags } = await client.send(
      new ListTagsForResourceCommand({ ResourceARN: bus.Arn })
    );

    records.push({
      service: "events",
      type: "event-bus",
      id: bus.Name,
      arn: bus.Arn,
      name: bus.Name,
      region,
      details: {
        description: bus.Description,
        creationTime: isoDate(bus.CreationTime),
      },
      tags: tagsToRecord(Tags),
    });
  }

  return records;
});
