/**
 * Lambda collector: functions
 */

import {
  LambdaClient,
  ListFunctionsCommand,
  ListTagsCommand,
  type FunctionConfiguration,
} from "@aws-sdk/client-lambda";
import type { CollectedRecord } from "../../types/inventory.js";
import { withRetry } from "../utils/retry.js";
import { clientConfig, defineCollector } from "./utils.js";

async function listFunctions(client: LambdaClient): Promise<FunctionConfiguration[]> {
  const functions: FunctionConfiguration[] = [];
  let marker: string | undefined;

  do {
    const response = await withRetry(() =>
      client.send(new ListFunctionsCommand({ Marker: marker }))
    );
    functions.push(...(response.Functions ?? []));
    marker = response.NextMarker;
  } while (marker);

  return functions;
}

export const lambdaCollector = defineCollector("lambda", async (region, context) => {
  const client = new LambdaClient(clientConfig(region, context));
  const records: CollectedRecord[] = [];

  for (const fn of await listFunctions(client)) {
    if (!fn.FunctionName || !fn.FunctionArn) continue;

    const { Tags } = await client.send(new ListTagsCommand({ Resource: fn.FunctionArn }));

    records.push({
      service: "lambda",
      type: "function",
      id: fn.FunctionName,
      arn: fn.FunctionArn,
      name: fn.FunctionName,
      region,
      details: {
        runtime: fn.Runtime,
        handler: fn.Handler,
        memorySize: fn.MemorySize,
        timeout: fn.Timeout,
        packageType: fn.PackageType,
        lastModified: fn.LastModified,
      },
      tags: { ...Tags },
    });
  }

  return records;
});
