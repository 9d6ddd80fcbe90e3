/**
 * DynamoDB collector: tables
 */

import {
  DynamoDBClient,
  ListTablesCommand,
  DescribeTableCommand,
  ListTagsOfResourceCommand,
} from "@aws-sdk/client-dynamodb";
import type { CollectedRecord } from "../../types/inventory.js";
import { withRetry } from "../utils/retry.js";
import { clientConfig, defineCollector, isoDate, tagsToRecord } from "./utils.js";

async function listTableNames(client: DynamoDBClient): Promise<string[]> {
  const names: string[] = [];
  let startTableName: string | undefined;

  do {
    const response = await withRetry(() =>
      client.send(new ListTablesCommand({ ExclusiveStartTableName: startTableName }))
    );
    names.push(...(response.TableNames ?? []));
    startTableName = response.LastEvaluatedTableName;
  } while (startTableName);

  return names;
}

export const dynamodbCollector = defineCollector(
  "dynamodb",
  async (region, context) => {
    const client = new DynamoDBClient(clientConfig(region, context));
    const records: CollectedRecord[] = [];

    for (const tableName of await listTableNames(client)) {
      const { Table } = await client.send(
        new DescribeTableCommand({ TableName: tableName })
      );
      const arn = Table?.TableArn;

      const tags = arn
        ? tagsToRecord(
            (await client.send(new ListTagsOfResourceCommand({ ResourceArn: arn }))).Tags
          )
        : {};

      records.push({
        service: "dynamodb",
        type: "table",
        id: tableName,
        arn,
        name: tableName,
        region,
        details: {
          status: Table?.TableStatus,
          itemCount: Table?.ItemCount,
          sizeBytes: Table?.TableSizeBytes,
          billingMode: Table?.BillingModeSummary?.BillingMode,
          creationDate: isoDate(Table?.CreationDateTime),
        },
        tags,
      });
    }

    return records;
  }
);
