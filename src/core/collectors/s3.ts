/**
 * S3 collector
 *
 * Buckets are listed per region with the BucketRegion filter; each record
 * carries the region S3 reports for the bucket.
 */

import {
  S3Client,
  ListBucketsCommand,
  GetBucketTaggingCommand,
  type Bucket,
} from "@aws-sdk/client-s3";
import type { CollectedRecord } from "../../types/inventory.js";
import { withRetry } from "../utils/retry.js";
import { clientConfig, defineCollector, isoDate, optionalLookup, tagsToRecord } from "./utils.js";

/**
 * Get bucket tags; a bucket without a tag set, or one whose policy denies
 * the read, has no tags
 */
async function getBucketTags(
  client: S3Client,
  bucketName: string
): Promise<Record<string, string>> {
  const response = await optionalLookup(() =>
    client.send(new GetBucketTaggingCommand({ Bucket: bucketName }))
  );
  return tagsToRecord(response?.TagSet);
}

/**
 * List every bucket located in a region
 */
async function listBuckets(client: S3Client, region: string): Promise<Bucket[]> {
  const buckets: Bucket[] = [];
  let continuationToken: string | undefined;

  do {
    const response = await withRetry(() =>
      client.send(
        new ListBucketsCommand({
          BucketRegion: region,
          MaxBuckets: 1000,
          ContinuationToken: continuationToken,
        })
      )
    );
    buckets.push(...(response.Buckets ?? []));
    continuationToken = response.ContinuationToken;
  } while (continuationToken);

  return buckets;
}

export const s3Collector = defineCollector("s3", async (region, context) => {
  const client = new S3Client(clientConfig(region, context));
  const records: CollectedRecord[] = [];

  for (const bucket of await listBuckets(client, region)) {
    if (!bucket.Name) continue;

    const tags = await getBucketTags(client, bucket.Name);

    records.push({
      service: "s3",
      type: "bucket",
      id: bucket.Name,
      arn: `arn:aws:s3:::${bucket.Name}`,
      name: bucket.Name,
      region: bucket.BucketRegion || region,
      details: {
        creationDate: isoDate(bucket.CreationDate),
      },
      tags,
    });
  }

  return records;
});
