/**
 * KMS collector: keys and aliases
 *
 * AWS-managed keys and aliases are returned as well; the aggregator's
 * exclusion rules drop them. Keys whose metadata or tags cannot be read are
 * still reported.
 */

import {
  KMSClient,
  ListKeysCommand,
  ListAliasesCommand,
  DescribeKeyCommand,
  ListResourceTagsCommand,
  type KeyListEntry,
  type AliasListEntry,
} from "@aws-sdk/client-kms";
import type { CollectedRecord } from "../../types/inventory.js";
import { withRetry } from "../utils/retry.js";
import { clientConfig, defineCollector, isoDate, optionalLookup } from "./utils.js";

async function listKeys(client: KMSClient): Promise<KeyListEntry[]> {
  const keys: KeyListEntry[] = [];
  let marker: string | undefined;

  do {
    const response = await withRetry(() =>
      client.send(new ListKeysCommand({ Marker: marker }))
    );
    keys.push(...(response.Keys ?? []));
    marker = response.Truncated ? response.NextMarker : undefined;
  } while (marker);

  return keys;
}

async function listAliases(client: KMSClient): Promise<AliasListEntry[]> {
  const aliases: AliasListEntry[] = [];
  let marker: string | undefined;

  do {
    const response = await withRetry(() =>
      client.send(new ListAliasesCommand({ Marker: marker }))
    );
    aliases.push(...(response.Aliases ?? []));
    marker = response.Truncated ? response.NextMarker : undefined;
  } while (marker);

  return aliases;
}

/**
 * KMS tags use TagKey/TagValue instead of Key/Value
 */
async function getKeyTags(
  client: KMSClient,
  keyId: string
): Promise<Record<string, string>> {
  const { Tags } = await client.send(new ListResourceTagsCommand({ KeyId: keyId }));
  const tags: Record<string, string> = {};

  for (const tag of Tags ?? []) {
    if (tag.TagKey !== undefined) {
      tags[tag.TagKey] = tag.TagValue ?? "";
    }
  }

  return tags;
}

export const kmsCollector = defineCollector("kms", async (region, context) => {
  const client = new KMSClient(clientConfig(region, context));
  const records: CollectedRecord[] = [];

  for (const key of await listKeys(client)) {
    if (!key.KeyId) continue;

    const keyId = key.KeyId;
    const described = await optionalLookup(() =>
      client.send(new DescribeKeyCommand({ KeyId: keyId }))
    );
    const metadata = described?.KeyMetadata;
    const keyManager = metadata?.KeyManager;
    const tags =
      keyManager === "CUSTOMER"
        ? (await optionalLookup(() => getKeyTags(client, keyId))) ?? {}
        : {};

    records.push({
      service: "kms",
      type: "key",
      id: key.KeyId,
      arn: key.KeyArn,
      name: metadata?.Description || undefined,
      region,
      details: {
        keyManager,
        keyState: metadata?.KeyState,
        keyUsage: metadata?.KeyUsage,
        keySpec: metadata?.KeySpec,
        creationDate: isoDate(metadata?.CreationDate),
      },
      tags,
    });
  }

  for (const alias of await listAliases(client)) {
    // Aliases without a target key name nothing
    if (!alias.AliasName || !alias.TargetKeyId) continue;

    records.push({
      service: "kms",
      type: "alias",
      id: alias.AliasName,
      arn: alias.AliasArn,
      name: alias.AliasName,
      region,
      details: {
        targetKeyId: alias.TargetKeyId,
      },
      tags: {},
    });
  }

  return records;
});
