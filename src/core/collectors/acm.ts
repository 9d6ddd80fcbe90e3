/**
 * ACM collector
 */

import {
  ACMClient,
  ListCertificatesCommand,
  ListTagsForCertificateCommand,
  type CertificateSummary,
} from "@aws-sdk/client-acm";
import type { CollectedRecord } from "../../types/inventory.js";
import { withRetry } from "../utils/retry.js";
import { clientConfig, defineCollector, isoDate, tagsToRecord } from "./utils.js";

async function listCertificates(client: ACMClient): Promise<CertificateSummary[]> {
  const certificates: CertificateSummary[] = [];
  let nextToken: string | undefined;

  do {
    const response = await withRetry(() =>
      client.send(new ListCertificatesCommand({ NextToken: nextToken }))
    );
    certificates.push(...(response.CertificateSummaryList ?? []));
    nextToken = response.NextToken;
  } while (nextToken);

  return certificates;
}

export const acmCollector = defineCollector("acm", async (region, context) => {
  const client = new ACMClient(clientConfig(region, context));
  const records: CollectedRecord[] = [];

  for (const certificate of await listCertificates(client)) {
    const arn = certificate.CertificateArn;
    if (!arn) continue;

    const { Tags } = await client.send(
      new ListTagsForCertificateCommand({ CertificateArn: arn })
    );

    records.push({
      service: "acm",
      type: "certificate",
      id: arn.split("/").pop() || arn,
      arn,
      name: certificate.DomainName,
      region,
      details: {
        domainName: certificate.DomainName,
        status: certificate.Status,
        type: certificate.Type,
        inUse: certificate.InUse,
        notAfter: isoDate(certificate.NotAfter),
      },
      tags: tagsToRecord(Tags),
    });
  }

  return records;
});
