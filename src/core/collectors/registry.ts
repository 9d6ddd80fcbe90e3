/**
 * Collector registry
 * Maps service identifiers to the collector that enumerates them
 */

import type { Collector } from "../../types/inventory.js";
import { acmCollector } from "./acm.js";
import { cloudfrontCollector } from "./cloudfront.js";
import { dynamodbCollector } from "./dynamodb.js";
import { eventsCollector } from "./events.js";
import { globalacceleratorCollector } from "./globalaccelerator.js";
import { iamCollector } from "./iam.js";
import { kmsCollector } from "./kms.js";
import { lambdaCollector } from "./lambda.js";
import { route53Collector } from "./route53.js";
import { s3Collector } from "./s3.js";
import { snsCollector } from "./sns.js";
import { sqsCollector } from "./sqs.js";

export class CollectorRegistry {
  private readonly collectors = new Map<string, Collector>();

  constructor(collectors: readonly Collector[] = []) {
    collectors.forEach((collector) => this.register(collector));
  }

  /**
   * Register a collector under its service identifier
   *
   * @throws Error if the service already has a collector
   */
  register(collector: Collector): this {
    if (this.collectors.has(collector.service)) {
      throw new Error(`Collector already registered for service: ${collector.service}`);
    }
    this.collectors.set(collector.service, collector);
    return this;
  }

  get(service: string): Collector | undefined {
    return this.collectors.get(service);
  }

  has(service: string): boolean {
    return this.collectors.has(service);
  }

  services(): string[] {
    return [...this.collectors.keys()].sort();
  }
}

/**
 * Collectors shipped with resmap
 */
export const BUNDLED_COLLECTORS: readonly Collector[] = [
  acmCollector,
  cloudfrontCollector,
  dynamodbCollector,
  eventsCollector,
  globalacceleratorCollector,
  iamCollector,
  kmsCollector,
  lambdaCollector,
  route53Collector,
  s3Collector,
  snsCollector,
  sqsCollector,
];

/**
 * Registry holding every bundled collector
 */
export function createDefaultRegistry(): CollectorRegistry {
  return new CollectorRegistry(BUNDLED_COLLECTORS);
}
