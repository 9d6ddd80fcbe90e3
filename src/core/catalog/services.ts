/**
 * Bundled service definitions
 *
 * Global services and their control-plane regions:
 * https://docs.aws.amazon.com/whitepapers/latest/aws-fault-isolation-boundaries/global-services.html
 */

import type { ServiceDefinition } from "../../types/catalog.js";

export const SERVICE_DEFINITIONS: readonly ServiceDefinition[] = [
  // Compute
  { id: "lambda", name: "AWS Lambda", category: "compute", scope: "regional" },

  // Storage
  {
    id: "s3",
    name: "Amazon S3",
    category: "storage",
    scope: "regional",
    regionSelfReporting: true,
  },

  // Database
  { id: "dynamodb", name: "Amazon DynamoDB", category: "database", scope: "regional" },

  // Networking
  {
    id: "cloudfront",
    name: "Amazon CloudFront",
    category: "networking",
    scope: "global",
    controlPlaneRegion: "us-east-1",
  },
  {
    id: "route53",
    name: "Amazon Route 53",
    category: "networking",
    scope: "global",
    controlPlaneRegion: "us-east-1",
  },
  {
    id: "globalaccelerator",
    name: "AWS Global Accelerator",
    category: "networking",
    scope: "global",
    controlPlaneRegion: "us-west-2",
  },

  // Security
  {
    id: "iam",
    name: "AWS IAM",
    category: "security",
    scope: "global",
    controlPlaneRegion: "us-east-1",
  },
  { id: "kms", name: "AWS KMS", category: "security", scope: "regional" },
  { id: "acm", name: "AWS Certificate Manager", category: "security", scope: "regional" },

  // Integration
  { id: "events", name: "Amazon EventBridge", category: "integration", scope: "regional" },
  { id: "sns", name: "Amazon SNS", category: "integration", scope: "regional" },
  { id: "sqs", name: "Amazon SQS", category: "integration", scope: "regional" },
];
