/**
 * Zod schemas for resmap configuration validation
 */

import { z } from "zod";

const REGION_PATTERN = /^[a-z]{2}(-[a-z]+)+-\d+$/;

/**
 * AWS credentials schema
 */
const awsCredentialsSchema = z
  .object({
    profile: z.string().optional(),
    accessKeyId: z.string().optional(),
    secretAccessKey: z.string().optional(),
    sessionToken: z.string().optional(),
  })
  .optional();

const regionsSchema = z
  .array(
    z
      .string()
      .regex(REGION_PATTERN, "Must be a valid AWS region (e.g., us-east-1)")
  )
  .optional();

const servicesSchema = z
  .array(z.string().min(1, "Service name cannot be empty"))
  .optional();

/**
 * Tag filter schema: tag key to accepted values
 */
const tagsSchema = z
  .record(
    z.string().min(1, "Tag key cannot be empty"),
    z.array(z.string()).min(1, "Each tag key needs at least one value")
  )
  .optional();

const concurrencySchema = z
  .number()
  .int("Concurrency must be an integer")
  .min(1, "Concurrency must be at least 1")
  .max(200, "Concurrency must be at most 200");

/**
 * Report output schema
 */
const outputSchema = z.object({
  format: z.enum(["json", "csv"]).default("json"),
  file: z.string().min(1, "Output file cannot be empty").optional(),
});

/**
 * Environment override schema
 */
const environmentSchema = z.object({
  credentials: awsCredentialsSchema,
  regions: regionsSchema,
  services: servicesSchema,
  tags: tagsSchema,
  concurrency: concurrencySchema.optional(),
  includeGlobal: z.boolean().optional(),
  output: outputSchema.partial().optional(),
});

/**
 * Main resmap configuration schema
 */
export const configSchema = z.object({
  credentials: awsCredentialsSchema,
  regions: regionsSchema,
  services: servicesSchema,
  tags: tagsSchema,
  concurrency: concurrencySchema.default(40),
  includeGlobal: z.boolean().default(false),
  timeout: z.number().positive("Timeout must be positive").optional(),
  maxAttempts: z.number().int().min(1).max(10).default(5),
  timings: z.boolean().default(false),
  output: outputSchema.default({}),
  environments: z.record(z.string(), environmentSchema).optional(),
});

/**
 * Configuration after validation, with defaults applied
 */
export type ResolvedConfig = z.infer<typeof configSchema>;

/**
 * Validate config and return typed result
 */
export function validateConfig(config: unknown): ResolvedConfig {
  return configSchema.parse(config);
}

/**
 * Validate config with safe parsing (returns result object)
 */
export function validateConfigSafe(config: unknown) {
  return configSchema.safeParse(config);
}

