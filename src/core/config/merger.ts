/**
 * Environment configuration merger
 */

import type { EnvironmentConfig, InventoryConfig } from '../../types/config.js';

export type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects
 *
 * Nested objects are merged; arrays and scalars from source replace target.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      // Both are objects, merge recursively
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      // Override with source value
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Merge environment-specific configuration
 */
export function mergeEnvironment(
  baseConfig: InventoryConfig,
  environment?: string
): PlainObject {
  const { environments, ...baseWithoutEnv } = baseConfig;

  // If no environment specified, return base config
  if (!environment) {
    return { ...baseWithoutEnv };
  }

  const envConfig: EnvironmentConfig | undefined = environments?.[environment];

  if (!envConfig) {
    const available = Object.keys(environments ?? {});
    throw new Error(
      `Environment "${environment}" not found in config. Available environments: ${
        available.length > 0 ? available.join(', ') : '(none)'
      }`
    );
  }

  // Tag filters are replaced, not merged key by key
  const { tags, ...envWithoutTags } = envConfig;
  const merged = deepMerge(baseWithoutEnv, envWithoutTags);

  return tags ? { ...merged, tags } : merged;
}

/**
 * Apply profile override to credentials
 */
export function applyProfileOverride(
  config: PlainObject,
  profileOverride?: string
): PlainObject {
  if (!profileOverride) {
    return config;
  }

  return {
    ...config,
    credentials: {
      ...(isPlainObject(config.credentials) ? config.credentials : {}),
      profile: profileOverride,
    },
  };
}
