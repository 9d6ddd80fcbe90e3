/**
 * Config file loader using jiti for TypeScript runtime execution
 */

import jiti from "jiti";
import { existsSync } from "node:fs";
import { resolve, join, dirname } from "node:path";

/**
 * Config file names to search for (in order of priority)
 */
export const CONFIG_FILE_NAMES = [
  "resmap.config.ts",
  "resmap.config.js",
  "resmap.config.mjs",
  "resmap.config.cjs",
] as const;

/**
 * Find config file in directory and parent directories
 */
export function findConfigFile(
  startDir: string = process.cwd()
): string | null {
  let currentDir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = join(currentDir, fileName);
      if (existsSync(configPath)) {
        return configPath;
      }
    }

    // Move up to parent directory
    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
}

/**
 * Unwrap default exports and config factories
 */
function resolveExport(configModule: unknown): unknown {
  let value = configModule;

  if (
    value !== null &&
    typeof value === "object" &&
    "default" in value
  ) {
    value = value.default;
  }

  if (typeof value === "function") {
    value = value();
  }

  return value;
}

/**
 * Load config file using jiti
 *
 * The result is not validated yet; see validateConfig.
 */
export async function loadConfigFile(configPath: string): Promise<unknown> {
  const absoluteConfigPath = resolve(configPath);

  if (!existsSync(absoluteConfigPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  try {
    // The first argument must be an absolute file path (not a directory)
    const jitiInstance = jiti(__filename, {
      interopDefault: true,
      requireCache: false,
      esmResolve: true,
    });

    const configModule: unknown = jitiInstance(absoluteConfigPath);

    return await resolveExport(configModule);
  } catch (error) {
    if (error instanceof Error) {
      throw new Error(
        `Failed to load config file: ${configPath}\n${error.message}`
      );
    }
    throw error;
  }
}

/**
 * Discover and load config file
 *
 * @returns null when no config file exists in startDir or its parents
 */
export async function discoverAndLoadConfig(
  startDir?: string
): Promise<{ config: unknown; configPath: string } | null> {
  const configPath = findConfigFile(startDir);

  if (!configPath) {
    return null;
  }

  const config = await loadConfigFile(configPath);

  return {
    config,
    configPath,
  };
}
