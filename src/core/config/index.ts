/**
 * Config system entry point
 */

import chalk from 'chalk';
import { ZodError } from 'zod';
import type { LoadConfigOptions } from '../../types/config.js';
import { discoverAndLoadConfig, loadConfigFile } from './loader.js';
import { mergeEnvironment, applyProfileOverride } from './merger.js';
import { validateConfig, type ResolvedConfig } from './schema.js';
import { loadEnvFiles } from './env-loader.js';

export interface LoadedConfig {
  config: ResolvedConfig;

  /** Config file the values came from (undefined when none was found) */
  configPath?: string;
}

/**
 * Load and validate resmap configuration
 *
 * A missing config file is not an error: defaults apply. A config path
 * given explicitly must exist.
 *
 * @example
 * ```ts
 * const { config } = await loadConfig({ env: 'prod' });
 * ```
 */
export async function loadConfig(
  options: LoadConfigOptions = {}
): Promise<LoadedConfig> {
  const { configPath, env, profile, cwd = process.cwd() } = options;

  try {
    // Step 0: Load environment variables from .env files
    loadEnvFiles(env, cwd);

    // Step 1: Load config file
    let rawConfig: unknown = {};
    let resolvedConfigPath: string | undefined;

    if (configPath) {
      rawConfig = await loadConfigFile(configPath);
      resolvedConfigPath = configPath;
    } else {
      const result = await discoverAndLoadConfig(cwd);
      if (result) {
        rawConfig = result.config;
        resolvedConfigPath = result.configPath;
      }
    }

    // Step 2: Validate the file as written, then merge the environment
    const baseConfig = validateConfig(rawConfig ?? {});
    const mergedConfig = mergeEnvironment(baseConfig, env);

    // Step 3: Apply profile override and validate the result
    const config = validateConfig(applyProfileOverride(mergedConfig, profile));

    // Log loaded config info (only in CLI mode)
    if (process.env.RESMAP_CLI_MODE === 'true') {
      console.log(
        chalk.gray(` Loaded config from: ${resolvedConfigPath ?? '(none, using defaults)'}`)
      );
      if (env) {
        console.log(chalk.gray(` Environment: ${env}`));
      }
    }

    return { config, configPath: resolvedConfigPath };
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map(
        (issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`
      );
      throw new Error(`Failed to load configuration:\n${issues.join('\n')}`);
    }
    if (error instanceof Error) {
      throw new Error(`Failed to load configuration:\n${error.message}`);
    }
    throw error;
  }
}

export { generateExampleConfig } from './utils.js';
export { findConfigFile, CONFIG_FILE_NAMES } from './loader.js';
export { configSchema, validateConfig, validateConfigSafe } from './schema.js';
export type { ResolvedConfig } from './schema.js';

// Re-export types
export type { InventoryConfig, LoadConfigOptions } from '../../types/config.js';
