/**
 * Environment variables loader
 * Loads .env files before the config file runs, so that
 * resmap.config.ts can read AWS_PROFILE and friends from process.env
 */

import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'fs';
import { resolve } from 'path';
import chalk from 'chalk';

export interface EnvFileEntry {
  path: string;
  exists: boolean;
  /** Higher number = higher priority */
  priority: number;
}

/**
 * .env files for an environment, highest priority first
 */
function envFileNames(environment?: string): string[] {
  return [
    ...(environment ? [`.env.${environment}.local`, `.env.${environment}`] : []),
    '.env.local',
    '.env',
  ];
}

/**
 * Get the list of .env files that would be loaded for an environment
 */
export function getEnvFilePaths(
  environment?: string,
  configDir: string = process.cwd()
): EnvFileEntry[] {
  const names = envFileNames(environment);

  return names.map((file, index) => {
    const path = resolve(configDir, file);
    return {
      path,
      exists: existsSync(path),
      priority: names.length - index,
    };
  });
}

/**
 * Load environment variables based on environment name
 *
 * Priority (highest to lowest):
 * 1. .env.{environment}.local  (e.g., .env.prod.local)
 * 2. .env.{environment}         (e.g., .env.prod)
 * 3. .env.local
 * 4. .env
 *
 * @returns Paths of the files that were loaded, highest priority first
 *
 * @example
 * ```ts
 * loadEnvFiles('prod');
 * // Loads: .env.prod.local > .env.prod > .env.local > .env
 * ```
 */
export function loadEnvFiles(
  environment?: string,
  configDir: string = process.cwd()
): string[] {
  const entries = getEnvFilePaths(environment, configDir);

  // Lowest priority first; later files override earlier ones
  const loaded = [...entries]
    .reverse()
    .filter((entry) => entry.exists)
    .map((entry) => {
      dotenvConfig({ path: entry.path, override: true });
      return entry.path;
    });

  if (environment && !entries.slice(0, 2).some((entry) => entry.exists)) {
    console.log(
      chalk.yellow(`  ⚠ Warning: .env.${environment} file not found. Using values from the config file`)
    );
  }

  if (process.env.RESMAP_DEBUG === 'true' && loaded.length > 0) {
    console.log(chalk.gray(`[resmap] Loaded environment files: ${[...loaded].reverse().join(', ')}`));
  }

  return loaded.reverse();
}
