/**
 * Init command - Initialize resmap.config.ts
 */

import { Command } from "commander";
import fs from "node:fs";
import path from "node:path";
import chalk from "chalk";
import * as logger from "../utils/logger.js";
import { generateExampleConfig } from "../../core/config/index.js";

interface InitOptions {
  force?: boolean;
  profile?: string;
}

export const CONFIG_FILE_NAME = "resmap.config.ts";

/**
 * Write the example config
 *
 * @returns Path of the written file
 * @throws Error if the file exists and force is not set
 */
export function writeExampleConfig(
  directory: string,
  options: InitOptions = {}
): string {
  const configPath = path.join(directory, CONFIG_FILE_NAME);

  if (fs.existsSync(configPath) && !options.force) {
    throw new Error(
      `${CONFIG_FILE_NAME} already exists. Use --force to overwrite or edit the file manually.`
    );
  }

  fs.writeFileSync(configPath, generateExampleConfig(options.profile), "utf-8");
  return configPath;
}

export function createInitCommand(): Command {
  return new Command("init")
    .description(`Create an example ${CONFIG_FILE_NAME}`)
    .option("-f, --force", "Overwrite existing config file")
    .option("-p, --profile <profile>", "AWS profile to put in the config")
    .action((options: InitOptions) => {
      try {
        writeExampleConfig(process.cwd(), options);
      } catch (error) {
        logger.error(error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
        return;
      }

      logger.success(`Created ${CONFIG_FILE_NAME}`);
      logger.newline();
      console.log(chalk.bold("Next steps:\n"));
      console.log(chalk.dim("  1. Review regions, services and tags in the config"));
      console.log(chalk.dim("  2. Run a scan"));
      console.log(chalk.dim(`     ${chalk.cyan("npx resmap scan")}\n`));
    });
}
