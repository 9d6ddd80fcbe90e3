/**
 * CLI configuration
 */

import { Command } from "commander";
import { createInitCommand } from "./commands/init.js";
import { createScanCommand } from "./commands/scan.js";
import { createServicesCommand } from "./commands/services.js";
import { readFileSync } from "node:fs";
import { join } from "node:path";

/**
 * Get package version
 */
function getVersion(): string {
  try {
    const packageJsonPath = join(__dirname, "../../package.json");
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, "utf-8"));
    if (
      typeof packageJson === "object" &&
      packageJson !== null &&
      "version" in packageJson &&
      typeof packageJson.version === "string"
    ) {
      return packageJson.version;
    }
    return "0.0.0";
  } catch {
    return "0.0.0";
  }
}

/**
 * Create CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("resmap")
    .description("Inventory AWS resources across services and regions")
    .version(getVersion());

  // scan runs when no command is given
  program.addCommand(createScanCommand(), { isDefault: true });
  program.addCommand(createServicesCommand());
  program.addCommand(createInitCommand());

  return program;
}
