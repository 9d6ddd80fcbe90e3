/**
 * Services command - list what resmap can scan
 */

import { Command } from "commander";
import chalk from "chalk";
import * as logger from "../utils/logger.js";
import { getDefaultCatalog } from "../../core/catalog/index.js";
import type { ServiceDefinition } from "../../types/catalog.js";

interface ServicesOptions {
  json?: boolean;
}

function describeScope(definition: ServiceDefinition): string {
  if (definition.scope === "global") {
    return `global (${definition.controlPlaneRegion})`;
  }
  return definition.regionSelfReporting ? "regional (self-reporting)" : "regional";
}

export function createServicesCommand(): Command {
  return new Command("services")
    .description("List supported services and their scope")
    .option("--json", "Print as JSON")
    .action((options: ServicesOptions) => {
      const definitions = getDefaultCatalog().list();

      if (options.json) {
        console.log(JSON.stringify(definitions, null, 2));
        return;
      }

      logger.section(`Supported services (${definitions.length})`);

      const width = Math.max(...definitions.map((d) => d.id.length));
      for (const definition of definitions) {
        console.log(
          `  ${chalk.cyan(definition.id.padEnd(width))}  ${definition.name.padEnd(28)} ${chalk.gray(
            describeScope(definition)
          )}`
        );
      }
      logger.newline();
    });
}
