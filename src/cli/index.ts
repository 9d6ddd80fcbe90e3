#!/usr/bin/env node
import * as logger from './utils/logger.js';
import { createProgram } from './cli.js';

process.env.RESMAP_CLI_MODE = 'true';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
