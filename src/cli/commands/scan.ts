/**
 * Scan command
 */

import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import ora from "ora";
import cliProgress from "cli-progress";
import * as logger from "../utils/logger.js";
import { loadConfig, type ResolvedConfig } from "../../core/config/index.js";
import {
  createCredentialProvider,
  getAccountAlias,
  getEnabledRegions,
  verifyCredentials,
} from "../../core/aws/index.js";
import { parseTagFilters, runScan } from "../../core/scan/index.js";
import type { ScanPlan, ScanProgressEvent } from "../../core/scan/index.js";
import { defaultOutputPath, exportFile, formatResult } from "../../core/report/index.js";
import type { OutputFormat } from "../../types/config.js";
import type { ScanResult } from "../../types/inventory.js";

/**
 * Scan command options
 */
export interface ScanOptions {
  profile?: string;
  region?: string[];
  service?: string[];
  tag?: string[];
  format?: OutputFormat;
  output?: string;
  workers?: number;
  includeGlobal?: boolean;
  timings?: boolean;
  timeout?: number;
  quiet?: boolean;
  env?: string;
  config?: string;
}

/**
 * Effective run settings after CLI flags are applied over the config
 */
export interface ScanSettings {
  regions: string[];
  services: string[];
  tags: Record<string, string[]>;
  invalidTags: string[];
  concurrency: number;
  includeGlobal: boolean;
  timings: boolean;
  timeout?: number;
  maxAttempts: number;
  format: OutputFormat;
  output?: string;
}

/**
 * Repeatable, comma-separated option values
 */
export function collectList(value: string, previous: string[] = []): string[] {
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return [...previous, ...items];
}

function collectTag(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive number of seconds.");
  }
  return parsed;
}

function parseFormat(value: string): OutputFormat {
  if (value === "json" || value === "csv") {
    return value;
  }
  throw new InvalidArgumentError('Must be "json" or "csv".');
}

/**
 * Apply CLI flags over the loaded config
 *
 * List flags replace the config lists; tag flags replace the config tag
 * filter when at least one of them is valid.
 */
export function resolveScanSettings(config: ResolvedConfig, options: ScanOptions): ScanSettings {
  const { filter, invalid } = parseTagFilters(options.tag ?? []);

  return {
    regions: options.region?.length ? options.region : config.regions ?? [],
    services: options.service?.length ? options.service : config.services ?? [],
    tags: Object.keys(filter).length > 0 ? filter : config.tags ?? {},
    invalidTags: invalid,
    concurrency: options.workers ?? config.concurrency,
    includeGlobal: options.includeGlobal === true || config.includeGlobal,
    timings: options.timings === true || config.timings,
    timeout: options.timeout ?? config.timeout,
    maxAttempts: config.maxAttempts,
    format: options.format ?? config.output.format,
    output: options.output ?? config.output.file,
  };
}

export interface InterruptHandlers {
  /** First interrupt: stop dispatching, let running units finish */
  onCancel: () => void;

  /** Second interrupt: leave immediately */
  onForceExit: () => void;
}

/**
 * SIGINT listener: the first interrupt aborts the controller, the second
 * one forces an exit
 */
export function createInterruptHandler(
  controller: AbortController,
  handlers: InterruptHandlers
): () => void {
  let interrupts = 0;

  return () => {
    interrupts += 1;
    if (interrupts > 1) {
      handlers.onForceExit();
      return;
    }
    handlers.onCancel();
    controller.abort();
  };
}

/**
 * Progress bar position and label for a progress event
 *
 * Skipped units count as done so the bar never moves backwards.
 */
export function progressUpdate(
  event: ScanProgressEvent
): { value: number; current: string } | undefined {
  switch (event.type) {
    case "unit-complete":
      return {
        value: event.completed + event.skipped,
        current: `${event.outcome.unit.service}/${event.outcome.unit.region}`,
      };
    case "unit-skipped":
      return { value: event.completed + event.skipped, current: "cancelled" };
    default:
      return undefined;
  }
}

/**
 * Create scan command
 */
export function createScanCommand(): Command {
  const command = new Command("scan");

  command
    .description("Scan the account and write an inventory report")
    .option("-p, --profile <profile>", "AWS profile name")
    .option("-r, --region <regions>", "Region(s) to scan, repeatable or comma-separated", collectList)
    .option("-s, --service <services>", "Service(s) to scan, repeatable or comma-separated", collectList)
    .option("-t, --tag <Key=Value>", "Keep resources with this tag, repeatable", collectTag)
    .option("-f, --format <format>", "Report format: json or csv", parseFormat)
    .option("-o, --output <path>", "Report file path")
    .option("-w, --workers <count>", "Concurrent work units", parsePositiveInt)
    .option("--include-global", "Scan global services even when --region excludes them")
    .option("--timings", "Record per-service timings")
    .option("--timeout <seconds>", "Stop dispatching new work after this many seconds", parsePositiveNumber)
    .option("-q, --quiet", "Only print the report path and errors")
    .option("-e, --env <environment>", "Environment name (dev, prod, etc.)")
    .option("-c, --config <path>", "Config file path")
    .action(async (options: ScanOptions) => {
      try {
        await scanCommand(options);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(message);
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Scan command handler
 */
async function scanCommand(options: ScanOptions): Promise<void> {
  const quiet = options.quiet === true;

  // Step 1: Load config
  const { config, configPath } = await loadConfig({
    configPath: options.config,
    env: options.env,
    profile: options.profile,
  });
  const settings = resolveScanSettings(config, options);
  logger.debug(`Config file: ${configPath ?? "none"}`);

  for (const entry of settings.invalidTags) {
    logger.warn(`Ignoring tag filter "${entry}" (expected Key=Value)`);
  }

  // Step 2: Verify credentials
  const spinner = quiet ? null : ora("Verifying AWS credentials...").start();
  const credentials = createCredentialProvider(config);

  let accountId: string;
  let accountAlias: string | undefined;
  let enabledRegions: string[];

  try {
    const accountInfo = await verifyCredentials(credentials);
    accountId = accountInfo.accountId;
    accountAlias = await getAccountAlias(credentials);

    if (spinner) spinner.text = "Listing enabled regions...";
    const enabled = await getEnabledRegions(credentials, {
      onFallback: (error) => {
        const reason = error instanceof Error ? error.message : String(error);
        spinner?.warn(`Could not list enabled regions (${reason}), using default regions`);
      },
    });
    enabledRegions = enabled.regions;
    logger.debug(`Enabled regions (${enabled.source}): ${enabledRegions.join(", ")}`);

    spinner?.succeed(`Account ${chalk.cyan(accountAlias ? `${accountId} (${accountAlias})` : accountId)}`);
  } catch (error) {
    spinner?.fail("Credential verification failed");
    throw error;
  }

  const progressBar = quiet
    ? null
    : new cliProgress.SingleBar(
        {
          format: "Progress |" + chalk.cyan("{bar}") + "| {percentage}% | {value}/{total} units | {current}",
          barCompleteChar: "\u2588",
          barIncompleteChar: "\u2591",
          hideCursor: true,
        },
        cliProgress.Presets.shades_classic
      );

  // Step 3: Cancellation (Ctrl-C and timeout)
  const controller = new AbortController();
  const onSigint = createInterruptHandler(controller, {
    onCancel: () => {
      logger.warn("Cancelling: waiting for running work to finish (Ctrl-C again to quit)...");
    },
    onForceExit: () => {
      progressBar?.stop();
      logger.error("Interrupted again, exiting without a report");
      process.exit(130);
    },
  });
  process.on("SIGINT", onSigint);

  const timer = settings.timeout
    ? setTimeout(() => {
        logger.warn(`Timeout of ${settings.timeout}s reached, stopping new work`);
        controller.abort();
      }, settings.timeout * 1000)
    : undefined;
  timer?.unref();

  // Step 4: Scan
  const onPlan = (plan: ScanPlan): void => {
    for (const service of plan.unknownServices) {
      logger.warn(`Unknown service "${service}" skipped (see \`resmap services\`)`);
    }
    for (const region of plan.ignoredRegions) {
      logger.warn(`Region "${region}" is not enabled for this account, skipped`);
    }
    if (!progressBar) {
      return;
    }

    logger.info(
      `Scanning ${plan.services.length} services in ${plan.regions.length} regions (${plan.units.length} units, ${settings.concurrency} workers)`
    );
    progressBar.start(plan.units.length, 0, { current: "" });
  };

  const onProgress = (event: ScanProgressEvent): void => {
    const update = progressUpdate(event);
    if (progressBar && update) {
      progressBar.update(update.value, { current: update.current });
    }
  };

  let result: ScanResult;
  try {
    result = await runScan({
      accountId,
      accountAlias,
      credentials,
      enabledRegions,
      regions: settings.regions,
      services: settings.services,
      includeGlobal: settings.includeGlobal,
      tagFilter: settings.tags,
      concurrency: settings.concurrency,
      maxAttempts: settings.maxAttempts,
      timings: settings.timings,
      signal: controller.signal,
      onPlan,
      onProgress,
    });
  } finally {
    progressBar?.stop();
    process.off("SIGINT", onSigint);
    if (timer) clearTimeout(timer);
  }

  // Step 5: Write report (also after cancellation)
  const outputPath = settings.output ?? defaultOutputPath(accountId, settings.format);
  const writtenPath = await exportFile(formatResult(result, settings.format), outputPath);

  printSummary(result, writtenPath, quiet);

  if (result.metadata.cancelled) {
    process.exitCode = 130;
  }
}

function printSummary(result: ScanResult, reportPath: string, quiet: boolean): void {
  const { metadata, errors } = result;

  if (errors.length > 0) {
    logger.section(`Errors (${errors.length})`);
    for (const error of errors) {
      console.log(
        `  ${chalk.red(`${error.service}/${error.region}`)} ${chalk.gray(`[${error.code}]`)} ${error.message}`
      );
    }
  }

  if (quiet) {
    console.log(reportPath);
    return;
  }

  logger.section("Scan Summary");
  logger.keyValue("Resources", String(metadata.resourceCount));
  logger.keyValue("Services", String(metadata.servicesScanned));
  logger.keyValue("Regions", String(metadata.regionsScanned));
  logger.keyValue("Work units", `${metadata.unitCount - metadata.failedUnitCount - metadata.skippedUnitCount}/${metadata.unitCount} succeeded`);
  if (metadata.excludedCount > 0) {
    logger.keyValue("Excluded defaults", String(metadata.excludedCount));
  }
  if (metadata.outOfScopeCount > 0) {
    logger.keyValue("Outside region filter", String(metadata.outOfScopeCount));
  }
  logger.keyValue("Duration", `${metadata.scanDurationSeconds}s`);

  if (metadata.serviceTimings && metadata.serviceTimings.length > 0) {
    logger.section("Timings");
    const width = Math.max(...metadata.serviceTimings.map((t) => t.service.length));
    for (const timing of metadata.serviceTimings) {
      console.log(
        `  ${timing.service.padEnd(width)}  ${timing.seconds.toFixed(2).padStart(8)}s  ${chalk.gray(
          `${timing.units} units, ${timing.resources} resources`
        )}`
      );
    }
  }

  logger.newline();
  if (metadata.cancelled) {
    logger.warn(`Scan cancelled, ${metadata.skippedUnitCount} units not run. Partial report written.`);
  }
  logger.success(`Report written to ${chalk.cyan(reportPath)}`);
}
