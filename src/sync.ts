#!/usr/bin/env node
import { Command } from "commander";
import { loadAppConfig } from "./config/app-config";
import { SyncRunnerService } from "./services/sync-runner.service";
import logger from "./utils/logger";

export interface SyncCliOptions {
  configFile?: string;
  dryRun?: boolean;
  syncSet?: string;
}

interface SyncCommandFlags {
  dryRun?: boolean;
  set?: string;
}

/**
 * One run of every sync set (or `syncSet`). Resolves to the process exit
 * code: 1 when any set reports errors.
 */
export const runSync = async (
  options: SyncCliOptions,
  runner: SyncRunnerService = new SyncRunnerService({
    loadConfig: () => loadAppConfig(options.configFile),
  }),
): Promise<number> => {
  const report = await runner.run({ dryRun: options.dryRun, syncSet: options.syncSet });

  let failed = false;
  for (const set of report.sets) {
    const { created, updated, deleted, errors } = set.results;
    logger.info(
      `Sync set ${set.name}: ${created} added, ${updated} updated, ${deleted} removed`,
      { runId: report.runId, dryRun: report.dryRun },
    );
    for (const error of errors) {
      failed = true;
      logger.error(`Sync set ${set.name} failed: ${error}`);
    }
  }

  return failed ? 1 : 0;
};

export const createProgram = (
  execute: (options: SyncCliOptions) => Promise<void>,
): Command => {
  const program = new Command("directory-sync");

  program
    .description("Reconcile the source directory into the destination directory")
    .argument("[configFile]", "sync configuration file (defaults to CONFIG_PATH)")
    .option("--dry-run", "report the planned changes without applying them")
    .option("--set <name>", "run only the named sync set")
    .action(async (configFile: string | undefined) => {
      const flags = program.opts<SyncCommandFlags>();
      await execute({ configFile, dryRun: flags.dryRun, syncSet: flags.set });
    });

  return program;
};

if (require.main === module) {
  createProgram(async (options) => {
    process.exitCode = await runSync(options);
  })
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      logger.error("Sync run failed", {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exitCode = 1;
    });
}
