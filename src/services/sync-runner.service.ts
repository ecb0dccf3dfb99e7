import { v4 as uuidv4 } from "uuid";
import { loadAppConfig } from "../config/app-config";
import { config as envConfig } from "../config/config";
import { Destination, Source } from "../connectors/base-connector";
import { newDestination, newSource } from "../connectors/connector.factory";
import { AppError } from "../middleware/error.middleware";
import {
  ChangeResults,
  failedChangeResults,
} from "../models/change-set.model";
import { EventLogEntry } from "../models/event-log.model";
import {
  AppConfig,
  DestinationConfig,
  SourceConfig,
} from "../models/sync-config.model";
import { SyncRequest } from "../schemas/request.schemas";
import defaultLogger, { Logger } from "../utils/logger";
import { EventLog } from "./event-log.service";
import { ReconciliationService } from "./reconciliation.service";

export interface SyncSetReport {
  name: string;
  results: ChangeResults;
  events: EventLogEntry[];
}

export interface SyncRunReport {
  runId: string;
  dryRun: boolean;
  startedAt: string;
  finishedAt: string;
  sets: SyncSetReport[];
}

export interface SyncRunnerDependencies {
  loadConfig: () => AppConfig;
  createSource: (config: SourceConfig, logger: Logger) => Source;
  createDestination: (config: DestinationConfig, logger: Logger) => Destination;
  /** Environment override of the config file's dry-run flag */
  dryRunOverride?: boolean;
  logger: Logger;
}

/**
 * Runs every configured sync set (or one of them) through the
 * reconciliation pass. One run at a time per process.
 */
export class SyncRunnerService {
  private readonly deps: SyncRunnerDependencies;
  private readonly reconciliation: ReconciliationService;
  private running = false;
  private lastRun: SyncRunReport | null = null;

  constructor(deps: Partial<SyncRunnerDependencies> = {}) {
    this.deps = {
      loadConfig: () => loadAppConfig(),
      createSource: newSource,
      createDestination: newDestination,
      dryRunOverride: envConfig.DRY_RUN,
      logger: defaultLogger,
      ...deps,
    };
    this.reconciliation = new ReconciliationService(this.deps.logger);
  }

  get isRunning(): boolean {
    return this.running;
  }

  getLastRun(): SyncRunReport | null {
    return this.lastRun;
  }

  async run(request: SyncRequest = {}): Promise<SyncRunReport> {
    if (this.running) {
      throw new AppError(409, "A sync run is already in progress");
    }

    this.running = true;
    try {
      const report = await this.execute(request);
      this.lastRun = report;
      return report;
    } finally {
      this.running = false;
    }
  }

  private async execute(request: SyncRequest): Promise<SyncRunReport> {
    const { logger } = this.deps;
    const runId = uuidv4();
    const startedAt = new Date().toISOString();

    const appConfig = this.deps.loadConfig();
    const dryRun =
      request.dryRun ?? this.deps.dryRunOverride ?? appConfig.runtime.dryRunMode;

    const syncSets = request.syncSet
      ? appConfig.syncSets.filter((set) => set.name === request.syncSet)
      : appConfig.syncSets;
    if (syncSets.length === 0) {
      throw new AppError(404, `Sync set "${request.syncSet}" not found`);
    }

    const source = this.deps.createSource(appConfig.source, logger);
    const destination = this.deps.createDestination(appConfig.destination, logger);

    logger.info("Sync run started", {
      runId,
      dryRun,
      syncSets: syncSets.map((set) => set.name),
    });

    const sets: SyncSetReport[] = [];
    for (const syncSet of syncSets) {
      logger.info(`Beginning sync set: ${syncSet.name}`, { runId });
      const eventLog = new EventLog(logger);

      let results: ChangeResults;
      try {
        source.forSet(syncSet.source);
        destination.forSet(syncSet.destination);
      } catch (error) {
        results = failedChangeResults(error);
        logger.error(`Unable to configure sync set ${syncSet.name}: ${results.errors.join("; ")}`);
        sets.push({ name: syncSet.name, results, events: eventLog.drain() });
        continue;
      }

      results = await this.reconciliation.reconcile(
        source,
        destination,
        appConfig.attributeMap,
        dryRun,
        {
          eventLog,
          verbosity: appConfig.runtime.verbosity,
          disableAdd: appConfig.destination.disableAdd,
          disableUpdate: appConfig.destination.disableUpdate,
          disableDelete: appConfig.destination.disableDelete,
        },
      );

      sets.push({ name: syncSet.name, results, events: eventLog.drain() });
    }

    const finishedAt = new Date().toISOString();
    logger.info("Sync run finished", { runId, dryRun, finishedAt });

    return { runId, dryRun, startedAt, finishedAt, sets };
  }
}
