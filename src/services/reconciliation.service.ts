import { Destination, Source } from "../connectors/base-connector";
import {
  ChangeKind,
  ChangeResults,
  ChangeSet,
  failedChangeResults,
} from "../models/change-set.model";
import { EventLogSink } from "../models/event-log.model";
import { Person } from "../models/person.model";
import { AttributeMapping, Verbosity } from "../models/sync-config.model";
import defaultLogger, { Logger } from "../utils/logger";
import {
  destinationKeysOf,
  projectToDestinationAttributes,
  sourceKeysOf,
} from "./attribute-projector.service";
import { generateChangeSet } from "./change-set.service";

export enum ReconcilePhase {
  IDLE = "Idle",
  FETCHING_SOURCE = "FetchingSource",
  PROJECTING = "Projecting",
  FETCHING_DESTINATION = "FetchingDestination",
  DIFFING = "Diffing",
  DRY_RUN_REPORTING = "DryRunReporting",
  APPLYING = "Applying",
  DONE = "Done",
}

export interface ReconcileOptions {
  /** Receives plan entries in dry run and every apply event */
  eventLog: EventLogSink;
  verbosity?: number;
  disableAdd?: boolean;
  disableUpdate?: boolean;
  disableDelete?: boolean;
  onPhaseChange?: (phase: ReconcilePhase) => void;
}

/**
 * One reconciliation pass: fetch both sides, project, diff, then either
 * report the plan (dry run) or hand it to the destination.
 *
 * Listing failures end the pass with an error result and zero counters.
 * Nothing is retried here; adapters retry their own HTTP calls.
 */
export class ReconciliationService {
  constructor(private readonly logger: Logger = defaultLogger) {}

  async reconcile(
    source: Source,
    destination: Destination,
    mapping: readonly AttributeMapping[],
    dryRun: boolean,
    options: ReconcileOptions,
  ): Promise<ChangeResults> {
    const enter = (phase: ReconcilePhase): void => {
      this.logger.debug(`reconcile phase: ${phase}`);
      options.onPhaseChange?.(phase);
    };

    try {
      enter(ReconcilePhase.FETCHING_SOURCE);
      let sourcePeople: Person[];
      try {
        sourcePeople = await source.listUsers(sourceKeysOf(mapping));
      } catch (error) {
        return this.fail("listing users from source", error);
      }
      this.logger.info(`Source returned ${sourcePeople.length} people`);

      enter(ReconcilePhase.PROJECTING);
      const projected = projectToDestinationAttributes(sourcePeople, mapping, this.logger);

      enter(ReconcilePhase.FETCHING_DESTINATION);
      let destinationPeople: Person[];
      try {
        destinationPeople = await destination.listUsers(destinationKeysOf(mapping));
      } catch (error) {
        return this.fail("listing users from destination", error);
      }
      this.logger.info(`Destination returned ${destinationPeople.length} people`);

      enter(ReconcilePhase.DIFFING);
      const changeSet = this.applyDisableSwitches(
        generateChangeSet(projected, destinationPeople),
        options,
      );

      const verbosity = options.verbosity ?? Verbosity.LOW;

      if (dryRun) {
        enter(ReconcilePhase.DRY_RUN_REPORTING);
        return this.reportDryRun(changeSet, options.eventLog, verbosity);
      }

      if (verbosity >= Verbosity.MEDIUM) {
        this.logPlan(changeSet, verbosity);
      }

      enter(ReconcilePhase.APPLYING);
      const results = await destination.applyChangeSet(changeSet, options.eventLog);
      this.logger.info(
        `Sync results: ${results.created} users added, ${results.updated} users updated, ${results.deleted} users removed`,
      );
      return results;
    } finally {
      enter(ReconcilePhase.DONE);
    }
  }

  private fail(context: string, error: unknown): ChangeResults {
    const results = failedChangeResults(error);
    this.logger.error(`Error ${context}: ${results.errors.join("; ")}`);
    return results;
  }

  private applyDisableSwitches(changeSet: ChangeSet, options: ReconcileOptions): ChangeSet {
    const result = { ...changeSet };

    if (options.disableAdd && result.toCreate.length > 0) {
      this.logger.warn(`Adding disabled, skipping ${result.toCreate.length} create(s)`);
      result.toCreate = [];
    }
    if (options.disableUpdate && result.toUpdate.length > 0) {
      this.logger.warn(`Updating disabled, skipping ${result.toUpdate.length} update(s)`);
      result.toUpdate = [];
    }
    if (options.disableDelete && result.toDelete.length > 0) {
      this.logger.warn(`Deleting disabled, skipping ${result.toDelete.length} delete(s)`);
      result.toDelete = [];
    }

    return result;
  }

  /**
   * Counts are the planned list sizes; nothing is applied.
   */
  private reportDryRun(
    changeSet: ChangeSet,
    eventLog: EventLogSink,
    verbosity: number,
  ): ChangeResults {
    const planned: [ChangeKind, Person[]][] = [
      ["create", changeSet.toCreate],
      ["update", changeSet.toUpdate],
      ["delete", changeSet.toDelete],
    ];

    for (const [kind, people] of planned) {
      for (const person of people) {
        eventLog.write({
          severity: "info",
          message: `Dry run: would ${kind} ${person.compareKey}`,
        });
      }
    }

    if (verbosity >= Verbosity.HIGH) {
      this.logPlan(changeSet, verbosity);
    }

    this.logger.info(
      `Dry run: would add ${changeSet.toCreate.length}, update ${changeSet.toUpdate.length}, remove ${changeSet.toDelete.length}`,
    );

    return {
      created: changeSet.toCreate.length,
      updated: changeSet.toUpdate.length,
      deleted: changeSet.toDelete.length,
      errors: [],
    };
  }

  private logPlan(changeSet: ChangeSet, verbosity: number): void {
    const describe = (kind: ChangeKind, person: Person): void => {
      const meta =
        verbosity >= Verbosity.HIGH ? { attributes: person.attributes } : undefined;
      this.logger.info(`Planned ${kind}: ${person.compareKey}`, meta);
    };

    changeSet.toCreate.forEach((person) => describe("create", person));
    changeSet.toUpdate.forEach((person) => describe("update", person));
    changeSet.toDelete.forEach((person) => describe("delete", person));
  }
}
