import { BatchTimer } from "../executors/batchTimer";
import {
  ChangeCounter,
  ChangeKind,
  ChangeResults,
  ChangeSet,
} from "../models/change-set.model";
import { EventLogSink } from "../models/event-log.model";
import { Person } from "../models/person.model";
import defaultLogger, { Logger } from "../utils/logger";

/**
 * A directory people are read from.
 */
export interface Source {
  /**
   * Scope the source to one sync set.
   */
  forSet(setConfig: Record<string, unknown>): void;

  /**
   * Every person known to the source, all pages drained.
   */
  listUsers(desiredAttrs?: readonly string[]): Promise<Person[]>;
}

/**
 * A directory people are reconciled into.
 */
export interface Destination {
  forSet(setConfig: Record<string, unknown>): void;

  listUsers(desiredAttrs?: readonly string[]): Promise<Person[]>;

  /**
   * Apply every change, pacing starts through a batch timer. Failures are
   * reported to `eventLog` and never stop the remaining operations.
   */
  applyChangeSet(
    changes: ChangeSet,
    eventLog: EventLogSink,
  ): Promise<ChangeResults>;
}

export interface DestinationCapabilities {
  create: boolean;
  update: boolean;
  delete: boolean;
}

export interface RateLimitConfig {
  /** Operations started per window */
  batchSize: number;
  windowSeconds: number;
}

const COMPLETED_EVENT: Record<ChangeKind, string> = {
  create: "CreateUser",
  update: "UpdateUser",
  delete: "DeleteUser",
};

/**
 * Base class for destination connectors.
 *
 * Subclasses supply listing and the three single-record operations; the
 * base class owns dispatch: one batch timer shared across all categories,
 * one promise per record, and a single join before the totals are
 * returned.
 */
export abstract class BaseDestinationConnector implements Destination {
  protected constructor(
    protected readonly rateLimit: RateLimitConfig,
    protected readonly logger: Logger = defaultLogger,
  ) {}

  abstract getName(): string;

  abstract getCapabilities(): DestinationCapabilities;

  abstract listUsers(desiredAttrs?: readonly string[]): Promise<Person[]>;

  protected abstract createPerson(person: Person): Promise<void>;

  protected abstract updatePerson(person: Person): Promise<void>;

  protected abstract deletePerson(person: Person): Promise<void>;

  forSet(_setConfig: Record<string, unknown>): void {
    // no per-set scoping unless a connector overrides this
  }

  protected createBatchTimer(): BatchTimer {
    return new BatchTimer(this.rateLimit.batchSize, this.rateLimit.windowSeconds);
  }

  async applyChangeSet(
    changes: ChangeSet,
    eventLog: EventLogSink,
  ): Promise<ChangeResults> {
    const counter = new ChangeCounter();
    const batchTimer = this.createBatchTimer();
    const capabilities = this.getCapabilities();
    const pending: Promise<void>[] = [];

    const dispatch = async (kind: ChangeKind, people: readonly Person[]) => {
      if (people.length === 0) return;

      if (!capabilities[kind]) {
        eventLog.write({
          severity: "warn",
          message: `${this.getName()} does not support ${kind} operations, skipping ${people.length}`,
        });
        return;
      }

      for (const person of people) {
        await batchTimer.admit();
        pending.push(this.runOperation(kind, person, counter, eventLog));
      }
    };

    await dispatch("create", changes.toCreate);
    await dispatch("update", changes.toUpdate);
    await dispatch("delete", changes.toDelete);

    await Promise.all(pending);

    return counter.toResults();
  }

  /**
   * One apply unit. Never rejects: failures become error events.
   */
  private async runOperation(
    kind: ChangeKind,
    person: Person,
    counter: ChangeCounter,
    eventLog: EventLogSink,
  ): Promise<void> {
    try {
      switch (kind) {
        case "create":
          await this.createPerson(person);
          break;
        case "update":
          await this.updatePerson(person);
          break;
        case "delete":
          await this.deletePerson(person);
          break;
      }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      eventLog.write({
        severity: "error",
        message: `unable to ${kind} ${person.compareKey} in ${this.getName()}: ${reason}`,
      });
      return;
    }

    counter.increment(kind);
    eventLog.write({
      severity: "info",
      message: `${COMPLETED_EVENT[kind]} ${person.compareKey}`,
    });
  }
}

/**
 * Base class for source connectors.
 */
export abstract class BaseSourceConnector implements Source {
  protected constructor(protected readonly logger: Logger = defaultLogger) {}

  forSet(_setConfig: Record<string, unknown>): void {
    // no per-set scoping unless a connector overrides this
  }

  abstract listUsers(desiredAttrs?: readonly string[]): Promise<Person[]>;
}
