import winston from "winston";
import { BaseDestinationConnector, DestinationCapabilities } from "../base-connector";
import { BatchTimer, BatchTimerClock } from "../../executors/batchTimer";
import { ChangeSet, emptyChangeSet } from "../../models/change-set.model";
import { EventLogEntry, EventLogSink } from "../../models/event-log.model";
import { Person, createPerson } from "../../models/person.model";

class CollectingSink implements EventLogSink {
  entries: EventLogEntry[] = [];

  write(entry: EventLogEntry): void {
    this.entries.push(entry);
  }
}

class InstantClock implements BatchTimerClock {
  current = 0;
  sleeps: number[] = [];

  now = (): number => this.current;

  sleep = async (ms: number): Promise<void> => {
    this.sleeps.push(ms);
    this.current += ms;
  };
}

const nextTick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

class FakeDestination extends BaseDestinationConnector {
  readonly clock = new InstantClock();
  readonly created = jest.fn(async (_person: Person) => nextTick());
  readonly updated = jest.fn(async (_person: Person) => nextTick());
  readonly deleted = jest.fn(async (_person: Person) => nextTick());

  constructor(
    private readonly capabilities: DestinationCapabilities = {
      create: true,
      update: true,
      delete: true,
    },
    batchSize = 1000,
  ) {
    super({ batchSize, windowSeconds: 1 }, winston.createLogger({ silent: true }));
  }

  getName(): string {
    return "Fake";
  }

  getCapabilities(): DestinationCapabilities {
    return this.capabilities;
  }

  async listUsers(): Promise<Person[]> {
    return [];
  }

  protected override createBatchTimer(): BatchTimer {
    return new BatchTimer(this.rateLimit.batchSize, this.rateLimit.windowSeconds, this.clock);
  }

  protected createPerson(person: Person): Promise<void> {
    return this.created(person);
  }

  protected updatePerson(person: Person): Promise<void> {
    return this.updated(person);
  }

  protected deletePerson(person: Person): Promise<void> {
    return this.deleted(person);
  }
}

const people = (...keys: string[]): Person[] =>
  keys.map((compareKey) => createPerson({ compareKey }));

const changeSet = (changes: Partial<ChangeSet>): ChangeSet => ({
  ...emptyChangeSet(),
  ...changes,
});

describe("BaseDestinationConnector.applyChangeSet", () => {
  it("should apply every category and count each success", async () => {
    const destination = new FakeDestination();
    const sink = new CollectingSink();

    const results = await destination.applyChangeSet(
      changeSet({
        toCreate: people("a@x.com", "b@x.com"),
        toUpdate: people("c@x.com"),
        toDelete: people("d@x.com"),
      }),
      sink,
    );

    expect(results).toEqual({ created: 2, updated: 1, deleted: 1, errors: [] });
    expect(destination.created).toHaveBeenCalledTimes(2);
    expect(sink.entries).toContainEqual({ severity: "info", message: "CreateUser a@x.com" });
    expect(sink.entries).toContainEqual({ severity: "info", message: "UpdateUser c@x.com" });
    expect(sink.entries).toContainEqual({ severity: "info", message: "DeleteUser d@x.com" });
  });

  it("should count exactly 100 concurrent successes", async () => {
    const destination = new FakeDestination();
    const keys = Array.from({ length: 100 }, (_, i) => `user${i}@x.com`);

    const results = await destination.applyChangeSet(
      changeSet({ toCreate: people(...keys) }),
      new CollectingSink(),
    );

    expect(results.created).toBe(100);
  });

  it("should start every admitted operation before any of them finishes", async () => {
    const destination = new FakeDestination(undefined, 3);
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    let started = 0;
    destination.created.mockImplementation(async () => {
      started++;
      await gate;
    });
    const keys = Array.from({ length: 7 }, (_, i) => `user${i}@x.com`);

    const applying = destination.applyChangeSet(
      changeSet({ toCreate: people(...keys) }),
      new CollectingSink(),
    );
    for (let i = 0; i < 20 && started < keys.length; i++) {
      await nextTick();
    }

    expect(started).toBe(7);
    expect(destination.clock.sleeps).toEqual([1000, 1000]);

    release();
    const results = await applying;

    expect(results.created).toBe(7);
  });

  it("should report a failed operation and continue with the rest", async () => {
    const destination = new FakeDestination();
    destination.created.mockImplementation(async (person: Person) => {
      if (person.compareKey === "b@x.com") throw new Error("nope");
    });
    const sink = new CollectingSink();

    const results = await destination.applyChangeSet(
      changeSet({ toCreate: people("a@x.com", "b@x.com", "c@x.com") }),
      sink,
    );

    expect(results.created).toBe(2);
    expect(destination.created).toHaveBeenCalledTimes(3);
    expect(sink.entries).toContainEqual({
      severity: "error",
      message: "unable to create b@x.com in Fake: nope",
    });
  });

  it("should skip kinds the destination does not support with a warning", async () => {
    const destination = new FakeDestination({ create: true, update: true, delete: false });
    const sink = new CollectingSink();

    const results = await destination.applyChangeSet(
      changeSet({ toDelete: people("d@x.com") }),
      sink,
    );

    expect(results).toEqual({ created: 0, updated: 0, deleted: 0, errors: [] });
    expect(destination.deleted).not.toHaveBeenCalled();
    expect(sink.entries).toEqual([
      { severity: "warn", message: "Fake does not support delete operations, skipping 1" },
    ]);
  });

  it("should share one batch timer across categories", async () => {
    const destination = new FakeDestination(undefined, 2);

    await destination.applyChangeSet(
      changeSet({
        toCreate: people("a@x.com", "b@x.com"),
        toUpdate: people("c@x.com", "d@x.com"),
        toDelete: people("e@x.com"),
      }),
      new CollectingSink(),
    );

    expect(destination.clock.sleeps).toEqual([1000, 1000]);
  });

  it("should do nothing for an empty change set", async () => {
    const destination = new FakeDestination();
    const sink = new CollectingSink();

    const results = await destination.applyChangeSet(emptyChangeSet(), sink);

    expect(results).toEqual({ created: 0, updated: 0, deleted: 0, errors: [] });
    expect(sink.entries).toEqual([]);
  });
});
