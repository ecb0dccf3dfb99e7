import winston from "winston";
import { SyncRunReport, SyncRunnerService } from "../../services/sync-runner.service";
import { SyncScheduler } from "../sync-scheduler.service";

const log = winston.createLogger({ silent: true });

const report = (errors: string[]): SyncRunReport => ({
  runId: "run-1",
  dryRun: false,
  startedAt: "2026-01-01T00:00:00.000Z",
  finishedAt: "2026-01-01T00:00:01.000Z",
  sets: [
    { name: "default", results: { created: 0, updated: 0, deleted: 0, errors }, events: [] },
  ],
});

describe("SyncScheduler", () => {
  let runner: SyncRunnerService;
  let scheduler: SyncScheduler;

  beforeEach(() => {
    runner = new SyncRunnerService({ logger: log });
    scheduler = new SyncScheduler(runner, "UTC", log);
  });

  afterEach(() => {
    scheduler.stop();
    jest.restoreAllMocks();
  });

  it("should register a valid schedule", () => {
    scheduler.scheduleJob("yearly", "0 0 1 1 *", async () => undefined);

    expect(scheduler.jobCount).toBe(1);
  });

  it("should reject an invalid cron expression", () => {
    expect(() =>
      scheduler.scheduleJob("broken", "not a schedule", async () => undefined),
    ).toThrow("Invalid cron expression for 'broken': not a schedule");
    expect(scheduler.jobCount).toBe(0);
  });

  it("should reject a duplicate job name", () => {
    scheduler.scheduleJob("yearly", "0 0 1 1 *", async () => undefined);

    expect(() =>
      scheduler.scheduleJob("yearly", "0 0 1 1 *", async () => undefined),
    ).toThrow("Job 'yearly' already exists");
  });

  it("should skip a tick while the previous one is still running", async () => {
    const warn = jest.spyOn(log, "warn");
    let release: () => void = () => undefined;
    const task = jest.fn(
      () =>
        new Promise<void>((resolve) => {
          release = () => resolve();
        }),
    );

    const first = scheduler.runJob("directory-sync", task);
    await scheduler.runJob("directory-sync", task);
    release();
    await first;

    expect(task).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith("directory-sync still running, skipping this tick");

    await scheduler.runJob("directory-sync", async () => undefined);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("should log a failing tick without rejecting", async () => {
    const error = jest.spyOn(log, "error");

    await expect(
      scheduler.runJob("directory-sync", async () => {
        throw new Error("source unreachable");
      }),
    ).resolves.toBeUndefined();

    expect(error).toHaveBeenCalledWith("directory-sync failed", {
      error: "source unreachable",
    });
  });

  it("should fail a scheduled sync when a set reports errors", async () => {
    const error = jest.spyOn(log, "error");
    jest.spyOn(runner, "run").mockResolvedValue(report(["boom"]));
    const schedule = jest.spyOn(scheduler, "scheduleJob");

    scheduler.scheduleSync("0 0 1 1 *");
    const task = schedule.mock.calls[0][2];
    await scheduler.runJob("directory-sync", task);

    expect(runner.run).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith("directory-sync failed", {
      error: "sync sets with errors: default",
    });
  });

  it("should finish a clean scheduled sync", async () => {
    const info = jest.spyOn(log, "info");
    jest.spyOn(runner, "run").mockResolvedValue(report([]));
    const schedule = jest.spyOn(scheduler, "scheduleJob");

    scheduler.scheduleSync("0 0 1 1 *");
    await scheduler.runJob("directory-sync", schedule.mock.calls[0][2]);

    expect(info).toHaveBeenCalledWith(expect.stringMatching(/^directory-sync finished in \d+ms$/));
  });
});
