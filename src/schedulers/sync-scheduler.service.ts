import cron, { ScheduledTask } from "node-cron";
import { SyncRunnerService } from "../services/sync-runner.service";
import defaultLogger, { Logger } from "../utils/logger";

export class SyncScheduler {
  private jobs: Map<string, ScheduledTask> = new Map();
  private active: Set<string> = new Set();

  constructor(
    private readonly runner: SyncRunnerService,
    private readonly timezone = "UTC",
    private readonly logger: Logger = defaultLogger,
  ) {}

  // ----------------------
  // Job Scheduling
  // ----------------------
  public scheduleJob(
    name: string,
    schedule: string,
    task: () => Promise<void>,
  ): void {
    if (this.jobs.has(name)) throw new Error(`Job '${name}' already exists`);
    if (!cron.validate(schedule)) {
      throw new Error(`Invalid cron expression for '${name}': ${schedule}`);
    }

    const job = cron.schedule(
      schedule,
      () => this.runJob(name, task),
      { timezone: this.timezone },
    );

    this.jobs.set(name, job);
    this.logger.info(`Scheduled '${name}' -> ${schedule}`, { timezone: this.timezone });
  }

  /**
   * One tick. A tick that fires while the previous one is still running
   * is skipped.
   */
  public async runJob(name: string, task: () => Promise<void>): Promise<void> {
    if (this.active.has(name)) {
      this.logger.warn(`${name} still running, skipping this tick`);
      return;
    }

    this.active.add(name);
    const startedAt = Date.now();
    this.logger.info(`${name} started`);
    try {
      await task();
      this.logger.info(`${name} finished in ${Date.now() - startedAt}ms`);
    } catch (err) {
      this.logger.error(`${name} failed`, {
        error: err instanceof Error ? err.message : String(err),
      });
    } finally {
      this.active.delete(name);
    }
  }

  public scheduleSync(schedule: string): void {
    this.scheduleJob("directory-sync", schedule, async () => {
      const report = await this.runner.run();
      const failed = report.sets.filter((set) => set.results.errors.length > 0);
      if (failed.length > 0) {
        throw new Error(
          `sync sets with errors: ${failed.map((set) => set.name).join(", ")}`,
        );
      }
    });
  }

  // ----------------------
  // Lifecycle
  // ----------------------
  public get jobCount(): number {
    return this.jobs.size;
  }

  public stop(): void {
    this.logger.info("Stopping scheduler...");
    this.jobs.forEach((job) => job.stop());
    this.jobs.clear();
  }
}
