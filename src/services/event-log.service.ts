import { EventLogEntry, EventLogSink } from "../models/event-log.model";
import logger, { Logger } from "../utils/logger";

/**
 * Unbounded in-memory event sink. Every entry is kept for the run report
 * and forwarded to the logger at the matching level; `write` never waits.
 */
export class EventLog implements EventLogSink {
  private entries: EventLogEntry[] = [];

  constructor(private readonly log: Logger = logger) {}

  write(entry: EventLogEntry): void {
    this.entries.push(entry);
    this.log.log(entry.severity, entry.message);
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Returns everything written so far and empties the buffer.
   */
  drain(): EventLogEntry[] {
    const drained = this.entries;
    this.entries = [];
    return drained;
  }
}
