export type EventSeverity = "debug" | "info" | "warn" | "error";

export interface EventLogEntry {
  severity: EventSeverity;
  message: string;
}

/**
 * Multi-producer sink for per-operation events. `write` must return
 * immediately; implementations buffer without bound.
 */
export interface EventLogSink {
  write(entry: EventLogEntry): void;
}
