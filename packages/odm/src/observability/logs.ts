/**
 * Structured logging for connection, registry and write events
 *
 * Entries below the current threshold are dropped before formatting. The
 * threshold starts at "info", or "debug" when MICRODM_DEBUG is set; the
 * sink starts as the console.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Minimum level an entry needs to be written; "silent" drops everything
 */
export type LogThreshold = LogLevel | "silent";

export type LogEvent =
  | "connection.open"
  | "connection.close"
  | "registry.hit"
  | "registry.load"
  | "registry.create"
  | "registry.race"
  | "registry.release"
  | "object.write"
  | "object.write_failed"
  | "object.undeclared_fields";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: LogEvent;
  collection?: string;
  name?: string;
  message?: string;
  details?: Record<string, unknown>;
}

export type LogFields = Omit<LogEntry, "timestamp" | "level" | "event">;

/**
 * Receives each formatted line with the entry it was built from
 */
export type LogSink = (line: string, entry: LogEntry) => void;

const SEVERITY: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Number.POSITIVE_INFINITY,
};

export function defaultThreshold(): LogThreshold {
  return process.env.MICRODM_DEBUG ? "debug" : "info";
}

/**
 * `[time] [LEVEL] [event] collection/name message {details}`
 */
export function formatEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];
  if (entry.collection !== undefined || entry.name !== undefined) {
    parts.push(`${entry.collection ?? ""}/${entry.name ?? ""}`);
  }
  if (entry.message) {
    parts.push(entry.message);
  }
  if (entry.details) {
    parts.push(JSON.stringify(entry.details));
  }
  return parts.join(" ");
}

export const consoleSink: LogSink = (line, entry) => {
  if (entry.level === "error") {
    console.error(line);
  } else if (entry.level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export class Logger {
  #threshold: LogThreshold;
  #sink: LogSink;

  constructor(threshold: LogThreshold = defaultThreshold(), sink: LogSink = consoleSink) {
    this.#threshold = threshold;
    this.#sink = sink;
  }

  get threshold(): LogThreshold {
    return this.#threshold;
  }

  setThreshold(threshold: LogThreshold): void {
    this.#threshold = threshold;
  }

  /**
   * Route entries elsewhere, e.g. to stderr so stdout stays machine-readable
   */
  setSink(sink: LogSink): void {
    this.#sink = sink;
  }

  enabled(level: LogLevel): boolean {
    return SEVERITY[level] >= SEVERITY[this.#threshold];
  }

  log(level: LogLevel, event: LogEvent, fields: LogFields = {}): void {
    if (!this.enabled(level)) {
      return;
    }
    const entry: LogEntry = { timestamp: new Date().toISOString(), level, event, ...fields };
    this.#sink(formatEntry(entry), entry);
  }

  debug(event: LogEvent, fields?: LogFields): void {
    this.log("debug", event, fields);
  }

  info(event: LogEvent, fields?: LogFields): void {
    this.log("info", event, fields);
  }

  warn(event: LogEvent, fields?: LogFields): void {
    this.log("warn", event, fields);
  }

  error(event: LogEvent, fields?: LogFields): void {
    this.log("error", event, fields);
  }
}

export const logger = new Logger();
