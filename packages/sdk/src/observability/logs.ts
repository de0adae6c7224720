/**
 * Structured logging for store operations
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  op?: string;
  path?: string;
  message?: string;
  details?: Record<string, unknown>;
}

export type LogSink = (level: LogLevel, line: string) => void;

function consoleSink(level: LogLevel, line: string): void {
  if (level === "info") {
    console.log(line);
  } else {
    console.error(line);
  }
}

export class Logger {
  #minLevel: LogLevel;
  #sink: LogSink;

  constructor(minLevel: LogLevel = "info", sink: LogSink = consoleSink) {
    this.#minLevel = minLevel;
    this.#sink = sink;
  }

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (LEVELS.indexOf(level) < LEVELS.indexOf(this.#minLevel)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    const parts = [`[${entry.timestamp}] [${level.toUpperCase()}] [${event}]`];

    if (entry.op || entry.path) {
      parts.push(`${entry.op ?? ""} ${entry.path ?? ""}`.trim());
    }

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    this.#sink(level, parts.join(" "));
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Partial<LogEntry>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Partial<LogEntry>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Partial<LogEntry>): void {
    this.log("error", event, data);
  }

  get level(): LogLevel {
    return this.#minLevel;
  }

  get sink(): LogSink {
    return this.#sink;
  }

  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }

  setSink(sink: LogSink): void {
    this.#sink = sink;
  }
}

/**
 * Global logger instance. Store operations log at debug level, which is
 * silent until `logger.setLevel("debug")`.
 */
export const logger = new Logger();
