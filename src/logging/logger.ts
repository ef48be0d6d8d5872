import { createWriteStream, mkdirSync, type WriteStream } from "fs";
import { dirname } from "path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, string | number | boolean | null | undefined>;

/**
 * Logger handed explicitly to the orchestrator and retry invoker.
 * Nothing in the engine touches a process-wide logger.
 */
export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  /** Derive a logger that tags every line with a sub-scope. */
  child(scope: string): Logger;
}

export interface LogRecord {
  time: Date;
  level: LogLevel;
  scope: string;
  message: string;
  fields?: LogFields;
}

export type LogSink = (record: LogRecord) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** `2024-05-01T10:00:00.000Z - bench.retry - WARN - message key=value` */
export function formatRecord(record: LogRecord): string {
  let line = `${record.time.toISOString()} - ${record.scope} - ${record.level.toUpperCase()} - ${record.message}`;
  if (record.fields) {
    const parts = Object.entries(record.fields)
      .filter(([, v]) => v !== undefined)
      .map(([k, v]) => `${k}=${typeof v === "string" && /\s/.test(v) ? JSON.stringify(v) : String(v)}`);
    if (parts.length > 0) line += ` ${parts.join(" ")}`;
  }
  return line;
}

class SinkLogger implements Logger {
  constructor(
    private scope: string,
    private minLevel: LogLevel,
    private sinks: LogSink[],
    private now: () => Date,
  ) {}

  private log(level: LogLevel, message: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;
    const record: LogRecord = { time: this.now(), level, scope: this.scope, message, fields };
    for (const sink of this.sinks) sink(record);
  }

  debug(message: string, fields?: LogFields): void {
    this.log("debug", message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.log("info", message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.log("warn", message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.log("error", message, fields);
  }

  child(scope: string): Logger {
    return new SinkLogger(`${this.scope}.${scope}`, this.minLevel, this.sinks, this.now);
  }
}

export function createLogger(opts: {
  scope: string;
  level?: LogLevel;
  sinks: LogSink[];
  now?: () => Date;
}): Logger {
  return new SinkLogger(opts.scope, opts.level ?? "info", opts.sinks, opts.now ?? (() => new Date()));
}

/** Logger that drops everything. Default for library callers and tests. */
export const silentLogger: Logger = createLogger({ scope: "silent", sinks: [] });

/** Console sink. Log lines go to stderr so stdout stays free for output. */
export function consoleSink(): LogSink {
  return (record) => {
    console.error(formatRecord(record));
  };
}

/** Collects records in memory, mainly for assertions in tests. */
export function memorySink(records: LogRecord[]): LogSink {
  return (record) => {
    records.push(record);
  };
}

export interface FileSink {
  sink: LogSink;
  path: string;
  /** Flush and close the underlying stream. */
  close(): Promise<void>;
}

/**
 * Write-once run log. Opening fails if the file already exists; the
 * failure is reported once on the console and later lines are dropped.
 */
export function fileSink(path: string): FileSink {
  mkdirSync(dirname(path), { recursive: true });
  const stream: WriteStream = createWriteStream(path, { flags: "wx", encoding: "utf-8" });
  let failed = false;
  stream.on("error", (err) => {
    if (failed) return;
    failed = true;
    consoleSink()({ time: new Date(), level: "error", scope: "log", message: `Run log ${path} unavailable: ${err.message}` });
  });

  return {
    path,
    sink: (record) => {
      if (!failed) stream.write(formatRecord(record) + "\n");
    },
    // Never rejects: a broken log must not replace the run's outcome
    close: () =>
      new Promise<void>((resolve) => {
        if (stream.destroyed) {
          resolve();
          return;
        }
        stream.once("close", () => resolve());
        stream.end();
      }),
  };
}
