import fs from "node:fs";
import path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_BUFFER_SIZE = 1000;

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const LEVEL_PREFIX: Record<LogLevel, string> = {
  error: "[ERROR] - ",
  warn: "[WARN]  - ",
  info: "[INFO]  - ",
  debug: "[DEBUG] - ",
};

export interface LogEntry {
  level: LogLevel;
  message: string;
  ts: Date;
}

export type LogSink = (entry: LogEntry) => void;

export function levelPrefix(level: LogLevel): string {
  return LEVEL_PREFIX[level];
}

export function formatLogEntry(entry: LogEntry): string {
  return `${entry.ts.toISOString()} ${LEVEL_PREFIX[entry.level]}${entry.message}`;
}

/** Keeps the last {@link LOG_BUFFER_SIZE} entries for the log panel and forwards each to the sinks. */
export class Logger {
  private buffer: LogEntry[] = [];
  private readonly sinks = new Set<LogSink>();
  private level: LogLevel;
  private readonly capacity: number;

  constructor(args: { level?: LogLevel; capacity?: number } = {}) {
    this.level = args.level ?? "info";
    this.capacity = args.capacity ?? LOG_BUFFER_SIZE;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  addSink(sink: LogSink): () => void {
    this.sinks.add(sink);
    return () => {
      this.sinks.delete(sink);
    };
  }

  log(level: LogLevel, message: string): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) return;
    const entry: LogEntry = { level, message, ts: new Date() };
    this.buffer.push(entry);
    if (this.buffer.length > this.capacity) this.buffer.splice(0, this.buffer.length - this.capacity);
    for (const sink of this.sinks) sink(entry);
  }

  debug(message: string): void {
    this.log("debug", message);
  }

  info(message: string): void {
    this.log("info", message);
  }

  warn(message: string): void {
    this.log("warn", message);
  }

  error(message: string): void {
    this.log("error", message);
  }

  entries(): readonly LogEntry[] {
    return this.buffer;
  }

  clear(): void {
    this.buffer = [];
  }
}

/** Appends formatted lines to `filePath`; call `close` before exit to flush. */
export function createFileSink(filePath: string): { sink: LogSink; close: () => Promise<void> } {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const stream = fs.createWriteStream(filePath, { flags: "a", encoding: "utf8" });
  // A failed log file stops receiving entries; the in-memory buffer keeps them.
  let failed = false;
  stream.on("error", () => {
    failed = true;
  });
  return {
    sink: (entry) => {
      if (!failed) stream.write(`${formatLogEntry(entry)}\n`);
    },
    close: () =>
      failed
        ? Promise.resolve()
        : new Promise((resolve, reject) => {
            stream.once("error", reject);
            stream.end(() => resolve());
          }),
  };
}
