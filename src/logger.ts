import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

/** Destination receiving the serialised JSON lines. */
export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  /** Entries below this level are dropped. Defaults to `info`. */
  readonly minLevel?: LogLevel;
  /** Stream receiving every line. Defaults to `process.stdout`. */
  readonly sink?: LogSink;
  /** Optional file mirroring the stream. */
  readonly logFile?: string | null;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
  /** Clock used for timestamps, injectable for tests. */
  readonly now?: () => Date;
}

/** Logging surface the engine depends on. */
export interface Logger {
  debug(message: string, payload?: unknown): void;
  info(message: string, payload?: unknown): void;
  warn(message: string, payload?: unknown): void;
  error(message: string, payload?: unknown): void;
  isLevelEnabled(level: LogLevel): boolean;
}

/**
 * Structured logger that emits JSON lines and optionally mirrors them to a
 * file. File writes are queued sequentially to guarantee ordering.
 */
export class StructuredLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly sink: LogSink;
  private readonly logFile: string | null;
  private readonly entryListener: ((entry: LogEntry) => void) | undefined;
  private readonly now: () => Date;
  private writeQueue: Promise<void> = Promise.resolve();
  /** Set once the directory of {@link logFile} exists. */
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.minLevel = options.minLevel ?? "info";
    this.sink = options.sink ?? process.stdout;
    this.logFile = options.logFile ?? null;
    this.entryListener = options.onEntry;
    this.now = options.now ?? (() => new Date());
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.minLevel];
  }

  /**
   * Waits for all pending file writes. Tests rely on this to assert the
   * content of mirrored log files.
   */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const entry: LogEntry = {
      timestamp: this.now().toISOString(),
      level,
      message,
      ...(payload !== undefined ? { payload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    this.sink.write(line);
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }
    const logFile = this.logFile;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue.then(async () => {
      try {
        await this.ensureLogDestination(logFile);
        await appendFile(logFile, line, "utf8");
      } catch (err) {
        const errorEntry: LogEntry = {
          timestamp: this.now().toISOString(),
          level: "error",
          message: "log_file_write_failed",
          payload: err instanceof Error ? { message: err.message } : { error: String(err) },
        };
        process.stderr.write(`${JSON.stringify(errorEntry)}\n`);
        // Allow the next entry to retry directory creation.
        this.logDirectoryReady = false;
      }
    });
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }
}
