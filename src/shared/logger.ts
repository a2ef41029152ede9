import * as fs from "node:fs";
import * as path from "node:path";
import { getFlowportPaths } from "./project.js";

export type LogLevel = "error" | "warn" | "info" | "debug" | "trace" | "silent";
export type Component = "cli" | "mcp" | "export" | "config";

interface LogEntry {
  ts: string;
  level: LogLevel;
  component: Component;
  msg: string;
  data?: Record<string, unknown>;
}

const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug", "trace", "silent"];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: -1,
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

/** 10MB max file size before rotation */
export const DEFAULT_MAX_LOG_SIZE = 10 * 1024 * 1024;

/** Flush buffered log lines after this delay */
const FLUSH_DELAY_MS = 100;

export interface LoggerOptions {
  maxLogSize?: number;
}

/**
 * Buffered append-only writer for one log file.
 *
 * A logger and its children write through one sink, so there is a single
 * stream and rotation happens in one place.
 */
export class LogSink {
  private stream: fs.WriteStream | null = null;
  private buffer: string[] = [];
  private flushTimer: ReturnType<typeof setTimeout> | null = null;
  private dirEnsured = false;

  constructor(
    readonly logFile: string,
    readonly maxLogSize: number
  ) {}

  write(line: string): void {
    this.buffer.push(line);
    this.scheduleFlush();
  }

  /**
   * Write buffered lines synchronously and close the stream. The sink can
   * still be written to afterwards; it reopens on the next flush.
   */
  close(): void {
    if (this.flushTimer !== null) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }

    // End the stream first so pending async writes land before the sync tail
    if (this.stream) {
      this.stream.end();
      this.stream = null;
    }

    // One line at a time, with a rotation check before each, so a tail that
    // crosses maxLogSize still rotates at the right place
    if (this.buffer.length > 0) {
      const lines = this.buffer;
      this.buffer = [];
      try {
        this.ensureDir();
        for (const line of lines) {
          this.rotateIfNeeded();
          fs.appendFileSync(this.logFile, line, "utf-8");
        }
      } catch {
        // Drop entries that cannot be written
      }
    }
  }

  private scheduleFlush(): void {
    if (this.flushTimer !== null) {
      return;
    }
    this.flushTimer = setTimeout(() => {
      this.flushTimer = null;
      this.flush();
    }, FLUSH_DELAY_MS);
    this.flushTimer.unref();
  }

  private flush(): void {
    if (this.buffer.length === 0) {
      return;
    }

    const data = this.buffer.join("");
    this.buffer = [];

    this.rotateIfNeeded();

    try {
      this.ensureStream().write(data);
    } catch {
      // Silently fail if we can't write to the log file
    }
  }

  private ensureDir(): void {
    if (this.dirEnsured) {
      return;
    }
    fs.mkdirSync(path.dirname(this.logFile), { recursive: true });
    this.dirEnsured = true;
  }

  private ensureStream(): fs.WriteStream {
    if (this.stream) {
      return this.stream;
    }

    this.ensureDir();
    const stream = fs.createWriteStream(this.logFile, { flags: "a" });
    // A broken stream is dropped; the next flush opens a fresh one
    stream.on("error", () => {
      this.stream = null;
    });
    this.stream = stream;
    return stream;
  }

  private rotateIfNeeded(): void {
    try {
      if (!fs.existsSync(this.logFile) || fs.statSync(this.logFile).size < this.maxLogSize) {
        return;
      }

      // No stream may stay open on the rotated file
      if (this.stream) {
        this.stream.end();
        this.stream = null;
      }

      // Keep a single generation: <file>.1 is replaced, never shifted
      const rotatedPath = this.logFile + ".1";
      fs.rmSync(rotatedPath, { force: true });
      fs.renameSync(this.logFile, rotatedPath);
    } catch {
      // Ignore rotation errors
    }
  }
}

/**
 * JSON-lines file logger.
 *
 * Lines are buffered and appended on a short timer; `close()` writes
 * whatever is left synchronously. The file rotates to `<file>.1` once it
 * reaches `maxLogSize`.
 */
export class Logger {
  private readonly sink: LogSink;

  constructor(
    readonly component: Component,
    readonly logFile: string,
    private level: LogLevel = "warn",
    options?: LoggerOptions,
    sink?: LogSink
  ) {
    this.sink = sink ?? new LogSink(logFile, options?.maxLogSize ?? DEFAULT_MAX_LOG_SIZE);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.log("error", msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.log("warn", msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.log("info", msg, data);
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.log("debug", msg, data);
  }

  trace(msg: string, data?: Record<string, unknown>): void {
    this.log("trace", msg, data);
  }

  /**
   * A logger for another component at the same level. It shares this
   * logger's sink, so entries from both stay in order in one stream.
   */
  child(component: Component): Logger {
    return new Logger(component, this.logFile, this.level, undefined, this.sink);
  }

  /**
   * Flush buffered lines (including those of children) and close the write stream.
   */
  close(): void {
    this.sink.close();
  }

  private log(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      component: this.component,
      msg,
    };

    if (data !== undefined) {
      entry.data = data;
    }

    this.sink.write(JSON.stringify(entry) + "\n");
  }

  private shouldLog(level: LogLevel): boolean {
    return level !== "silent" && LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[this.level];
  }
}

/**
 * Create a logger writing to the project's `.flowport/flowport.log`.
 */
export function createLogger(
  component: Component,
  projectRoot: string,
  level: LogLevel = "warn",
  options?: LoggerOptions
): Logger {
  return new Logger(component, getFlowportPaths(projectRoot).logFile, level, options);
}

/**
 * Parse verbosity flag count to log level.
 * 0 = warn (default), 1 = info, 2 = debug, 3+ = trace
 */
export function parseVerbosity(verboseCount: number): LogLevel {
  switch (verboseCount) {
    case 0:
      return "warn";
    case 1:
      return "info";
    case 2:
      return "debug";
    default:
      return "trace";
  }
}

export function isValidLogLevel(level: string): level is LogLevel {
  return LOG_LEVELS.some((l) => l === level);
}
