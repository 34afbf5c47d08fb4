import { createWriteStream, mkdirSync, existsSync, WriteStream } from "node:fs";
import { join } from "node:path";
import { LogLevel } from "../../core/domain/entities/config.entity.js";
import {
  ILogger,
  LOG_LEVEL_RANK,
  LogData,
} from "../../core/domain/services/logger.service.js";

export interface JsonLoggerOptions {
  level?: LogLevel;
  /** Also echo a readable line to the console. */
  console?: boolean;
  scope?: string;
}

interface LogSink {
  stream: WriteStream | null;
  level: LogLevel;
  console: boolean;
}

/**
 * JSON-lines logger: one object per line appended to `<dir>/<fileName>`,
 * optionally mirrored to the console. Children share the parent's sink.
 */
export class JsonLogger implements ILogger {
  private constructor(
    private readonly sink: LogSink,
    private readonly scope: string,
  ) {}

  static open(logDir: string, fileName: string, options: JsonLoggerOptions = {}): JsonLogger {
    if (!existsSync(logDir)) mkdirSync(logDir, { recursive: true });
    const stream = createWriteStream(join(logDir, fileName), { flags: "a" });
    return new JsonLogger(
      { stream, level: options.level ?? "info", console: options.console ?? true },
      options.scope ?? "app",
    );
  }

  debug(message: string, data?: LogData): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: LogData): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: LogData): void {
    this.write("warn", message, data);
  }

  error(message: string, data?: LogData): void {
    this.write("error", message, data);
  }

  child(scope: string): ILogger {
    return new JsonLogger(this.sink, `${this.scope}.${scope}`);
  }

  close(): Promise<void> {
    const stream = this.sink.stream;
    if (!stream) return Promise.resolve();
    this.sink.stream = null;
    return new Promise((resolve) => stream.end(() => resolve()));
  }

  private write(level: LogLevel, message: string, data?: LogData): void {
    if (LOG_LEVEL_RANK[level] < LOG_LEVEL_RANK[this.sink.level]) return;
    const timestamp = new Date().toISOString();
    if (this.sink.stream?.writable) {
      const entry = { timestamp, level, scope: this.scope, message, ...(data ? { data } : {}) };
      this.sink.stream.write(JSON.stringify(entry) + "\n");
    }
    if (this.sink.console) {
      const line = `${timestamp} ${level.toUpperCase().padEnd(5)} [${this.scope}] ${message}`;
      const suffix = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : "";
      if (level === "error") console.error(line + suffix);
      else if (level === "warn") console.warn(line + suffix);
      else console.log(line + suffix);
    }
  }
}
