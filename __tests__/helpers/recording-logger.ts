import { LogLevel } from "../../src/core/domain/entities/config.entity.js";
import { ILogger, LogData } from "../../src/core/domain/services/logger.service.js";

export interface LogEntry {
  level: LogLevel;
  scope: string;
  message: string;
  data?: LogData;
}

/** Logger that keeps every entry in memory; children share the same list. */
export class RecordingLogger implements ILogger {
  constructor(
    readonly entries: LogEntry[] = [],
    private readonly scope = "test",
  ) {}

  debug(message: string, data?: LogData): void {
    this.entries.push({ level: "debug", scope: this.scope, message, data });
  }
  info(message: string, data?: LogData): void {
    this.entries.push({ level: "info", scope: this.scope, message, data });
  }
  warn(message: string, data?: LogData): void {
    this.entries.push({ level: "warn", scope: this.scope, message, data });
  }
  error(message: string, data?: LogData): void {
    this.entries.push({ level: "error", scope: this.scope, message, data });
  }
  child(scope: string): ILogger {
    return new RecordingLogger(this.entries, `${this.scope}.${scope}`);
  }
  async close(): Promise<void> {}

  messages(level: LogLevel): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.message);
  }
}
