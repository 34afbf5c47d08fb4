import { LogLevel } from "../entities/config.entity.js";

export type LogData = Record<string, unknown>;

export interface ILogger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
  /** Logger writing to the same sinks, tagged with a narrower scope. */
  child(scope: string): ILogger;
  close(): Promise<void>;
}

export const LOG_LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};
