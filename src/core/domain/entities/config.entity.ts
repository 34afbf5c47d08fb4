export interface ApiConfig {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
  /** Outgoing request cap per second; 0 disables pacing. */
  requestsPerSecond: number;
  /** Vendor prefix of the throttle and quota response headers. */
  headerPrefix: string;
}

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffBase: number;
  jitter: boolean;
}

export interface RunConfig {
  batchSize: number;
  retry: RetryConfig;
}

export type CheckpointBackend = "sqlite" | "json";

export interface StorageConfig {
  databasePath: string;
  checkpoints: {
    backend: CheckpointBackend;
    path: string;
  };
  errorLedgerDir: string;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggingConfig {
  dir: string;
  fileName: string;
  level: LogLevel;
  console: boolean;
}

export interface Config {
  api: ApiConfig;
  run: RunConfig;
  storage: StorageConfig;
  logging: LoggingConfig;
}
