import { readFileSync } from "node:fs";
import yaml from "js-yaml";
import { config as loadEnv } from "dotenv";
import { z } from "zod";
import { IConfigService } from "../../core/domain/services/config.service.js";
import { Config } from "../../core/domain/entities/config.entity.js";
import { ConfigError } from "../../core/domain/errors/config.errors.js";
import { getConfigPath } from "../utils/config.utils.js";

const configSchema = z.object({
  api: z.object({
    baseUrl: z.string().url().default("https://api.keap.com/crm/rest/v1"),
    apiKey: z.string().default(""),
    timeoutMs: z.number().int().positive().default(30_000),
    requestsPerSecond: z.number().nonnegative().default(10),
    headerPrefix: z.string().default("x-keap-"),
  }).default({}),
  run: z.object({
    batchSize: z.number().int().positive().max(1000).default(50),
    retry: z.object({
      maxRetries: z.number().int().nonnegative().default(5),
      baseDelayMs: z.number().nonnegative().default(1000),
      maxDelayMs: z.number().nonnegative().default(60_000),
      backoffBase: z.number().positive().default(2),
      jitter: z.boolean().default(true),
    }).default({}),
  }).default({}),
  storage: z.object({
    databasePath: z.string().min(1).default("data/crm.sqlite"),
    checkpoints: z.object({
      backend: z.enum(["sqlite", "json"]).default("sqlite"),
      path: z.string().min(1).default("checkpoints/load_progress.json"),
    }).default({}),
    errorLedgerDir: z.string().min(1).default("logs/errors"),
  }).default({}),
  logging: z.object({
    dir: z.string().min(1).default("logs"),
    fileName: z.string().min(1).default("crm-extract.jsonl"),
    level: z.enum(["debug", "info", "warn", "error"]).default("info"),
    console: z.boolean().default(true),
  }).default({}),
});

/** Replace whole-string `${VAR}` values with the environment's value when set. */
export function substituteEnv(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === "string" && value.startsWith("${") && value.endsWith("}")) {
    const key = value.slice(2, -1);
    return env[key] ?? "";
  }
  if (Array.isArray(value)) return value.map((v) => substituteEnv(v, env));
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = substituteEnv(v, env);
    return out;
  }
  return value;
}

/** Validate a parsed config document, applying defaults and env overrides. */
export function parseConfig(
  raw: unknown,
  source: string,
  env: NodeJS.ProcessEnv = process.env,
): Config {
  const result = configSchema.safeParse(substituteEnv(raw ?? {}, env));
  if (!result.success) {
    const issues = result.error.issues.map(
      (i) => `${i.path.join(".") || "(root)"}: ${i.message}`,
    );
    throw new ConfigError(
      `Invalid config at ${source}. Missing or invalid: ${issues.join("; ")}`,
      issues,
    );
  }
  const config: Config = result.data;
  if (env.CRM_API_BASE_URL) config.api.baseUrl = env.CRM_API_BASE_URL;
  if (env.CRM_API_KEY) config.api.apiKey = env.CRM_API_KEY;
  const level = env.LOG_LEVEL?.toLowerCase();
  if (level === "debug" || level === "info" || level === "warn" || level === "error") {
    config.logging.level = level;
  }
  return config;
}

export class ConfigService implements IConfigService {
  private config: Config;

  constructor(configPath?: string) {
    loadEnv();
    this.config = this.loadConfig(getConfigPath(configPath));
  }

  private loadConfig(path: string): Config {
    let raw: string;
    try {
      raw = readFileSync(path, "utf-8");
    } catch (e) {
      throw new ConfigError(
        `Cannot read config at ${path}: ${e instanceof Error ? e.message : String(e)}`,
      );
    }
    let parsed: unknown;
    try {
      parsed = yaml.load(raw);
    } catch (e) {
      throw new ConfigError(
        `Invalid YAML in ${path}: ${e instanceof Error ? e.message : String(e)}`,
      );
    }
    return parseConfig(parsed, path);
  }

  getConfig(): Config {
    return this.config;
  }
  getApiConfig(): Config["api"] {
    return this.config.api;
  }
  getRunConfig(): Config["run"] {
    return this.config.run;
  }
  getStorageConfig(): Config["storage"] {
    return this.config.storage;
  }
  getLoggingConfig(): Config["logging"] {
    return this.config.logging;
  }
}
