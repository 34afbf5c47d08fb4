import { dirname, resolve } from "node:path";
import { Config } from "../../core/domain/entities/config.entity.js";
import { ensureDir } from "./storage.utils.js";

/**
 * Config file to read: the explicit path, else CONFIG_PATH, else
 * config/config.yaml under the working directory.
 */
export function getConfigPath(explicit?: string): string {
  return explicit || process.env.CONFIG_PATH || resolve(process.cwd(), "config", "config.yaml");
}

/** Create the log, error ledger, database and checkpoint directories up front. */
export function ensureRuntimeDirs(config: Config): void {
  ensureDir(config.logging.dir);
  ensureDir(config.storage.errorLedgerDir);
  if (config.storage.databasePath !== ":memory:") ensureDir(dirname(config.storage.databasePath));
  if (config.storage.checkpoints.backend === "json") {
    ensureDir(dirname(config.storage.checkpoints.path));
  }
}
