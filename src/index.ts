#!/usr/bin/env node
/**
 * crm-extract CLI
 * Commands: load | reprocess | checkpoints
 */

import { InvalidArgumentError, program } from "commander";
import { Config } from "./core/domain/entities/config.entity.js";
import {
  parseEntityType,
  UnknownEntityTypeError,
} from "./core/domain/entities/entity-type.entity.js";
import { LoadResult } from "./core/domain/entities/load-result.entity.js";
import {
  AuthenticationError,
  ValidationFailedError,
} from "./core/domain/errors/api.errors.js";
import { ConfigError } from "./core/domain/errors/config.errors.js";
import { ILogger } from "./core/domain/services/logger.service.js";
import { ConfigService } from "./infrastructure/services/config.service.js";
import { JsonLogger } from "./infrastructure/services/json-logger.service.js";
import { createPipeline, openStorage, Storage } from "./infrastructure/runtime.js";
import { ensureRuntimeDirs, getConfigPath } from "./infrastructure/utils/config.utils.js";

// Graceful SIGTERM
process.on("SIGTERM", () => process.exit(143));

// ─── Shared helpers ───────────────────────────────────────────────────────────

type GlobalOptions = {
  config: string;
};

interface LoadCommandOptions {
  update?: boolean;
  entityType?: string;
  entityId?: number;
  batchSize?: number;
  fresh?: boolean;
}

interface CheckpointsCommandOptions {
  clear?: boolean;
  entityType?: string;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}

/** Errors an operator fixes by changing input: message only, exit 1. */
function isUsageError(e: unknown): e is Error {
  return (
    e instanceof ConfigError ||
    e instanceof AuthenticationError ||
    e instanceof ValidationFailedError ||
    e instanceof UnknownEntityTypeError
  );
}

interface Session {
  config: Config;
  logger: ILogger;
  storage: Storage;
}

/** Load config, bootstrap directories, open logger and storage, run `fn`. */
async function withSession(fn: (session: Session) => Promise<void>): Promise<void> {
  const { config: configPath } = program.opts<GlobalOptions>();
  let logger: ILogger | null = null;
  let storage: Storage | null = null;
  try {
    const config = new ConfigService(configPath).getConfig();
    ensureRuntimeDirs(config);
    logger = JsonLogger.open(config.logging.dir, config.logging.fileName, {
      level: config.logging.level,
      console: config.logging.console,
      scope: "crm-extract",
    });
    storage = openStorage(config, logger);
    await fn({ config, logger, storage });
  } catch (e) {
    if (!isUsageError(e)) throw e;
    logger?.error(e.message, { errorKind: e.name });
    console.error(`${e.name}: ${e.message}`);
    process.exitCode = 1;
  } finally {
    storage?.db.close();
    await logger?.close();
  }
}

function printLoadResult(result: LoadResult): void {
  console.log("\nLoad Summary");
  console.log("------------");
  console.log(`Total:   ${result.totalRecords}`);
  console.log(`Success: ${result.successCount}`);
  console.log(`Failed:  ${result.failedCount}\n`);
}

// ─── program ──────────────────────────────────────────────────────────────────

program
  .name("crm-extract")
  .description("Resumable CRM extraction into SQLite")
  .option("-c, --config <path>", "Config file path", getConfigPath());

// ─── load ─────────────────────────────────────────────────────────────────────

program
  .command("load")
  .description("Load every entity type, one type, or one record")
  .option("--update", "Only fetch records changed since the last completed run")
  .option("--entity-type <type>", "Load only this entity type")
  .option("--entity-id <id>", "Load only this record (requires --entity-type)", parsePositiveInt)
  .option("--batch-size <n>", "Page size for listings", parsePositiveInt)
  .option("--fresh", "Clear all checkpoints before loading")
  .action(async (opts: LoadCommandOptions) => {
    await withSession(async ({ config, logger, storage }) => {
      const entityType =
        opts.entityType === undefined ? undefined : parseEntityType(opts.entityType);
      if (opts.entityId !== undefined && entityType === undefined) {
        throw new ConfigError("--entity-id requires --entity-type");
      }
      if (opts.fresh) storage.checkpoints.clearAll();

      const runtime = createPipeline(config, storage, logger);
      try {
        const options = {
          update: opts.update ?? false,
          batchSize: opts.batchSize ?? config.run.batchSize,
        };
        const result = entityType
          ? await runtime.pipeline.runOne(entityType, { ...options, entityId: opts.entityId })
          : await runtime.pipeline.runAll(options);
        printLoadResult(result);
      } finally {
        await runtime.close();
      }
    });
  });

// ─── reprocess ────────────────────────────────────────────────────────────────

program
  .command("reprocess")
  .description("Backfill missing parents from the error ledger and replay failures")
  .action(async () => {
    await withSession(async ({ config, logger, storage }) => {
      const runtime = createPipeline(config, storage, logger);
      try {
        const stats = await runtime.reprocess.execute();
        console.log("\nReprocess Summary");
        console.log("-----------------");
        console.log(`Errors scanned:      ${stats.totalErrors}`);
        console.log(`Selected for replay: ${stats.selectedForReplay}`);
        console.log(`Succeeded:           ${stats.successfulReprocesses}`);
        console.log(`Failed:              ${stats.failedReprocesses}\n`);
      } finally {
        await runtime.close();
      }
    });
  });

// ─── checkpoints ──────────────────────────────────────────────────────────────

program
  .command("checkpoints")
  .description("Show stored checkpoints, or clear them")
  .option("--clear", "Clear checkpoints (all, or the one given by --entity-type)")
  .option("--entity-type <type>", "Restrict to this entity type")
  .action(async (opts: CheckpointsCommandOptions) => {
    await withSession(async ({ storage }) => {
      const entityType =
        opts.entityType === undefined ? undefined : parseEntityType(opts.entityType);
      if (opts.clear) {
        if (entityType) storage.checkpoints.clear(entityType);
        else storage.checkpoints.clearAll();
        console.log(entityType ? `Cleared checkpoint for ${entityType}` : "Cleared all checkpoints");
        return;
      }
      const rows = storage.checkpoints
        .getAll()
        .filter((c) => entityType === undefined || c.entityType === entityType);
      if (rows.length === 0) {
        console.log("No checkpoints stored.");
        return;
      }
      for (const c of rows) {
        console.log(
          `${c.entityType.padEnd(14)} processed=${c.recordsProcessed} offset=${c.apiOffset} ` +
            `completed=${c.lastCompletedTimestamp ?? "never"} updated=${c.updatedAt}`,
        );
      }
    });
  });

await program.parseAsync();
