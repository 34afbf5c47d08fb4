import { Config } from "../core/domain/entities/config.entity.js";
import { ICheckpointRepository } from "../core/domain/repositories/checkpoint.repository.js";
import { IErrorLedger } from "../core/domain/repositories/error-ledger.repository.js";
import { ILogger } from "../core/domain/services/logger.service.js";
import { RetryPolicy } from "../core/domain/services/retry-policy.service.js";
import { LoaderRegistry } from "../core/loaders/loader.registry.js";
import { ReprocessErrorsUseCase } from "../core/use-cases/reprocess-errors.use-case.js";
import { RunPipelineUseCase } from "../core/use-cases/run-pipeline.use-case.js";
import { CrmApiAdapter } from "../adapters/crm-api.adapter.js";
import { JsonCheckpointRepository } from "./database/json-checkpoint.repository.js";
import { JsonErrorLedger } from "./database/json-error-ledger.repository.js";
import { SqliteCheckpointRepository } from "./database/sqlite-checkpoint.repository.js";
import { openDatabase, SqliteDatabase } from "./database/sqlite-connection.js";
import { SqliteEntityStore } from "./database/sqlite-entity-store.repository.js";
import { CrmTransport, HttpCrmClient } from "./services/http-crm-client.service.js";

export interface Storage {
  db: SqliteDatabase;
  store: SqliteEntityStore;
  checkpoints: ICheckpointRepository;
  ledger: IErrorLedger;
}

/** Open the database and the stores that live beside it. */
export function openStorage(config: Config, logger: ILogger): Storage {
  const db = openDatabase(config.storage.databasePath);
  const store = new SqliteEntityStore(db);
  store.initialize();

  let checkpoints: ICheckpointRepository;
  if (config.storage.checkpoints.backend === "json") {
    checkpoints = new JsonCheckpointRepository(
      config.storage.checkpoints.path,
      logger.child("checkpoints"),
    );
  } else {
    const sqlite = new SqliteCheckpointRepository(db, logger.child("checkpoints"));
    sqlite.initialize();
    checkpoints = sqlite;
  }

  const ledger = new JsonErrorLedger(config.storage.errorLedgerDir, logger.child("errors"));
  return { db, store, checkpoints, ledger };
}

export interface Pipeline {
  loaders: LoaderRegistry;
  pipeline: RunPipelineUseCase;
  reprocess: ReprocessErrorsUseCase;
  close(): Promise<void>;
}

export interface PipelineOptions {
  /** Replaces the HTTP client, e.g. with an in-process fake. */
  transport?: CrmTransport;
}

/** Wire the API client, loaders and use-cases over already opened storage. */
export function createPipeline(
  config: Config,
  storage: Storage,
  logger: ILogger,
  options: PipelineOptions = {},
): Pipeline {
  let http: HttpCrmClient | null = null;
  let transport: CrmTransport;
  if (options.transport) {
    transport = options.transport;
  } else {
    http = new HttpCrmClient(config.api, logger.child("http"));
    transport = http;
  }
  const api = new CrmApiAdapter(transport, logger.child("api"));
  const retry = new RetryPolicy({ ...config.run.retry, logger: logger.child("retry") });

  const loaders = new LoaderRegistry({
    api,
    store: storage.store,
    checkpoints: storage.checkpoints,
    ledger: storage.ledger,
    retry,
    logger: logger.child("loader"),
  });
  const reprocess = new ReprocessErrorsUseCase(storage.ledger, loaders, logger.child("reprocess"));
  const pipeline = new RunPipelineUseCase(loaders, reprocess, logger.child("pipeline"));

  return {
    loaders,
    pipeline,
    reprocess,
    close: async () => {
      await http?.close();
    },
  };
}
