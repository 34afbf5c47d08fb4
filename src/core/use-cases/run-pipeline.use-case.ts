import {
  ENTITY_LOAD_ORDER,
  EntityType,
} from "../domain/entities/entity-type.entity.js";
import {
  addLoadResults,
  emptyLoadResult,
  failedLoadResult,
  LoadResult,
} from "../domain/entities/load-result.entity.js";
import { errorMessage } from "../domain/errors/api.errors.js";
import { ILogger } from "../domain/services/logger.service.js";
import { LoaderLookup } from "../loaders/base-entity.loader.js";
import { ReprocessErrorsUseCase } from "./reprocess-errors.use-case.js";

export interface RunOptions {
  update?: boolean;
  batchSize?: number;
}

export interface RunOneOptions extends RunOptions {
  entityId?: number;
}

export class RunPipelineUseCase {
  constructor(
    private readonly loaders: LoaderLookup,
    private readonly reprocess: ReprocessErrorsUseCase,
    private readonly logger: ILogger,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Every entity type in dependency order. A type that throws counts as one
   * failure and the run moves on; the error pass follows the full run.
   */
  async runAll(options: RunOptions = {}): Promise<LoadResult> {
    const start = this.now();
    let total = emptyLoadResult();
    this.logger.info("Starting full load", { update: options.update ?? false });

    for (const entityType of ENTITY_LOAD_ORDER) {
      total = addLoadResults(total, await this.loadType(entityType, options));
    }
    this.logSummary("Full load complete", total, start);

    try {
      await this.reprocess.execute();
    } catch (err) {
      this.logger.error("Error reprocessing failed", { error: errorMessage(err) });
    }
    return total;
  }

  /** One type, or one record of it when `entityId` is given. No error pass. */
  async runOne(entityType: EntityType, options: RunOneOptions = {}): Promise<LoadResult> {
    const start = this.now();
    let result: LoadResult;
    if (options.entityId !== undefined) {
      const id = options.entityId;
      let loaded = false;
      try {
        loaded = await this.loaders.get(entityType).loadById(id);
      } catch (err) {
        this.logger.error(`Failed to load ${entityType} ${id}`, { error: errorMessage(err) });
      }
      result = { totalRecords: 1, successCount: loaded ? 1 : 0, failedCount: loaded ? 0 : 1 };
    } else {
      result = await this.loadType(entityType, options);
    }
    this.logSummary(`Load of ${entityType} complete`, result, start);
    return result;
  }

  private async loadType(entityType: EntityType, options: RunOptions): Promise<LoadResult> {
    try {
      return await this.loaders.get(entityType).loadAll({
        update: options.update,
        batchSize: options.batchSize,
      });
    } catch (err) {
      this.logger.error(`Loading ${entityType} failed, continuing`, { error: errorMessage(err) });
      return failedLoadResult();
    }
  }

  private logSummary(message: string, result: LoadResult, start: number): void {
    this.logger.info(message, {
      total: result.totalRecords,
      success: result.successCount,
      failed: result.failedCount,
      durationMs: this.now() - start,
    });
  }
}
