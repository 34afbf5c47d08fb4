import { EntityType } from "../domain/entities/entity-type.entity.js";
import { ErrorContext } from "../domain/entities/error-record.entity.js";
import { emptyLoadResult, LoadResult } from "../domain/entities/load-result.entity.js";
import {
  ApiError,
  errorClassName,
  errorMessage,
} from "../domain/errors/api.errors.js";
import { ICheckpointRepository } from "../domain/repositories/checkpoint.repository.js";
import { IEntityStore, StoreTable } from "../domain/repositories/entity-store.repository.js";
import { IErrorLedger } from "../domain/repositories/error-ledger.repository.js";
import {
  ICrmApi,
  Identified,
  ListPage,
  ListQuery,
  pageSize,
  parseNextOffset,
} from "../domain/services/crm-api.service.js";
import { ILogger } from "../domain/services/logger.service.js";
import { RetryPolicy } from "../domain/services/retry-policy.service.js";

export const DEFAULT_BATCH_SIZE = 50;

function isQuotaExhausted(err: unknown): boolean {
  return err instanceof ApiError && err.kind === "quota_exhausted";
}

export interface LoadAllOptions {
  batchSize?: number;
  update?: boolean;
}

export interface EntityLoader {
  readonly entityType: EntityType;
  readonly supportsPagination: boolean;
  readonly supportsSince: boolean;
  list(query: ListQuery): Promise<ListPage<Identified>>;
  loadById(id: number): Promise<boolean>;
  loadAll(options?: LoadAllOptions): Promise<LoadResult>;
}

/** Late-bound access to sibling loaders, for records that pull in their parents. */
export interface LoaderLookup {
  get(entityType: EntityType): EntityLoader;
}

export interface LoaderDeps {
  api: ICrmApi;
  store: IEntityStore;
  checkpoints: ICheckpointRepository;
  ledger: IErrorLedger;
  retry: RetryPolicy;
  logger: ILogger;
  loaders: LoaderLookup;
}

/**
 * Shared list/fetch/resolve/persist template. Subclasses say how a record is
 * listed, fetched and written; paging, checkpoints, retries and failure
 * bookkeeping live here.
 *
 * `TPrepared` is whatever `resolveRelationships` gathered for the write, so
 * all remote calls happen before the write transaction opens.
 */
export abstract class BaseEntityLoader<
  TRecord extends Identified,
  TPrepared = TRecord,
  TListed extends Identified = Identified,
> implements EntityLoader
{
  abstract readonly entityType: EntityType;
  readonly supportsPagination: boolean = true;
  readonly supportsSince: boolean = true;

  protected readonly api: ICrmApi;
  protected readonly store: IEntityStore;
  protected readonly checkpoints: ICheckpointRepository;
  protected readonly ledger: IErrorLedger;
  protected readonly retry: RetryPolicy;
  protected readonly loaders: LoaderLookup;
  private readonly baseLogger: ILogger;
  private scopedLogger: ILogger | null = null;

  constructor(deps: LoaderDeps) {
    this.api = deps.api;
    this.store = deps.store;
    this.checkpoints = deps.checkpoints;
    this.ledger = deps.ledger;
    this.retry = deps.retry;
    this.loaders = deps.loaders;
    this.baseLogger = deps.logger;
  }

  protected get logger(): ILogger {
    this.scopedLogger ??= this.baseLogger.child(this.entityType);
    return this.scopedLogger;
  }

  protected abstract listPage(query: ListQuery): Promise<ListPage<TListed>>;
  protected abstract fetchDetail(id: number): Promise<TRecord>;
  protected abstract resolveRelationships(record: TRecord): Promise<TPrepared>;
  /** Runs inside the write transaction. */
  protected abstract persist(prepared: TPrepared): void;

  /** Ledger context for a failed record. */
  protected describe(_record: TRecord): ErrorContext {
    return {};
  }

  /** Commit one prepared record. Overridden where parts commit separately. */
  protected write(prepared: TPrepared): void {
    this.store.transaction(() => this.persist(prepared));
  }

  protected processListedItem(item: TListed): Promise<boolean> {
    return this.loadById(item.id);
  }

  list(query: ListQuery): Promise<ListPage<TListed>> {
    return this.retry.execute(() => this.listPage(query), {
      logger: this.logger,
      label: `list ${this.entityType} offset=${query.offset}`,
    });
  }

  loadById(id: number): Promise<boolean> {
    return this.loadWith(id, () => this.fetchDetail(id));
  }

  /** Retry-wrapped load of one record obtained from `source`. */
  protected loadWith(id: number, source: () => Promise<TRecord>): Promise<boolean> {
    return this.retry.execute(() => this.attemptLoad(id, source), {
      logger: this.logger,
      label: `load ${this.entityType} ${id}`,
    });
  }

  private async attemptLoad(id: number, source: () => Promise<TRecord>): Promise<boolean> {
    this.store.ensureClean();
    let record: TRecord | null = null;
    try {
      record = await source();
      const prepared = await this.resolveRelationships(record);
      this.write(prepared);
      this.logger.debug("Loaded record", { id });
      return true;
    } catch (err) {
      if (this.retry.isRetryable(err)) throw err;
      if (!isQuotaExhausted(err)) this.store.ensureClean();
      this.recordFailure(id, err, record);
      return false;
    }
  }

  async loadAll(options: LoadAllOptions = {}): Promise<LoadResult> {
    const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    const sinceQuery = this.checkpoints.queryParamsFor(
      this.entityType,
      options.update ?? false,
      this.supportsSince,
    );
    try {
      return this.supportsPagination
        ? await this.loadPaginated(batchSize, sinceQuery.since)
        : await this.loadUnpaginated(batchSize);
    } catch (err) {
      this.logger.error(`Failed to load ${this.entityType}`, { error: errorMessage(err) });
      this.ledger.logError({
        entityType: this.entityType,
        entityId: 0,
        errorKind: errorClassName(err),
        message: errorMessage(err),
        additionalContext: { operation: `load_${this.entityType}`, batchSize },
        stackTrace: err instanceof Error ? (err.stack ?? null) : null,
      });
      throw err;
    }
  }

  private async loadPaginated(batchSize: number, since: string | undefined): Promise<LoadResult> {
    const type = this.entityType;
    const sinceRun = since !== undefined;
    let offset = sinceRun ? 0 : this.checkpoints.getApiOffset(type);
    let processed = sinceRun ? 0 : this.checkpoints.getCheckpoint(type);
    const result = emptyLoadResult();
    this.logger.info(`Loading ${type}`, { offset, processed, since: since ?? null, batchSize });

    for (;;) {
      const page = await this.list({ limit: batchSize, offset, since });
      if (pageSize(page) === 0) {
        this.checkpoints.saveCheckpoint(type, processed, { apiOffset: offset, completed: true });
        break;
      }

      await this.tallyPage(page, result);
      processed += pageSize(page);

      const nextOffset = parseNextOffset(page.next);
      if (nextOffset === null || nextOffset <= offset) {
        if (nextOffset !== null) {
          this.logger.warn("Next page cursor does not advance, stopping", { offset, nextOffset });
        }
        this.checkpoints.saveCheckpoint(type, processed, {
          apiOffset: offset + pageSize(page),
          completed: true,
        });
        break;
      }
      this.checkpoints.saveCheckpoint(type, processed, { apiOffset: nextOffset });
      this.logger.info(`Processed page of ${type}`, {
        offset,
        nextOffset,
        processed,
        success: result.successCount,
        failed: result.failedCount,
      });
      offset = nextOffset;
    }

    this.logger.info(`Finished ${type}`, { ...result });
    return result;
  }

  private async loadUnpaginated(batchSize: number): Promise<LoadResult> {
    const type = this.entityType;
    const page = await this.list({ limit: batchSize, offset: 0 });
    const result = emptyLoadResult();
    await this.tallyPage(page, result);
    this.checkpoints.saveCheckpoint(type, pageSize(page), { apiOffset: 0, completed: true });
    this.logger.info(`Finished ${type}`, { ...result });
    return result;
  }

  /** Process every listed item, then count the entries the listing rejected. */
  private async tallyPage(page: ListPage<TListed>, result: LoadResult): Promise<void> {
    for (const item of page.items) {
      result.totalRecords++;
      if (await this.processSafely(item)) result.successCount++;
      else result.failedCount++;
    }
    for (const rejected of page.rejected ?? []) {
      result.totalRecords++;
      result.failedCount++;
      this.recordFailure(rejected.id ?? 0, rejected.error, null);
    }
  }

  /** One item never aborts the batch, even once its retries run out. */
  private async processSafely(item: TListed): Promise<boolean> {
    try {
      return await this.processListedItem(item);
    } catch (err) {
      this.recordFailure(item.id, err, null);
      return false;
    }
  }

  /**
   * Sub-resource fetch whose failure degrades to `fallback` with a warning.
   * Conditions the retry policy handles still propagate.
   */
  protected async fetchOptional<T>(what: string, fetch: () => Promise<T>, fallback: T): Promise<T> {
    try {
      return await fetch();
    } catch (err) {
      if (this.mustPropagate(err)) throw err;
      this.logger.warn(`Failed to fetch ${what}, continuing without it`, { error: errorMessage(err) });
      return fallback;
    }
  }

  /**
   * Make sure a referenced record is stored, loading it through its own
   * loader when missing. Returns whether it is stored afterwards.
   */
  protected async ensureLoaded(entityType: EntityType, table: StoreTable, id: number): Promise<boolean> {
    if (this.store.exists(table, id)) return true;
    this.logger.info("Loading missing reference", { entityType, id });
    try {
      await this.loaders.get(entityType).loadById(id);
    } catch (err) {
      this.logger.warn("Failed to load missing reference", {
        entityType,
        id,
        error: errorMessage(err),
      });
    }
    return this.store.exists(table, id);
  }

  /** Conditions no single record can absorb: retried, or fatal for the run. */
  protected mustPropagate(err: unknown): boolean {
    return this.retry.isRetryable(err) || isQuotaExhausted(err);
  }

  protected recordFailure(id: number, err: unknown, record: TRecord | null): void {
    const context: ErrorContext = record
      ? { [`${this.entityType}_id`]: id, ...this.describe(record) }
      : { [`${this.entityType}_id`]: id };
    this.ledger.logError({
      entityType: this.entityType,
      entityId: id,
      errorKind: errorClassName(err),
      message: errorMessage(err),
      additionalContext: context,
      stackTrace: err instanceof Error ? (err.stack ?? null) : null,
    });
  }
}
