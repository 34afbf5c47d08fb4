import {
  BACKFILL_ORDER,
  EntityType,
  entityTypeForTable,
} from "../domain/entities/entity-type.entity.js";
import { ErrorRecord } from "../domain/entities/error-record.entity.js";
import { errorMessage } from "../domain/errors/api.errors.js";
import { MissingReference, parseMissingReference } from "../domain/errors/integrity.errors.js";
import { IErrorLedger } from "../domain/repositories/error-ledger.repository.js";
import { ILogger } from "../domain/services/logger.service.js";
import { LoaderLookup } from "../loaders/base-entity.loader.js";

export interface ReprocessStats {
  totalErrors: number;
  selectedForReplay: number;
  successfulReprocesses: number;
  failedReprocesses: number;
  /** Distinct missing parents found per entity type. */
  missingDependencies: Partial<Record<EntityType, number>>;
  /** Replayed records that loaded, per entity type. */
  reprocessedEntities: Partial<Record<EntityType, number>>;
}

type MissingByType = Map<EntityType, Set<number>>;

function missingReferenceOf(record: ErrorRecord): MissingReference | null {
  return (
    parseMissingReference(record.message) ??
    (record.stack_trace ? parseMissingReference(record.stack_trace) : null)
  );
}

/** Foreign-key failures are the only ones a backfill can fix. */
export function isReplayable(record: ErrorRecord): boolean {
  if (record.entity_id <= 0) return false;
  if (record.error_kind === "ForeignKeyViolationError") return true;
  return record.error_kind === "IntegrityError" && missingReferenceOf(record) !== null;
}

export function collectMissingDependencies(records: readonly ErrorRecord[]): MissingByType {
  const missing: MissingByType = new Map();
  for (const record of records) {
    const ref = missingReferenceOf(record);
    if (!ref) continue;
    const type = entityTypeForTable(ref.table);
    if (!type) continue;
    let ids = missing.get(type);
    if (!ids) {
      ids = new Set();
      missing.set(type, ids);
    }
    ids.add(ref.id);
  }
  return missing;
}

/** Distinct (type, id) pairs to replay, in ledger order. */
export function selectForReplay(
  records: readonly ErrorRecord[],
): Array<{ entityType: EntityType; entityId: number }> {
  const seen = new Set<string>();
  const selected: Array<{ entityType: EntityType; entityId: number }> = [];
  for (const record of records) {
    if (!isReplayable(record)) continue;
    const key = `${record.entity_type}:${record.entity_id}`;
    if (seen.has(key)) continue;
    seen.add(key);
    selected.push({ entityType: record.entity_type, entityId: record.entity_id });
  }
  return selected;
}

/**
 * Second pass over the error ledger: load the parents foreign-key failures
 * pointed at, then replay the records that failed on them. Failures here are
 * logged and counted, never thrown.
 */
export class ReprocessErrorsUseCase {
  constructor(
    private readonly ledger: IErrorLedger,
    private readonly loaders: LoaderLookup,
    private readonly logger: ILogger,
  ) {}

  async execute(): Promise<ReprocessStats> {
    const records = this.ledger.getAllErrors();
    const stats: ReprocessStats = {
      totalErrors: records.length,
      selectedForReplay: 0,
      successfulReprocesses: 0,
      failedReprocesses: 0,
      missingDependencies: {},
      reprocessedEntities: {},
    };
    this.logger.info("Reprocessing recorded errors", { totalErrors: records.length });

    // 1. Extract missing parents
    const missing = collectMissingDependencies(records);
    for (const [type, ids] of missing) stats.missingDependencies[type] = ids.size;

    // 2. Backfill parents first
    for (const type of BACKFILL_ORDER) {
      for (const id of missing.get(type) ?? []) {
        const loaded = await this.tryLoad(type, id);
        this.logger.info(loaded ? "Backfilled dependency" : "Could not backfill dependency", {
          entityType: type,
          id,
        });
      }
    }

    // 3. Replay the original failures
    const replay = selectForReplay(records);
    stats.selectedForReplay = replay.length;
    for (const { entityType, entityId } of replay) {
      if (await this.tryLoad(entityType, entityId)) {
        stats.successfulReprocesses++;
        stats.reprocessedEntities[entityType] = (stats.reprocessedEntities[entityType] ?? 0) + 1;
      } else {
        stats.failedReprocesses++;
      }
    }

    this.logger.info("Reprocessing complete", { ...stats });
    return stats;
  }

  private async tryLoad(entityType: EntityType, id: number): Promise<boolean> {
    try {
      return await this.loaders.get(entityType).loadById(id);
    } catch (err) {
      this.logger.error("Reprocess attempt failed", { entityType, id, error: errorMessage(err) });
      return false;
    }
  }
}
