import {
  Checkpoint,
  deriveApiOffset,
  SaveCheckpointOptions,
  SinceQuery,
} from "../../core/domain/entities/checkpoint.entity.js";
import {
  EntityType,
  isEntityType,
} from "../../core/domain/entities/entity-type.entity.js";
import { ICheckpointRepository } from "../../core/domain/repositories/checkpoint.repository.js";
import { ILogger } from "../../core/domain/services/logger.service.js";
import { SqliteDatabase } from "./sqlite-connection.js";

/** Typed row shape returned by better-sqlite3 for tbl_checkpoints */
interface CheckpointRow {
  entity_type: string;
  records_processed: number;
  api_offset: number;
  last_completed_timestamp: string | null;
  updated_at: string;
}

/**
 * Checkpoints as rows of tbl_checkpoints, one per entity type. Each save is a
 * single upsert statement, so a crash leaves either the old or the new row.
 */
export class SqliteCheckpointRepository implements ICheckpointRepository {
  constructor(
    private readonly db: SqliteDatabase,
    private readonly logger: ILogger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS tbl_checkpoints (
        entity_type              TEXT PRIMARY KEY,
        records_processed        INTEGER NOT NULL DEFAULT 0,
        api_offset               INTEGER NOT NULL DEFAULT 0,
        last_completed_timestamp TEXT,
        updated_at               TEXT NOT NULL
      );
    `);
  }

  getCheckpoint(entityType: EntityType): number {
    return this.getRow(entityType)?.records_processed ?? 0;
  }

  getApiOffset(entityType: EntityType): number {
    return this.getRow(entityType)?.api_offset ?? 0;
  }

  getLastCompleted(entityType: EntityType): string | null {
    return this.getRow(entityType)?.last_completed_timestamp ?? null;
  }

  saveCheckpoint(
    entityType: EntityType,
    recordsProcessed: number,
    options: SaveCheckpointOptions = {},
  ): void {
    let apiOffset = options.apiOffset;
    if (apiOffset === undefined) {
      apiOffset = deriveApiOffset(recordsProcessed);
      this.logger.warn("api_offset not given, derived from records processed", {
        entityType,
        recordsProcessed,
        apiOffset,
      });
    }
    const now = this.now().toISOString();
    const previous = this.getLastCompleted(entityType);
    this.db
      .prepare(
        `
        INSERT INTO tbl_checkpoints
          (entity_type, records_processed, api_offset, last_completed_timestamp, updated_at)
        VALUES (?, ?, ?, ?, ?)
        ON CONFLICT(entity_type) DO UPDATE SET
          records_processed        = excluded.records_processed,
          api_offset               = excluded.api_offset,
          last_completed_timestamp = excluded.last_completed_timestamp,
          updated_at               = excluded.updated_at
      `,
      )
      .run(
        entityType,
        recordsProcessed,
        apiOffset,
        options.completed ? now : previous,
        now,
      );
  }

  queryParamsFor(
    entityType: EntityType,
    isUpdate: boolean,
    supportsSince = true,
  ): SinceQuery {
    if (!isUpdate || !supportsSince) return {};
    const since = this.getLastCompleted(entityType);
    return since ? { since } : {};
  }

  getAll(): Checkpoint[] {
    return this.db
      .prepare<[], CheckpointRow>("SELECT * FROM tbl_checkpoints ORDER BY entity_type")
      .all()
      .flatMap((row) => {
        const entityType = row.entity_type;
        if (!isEntityType(entityType)) return [];
        return [
          {
            entityType,
            recordsProcessed: row.records_processed,
            apiOffset: row.api_offset,
            lastCompletedTimestamp: row.last_completed_timestamp,
            updatedAt: row.updated_at,
          },
        ];
      });
  }

  clear(entityType: EntityType): void {
    this.db.prepare("DELETE FROM tbl_checkpoints WHERE entity_type = ?").run(entityType);
  }

  clearAll(): void {
    this.db.exec("DELETE FROM tbl_checkpoints");
    this.logger.info("All checkpoints cleared");
  }

  private getRow(entityType: EntityType): CheckpointRow | undefined {
    return this.db
      .prepare<[string], CheckpointRow>(
        "SELECT * FROM tbl_checkpoints WHERE entity_type = ?",
      )
      .get(entityType);
  }
}
