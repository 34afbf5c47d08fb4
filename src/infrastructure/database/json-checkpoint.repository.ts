import { z } from "zod";
import {
  Checkpoint,
  deriveApiOffset,
  SaveCheckpointOptions,
  SinceQuery,
} from "../../core/domain/entities/checkpoint.entity.js";
import {
  ENTITY_LOAD_ORDER,
  EntityType,
  isEntityType,
} from "../../core/domain/entities/entity-type.entity.js";
import { ICheckpointRepository } from "../../core/domain/repositories/checkpoint.repository.js";
import { ILogger } from "../../core/domain/services/logger.service.js";
import { readJsonFile, writeJsonAtomic } from "../utils/storage.utils.js";

const storedCheckpointSchema = z.object({
  records_processed: z.number().int().nonnegative(),
  api_offset: z.number().int().nonnegative().optional(),
  last_completed_timestamp: z.string().nullable().optional(),
  updated_at: z.string().optional(),
});

const checkpointFileSchema = z.record(z.string(), z.unknown());

type StoredCheckpoint = z.infer<typeof storedCheckpointSchema>;
type CheckpointFile = Record<string, StoredCheckpoint>;

/**
 * Checkpoints kept in one human-editable JSON file keyed by entity type.
 * The whole file is rewritten through a temp file and a rename on each save.
 */
export class JsonCheckpointRepository implements ICheckpointRepository {
  constructor(
    private readonly filePath: string,
    private readonly logger: ILogger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  getCheckpoint(entityType: EntityType): number {
    return this.read()[entityType]?.records_processed ?? 0;
  }

  getApiOffset(entityType: EntityType): number {
    const stored = this.read()[entityType];
    if (!stored) return 0;
    if (stored.api_offset !== undefined) return stored.api_offset;
    // legacy entries carried only a record count
    const derived = deriveApiOffset(stored.records_processed);
    this.logger.warn("Checkpoint has no api_offset, derived from records processed", {
      entityType,
      recordsProcessed: stored.records_processed,
      apiOffset: derived,
    });
    return derived;
  }

  getLastCompleted(entityType: EntityType): string | null {
    return this.read()[entityType]?.last_completed_timestamp ?? null;
  }

  saveCheckpoint(
    entityType: EntityType,
    recordsProcessed: number,
    options: SaveCheckpointOptions = {},
  ): void {
    const data = this.read();
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
    data[entityType] = {
      records_processed: recordsProcessed,
      api_offset: apiOffset,
      last_completed_timestamp: options.completed
        ? now
        : (data[entityType]?.last_completed_timestamp ?? null),
      updated_at: now,
    };
    writeJsonAtomic(this.filePath, data);
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
    const data = this.read();
    return ENTITY_LOAD_ORDER.filter((t) => data[t] !== undefined).map((entityType) => ({
      entityType,
      recordsProcessed: this.getCheckpoint(entityType),
      apiOffset: this.getApiOffset(entityType),
      lastCompletedTimestamp: this.getLastCompleted(entityType),
      updatedAt: data[entityType]?.updated_at ?? "",
    }));
  }

  clear(entityType: EntityType): void {
    const data = this.read();
    if (!(entityType in data)) return;
    delete data[entityType];
    writeJsonAtomic(this.filePath, data);
  }

  clearAll(): void {
    writeJsonAtomic(this.filePath, {});
    this.logger.info("All checkpoints cleared");
  }

  private read(): CheckpointFile {
    const result = readJsonFile(this.filePath);
    if (result.status === "missing") return {};
    if (result.status === "corrupt") {
      this.logger.warn("Checkpoint file is not valid JSON, treating as empty", {
        path: this.filePath,
        error: result.error,
      });
      return {};
    }
    const parsed = checkpointFileSchema.safeParse(result.value);
    if (!parsed.success) {
      this.logger.warn("Checkpoint file has an unexpected shape, treating as empty", {
        path: this.filePath,
        error: parsed.error.message,
      });
      return {};
    }
    // Entries are validated one by one so a bad entry costs only its own type.
    const out: CheckpointFile = {};
    for (const [key, value] of Object.entries(parsed.data)) {
      if (!isEntityType(key)) continue;
      const entry = storedCheckpointSchema.safeParse(value);
      if (entry.success) {
        out[key] = entry.data;
        continue;
      }
      this.logger.warn("Ignoring invalid checkpoint entry", {
        path: this.filePath,
        entityType: key,
        error: entry.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "),
      });
    }
    return out;
  }
}
