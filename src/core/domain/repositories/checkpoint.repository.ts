import {
  Checkpoint,
  SaveCheckpointOptions,
  SinceQuery,
} from "../entities/checkpoint.entity.js";
import { EntityType } from "../entities/entity-type.entity.js";

/**
 * Durable per-type progress store. Every save must be atomic with respect to a
 * process crash: a reader sees either the previous or the new checkpoint.
 */
export interface ICheckpointRepository {
  /** Records processed in the current traversal (0 if none stored). */
  getCheckpoint(entityType: EntityType): number;
  getApiOffset(entityType: EntityType): number;
  getLastCompleted(entityType: EntityType): string | null;
  saveCheckpoint(
    entityType: EntityType,
    recordsProcessed: number,
    options?: SaveCheckpointOptions,
  ): void;
  /** `{ since }` only for update runs of since-capable types with a prior completion. */
  queryParamsFor(
    entityType: EntityType,
    isUpdate: boolean,
    supportsSince?: boolean,
  ): SinceQuery;
  getAll(): Checkpoint[];
  clear(entityType: EntityType): void;
  clearAll(): void;
}
