import { EntityType } from "./entity-type.entity.js";

/** Durable progress marker for one entity type. */
export interface Checkpoint {
  entityType: EntityType;
  /** Items handled so far in the current traversal; used to resume. */
  recordsProcessed: number;
  /** Upstream pagination offset to request next. */
  apiOffset: number;
  /** Set only when a traversal reached the last page. Feeds `since` on update runs. */
  lastCompletedTimestamp: string | null;
  updatedAt: string;
}

export interface SaveCheckpointOptions {
  /** Explicit next offset. When omitted it is derived from recordsProcessed. */
  apiOffset?: number;
  completed?: boolean;
}

export interface SinceQuery {
  since?: string;
}

/** Page size assumed when an offset has to be derived from a record count. */
export const FALLBACK_PAGE_SIZE = 50;

export function deriveApiOffset(recordsProcessed: number): number {
  return Math.floor(recordsProcessed / FALLBACK_PAGE_SIZE) * FALLBACK_PAGE_SIZE;
}
