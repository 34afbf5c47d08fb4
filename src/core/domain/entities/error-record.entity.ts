import { EntityType } from "./entity-type.entity.js";

export type ErrorContext = Record<string, unknown>;

/** One failed unit of work, as stored in the daily error ledger partition. */
export interface ErrorRecord {
  timestamp: string;
  entity_type: EntityType;
  entity_id: number;
  error_kind: string;
  message: string;
  additional_context: ErrorContext;
  stack_trace: string | null;
}
