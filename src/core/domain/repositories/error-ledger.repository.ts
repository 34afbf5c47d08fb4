import { EntityType } from "../entities/entity-type.entity.js";
import { ErrorContext, ErrorRecord } from "../entities/error-record.entity.js";

export interface LogErrorInput {
  entityType: EntityType;
  entityId: number;
  errorKind: string;
  message: string;
  additionalContext?: ErrorContext;
  stackTrace?: string | null;
}

/**
 * Append-only store of failed units of work, partitioned by calendar day.
 * Implementations never throw from `logError`.
 */
export interface IErrorLedger {
  logError(input: LogErrorInput): void;
  /** Records of today's partition, optionally for one type. */
  getErrors(entityType?: EntityType): ErrorRecord[];
  /** Records of every partition, oldest partition first. */
  getAllErrors(): ErrorRecord[];
  listPartitions(): string[];
}
