import { EntityType } from "../../src/core/domain/entities/entity-type.entity.js";
import { ErrorRecord } from "../../src/core/domain/entities/error-record.entity.js";
import {
  IErrorLedger,
  LogErrorInput,
} from "../../src/core/domain/repositories/error-ledger.repository.js";

export class MemoryErrorLedger implements IErrorLedger {
  readonly records: ErrorRecord[] = [];

  logError(input: LogErrorInput): void {
    this.records.push({
      timestamp: "2026-03-01T00:00:00.000Z",
      entity_type: input.entityType,
      entity_id: input.entityId,
      error_kind: input.errorKind,
      message: input.message,
      additional_context: input.additionalContext ?? {},
      stack_trace: input.stackTrace ?? null,
    });
  }

  getErrors(entityType?: EntityType): ErrorRecord[] {
    return entityType ? this.records.filter((r) => r.entity_type === entityType) : [...this.records];
  }

  getAllErrors(): ErrorRecord[] {
    return [...this.records];
  }

  listPartitions(): string[] {
    return this.records.length > 0 ? ["memory"] : [];
  }
}
