import { existsSync, readdirSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { ENTITY_LOAD_ORDER, EntityType } from "../../core/domain/entities/entity-type.entity.js";
import { ErrorRecord } from "../../core/domain/entities/error-record.entity.js";
import {
  IErrorLedger,
  LogErrorInput,
} from "../../core/domain/repositories/error-ledger.repository.js";
import { ILogger } from "../../core/domain/services/logger.service.js";
import { ensureDir, readJsonFile, writeJsonAtomic } from "../utils/storage.utils.js";

const PARTITION_PATTERN = /^data_load_errors_(\d{8})\.json$/;

const errorRecordSchema = z.object({
  timestamp: z.string(),
  entity_type: z.enum(ENTITY_LOAD_ORDER),
  entity_id: z.number(),
  error_kind: z.string(),
  message: z.string(),
  additional_context: z.record(z.string(), z.unknown()).default({}),
  stack_trace: z.string().nullable().default(null),
});

export function partitionName(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return `data_load_errors_${y}${m}${d}.json`;
}

/**
 * Error ledger as one JSON array file per local calendar day. Appends read the
 * partition, add the record and rewrite it atomically. Write failures are
 * logged, never thrown.
 */
export class JsonErrorLedger implements IErrorLedger {
  constructor(
    private readonly dir: string,
    private readonly logger: ILogger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  logError(input: LogErrorInput): void {
    const record: ErrorRecord = {
      timestamp: this.now().toISOString(),
      entity_type: input.entityType,
      entity_id: input.entityId,
      error_kind: input.errorKind,
      message: input.message,
      additional_context: input.additionalContext ?? {},
      stack_trace: input.stackTrace ?? null,
    };
    this.logger.error(
      `Error processing ${input.entityType} ${input.entityId}: ${input.message}`,
      { errorKind: input.errorKind, ...record.additional_context },
    );
    const path = this.currentPartitionPath();
    try {
      ensureDir(this.dir);
      const records = this.readPartition(path);
      records.push(record);
      writeJsonAtomic(path, records);
    } catch (e) {
      this.logger.error("Failed to write error ledger", {
        path,
        error: e instanceof Error ? e.message : String(e),
      });
    }
  }

  getErrors(entityType?: EntityType): ErrorRecord[] {
    const records = this.readPartition(this.currentPartitionPath());
    return entityType ? records.filter((r) => r.entity_type === entityType) : records;
  }

  getAllErrors(): ErrorRecord[] {
    return this.listPartitions().flatMap((name) => this.readPartition(join(this.dir, name)));
  }

  listPartitions(): string[] {
    if (!existsSync(this.dir)) return [];
    return readdirSync(this.dir)
      .filter((name) => PARTITION_PATTERN.test(name))
      .sort();
  }

  private currentPartitionPath(): string {
    return join(this.dir, partitionName(this.now()));
  }

  private readPartition(path: string): ErrorRecord[] {
    const result = readJsonFile(path);
    if (result.status === "missing") return [];
    if (result.status === "corrupt") {
      this.logger.warn("Error ledger partition is corrupt, treating as empty", {
        path,
        error: result.error,
      });
      return [];
    }
    if (!Array.isArray(result.value)) {
      this.logger.warn("Error ledger partition is not an array, treating as empty", { path });
      return [];
    }
    const records: ErrorRecord[] = [];
    for (const item of result.value) {
      const parsed = errorRecordSchema.safeParse(item);
      if (parsed.success) records.push(parsed.data);
      else this.logger.warn("Skipping malformed error record", { path });
    }
    return records;
  }
}
