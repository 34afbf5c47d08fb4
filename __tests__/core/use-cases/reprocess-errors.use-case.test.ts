import { describe, expect, it } from "vitest";
import { ErrorRecord } from "../../../src/core/domain/entities/error-record.entity.js";
import { NotFoundError } from "../../../src/core/domain/errors/api.errors.js";
import {
  collectMissingDependencies,
  isReplayable,
  ReprocessErrorsUseCase,
  selectForReplay,
} from "../../../src/core/use-cases/reprocess-errors.use-case.js";
import { createHarness } from "../../helpers/harness.js";
import { makeAffiliate, makeOrder } from "../../helpers/fixtures.js";

const FK_MESSAGE =
  'insert or update on table "orders" violates foreign key constraint: ' +
  'Key (lead_affiliate_id)=(42) is not present in table "affiliates"';

function record(overrides: Partial<ErrorRecord>): ErrorRecord {
  return {
    timestamp: "2026-03-01T00:00:00.000Z",
    entity_type: "orders",
    entity_id: 20,
    error_kind: "ForeignKeyViolationError",
    message: FK_MESSAGE,
    additional_context: {},
    stack_trace: null,
    ...overrides,
  };
}

describe("isReplayable", () => {
  it("accepts foreign key failures of a concrete record", () => {
    expect(isReplayable(record({}))).toBe(true);
    expect(isReplayable(record({ entity_id: 0 }))).toBe(false);
    expect(isReplayable(record({ error_kind: "NotFoundError", message: "Resource not found" }))).toBe(false);
  });

  it("accepts an integrity error only when it names the missing key", () => {
    expect(
      isReplayable(record({ error_kind: "IntegrityError", message: "constraint failed", stack_trace: FK_MESSAGE })),
    ).toBe(true);
    expect(
      isReplayable(record({ error_kind: "IntegrityError", message: "SQLITE_CONSTRAINT_UNIQUE: dup" })),
    ).toBe(false);
  });
});

describe("collectMissingDependencies", () => {
  it("groups missing ids by the type that can load them", () => {
    const missing = collectMissingDependencies([
      record({}),
      record({ entity_id: 21 }),
      record({
        entity_type: "tasks",
        message: 'Key (contact_id)=(5) is not present in table "contacts"',
      }),
      record({ message: 'Key (payment_gateway_id)=(4) is not present in table "payment_gateways"' }),
      record({ message: "Resource not found" }),
    ]);
    expect([...missing.entries()].map(([type, ids]) => [type, [...ids]])).toEqual([
      ["affiliates", [42]],
      ["contacts", [5]],
    ]);
  });
});

describe("selectForReplay", () => {
  it("keeps one entry per record in ledger order", () => {
    expect(
      selectForReplay([
        record({ entity_id: 21 }),
        record({}),
        record({ entity_id: 21 }),
        record({ entity_type: "tasks", entity_id: 21 }),
      ]),
    ).toEqual([
      { entityType: "orders", entityId: 21 },
      { entityType: "orders", entityId: 20 },
      { entityType: "tasks", entityId: 21 },
    ]);
  });
});

describe("ReprocessErrorsUseCase", () => {
  it("backfills the missing affiliate and replays the order", async () => {
    const h = createHarness();
    h.api.affiliates.set(42, makeAffiliate(42));
    h.api.orders.set(20, makeOrder(20, { leadAffiliateId: 42 }));
    h.api.failOn("getAffiliate:42", new NotFoundError("Resource not found: affiliates/42"));
    await expect(h.loader("orders").loadById(20)).resolves.toBe(false);

    const stats = await new ReprocessErrorsUseCase(h.ledger, h.registry, h.logger).execute();

    expect(stats).toEqual({
      totalErrors: 2,
      selectedForReplay: 1,
      successfulReprocesses: 1,
      failedReprocesses: 0,
      missingDependencies: { affiliates: 1 },
      reprocessedEntities: { orders: 1 },
    });
    expect(h.store.findById("orders", 20)?.lead_affiliate_id).toBe(42);
    expect(h.logger.messages("info")).toContain("Backfilled dependency");
  });

  it("counts a replay that still fails", async () => {
    const h = createHarness();
    h.api.orders.set(20, makeOrder(20, { leadAffiliateId: 42 }));
    await h.loader("orders").loadById(20);

    const stats = await new ReprocessErrorsUseCase(h.ledger, h.registry, h.logger).execute();

    expect(stats.successfulReprocesses).toBe(0);
    expect(stats.failedReprocesses).toBe(1);
    expect(h.logger.messages("info")).toContain("Could not backfill dependency");
    expect(h.store.exists("orders", 20)).toBe(false);
  });

  it("does nothing on an empty ledger", async () => {
    const h = createHarness();

    const stats = await new ReprocessErrorsUseCase(h.ledger, h.registry, h.logger).execute();

    expect(stats.totalErrors).toBe(0);
    expect(stats.selectedForReplay).toBe(0);
    expect(h.api.calls).toEqual([]);
  });
});
