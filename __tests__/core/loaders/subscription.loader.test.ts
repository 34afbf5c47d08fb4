import { describe, expect, it } from "vitest";
import { CrmApiAdapter } from "../../../src/adapters/crm-api.adapter.js";
import { NotFoundError } from "../../../src/core/domain/errors/api.errors.js";
import { RetryPolicy } from "../../../src/core/domain/services/retry-policy.service.js";
import { LoaderRegistry } from "../../../src/core/loaders/loader.registry.js";
import type { CrmTransport } from "../../../src/infrastructure/services/http-crm-client.service.js";
import { createHarness, Harness } from "../../helpers/harness.js";
import { makeSubscription } from "../../helpers/fixtures.js";

/** Loaders over the real adapter, serving one canned subscriptions listing. */
function registryServing(h: Harness, listing: unknown): LoaderRegistry {
  const transport: CrmTransport = {
    get: (path) =>
      path === "subscriptions"
        ? Promise.resolve(listing)
        : Promise.reject(new NotFoundError(`Resource not found: ${path}`)),
  };
  return new LoaderRegistry({
    api: new CrmApiAdapter(transport, h.logger),
    store: h.store,
    checkpoints: h.checkpoints,
    ledger: h.ledger,
    retry: new RetryPolicy({ maxRetries: 0 }),
    logger: h.logger,
  });
}

describe("SubscriptionLoader", () => {
  it("stores listed subscriptions without fetching them again", async () => {
    const h = createHarness();
    h.api.subscriptions.set(1, makeSubscription(1, { status: "Active" }));
    h.api.subscriptions.set(2, makeSubscription(2, { status: "Inactive" }));

    const result = await h.loader("subscriptions").loadAll({ batchSize: 1 });

    expect(result).toEqual({ totalRecords: 2, successCount: 2, failedCount: 0 });
    expect(h.store.findById("subscriptions", 2)?.status).toBe("Inactive");
    expect(h.api.calls).toEqual(["listSubscriptions:0", "listSubscriptions:1"]);
  });

  it("records a subscription whose contact is not stored", async () => {
    const h = createHarness();
    h.api.subscriptions.set(1, makeSubscription(1, { contactId: 8 }));

    const result = await h.loader("subscriptions").loadAll();

    expect(result.failedCount).toBe(1);
    expect(h.ledger.records[0]?.additional_context).toEqual({
      subscriptions_id: 1,
      contact_id: 8,
      product_id: null,
      status: "Active",
    });
  });

  it("records a malformed listed subscription and stores its siblings", async () => {
    const h = createHarness();
    const registry = registryServing(h, {
      subscriptions: [
        { id: 1, status: "ACTIVE" },
        { id: 2, status: 7 },
        { id: 3, status: "ACTIVE" },
      ],
      next: null,
    });

    const result = await registry.get("subscriptions").loadAll();

    expect(result).toEqual({ totalRecords: 3, successCount: 2, failedCount: 1 });
    expect(h.store.exists("subscriptions", 1)).toBe(true);
    expect(h.store.exists("subscriptions", 2)).toBe(false);
    expect(h.store.exists("subscriptions", 3)).toBe(true);
    expect(h.ledger.records).toHaveLength(1);
    expect(h.ledger.records[0]).toMatchObject({
      entity_type: "subscriptions",
      entity_id: 2,
      error_kind: "ValidationFailedError",
      message: "Invalid subscriptions item payload: status: Expected string, received number",
      additional_context: { subscriptions_id: 2 },
    });
    expect(h.checkpoints.getCheckpoint("subscriptions")).toBe(3);
    expect(h.checkpoints.getApiOffset("subscriptions")).toBe(3);
  });

  it("cannot load a single subscription by id", async () => {
    const h = createHarness();
    h.api.subscriptions.set(1, makeSubscription(1));

    await expect(h.loader("subscriptions").loadById(1)).resolves.toBe(false);

    expect(h.logger.messages("warn")).toEqual(["Subscriptions cannot be loaded by id"]);
    expect(h.store.exists("subscriptions", 1)).toBe(false);
  });
});
