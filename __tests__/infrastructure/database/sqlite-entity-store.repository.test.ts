import { beforeEach, describe, expect, it } from "vitest";
import {
  ForeignKeyViolationError,
  parseMissingReference,
} from "../../../src/core/domain/errors/integrity.errors.js";
import { openDatabase, SqliteDatabase } from "../../../src/infrastructure/database/sqlite-connection.js";
import { SqliteEntityStore } from "../../../src/infrastructure/database/sqlite-entity-store.repository.js";

describe("SqliteEntityStore", () => {
  let db: SqliteDatabase;
  let store: SqliteEntityStore;

  beforeEach(() => {
    db = openDatabase(":memory:");
    store = new SqliteEntityStore(db, () => new Date("2026-03-01T00:00:00.000Z"));
    store.initialize();
  });

  it("upserts rows and reads the JSON payload back", () => {
    store.upsert("tag_categories", { id: 1, name: "Leads", data: { id: 1, name: "Leads" } });
    store.upsert("tag_categories", { id: 1, name: "Prospects", data: { id: 1, name: "Prospects" } });

    expect(store.count("tag_categories")).toBe(1);
    expect(store.findById("tag_categories", 1)).toEqual({
      id: 1,
      name: "Prospects",
      data: { id: 1, name: "Prospects" },
      loaded_at: "2026-03-01T00:00:00.000Z",
    });
    expect(store.findById("tag_categories", 2)).toBeNull();
  });

  it("rejects a row whose parent is missing with the backfill message shape", () => {
    let caught: unknown;
    try {
      store.upsert("tags", { id: 10, name: "VIP", category_id: 5, data: {} });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ForeignKeyViolationError);
    const message = caught instanceof Error ? caught.message : "";
    expect(message).toBe(
      'insert or update on table "tags" violates foreign key constraint: ' +
        'Key (category_id)=(5) is not present in table "tag_categories"',
    );
    expect(parseMissingReference(message)).toEqual({
      column: "category_id",
      id: 5,
      table: "tag_categories",
    });
  });

  it("accepts null foreign keys and a row pointing at itself", () => {
    store.upsert("tags", { id: 10, name: "VIP", category_id: null, data: {} });
    store.upsert("affiliates", { id: 3, parent_id: 3, contact_id: null, data: {} });
    expect(store.exists("tags", 10)).toBe(true);
    expect(store.exists("affiliates", 3)).toBe(true);
  });

  it("refuses columns the table does not declare", () => {
    expect(() => store.upsert("tags", { id: 1, colour: "red", data: {} })).toThrow(
      'Unknown column "colour" for table tags',
    );
  });

  it("stores booleans as integers", () => {
    store.upsert("payment_gateways", { id: 4, name: "Stripe", type: "Unknown", is_active: true, data: {} });
    expect(store.findById("payment_gateways", 4)?.is_active).toBe(1);
  });

  it("rolls back everything written in a failed transaction", () => {
    expect(() =>
      store.transaction(() => {
        store.upsert("contacts", { id: 1, given_name: "Ada", data: {} });
        store.upsert("credit_cards", { id: 2, contact_id: 99, data: {} });
      }),
    ).toThrow(ForeignKeyViolationError);
    expect(store.count("contacts")).toBe(0);
  });

  it("replaces a parent's children instead of merging them", () => {
    store.upsert("contacts", { id: 1, data: {} });
    store.replaceChildren("credit_cards", "contact_id", 1, [
      { id: 11, card_type: "VISA", data: {} },
      { id: 12, card_type: "AMEX", data: {} },
    ]);
    store.replaceChildren("credit_cards", "contact_id", 1, [{ id: 12, card_type: "AMEX", data: {} }]);

    expect(store.count("credit_cards")).toBe(1);
    expect(store.findById("credit_cards", 12)?.contact_id).toBe(1);
  });

  it("prunes a parent's children down to the ids still listed", () => {
    store.upsert("products", { id: 3, product_name: "Box", data: {} });
    store.upsert("products", { id: 4, product_name: "Crate", data: {} });
    const plans: Array<[number, number]> = [[7, 3], [8, 3], [9, 3], [10, 4]];
    for (const [id, productId] of plans) {
      store.upsert("subscription_plans", { id, product_id: productId, name: `Plan ${id}`, data: {} });
    }

    expect(store.pruneChildren("subscription_plans", "product_id", 3, [8])).toBe(2);
    expect(store.exists("subscription_plans", 8)).toBe(true);
    expect(store.exists("subscription_plans", 7)).toBe(false);
    expect(store.exists("subscription_plans", 9)).toBe(false);
    expect(store.exists("subscription_plans", 10)).toBe(true);

    expect(store.pruneChildren("subscription_plans", "product_id", 3, [])).toBe(1);
    expect(store.count("subscription_plans")).toBe(1);
  });

  it("replaces links and keeps the old ones when a target is missing", () => {
    store.upsert("contacts", { id: 1, data: {} });
    store.upsert("tags", { id: 5, data: {} });
    store.upsert("tags", { id: 6, data: {} });
    store.replaceLinks("contact_tags", "contact_id", 1, "tag_id", [6, 5, 6]);
    expect(store.linkedIds("contact_tags", "contact_id", 1, "tag_id")).toEqual([5, 6]);

    expect(() => store.replaceLinks("contact_tags", "contact_id", 1, "tag_id", [5, 7])).toThrow(
      ForeignKeyViolationError,
    );
    expect(store.linkedIds("contact_tags", "contact_id", 1, "tag_id")).toEqual([5, 6]);
  });

  it("rolls back a transaction left open", () => {
    db.exec("BEGIN");
    store.upsert("campaigns", { id: 1, name: "Spring", data: {} });
    store.ensureClean();
    expect(db.inTransaction).toBe(false);
    expect(store.count("campaigns")).toBe(0);
  });
});
