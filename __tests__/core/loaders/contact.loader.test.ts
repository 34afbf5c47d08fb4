import { beforeEach, describe, expect, it } from "vitest";
import {
  ServerUnavailableError,
  ValidationFailedError,
} from "../../../src/core/domain/errors/api.errors.js";
import { createHarness, Harness } from "../../helpers/harness.js";
import { makeContact, makeCreditCard, makeTag } from "../../helpers/fixtures.js";

describe("ContactLoader", () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
  });

  it("stores the contact with its cards and tags, loading a missing tag first", async () => {
    h.api.tags.set(4, makeTag(4));
    h.api.contacts.set(1, makeContact(1, { tagIds: [4, 4, 5] }));
    h.api.creditCards.set(1, [makeCreditCard(11, 1)]);

    await expect(h.loader("contacts").loadById(1)).resolves.toBe(true);

    const row = h.store.findById("contacts", 1);
    expect(row?.given_name).toBe("Given1");
    expect(row?.family_name).toBe("Family1");
    expect(row?.email).toBe("contact1@example.test");
    expect(h.store.findById("credit_cards", 11)).toMatchObject({ contact_id: 1, card_type: "VISA" });
    expect(h.store.exists("tags", 4)).toBe(true);
    expect(h.api.callCount("getTag:4")).toBe(1);
    expect(h.store.linkedIds("contact_tags", "contact_id", 1, "tag_id")).toEqual([4]);
    expect(h.logger.messages("warn")).toContain("Skipping tag missing locally");
    expect(h.ledger.records).toHaveLength(1);
    expect(h.ledger.records[0]).toMatchObject({ entity_type: "tags", entity_id: 5, error_kind: "NotFoundError" });
  });

  it("does not fetch tags that are already stored", async () => {
    h.store.upsert("tags", { id: 4, name: "Tag 4", data: makeTag(4) });
    h.api.contacts.set(1, makeContact(1, { tagIds: [4] }));

    await h.loader("contacts").loadById(1);

    expect(h.api.callCount("getTag:4")).toBe(0);
    expect(h.store.linkedIds("contact_tags", "contact_id", 1, "tag_id")).toEqual([4]);
  });

  it("replaces cards and tag links on reload", async () => {
    h.store.upsert("tags", { id: 4, name: "Tag 4", data: makeTag(4) });
    h.api.contacts.set(1, makeContact(1, { tagIds: [4] }));
    h.api.creditCards.set(1, [makeCreditCard(11, 1), makeCreditCard(12, 1)]);
    await h.loader("contacts").loadById(1);

    h.api.contacts.set(1, makeContact(1, { tagIds: [] }));
    h.api.creditCards.set(1, [makeCreditCard(12, 1)]);
    await h.loader("contacts").loadById(1);

    expect(h.store.exists("credit_cards", 11)).toBe(false);
    expect(h.store.exists("credit_cards", 12)).toBe(true);
    expect(h.store.linkedIds("contact_tags", "contact_id", 1, "tag_id")).toEqual([]);
  });

  it("stores a contact without email addresses", async () => {
    h.api.contacts.set(2, makeContact(2, { emailAddresses: [] }));

    await h.loader("contacts").loadById(2);

    expect(h.store.findById("contacts", 2)?.email).toBeNull();
  });

  it("continues without cards when they cannot be fetched", async () => {
    h.api.contacts.set(1, makeContact(1));
    h.api.failOn("listContactCreditCards:1", new ValidationFailedError("Request rejected (400)"));

    await expect(h.loader("contacts").loadById(1)).resolves.toBe(true);

    expect(h.logger.messages("warn")).toContain(
      "Failed to fetch credit cards of contact 1, continuing without it",
    );
    expect(h.store.count("credit_cards")).toBe(0);
  });

  it("retries the whole load when fetching cards fails transiently", async () => {
    h.api.contacts.set(1, makeContact(1));
    h.api.creditCards.set(1, [makeCreditCard(11, 1)]);
    h.api.failOn("listContactCreditCards:1", new ServerUnavailableError("Server error (503)"));

    await expect(h.loader("contacts").loadById(1)).resolves.toBe(true);

    expect(h.api.callCount("getContact:1")).toBe(2);
    expect(h.store.exists("credit_cards", 11)).toBe(true);
  });
});
