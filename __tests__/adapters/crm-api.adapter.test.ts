import { describe, expect, it } from "vitest";
import { CrmApiAdapter } from "../../src/adapters/crm-api.adapter.js";
import {
  NotFoundError,
  ServerUnavailableError,
  ValidationFailedError,
} from "../../src/core/domain/errors/api.errors.js";
import type {
  CrmTransport,
  QueryParams,
} from "../../src/infrastructure/services/http-crm-client.service.js";
import { RecordingLogger } from "../helpers/recording-logger.js";

/** Serves canned bodies by path; unknown paths answer 404. */
class StubTransport implements CrmTransport {
  readonly requests: Array<{ path: string; params?: QueryParams }> = [];

  constructor(private readonly bodies: Record<string, unknown>) {}

  get(path: string, params?: QueryParams): Promise<unknown> {
    this.requests.push({ path, params });
    if (!Object.hasOwn(this.bodies, path)) {
      return Promise.reject(new NotFoundError(`Resource not found: ${path}`));
    }
    const body = this.bodies[path];
    return body instanceof Error ? Promise.reject(body) : Promise.resolve(body);
  }
}

function adapterFor(bodies: Record<string, unknown>): { api: CrmApiAdapter; transport: StubTransport } {
  const transport = new StubTransport(bodies);
  return { api: new CrmApiAdapter(transport, new RecordingLogger()), transport };
}

describe("CrmApiAdapter", () => {
  it("lists contact ids in id order with the page envelope", async () => {
    const next = "https://api.test/crm/rest/v1/contacts?limit=2&offset=2";
    const { api, transport } = adapterFor({
      contacts: { contacts: [{ id: 2, given_name: "A" }, { id: 3 }], next, count: 2 },
    });

    const page = await api.listContacts({ limit: 2, offset: 0 });

    expect(page.items).toEqual([{ id: 2 }, { id: 3 }]);
    expect(page.next).toBe(next);
    expect(page.count).toBe(2);
    expect(transport.requests).toEqual([
      { path: "contacts", params: { limit: 2, offset: 0, since: undefined, order: "id" } },
    ]);
  });

  it("passes since through to the listing", async () => {
    const { api, transport } = adapterFor({ orders: { orders: [], next: null } });
    await api.listOrders({ limit: 10, offset: 0, since: "2026-02-01T00:00:00.000Z" });
    expect(transport.requests[0]?.params).toEqual({
      limit: 10,
      offset: 0,
      since: "2026-02-01T00:00:00.000Z",
      order: "date_created",
    });
  });

  it("reports listed items that fail validation instead of failing the page", async () => {
    const { api } = adapterFor({
      subscriptions: {
        subscriptions: [{ id: 1, status: "ACTIVE" }, { id: 2, status: 7 }, { status: "ACTIVE" }],
        next: null,
      },
    });

    const page = await api.listSubscriptions({ limit: 3, offset: 0 });

    expect(page.items.map((s) => s.id)).toEqual([1]);
    expect(page.rejected?.map((r) => r.id)).toEqual([2, null]);
    expect(page.rejected?.[0]?.error).toBeInstanceOf(ValidationFailedError);
    expect(page.rejected?.[0]?.error.message).toBe(
      "Invalid subscriptions item payload: status: Expected string, received number",
    );
  });

  it("reads a listing without its collection key as empty", async () => {
    const { api } = adapterFor({ tags: { next: null } });
    const page = await api.listTags({ limit: 5, offset: 0 });
    expect(page.items).toEqual([]);
    expect(page.next).toBeNull();
  });

  it("maps a contact payload onto the domain record", async () => {
    const { api } = adapterFor({
      "contacts/7": {
        id: 7,
        given_name: "Ada",
        company: { company_name: "Acme" },
        email_addresses: [{ email: "ada@example.test", field: "EMAIL1" }],
        tag_ids: [4, 5],
        owner_id: "12",
      },
    });

    const contact = await api.getContact(7);

    expect(contact.givenName).toBe("Ada");
    expect(contact.familyName).toBeNull();
    expect(contact.companyName).toBe("Acme");
    expect(contact.emailAddresses).toEqual([{ email: "ada@example.test", field: "EMAIL1" }]);
    expect(contact.phoneNumbers).toEqual([]);
    expect(contact.tagIds).toEqual([4, 5]);
    expect(contact.ownerId).toBe(12);
  });

  it("rejects a payload that does not match its schema", async () => {
    const { api } = adapterFor({ "tags/9": { name: "VIP" } });
    const result = api.getTag(9);
    await expect(result).rejects.toBeInstanceOf(ValidationFailedError);
    await expect(result).rejects.toThrow("Invalid tags/9 payload: id: Required");
  });

  it("treats a missing sub-resource as empty", async () => {
    const { api } = adapterFor({});
    await expect(api.listContactCreditCards(7)).resolves.toEqual([]);
  });

  it("still fails a sub-resource on other errors", async () => {
    const { api } = adapterFor({
      "orders/3/payments": new ServerUnavailableError("Server error (503)"),
    });
    await expect(api.listOrderPayments(3)).rejects.toBeInstanceOf(ServerUnavailableError);
  });

  it("stamps sub-resource records with their parent id", async () => {
    const { api, transport } = adapterFor({
      "contacts/7/creditCards": [{ id: 11, card_type: "Visa" }],
    });

    await expect(api.listContactCreditCards(7)).resolves.toEqual([
      {
        id: 11,
        contactId: 7,
        cardType: "Visa",
        cardNumber: null,
        expirationMonth: null,
        expirationYear: null,
        cardHolderName: null,
        isDefault: false,
      },
    ]);
    expect(transport.requests[0]?.params).toEqual({ limit: 1000 });
  });

  it("names custom fields keyed by name after their key", async () => {
    const { api } = adapterFor({
      "contacts/model": {
        custom_fields: { Shirt: { id: 3, label: "Shirt size", field_type: "Dropdown" } },
      },
      "orders/model": null,
    });

    await expect(api.listCustomFields("contacts")).resolves.toEqual([
      {
        id: 3,
        label: "Shirt size",
        fieldName: "Shirt",
        fieldType: "Dropdown",
        recordType: null,
        defaultValue: null,
        options: [],
      },
    ]);
    await expect(api.listCustomFields("orders")).resolves.toEqual([]);
  });

  it("maps orders with nested references and numeric strings", async () => {
    const { api } = adapterFor({
      "orders/20": {
        id: 20,
        contact: { id: 7 },
        total: "19.50",
        lead_affiliate_id: 0,
        order_items: [{ id: 1, product: { id: 3 }, quantity: 2 }],
        payment_plan: {
          credit_card_id: 11,
          payment_gateway: { merchant_account_id: 4, merchant_account_name: "Stripe" },
        },
      },
    });

    const order = await api.getOrder(20);

    expect(order.contactId).toBe(7);
    expect(order.total).toBe(19.5);
    expect(order.leadAffiliateId).toBe(0);
    expect(order.items[0]?.productId).toBe(3);
    expect(order.items[0]?.subscriptionPlanId).toBeNull();
    expect(order.paymentPlan?.paymentGatewayId).toBe(4);
    expect(order.paymentPlan?.merchantAccountName).toBe("Stripe");
    expect(order.paymentPlan?.creditCardId).toBe(11);
  });
});
