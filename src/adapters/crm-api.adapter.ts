import { z } from "zod";
import {
  Affiliate,
  AffiliateClawback,
  AffiliatePayment,
  Campaign,
  Contact,
  CreditCard,
  CustomFieldModel,
  Note,
  Opportunity,
  Order,
  OrderPayment,
  OrderTransaction,
  Product,
  RawCustomField,
  Subscription,
  Tag,
  Task,
} from "../core/domain/entities/crm-records.entity.js";
import {
  NotFoundError,
  ValidationFailedError,
} from "../core/domain/errors/api.errors.js";
import {
  ICrmApi,
  Identified,
  ListPage,
  ListQuery,
  RejectedItem,
} from "../core/domain/services/crm-api.service.js";
import { ILogger } from "../core/domain/services/logger.service.js";
import type { CrmTransport, QueryParams } from "../infrastructure/services/http-crm-client.service.js";
import {
  AffiliateSchema,
  affiliateClawbackSchema,
  affiliatePaymentSchema,
  CampaignSchema,
  ContactSchema,
  creditCardSchema,
  CustomFieldModelSchema,
  CustomFieldSchema,
  IdentifiedSchema,
  ListEnvelopeSchema,
  NoteSchema,
  OpportunitySchema,
  OrderSchema,
  orderPaymentSchema,
  orderTransactionSchema,
  ProductSchema,
  SubscriptionSchema,
  TagSchema,
  TaskSchema,
} from "./crm-wire.schemas.js";

/** Upper bound for sub-resource listings fetched in one call. */
const SUB_RESOURCE_LIMIT = 1000;

function validationError(error: z.ZodError, what: string): ValidationFailedError {
  const issues = error.issues
    .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("; ");
  return new ValidationFailedError(`Invalid ${what} payload: ${issues}`);
}

function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) throw validationError(result.error, what);
  return result.data;
}

/** Array found directly or under `key` of an object body. */
function extractArray(body: unknown, key: string, what: string): unknown[] {
  if (Array.isArray(body)) return body;
  if (body !== null && typeof body === "object") {
    const value: unknown = Object.entries(body).find(([k]) => k === key)?.[1];
    if (Array.isArray(value)) return value;
    if (value === undefined || value === null) return [];
  }
  if (body === null) return [];
  throw new ValidationFailedError(`Invalid ${what} payload: expected an array under "${key}"`);
}

/**
 * Typed view of the CRM REST API. Turns transport JSON into domain records via
 * the wire schemas and resolves each collection's envelope key.
 */
export class CrmApiAdapter implements ICrmApi {
  constructor(
    private readonly transport: CrmTransport,
    private readonly logger: ILogger,
  ) {}

  private async listPage<T extends z.ZodTypeAny>(
    path: string,
    key: string,
    itemSchema: T,
    query: ListQuery,
    extra: QueryParams = {},
  ): Promise<ListPage<z.output<T>>> {
    const body = await this.transport.get(path, {
      limit: query.limit,
      offset: query.offset,
      since: query.since,
      ...extra,
    });
    const envelope = parseWith(ListEnvelopeSchema, body ?? {}, `${path} listing`);
    const items: z.output<T>[] = [];
    const rejected: RejectedItem[] = [];
    for (const raw of extractArray(body, key, `${path} listing`)) {
      const result = itemSchema.safeParse(raw);
      if (result.success) {
        items.push(result.data);
        continue;
      }
      const identified = IdentifiedSchema.safeParse(raw);
      const id = identified.success ? identified.data.id : null;
      const error = validationError(result.error, `${path} item`);
      this.logger.warn("Listed item failed validation", { path, id, error: error.message });
      rejected.push({ id, error });
    }
    return {
      items,
      rejected,
      next: envelope.next ?? null,
      count: envelope.count,
      total: envelope.total,
    };
  }

  private async getOne<T extends z.ZodTypeAny>(path: string, schema: T): Promise<z.output<T>> {
    const body = await this.transport.get(path);
    return parseWith(schema, body, path);
  }

  /** Sub-resource of a parent; a missing parent (404) reads as an empty list. */
  private async subResource<T extends z.ZodTypeAny>(
    path: string,
    key: string,
    schema: T,
  ): Promise<z.output<T>[]> {
    let body: unknown;
    try {
      body = await this.transport.get(path, { limit: SUB_RESOURCE_LIMIT });
    } catch (e) {
      if (e instanceof NotFoundError) {
        this.logger.debug("Sub-resource not found, treating as empty", { path });
        return [];
      }
      throw e;
    }
    return extractArray(body, key, path).map((item) => parseWith(schema, item, `${path} item`));
  }

  listContacts(query: ListQuery): Promise<ListPage<Identified>> {
    return this.listPage("contacts", "contacts", IdentifiedSchema, query, { order: "id" });
  }
  getContact(id: number): Promise<Contact> {
    return this.getOne(`contacts/${id}`, ContactSchema);
  }
  listContactCreditCards(contactId: number): Promise<CreditCard[]> {
    return this.subResource(`contacts/${contactId}/creditCards`, "credit_cards", creditCardSchema(contactId));
  }

  listTags(query: ListQuery): Promise<ListPage<Tag>> {
    return this.listPage("tags", "tags", TagSchema, query);
  }
  getTag(id: number): Promise<Tag> {
    return this.getOne(`tags/${id}`, TagSchema);
  }

  listProducts(query: ListQuery): Promise<ListPage<Identified>> {
    return this.listPage("products", "products", IdentifiedSchema, query);
  }
  getProduct(id: number): Promise<Product> {
    return this.getOne(`products/${id}`, ProductSchema);
  }

  listOrders(query: ListQuery): Promise<ListPage<Identified>> {
    return this.listPage("orders", "orders", IdentifiedSchema, query, { order: "date_created" });
  }
  getOrder(id: number): Promise<Order> {
    return this.getOne(`orders/${id}`, OrderSchema);
  }
  listOrderPayments(orderId: number): Promise<OrderPayment[]> {
    return this.subResource(`orders/${orderId}/payments`, "payments", orderPaymentSchema(orderId));
  }
  listOrderTransactions(orderId: number): Promise<OrderTransaction[]> {
    return this.subResource(
      `orders/${orderId}/transactions`,
      "transactions",
      orderTransactionSchema(orderId),
    );
  }

  listAffiliates(query: ListQuery): Promise<ListPage<Identified>> {
    return this.listPage("affiliates", "affiliates", IdentifiedSchema, query);
  }
  getAffiliate(id: number): Promise<Affiliate> {
    return this.getOne(`affiliates/${id}`, AffiliateSchema);
  }
  listAffiliatePayments(affiliateId: number): Promise<AffiliatePayment[]> {
    return this.subResource(
      `affiliates/${affiliateId}/payments`,
      "payments",
      affiliatePaymentSchema(affiliateId),
    );
  }
  listAffiliateClawbacks(affiliateId: number): Promise<AffiliateClawback[]> {
    return this.subResource(
      `affiliates/${affiliateId}/clawbacks`,
      "clawbacks",
      affiliateClawbackSchema(affiliateId),
    );
  }

  listSubscriptions(query: ListQuery): Promise<ListPage<Subscription>> {
    return this.listPage("subscriptions", "subscriptions", SubscriptionSchema, query);
  }

  async listCustomFields(model: CustomFieldModel): Promise<RawCustomField[]> {
    const body = await this.transport.get(`${model}/model`);
    const envelope = parseWith(CustomFieldModelSchema, body ?? {}, `${model} model`);
    const raw = envelope.custom_fields;
    if (!raw) return [];
    if (Array.isArray(raw)) {
      return raw.map((def) => parseWith(CustomFieldSchema, def, `${model} custom field`));
    }
    return Object.entries(raw).map(([name, def]) => {
      const field = parseWith(CustomFieldSchema, def, `${model} custom field`);
      return { ...field, fieldName: field.fieldName ?? name };
    });
  }

  listOpportunities(query: ListQuery): Promise<ListPage<Identified>> {
    return this.listPage("opportunities", "opportunities", IdentifiedSchema, query);
  }
  getOpportunity(id: number): Promise<Opportunity> {
    return this.getOne(`opportunities/${id}`, OpportunitySchema);
  }

  listTasks(query: ListQuery): Promise<ListPage<Identified>> {
    return this.listPage("tasks", "tasks", IdentifiedSchema, query);
  }
  getTask(id: number): Promise<Task> {
    return this.getOne(`tasks/${id}`, TaskSchema);
  }

  listNotes(query: ListQuery): Promise<ListPage<Identified>> {
    return this.listPage("notes", "notes", IdentifiedSchema, query);
  }
  getNote(id: number): Promise<Note> {
    return this.getOne(`notes/${id}`, NoteSchema);
  }

  listCampaigns(query: ListQuery): Promise<ListPage<Identified>> {
    return this.listPage("campaigns", "campaigns", IdentifiedSchema, query);
  }
  getCampaign(id: number): Promise<Campaign> {
    return this.getOne(`campaigns/${id}`, CampaignSchema);
  }
}
