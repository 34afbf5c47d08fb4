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
} from "../entities/crm-records.entity.js";

export interface ListQuery {
  limit: number;
  offset: number;
  since?: string;
}

/** Listed entry that failed validation. `id` is null when even that is unreadable. */
export interface RejectedItem {
  id: number | null;
  error: Error;
}

/**
 * One page of a collection listing. `next` is the upstream's next-page URL.
 * Entries that failed validation are left out of `items` and reported in
 * `rejected`.
 */
export interface ListPage<T> {
  items: T[];
  rejected?: RejectedItem[];
  next: string | null;
  count?: number;
  total?: number;
}

/** Entries the page covered, valid or not. */
export function pageSize(page: ListPage<unknown>): number {
  return page.items.length + (page.rejected?.length ?? 0);
}

/** Offset carried by a next-page URL, or null when absent or unparsable. */
export function parseNextOffset(next: string | null | undefined): number | null {
  if (!next) return null;
  let url: URL;
  try {
    url = new URL(next);
  } catch {
    return null;
  }
  const raw = url.searchParams.get("offset");
  if (raw === null || !/^\d+$/.test(raw)) return null;
  return Number.parseInt(raw, 10);
}

/** Listed record with at least an id; the full record comes from a by-id fetch. */
export interface Identified {
  id: number;
}

/**
 * The CRM REST API as the loaders consume it. Implementations throw the
 * `ApiError` family; sub-resource fetches treat a missing parent as empty.
 */
export interface ICrmApi {
  listContacts(query: ListQuery): Promise<ListPage<Identified>>;
  getContact(id: number): Promise<Contact>;
  listContactCreditCards(contactId: number): Promise<CreditCard[]>;

  listTags(query: ListQuery): Promise<ListPage<Tag>>;
  getTag(id: number): Promise<Tag>;

  listProducts(query: ListQuery): Promise<ListPage<Identified>>;
  getProduct(id: number): Promise<Product>;

  listOrders(query: ListQuery): Promise<ListPage<Identified>>;
  getOrder(id: number): Promise<Order>;
  listOrderPayments(orderId: number): Promise<OrderPayment[]>;
  listOrderTransactions(orderId: number): Promise<OrderTransaction[]>;

  listAffiliates(query: ListQuery): Promise<ListPage<Identified>>;
  getAffiliate(id: number): Promise<Affiliate>;
  listAffiliatePayments(affiliateId: number): Promise<AffiliatePayment[]>;
  listAffiliateClawbacks(affiliateId: number): Promise<AffiliateClawback[]>;

  /** Subscriptions have no by-id endpoint; list items are complete records. */
  listSubscriptions(query: ListQuery): Promise<ListPage<Subscription>>;

  listCustomFields(model: CustomFieldModel): Promise<RawCustomField[]>;

  listOpportunities(query: ListQuery): Promise<ListPage<Identified>>;
  getOpportunity(id: number): Promise<Opportunity>;

  listTasks(query: ListQuery): Promise<ListPage<Identified>>;
  getTask(id: number): Promise<Task>;

  listNotes(query: ListQuery): Promise<ListPage<Identified>>;
  getNote(id: number): Promise<Note>;

  listCampaigns(query: ListQuery): Promise<ListPage<Identified>>;
  getCampaign(id: number): Promise<Campaign>;
}
