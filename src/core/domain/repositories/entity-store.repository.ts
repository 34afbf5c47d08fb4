export type ColumnValue = string | number | boolean | null;

/** Row written to a store table: scalar columns plus the JSON `data` payload. */
export interface StoreRow {
  id: number;
  [column: string]: ColumnValue | object | undefined;
}

export interface StoredRow {
  id: number;
  data: unknown;
  loaded_at: string;
  [column: string]: unknown;
}

export type StoreTable =
  | "custom_fields"
  | "tag_categories"
  | "tags"
  | "products"
  | "subscription_plans"
  | "contacts"
  | "credit_cards"
  | "opportunities"
  | "affiliates"
  | "affiliate_payments"
  | "affiliate_clawbacks"
  | "payment_gateways"
  | "orders"
  | "order_items"
  | "payment_plans"
  | "order_payments"
  | "order_transactions"
  | "subscriptions"
  | "tasks"
  | "notes"
  | "campaigns";

export type LinkTable = "contact_tags";

/**
 * Upsert-capable relational store keyed by primary id. All writes of one unit
 * of work go through `transaction`, which commits on return and rolls back on
 * throw.
 */
export interface IEntityStore {
  transaction<T>(fn: () => T): T;
  /** Roll back anything left open so the next unit of work starts clean. */
  ensureClean(): void;
  upsert(table: StoreTable, row: StoreRow): void;
  findById(table: StoreTable, id: number): StoredRow | null;
  exists(table: StoreTable, id: number): boolean;
  count(table: StoreTable): number;
  /** Delete every child of the parent, then upsert `rows`. */
  replaceChildren(
    table: StoreTable,
    parentColumn: string,
    parentId: number,
    rows: StoreRow[],
  ): void;
  /** Delete children of the parent whose ids are not in `keepIds`; returns how many. */
  pruneChildren(
    table: StoreTable,
    parentColumn: string,
    parentId: number,
    keepIds: number[],
  ): number;
  replaceLinks(
    table: LinkTable,
    ownerColumn: string,
    ownerId: number,
    targetColumn: string,
    targetIds: number[],
  ): void;
  linkedIds(
    table: LinkTable,
    ownerColumn: string,
    ownerId: number,
    targetColumn: string,
  ): number[];
  close(): void;
}
