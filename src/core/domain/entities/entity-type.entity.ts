/** The fixed set of record kinds pulled from the CRM, in pipeline order. */
export const ENTITY_LOAD_ORDER = [
  "custom_fields",
  "tags",
  "products",
  "contacts",
  "opportunities",
  "affiliates",
  "orders",
  "tasks",
  "notes",
  "campaigns",
  "subscriptions",
] as const;

export type EntityType = (typeof ENTITY_LOAD_ORDER)[number];

/**
 * Order in which missing references are backfilled by the reprocessor.
 * A referenced row can only satisfy a foreign key once everything it
 * points at exists, so parents come first.
 */
export const BACKFILL_ORDER: readonly EntityType[] = [
  "tags",
  "products",
  "contacts",
  "affiliates",
  "orders",
  "opportunities",
  "tasks",
  "notes",
  "campaigns",
];

/** Store table name -> entity type whose loader can produce a row in it. */
export const TABLE_TO_ENTITY_TYPE: Readonly<Record<string, EntityType>> = {
  tags: "tags",
  products: "products",
  contacts: "contacts",
  affiliates: "affiliates",
  orders: "orders",
  opportunities: "opportunities",
  tasks: "tasks",
  notes: "notes",
  campaigns: "campaigns",
};

/** Entity type that can backfill a row of `table`, if any. */
export function entityTypeForTable(table: string): EntityType | null {
  return Object.hasOwn(TABLE_TO_ENTITY_TYPE, table) ? TABLE_TO_ENTITY_TYPE[table] : null;
}

export function isEntityType(value: string): value is EntityType {
  return (ENTITY_LOAD_ORDER as readonly string[]).includes(value);
}

export class UnknownEntityTypeError extends Error {
  constructor(public readonly entityType: string) {
    super(
      `Unknown entity type "${entityType}". Expected one of: ${ENTITY_LOAD_ORDER.join(", ")}`,
    );
    this.name = "UnknownEntityTypeError";
  }
}

export function parseEntityType(value: string): EntityType {
  const normalized = value.trim().toLowerCase();
  if (!isEntityType(normalized)) throw new UnknownEntityTypeError(value);
  return normalized;
}
