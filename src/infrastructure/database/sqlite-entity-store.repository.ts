import { IntegrityError, ForeignKeyViolationError } from "../../core/domain/errors/integrity.errors.js";
import {
  IEntityStore,
  LinkTable,
  StoreRow,
  StoredRow,
  StoreTable,
} from "../../core/domain/repositories/entity-store.repository.js";
import { SqliteDatabase } from "./sqlite-connection.js";

type ColumnType = "INTEGER" | "REAL" | "TEXT";

interface ColumnSpec {
  type: ColumnType;
  references?: StoreTable;
}

type TableSpec = Record<string, ColumnSpec>;

const int = (references?: StoreTable): ColumnSpec => ({ type: "INTEGER", references });
const text: ColumnSpec = { type: "TEXT" };
const real: ColumnSpec = { type: "REAL" };

/**
 * Declared columns per table, besides `id`, `data` and `loaded_at`.
 * Parents are listed before children so the DDL runs top-down.
 */
export const ENTITY_SCHEMA: Readonly<Record<StoreTable, TableSpec>> = {
  custom_fields: { model: text, name: text, type: text },
  tag_categories: { name: text },
  tags: { name: text, category_id: int("tag_categories") },
  products: { product_name: text, sku: text, product_price: real },
  subscription_plans: { product_id: int("products"), name: text },
  contacts: { given_name: text, family_name: text, email: text },
  credit_cards: { contact_id: int("contacts"), card_type: text },
  opportunities: { contact_id: int("contacts"), title: text },
  affiliates: {
    contact_id: int("contacts"),
    parent_id: int("affiliates"),
    code: text,
    name: text,
  },
  affiliate_payments: { affiliate_id: int("affiliates"), amount: real },
  affiliate_clawbacks: { affiliate_id: int("affiliates"), amount: real },
  payment_gateways: { name: text, type: text, is_active: int() },
  orders: {
    contact_id: int("contacts"),
    lead_affiliate_id: int("affiliates"),
    sales_affiliate_id: int("affiliates"),
    title: text,
    status: text,
    total: real,
  },
  order_items: { order_id: int("orders"), product_id: int("products"), name: text },
  payment_plans: {
    order_id: int("orders"),
    payment_gateway_id: int("payment_gateways"),
    credit_card_id: int(),
  },
  order_payments: { order_id: int("orders"), amount: real },
  order_transactions: { order_id: int("orders"), amount: real, status: text },
  subscriptions: {
    contact_id: int("contacts"),
    product_id: int("products"),
    status: text,
  },
  tasks: { contact_id: int("contacts"), title: text },
  notes: { contact_id: int("contacts"), title: text },
  campaigns: { name: text },
};

const LINK_SCHEMA: Readonly<Record<LinkTable, Record<string, StoreTable>>> = {
  contact_tags: { contact_id: "contacts", tag_id: "tags" },
};

type BindValue = string | number | null;

interface RawRow {
  id: number;
  data: string;
  loaded_at: string;
  [column: string]: unknown;
}

function toBindValue(value: StoreRow[string]): BindValue {
  if (value === undefined || value === null) return null;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "string" || typeof value === "number") return value;
  return JSON.stringify(value);
}

function isConstraintError(err: unknown): err is Error & { code: string } {
  return (
    err instanceof Error &&
    "code" in err &&
    typeof err.code === "string" &&
    err.code.startsWith("SQLITE_CONSTRAINT")
  );
}

function buildSchemaSql(): string {
  const statements: string[] = [];
  for (const [table, spec] of Object.entries(ENTITY_SCHEMA)) {
    const columns = ["id INTEGER PRIMARY KEY"];
    const keys: string[] = [];
    for (const [name, col] of Object.entries(spec)) {
      columns.push(`${name} ${col.type}`);
      if (col.references) {
        keys.push(`FOREIGN KEY (${name}) REFERENCES ${col.references}(id)`);
      }
    }
    columns.push("data TEXT NOT NULL", "loaded_at TEXT NOT NULL");
    statements.push(
      `CREATE TABLE IF NOT EXISTS ${table} (\n  ${[...columns, ...keys].join(",\n  ")}\n);`,
    );
    for (const [name, col] of Object.entries(spec)) {
      if (col.references) {
        statements.push(
          `CREATE INDEX IF NOT EXISTS idx_${table}_${name} ON ${table}(${name});`,
        );
      }
    }
  }
  for (const [table, refs] of Object.entries(LINK_SCHEMA)) {
    const cols = Object.keys(refs);
    statements.push(
      `CREATE TABLE IF NOT EXISTS ${table} (\n  ` +
        cols.map((c) => `${c} INTEGER NOT NULL`).join(",\n  ") +
        `,\n  PRIMARY KEY (${cols.join(", ")}),\n  ` +
        Object.entries(refs)
          .map(([c, t]) => `FOREIGN KEY (${c}) REFERENCES ${t}(id)`)
          .join(",\n  ") +
        `\n);`,
    );
  }
  return statements.join("\n");
}

/**
 * better-sqlite3 implementation of the entity store. Each table keeps a few
 * queryable columns (ids and foreign keys among them) next to the full domain
 * record serialized in `data`.
 */
export class SqliteEntityStore implements IEntityStore {
  constructor(
    private readonly db: SqliteDatabase,
    private readonly now: () => Date = () => new Date(),
  ) {}

  initialize(): void {
    this.db.exec(buildSchemaSql());
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  ensureClean(): void {
    if (this.db.inTransaction) this.db.exec("ROLLBACK");
  }

  upsert(table: StoreTable, row: StoreRow): void {
    const spec = ENTITY_SCHEMA[table];
    const columns = Object.keys(row).filter((c) => c !== "id");
    for (const column of columns) {
      if (column !== "data" && !(column in spec)) {
        throw new Error(`Unknown column "${column}" for table ${table}`);
      }
    }
    if (!columns.includes("data")) {
      throw new Error(`Row for table ${table} has no data payload`);
    }
    this.checkForeignKeys(table, row);

    const names = ["id", ...columns, "loaded_at"];
    const values: BindValue[] = [
      row.id,
      ...columns.map((c) => toBindValue(row[c])),
      this.now().toISOString(),
    ];
    const updates = names
      .filter((n) => n !== "id")
      .map((n) => `${n} = excluded.${n}`)
      .join(", ");
    const sql =
      `INSERT INTO ${table} (${names.join(", ")}) VALUES (${names.map(() => "?").join(", ")}) ` +
      `ON CONFLICT(id) DO UPDATE SET ${updates}`;
    this.run(sql, values);
  }

  findById(table: StoreTable, id: number): StoredRow | null {
    const raw = this.db
      .prepare<[number], RawRow>(`SELECT * FROM ${table} WHERE id = ?`)
      .get(id);
    if (!raw) return null;
    const data: unknown = JSON.parse(raw.data);
    return { ...raw, data };
  }

  exists(table: StoreTable, id: number): boolean {
    const row = this.db
      .prepare<[number], { found: number }>(`SELECT 1 AS found FROM ${table} WHERE id = ?`)
      .get(id);
    return row !== undefined;
  }

  count(table: StoreTable): number {
    const row = this.db
      .prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`)
      .get();
    return row?.n ?? 0;
  }

  replaceChildren(
    table: StoreTable,
    parentColumn: string,
    parentId: number,
    rows: StoreRow[],
  ): void {
    if (!(parentColumn in ENTITY_SCHEMA[table])) {
      throw new Error(`Unknown column "${parentColumn}" for table ${table}`);
    }
    this.transaction(() => {
      this.run(`DELETE FROM ${table} WHERE ${parentColumn} = ?`, [parentId]);
      for (const row of rows) this.upsert(table, { ...row, [parentColumn]: parentId });
    });
  }

  pruneChildren(
    table: StoreTable,
    parentColumn: string,
    parentId: number,
    keepIds: number[],
  ): number {
    if (!(parentColumn in ENTITY_SCHEMA[table])) {
      throw new Error(`Unknown column "${parentColumn}" for table ${table}`);
    }
    const keep = [...new Set(keepIds)];
    const notIn = keep.length > 0 ? ` AND id NOT IN (${keep.map(() => "?").join(", ")})` : "";
    return this.run(`DELETE FROM ${table} WHERE ${parentColumn} = ?${notIn}`, [parentId, ...keep]);
  }

  replaceLinks(
    table: LinkTable,
    ownerColumn: string,
    ownerId: number,
    targetColumn: string,
    targetIds: number[],
  ): void {
    const refs = LINK_SCHEMA[table];
    const targetTable = refs[targetColumn];
    if (!(ownerColumn in refs) || !targetTable) {
      throw new Error(`Unknown link columns ${ownerColumn}/${targetColumn} for ${table}`);
    }
    this.transaction(() => {
      this.run(`DELETE FROM ${table} WHERE ${ownerColumn} = ?`, [ownerId]);
      for (const targetId of new Set(targetIds)) {
        if (!this.exists(targetTable, targetId)) {
          throw new ForeignKeyViolationError({
            table,
            column: targetColumn,
            value: targetId,
            referencedTable: targetTable,
          });
        }
        this.run(
          `INSERT INTO ${table} (${ownerColumn}, ${targetColumn}) VALUES (?, ?)`,
          [ownerId, targetId],
        );
      }
    });
  }

  linkedIds(
    table: LinkTable,
    ownerColumn: string,
    ownerId: number,
    targetColumn: string,
  ): number[] {
    const refs = LINK_SCHEMA[table];
    if (!(ownerColumn in refs) || !(targetColumn in refs)) {
      throw new Error(`Unknown link columns ${ownerColumn}/${targetColumn} for ${table}`);
    }
    return this.db
      .prepare<[number], Record<string, number>>(
        `SELECT ${targetColumn} FROM ${table} WHERE ${ownerColumn} = ? ORDER BY ${targetColumn}`,
      )
      .all(ownerId)
      .map((r) => r[targetColumn]);
  }

  close(): void {
    this.db.close();
  }

  private checkForeignKeys(table: StoreTable, row: StoreRow): void {
    for (const [column, col] of Object.entries(ENTITY_SCHEMA[table])) {
      if (!col.references) continue;
      const value = row[column];
      if (typeof value !== "number") continue;
      // a row may point at itself (affiliate hierarchy roots)
      if (col.references === table && value === row.id) continue;
      if (!this.exists(col.references, value)) {
        throw new ForeignKeyViolationError({
          table,
          column,
          value,
          referencedTable: col.references,
        });
      }
    }
  }

  private run(sql: string, params: BindValue[]): number {
    try {
      return this.db.prepare(sql).run(...params).changes;
    } catch (err) {
      if (isConstraintError(err)) {
        throw new IntegrityError(`${err.code}: ${err.message}`, { cause: err });
      }
      throw err;
    }
  }
}
