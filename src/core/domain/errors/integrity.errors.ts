/** A persistence constraint refused a write. */
export class IntegrityError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IntegrityError";
  }
}

export interface ForeignKeyReference {
  table: string;
  column: string;
  value: number;
  referencedTable: string;
}

/**
 * Raised when a row points at a parent that is not stored yet. The message
 * carries the `Key (col)=(value) is not present in table "t"` shape the
 * reprocessor mines for backfill.
 */
export class ForeignKeyViolationError extends IntegrityError {
  readonly table: string;
  readonly column: string;
  readonly value: number;
  readonly referencedTable: string;

  constructor(ref: ForeignKeyReference) {
    super(
      `insert or update on table "${ref.table}" violates foreign key constraint: ` +
        `Key (${ref.column})=(${ref.value}) is not present in table "${ref.referencedTable}"`,
    );
    this.name = "ForeignKeyViolationError";
    this.table = ref.table;
    this.column = ref.column;
    this.value = ref.value;
    this.referencedTable = ref.referencedTable;
  }
}

const FOREIGN_KEY_PATTERN =
  /Key \((\w+)\)=\((\d+)\) is not present in table "(\w+)"/;

export interface MissingReference {
  column: string;
  id: number;
  table: string;
}

/** Extract the missing reference from a foreign-key failure text, if it has one. */
export function parseMissingReference(text: string): MissingReference | null {
  const match = FOREIGN_KEY_PATTERN.exec(text);
  if (!match) return null;
  const [, column, id, table] = match;
  return { column, id: Number.parseInt(id, 10), table };
}
