/**
 * Database handles passed explicitly into every gateway call.
 */

export type Dialect = "postgres" | "sqlite";

/** One result row; keys follow the statement's column order. */
export type ResultRow = Record<string, unknown>;

export interface QueryRows {
  columns: string[];
  rows: ResultRow[];
}

export interface Session {
  query(sql: string, params?: readonly unknown[]): Promise<QueryRows>;
}

export interface SessionOptions {
  /** Budget for the whole session, used for server-side statement timeouts. */
  timeoutMs: number;
}

export interface CatalogQuery {
  sql: string;
  params: unknown[];
}

/**
 * Catalog SELECTs for one dialect. Column aliases are fixed so that the
 * schema inspector can read rows from either dialect the same way.
 */
export interface CatalogQueries {
  tables(schema?: string): CatalogQuery;
  columns(schema?: string): CatalogQuery;
  foreignKeys(schema?: string): CatalogQuery;
}

export interface Connection {
  readonly dialect: Dialect;
  readonly catalog: CatalogQueries;
  /**
   * Run `fn` inside a read-only session. The session is released on every
   * exit path, including when `fn` throws.
   */
  withSession<T>(fn: (session: Session) => Promise<T>, options: SessionOptions): Promise<T>;
  close(): Promise<void>;
}

/**
 * Make result column names unique, so that every column gets its own key in
 * a row. Repeats get a numeric suffix: `id`, `id_2`, `id_3`.
 */
export function uniqueColumnNames(names: readonly string[]): string[] {
  const taken = new Set(names);
  const used = new Set<string>();
  return names.map((name) => {
    let candidate = name;
    for (let n = 2; used.has(candidate) || (candidate !== name && taken.has(candidate)); n++) {
      candidate = `${name}_${n}`;
    }
    used.add(candidate);
    return candidate;
  });
}

/** Key positional rows by column name. Values beyond the last column are dropped. */
export function rowsFromArrays(columns: readonly string[], values: readonly unknown[]): ResultRow[] {
  return values
    .filter((value): value is unknown[] => Array.isArray(value))
    .map((row) => Object.fromEntries(columns.map((column, i) => [column, row[i]])));
}
