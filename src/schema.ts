/**
 * Schema inspector
 *
 * Reads tables, columns and foreign keys from the catalog in one read-only
 * session and assembles a SchemaSnapshot. Always live; nothing is cached
 * between calls.
 */

import { z } from "zod";
import type { CatalogQuery, Connection, Session } from "./connection.js";
import { GatewayError, toGatewayError } from "./errors.js";
import { matchesPattern, withTimeout } from "./utils.js";

export interface ColumnDescriptor {
  name: string;
  type: string;
  nullable: boolean;
  position: number;
}

export interface ForeignKeyDescriptor {
  constraint: string;
  columns: string[];
  references: {
    schema: string;
    table: string;
    columns: string[];
  };
}

export interface TableDescriptor {
  schema: string;
  name: string;
  kind: "table" | "view";
  columns: ColumnDescriptor[];
  foreignKeys: ForeignKeyDescriptor[];
}

export interface SchemaSnapshot {
  /** Keyed by `schema.table`. */
  tables: Record<string, TableDescriptor>;
}

export interface InspectOptions {
  timeoutMs: number;
  excludeTables: readonly string[];
}

// pg returns booleans, SQLite returns 0/1
const flag = z.union([z.boolean(), z.number()]).transform((v) => v === true || v === 1);

export const TableRowSchema = z.object({
  table_schema: z.string(),
  table_name: z.string(),
  table_kind: z.enum(["table", "view"]),
});

export const ColumnRowSchema = z.object({
  table_schema: z.string(),
  table_name: z.string(),
  column_name: z.string(),
  data_type: z.string().nullable().transform((v) => v ?? ""),
  is_nullable: flag,
  ordinal_position: z.coerce.number().int(),
});

export const ForeignKeyRowSchema = z.object({
  table_schema: z.string(),
  table_name: z.string(),
  constraint_name: z.string(),
  column_name: z.string(),
  ordinal_position: z.coerce.number().int(),
  foreign_table_schema: z.string(),
  foreign_table_name: z.string(),
  // SQLite leaves this NULL when the key targets the primary key implicitly
  foreign_column_name: z.string().nullable(),
});

export type TableRow = z.infer<typeof TableRowSchema>;
export type ColumnRow = z.infer<typeof ColumnRowSchema>;
export type ForeignKeyRow = z.infer<typeof ForeignKeyRowSchema>;

export function tableKey(schema: string, table: string): string {
  return `${schema}.${table}`;
}

/**
 * Assemble a snapshot from raw catalog rows.
 *
 * Column rows for unknown or excluded tables are ignored. Foreign-key rows
 * are grouped per constraint, since catalogs return one row per constrained
 * column (and sometimes one per column pair).
 */
export function buildSnapshot(
  tables: readonly TableRow[],
  columns: readonly ColumnRow[],
  foreignKeys: readonly ForeignKeyRow[],
  excludeTables: readonly string[] = []
): SchemaSnapshot {
  const snapshot: SchemaSnapshot = { tables: {} };

  for (const row of tables) {
    if (matchesPattern(row.table_name, excludeTables)) continue;
    const key = tableKey(row.table_schema, row.table_name);
    if (snapshot.tables[key]) continue;
    snapshot.tables[key] = {
      schema: row.table_schema,
      name: row.table_name,
      kind: row.table_kind,
      columns: [],
      foreignKeys: [],
    };
  }

  for (const row of columns) {
    const table = snapshot.tables[tableKey(row.table_schema, row.table_name)];
    if (!table) continue;
    if (table.columns.some((c) => c.name === row.column_name)) continue;
    table.columns.push({
      name: row.column_name,
      type: row.data_type,
      nullable: row.is_nullable,
      position: row.ordinal_position,
    });
  }

  const constraints = new Map<string, { table: TableDescriptor; rows: ForeignKeyRow[] }>();
  for (const row of foreignKeys) {
    const table = snapshot.tables[tableKey(row.table_schema, row.table_name)];
    if (!table) continue;
    const key = `${tableKey(row.table_schema, row.table_name)}.${row.constraint_name}`;
    const group = constraints.get(key) ?? { table, rows: [] };
    group.rows.push(row);
    constraints.set(key, group);
  }

  for (const { table, rows } of constraints.values()) {
    const byPosition = new Map<number, ForeignKeyRow>();
    for (const row of rows) {
      if (!byPosition.has(row.ordinal_position)) byPosition.set(row.ordinal_position, row);
    }
    const pairs = Array.from(byPosition.values()).sort((a, b) => a.ordinal_position - b.ordinal_position);
    const first = pairs[0];
    table.foreignKeys.push({
      constraint: first.constraint_name,
      columns: pairs.map((p) => p.column_name),
      references: {
        schema: first.foreign_table_schema,
        table: first.foreign_table_name,
        columns: pairs.flatMap((p) => (p.foreign_column_name === null ? [] : [p.foreign_column_name])),
      },
    });
  }

  for (const table of Object.values(snapshot.tables)) {
    table.columns.sort((a, b) => a.position - b.position);
    table.foreignKeys.sort((a, b) => a.constraint.localeCompare(b.constraint));
  }

  return snapshot;
}

async function readRows<T extends z.ZodTypeAny>(
  session: Session,
  query: CatalogQuery,
  schema: T
): Promise<Array<z.output<T>>> {
  const { rows } = await session.query(query.sql, query.params);
  const parsed = z.array(schema).safeParse(rows);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new GatewayError(
      "execution_failed",
      `Unexpected catalog row shape at ${issue?.path.join(".") ?? "?"}: ${issue?.message ?? "invalid"}`,
      { cause: parsed.error }
    );
  }
  return parsed.data;
}

export async function inspectSchema(
  connection: Connection,
  schemaFilter: string | undefined,
  options: InspectOptions
): Promise<SchemaSnapshot> {
  const { catalog } = connection;

  try {
    return await connection.withSession(async (session) => {
      const read = async () => {
        const tables = await readRows(session, catalog.tables(schemaFilter), TableRowSchema);
        const columns = await readRows(session, catalog.columns(schemaFilter), ColumnRowSchema);
        const foreignKeys = await readRows(session, catalog.foreignKeys(schemaFilter), ForeignKeyRowSchema);
        return buildSnapshot(tables, columns, foreignKeys, options.excludeTables);
      };
      return withTimeout(read(), options.timeoutMs, `Schema inspection timed out after ${options.timeoutMs}ms`);
    }, { timeoutMs: options.timeoutMs });
  } catch (error) {
    throw toGatewayError(error);
  }
}
