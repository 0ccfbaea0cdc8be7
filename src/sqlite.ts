/**
 * SQLite connection
 *
 * The file is opened read-only, so the engine rejects writes regardless of
 * what the classifier lets through. better-sqlite3 runs statements
 * synchronously: a running statement cannot be interrupted, and the
 * executor's deadline only takes effect between statements.
 */

import Database from "better-sqlite3";
import type { CatalogQueries, CatalogQuery, Connection, QueryRows, Session, SessionOptions } from "./connection.js";
import { rowsFromArrays, uniqueColumnNames } from "./connection.js";
import { GatewayError, errorMessage } from "./errors.js";

const USER_TABLES = "t.type IN ('table', 'view') AND t.name NOT LIKE 'sqlite_%'";

function schemaClause(schema: string | undefined): CatalogQuery {
  return schema === undefined
    ? { sql: "t.schema <> 'temp'", params: [] }
    : { sql: "t.schema = ?", params: [schema] };
}

export const SQLITE_CATALOG: CatalogQueries = {
  tables(schema) {
    const where = schemaClause(schema);
    return {
      sql: `
        SELECT t.schema AS table_schema, t.name AS table_name, t.type AS table_kind
        FROM pragma_table_list AS t
        WHERE ${USER_TABLES} AND ${where.sql}
        ORDER BY t.schema, t.name
      `,
      params: where.params,
    };
  },

  columns(schema) {
    const where = schemaClause(schema);
    return {
      sql: `
        SELECT
          t.schema AS table_schema,
          t.name AS table_name,
          c.name AS column_name,
          c.type AS data_type,
          (c."notnull" = 0) AS is_nullable,
          c.cid + 1 AS ordinal_position
        FROM pragma_table_list AS t, pragma_table_info(t.name, t.schema) AS c
        WHERE ${USER_TABLES} AND ${where.sql}
        ORDER BY t.schema, t.name, c.cid
      `,
      params: where.params,
    };
  },

  foreignKeys(schema) {
    const where = schemaClause(schema);
    return {
      sql: `
        SELECT
          t.schema AS table_schema,
          t.name AS table_name,
          t.name || '_fk_' || f.id AS constraint_name,
          f."from" AS column_name,
          f.seq + 1 AS ordinal_position,
          t.schema AS foreign_table_schema,
          f."table" AS foreign_table_name,
          f."to" AS foreign_column_name
        FROM pragma_table_list AS t, pragma_foreign_key_list(t.name, t.schema) AS f
        WHERE t.type = 'table' AND t.name NOT LIKE 'sqlite_%' AND ${where.sql}
        ORDER BY t.schema, t.name, f.id, f.seq
      `,
      params: where.params,
    };
  },
};

class SqliteSession implements Session {
  constructor(private db: Database.Database) {}

  async query(sql: string, params: readonly unknown[] = []): Promise<QueryRows> {
    try {
      const stmt = this.db.prepare(sql);
      if (!stmt.reader) {
        // Left to the engine, which refuses writes on a read-only handle.
        stmt.run(...params);
        return { columns: [], rows: [] };
      }
      const columns = uniqueColumnNames(stmt.columns().map((col) => col.name));
      return {
        columns,
        rows: rowsFromArrays(columns, stmt.raw(true).all(...params)),
      };
    } catch (error) {
      throw new GatewayError("execution_failed", errorMessage(error), { cause: error });
    }
  }
}

export class SqliteConnection implements Connection {
  readonly dialect = "sqlite" as const;
  readonly catalog = SQLITE_CATALOG;

  // One handle serves every request, so sessions take turns.
  private queue: Promise<void> = Promise.resolve();

  constructor(private db: Database.Database) {}

  /**
   * Open a database file read-only. The file must already exist.
   */
  static open(filename: string): SqliteConnection {
    let db: Database.Database;
    try {
      db = new Database(filename, { readonly: true, fileMustExist: true });
    } catch (error) {
      throw new GatewayError("connection_unavailable", `Failed to open ${filename}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    return new SqliteConnection(db);
  }

  withSession<T>(fn: (session: Session) => Promise<T>, options: SessionOptions): Promise<T> {
    const run = this.queue.then(() => this.runSession(fn, options));
    // Failures reach the caller through `run`; the queue only tracks turns.
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async runSession<T>(fn: (session: Session) => Promise<T>, options: SessionOptions): Promise<T> {
    if (!this.db.open) {
      throw new GatewayError("connection_unavailable", "Database connection is closed");
    }

    this.db.pragma(`busy_timeout = ${Math.max(0, Math.ceil(options.timeoutMs))}`);
    this.db.exec("BEGIN");
    try {
      return await fn(new SqliteSession(this.db));
    } finally {
      if (this.db.inTransaction) this.db.exec("ROLLBACK");
    }
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }
}
