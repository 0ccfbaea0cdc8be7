/**
 * PostgreSQL connection
 *
 * Every session is one READ ONLY transaction on a pooled client, with
 * statement_timeout set for the transaction and a ROLLBACK at the end.
 * Statements use the extended query protocol, which refuses strings holding
 * more than one command.
 */

import pg from "pg";
import type { Config } from "./config.js";
import type { CatalogQueries, CatalogQuery, Connection, QueryRows, Session, SessionOptions } from "./connection.js";
import { rowsFromArrays, uniqueColumnNames } from "./connection.js";
import { errorMessage, GatewayError } from "./errors.js";
import { log } from "./utils.js";

const { Pool } = pg;

export interface PgQuery {
  text: string;
  values?: unknown[];
  queryMode?: "extended";
  rowMode?: "array";
}

/** The slice of pg.PoolClient the gateway relies on. */
export interface PgClient {
  query(query: PgQuery): Promise<{ rows: unknown[]; fields: Array<{ name: string }> }>;
  release(destroy?: boolean | Error): void;
}

/** The slice of pg.Pool the gateway relies on. */
export interface PgPool {
  connect(): Promise<PgClient>;
  end(): Promise<void>;
}

const QUERY_CANCELED = "57014";

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function isConnectionFailure(error: unknown): boolean {
  const code = errorCode(error);
  if (code !== undefined && (code.startsWith("08") || code === "ECONNREFUSED" || code === "ECONNRESET")) {
    return true;
  }
  return /connection terminated|connection timeout|timeout exceeded when trying to connect/i.test(errorMessage(error));
}

/** Map a driver error to a gateway error, keeping the server message verbatim. */
export function classifyPgError(error: unknown): GatewayError {
  if (error instanceof GatewayError) return error;
  const message = errorMessage(error);
  if (errorCode(error) === QUERY_CANCELED) {
    return new GatewayError("timeout", message, { cause: error });
  }
  if (isConnectionFailure(error)) {
    return new GatewayError("connection_unavailable", message, { cause: error });
  }
  return new GatewayError("execution_failed", message, { cause: error });
}

const SYSTEM_SCHEMAS = "('pg_catalog', 'information_schema')";

function schemaClause(column: string, schema: string | undefined): CatalogQuery {
  return schema === undefined
    ? { sql: `${column} NOT IN ${SYSTEM_SCHEMAS}`, params: [] }
    : { sql: `${column} = $1`, params: [schema] };
}

export const POSTGRES_CATALOG: CatalogQueries = {
  tables(schema) {
    const where = schemaClause("t.table_schema", schema);
    return {
      sql: `
        SELECT
          t.table_schema,
          t.table_name,
          CASE t.table_type WHEN 'VIEW' THEN 'view' ELSE 'table' END AS table_kind
        FROM information_schema.tables t
        WHERE t.table_type IN ('BASE TABLE', 'VIEW') AND ${where.sql}
        ORDER BY t.table_schema, t.table_name
      `,
      params: where.params,
    };
  },

  columns(schema) {
    const where = schemaClause("c.table_schema", schema);
    return {
      sql: `
        SELECT
          c.table_schema,
          c.table_name,
          c.column_name,
          CASE
            WHEN c.data_type IN ('USER-DEFINED', 'ARRAY') THEN c.udt_name
            WHEN c.character_maximum_length IS NOT NULL
              THEN c.data_type || '(' || c.character_maximum_length || ')'
            ELSE c.data_type
          END AS data_type,
          (c.is_nullable = 'YES') AS is_nullable,
          c.ordinal_position
        FROM information_schema.columns c
        WHERE ${where.sql}
        ORDER BY c.table_schema, c.table_name, c.ordinal_position
      `,
      params: where.params,
    };
  },

  foreignKeys(schema) {
    const where = schemaClause("kcu.table_schema", schema);
    return {
      sql: `
        SELECT
          kcu.table_schema,
          kcu.table_name,
          kcu.constraint_name,
          kcu.column_name,
          kcu.ordinal_position,
          rkcu.table_schema AS foreign_table_schema,
          rkcu.table_name AS foreign_table_name,
          rkcu.column_name AS foreign_column_name
        FROM information_schema.referential_constraints rc
        JOIN information_schema.key_column_usage kcu
          ON kcu.constraint_schema = rc.constraint_schema
          AND kcu.constraint_name = rc.constraint_name
        JOIN information_schema.key_column_usage rkcu
          ON rkcu.constraint_schema = rc.unique_constraint_schema
          AND rkcu.constraint_name = rc.unique_constraint_name
          AND rkcu.ordinal_position = kcu.position_in_unique_constraint
        WHERE ${where.sql}
        ORDER BY kcu.table_schema, kcu.table_name, kcu.constraint_name, kcu.ordinal_position
      `,
      params: where.params,
    };
  },
};

function extended(text: string, values: readonly unknown[] = []): PgQuery {
  return { text, values: [...values], queryMode: "extended", rowMode: "array" };
}

class PostgresSession implements Session {
  constructor(private client: PgClient) {}

  async query(sql: string, params: readonly unknown[] = []): Promise<QueryRows> {
    try {
      const result = await this.client.query(extended(sql, params));
      const columns = uniqueColumnNames(result.fields.map((f) => f.name));
      return { columns, rows: rowsFromArrays(columns, result.rows) };
    } catch (error) {
      throw classifyPgError(error);
    }
  }
}

/**
 * Build the pg pool. An idle client whose backend goes away makes the pool
 * emit `error`; without a listener that would end the process.
 */
export function createPool(config: Config): pg.Pool {
  const poolConfig: pg.PoolConfig = {
    host: config.connection.host,
    port: config.connection.port,
    database: config.connection.database,
    user: config.connection.user,
    password: config.connection.password,
    ssl: config.connection.ssl,
    connectionString: config.connection.connectionString,
    connectionTimeoutMillis: config.limits.connection_timeout_ms,
    max: config.limits.max_connections,
    application_name: "sqlwarden",
  };
  const pool = new Pool(poolConfig);
  pool.on("error", (error) => log(`Idle client error: ${errorMessage(error)}`));
  return pool;
}

export class PostgresConnection implements Connection {
  readonly dialect = "postgres" as const;
  readonly catalog = POSTGRES_CATALOG;

  constructor(private pool: PgPool) {}

  static fromConfig(config: Config): PostgresConnection {
    return new PostgresConnection(createPool(config));
  }

  async withSession<T>(fn: (session: Session) => Promise<T>, options: SessionOptions): Promise<T> {
    let client: PgClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw new GatewayError("connection_unavailable", `Failed to connect: ${errorMessage(error)}`, { cause: error });
    }

    let failure: GatewayError | undefined;
    try {
      await client.query({ text: "BEGIN TRANSACTION READ ONLY" });
      // SET does not take bind parameters
      const timeout = Math.max(1, Math.ceil(options.timeoutMs));
      await client.query({ text: `SET LOCAL statement_timeout = ${timeout}` });
      return await fn(new PostgresSession(client));
    } catch (error) {
      failure = classifyPgError(error);
      throw failure;
    } finally {
      await this.finish(client, failure);
    }
  }

  /**
   * End the transaction and hand the client back. After a timeout or a lost
   * connection the client is destroyed instead, which also kills any
   * statement still running on it.
   */
  private async finish(client: PgClient, failure: GatewayError | undefined): Promise<void> {
    if (failure && failure.kind !== "execution_failed") {
      client.release(true);
      return;
    }
    try {
      await client.query({ text: "ROLLBACK" });
      client.release();
    } catch (error) {
      log(`Discarding client after failed ROLLBACK: ${errorMessage(error)}`);
      client.release(true);
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
