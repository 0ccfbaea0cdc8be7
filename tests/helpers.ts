import { GatewayError } from "../src/errors.js";
import type { CatalogQueries, Connection, QueryRows, Session, SessionOptions } from "../src/connection.js";

export type QueryHandler = (sql: string, params: readonly unknown[]) => QueryRows | Promise<QueryRows>;

/** Catalog queries that are easy to recognise in a handler. */
export const FAKE_CATALOG: CatalogQueries = {
  tables: (schema) => ({ sql: "-- catalog:tables", params: schema === undefined ? [] : [schema] }),
  columns: (schema) => ({ sql: "-- catalog:columns", params: schema === undefined ? [] : [schema] }),
  foreignKeys: (schema) => ({ sql: "-- catalog:foreign_keys", params: schema === undefined ? [] : [schema] }),
};

export const EMPTY_ROWS: QueryRows = { columns: [], rows: [] };

/**
 * Recording stand-in for a database connection.
 */
export class FakeConnection implements Connection {
  readonly dialect = "postgres" as const;
  readonly catalog = FAKE_CATALOG;

  executed: string[] = [];
  sessionsOpened = 0;
  sessionsReleased = 0;
  sessionOptions: SessionOptions[] = [];
  closed = false;

  constructor(private handler: QueryHandler = () => ({ columns: ["?column?"], rows: [{ "?column?": 1 }] })) {}

  async withSession<T>(fn: (session: Session) => Promise<T>, options: SessionOptions): Promise<T> {
    this.sessionsOpened++;
    this.sessionOptions.push(options);
    const session: Session = {
      query: async (sql, params = []) => {
        this.executed.push(sql);
        return this.handler(sql, params);
      },
    };
    try {
      return await fn(session);
    } finally {
      this.sessionsReleased++;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** Await a promise that must reject with a GatewayError. */
export async function rejection(promise: Promise<unknown>): Promise<GatewayError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof GatewayError) return error;
    throw error;
  }
  throw new Error("expected a GatewayError");
}
