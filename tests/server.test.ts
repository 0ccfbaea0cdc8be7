import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import type { SqlGenerator } from "../src/ask.js";
import { defaultConfig } from "../src/config.js";
import type { Config } from "../src/config.js";
import type { QueryRows } from "../src/connection.js";
import { createServer } from "../src/server.js";
import { EMPTY_ROWS, FakeConnection } from "./helpers.js";

const clients: Client[] = [];

async function connect(connection: FakeConnection, options: { config?: Config; generator?: SqlGenerator } = {}) {
  const server = createServer({ config: options.config ?? defaultConfig({}), connection, generator: options.generator });
  const client = new Client({ name: "test-client", version: "1.0.0" });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  clients.push(client);
  return client;
}

async function call(client: Client, name: string, args: Record<string, unknown>) {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const first = result.content[0];
  if (first?.type !== "text") throw new Error("expected a text result");
  const payload: unknown = JSON.parse(first.text);
  return { isError: result.isError ?? false, payload };
}

function rowsHandler(sql: string): QueryRows {
  if (sql === "-- catalog:tables") {
    return { columns: [], rows: [{ table_schema: "public", table_name: "users", table_kind: "table" }] };
  }
  if (sql.startsWith("-- catalog:")) return EMPTY_ROWS;
  return { columns: ["id"], rows: [{ id: 1 }, { id: 2 }, { id: 3 }] };
}

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(async () => {
  await Promise.all(clients.splice(0).map((c) => c.close()));
  vi.restoreAllMocks();
});

describe("MCP server", () => {
  it("lists the tools, leaving out sql_ask without a generator", async () => {
    const client = await connect(new FakeConnection());
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual(["sql_query", "sql_schema", "sql_validate"]);
  });

  it("registers sql_ask when a generator is configured", async () => {
    const generator: SqlGenerator = { generate: async () => "SELECT id FROM users" };
    const client = await connect(new FakeConnection(rowsHandler), { generator });
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name)).toContain("sql_ask");

    const { isError, payload } = await call(client, "sql_ask", { question: "Which users exist?" });
    expect(isError).toBe(false);
    expect(payload).toMatchObject({
      question: "Which users exist?",
      generated_sql: "SELECT id FROM users",
      statements: [{ index: 0, sql: "SELECT id FROM users", row_count: 3 }],
    });
  });

  it("runs a query and caps rows at max_rows", async () => {
    const config = defaultConfig({});
    config.limits.max_rows = 2;
    const client = await connect(new FakeConnection(rowsHandler), { config });

    const { isError, payload } = await call(client, "sql_query", { sql: "SELECT id FROM users" });

    expect(isError).toBe(false);
    expect(payload).toMatchObject({
      statements: [
        {
          index: 0,
          sql: "SELECT id FROM users",
          columns: ["id"],
          rows: [{ id: 1 }, { id: 2 }],
          row_count: 3,
          truncated: true,
        },
      ],
      statement_count: 1,
      max_rows: 2,
    });
  });

  it("returns a validation error without touching the database", async () => {
    const connection = new FakeConnection();
    const client = await connect(connection);

    const { isError, payload } = await call(client, "sql_query", { sql: "SELECT 1; DELETE FROM t" });

    expect(isError).toBe(true);
    expect(payload).toEqual({
      error: {
        kind: "validation_rejected",
        message: "Statement 1 rejected: statement does not begin with a read-only keyword",
        statement_index: 1,
        retryable: false,
        suggestion: "Only read-only statements (SELECT, WITH, EXPLAIN, SHOW, DESCRIBE) are accepted.",
      },
    });
    expect(connection.sessionsOpened).toBe(0);
  });

  it("dry-runs the classifier with sql_validate", async () => {
    const connection = new FakeConnection();
    const client = await connect(connection);

    const { payload } = await call(client, "sql_validate", { sql: "SELECT 1; SELECT * FROM t FOR UPDATE" });

    expect(payload).toEqual({
      allowed: false,
      statements: [
        { index: 0, statement: "SELECT 1", decision: "ALLOW" },
        {
          index: 1,
          statement: "SELECT * FROM t FOR UPDATE",
          decision: "DENY",
          reason: "forbidden keyword UPDATE",
          keyword: "UPDATE",
        },
      ],
    });
    expect(connection.sessionsOpened).toBe(0);
  });

  it("applies configured keyword sets", async () => {
    const config = defaultConfig({});
    config.validator.forbidden_keywords = [...config.validator.forbidden_keywords, "pg_sleep"];
    const client = await connect(new FakeConnection(), { config });

    const { payload } = await call(client, "sql_validate", { sql: "SELECT pg_sleep(5)" });
    expect(payload).toMatchObject({ allowed: false, statements: [{ keyword: "PG_SLEEP" }] });
  });

  it("describes the schema through the tool and the resource", async () => {
    const client = await connect(new FakeConnection(rowsHandler));
    const expected = {
      tables: {
        "public.users": { schema: "public", name: "users", kind: "table", columns: [], foreignKeys: [] },
      },
    };

    const { payload } = await call(client, "sql_schema", {});
    expect(payload).toEqual(expected);

    const resource = await client.readResource({ uri: "schema://" });
    const content = resource.contents[0];
    if (!("text" in content) || typeof content.text !== "string") throw new Error("expected a text resource");
    const parsed: unknown = JSON.parse(content.text);
    expect(parsed).toEqual(expected);
  });
});
