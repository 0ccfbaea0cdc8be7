/**
 * MCP surface
 *
 * Thin plumbing from MCP tools to the gateway. Every tool answers with one
 * JSON text block; failures carry the GatewayError payload and `isError`.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { askDatabase } from "./ask.js";
import type { SqlGenerator } from "./ask.js";
import { createRules } from "./classifier.js";
import type { Config } from "./config.js";
import type { Connection } from "./connection.js";
import { toGatewayError } from "./errors.js";
import type { StatementResult } from "./executor.js";
import { validateAndExecute, validateBatch } from "./gateway.js";
import type { GatewayOptions } from "./gateway.js";
import { inspectSchema } from "./schema.js";
import { formatDuration, log, truncate } from "./utils.js";

export const SERVER_NAME = "sqlwarden";
export const SERVER_VERSION = "0.1.0";

const STATEMENT_PREVIEW = 200;

export interface ServerDependencies {
  config: Config;
  connection: Connection;
  /** `sql_ask` is registered only when a generator is given. */
  generator?: SqlGenerator;
}

function jsonResult(payload: unknown, isError = false): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
    ...(isError && { isError: true }),
  };
}

function errorResult(tool: string, error: unknown, start: number): CallToolResult {
  const gatewayError = toGatewayError(error);
  const where = gatewayError.statementIndex !== undefined ? ` at statement ${gatewayError.statementIndex}` : "";
  log(`${tool} failed: ${gatewayError.kind}${where} after ${formatDuration(Date.now() - start)}`);
  return jsonResult({ error: gatewayError.toJSON() }, true);
}

function presentStatements(statements: readonly StatementResult[], maxRows: number) {
  return statements.map((s) => ({
    index: s.index,
    sql: truncate(s.sql, STATEMENT_PREVIEW),
    columns: s.columns,
    rows: s.rows.slice(0, maxRows),
    row_count: s.rows.length,
    truncated: s.rows.length > maxRows,
  }));
}

function countRows(statements: readonly StatementResult[]): number {
  return statements.reduce((sum, s) => sum + s.rows.length, 0);
}

export function gatewayOptions(config: Config): GatewayOptions {
  return {
    rules: createRules(config.validator.allowed_keywords, config.validator.forbidden_keywords),
    maxStatements: config.limits.max_statements,
    timeoutMs: config.limits.timeout_ms,
  };
}

export function createServer({ config, connection, generator }: ServerDependencies): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  const gateway = gatewayOptions(config);
  const maxRows = config.limits.max_rows;
  const inspectOptions = {
    timeoutMs: config.limits.timeout_ms,
    excludeTables: config.schema.exclude_tables,
  };

  // ==========================================================================
  // TOOLS: Query Execution
  // ==========================================================================

  server.tool(
    "sql_query",
    "Run one or more read-only SQL statements (separated by ';') in a single read-only transaction",
    {
      sql: z.string().describe("SQL text; every statement must be read-only"),
    },
    async ({ sql }) => {
      const start = Date.now();
      try {
        const statements = await validateAndExecute(sql, connection, gateway);
        const duration = Date.now() - start;
        log(`sql_query: ${statements.length} statements, ${countRows(statements)} rows in ${formatDuration(duration)}`);
        return jsonResult({
          statements: presentStatements(statements, maxRows),
          statement_count: statements.length,
          execution_time: formatDuration(duration),
          max_rows: maxRows,
        });
      } catch (error) {
        return errorResult("sql_query", error, start);
      }
    }
  );

  server.tool(
    "sql_validate",
    "Classify SQL statements as ALLOW or DENY without touching the database",
    {
      sql: z.string().describe("SQL text to check"),
    },
    async ({ sql }) => {
      const decision = validateBatch(sql, gateway.rules);
      return jsonResult({
        allowed: decision.allowed,
        statements: decision.verdicts.map((v, index) => ({
          index,
          statement: truncate(v.statement, STATEMENT_PREVIEW),
          decision: v.decision,
          ...(v.reason !== undefined && { reason: v.reason }),
          ...(v.keyword !== undefined && { keyword: v.keyword }),
        })),
      });
    }
  );

  // ==========================================================================
  // TOOLS: Schema Introspection
  // ==========================================================================

  server.tool(
    "sql_schema",
    "Describe tables, columns and foreign keys, read live from the catalog",
    {
      schema: z.string().optional().describe("Limit to one schema (default: all user schemas)"),
    },
    async ({ schema }) => {
      const start = Date.now();
      try {
        const snapshot = await inspectSchema(connection, schema, inspectOptions);
        log(`sql_schema: ${Object.keys(snapshot.tables).length} tables in ${formatDuration(Date.now() - start)}`);
        return jsonResult(snapshot);
      } catch (error) {
        return errorResult("sql_schema", error, start);
      }
    }
  );

  // ==========================================================================
  // TOOLS: Natural Language
  // ==========================================================================

  if (generator) {
    server.tool(
      "sql_ask",
      "Ask a question in natural language - translates to a read-only query and runs it",
      {
        question: z.string().describe("Natural language question about the data"),
        schema: z.string().optional().describe("Limit the schema context to one schema"),
      },
      async ({ question, schema }) => {
        const start = Date.now();
        try {
          const result = await askDatabase(question, schema, {
            connection,
            generator,
            gateway,
            excludeTables: config.schema.exclude_tables,
          });
          const duration = Date.now() - start;
          log(`sql_ask: ${countRows(result.statements)} rows in ${formatDuration(duration)}`);
          return jsonResult({
            question: result.question,
            generated_sql: result.sql,
            statements: presentStatements(result.statements, maxRows),
            execution_time: formatDuration(duration),
          });
        } catch (error) {
          return errorResult("sql_ask", error, start);
        }
      }
    );
  }

  // ==========================================================================
  // RESOURCES
  // ==========================================================================

  server.resource("schema", "schema://", { mimeType: "application/json" }, async (uri) => {
    const snapshot = await inspectSchema(connection, undefined, inspectOptions);
    return {
      contents: [
        {
          uri: uri.href,
          mimeType: "application/json",
          text: JSON.stringify(snapshot, null, 2),
        },
      ],
    };
  });

  return server;
}
