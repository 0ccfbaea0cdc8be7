#!/usr/bin/env node
/**
 * sqlwarden
 * Read-only SQL gateway served over MCP
 *
 * @license MIT
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { AnthropicSqlGenerator } from "./ask.js";
import type { SqlGenerator } from "./ask.js";
import { loadConfig } from "./config.js";
import type { Config } from "./config.js";
import type { Connection } from "./connection.js";
import { errorMessage } from "./errors.js";
import { PostgresConnection } from "./postgres.js";
import { createServer } from "./server.js";
import { SqliteConnection } from "./sqlite.js";
import { log } from "./utils.js";

function openConnection(config: Config): Connection {
  if (config.driver === "sqlite") {
    const filename = config.connection.filename;
    if (filename === undefined) throw new Error("connection.filename is required for the sqlite driver");
    return SqliteConnection.open(filename);
  }
  return PostgresConnection.fromConfig(config);
}

function describeTarget(config: Config): string {
  if (config.driver === "sqlite") return `sqlite:${config.connection.filename ?? "?"}`;
  if (config.connection.connectionString) return "postgres (DATABASE_URL)";
  return `postgres:${config.connection.host}:${config.connection.port}/${config.connection.database}`;
}

async function main() {
  const config = loadConfig();
  const connection = openConnection(config);

  let generator: SqlGenerator | undefined;
  if (config.ask.enabled) {
    generator = new AnthropicSqlGenerator({ model: config.ask.model, maxTokens: config.ask.max_tokens });
  }

  const server = createServer({ config, connection, generator });
  const transport = new StdioServerTransport();
  await server.connect(transport);

  log("Running on stdio");
  log(`Database: ${describeTarget(config)}`);
  log(
    `Limits: max_statements=${config.limits.max_statements}, timeout=${config.limits.timeout_ms}ms, ` +
      `connect_timeout=${config.limits.connection_timeout_ms}ms, max_rows=${config.limits.max_rows}`
  );
  log(`sql_ask: ${generator ? `enabled (${config.ask.model})` : "disabled"}`);

  const shutdown = (signal: string) => {
    log(`Received ${signal}, closing`);
    Promise.all([server.close(), connection.close()]).then(
      () => process.exit(0),
      (error: unknown) => {
        log(`Error during shutdown: ${errorMessage(error)}`);
        process.exit(1);
      }
    );
  };

  // Cleanup on exit
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  log(`Fatal error: ${errorMessage(error)}`);
  process.exit(1);
});
