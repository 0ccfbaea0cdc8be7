/**
 * Natural language to SQL
 *
 * A question becomes one SELECT via the Anthropic API, and the answer goes
 * through the same gateway as any other request. Generated SQL gets no
 * bypass: a model that answers with a write is rejected like a user would be.
 */

import Anthropic from "@anthropic-ai/sdk";
import type { Connection, Dialect } from "./connection.js";
import type { StatementResult } from "./executor.js";
import { validateAndExecute } from "./gateway.js";
import type { GatewayOptions } from "./gateway.js";
import { inspectSchema } from "./schema.js";
import type { SchemaSnapshot } from "./schema.js";
import { GatewayError } from "./errors.js";

export interface SqlGenerator {
  generate(prompt: string): Promise<string>;
}

export interface AnthropicGeneratorOptions {
  model: string;
  maxTokens: number;
  /** Defaults to an SDK client reading ANTHROPIC_API_KEY. */
  client?: Anthropic;
}

export class AnthropicSqlGenerator implements SqlGenerator {
  private client: Anthropic;

  constructor(private options: AnthropicGeneratorOptions) {
    this.client = options.client ?? new Anthropic();
  }

  async generate(prompt: string): Promise<string> {
    const response = await this.client.messages.create({
      model: this.options.model,
      max_tokens: this.options.maxTokens,
      messages: [{ role: "user", content: prompt }],
    });

    const parts: string[] = [];
    for (const block of response.content) {
      if (block.type === "text") parts.push(block.text);
    }
    return parts.join("\n");
  }
}

const DIALECT_NAMES: Record<Dialect, string> = {
  postgres: "PostgreSQL",
  sqlite: "SQLite",
};

/**
 * Render a snapshot as CREATE TABLE lines for the prompt.
 */
export function describeSchema(snapshot: SchemaSnapshot): string {
  const lines: string[] = [];

  for (const key of Object.keys(snapshot.tables).sort()) {
    const table = snapshot.tables[key];
    const body = table.columns.map((col) => `  ${col.name} ${col.type}${col.nullable ? "" : " NOT NULL"}`);
    for (const fk of table.foreignKeys) {
      const target = `${fk.references.schema}.${fk.references.table}`;
      const refColumns = fk.references.columns.length > 0 ? ` (${fk.references.columns.join(", ")})` : "";
      body.push(`  FOREIGN KEY (${fk.columns.join(", ")}) REFERENCES ${target}${refColumns}`);
    }
    if (table.kind === "view") lines.push("-- view");
    lines.push(`CREATE TABLE ${key} (`, body.join(",\n"), ");", "");
  }

  return lines.join("\n");
}

export function buildPrompt(question: string, schemaContext: string, dialect: Dialect): string {
  const name = DIALECT_NAMES[dialect];
  return `You are a SQL expert. Given this ${name} schema:

${schemaContext}

Translate this question to a SELECT query:
"${question}"

Rules:
- Return ONLY the SQL query, no explanation
- Use ${name} syntax
- Only one read-only statement (no INSERT/UPDATE/DELETE/DDL)
- Respect column names exactly as shown
- Add reasonable LIMIT if not specified (max 100)

SQL:`;
}

/**
 * Pull the statement out of a model answer, dropping a Markdown code fence.
 */
export function extractSql(text: string): string {
  const fenced = /```(?:sql)?\s*\n?([\s\S]*?)```/i.exec(text);
  const sql = fenced ? fenced[1] : text;
  return sql.trim();
}

export interface AskDependencies {
  connection: Connection;
  generator: SqlGenerator;
  gateway: GatewayOptions;
  excludeTables: readonly string[];
}

export interface AskResult {
  question: string;
  sql: string;
  statements: StatementResult[];
}

export async function askDatabase(
  question: string,
  schemaFilter: string | undefined,
  deps: AskDependencies
): Promise<AskResult> {
  const snapshot = await inspectSchema(deps.connection, schemaFilter, {
    timeoutMs: deps.gateway.timeoutMs,
    excludeTables: deps.excludeTables,
  });

  const answer = await deps.generator.generate(
    buildPrompt(question, describeSchema(snapshot), deps.connection.dialect)
  );
  const sql = extractSql(answer);
  if (sql.length === 0) {
    throw new GatewayError("execution_failed", "Failed to generate SQL from question");
  }

  const statements = await validateAndExecute(sql, deps.connection, deps.gateway);
  return { question, sql, statements };
}
