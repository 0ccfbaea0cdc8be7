/**
 * Query executor
 *
 * Runs an admitted batch in one read-only session, strictly in input order.
 * The batch is all-or-nothing: the first failure discards every earlier
 * result.
 */

import type { Connection, ResultRow } from "./connection.js";
import { GatewayError, toGatewayError } from "./errors.js";
import { withTimeout } from "./utils.js";

export const DEFAULT_MAX_STATEMENTS = 20;

/** An admitted statement with its position in the original request. */
export interface PlannedStatement {
  index: number;
  sql: string;
}

export interface StatementResult {
  index: number;
  sql: string;
  columns: string[];
  rows: ResultRow[];
}

export interface ExecutionOptions {
  maxStatements: number;
  timeoutMs: number;
}

export async function executeStatements(
  statements: readonly PlannedStatement[],
  connection: Connection,
  options: ExecutionOptions
): Promise<StatementResult[]> {
  if (statements.length > options.maxStatements) {
    throw new GatewayError(
      "resource_limit_exceeded",
      `Batch contains ${statements.length} statements; at most ${options.maxStatements} are allowed per request`
    );
  }
  if (statements.length === 0) return [];

  const start = Date.now();
  const deadline = start + options.timeoutMs;

  return connection.withSession(async (session) => {
    const results: StatementResult[] = [];

    for (const { index, sql } of statements) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new GatewayError("timeout", `Request timed out after ${options.timeoutMs}ms`, {
          statementIndex: index,
          durationMs: Date.now() - start,
        });
      }

      try {
        const { columns, rows } = await withTimeout(
          session.query(sql),
          remaining,
          `Request timed out after ${options.timeoutMs}ms`
        );
        results.push({ index, sql, columns, rows });
      } catch (error) {
        throw toGatewayError(error).atStatement(index);
      }
    }

    return results;
  }, { timeoutMs: options.timeoutMs });
}
