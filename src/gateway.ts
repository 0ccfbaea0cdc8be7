/**
 * Admission and execution entry points
 *
 * raw text -> splitStatements -> stripComments + classifyStatement per
 * statement -> (all ALLOW) -> executeStatements. Any DENY fails the batch
 * before a session is opened.
 */

import { classifyStatement, DEFAULT_RULES, REASON_EMPTY } from "./classifier.js";
import type { ClassifierRules, Verdict } from "./classifier.js";
import { stripComments } from "./comments.js";
import type { Connection } from "./connection.js";
import { GatewayError } from "./errors.js";
import { executeStatements, DEFAULT_MAX_STATEMENTS } from "./executor.js";
import type { PlannedStatement, StatementResult } from "./executor.js";
import { splitStatements } from "./splitter.js";

export interface BatchDecision {
  allowed: boolean;
  verdicts: Verdict[];
}

export interface GatewayOptions {
  rules: ClassifierRules;
  maxStatements: number;
  timeoutMs: number;
}

export const DEFAULT_GATEWAY_OPTIONS: GatewayOptions = {
  rules: DEFAULT_RULES,
  maxStatements: DEFAULT_MAX_STATEMENTS,
  timeoutMs: 10000,
};

/**
 * Classify every statement in the request. Pure; touches no database.
 */
export function validateBatch(rawText: string, rules: ClassifierRules = DEFAULT_RULES): BatchDecision {
  const verdicts = splitStatements(rawText).map((statement) =>
    classifyStatement(stripComments(statement), rules)
  );
  return {
    allowed: verdicts.every((v) => v.decision === "ALLOW"),
    verdicts,
  };
}

/**
 * Admit a request or reject it whole. Returns the statements to run, with
 * comment-only statements dropped but original indexes kept.
 */
export function admitBatch(rawText: string, rules: ClassifierRules = DEFAULT_RULES): PlannedStatement[] {
  const { verdicts } = validateBatch(rawText, rules);

  const denied = verdicts.findIndex((v) => v.decision === "DENY");
  if (denied !== -1) {
    throw new GatewayError(
      "validation_rejected",
      `Statement ${denied} rejected: ${verdicts[denied].reason ?? "not read-only"}`,
      { statementIndex: denied }
    );
  }

  const planned: PlannedStatement[] = [];
  verdicts.forEach((v, index) => {
    if (v.reason !== REASON_EMPTY) planned.push({ index, sql: v.statement });
  });
  return planned;
}

export async function validateAndExecute(
  rawText: string,
  connection: Connection,
  options: GatewayOptions = DEFAULT_GATEWAY_OPTIONS
): Promise<StatementResult[]> {
  const planned = admitBatch(rawText, options.rules);
  return executeStatements(planned, connection, {
    maxStatements: options.maxStatements,
    timeoutMs: options.timeoutMs,
  });
}
