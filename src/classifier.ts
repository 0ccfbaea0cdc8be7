/**
 * Read-only classifier
 *
 * A keyword heuristic over comment-free statements, not a parser. What it
 * does not catch, by construction:
 * - writes performed inside a stored routine invoked from a SELECT
 * - `SELECT ... INTO new_table`, which creates a table in PostgreSQL; the
 *   read-only transaction is what stops it
 * - dialect write syntax whose keywords are not in the forbidden set
 *
 * Words inside string literals are scanned like any other text, so a
 * literal such as 'update' is denied along with real writes.
 */

import { splitStatements } from "./splitter.js";

export type Decision = "ALLOW" | "DENY";

export interface Verdict {
  readonly statement: string;
  readonly decision: Decision;
  readonly reason?: string;
  readonly keyword?: string;
}

export interface ClassifierRules {
  readonly allowed: ReadonlySet<string>;
  readonly forbidden: ReadonlySet<string>;
}

export const DEFAULT_ALLOWED_KEYWORDS = ["SELECT", "WITH", "EXPLAIN", "SHOW", "DESCRIBE"] as const;

export const DEFAULT_FORBIDDEN_KEYWORDS = [
  "INSERT",
  "UPDATE",
  "DELETE",
  "DROP",
  "ALTER",
  "TRUNCATE",
  "CREATE",
  "GRANT",
  "REVOKE",
  "MERGE",
  "CALL",
  "EXECUTE",
  "REPLACE",
  "COPY",
  "LOCK",
  "SET",
  "RESET",
  "VACUUM",
] as const;

export const REASON_EMPTY = "empty statement";
export const REASON_NOT_READ_ONLY = "statement does not begin with a read-only keyword";
export const REASON_EMBEDDED = "embedded secondary statement detected";

export function createRules(
  allowed: Iterable<string> = DEFAULT_ALLOWED_KEYWORDS,
  forbidden: Iterable<string> = DEFAULT_FORBIDDEN_KEYWORDS
): ClassifierRules {
  return {
    allowed: new Set(Array.from(allowed, (k) => k.trim().toUpperCase())),
    forbidden: new Set(Array.from(forbidden, (k) => k.trim().toUpperCase())),
  };
}

export const DEFAULT_RULES: ClassifierRules = createRules();

function isWordChar(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return (
    (code >= 48 && code <= 57) || // 0-9
    (code >= 65 && code <= 90) || // A-Z
    (code >= 97 && code <= 122) || // a-z
    code === 95 // _
  );
}

interface Word {
  text: string;
  end: number;
}

/** Next run of word characters at or after `from`, or null at end of text. */
function nextWord(text: string, from: number): Word | null {
  let i = from;
  while (i < text.length && !isWordChar(text[i])) i++;
  if (i >= text.length) return null;
  const start = i;
  while (i < text.length && isWordChar(text[i])) i++;
  return { text: text.slice(start, i), end: i };
}

function verdict(statement: string, decision: Decision, reason?: string, keyword?: string): Verdict {
  return Object.freeze({
    statement,
    decision,
    ...(reason !== undefined && { reason }),
    ...(keyword !== undefined && { keyword }),
  });
}

/**
 * Classify one comment-free statement as ALLOW or DENY.
 */
export function classifyStatement(statement: string, rules: ClassifierRules = DEFAULT_RULES): Verdict {
  const text = statement.trim();
  if (text.length === 0) return verdict(text, "ALLOW", REASON_EMPTY);

  // Leading keyword must start at the first character.
  const leading = isWordChar(text[0]) ? nextWord(text, 0) : null;
  if (leading === null || !rules.allowed.has(leading.text.toUpperCase())) {
    return verdict(text, "DENY", REASON_NOT_READ_ONLY);
  }

  for (let word = nextWord(text, leading.end); word !== null; word = nextWord(text, word.end)) {
    const upper = word.text.toUpperCase();
    if (rules.forbidden.has(upper)) {
      return verdict(text, "DENY", `forbidden keyword ${upper}`, upper);
    }
  }

  if (splitStatements(text).length > 1) {
    return verdict(text, "DENY", REASON_EMBEDDED);
  }

  return verdict(text, "ALLOW");
}
