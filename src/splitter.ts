/**
 * Statement splitter
 *
 * Splits raw request text on `;` outside quoted runs. Single quotes delimit
 * string literals, double quotes delimit identifiers; inside either, a
 * doubled quote is an escaped quote and does not end the run.
 */

export const STATEMENT_TERMINATOR = ";";

export function isQuote(ch: string): boolean {
  return ch === "'" || ch === '"';
}

/**
 * Split text into trimmed, non-empty statements. Never throws: text with no
 * unquoted terminator comes back as a single statement.
 */
export function splitStatements(text: string): string[] {
  const statements: string[] = [];
  let quote: string | null = null;
  let start = 0;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (quote !== null) {
      if (ch === quote) {
        if (text[i + 1] === quote) {
          i++;
        } else {
          quote = null;
        }
      }
      continue;
    }

    if (isQuote(ch)) {
      quote = ch;
    } else if (ch === STATEMENT_TERMINATOR) {
      pushTrimmed(statements, text.slice(start, i));
      start = i + 1;
    }
  }

  pushTrimmed(statements, text.slice(start));
  return statements;
}

function pushTrimmed(into: string[], piece: string): void {
  const trimmed = piece.trim();
  if (trimmed.length > 0) into.push(trimmed);
}
