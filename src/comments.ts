/**
 * Comment stripper
 *
 * Classification is only defined on comment-free text, so this runs on every
 * statement first. Each comment becomes one space so that the tokens on
 * either side stay apart.
 */

import { isQuote } from "./splitter.js";

export function stripComments(statement: string): string {
  let out = "";
  let quote: string | null = null;
  let i = 0;

  while (i < statement.length) {
    const ch = statement[i];
    const next = statement[i + 1];

    if (quote !== null) {
      out += ch;
      if (ch === quote) {
        if (next === quote) {
          out += next;
          i += 2;
          continue;
        }
        quote = null;
      }
      i++;
      continue;
    }

    if (isQuote(ch)) {
      quote = ch;
      out += ch;
      i++;
    } else if (ch === "-" && next === "-") {
      const newline = statement.indexOf("\n", i + 2);
      out += " ";
      i = newline === -1 ? statement.length : newline;
    } else if (ch === "/" && next === "*") {
      const close = statement.indexOf("*/", i + 2);
      out += " ";
      i = close === -1 ? statement.length : close + 2;
    } else {
      out += ch;
      i++;
    }
  }

  return out.trim();
}
