/**
 * Placeholder translation for node-postgres
 *
 * Rewrites `?` placeholders to PostgreSQL's positional `$1, $2, ...` form.
 * Question marks inside string literals, quoted identifiers, dollar-quoted
 * bodies and comments are left alone.
 *
 * Note: the jsonb `?`, `?|` and `?&` operators are indistinguishable from
 * placeholders here; use `jsonb_exists()` and friends in templates instead.
 */

export interface PositionalSql {
  text: string;
  placeholderCount: number;
}

const DOLLAR_TAG = /^\$([A-Za-z_][A-Za-z0-9_]*)?\$/;

export function toPositionalPlaceholders(sql: string): PositionalSql {
  let text = "";
  let placeholderCount = 0;
  let i = 0;

  while (i < sql.length) {
    const ch = sql.charAt(i);
    const next = sql.charAt(i + 1);

    if (ch === "?") {
      placeholderCount++;
      text += `$${placeholderCount}`;
      i++;
      continue;
    }

    let end = i + 1;
    if (ch === "'") {
      const escapes = /[eE]/.test(sql.charAt(i - 1));
      end = skipQuoted(sql, i, "'", escapes);
    } else if (ch === '"') {
      end = skipQuoted(sql, i, '"', false);
    } else if (ch === "-" && next === "-") {
      const newline = sql.indexOf("\n", i);
      end = newline === -1 ? sql.length : newline + 1;
    } else if (ch === "/" && next === "*") {
      const close = sql.indexOf("*/", i + 2);
      end = close === -1 ? sql.length : close + 2;
    } else if (ch === "$") {
      const tag = DOLLAR_TAG.exec(sql.slice(i));
      if (tag) {
        const close = sql.indexOf(tag[0], i + tag[0].length);
        end = close === -1 ? sql.length : close + tag[0].length;
      }
    }

    text += sql.slice(i, end);
    i = end;
  }

  return { text, placeholderCount };
}

/**
 * Index just past the closing quote. A doubled quote is an escaped quote;
 * in E'' strings a backslash escapes the next character too.
 */
function skipQuoted(
  sql: string,
  start: number,
  quote: string,
  backslashEscapes: boolean,
): number {
  let i = start + 1;
  while (i < sql.length) {
    const ch = sql.charAt(i);
    if (backslashEscapes && ch === "\\") {
      i += 2;
    } else if (ch === quote && sql.charAt(i + 1) === quote) {
      i += 2;
    } else if (ch === quote) {
      return i + 1;
    } else {
      i++;
    }
  }
  return sql.length;
}
