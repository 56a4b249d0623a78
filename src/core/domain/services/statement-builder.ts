/**
 * Statement Builder
 *
 * Textual helpers for SQL templates. No parsing or validation of the
 * template happens here.
 */

export const PLACEHOLDER = "?";

/**
 * Append a parenthesized placeholder list sized to `count`.
 *
 *   appendPlaceholderList("INSERT INTO logs (msg) VALUES", 3)
 *   // => "INSERT INTO logs (msg) VALUES(?,?,?)"
 *
 * A count of zero appends `()`.
 */
export function appendPlaceholderList(sql: string, count: number): string {
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`Placeholder count must be a non-negative integer, got ${count}`);
  }
  return `${sql}(${new Array<string>(count).fill(PLACEHOLDER).join(",")})`;
}

export function buildStatement(
  sql: string,
  variableCount: number,
  autoBrackets: boolean,
): string {
  return autoBrackets ? appendPlaceholderList(sql, variableCount) : sql;
}
