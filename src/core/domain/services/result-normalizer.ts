/**
 * Result Normalizer
 *
 * Turns driver rows (positional value arrays plus column metadata) into
 * column-keyed records, preserving fetch order.
 */

import type { ResultRow } from "../value-objects/query-outcome.js";

/**
 * When two columns share a name the later one wins, as with any
 * name-keyed fetch.
 */
export function toResultRow(
  columns: readonly string[],
  values: readonly unknown[],
): ResultRow {
  return Object.fromEntries(columns.map((name, i) => [name, values[i]]));
}

export function normalizeRows(
  columns: readonly string[],
  rows: readonly (readonly unknown[])[],
): ResultRow[] {
  return rows.map((values) => toResultRow(columns, values));
}
