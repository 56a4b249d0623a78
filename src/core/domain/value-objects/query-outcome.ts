/**
 * Query Outcome Value Object
 *
 * What a single runQuery call produced. Exactly one of the two shapes.
 */

import type { QueryError } from "../errors/index.js";

export type ResultRow = Record<string, unknown>;

export type QueryPhase = "prepare" | "bind" | "execute";

export interface QuerySuccess {
  readonly ok: true;
  readonly error: "";
  /** Driver-reported count; -1 when the driver reports none */
  readonly affectedRows: number;
  readonly rows: readonly ResultRow[];
}

export interface QueryFailure {
  readonly ok: false;
  readonly error: string;
  /** 0 when the call failed before executing, -1 when execution failed */
  readonly affectedRows: number;
  readonly rows: readonly ResultRow[];
  readonly phase: QueryPhase;
  readonly cause: QueryError;
}

export type QueryOutcome = QuerySuccess | QueryFailure;

export const EMPTY_OUTCOME: QuerySuccess = {
  ok: true,
  error: "",
  affectedRows: 0,
  rows: [],
};

export function succeeded(
  affectedRows: number,
  rows: readonly ResultRow[] = [],
): QuerySuccess {
  return { ok: true, error: "", affectedRows, rows };
}

export function failed(
  phase: QueryPhase,
  error: string,
  cause: QueryError,
  affectedRows = 0,
): QueryFailure {
  return { ok: false, error, affectedRows, rows: [], phase, cause };
}
