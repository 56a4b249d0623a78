/**
 * Metrics Port
 *
 * Sink for per-query observability data.
 */

import type { QueryPhase } from "../domain/value-objects/query-outcome.js";

export type QueryStatus = "ok" | "failed";

export interface QueryMetric {
  status: QueryStatus;
  /** Set when status is "failed" */
  phase?: QueryPhase;
  /** Whether the call took the prepared path */
  prepared: boolean;
  durationMs: number;
  rowCount: number;
}

export interface MetricsPort {
  recordQuery(metric: QueryMetric): void;
}
