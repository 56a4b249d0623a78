/**
 * OpenTelemetry Metrics
 *
 * Provides metrics recording for query execution.
 * This is a no-op implementation when @opentelemetry/api is not installed.
 *
 * To enable real metrics, install @opentelemetry/api and configure your SDK.
 */

import type {
  MetricsPort,
  QueryMetric,
} from "../../core/ports/metrics.port.js";

// ============================================
// No-op Implementation
// ============================================

class NoopMetrics implements MetricsPort {
  recordQuery(_metric: QueryMetric): void {}
}

// ============================================
// In-memory Implementation
// ============================================

/**
 * Keeps every recorded metric (for testing/development)
 */
export class InMemoryMetrics implements MetricsPort {
  private readonly entries: QueryMetric[] = [];

  recordQuery(metric: QueryMetric): void {
    this.entries.push(metric);
  }

  get recorded(): readonly QueryMetric[] {
    return this.entries;
  }

  clear(): void {
    this.entries.length = 0;
  }
}

// ============================================
// Singleton Export
// ============================================

/**
 * Get metrics instance
 * Returns no-op metrics (install @opentelemetry/api for real metrics)
 */
export function getMetrics(): MetricsPort {
  return metrics;
}

/**
 * Query metrics singleton
 */
export const metrics: MetricsPort = new NoopMetrics();

