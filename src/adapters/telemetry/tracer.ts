/**
 * OpenTelemetry Tracer
 *
 * Provides tracing for query execution.
 * This is a no-op implementation when @opentelemetry/api is not installed.
 *
 * To enable real tracing, install @opentelemetry/api and configure your SDK.
 */

// ============================================
// Types
// ============================================

export interface SpanLike {
  setAttribute(key: string, value: unknown): void;
  setStatus(status: { code: number; message?: string }): void;
  recordException(exception: Error): void;
  end(): void;
}

// ============================================
// No-op Implementation
// ============================================

const noopSpan: SpanLike = {
  setAttribute: () => {},
  setStatus: () => {},
  recordException: () => {},
  end: () => {},
};

// ============================================
// Tracer Functions
// ============================================

/**
 * Start a new span
 * Returns no-op span (install @opentelemetry/api for real tracing)
 */
export function startSpan(_name: string): SpanLike {
  return noopSpan;
}

/**
 * Execute a function within a span context
 */
export async function withSpan<T>(
  name: string,
  fn: (span: SpanLike) => Promise<T>,
): Promise<T> {
  const span = startSpan(name);

  try {
    const result = await fn(span);
    span.setStatus({ code: 0 });
    return result;
  } catch (error) {
    const exception = error instanceof Error ? error : new Error(String(error));
    span.setStatus({ code: 1, message: exception.message });
    span.recordException(exception);
    throw error;
  } finally {
    span.end();
  }
}

/**
 * Execute within a query span. The SQL text is recorded, never the bound
 * values.
 */
export async function withQuerySpan<T>(
  sql: string,
  fn: (span: SpanLike) => Promise<T>,
): Promise<T> {
  return withSpan("db.query", async (span) => {
    span.setAttribute("db.system", "postgresql");
    span.setAttribute("db.statement", sql);
    return fn(span);
  });
}

