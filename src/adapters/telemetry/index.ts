/**
 * @module adapters/telemetry
 * No-op OpenTelemetry tracing and metrics
 */

export * from "./tracer.js";
export * from "./metrics.js";
