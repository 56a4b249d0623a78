/**
 * @module core/use-cases
 * Application use cases (orchestration layer)
 */

export * from "./run-query.use-case.js";
