/**
 * @module core/domain/value-objects
 */

export * from "./bind-value.js";
export * from "./query-options.js";
export * from "./query-outcome.js";
