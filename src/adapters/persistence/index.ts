/**
 * @module adapters/persistence
 * PostgreSQL driver adapter
 */

export * from "./pg-driver.js";
export * from "./pg-placeholders.js";
