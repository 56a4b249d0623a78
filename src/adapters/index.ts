/**
 * @module adapters
 * Adapters for external systems (database driver, telemetry)
 */

export * from "./persistence/index.js";
export * from "./telemetry/index.js";
