/**
 * @module core/domain
 * Domain value objects, services and errors
 */

export * from "./value-objects/index.js";
export * from "./services/index.js";
export * from "./errors/index.js";
