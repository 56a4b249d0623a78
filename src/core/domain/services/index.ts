/**
 * Domain Services Index
 */

export * from "./statement-builder.js";
export * from "./result-normalizer.js";
