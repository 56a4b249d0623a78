/**
 * Domain Errors
 */

export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DomainError";
  }
}

// ========================================
// Construction-time (fatal)
// ========================================

export class ConnectionError extends DomainError {
  constructor(
    readonly code: string,
    readonly nativeMessage: string,
  ) {
    super(`${code}: ${nativeMessage}`);
    this.name = "ConnectionError";
  }
}

export class DatabaseSelectionError extends DomainError {
  constructor(readonly databaseName: string) {
    super(`Error: Could not select the database ${databaseName}`);
    this.name = "DatabaseSelectionError";
  }
}

export class ConfigurationError extends DomainError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

// ========================================
// Per-call (recorded in the query outcome)
// ========================================

export class InvalidSyntaxError extends DomainError {
  constructor(readonly nativeMessage: string) {
    super(`Invalid SQL syntax: ${nativeMessage}`);
    this.name = "InvalidSyntaxError";
  }
}

export class ExecutionError extends DomainError {
  constructor(readonly nativeMessage: string) {
    super(nativeMessage);
    this.name = "ExecutionError";
  }
}

export class BindTypeError extends DomainError {
  constructor(
    readonly position: number,
    readonly kind: string,
  ) {
    super(
      `Unsupported bind variable at position ${position}: ${kind} (expected boolean, number, bigint or string)`,
    );
    this.name = "BindTypeError";
  }
}

export class PlaceholderCountError extends DomainError {
  constructor(
    readonly placeholderCount: number,
    readonly valueCount: number,
  ) {
    super(
      `Statement has ${placeholderCount} placeholder(s) but ${valueCount} value(s) were bound`,
    );
    this.name = "PlaceholderCountError";
  }
}

export type QueryError =
  | InvalidSyntaxError
  | ExecutionError
  | BindTypeError
  | PlaceholderCountError;

// ========================================
// Internal faults (thrown)
// ========================================

export class BindCountMismatchError extends DomainError {
  constructor(tagCount: number, valueCount: number) {
    super(
      `Bind type string has ${tagCount} tag(s) but ${valueCount} value(s) were supplied`,
    );
    this.name = "BindCountMismatchError";
  }
}

/**
 * Raised by driver adapters. `phase` tells the executor whether the server
 * refused to compile the statement or failed while running it.
 */
export class DriverQueryError extends DomainError {
  constructor(
    readonly phase: "prepare" | "execute",
    message: string,
    readonly code?: string,
  ) {
    super(message);
    this.name = "DriverQueryError";
  }
}
