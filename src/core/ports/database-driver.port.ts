/**
 * Database Driver Port
 *
 * The narrow surface of a relational database client that the query
 * pipeline consumes. Adapters own wire protocol, statement caching and I/O.
 */

import type { BindValue } from "../domain/value-objects/bind-value.js";

export interface ConnectionCredentials {
  host: string;
  port?: number;
  username: string;
  password: string;
  database: string;
}

export interface DriverResult {
  /** Column names, in select-list order */
  columns: string[];
  /** One positional value array per row, in fetch order */
  rows: unknown[][];
  /** Driver-reported count; -1 when the driver reports none */
  affectedRows: number;
}

export interface DriverStatement {
  /**
   * Bind the type string and values in one step.
   * MUST throw BindCountMismatchError if `types.length !== values.length`
   */
  bind(types: string, values: readonly BindValue[]): void;

  /**
   * Run the bound statement
   * Rejects with DriverQueryError
   */
  execute(): Promise<DriverResult>;
}

export interface DriverConnection {
  /**
   * Compile a `?`-placeholder template
   * Rejects with DriverQueryError (phase "prepare")
   */
  prepare(sql: string): Promise<DriverStatement>;

  /**
   * Run SQL with no parameters and no preparation step
   * Rejects with DriverQueryError
   */
  query(sql: string): Promise<DriverResult>;

  close(): Promise<void>;
}

export interface DatabaseDriverPort {
  /**
   * Open a session and select the target database
   * Rejects with ConnectionError or DatabaseSelectionError
   */
  connect(credentials: ConnectionCredentials): Promise<DriverConnection>;
}
