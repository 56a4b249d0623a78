/**
 * Database
 *
 * One connection, one logical caller. Each runQuery returns its own
 * QueryOutcome and mirrors it into `error`, `affectedRows` and `result`
 * until the next call.
 */

import type {
  ConnectionCredentials,
  DatabaseDriverPort,
  DriverConnection,
} from "../core/ports/database-driver.port.js";
import type { MetricsPort } from "../core/ports/metrics.port.js";
import type { BindValue } from "../core/domain/value-objects/bind-value.js";
import type { RunQueryOptions } from "../core/domain/value-objects/query-options.js";
import {
  EMPTY_OUTCOME,
  type QueryOutcome,
  type ResultRow,
} from "../core/domain/value-objects/query-outcome.js";
import { RunQueryUseCase } from "../core/use-cases/run-query.use-case.js";
import { PgDatabaseDriver } from "../adapters/persistence/pg-driver.js";
import { getMetrics } from "../adapters/telemetry/metrics.js";
import { withQuerySpan } from "../adapters/telemetry/tracer.js";

export interface DatabaseOptions {
  /** Defaults to node-postgres */
  driver?: DatabaseDriverPort;
  /** Defaults to the no-op recorder */
  metrics?: MetricsPort;
  /** Log connection lifecycle and failed queries (default: true) */
  logging?: boolean;
}

export class Database {
  private outcome: QueryOutcome = EMPTY_OUTCOME;
  private readonly runner: RunQueryUseCase;

  private constructor(
    private readonly connection: DriverConnection,
    private readonly label: string,
    private readonly logging: boolean,
    metrics: MetricsPort,
  ) {
    this.runner = new RunQueryUseCase(connection, {
      metrics,
      logErrors: logging,
    });
  }

  /**
   * Open the connection and select the database.
   * @throws ConnectionError if the session cannot be established
   * @throws DatabaseSelectionError if the database cannot be selected
   */
  static async connect(
    credentials: ConnectionCredentials,
    options: DatabaseOptions = {},
  ): Promise<Database> {
    const driver = options.driver ?? new PgDatabaseDriver();
    const logging = options.logging ?? true;
    const label = `${credentials.database}@${credentials.host}`;

    let connection: DriverConnection;
    try {
      connection = await driver.connect(credentials);
    } catch (error) {
      if (logging) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[Database] Could not connect to ${label}: ${message}`);
      }
      throw error;
    }

    if (logging) {
      console.log(`[Database] Connected to ${label}`);
    }
    return new Database(connection, label, logging, options.metrics ?? getMetrics());
  }

  /**
   * Run one statement. `?` placeholders are filled positionally from
   * `variables`; with no variables the SQL runs as-is without preparation.
   *
   * Query failures never reject: check `outcome.ok` (or `hasError()`).
   */
  async runQuery(
    sql: string,
    variables: readonly BindValue[] = [],
    options: Partial<RunQueryOptions> = {},
  ): Promise<QueryOutcome> {
    this.outcome = EMPTY_OUTCOME;

    const outcome = await withQuerySpan(sql, async (span) => {
      const result = await this.runner.execute({ sql, variables, options });
      span.setAttribute("db.outcome", result.ok ? "ok" : result.phase);
      span.setAttribute("db.rows_affected", result.affectedRows);
      return result;
    });

    this.outcome = outcome;
    return outcome;
  }

  hasError(): boolean {
    return this.outcome.error.length > 0;
  }

  /** Error message of the last call; empty on success */
  get error(): string {
    return this.outcome.error;
  }

  /**
   * Affected-row count of the last call, as the driver reports it.
   * 0 or -1 mean no rows were affected or the count does not apply.
   */
  get affectedRows(): number {
    return this.outcome.affectedRows;
  }

  /** Rows of the last call, in fetch order */
  get result(): readonly ResultRow[] {
    return this.outcome.rows;
  }

  get lastOutcome(): QueryOutcome {
    return this.outcome;
  }

  async close(): Promise<void> {
    await this.connection.close();
    if (this.logging) {
      console.log(`[Database] Closed connection to ${this.label}`);
    }
  }
}
