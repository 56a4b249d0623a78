/**
 * Run Query Use Case
 *
 * Prepares, binds, executes and fetches one parameterized statement.
 * Per-call failures come back as a QueryFailure, never as a rejection.
 */

import type {
  DriverConnection,
  DriverResult,
  DriverStatement,
} from "../ports/database-driver.port.js";
import type { MetricsPort } from "../ports/metrics.port.js";
import {
  BindTypeError,
  DriverQueryError,
  ExecutionError,
  InvalidSyntaxError,
  PlaceholderCountError,
  type QueryError,
} from "../domain/errors/index.js";
import {
  buildTypeString,
  type BindValue,
} from "../domain/value-objects/bind-value.js";
import {
  composeErrorMessage,
  createQueryOptions,
  type RunQueryOptions,
} from "../domain/value-objects/query-options.js";
import {
  failed,
  succeeded,
  type QueryFailure,
  type QueryOutcome,
  type QueryPhase,
} from "../domain/value-objects/query-outcome.js";
import { buildStatement } from "../domain/services/statement-builder.js";
import { normalizeRows } from "../domain/services/result-normalizer.js";

export interface RunQueryInput {
  sql: string;
  variables?: readonly BindValue[];
  options?: Partial<RunQueryOptions>;
}

export interface RunQueryConfig {
  metrics?: MetricsPort;
  /** Log failed queries to the console */
  logErrors?: boolean;
}

export class RunQueryUseCase {
  private readonly logErrors: boolean;

  constructor(
    private readonly connection: DriverConnection,
    private readonly config: RunQueryConfig = {},
  ) {
    this.logErrors = config.logErrors ?? true;
  }

  async execute(input: RunQueryInput): Promise<QueryOutcome> {
    const startedAt = Date.now();
    const variables = input.variables ?? [];
    const options = createQueryOptions(input.options);
    const sql = buildStatement(input.sql, variables.length, options.autoBrackets);

    const outcome =
      variables.length > 0
        ? await this.runPrepared(sql, variables, options)
        : await this.runRaw(sql, options);

    this.config.metrics?.recordQuery({
      status: outcome.ok ? "ok" : "failed",
      phase: outcome.ok ? undefined : outcome.phase,
      prepared: variables.length > 0,
      durationMs: Date.now() - startedAt,
      rowCount: outcome.rows.length,
    });

    return outcome;
  }

  private async runPrepared(
    sql: string,
    variables: readonly BindValue[],
    options: RunQueryOptions,
  ): Promise<QueryOutcome> {
    // PREPARE
    let statement: DriverStatement;
    try {
      statement = await this.connection.prepare(sql);
    } catch (error) {
      return this.fail("prepare", new InvalidSyntaxError(nativeText(error)), options);
    }

    // BIND
    try {
      statement.bind(buildTypeString(variables), variables);
    } catch (error) {
      if (error instanceof BindTypeError || error instanceof PlaceholderCountError) {
        return this.fail("bind", error, options);
      }
      throw error;
    }

    // EXECUTE
    let result: DriverResult;
    try {
      result = await statement.execute();
    } catch (error) {
      if (error instanceof DriverQueryError && error.phase === "prepare") {
        return this.fail("prepare", new InvalidSyntaxError(error.message), options);
      }
      return this.fail("execute", new ExecutionError(nativeText(error)), options, -1);
    }

    // RESULT
    return this.complete(result, options);
  }

  private async runRaw(
    sql: string,
    options: RunQueryOptions,
  ): Promise<QueryOutcome> {
    let result: DriverResult;
    try {
      result = await this.connection.query(sql);
    } catch (error) {
      return this.fail("execute", new ExecutionError(nativeText(error)), options, -1);
    }
    return this.complete(result, options);
  }

  private complete(result: DriverResult, options: RunQueryOptions): QueryOutcome {
    const rows = options.withResult
      ? normalizeRows(result.columns, result.rows)
      : [];
    return succeeded(result.affectedRows, rows);
  }

  private fail(
    phase: QueryPhase,
    cause: QueryError,
    options: RunQueryOptions,
    affectedRows = 0,
  ): QueryFailure {
    const message = composeErrorMessage(options, cause.message);
    if (this.logErrors) {
      const detail = options.withSqlError ? cause.message : cause.name;
      console.warn(`[RunQuery] Query failed (${phase}): ${detail}`);
    }
    return failed(phase, message, cause, affectedRows);
  }
}

function nativeText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
